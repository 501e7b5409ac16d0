/**
 * Simulated completions
 *
 * Recognizes the prompts built in ./functions.ts and answers them with
 * keyword heuristics, so programs using the ai_* functions run offline.
 */

const POSITIVE_WORDS = ['love', 'amazing', 'great', 'perfect', 'excited', 'beautiful', 'excellent', 'happy', 'wonderful'];
const NEGATIVE_WORDS = ['hate', 'terrible', 'awful', 'bad', 'frustrated', 'stressful', 'horrible', 'broken', 'disappointed'];

const TOPIC_KEYWORDS: Array<[string, string[]]> = [
    ['science', ['discover', 'species', 'ocean', 'earthquake', 'research']],
    ['business', ['stock', 'market', 'economic', 'budget', 'layoffs']],
    ['sports', ['championship', 'basketball', 'football', 'wins', 'match']],
    ['technology', ['ai', 'technology', 'tech', 'software', 'computer']],
    ['politics', ['political', 'leaders', 'election', 'policies']],
    ['entertainment', ['celebrity', 'chef', 'restaurant', 'movie']],
];

const SPANISH_PHRASES: Array<[string, string]> = [
    ['good morning', 'buenos días'],
    ['thank you', 'gracias'],
    ['i love this', 'me encanta esto'],
    ['hello', 'hola'],
    ['laptop', 'portátil'],
    ['headphones', 'auriculares'],
    ['phone', 'teléfono'],
];

const KNOWN_FACTS: Array<{ all: string[]; answer: 'true' | 'false' }> = [
    { all: ['pacific', 'largest', 'ocean'], answer: 'true' },
    { all: ['earth', 'orbits', 'sun'], answer: 'true' },
    { all: ['water', 'boils', '100'], answer: 'true' },
    { all: ['cats', 'fly'], answer: 'false' },
    { all: ['sun', 'orbits', 'earth'], answer: 'false' },
];

const INFO_PATTERNS: Array<[string, RegExp]> = [
    ['email', /[\w.+-]+@[\w-]+(?:\.[\w-]+)+/g],
    ['phone', /\+?\d[\d\s().-]{6,}\d/g],
    ['url', /https?:\/\/\S+/g],
    ['date', /\b\d{4}-\d{2}-\d{2}\b|\b\d{1,2}\/\d{1,2}\/\d{2,4}\b/g],
    ['price', /[$€£]\s?\d+(?:[.,]\d+)?/g],
    ['number', /-?\d+(?:\.\d+)?/g],
];

const SUBTRACT_WORDS = ['left', 'remain', 'fewer', 'less', 'gave away', 'gives away', 'minus', 'lost', 'spent'];
const MULTIPLY_WORDS = ['times', 'each', 'per', 'multiplied'];
const DIVIDE_WORDS = ['split', 'divided', 'share', 'equally'];

function after(prompt: string, marker: string): string {
    const index = prompt.indexOf(marker);
    return index === -1 ? prompt : prompt.slice(index + marker.length).trim();
}

function containsWord(text: string, word: string): boolean {
    return new RegExp(`\\b${word}\\b`).test(text);
}

function sentiment(text: string): string {
    const lower = text.toLowerCase();
    if (POSITIVE_WORDS.some((w) => lower.includes(w))) return 'positive';
    if (NEGATIVE_WORDS.some((w) => lower.includes(w))) return 'negative';
    return 'neutral';
}

function classify(categories: string, text: string): string {
    const lower = text.toLowerCase();
    const offered = categories.split(',').map((c) => c.trim()).filter((c) => c !== '');

    const named = offered.find((c) => lower.includes(c.toLowerCase()));
    if (named) return named;

    for (const [topic, words] of TOPIC_KEYWORDS) {
        if (words.some((w) => containsWord(lower, w))) return topic;
    }
    return 'general';
}

function translate(language: string, text: string): string {
    if (language.trim().toLowerCase() !== 'spanish') {
        return text;
    }
    let translated = text.toLowerCase();
    for (const [english, spanish] of SPANISH_PHRASES) {
        translated = translated.split(english).join(spanish);
    }
    return translated;
}

function summarize(maxWords: number, text: string): string {
    const words = text.split(/\s+/).filter((w) => w !== '');
    if (words.length <= maxWords) return words.join(' ');
    return `${words.slice(0, maxWords).join(' ')}...`;
}

function entities(type: string, text: string): string {
    const kind = type.toLowerCase();
    let found: string[] = [];

    if (kind.startsWith('person') || kind.startsWith('name') || kind.startsWith('people')) {
        found = text.match(/\b[A-Z][a-z]+ [A-Z][a-z]+\b/g) ?? [];
    } else {
        found = extract(kind, text);
    }
    return found.length > 0 ? found.join(', ') : 'none';
}

function extract(what: string, text: string): string[] {
    const kind = what.toLowerCase();
    for (const [name, pattern] of INFO_PATTERNS) {
        if (kind.includes(name)) {
            return text.match(pattern) ?? [];
        }
    }
    return [];
}

function solve(problem: string): string {
    const lower = problem.toLowerCase();
    const numbers = (lower.match(/-?\d+(?:\.\d+)?/g) ?? []).map(Number);

    if (numbers.length === 0) return '0';
    if (numbers.length === 1) return String(numbers[0]);

    const [a, b] = numbers;
    if (SUBTRACT_WORDS.some((w) => lower.includes(w))) return String(a - b);
    if (DIVIDE_WORDS.some((w) => lower.includes(w)) && b !== 0) return String(a / b);
    if (MULTIPLY_WORDS.some((w) => containsWord(lower, w))) return String(a * b);
    return String(numbers.reduce((sum, n) => sum + n, 0));
}

function factCheck(statement: string): string {
    const lower = statement.toLowerCase();
    const known = KNOWN_FACTS.find((fact) => fact.all.every((w) => lower.includes(w)));
    return known ? known.answer : 'uncertain';
}

/**
 * Answer a prompt without a model
 */
export function simulateCompletion(prompt: string): string {
    let match: RegExpExecArray | null;

    if (prompt.startsWith('Analyze sentiment')) {
        return sentiment(after(prompt, 'Text:'));
    }
    if ((match = /^Classify into: (.*)\n\nText: ([\s\S]*)$/.exec(prompt))) {
        return classify(match[1], match[2]);
    }
    if ((match = /^Translate to ([^:]*): ([\s\S]*)$/.exec(prompt))) {
        return translate(match[1], match[2]);
    }
    if ((match = /^Summarize in (\d+) words: ([\s\S]*)$/.exec(prompt))) {
        return summarize(Number(match[1]), match[2]);
    }
    if ((match = /^Extract (.*?) entities: ([\s\S]*)$/.exec(prompt))) {
        return entities(match[1], match[2]);
    }
    if ((match = /^Extract ([^:]*): ([\s\S]*)$/.exec(prompt))) {
        const found = extract(match[1], match[2]);
        return found.length > 0 ? found.join(', ') : 'none';
    }
    if (prompt.startsWith('Solve (number only):')) {
        return solve(after(prompt, ':'));
    }
    if (prompt.startsWith('Is this true or false?')) {
        return factCheck(after(prompt, '?'));
    }
    if (prompt.startsWith('Generate:')) {
        return `Generated: ${after(prompt, 'Generate:')}`;
    }

    const head = prompt.slice(0, 50);
    return `AI-generated response: ${head}${prompt.length > 50 ? '...' : ''}`;
}
