import { describe, it, expect } from 'vitest';
import { simulateCompletion } from '@src/lib/ai/simulated.js';

describe('simulateCompletion', () => {
    it('should label sentiment from the text after the prompt', () => {
        const ask = (text: string) => simulateCompletion(`Analyze sentiment: positive, negative, or neutral?\n\nText: ${text}`);
        expect(ask('I love it')).toBe('positive');
        expect(ask('This is terrible')).toBe('negative');
        expect(ask('The sky is blue')).toBe('neutral');
    });

    it('should classify by offered category, then by topic keywords', () => {
        expect(simulateCompletion('Classify into: tech, sports\n\nText: sports news today')).toBe('sports');
        expect(simulateCompletion('Classify into: cooking, travel\n\nText: The stock market fell')).toBe('business');
        expect(simulateCompletion('Classify into: cooking, travel\n\nText: nothing here')).toBe('general');
    });

    it('should translate known phrases to Spanish only', () => {
        expect(simulateCompletion('Translate to Spanish: Good morning')).toBe('buenos días');
        expect(simulateCompletion('Translate to French: Hello')).toBe('Hello');
    });

    it('should keep the first words of a summary', () => {
        expect(simulateCompletion('Summarize in 3 words: one two three four')).toBe('one two three...');
        expect(simulateCompletion('Summarize in 5 words: a b')).toBe('a b');
    });

    it('should extract person names and other entities', () => {
        expect(simulateCompletion('Extract person entities: Alice Smith met Bob Jones')).toBe('Alice Smith, Bob Jones');
        expect(simulateCompletion('Extract person entities: nobody')).toBe('none');
        expect(simulateCompletion('Extract email: write to test@example.com now')).toBe('test@example.com');
        expect(simulateCompletion('Extract phone: none here')).toBe('none');
    });

    it('should solve simple word problems', () => {
        const solve = (problem: string) => simulateCompletion(`Solve (number only): ${problem}`);
        expect(solve('Tom has 10 apples and gives away 3. How many are left?')).toBe('7');
        expect(solve('4 boxes with 6 each')).toBe('24');
        expect(solve('2 and 3 and 4')).toBe('9');
        expect(solve('no numbers')).toBe('0');
    });

    it('should check known facts', () => {
        expect(simulateCompletion('Is this true or false? The Earth orbits the Sun')).toBe('true');
        expect(simulateCompletion('Is this true or false? Cats can fly')).toBe('false');
        expect(simulateCompletion('Is this true or false? Paris is big')).toBe('uncertain');
    });

    it('should echo generation requests and other prompts', () => {
        expect(simulateCompletion('Generate: a haiku')).toBe('Generated: a haiku');
        expect(simulateCompletion('Hello there')).toBe('AI-generated response: Hello there');
    });
});
