/**
 * AWK Regular Expressions
 *
 * Translates POSIX extended regular expressions to JavaScript RegExp
 * and caches the compiled form per pattern text.
 */

import { AwkRuntimeError } from '../errors/awk-error.js';

const CHARACTER_CLASSES: Record<string, string> = {
    alpha: 'a-zA-Z',
    digit: '0-9',
    alnum: 'a-zA-Z0-9',
    upper: 'A-Z',
    lower: 'a-z',
    space: ' \\t\\n\\r\\f\\v',
    blank: ' \\t',
    punct: '!-\\/:-@\\[-`{-~',
    print: ' -~',
    graph: '!-~',
    cntrl: '\\x00-\\x1f\\x7f',
    xdigit: '0-9A-Fa-f',
};

/**
 * Rewrite ERE syntax JavaScript reads differently: POSIX character
 * classes inside brackets, an escaped slash, and a literal "]" or "["
 * at the start of a bracket expression.
 */
export function translateRegex(pattern: string): string {
    let out = '';
    let i = 0;

    while (i < pattern.length) {
        const c = pattern[i];

        if (c === '\\') {
            const next = pattern[i + 1];
            if (next === undefined) {
                out += '\\\\';
                i++;
            } else if (next === '/' || next === '"') {
                out += next;
                i += 2;
            } else {
                out += c + next;
                i += 2;
            }
            continue;
        }

        if (c === '[') {
            const [bracket, end] = translateBracket(pattern, i);
            out += bracket;
            i = end;
            continue;
        }

        out += c;
        i++;
    }

    return out;
}

function translateBracket(pattern: string, start: number): [string, number] {
    let i = start + 1;
    let out = '[';

    if (pattern[i] === '^') {
        out += '^';
        i++;
    }

    // A leading ] is literal in POSIX brackets
    if (pattern[i] === ']') {
        out += '\\]';
        i++;
    }

    while (i < pattern.length && pattern[i] !== ']') {
        if (pattern.startsWith('[:', i)) {
            const close = pattern.indexOf(':]', i + 2);
            if (close !== -1) {
                const name = pattern.slice(i + 2, close);
                const cls = CHARACTER_CLASSES[name];
                if (cls !== undefined) {
                    out += cls;
                    i = close + 2;
                    continue;
                }
            }
        }

        const c = pattern[i];
        if (c === '\\' && i + 1 < pattern.length) {
            out += c + pattern[i + 1];
            i += 2;
            continue;
        }
        if (c === '[') {
            out += '\\[';
            i++;
            continue;
        }
        out += c;
        i++;
    }

    if (i >= pattern.length) {
        // Unterminated bracket: let RegExp report it
        return [out, i];
    }

    return [out + ']', i + 1];
}

/**
 * Compiled-regex cache keyed by pattern text. One per run.
 */
export class RegexCache {
    private cache = new Map<string, RegExp>();
    private globalCache = new Map<string, RegExp>();

    compile(pattern: string): RegExp {
        let re = this.cache.get(pattern);
        if (!re) {
            try {
                re = new RegExp(translateRegex(pattern));
            } catch (err) {
                const reason = err instanceof Error ? err.message : String(err);
                throw new AwkRuntimeError(`invalid regular expression /${pattern}/: ${reason}`);
            }
            this.cache.set(pattern, re);
        }
        return re;
    }

    /**
     * Global variant for split/gsub scanning
     */
    compileGlobal(pattern: string): RegExp {
        let re = this.globalCache.get(pattern);
        if (!re) {
            re = new RegExp(this.compile(pattern).source, 'g');
            this.globalCache.set(pattern, re);
        }
        re.lastIndex = 0;
        return re;
    }

    get size(): number {
        return this.cache.size;
    }
}
