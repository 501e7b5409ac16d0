/**
 * AWK Lexer
 *
 * Tokenizes AWK source code into tokens.
 */

import { LexError } from '../errors/awk-error.js';
import { isBuiltinName, type Token, type TokenType } from './types.js';

const KEYWORDS: Record<string, TokenType> = {
    'BEGIN': 'BEGIN',
    'END': 'END',
    'if': 'IF',
    'else': 'ELSE',
    'while': 'WHILE',
    'for': 'FOR',
    'do': 'DO',
    'break': 'BREAK',
    'continue': 'CONTINUE',
    'next': 'NEXT',
    'exit': 'EXIT',
    'function': 'FUNCTION',
    'return': 'RETURN',
    'delete': 'DELETE',
    'in': 'IN',
    'getline': 'GETLINE',
    'print': 'PRINT',
    'printf': 'PRINTF',
};

const SIMPLE_ESCAPES: Record<string, string> = {
    'n': '\n',
    't': '\t',
    'r': '\r',
    '\\': '\\',
    '"': '"',
    '/': '/',
    'a': '\x07',
    'b': '\b',
    'f': '\f',
    'v': '\v',
};

// Tokens after which "/" opens a regex rather than dividing
const REGEX_PRECEDING: ReadonlySet<TokenType> = new Set<TokenType>([
    'MATCH', 'NOT_MATCH', 'COMMA', 'SEMICOLON', 'NEWLINE',
    'LBRACE', 'RBRACE', 'LPAREN', 'OR', 'AND', 'EQ', 'NE',
    'LT', 'GT', 'LE', 'GE', 'NOT', 'QUESTION', 'COLON',
    'PLUS', 'MINUS', 'STAR', 'PERCENT', 'CARET', 'IN',
    'IF', 'WHILE', 'FOR', 'DO', 'ELSE', 'RETURN', 'PRINT', 'PRINTF',
    'ASSIGN', 'PLUS_ASSIGN', 'MINUS_ASSIGN', 'STAR_ASSIGN',
    'SLASH_ASSIGN', 'PERCENT_ASSIGN', 'CARET_ASSIGN',
]);

// Tokens after which a newline continues the statement
const NEWLINE_INSIGNIFICANT_AFTER: ReadonlySet<TokenType> = new Set<TokenType>([
    'COMMA', 'LBRACE', 'LPAREN', 'LBRACKET',
    'OR', 'AND', 'QUESTION', 'COLON',
    'PLUS', 'MINUS', 'STAR', 'SLASH', 'PERCENT', 'CARET',
    'EQ', 'NE', 'LT', 'GT', 'LE', 'GE',
    'MATCH', 'NOT_MATCH',
    'ASSIGN', 'PLUS_ASSIGN', 'MINUS_ASSIGN', 'STAR_ASSIGN',
    'SLASH_ASSIGN', 'PERCENT_ASSIGN', 'CARET_ASSIGN',
    'NEWLINE', 'SEMICOLON',
]);

/**
 * Process backslash escapes the way string literals do.
 * Used for -v assignments and -F separators.
 */
export function processEscapes(text: string): string {
    let out = '';
    let i = 0;

    while (i < text.length) {
        const c = text[i];
        if (c !== '\\' || i + 1 >= text.length) {
            out += c;
            i++;
            continue;
        }

        const [value, consumed] = readEscape(text, i + 1);
        out += value;
        i += 1 + consumed;
    }

    return out;
}

/**
 * Decode the escape starting after a backslash.
 * Returns the decoded text and the number of characters consumed.
 */
function readEscape(text: string, at: number): [string, number] {
    const c = text[at];

    const simple = SIMPLE_ESCAPES[c];
    if (simple !== undefined) {
        return [simple, 1];
    }

    if (c >= '0' && c <= '7') {
        let digits = '';
        while (digits.length < 3 && at + digits.length < text.length) {
            const d = text[at + digits.length];
            if (d < '0' || d > '7') break;
            digits += d;
        }
        return [String.fromCharCode(parseInt(digits, 8)), digits.length];
    }

    return ['\\' + c, 1];
}

export class Lexer {
    private source: string;
    private pos: number = 0;
    private line: number = 1;
    private column: number = 1;
    // Tokens scanned but not yet yielded
    private pending: Token[] = [];

    // Track context for regex vs division disambiguation
    private lastTokenType: TokenType | null = null;

    constructor(source: string) {
        this.source = source;
    }

    /**
     * Scan on demand, one token at a time, ending with EOF
     */
    *tokenize(): Generator<Token> {
        while (!this.isAtEnd()) {
            this.scanToken();
            yield* this.pending;
            this.pending = [];
        }

        yield {
            type: 'EOF',
            value: '',
            line: this.line,
            column: this.column,
            offset: this.pos,
        };
    }

    private scanToken(): void {
        this.skipWhitespaceAndComments();
        if (this.isAtEnd()) return;

        const start = this.pos;
        const startLine = this.line;
        const startColumn = this.column;
        const c = this.advance();
        const add = (type: TokenType, value: string) => this.addToken(type, value, startLine, startColumn, start);

        // Newline (significant in AWK for statement termination)
        if (c === '\n') {
            if (this.isSignificantNewline()) {
                add('NEWLINE', '\n');
            }
            return;
        }

        if (c === '"') {
            this.string(startLine, startColumn, start);
            return;
        }

        // Regex literal - only in certain contexts
        if (c === '/' && this.canStartRegex()) {
            this.regex(startLine, startColumn, start);
            return;
        }

        if (this.isDigit(c) || (c === '.' && this.isDigit(this.peek()))) {
            this.number(start, startLine, startColumn);
            return;
        }

        if (this.isAlpha(c) || c === '_') {
            this.identifier(start, startLine, startColumn);
            return;
        }

        switch (c) {
            case '$':
                add('DOLLAR', '$');
                break;

            case '+':
                if (this.match('+')) {
                    add('INCREMENT', '++');
                } else if (this.match('=')) {
                    add('PLUS_ASSIGN', '+=');
                } else {
                    add('PLUS', '+');
                }
                break;

            case '-':
                if (this.match('-')) {
                    add('DECREMENT', '--');
                } else if (this.match('=')) {
                    add('MINUS_ASSIGN', '-=');
                } else {
                    add('MINUS', '-');
                }
                break;

            case '*':
                // ** and **= are accepted spellings of ^ and ^=
                if (this.match('*')) {
                    if (this.match('=')) {
                        add('CARET_ASSIGN', '^=');
                    } else {
                        add('CARET', '^');
                    }
                } else if (this.match('=')) {
                    add('STAR_ASSIGN', '*=');
                } else {
                    add('STAR', '*');
                }
                break;

            case '/':
                if (this.match('=')) {
                    add('SLASH_ASSIGN', '/=');
                } else {
                    add('SLASH', '/');
                }
                break;

            case '%':
                if (this.match('=')) {
                    add('PERCENT_ASSIGN', '%=');
                } else {
                    add('PERCENT', '%');
                }
                break;

            case '^':
                if (this.match('=')) {
                    add('CARET_ASSIGN', '^=');
                } else {
                    add('CARET', '^');
                }
                break;

            case '=':
                if (this.match('=')) {
                    add('EQ', '==');
                } else {
                    add('ASSIGN', '=');
                }
                break;

            case '!':
                if (this.match('=')) {
                    add('NE', '!=');
                } else if (this.match('~')) {
                    add('NOT_MATCH', '!~');
                } else {
                    add('NOT', '!');
                }
                break;

            case '<':
                if (this.match('=')) {
                    add('LE', '<=');
                } else {
                    add('LT', '<');
                }
                break;

            case '>':
                if (this.match('=')) {
                    add('GE', '>=');
                } else if (this.match('>')) {
                    add('APPEND', '>>');
                } else {
                    add('GT', '>');
                }
                break;

            case '&':
                if (!this.match('&')) {
                    throw this.error(`unexpected character '&'`, startLine, startColumn);
                }
                add('AND', '&&');
                break;

            case '|':
                if (this.match('|')) {
                    add('OR', '||');
                } else {
                    add('PIPE', '|');
                }
                break;

            case '~': add('MATCH', '~'); break;
            case '?': add('QUESTION', '?'); break;
            case ':': add('COLON', ':'); break;
            case '(': add('LPAREN', '('); break;
            case ')': add('RPAREN', ')'); break;
            case '{': add('LBRACE', '{'); break;
            case '}': add('RBRACE', '}'); break;
            case '[': add('LBRACKET', '['); break;
            case ']': add('RBRACKET', ']'); break;
            case ',': add('COMMA', ','); break;
            case ';': add('SEMICOLON', ';'); break;

            default:
                throw this.error(`unexpected character '${c}'`, startLine, startColumn);
        }
    }

    private string(startLine: number, startColumn: number, start: number): void {
        let value = '';

        while (!this.isAtEnd() && this.peek() !== '"') {
            if (this.peek() === '\n') {
                throw this.error('unterminated string', startLine, startColumn);
            }

            if (this.peek() === '\\') {
                this.advance();
                if (this.isAtEnd()) break;

                // Backslash-newline continues the string
                if (this.peek() === '\n') {
                    this.advance();
                    continue;
                }

                const [decoded, consumed] = readEscape(this.source, this.pos);
                for (let i = 0; i < consumed; i++) {
                    this.advance();
                }
                value += decoded;
            } else {
                value += this.advance();
            }
        }

        if (this.isAtEnd()) {
            throw this.error('unterminated string', startLine, startColumn);
        }

        this.advance(); // closing "
        this.addToken('STRING', value, startLine, startColumn, start);
    }

    private regex(startLine: number, startColumn: number, start: number): void {
        let pattern = '';

        while (!this.isAtEnd() && this.peek() !== '/') {
            if (this.peek() === '\n') {
                throw this.error('unterminated regex', startLine, startColumn);
            }

            if (this.peek() === '\\') {
                pattern += this.advance();
                if (!this.isAtEnd()) {
                    pattern += this.advance();
                }
            } else if (this.peek() === '[') {
                // A "/" inside a bracket expression does not end the regex
                pattern += this.bracket(startLine, startColumn);
            } else {
                pattern += this.advance();
            }
        }

        if (this.isAtEnd()) {
            throw this.error('unterminated regex', startLine, startColumn);
        }

        this.advance(); // closing /
        this.addToken('REGEX', pattern, startLine, startColumn, start);
    }

    private bracket(startLine: number, startColumn: number): string {
        let text = this.advance(); // [
        if (this.peek() === '^') text += this.advance();
        if (this.peek() === ']') text += this.advance();

        while (!this.isAtEnd() && this.peek() !== ']') {
            if (this.peek() === '\n') {
                throw this.error('unterminated regex', startLine, startColumn);
            }
            if (this.peek() === '[' && this.peekNext() === ':') {
                const close = this.source.indexOf(':]', this.pos + 2);
                if (close !== -1 && !this.source.slice(this.pos, close).includes('\n')) {
                    while (this.pos < close + 2) {
                        text += this.advance();
                    }
                    continue;
                }
            }
            if (this.peek() === '\\') {
                text += this.advance();
                if (this.isAtEnd()) break;
            }
            text += this.advance();
        }

        if (!this.isAtEnd()) {
            text += this.advance(); // ]
        }
        return text;
    }

    private number(start: number, startLine: number, startColumn: number): void {
        // Back up to include first digit
        this.pos = start;
        this.column = startColumn;

        while (this.isDigit(this.peek())) {
            this.advance();
        }

        if (this.peek() === '.') {
            this.advance();
            while (this.isDigit(this.peek())) {
                this.advance();
            }
        }

        // Exponent only when digits follow, so "1e" is 1 concatenated with e
        if (this.peek() === 'e' || this.peek() === 'E') {
            const sign = this.peekNext() === '+' || this.peekNext() === '-' ? 1 : 0;
            if (this.isDigit(this.peekAt(1 + sign))) {
                this.advance();
                if (sign) this.advance();
                while (this.isDigit(this.peek())) {
                    this.advance();
                }
            }
        }

        const value = this.source.slice(start, this.pos);
        this.addToken('NUMBER', value, startLine, startColumn, start);
    }

    private identifier(start: number, startLine: number, startColumn: number): void {
        while (this.isAlphaNumeric(this.peek())) {
            this.advance();
        }

        const text = this.source.slice(start, this.pos);
        const type = KEYWORDS[text] ?? (isBuiltinName(text) ? 'BUILTIN' : 'IDENTIFIER');
        this.addToken(type, text, startLine, startColumn, start);
    }

    private skipWhitespaceAndComments(): void {
        while (!this.isAtEnd()) {
            const c = this.peek();

            if (c === ' ' || c === '\t' || c === '\r') {
                this.advance();
            } else if (c === '#') {
                while (!this.isAtEnd() && this.peek() !== '\n') {
                    this.advance();
                }
            } else if (c === '\\' && this.peekNext() === '\n') {
                // Line continuation
                this.advance();
                this.advance();
            } else if (c === '\\' && this.peekNext() === '\r' && this.peekAt(2) === '\n') {
                this.advance();
                this.advance();
                this.advance();
            } else {
                break;
            }
        }
    }

    private canStartRegex(): boolean {
        if (this.lastTokenType === null) return true;
        return REGEX_PRECEDING.has(this.lastTokenType);
    }

    private isSignificantNewline(): boolean {
        if (this.lastTokenType === null) return false;
        return !NEWLINE_INSIGNIFICANT_AFTER.has(this.lastTokenType);
    }

    private addToken(type: TokenType, value: string, line: number, column: number, offset: number): void {
        this.pending.push({ type, value, line, column, offset });
        this.lastTokenType = type;
    }

    private error(message: string, line: number, column: number): LexError {
        return new LexError(message, { line, column });
    }

    private advance(): string {
        const c = this.source[this.pos++];
        if (c === '\n') {
            this.line++;
            this.column = 1;
        } else {
            this.column++;
        }
        return c;
    }

    private match(expected: string): boolean {
        if (this.isAtEnd()) return false;
        if (this.source[this.pos] !== expected) return false;
        this.pos++;
        this.column++;
        return true;
    }

    private peek(): string {
        return this.peekAt(0);
    }

    private peekNext(): string {
        return this.peekAt(1);
    }

    private peekAt(distance: number): string {
        const at = this.pos + distance;
        if (at >= this.source.length) return '\0';
        return this.source[at];
    }

    private isAtEnd(): boolean {
        return this.pos >= this.source.length;
    }

    private isDigit(c: string): boolean {
        return c >= '0' && c <= '9';
    }

    private isAlpha(c: string): boolean {
        return (c >= 'a' && c <= 'z') || (c >= 'A' && c <= 'Z');
    }

    private isAlphaNumeric(c: string): boolean {
        return this.isAlpha(c) || this.isDigit(c) || c === '_';
    }
}

/**
 * Lazy token stream for a program. Each iteration rescans the source, so
 * the stream can be walked more than once.
 */
export function tokenize(source: string): Iterable<Token> {
    return {
        [Symbol.iterator]: () => new Lexer(source).tokenize(),
    };
}
