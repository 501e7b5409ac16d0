import { describe, it, expect } from 'vitest';
import { parseProgram } from '@src/lib/awk/parser.js';
import { ParseError } from '@src/lib/errors/awk-error.js';
import type { ExprNode, StmtNode } from '@src/lib/awk/types.js';

/**
 * First statement of the first rule's action
 */
function firstStatement(source: string): StmtNode {
    const action = parseProgram(source).rules[0].action;
    if (!action) {
        throw new Error('rule has no action');
    }
    return action.statements[0];
}

/**
 * Expression of `BEGIN { <expr> }`
 */
function expr(source: string): ExprNode {
    const stmt = firstStatement(`BEGIN { ${source} }`);
    if (stmt.type !== 'ExpressionStmt') {
        throw new Error(`expected an expression statement, got ${stmt.type}`);
    }
    return stmt.expression;
}

describe('Parser', () => {
    describe('program structure', () => {
        it('should keep rules in source order with their pattern kinds', () => {
            const program = parseProgram('BEGIN { x = 1 }\n/re/\n$1 > 2 { print }\nEND { print NR }');
            expect(program.rules.map((r) => r.pattern.type)).toEqual(['Begin', 'RegexPattern', 'ExprPattern', 'End']);
            expect(program.rules.map((r) => r.index)).toEqual([0, 1, 2, 3]);
            expect(program.rules[1].action).toBeNull();
        });

        it('should parse range patterns', () => {
            const program = parseProgram('/start/, /stop/ { print }');
            expect(program.rules[0].pattern).toMatchObject({
                type: 'PatternRange',
                start: { type: 'RegexLiteral', pattern: 'start' },
                end: { type: 'RegexLiteral', pattern: 'stop' },
            });
        });

        it('should collect function definitions separately', () => {
            const program = parseProgram('function add(a, b) { return a + b }\n{ print add($1, $2) }');
            expect(program.functions).toHaveLength(1);
            expect(program.functions[0]).toMatchObject({ name: 'add', params: ['a', 'b'] });
            expect(program.rules).toHaveLength(1);
        });

        it('should require BEGIN and END to have an action', () => {
            expect(() => parseProgram('BEGIN')).toThrow('BEGIN requires an action');
        });

        it('should require the action to open on the pattern line', () => {
            const program = parseProgram('NR == 1\n{ print "x" }');
            expect(program.rules).toHaveLength(2);
            expect(program.rules[0].action).toBeNull();
            expect(program.rules[1].pattern.type).toBe('Always');
        });
    });

    describe('precedence', () => {
        it('should bind multiplication tighter than addition', () => {
            expect(expr('1 + 2 * 3')).toMatchObject({
                operator: '+',
                right: { operator: '*' },
            });
        });

        it('should apply unary minus after exponentiation', () => {
            expect(expr('x = -2 ^ 2')).toMatchObject({
                type: 'Assignment',
                value: { type: 'Unary', operator: '-', operand: { type: 'Binary', operator: '^' } },
            });
        });

        it('should make exponentiation right associative', () => {
            expect(expr('2 ^ 3 ^ 2')).toMatchObject({
                operator: '^',
                left: { type: 'NumberLiteral', value: 2 },
                right: { operator: '^' },
            });
        });

        it('should concatenate left to right', () => {
            expect(expr('a b c')).toMatchObject({
                operator: 'concat',
                left: { operator: 'concat', left: { name: 'a' }, right: { name: 'b' } },
                right: { name: 'c' },
            });
        });

        it('should reject chained comparisons', () => {
            expect(() => parseProgram('BEGIN { a < b < c }')).toThrow(ParseError);
        });
    });

    describe('calls', () => {
        it('should call a user function only when ( follows the name directly', () => {
            expect(expr('foo(1)')).toMatchObject({ type: 'FunctionCall', name: 'foo' });
            expect(expr('foo (1)')).toMatchObject({
                type: 'Binary',
                operator: 'concat',
                left: { type: 'Identifier', name: 'foo' },
                right: { type: 'NumberLiteral', value: 1 },
            });
        });

        it('should treat bare length as a call without arguments', () => {
            expect(expr('length')).toMatchObject({ type: 'FunctionCall', name: 'length', args: [] });
        });
    });

    describe('fields', () => {
        it('should apply $ to the following primary', () => {
            expect(expr('$NF')).toMatchObject({ type: 'FieldAccess', index: { type: 'Identifier', name: 'NF' } });
            expect(expr('$i++')).toMatchObject({
                type: 'Increment',
                prefix: false,
                operand: { type: 'FieldAccess', index: { name: 'i' } },
            });
        });
    });

    describe('print', () => {
        it('should read > as a redirection in a print list', () => {
            expect(firstStatement('{ print $1, $2 > "out" }')).toMatchObject({
                type: 'PrintStmt',
                args: [{ type: 'FieldAccess' }, { type: 'FieldAccess' }],
                output: { type: 'file', target: { type: 'StringLiteral', value: 'out' } },
            });
        });

        it('should read > as a comparison inside parentheses', () => {
            expect(firstStatement('{ print ($1 > 2) }')).toMatchObject({
                type: 'PrintStmt',
                args: [{ type: 'Binary', operator: '>' }],
                output: null,
            });
        });

        it('should unwrap a parenthesized print list', () => {
            const stmt = firstStatement('{ print (1, 2) >> "log" }');
            expect(stmt).toMatchObject({ type: 'PrintStmt', output: { type: 'append' } });
            expect(stmt.type === 'PrintStmt' && stmt.args).toHaveLength(2);
        });

        it('should reject output pipes', () => {
            expect(() => parseProgram('{ print | "cat" }')).toThrow('output pipes are not supported');
        });

        it('should require a printf format', () => {
            expect(() => parseProgram('{ printf }')).toThrow('printf requires a format');
        });
    });

    describe('statements', () => {
        it('should parse for-in loops', () => {
            expect(firstStatement('{ for (k in seen) print k }')).toMatchObject({
                type: 'ForInStmt',
                variable: 'k',
                array: 'seen',
            });
        });

        it('should parse membership tests with several subscripts', () => {
            expect(expr('(i, j) in grid')).toMatchObject({
                type: 'InExpr',
                array: 'grid',
                index: [{ name: 'i' }, { name: 'j' }],
            });
        });

        it('should find an else on the next line', () => {
            const stmt = firstStatement('{ if (x) print 1\n else print 2 }');
            expect(stmt).toMatchObject({ type: 'IfStmt', alternate: { type: 'PrintStmt' } });
        });

        it('should split statements on semicolons and newlines', () => {
            const program = parseProgram('{ a = 1; b = 2\n c = 3 }');
            expect(program.rules[0].action?.statements).toHaveLength(3);
        });

        it('should parse getline from a file into a variable', () => {
            expect(expr('getline line < "data"')).toMatchObject({
                type: 'Getline',
                target: { type: 'Identifier', name: 'line' },
                file: { type: 'StringLiteral', value: 'data' },
            });
        });
    });

    describe('errors', () => {
        it('should reject next in BEGIN with its position', () => {
            try {
                parseProgram('BEGIN { next }');
                expect.unreachable('parse should fail');
            } catch (err) {
                expect(err).toBeInstanceOf(ParseError);
                expect(err instanceof ParseError && err.position).toEqual({ line: 1, column: 9 });
            }
        });

        it('should reject statements used out of place', () => {
            expect(() => parseProgram('{ break }')).toThrow('break outside a loop');
            expect(() => parseProgram('{ return 1 }')).toThrow('return outside a function');
        });

        it('should reject bad function definitions', () => {
            expect(() => parseProgram('function length(s) { }')).toThrow('is a built-in function');
            expect(() => parseProgram('function f(a, a) { }')).toThrow('duplicate parameter a in function f');
            expect(() => parseProgram('function f(NR) { }')).toThrow('cannot use special variable NR');
            expect(() => parseProgram('function f() { }\nfunction f() { }')).toThrow('function f redefined');
        });

        it('should reject an expression list that is not a membership test', () => {
            expect(() => parseProgram('BEGIN { x = (1, 2) }')).toThrow('expression list must be followed by in');
        });

        it('should reject assignment to a non-lvalue', () => {
            expect(() => parseProgram('BEGIN { 1 = 2 }')).toThrow('invalid assignment target');
        });
    });
});
