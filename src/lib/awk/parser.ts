/**
 * AWK Parser
 *
 * Parses tokens into an AST (Abstract Syntax Tree).
 *
 * Precedence, lowest first: ?: || && in ~ !~ comparison concatenation
 * + - * / % unary ^ ++ -- $ grouping.
 */

import { ParseError } from '../errors/awk-error.js';
import { tokenize } from './lexer.js';
import {
    isLValue, isSpecialVariable,
    type Token, type TokenType, type ProgramNode, type RuleNode, type FunctionDefNode,
    type PatternNode, type BlockNode, type StmtNode, type ExprNode,
    type IfStmtNode, type WhileStmtNode, type DoWhileStmtNode, type ForStmtNode,
    type ForInStmtNode, type PrintStmtNode, type PrintfStmtNode, type OutputRedirect,
    type DeleteStmtNode, type ExpressionStmtNode, type LValueNode,
    type BinaryOperator, type AssignmentOperator, type FieldAccessNode,
    type FunctionCallNode, type GetlineNode,
} from './types.js';

const ASSIGNMENT_OPERATORS: Partial<Record<TokenType, AssignmentOperator>> = {
    ASSIGN: '=',
    PLUS_ASSIGN: '+=',
    MINUS_ASSIGN: '-=',
    STAR_ASSIGN: '*=',
    SLASH_ASSIGN: '/=',
    PERCENT_ASSIGN: '%=',
    CARET_ASSIGN: '^=',
};

const COMPARISON_OPERATORS: Partial<Record<TokenType, BinaryOperator>> = {
    LT: '<',
    LE: '<=',
    GT: '>',
    GE: '>=',
    EQ: '==',
    NE: '!=',
};

const MATCH_OPERATORS: Partial<Record<TokenType, BinaryOperator>> = {
    MATCH: '~',
    NOT_MATCH: '!~',
};

const ADDITIVE_OPERATORS: Partial<Record<TokenType, BinaryOperator>> = {
    PLUS: '+',
    MINUS: '-',
};

const MULTIPLICATIVE_OPERATORS: Partial<Record<TokenType, BinaryOperator>> = {
    STAR: '*',
    SLASH: '/',
    PERCENT: '%',
};

// Tokens that may begin the right operand of an implicit concatenation
const CONCAT_STARTERS: ReadonlySet<TokenType> = new Set<TokenType>([
    'NUMBER', 'STRING', 'REGEX', 'DOLLAR', 'IDENTIFIER', 'BUILTIN',
    'LPAREN', 'INCREMENT', 'DECREMENT',
]);

type RuleKind = 'begin' | 'end' | 'main' | 'function';

export class Parser {
    private tokens: Token[];
    private pos: number = 0;
    private ruleIndex = 0;

    // Statement context for placement checks
    private loopDepth = 0;
    private context: RuleKind = 'main';

    // Inside an unparenthesized print list ">" is a redirection
    private noGreater = false;
    // Token index of a "(" opening a print list, where (a, b) is allowed
    private printGroupPos = -1;

    constructor(tokens: Iterable<Token>) {
        this.tokens = Array.from(tokens);
        if (this.tokens.length === 0 || this.tokens[this.tokens.length - 1].type !== 'EOF') {
            const last = this.tokens[this.tokens.length - 1];
            this.tokens.push({
                type: 'EOF',
                value: '',
                line: last?.line ?? 1,
                column: last?.column ?? 1,
                offset: last ? last.offset + last.value.length : 0,
            });
        }
    }

    parse(): ProgramNode {
        const program: ProgramNode = {
            type: 'Program',
            rules: [],
            functions: [],
            line: 1,
            column: 1,
        };
        const functionNames = new Set<string>();

        this.skipTerminators();

        while (!this.isAtEnd()) {
            if (this.check('FUNCTION')) {
                const fn = this.functionDef();
                if (functionNames.has(fn.name)) {
                    throw new ParseError(`function ${fn.name} redefined`, fn);
                }
                functionNames.add(fn.name);
                program.functions.push(fn);
            } else {
                program.rules.push(this.rule());
            }
            this.skipTerminators();
        }

        return program;
    }

    // ========================================================================
    // Program structure
    // ========================================================================

    private functionDef(): FunctionDefNode {
        const token = this.advance(); // function

        if (this.check('BUILTIN')) {
            throw this.error(`function name ${this.peek().value} is a built-in function`);
        }
        const name = this.consume('IDENTIFIER', 'expected function name').value;

        this.consume('LPAREN', 'expected ( after function name');
        const params: string[] = [];

        if (!this.check('RPAREN')) {
            do {
                const param = this.consume('IDENTIFIER', 'expected parameter name');
                if (params.includes(param.value)) {
                    throw new ParseError(`duplicate parameter ${param.value} in function ${name}`, param);
                }
                if (isSpecialVariable(param.value)) {
                    throw new ParseError(`cannot use special variable ${param.value} as a parameter`, param);
                }
                params.push(param.value);
            } while (this.match('COMMA'));
        }

        this.consume('RPAREN', 'expected ) after parameters');
        this.skipNewlines();

        const body = this.inContext('function', () => this.block());

        return {
            type: 'FunctionDef',
            name,
            params,
            body,
            line: token.line,
            column: token.column,
        };
    }

    private rule(): RuleNode {
        const token = this.peek();
        const index = this.ruleIndex++;

        if (this.match('BEGIN', 'END')) {
            const kind = token.type === 'BEGIN' ? 'begin' : 'end';
            const pattern: PatternNode = kind === 'begin' ? { type: 'Begin' } : { type: 'End' };
            this.skipNewlines();
            if (!this.check('LBRACE')) {
                throw this.error(`${token.value} requires an action`);
            }
            const action = this.inContext(kind, () => this.block());
            return {
                type: 'Rule',
                index,
                pattern,
                action,
                line: token.line,
                column: token.column,
            };
        }

        let pattern: PatternNode = { type: 'Always' };
        if (!this.check('LBRACE')) {
            pattern = this.pattern();
        }

        // The action must open on the pattern's line
        let action: BlockNode | null = null;
        if (this.check('LBRACE')) {
            action = this.inContext('main', () => this.block());
        } else if (!this.check('NEWLINE') && !this.check('SEMICOLON') && !this.isAtEnd()) {
            throw this.error(`unexpected ${this.describe(this.peek())} after pattern`);
        }

        return {
            type: 'Rule',
            index,
            pattern,
            action,
            line: token.line,
            column: token.column,
        };
    }

    private pattern(): PatternNode {
        const start = this.expression();

        if (this.match('COMMA')) {
            this.skipNewlines();
            const end = this.expression();
            return { type: 'PatternRange', start, end };
        }

        if (start.type === 'RegexLiteral') {
            return { type: 'RegexPattern', regex: start };
        }

        return { type: 'ExprPattern', expr: start };
    }

    private block(): BlockNode {
        const token = this.consume('LBRACE', 'expected {');
        this.skipTerminators();

        const statements: StmtNode[] = [];

        while (!this.check('RBRACE') && !this.isAtEnd()) {
            statements.push(this.statement());
            this.skipTerminators();
        }

        this.consume('RBRACE', 'expected }');

        return {
            type: 'Block',
            statements,
            line: token.line,
            column: token.column,
        };
    }

    // ========================================================================
    // Statements
    // ========================================================================

    private statement(): StmtNode {
        const token = this.peek();

        switch (token.type) {
            case 'LBRACE':
                return this.block();
            case 'SEMICOLON':
                this.advance();
                return { type: 'Block', statements: [], line: token.line, column: token.column };
            case 'IF':
                return this.ifStatement();
            case 'WHILE':
                return this.whileStatement();
            case 'DO':
                return this.doWhileStatement();
            case 'FOR':
                return this.forStatement();
            default:
                break;
        }

        const stmt = this.simpleStatement();
        if (!this.checkStatementEnd()) {
            throw this.error(`unexpected ${this.describe(this.peek())}`);
        }
        return stmt;
    }

    private simpleStatement(): StmtNode {
        const token = this.peek();

        switch (token.type) {
            case 'BREAK':
            case 'CONTINUE':
                this.advance();
                if (this.loopDepth === 0) {
                    throw new ParseError(`${token.value} outside a loop`, token);
                }
                return token.type === 'BREAK'
                    ? { type: 'BreakStmt', line: token.line, column: token.column }
                    : { type: 'ContinueStmt', line: token.line, column: token.column };

            case 'NEXT':
                this.advance();
                if (this.context === 'begin' || this.context === 'end') {
                    throw new ParseError(`next used in ${this.context === 'begin' ? 'BEGIN' : 'END'} action`, token);
                }
                return { type: 'NextStmt', line: token.line, column: token.column };

            case 'EXIT': {
                this.advance();
                const code = this.checkStatementEnd() ? null : this.expression();
                return { type: 'ExitStmt', code, line: token.line, column: token.column };
            }

            case 'RETURN': {
                this.advance();
                if (this.context !== 'function') {
                    throw new ParseError('return outside a function', token);
                }
                const value = this.checkStatementEnd() ? null : this.expression();
                return { type: 'ReturnStmt', value, line: token.line, column: token.column };
            }

            case 'DELETE':
                return this.deleteStatement();
            case 'PRINT':
                return this.printStatement();
            case 'PRINTF':
                return this.printfStatement();
            default:
                return this.expressionStatement();
        }
    }

    private ifStatement(): IfStmtNode {
        const token = this.advance(); // if
        this.consume('LPAREN', 'expected ( after if');
        const condition = this.withGreater(() => this.expression());
        this.consume('RPAREN', 'expected ) after condition');
        this.skipNewlines();

        const consequent = this.statement();
        let alternate: StmtNode | null = null;

        // else may follow on a later line or after a semicolon
        const saved = this.pos;
        this.skipTerminators();
        if (this.match('ELSE')) {
            this.skipNewlines();
            alternate = this.statement();
        } else {
            this.pos = saved;
        }

        return {
            type: 'IfStmt',
            condition,
            consequent,
            alternate,
            line: token.line,
            column: token.column,
        };
    }

    private whileStatement(): WhileStmtNode {
        const token = this.advance(); // while
        this.consume('LPAREN', 'expected ( after while');
        const condition = this.withGreater(() => this.expression());
        this.consume('RPAREN', 'expected ) after condition');

        this.skipNewlines();

        const body = this.loopBody();

        return {
            type: 'WhileStmt',
            condition,
            body,
            line: token.line,
            column: token.column,
        };
    }

    private doWhileStatement(): DoWhileStmtNode {
        const token = this.advance(); // do
        this.skipNewlines();
        const body = this.loopBody();
        this.skipTerminators();

        this.consume('WHILE', 'expected while after do body');
        this.consume('LPAREN', 'expected ( after while');
        const condition = this.withGreater(() => this.expression());
        this.consume('RPAREN', 'expected ) after condition');

        return {
            type: 'DoWhileStmt',
            body,
            condition,
            line: token.line,
            column: token.column,
        };
    }

    private forStatement(): ForStmtNode | ForInStmtNode {
        const token = this.advance(); // for
        this.consume('LPAREN', 'expected ( after for');

        // for (var in array)
        if (this.check('IDENTIFIER') && this.peekAt(1).type === 'IN' &&
            this.peekAt(2).type === 'IDENTIFIER' && this.peekAt(3).type === 'RPAREN') {
            const variable = this.advance().value;
            this.advance(); // in
            const array = this.advance().value;
            this.advance(); // )
            this.skipNewlines();
            const body = this.loopBody();

            return {
                type: 'ForInStmt',
                variable,
                array,
                body,
                line: token.line,
                column: token.column,
            };
        }

        const clauses = this.withGreater(() => {
            const init = this.check('SEMICOLON') ? null : this.expression();
            this.consume('SEMICOLON', 'expected ; after for initializer');
            this.skipNewlines();

            const condition = this.check('SEMICOLON') ? null : this.expression();
            this.consume('SEMICOLON', 'expected ; after for condition');
            this.skipNewlines();

            const update = this.check('RPAREN') ? null : this.expression();
            return { init, condition, update };
        });
        this.consume('RPAREN', 'expected ) after for clauses');
        this.skipNewlines();

        const body = this.loopBody();

        return {
            type: 'ForStmt',
            ...clauses,
            body,
            line: token.line,
            column: token.column,
        };
    }

    private loopBody(): StmtNode {
        this.loopDepth++;
        try {
            return this.statement();
        } finally {
            this.loopDepth--;
        }
    }

    private deleteStatement(): DeleteStmtNode {
        const token = this.advance(); // delete
        const array = this.consume('IDENTIFIER', 'expected array name after delete').value;

        let index: ExprNode[] | null = null;
        if (this.match('LBRACKET')) {
            index = this.withGreater(() => this.expressionList());
            this.consume('RBRACKET', 'expected ]');
        }

        return {
            type: 'DeleteStmt',
            array,
            index,
            line: token.line,
            column: token.column,
        };
    }

    private printStatement(): PrintStmtNode {
        const token = this.advance(); // print
        const args = this.outputList();
        const output = this.outputRedirect();

        return {
            type: 'PrintStmt',
            args,
            output,
            line: token.line,
            column: token.column,
        };
    }

    private printfStatement(): PrintfStmtNode {
        const token = this.advance(); // printf
        const list = this.outputList();
        if (list.length === 0) {
            throw new ParseError('printf requires a format', token);
        }
        const output = this.outputRedirect();

        const [format, ...args] = list;
        return {
            type: 'PrintfStmt',
            format,
            args,
            output,
            line: token.line,
            column: token.column,
        };
    }

    /**
     * Expression list of print/printf, optionally parenthesized
     */
    private outputList(): ExprNode[] {
        if (this.checkOutputEnd()) {
            return [];
        }

        const savedNoGreater = this.noGreater;
        const savedGroupPos = this.printGroupPos;
        this.noGreater = true;
        this.printGroupPos = this.check('LPAREN') ? this.pos : -1;

        try {
            const list = this.expressionList();
            if (list.length === 1 && list[0].type === 'Grouping') {
                return list[0].expressions;
            }
            return list;
        } finally {
            this.noGreater = savedNoGreater;
            this.printGroupPos = savedGroupPos;
        }
    }

    private outputRedirect(): OutputRedirect | null {
        if (this.check('PIPE')) {
            throw this.error('output pipes are not supported');
        }
        if (this.match('GT')) {
            return { type: 'file', target: this.concatenation() };
        }
        if (this.match('APPEND')) {
            return { type: 'append', target: this.concatenation() };
        }
        return null;
    }

    private expressionStatement(): ExpressionStmtNode {
        const expr = this.expression();
        return {
            type: 'ExpressionStmt',
            expression: expr,
            line: expr.line,
            column: expr.column,
        };
    }

    // ========================================================================
    // Expressions
    // ========================================================================

    private expression(): ExprNode {
        return this.assignment();
    }

    private expressionList(): ExprNode[] {
        const list = [this.expression()];
        while (this.match('COMMA')) {
            this.skipNewlines();
            list.push(this.expression());
        }
        return list;
    }

    private assignment(): ExprNode {
        const expr = this.ternary();

        const operator = this.matchOperator(ASSIGNMENT_OPERATORS);
        if (operator === null) {
            return expr;
        }

        if (!isLValue(expr)) {
            throw new ParseError('invalid assignment target', expr);
        }
        this.skipNewlines();
        const value = this.assignment();

        return {
            type: 'Assignment',
            operator,
            target: expr,
            value,
            line: expr.line,
            column: expr.column,
        };
    }

    private ternary(): ExprNode {
        const condition = this.or();

        if (!this.match('QUESTION')) {
            return condition;
        }

        const consequent = this.ternary();
        this.consume('COLON', 'expected : in conditional expression');
        const alternate = this.ternary();

        return {
            type: 'Ternary',
            condition,
            consequent,
            alternate,
            line: condition.line,
            column: condition.column,
        };
    }

    private or(): ExprNode {
        let left = this.and();

        while (this.match('OR')) {
            this.skipNewlines();
            const right = this.and();
            left = { type: 'Binary', operator: '||', left, right, line: left.line, column: left.column };
        }

        return left;
    }

    private and(): ExprNode {
        let left = this.inExpr();

        while (this.match('AND')) {
            this.skipNewlines();
            const right = this.inExpr();
            left = { type: 'Binary', operator: '&&', left, right, line: left.line, column: left.column };
        }

        return left;
    }

    private inExpr(): ExprNode {
        let left = this.matchExpr();

        while (this.match('IN')) {
            const array = this.consume('IDENTIFIER', 'expected array name after in').value;
            const index = left.type === 'Grouping' ? left.expressions : [left];
            left = { type: 'InExpr', index, array, line: left.line, column: left.column };
        }

        return left;
    }

    private matchExpr(): ExprNode {
        let left = this.comparison();

        for (;;) {
            const operator = this.matchOperator(MATCH_OPERATORS);
            if (operator === null) break;
            const right = this.comparison();
            left = { type: 'Binary', operator, left, right, line: left.line, column: left.column };
        }

        return left;
    }

    // Non-associative: a < b < c is a syntax error
    private comparison(): ExprNode {
        const left = this.concatenation();

        if (this.noGreater && this.check('GT')) {
            return left;
        }

        const operator = this.matchOperator(COMPARISON_OPERATORS);
        if (operator === null) {
            return left;
        }

        const right = this.concatenation();
        return { type: 'Binary', operator, left, right, line: left.line, column: left.column };
    }

    private concatenation(): ExprNode {
        let left = this.additive();

        while (CONCAT_STARTERS.has(this.peek().type)) {
            const right = this.additive();
            left = { type: 'Binary', operator: 'concat', left, right, line: left.line, column: left.column };
        }

        return left;
    }

    private additive(): ExprNode {
        let left = this.multiplicative();

        for (;;) {
            const operator = this.matchOperator(ADDITIVE_OPERATORS);
            if (operator === null) break;
            const right = this.multiplicative();
            left = { type: 'Binary', operator, left, right, line: left.line, column: left.column };
        }

        return left;
    }

    private multiplicative(): ExprNode {
        let left = this.unary();

        for (;;) {
            const operator = this.matchOperator(MULTIPLICATIVE_OPERATORS);
            if (operator === null) break;
            const right = this.unary();
            left = { type: 'Binary', operator, left, right, line: left.line, column: left.column };
        }

        return left;
    }

    private unary(): ExprNode {
        const token = this.peek();

        if (this.match('NOT', 'MINUS', 'PLUS')) {
            const operand = this.unary();
            const operator = token.type === 'NOT' ? '!' : token.type === 'MINUS' ? '-' : '+';
            return { type: 'Unary', operator, operand, line: token.line, column: token.column };
        }

        return this.power();
    }

    // Right associative; the exponent may carry its own sign
    private power(): ExprNode {
        const left = this.incrementExpr();

        if (this.match('CARET')) {
            const right = this.unary();
            return { type: 'Binary', operator: '^', left, right, line: left.line, column: left.column };
        }

        return left;
    }

    private incrementExpr(): ExprNode {
        const token = this.peek();

        if (this.match('INCREMENT', 'DECREMENT')) {
            const operand = this.lvalue(this.primary());
            return {
                type: 'Increment',
                operator: token.type === 'INCREMENT' ? '++' : '--',
                operand,
                prefix: true,
                line: token.line,
                column: token.column,
            };
        }

        const expr = this.primary();

        if (isLValue(expr) && (this.check('INCREMENT') || this.check('DECREMENT'))) {
            const op = this.advance();
            return {
                type: 'Increment',
                operator: op.type === 'INCREMENT' ? '++' : '--',
                operand: expr,
                prefix: false,
                line: expr.line,
                column: expr.column,
            };
        }

        return expr;
    }

    private primary(): ExprNode {
        const token = this.peek();

        switch (token.type) {
            case 'NUMBER':
                this.advance();
                return { type: 'NumberLiteral', value: Number(token.value), line: token.line, column: token.column };

            case 'STRING':
                this.advance();
                return { type: 'StringLiteral', value: token.value, line: token.line, column: token.column };

            case 'REGEX':
                this.advance();
                return { type: 'RegexLiteral', pattern: token.value, line: token.line, column: token.column };

            case 'DOLLAR':
                this.advance();
                return this.fieldAccess(token);

            case 'GETLINE':
                this.advance();
                return this.getline(token);

            case 'BUILTIN':
                this.advance();
                return this.builtinCall(token);

            case 'IDENTIFIER':
                this.advance();
                return this.identifier(token);

            case 'LPAREN':
                return this.grouping();

            case 'EOF':
                throw this.error('unexpected end of program');

            default:
                throw this.error(`unexpected ${this.describe(token)}`);
        }
    }

    /**
     * $ applies to the following primary, or to a prefixed one: $++i, $-1
     */
    private fieldAccess(token: Token): FieldAccessNode {
        return {
            type: 'FieldAccess',
            index: this.fieldIndex(),
            line: token.line,
            column: token.column,
        };
    }

    private fieldIndex(): ExprNode {
        const token = this.peek();

        if (this.match('INCREMENT', 'DECREMENT')) {
            return {
                type: 'Increment',
                operator: token.type === 'INCREMENT' ? '++' : '--',
                operand: this.lvalue(this.primary()),
                prefix: true,
                line: token.line,
                column: token.column,
            };
        }

        if (this.match('MINUS', 'PLUS', 'NOT')) {
            const operator = token.type === 'NOT' ? '!' : token.type === 'MINUS' ? '-' : '+';
            return { type: 'Unary', operator, operand: this.fieldIndex(), line: token.line, column: token.column };
        }

        return this.primary();
    }

    private identifier(token: Token): ExprNode {
        const next = this.peek();

        // A user call needs "(" directly after the name
        if (next.type === 'LPAREN' && next.offset === token.offset + token.value.length) {
            this.advance();
            return this.callArguments(token);
        }

        if (this.match('LBRACKET')) {
            const indices = this.withGreater(() => this.expressionList());
            this.consume('RBRACKET', 'expected ]');
            return { type: 'ArrayAccess', array: token.value, indices, line: token.line, column: token.column };
        }

        return { type: 'Identifier', name: token.value, line: token.line, column: token.column };
    }

    private builtinCall(token: Token): FunctionCallNode {
        if (this.match('LPAREN')) {
            return this.callArguments(token);
        }

        // length without parentheses is length($0)
        if (token.value === 'length') {
            return { type: 'FunctionCall', name: token.value, args: [], line: token.line, column: token.column };
        }

        throw this.error(`expected ( after ${token.value}`);
    }

    private callArguments(token: Token): FunctionCallNode {
        const args = this.withGreater(() => {
            this.skipNewlines();
            return this.check('RPAREN') ? [] : this.expressionList();
        });
        this.skipNewlines();
        this.consume('RPAREN', `expected ) after arguments to ${token.value}`);

        return { type: 'FunctionCall', name: token.value, args, line: token.line, column: token.column };
    }

    /**
     * Parenthesized expression, or an expression list for `(a, b) in arr`
     * and for a parenthesized print list
     */
    private grouping(): ExprNode {
        const openPos = this.pos;
        const open = this.advance(); // (

        const list = this.withGreater(() => {
            this.skipNewlines();
            const exprs = this.expressionList();
            this.skipNewlines();
            return exprs;
        });
        this.consume('RPAREN', 'expected )');

        if (list.length === 1) {
            return list[0];
        }

        const printList = openPos === this.printGroupPos && this.checkOutputEnd();
        if (!this.check('IN') && !printList) {
            throw new ParseError('expression list must be followed by in', open);
        }

        return { type: 'Grouping', expressions: list, line: open.line, column: open.column };
    }

    private getline(token: Token): GetlineNode {
        let target: LValueNode | null = null;
        let file: ExprNode | null = null;

        if (this.check('IDENTIFIER') || this.check('DOLLAR')) {
            target = this.lvalue(this.primary());
        }

        if (this.match('LT')) {
            file = this.primary();
        }

        return {
            type: 'Getline',
            target,
            file,
            line: token.line,
            column: token.column,
        };
    }

    private lvalue(expr: ExprNode): LValueNode {
        if (!isLValue(expr)) {
            throw new ParseError('expected a variable, field or array element', expr);
        }
        return expr;
    }

    // ========================================================================
    // Helpers
    // ========================================================================

    private inContext<T>(kind: RuleKind, fn: () => T): T {
        const saved = this.context;
        this.context = kind;
        try {
            return fn();
        } finally {
            this.context = saved;
        }
    }

    private withGreater<T>(fn: () => T): T {
        const saved = this.noGreater;
        this.noGreater = false;
        try {
            return fn();
        } finally {
            this.noGreater = saved;
        }
    }

    private matchOperator<T>(table: Partial<Record<TokenType, T>>): T | null {
        const operator = table[this.peek().type];
        if (operator === undefined) {
            return null;
        }
        this.advance();
        return operator;
    }

    private match(...types: TokenType[]): boolean {
        for (const type of types) {
            if (this.check(type)) {
                this.advance();
                return true;
            }
        }
        return false;
    }

    private check(type: TokenType): boolean {
        return this.peek().type === type;
    }

    private checkTerminator(): boolean {
        return this.check('NEWLINE') || this.check('SEMICOLON') ||
            this.check('RBRACE') || this.isAtEnd();
    }

    private checkStatementEnd(): boolean {
        return this.checkTerminator() || this.check('ELSE');
    }

    private checkOutputEnd(): boolean {
        return this.checkStatementEnd() || this.check('GT') ||
            this.check('APPEND') || this.check('PIPE');
    }

    private advance(): Token {
        const token = this.peek();
        if (!this.isAtEnd()) this.pos++;
        return token;
    }

    private consume(type: TokenType, message: string): Token {
        if (this.check(type)) return this.advance();
        const token = this.peek();
        throw new ParseError(`${message}, found ${this.describe(token)}`, token);
    }

    private peek(): Token {
        return this.peekAt(0);
    }

    private peekAt(distance: number): Token {
        const index = Math.min(this.pos + distance, this.tokens.length - 1);
        return this.tokens[index];
    }

    private isAtEnd(): boolean {
        return this.peek().type === 'EOF';
    }

    private skipNewlines(): void {
        while (this.match('NEWLINE')) {
            // Skip
        }
    }

    private skipTerminators(): void {
        while (this.match('NEWLINE', 'SEMICOLON')) {
            // Skip
        }
    }

    private describe(token: Token): string {
        switch (token.type) {
            case 'EOF':
                return 'end of program';
            case 'NEWLINE':
                return 'newline';
            case 'STRING':
                return `string "${token.value}"`;
            default:
                return `'${token.value}'`;
        }
    }

    private error(message: string): ParseError {
        const token = this.peek();
        return new ParseError(message, token);
    }
}

export function parse(tokens: Iterable<Token>): ProgramNode {
    return new Parser(tokens).parse();
}

export function parseProgram(source: string): ProgramNode {
    return parse(tokenize(source));
}
