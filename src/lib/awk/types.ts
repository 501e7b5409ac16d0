/**
 * AWK Type Definitions
 *
 * Types for tokens, AST nodes, and control-flow signals.
 * Runtime values live in value.ts, bindings in environment.ts.
 */

import type { AwkValue } from './value.js';

// ============================================================================
// Token Types
// ============================================================================

export type TokenType =
    // Literals
    | 'NUMBER'
    | 'STRING'
    | 'REGEX'
    | 'IDENTIFIER'
    | 'BUILTIN'        // length, substr, ...
    | 'DOLLAR'         // $
    // Keywords
    | 'BEGIN'
    | 'END'
    | 'IF'
    | 'ELSE'
    | 'WHILE'
    | 'FOR'
    | 'DO'
    | 'BREAK'
    | 'CONTINUE'
    | 'NEXT'
    | 'EXIT'
    | 'FUNCTION'
    | 'RETURN'
    | 'DELETE'
    | 'IN'
    | 'GETLINE'
    | 'PRINT'
    | 'PRINTF'
    // Operators
    | 'PLUS'           // +
    | 'MINUS'          // -
    | 'STAR'           // *
    | 'SLASH'          // /
    | 'PERCENT'        // %
    | 'CARET'          // ^
    | 'ASSIGN'         // =
    | 'PLUS_ASSIGN'    // +=
    | 'MINUS_ASSIGN'   // -=
    | 'STAR_ASSIGN'    // *=
    | 'SLASH_ASSIGN'   // /=
    | 'PERCENT_ASSIGN' // %=
    | 'CARET_ASSIGN'   // ^=
    | 'EQ'             // ==
    | 'NE'             // !=
    | 'LT'             // <
    | 'LE'             // <=
    | 'GT'             // >
    | 'GE'             // >=
    | 'MATCH'          // ~
    | 'NOT_MATCH'      // !~
    | 'AND'            // &&
    | 'OR'             // ||
    | 'NOT'            // !
    | 'QUESTION'       // ?
    | 'COLON'          // :
    | 'INCREMENT'      // ++
    | 'DECREMENT'      // --
    | 'APPEND'         // >>
    | 'PIPE'           // |
    // Delimiters
    | 'LPAREN'         // (
    | 'RPAREN'         // )
    | 'LBRACE'         // {
    | 'RBRACE'         // }
    | 'LBRACKET'       // [
    | 'RBRACKET'       // ]
    | 'COMMA'          // ,
    | 'SEMICOLON'      // ;
    | 'NEWLINE'
    // Special
    | 'EOF';

export type Token = {
    type: TokenType;
    value: string;
    line: number;
    column: number;
    /** Offset of the first character in the source */
    offset: number;
};

/**
 * Names recognized as built-in functions by the lexer.
 * The builtin table in builtins.ts is keyed by exactly these names.
 */
export const BUILTIN_FUNCTION_NAMES = [
    'length', 'substr', 'index', 'split', 'sub', 'gsub', 'match',
    'sprintf', 'tolower', 'toupper',
    'sin', 'cos', 'atan2', 'exp', 'log', 'sqrt', 'int', 'rand', 'srand',
    'close', 'fflush', 'asort', 'asorti',
] as const;

export type BuiltinName = typeof BUILTIN_FUNCTION_NAMES[number];

const BUILTIN_SET: ReadonlySet<string> = new Set(BUILTIN_FUNCTION_NAMES);

export function isBuiltinName(name: string): name is BuiltinName {
    return BUILTIN_SET.has(name);
}

/**
 * Variables the interpreter maintains; they cannot be function parameters
 */
export const SPECIAL_VARIABLE_NAMES = [
    'NR', 'NF', 'FNR', 'FS', 'OFS', 'ORS', 'RS', 'FILENAME', 'SUBSEP',
    'RSTART', 'RLENGTH', 'CONVFMT', 'OFMT', 'ENVIRON',
] as const;

export type SpecialVariable = typeof SPECIAL_VARIABLE_NAMES[number];

const SPECIAL_SET: ReadonlySet<string> = new Set(SPECIAL_VARIABLE_NAMES);

export function isSpecialVariable(name: string): name is SpecialVariable {
    return SPECIAL_SET.has(name);
}

// ============================================================================
// AST Node Types
// ============================================================================

// Base AST node
export type ASTNode = {
    line: number;
    column: number;
};

// Program: rules in source order plus function definitions
export type ProgramNode = ASTNode & {
    type: 'Program';
    rules: RuleNode[];
    functions: FunctionDefNode[];
};

export type PatternNode =
    | { type: 'Always' }
    | { type: 'Begin' }
    | { type: 'End' }
    | { type: 'RegexPattern'; regex: RegexLiteralNode }
    | { type: 'ExprPattern'; expr: ExprNode }
    | { type: 'PatternRange'; start: ExprNode; end: ExprNode };

// Rule (pattern-action pair)
export type RuleNode = ASTNode & {
    type: 'Rule';
    /** Position of the rule in the program, 0-based */
    index: number;
    pattern: PatternNode;
    action: BlockNode | null;  // null = print $0
};

// Function definition
export type FunctionDefNode = ASTNode & {
    type: 'FunctionDef';
    name: string;
    params: string[];
    body: BlockNode;
};

// Block { statements }
export type BlockNode = ASTNode & {
    type: 'Block';
    statements: StmtNode[];
};

// Statements
export type IfStmtNode = ASTNode & {
    type: 'IfStmt';
    condition: ExprNode;
    consequent: StmtNode;
    alternate: StmtNode | null;
};

export type WhileStmtNode = ASTNode & {
    type: 'WhileStmt';
    condition: ExprNode;
    body: StmtNode;
};

export type DoWhileStmtNode = ASTNode & {
    type: 'DoWhileStmt';
    body: StmtNode;
    condition: ExprNode;
};

export type ForStmtNode = ASTNode & {
    type: 'ForStmt';
    init: ExprNode | null;
    condition: ExprNode | null;
    update: ExprNode | null;
    body: StmtNode;
};

export type ForInStmtNode = ASTNode & {
    type: 'ForInStmt';
    variable: string;
    array: string;
    body: StmtNode;
};

export type BreakStmtNode = ASTNode & { type: 'BreakStmt' };
export type ContinueStmtNode = ASTNode & { type: 'ContinueStmt' };
export type NextStmtNode = ASTNode & { type: 'NextStmt' };

export type ExitStmtNode = ASTNode & {
    type: 'ExitStmt';
    code: ExprNode | null;
};

export type ReturnStmtNode = ASTNode & {
    type: 'ReturnStmt';
    value: ExprNode | null;
};

export type DeleteStmtNode = ASTNode & {
    type: 'DeleteStmt';
    array: string;
    index: ExprNode[] | null;  // null = delete entire array
};

export type OutputRedirect = {
    type: 'file' | 'append';
    target: ExprNode;
};

export type PrintStmtNode = ASTNode & {
    type: 'PrintStmt';
    args: ExprNode[];
    output: OutputRedirect | null;
};

export type PrintfStmtNode = ASTNode & {
    type: 'PrintfStmt';
    format: ExprNode;
    args: ExprNode[];
    output: OutputRedirect | null;
};

export type ExpressionStmtNode = ASTNode & {
    type: 'ExpressionStmt';
    expression: ExprNode;
};

export type StmtNode =
    | BlockNode
    | IfStmtNode
    | WhileStmtNode
    | DoWhileStmtNode
    | ForStmtNode
    | ForInStmtNode
    | BreakStmtNode
    | ContinueStmtNode
    | NextStmtNode
    | ExitStmtNode
    | ReturnStmtNode
    | DeleteStmtNode
    | PrintStmtNode
    | PrintfStmtNode
    | ExpressionStmtNode;

// Expressions
export type BinaryOperator =
    | '+' | '-' | '*' | '/' | '%' | '^'
    | '<' | '<=' | '>' | '>=' | '==' | '!='
    | '~' | '!~' | '&&' | '||'
    | 'concat';

export type BinaryNode = ASTNode & {
    type: 'Binary';
    operator: BinaryOperator;
    left: ExprNode;
    right: ExprNode;
};

export type UnaryNode = ASTNode & {
    type: 'Unary';
    operator: '!' | '-' | '+';
    operand: ExprNode;
};

export type TernaryNode = ASTNode & {
    type: 'Ternary';
    condition: ExprNode;
    consequent: ExprNode;
    alternate: ExprNode;
};

export type AssignmentOperator = '=' | '+=' | '-=' | '*=' | '/=' | '%=' | '^=';

export type AssignmentNode = ASTNode & {
    type: 'Assignment';
    operator: AssignmentOperator;
    target: LValueNode;
    value: ExprNode;
};

export type IncrementNode = ASTNode & {
    type: 'Increment';
    operator: '++' | '--';
    operand: LValueNode;
    prefix: boolean;
};

export type FieldAccessNode = ASTNode & {
    type: 'FieldAccess';
    index: ExprNode;
};

export type ArrayAccessNode = ASTNode & {
    type: 'ArrayAccess';
    array: string;
    indices: ExprNode[];
};

export type FunctionCallNode = ASTNode & {
    type: 'FunctionCall';
    name: string;
    args: ExprNode[];
};

export type GetlineNode = ASTNode & {
    type: 'Getline';
    target: LValueNode | null;
    file: ExprNode | null;
};

export type GroupingNode = ASTNode & {
    type: 'Grouping';
    expressions: ExprNode[];
};

export type IdentifierNode = ASTNode & {
    type: 'Identifier';
    name: string;
};

export type NumberLiteralNode = ASTNode & {
    type: 'NumberLiteral';
    value: number;
};

export type StringLiteralNode = ASTNode & {
    type: 'StringLiteral';
    value: string;
};

export type RegexLiteralNode = ASTNode & {
    type: 'RegexLiteral';
    pattern: string;
};

export type InExprNode = ASTNode & {
    type: 'InExpr';
    index: ExprNode[];
    array: string;
};

// L-values (things that can be assigned to)
export type LValueNode = IdentifierNode | FieldAccessNode | ArrayAccessNode;

export type ExprNode =
    | BinaryNode
    | UnaryNode
    | TernaryNode
    | AssignmentNode
    | IncrementNode
    | FieldAccessNode
    | ArrayAccessNode
    | FunctionCallNode
    | GetlineNode
    | GroupingNode
    | IdentifierNode
    | NumberLiteralNode
    | StringLiteralNode
    | RegexLiteralNode
    | InExprNode;

export function isLValue(expr: ExprNode): expr is LValueNode {
    return expr.type === 'Identifier' ||
        expr.type === 'FieldAccess' ||
        expr.type === 'ArrayAccess';
}

// ============================================================================
// Control flow signals
// ============================================================================

export class BreakException extends Error {
    constructor() { super('break'); this.name = 'BreakException'; }
}

export class ContinueException extends Error {
    constructor() { super('continue'); this.name = 'ContinueException'; }
}

export class NextException extends Error {
    constructor() { super('next'); this.name = 'NextException'; }
}

export class ExitException extends Error {
    code: number;
    constructor(code: number = 0) {
        super('exit');
        this.name = 'ExitException';
        this.code = code;
    }
}

export class ReturnException extends Error {
    value: AwkValue;
    constructor(value: AwkValue) {
        super('return');
        this.name = 'ReturnException';
        this.value = value;
    }
}
