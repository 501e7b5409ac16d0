/**
 * AWK Error Types
 *
 * Categorized error types for the interpreter. Everything except
 * ForeignCallError is fatal and aborts the run.
 */

/**
 * Exit status reported when a run aborts on a fatal error
 */
export const FATAL_EXIT_STATUS = 2;

export type SourcePosition = {
    line: number;
    column: number;
};

/**
 * Base class for all interpreter errors
 */
export abstract class AwkError extends Error {
    public readonly code: string;
    public readonly position?: SourcePosition;
    public ruleIndex?: number;

    constructor(message: string, code: string, position?: SourcePosition) {
        super(position ? `${message} at line ${position.line}, column ${position.column}` : message);
        this.name = this.constructor.name;
        this.code = code;
        this.position = position ? { line: position.line, column: position.column } : undefined;
        Error.captureStackTrace?.(this, this.constructor);
    }

    /**
     * Whether processing may continue after this error
     */
    get fatal(): boolean {
        return true;
    }

    /**
     * Message with the rule index appended when no source position is known
     */
    describe(): string {
        if (!this.position && this.ruleIndex !== undefined) {
            return `${this.message} (rule ${this.ruleIndex + 1})`;
        }
        return this.message;
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            ...(this.position && { position: this.position }),
            ...(this.ruleIndex !== undefined && { ruleIndex: this.ruleIndex }),
        };
    }
}

/**
 * LexError - malformed token (unterminated string or regex, stray character)
 */
export class LexError extends AwkError {
    constructor(message: string, position: SourcePosition) {
        super(message, 'LEX_ERROR', position);
    }
}

/**
 * ParseError - malformed grammar; reported before any record is read
 */
export class ParseError extends AwkError {
    constructor(message: string, position?: SourcePosition) {
        super(message, 'PARSE_ERROR', position);
    }
}

/**
 * NameError - call to an unknown function, or a variable used as both
 * scalar and array
 */
export class NameError extends AwkError {
    public readonly identifier: string;

    constructor(message: string, identifier: string, position?: SourcePosition) {
        super(message, 'NAME_ERROR', position);
        this.identifier = identifier;
    }
}

/**
 * AwkTypeError - invalid coercion, e.g. split() into something that is not an array
 */
export class AwkTypeError extends AwkError {
    constructor(message: string, position?: SourcePosition) {
        super(message, 'TYPE_ERROR', position);
    }
}

/**
 * RuntimeIOError - an input source, output file or program file failed
 */
export class RuntimeIOError extends AwkError {
    public readonly source: string;
    public readonly originalError?: Error;

    constructor(message: string, source: string, originalError?: Error) {
        super(message, 'IO_ERROR');
        this.source = source;
        this.originalError = originalError;
    }
}

/**
 * AwkRuntimeError - any other fatal fault during execution
 */
export class AwkRuntimeError extends AwkError {
    constructor(message: string, position?: SourcePosition) {
        super(message, 'RUNTIME_ERROR', position);
    }
}

/**
 * ForeignCallError - an external function failed or timed out
 *
 * Never aborts the run: the evaluator substitutes the fallback value.
 */
export class ForeignCallError extends AwkError {
    public readonly functionName: string;
    public readonly originalError?: unknown;

    constructor(functionName: string, message: string, originalError?: unknown) {
        super(`${functionName}: ${message}`, 'FOREIGN_CALL_ERROR');
        this.functionName = functionName;
        this.originalError = originalError;
    }

    override get fatal(): boolean {
        return false;
    }
}
