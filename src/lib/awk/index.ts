/**
 * AWK Engine
 *
 * Parses a program, runs it over the given input operands and reports the
 * exit status. Fatal errors are written to stderr as `awk: <message>` and
 * produce FATAL_EXIT_STATUS. Anything that is not an AwkError propagates.
 */

import { AwkError, FATAL_EXIT_STATUS } from '../errors/awk-error.js';
import { logger } from '../logger.js';
import type { ForeignRegistry } from './foreign.js';
import type { InputChunk, InputOperand } from './input.js';
import { Interpreter } from './interpreter.js';
import type { OutputWriter } from './output.js';
import { parseProgram } from './parser.js';

export type RunAwkOptions = {
    /** Program text, or fragments joined with a newline */
    program: string | string[];
    inputs?: InputOperand[];
    /** Initial FS, applied before BEGIN */
    fieldSeparator?: string;
    /** Globals assigned before BEGIN; values behave like input text */
    variables?: Array<{ name: string; value: string }>;
    stdout: OutputWriter;
    stderr: OutputWriter;
    foreign?: ForeignRegistry;
    signal?: AbortSignal;
    environ?: Record<string, string | undefined>;
    stdin?: AsyncIterable<InputChunk>;
};

export async function runAwk(options: RunAwkOptions): Promise<number> {
    const source = Array.isArray(options.program) ? options.program.join('\n') : options.program;
    const startTime = process.hrtime.bigint();

    try {
        const program = parseProgram(source);
        const interpreter = new Interpreter(program, {
            stdout: options.stdout,
            stderr: options.stderr,
            foreign: options.foreign,
            signal: options.signal,
            environ: options.environ,
            stdin: options.stdin,
        });

        if (options.fieldSeparator !== undefined) {
            interpreter.setFieldSeparator(options.fieldSeparator);
        }
        for (const { name, value } of options.variables ?? []) {
            interpreter.setVariable(name, value);
        }

        const status = await interpreter.run(options.inputs ?? []);
        logger.time('AWK run', startTime, { status });
        return status;
    } catch (err) {
        if (err instanceof AwkError) {
            logger.debug('AWK run failed', err.toJSON());
            await options.stderr(`awk: ${err.describe()}\n`);
            return FATAL_EXIT_STATUS;
        }
        throw err;
    }
}

export { tokenize, Lexer, processEscapes } from './lexer.js';
export { parse, parseProgram, Parser } from './parser.js';
export { Interpreter, ABORTED_EXIT_STATUS, type InterpreterOptions } from './interpreter.js';
export {
    createForeignRegistry, combineRegistries, EMPTY_REGISTRY, FOREIGN_FALLBACK,
    type ForeignArg, type ForeignFunction, type ForeignRegistry, type ForeignRegistryOptions,
} from './foreign.js';
export {
    stringSource, streamSource, fileSource,
    type InputChunk, type InputOperand, type InputSource, type InputAssignment,
} from './input.js';
export type { OutputWriter } from './output.js';
export {
    UNINIT, num, str, fromInput, toNumber, toStr, toBool, compareValues, type AwkValue,
} from './value.js';
export type { ProgramNode, Token } from './types.js';
