/**
 * awk - pattern scanning and text processing language
 *
 * Usage:
 *   awk [options] 'program' [file | var=value | -]...
 *   awk [options] -f progfile [-f progfile]... [file | var=value | -]...
 *   <input> | awk [options] 'program'
 *
 * Options:
 *   -F fs           Field separator ("t" means tab)
 *   -v var=value    Set variable before execution (repeatable)
 *   -f progfile     Read program from file (repeatable)
 *
 * Operands:
 *   file            Read records from file
 *   var=value       Assign when the reader reaches this operand
 *   -               Read records from standard input
 *
 * Foreign Functions:
 *   Functions from the configured registry (the ai_* family) are called
 *   like built-ins. A failed call evaluates to "" and processing goes on.
 *
 * Examples:
 *   awk '{print $1}'                         Print first field
 *   awk -F: '{print $1}' passwd              Print usernames
 *   awk '{sum+=$1} END{print sum}'           Sum first column
 *   awk '{print ai_sentiment($0)}' reviews   Label each review
 */

import { readFile } from 'node:fs/promises';
import { AwkError, FATAL_EXIT_STATUS, RuntimeIOError } from '../errors/awk-error.js';
import { runAwk } from '../awk/index.js';
import type { ForeignRegistry } from '../awk/foreign.js';
import { fileSource, streamSource, type InputOperand } from '../awk/input.js';
import { processEscapes } from '../awk/lexer.js';
import type { CommandHandler } from './shared.js';
import { parseArgs, streamWriter } from './shared.js';

const argSpecs = {
    fieldSep: { short: 'F', value: true, required: true, desc: 'Field separator' },
    variable: { short: 'v', value: true, required: true, multiple: true, desc: 'Set variable var=value' },
    file: { short: 'f', value: true, required: true, multiple: true, desc: 'Read program from file' },
};

const USAGE = 'Usage: awk [-F fs] [-v var=value] [-f progfile | \'program\'] [file ...]\n';

const ASSIGNMENT = /^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/s;

export type AwkCommandOptions = {
    /** Functions callable by name from programs */
    foreign?: ForeignRegistry;
    /** Contents of ENVIRON; defaults to process.env */
    environ?: Record<string, string | undefined>;
};

export function createAwkCommand(options: AwkCommandOptions = {}): CommandHandler {
    return async (args, io) => {
        const parsed = parseArgs(args, argSpecs, { stopAtPositional: true });
        const stderr = streamWriter(io.stderr);

        const usageError = async (message: string): Promise<number> => {
            await stderr(`awk: ${message}\n`);
            await stderr(USAGE);
            return FATAL_EXIT_STATUS;
        };

        if (parsed.errors.length > 0) {
            return usageError(parsed.errors[0]);
        }
        if (parsed.unknown.length > 0) {
            return usageError(`unknown option ${parsed.unknown[0]}`);
        }

        // -v assignments
        const variables: Array<{ name: string; value: string }> = [];
        for (const assignment of parsed.lists.variable) {
            const match = ASSIGNMENT.exec(assignment);
            if (!match) {
                return usageError(`invalid -v argument "${assignment}"`);
            }
            variables.push({ name: match[1], value: processEscapes(match[2]) });
        }

        // Program source: -f files, or the first operand
        const operands = [...parsed.positional];
        let program: string[];

        if (parsed.lists.file.length > 0) {
            try {
                program = await readProgramFiles(parsed.lists.file);
            } catch (err) {
                if (err instanceof AwkError) {
                    await stderr(`awk: ${err.describe()}\n`);
                    return FATAL_EXIT_STATUS;
                }
                throw err;
            }
        } else {
            const inline = operands.shift();
            if (inline === undefined) {
                return usageError('no program given');
            }
            program = [inline];
        }

        const fieldSep = parsed.flags.fieldSep;

        return runAwk({
            program,
            inputs: buildInputs(operands, io.stdin),
            fieldSeparator: typeof fieldSep === 'string' ? fieldSeparatorArg(fieldSep) : undefined,
            variables,
            stdout: streamWriter(io.stdout),
            stderr,
            foreign: options.foreign,
            signal: io.signal,
            environ: options.environ ?? process.env,
            stdin: io.stdin,
        });
    };
}

/**
 * awk with no foreign functions
 */
export const awk: CommandHandler = createAwkCommand();

function fieldSeparatorArg(value: string): string {
    return value === 't' ? '\t' : processEscapes(value);
}

/**
 * Operands in command-line order; standard input when no file is named
 */
function buildInputs(operands: string[], stdin: AsyncIterable<string | Uint8Array>): InputOperand[] {
    const inputs: InputOperand[] = [];
    let sources = 0;

    for (const operand of operands) {
        const match = ASSIGNMENT.exec(operand);
        if (match) {
            inputs.push({ kind: 'assignment', name: match[1], value: processEscapes(match[2]) });
        } else if (operand === '-' || operand === '/dev/stdin') {
            inputs.push(streamSource(stdin, operand));
            sources++;
        } else {
            inputs.push(fileSource(operand));
            sources++;
        }
    }

    if (sources === 0) {
        inputs.push(streamSource(stdin));
    }
    return inputs;
}

async function readProgramFiles(paths: string[]): Promise<string[]> {
    const fragments: string[] = [];
    for (const path of paths) {
        try {
            fragments.push(await readFile(path, 'utf8'));
        } catch (err) {
            const cause = err instanceof Error ? err : new Error(String(err));
            throw new RuntimeIOError(`cannot open program file "${path}": ${cause.message}`, path, cause);
        }
    }
    return fragments;
}
