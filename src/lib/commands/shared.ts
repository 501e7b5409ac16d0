/**
 * Shared types and helpers for commands
 */

import type { Readable, Writable } from 'node:stream';
import type { OutputWriter } from '../awk/output.js';

/**
 * Standard I/O for a command invocation
 */
export interface CommandIO {
    /** Standard input stream */
    stdin: Readable;

    /** Standard output stream */
    stdout: Writable;

    /** Standard error stream */
    stderr: Writable;

    /** Abort signal for cancellation */
    signal?: AbortSignal;
}

/**
 * Argument specification for parseArgs()
 */
export type ArgSpec = {
    /** Short flag (e.g., 'l' for -l) */
    short?: string;
    /** Long flag (e.g., 'long' for --long) */
    long?: string;
    /** Flag takes a value (e.g., -n 10 or --count=10) */
    value?: boolean;
    /** Value is required; the next argument is taken even when it starts with '-' */
    required?: boolean;
    /** Flag may repeat; every value is collected in `lists` */
    multiple?: boolean;
    /** Default value if flag not provided */
    default?: string | boolean;
    /** Description for help text */
    desc?: string;
};

export type ParseOptions = {
    /** Treat everything from the first positional argument on as positional */
    stopAtPositional?: boolean;
};

/**
 * Result from parseArgs()
 */
export type ParsedArgs = {
    /** Flag values (boolean for flags, string for value flags) */
    flags: Record<string, string | boolean>;
    /** Values of repeatable flags, in order */
    lists: Record<string, string[]>;
    /** Positional arguments (non-flag tokens) */
    positional: string[];
    /** Unknown flags encountered */
    unknown: string[];
    /** Parse errors */
    errors: string[];
};

/**
 * Parse command-line arguments
 *
 * Features:
 * - Combined short flags: -la → -l -a
 * - Short flags with values: -n10, -n 10
 * - Long flags with values: --count=10, --count 10
 * - Repeatable value flags: -v a=1 -v b=2
 * - Positional args after flags or after --
 * - Unknown flag detection
 *
 * @example
 * const result = parseArgs(['-la', '-n', '10', 'file.txt'], {
 *     l: { short: 'l', desc: 'Long format' },
 *     a: { short: 'a', desc: 'Show all' },
 *     n: { short: 'n', value: true, desc: 'Line count' },
 * });
 * // result.flags = { l: true, a: true, n: '10' }
 * // result.positional = ['file.txt']
 */
export function parseArgs(
    args: string[],
    specs: Record<string, ArgSpec> = {},
    options: ParseOptions = {}
): ParsedArgs {
    const result: ParsedArgs = {
        flags: {},
        lists: {},
        positional: [],
        unknown: [],
        errors: [],
    };

    // Build lookup maps
    const shortMap = new Map<string, string>(); // -l → spec key
    const longMap = new Map<string, string>();  // --long → spec key

    for (const [key, spec] of Object.entries(specs)) {
        if (spec.short) shortMap.set(spec.short, key);
        if (spec.long) longMap.set(spec.long, key);
        if (spec.multiple) {
            result.lists[key] = [];
        }
        // Apply defaults
        if (spec.default !== undefined) {
            result.flags[key] = spec.default;
        }
    }

    const assign = (key: string, value: string) => {
        result.flags[key] = value;
        if (specs[key].multiple) {
            result.lists[key].push(value);
        }
    };

    // Next argument as a flag value, or undefined when there is none to take
    const takeNext = (spec: ArgSpec, i: number): string | undefined => {
        if (i + 1 >= args.length) return undefined;
        const next = args[i + 1];
        return spec.required || !next.startsWith('-') ? next : undefined;
    };

    let i = 0;
    let positionalOnly = false;

    while (i < args.length) {
        const arg = args[i];

        // After --, everything is positional
        if (!positionalOnly && arg === '--') {
            positionalOnly = true;
            i++;
            continue;
        }

        if (positionalOnly || !arg.startsWith('-') || arg === '-') {
            result.positional.push(arg);
            if (options.stopAtPositional) {
                positionalOnly = true;
            }
            i++;
            continue;
        }

        // Long flag: --flag or --flag=value
        if (arg.startsWith('--')) {
            const eqIndex = arg.indexOf('=');
            const flagName = eqIndex !== -1 ? arg.slice(2, eqIndex) : arg.slice(2);
            const flagValue = eqIndex !== -1 ? arg.slice(eqIndex + 1) : undefined;

            const specKey = longMap.get(flagName);
            if (!specKey) {
                result.unknown.push(arg);
                i++;
                continue;
            }

            const spec = specs[specKey];
            if (spec.value) {
                const next = flagValue === undefined ? takeNext(spec, i) : undefined;
                if (flagValue !== undefined) {
                    assign(specKey, flagValue);
                } else if (next !== undefined) {
                    assign(specKey, next);
                    i++;
                } else if (spec.required) {
                    result.errors.push(`--${flagName} requires a value`);
                } else {
                    result.flags[specKey] = true;
                }
            } else {
                result.flags[specKey] = true;
            }
            i++;
            continue;
        }

        // Short flags: -l, -la, -n10, -n 10
        const shortFlags = arg.slice(1);
        let j = 0;

        while (j < shortFlags.length) {
            const char = shortFlags[j];
            const specKey = shortMap.get(char);

            if (!specKey) {
                result.unknown.push(`-${char}`);
                j++;
                continue;
            }

            const spec = specs[specKey];
            if (!spec.value) {
                result.flags[specKey] = true;
                j++;
                continue;
            }

            // Rest of this arg is the value, or next arg
            const rest = shortFlags.slice(j + 1);
            if (rest) {
                assign(specKey, rest);
                break;
            }

            const next = takeNext(spec, i);
            if (next !== undefined) {
                assign(specKey, next);
                i++;
            } else if (spec.required) {
                result.errors.push(`-${char} requires a value`);
            } else {
                result.flags[specKey] = true;
            }
            j++;
        }
        i++;
    }

    return result;
}

/**
 * Command handler signature
 *
 * Commands receive their arguments and standard I/O streams and return an
 * exit code (0 = success, non-zero = error).
 */
export type CommandHandler = (
    args: string[],
    io: CommandIO
) => Promise<number>;

/**
 * Output writer that resolves once the stream has accepted the text
 */
export function streamWriter(stream: Writable): OutputWriter {
    return (text) => new Promise<void>((resolve, reject) => {
        stream.write(text, (err) => (err ? reject(err) : resolve()));
    });
}
