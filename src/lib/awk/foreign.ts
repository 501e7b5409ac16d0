/**
 * Foreign Functions
 *
 * Functions supplied from outside the program (the AI functions, or
 * anything a host registers). The evaluator calls them like built-ins;
 * a failing call never aborts the run and yields FOREIGN_FALLBACK.
 */

import { AwkTypeError, ForeignCallError } from '../errors/awk-error.js';
import { logger } from '../logger.js';
import { str, toStr, type AwkValue } from './value.js';

export type ForeignArg = string | number;

export interface ForeignFunction {
    name: string;
    minArgs: number;
    maxArgs: number;
    invoke(args: ForeignArg[], signal?: AbortSignal): Promise<string>;
}

export interface ForeignRegistry {
    resolve(name: string): ForeignFunction | undefined;
    names(): string[];
}

/**
 * Value a failed foreign call evaluates to
 */
export const FOREIGN_FALLBACK = '';

export type ForeignRegistryOptions = {
    /** Upper bound for one invocation; unbounded when omitted */
    timeoutMs?: number;
};

export const EMPTY_REGISTRY: ForeignRegistry = {
    resolve: () => undefined,
    names: () => [],
};

/**
 * Build a registry whose functions are aborted and fail with
 * ForeignCallError once they exceed the timeout
 */
export function createForeignRegistry(
    functions: ForeignFunction[],
    options: ForeignRegistryOptions = {}
): ForeignRegistry {
    const table = new Map<string, ForeignFunction>();
    for (const fn of functions) {
        table.set(fn.name, options.timeoutMs === undefined ? fn : withTimeout(fn, options.timeoutMs));
    }

    return {
        resolve: (name) => table.get(name),
        names: () => Array.from(table.keys()),
    };
}

/**
 * Registry that looks names up in each registry in turn
 */
export function combineRegistries(...registries: ForeignRegistry[]): ForeignRegistry {
    return {
        resolve(name) {
            for (const registry of registries) {
                const fn = registry.resolve(name);
                if (fn) return fn;
            }
            return undefined;
        },
        names: () => Array.from(new Set(registries.flatMap((r) => r.names()))),
    };
}

function withTimeout(fn: ForeignFunction, timeoutMs: number): ForeignFunction {
    return {
        name: fn.name,
        minArgs: fn.minArgs,
        maxArgs: fn.maxArgs,
        async invoke(args, signal) {
            const controller = new AbortController();
            const onAbort = () => controller.abort(signal?.reason);
            signal?.addEventListener('abort', onAbort, { once: true });

            let timer: ReturnType<typeof setTimeout> | undefined;
            const timeout = new Promise<never>((_, reject) => {
                timer = setTimeout(() => {
                    // Reject before aborting: the function may resolve once aborted
                    reject(new ForeignCallError(fn.name, `timed out after ${timeoutMs}ms`));
                    controller.abort();
                }, timeoutMs);
            });

            try {
                return await Promise.race([fn.invoke(args, controller.signal), timeout]);
            } finally {
                clearTimeout(timer);
                signal?.removeEventListener('abort', onAbort);
            }
        },
    };
}

/**
 * Marshal arguments, call, and translate failures into the fallback.
 * Arity violations are the caller's fault and stay fatal.
 */
export async function invokeForeign(
    fn: ForeignFunction,
    args: AwkValue[],
    convfmt: string,
    signal?: AbortSignal
): Promise<AwkValue> {
    if (args.length < fn.minArgs || args.length > fn.maxArgs) {
        const expected = fn.minArgs === fn.maxArgs
            ? `${fn.minArgs}`
            : `${fn.minArgs} to ${fn.maxArgs}`;
        throw new AwkTypeError(`${fn.name} expects ${expected} arguments, got ${args.length}`);
    }

    const marshaled = args.map((v): ForeignArg => v.kind === 'number' ? v.num : toStr(v, convfmt));

    try {
        return str(await fn.invoke(marshaled, signal));
    } catch (err) {
        const error = err instanceof ForeignCallError
            ? err
            : new ForeignCallError(fn.name, err instanceof Error ? err.message : String(err), err);
        logger.warn('Foreign call failed', { function: fn.name, error: error.message });
        return str(FOREIGN_FALLBACK);
    }
}
