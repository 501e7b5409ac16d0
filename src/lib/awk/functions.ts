/**
 * Call Resolution
 *
 * Maps the name at a call site to a built-in, a user-defined function or
 * a foreign function. Each call site is resolved the first time it runs
 * and the answer is kept for later executions.
 */

import { NameError } from '../errors/awk-error.js';
import { BUILTINS, type BuiltinDef } from './builtins.js';
import type { ForeignFunction, ForeignRegistry } from './foreign.js';
import { isBuiltinName, type BuiltinName, type FunctionCallNode, type FunctionDefNode } from './types.js';

export type ResolvedCall =
    | { kind: 'builtin'; name: BuiltinName; def: BuiltinDef }
    | { kind: 'user'; def: FunctionDefNode }
    | { kind: 'foreign'; fn: ForeignFunction };

export class FunctionTable {
    private readonly user = new Map<string, FunctionDefNode>();
    private readonly callSites = new WeakMap<FunctionCallNode, ResolvedCall>();

    constructor(
        functions: FunctionDefNode[],
        private readonly foreign: ForeignRegistry
    ) {
        for (const fn of functions) {
            this.user.set(fn.name, fn);
        }
    }

    resolve(call: FunctionCallNode): ResolvedCall {
        const cached = this.callSites.get(call);
        if (cached) {
            return cached;
        }

        const resolved = this.lookup(call);
        this.callSites.set(call, resolved);
        return resolved;
    }

    private lookup(call: FunctionCallNode): ResolvedCall {
        const name = call.name;

        if (isBuiltinName(name)) {
            return { kind: 'builtin', name, def: BUILTINS[name] };
        }

        const def = this.user.get(name);
        if (def) {
            return { kind: 'user', def };
        }

        const fn = this.foreign.resolve(name);
        if (fn) {
            return { kind: 'foreign', fn };
        }

        throw new NameError(`calling undefined function ${name}`, name, call);
    }
}
