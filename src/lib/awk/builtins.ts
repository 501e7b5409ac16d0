/**
 * AWK Built-in Functions
 *
 * Implements standard AWK functions for string manipulation,
 * math operations, and I/O.
 *
 * Built-ins receive their argument expressions unevaluated: split, sub,
 * gsub and the sorters need an array or an assignable target rather than
 * a value. Everything else evaluates its arguments left to right.
 */

import { AwkTypeError } from '../errors/awk-error.js';
import type { AwkArray } from './environment.js';
import { formatPrintf } from './format.js';
import { regexSplit, splitFields, type RecordState } from './record.js';
import type { RegexCache } from './regex.js';
import { isLValue, type BuiltinName, type ExprNode, type FunctionCallNode, type LValueNode } from './types.js';
import {
    compareValues, formatArg, fromInput, num, str, toNumber, toStr,
    type AwkValue,
} from './value.js';

/**
 * An lvalue resolved once: its subscripts are already evaluated
 */
export type Reference = {
    get(): AwkValue;
    set(value: AwkValue): void;
};

/**
 * What a built-in may reach in the running interpreter
 */
export interface BuiltinContext {
    readonly record: RecordState;
    readonly regexes: RegexCache;
    readonly random: RandomState;
    evaluate(expr: ExprNode): Promise<AwkValue>;
    reference(target: LValueNode): Promise<Reference>;
    /** The array an argument names; TypeError for anything else */
    array(expr: ExprNode, fnName: string): AwkArray;
    /** Whether an argument names a variable that holds an array */
    isArray(expr: ExprNode): boolean;
    getVar(name: string): AwkValue;
    setVar(name: string, value: AwkValue): void;
    convfmt(): string;
    close(name: string): Promise<number>;
    flush(name?: string): Promise<number>;
}

export type BuiltinFn = (args: ExprNode[], ctx: BuiltinContext, call: FunctionCallNode) => Promise<AwkValue>;

export type BuiltinDef = {
    minArgs: number;
    maxArgs: number;
    fn: BuiltinFn;
};

/**
 * rand()/srand() state for one run
 */
export class RandomState {
    private state: number;

    constructor(private seed: number = 0) {
        this.state = RandomState.initial(seed);
    }

    next(): number {
        // Linear congruential generator
        this.state = (Math.imul(this.state, 1103515245) + 12345) & 0x7fffffff;
        return this.state / 0x80000000;
    }

    /**
     * Reseed and return the previous seed
     */
    reseed(seed: number): number {
        const previous = this.seed;
        this.seed = seed;
        this.state = RandomState.initial(seed);
        return previous;
    }

    private static initial(seed: number): number {
        return Math.trunc(seed) & 0x7fffffff;
    }
}

// Default target for sub/gsub
const RECORD_TARGET: LValueNode = {
    type: 'FieldAccess',
    index: { type: 'NumberLiteral', value: 0, line: 0, column: 0 },
    line: 0,
    column: 0,
};

async function evaluateAll(args: ExprNode[], ctx: BuiltinContext): Promise<AwkValue[]> {
    const values: AwkValue[] = [];
    for (const arg of args) {
        values.push(await ctx.evaluate(arg));
    }
    return values;
}

async function stringArg(arg: ExprNode, ctx: BuiltinContext): Promise<string> {
    return toStr(await ctx.evaluate(arg), ctx.convfmt());
}

async function numberArg(arg: ExprNode, ctx: BuiltinContext): Promise<number> {
    return toNumber(await ctx.evaluate(arg));
}

/**
 * Pattern text of a regex argument: a literal's source, or a string value
 */
async function regexArg(arg: ExprNode, ctx: BuiltinContext): Promise<string> {
    if (arg.type === 'RegexLiteral') {
        return arg.pattern;
    }
    return stringArg(arg, ctx);
}

function math(fn: (n: number) => number): BuiltinDef {
    return {
        minArgs: 1,
        maxArgs: 1,
        fn: async (args, ctx) => num(fn(await numberArg(args[0], ctx))),
    };
}

// ============================================================================
// String functions
// ============================================================================

const length: BuiltinFn = async (args, ctx) => {
    if (args.length === 0) {
        return num(ctx.record.text.length);
    }
    if (ctx.isArray(args[0])) {
        return num(ctx.array(args[0], 'length').size);
    }
    return num((await stringArg(args[0], ctx)).length);
};

/**
 * Round to the nearest integer, ties to even
 */
function roundHalfEven(n: number): number {
    if (!Number.isFinite(n)) return n;
    const floor = Math.floor(n);
    const diff = n - floor;
    if (diff > 0.5) return floor + 1;
    if (diff < 0.5) return floor;
    return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Characters from position m (1-based) for n characters, with m and n
 * rounded half to even and the range clipped to the string
 */
const substr: BuiltinFn = async (args, ctx) => {
    const s = await stringArg(args[0], ctx);
    const start = roundHalfEven(await numberArg(args[1], ctx));
    const count = args.length > 2 ? roundHalfEven(await numberArg(args[2], ctx)) : Infinity;

    if (Number.isNaN(start) || Number.isNaN(count)) {
        return str('');
    }

    const first = Math.max(start, 1);
    const last = Math.min(start + count - 1, s.length);
    if (last < first) {
        return str('');
    }
    return str(s.slice(first - 1, last));
};

const index: BuiltinFn = async (args, ctx) => {
    const s = await stringArg(args[0], ctx);
    const t = await stringArg(args[1], ctx);
    if (t === '') {
        return num(0);
    }
    return num(s.indexOf(t) + 1);
};

const split: BuiltinFn = async (args, ctx) => {
    const text = await stringArg(args[0], ctx);

    let parts: string[];
    if (args.length > 2 && args[2].type === 'RegexLiteral') {
        const pattern = args[2].pattern;
        if (text === '') {
            parts = [];
        } else if (pattern === '') {
            // An empty regex separates every character, like FS = ""
            parts = Array.from(text);
        } else {
            parts = regexSplit(text, ctx.regexes.compileGlobal(pattern));
        }
    } else {
        const fs = args.length > 2
            ? await stringArg(args[2], ctx)
            : toStr(ctx.getVar('FS'), ctx.convfmt());
        parts = splitFields(text, fs, ctx.regexes);
    }

    const array = ctx.array(args[1], 'split');
    array.clear();
    parts.forEach((part, i) => array.set(String(i + 1), fromInput(part)));

    return num(parts.length);
};

/**
 * Expand a sub/gsub replacement: & is the matched text, \& a literal &,
 * \\ a literal backslash
 */
function expandReplacement(replacement: string, matched: string): string {
    let out = '';
    for (let i = 0; i < replacement.length; i++) {
        const c = replacement[i];
        if (c === '\\' && (replacement[i + 1] === '&' || replacement[i + 1] === '\\')) {
            out += replacement[i + 1];
            i++;
        } else if (c === '&') {
            out += matched;
        } else {
            out += c;
        }
    }
    return out;
}

/**
 * Replace every match; an empty match directly after a previous match
 * is skipped
 */
export function substituteAll(text: string, re: RegExp, replacement: string): [string, number] {
    let out = '';
    let pos = 0;
    let count = 0;
    let lastEnd = -1;

    while (pos <= text.length) {
        re.lastIndex = pos;
        const m = re.exec(text);
        if (!m) break;

        const start = m.index;
        const end = start + m[0].length;

        if (start === end && start === lastEnd) {
            if (start >= text.length) break;
            out += text.slice(pos, start + 1);
            pos = start + 1;
            continue;
        }

        out += text.slice(pos, start) + expandReplacement(replacement, m[0]);
        count++;
        lastEnd = end;

        if (start === end) {
            out += text.slice(start, start + 1);
            pos = start + 1;
        } else {
            pos = end;
        }
    }

    return [out + text.slice(pos), count];
}

function substitution(global: boolean): BuiltinFn {
    return async (args, ctx, call) => {
        const pattern = await regexArg(args[0], ctx);
        const replacement = await stringArg(args[1], ctx);

        const targetExpr = args.length > 2 ? args[2] : RECORD_TARGET;
        if (!isLValue(targetExpr)) {
            throw new AwkTypeError(`${call.name}: third argument is not assignable`, call);
        }
        const target = await ctx.reference(targetExpr);
        const text = toStr(target.get(), ctx.convfmt());

        let result: string;
        let count: number;
        if (global) {
            [result, count] = substituteAll(text, ctx.regexes.compileGlobal(pattern), replacement);
        } else {
            const m = ctx.regexes.compile(pattern).exec(text);
            count = m ? 1 : 0;
            result = m
                ? text.slice(0, m.index) + expandReplacement(replacement, m[0]) + text.slice(m.index + m[0].length)
                : text;
        }

        if (count > 0) {
            target.set(str(result));
        }
        return num(count);
    };
}

const match: BuiltinFn = async (args, ctx) => {
    const s = await stringArg(args[0], ctx);
    const pattern = await regexArg(args[1], ctx);
    const m = ctx.regexes.compile(pattern).exec(s);

    const rstart = m ? m.index + 1 : 0;
    ctx.setVar('RSTART', num(rstart));
    ctx.setVar('RLENGTH', num(m ? m[0].length : -1));
    return num(rstart);
};

const sprintf: BuiltinFn = async (args, ctx) => {
    const [format, ...rest] = await evaluateAll(args, ctx);
    const convfmt = ctx.convfmt();
    return str(formatPrintf(toStr(format, convfmt), rest.map((v) => formatArg(v, convfmt))));
};

const tolower: BuiltinFn = async (args, ctx) => str((await stringArg(args[0], ctx)).toLowerCase());

const toupper: BuiltinFn = async (args, ctx) => str((await stringArg(args[0], ctx)).toUpperCase());

// ============================================================================
// Arithmetic functions
// ============================================================================

const atan2: BuiltinFn = async (args, ctx) => {
    const y = await numberArg(args[0], ctx);
    const x = await numberArg(args[1], ctx);
    return num(Math.atan2(y, x));
};

const rand: BuiltinFn = async (_args, ctx) => num(ctx.random.next());

const srand: BuiltinFn = async (args, ctx) => {
    const seed = args.length > 0
        ? await numberArg(args[0], ctx)
        : Math.floor(Date.now() / 1000);
    return num(ctx.random.reseed(seed));
};

// ============================================================================
// I/O functions
// ============================================================================

const close: BuiltinFn = async (args, ctx) => num(await ctx.close(await stringArg(args[0], ctx)));

const fflush: BuiltinFn = async (args, ctx) => {
    const name = args.length > 0 ? await stringArg(args[0], ctx) : undefined;
    return num(await ctx.flush(name));
};

// ============================================================================
// Array sorting
// ============================================================================

function compareForSort(a: AwkValue, b: AwkValue): number {
    const aNumeric = a.kind === 'number' || a.kind === 'strnum';
    const bNumeric = b.kind === 'number' || b.kind === 'strnum';
    if (aNumeric !== bNumeric) {
        return aNumeric ? -1 : 1;
    }
    const c = compareValues(a, b);
    return Number.isNaN(c) ? 0 : c;
}

/**
 * Fill dest with values under subscripts 1..n
 */
function renumber(dest: AwkArray, values: AwkValue[]): void {
    dest.clear();
    values.forEach((value, i) => dest.set(String(i + 1), value));
}

const asort: BuiltinFn = async (args, ctx) => {
    const source = ctx.array(args[0], 'asort');
    const dest = args.length > 1 ? ctx.array(args[1], 'asort') : source;
    const values = source.values().sort(compareForSort);
    renumber(dest, values);
    return num(values.length);
};

const asorti: BuiltinFn = async (args, ctx) => {
    const source = ctx.array(args[0], 'asorti');
    const dest = args.length > 1 ? ctx.array(args[1], 'asorti') : source;
    const keys = source.keys().sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    renumber(dest, keys.map(str));
    return num(keys.length);
};

export const BUILTINS: Record<BuiltinName, BuiltinDef> = {
    length: { minArgs: 0, maxArgs: 1, fn: length },
    substr: { minArgs: 2, maxArgs: 3, fn: substr },
    index: { minArgs: 2, maxArgs: 2, fn: index },
    split: { minArgs: 2, maxArgs: 3, fn: split },
    sub: { minArgs: 2, maxArgs: 3, fn: substitution(false) },
    gsub: { minArgs: 2, maxArgs: 3, fn: substitution(true) },
    match: { minArgs: 2, maxArgs: 2, fn: match },
    sprintf: { minArgs: 1, maxArgs: Infinity, fn: sprintf },
    tolower: { minArgs: 1, maxArgs: 1, fn: tolower },
    toupper: { minArgs: 1, maxArgs: 1, fn: toupper },
    sin: math(Math.sin),
    cos: math(Math.cos),
    atan2: { minArgs: 2, maxArgs: 2, fn: atan2 },
    exp: math(Math.exp),
    log: math(Math.log),
    sqrt: math(Math.sqrt),
    int: math(Math.trunc),
    rand: { minArgs: 0, maxArgs: 0, fn: rand },
    srand: { minArgs: 0, maxArgs: 1, fn: srand },
    close: { minArgs: 1, maxArgs: 1, fn: close },
    fflush: { minArgs: 0, maxArgs: 1, fn: fflush },
    asort: { minArgs: 1, maxArgs: 2, fn: asort },
    asorti: { minArgs: 1, maxArgs: 2, fn: asorti },
};
