/**
 * AWK Values
 *
 * Dual-typed scalars: a value is uninitialized, a number, a string, or a
 * strnum (input text that looks numeric). Coercion and comparison rules
 * live here and nowhere else.
 */

import { formatNumber, type FormatArg } from './format.js';

export type AwkValue =
    | { readonly kind: 'uninit' }
    | { readonly kind: 'number'; readonly num: number }
    | { readonly kind: 'string'; readonly str: string }
    | { readonly kind: 'strnum'; readonly str: string; readonly num: number };

export const UNINIT: AwkValue = Object.freeze({ kind: 'uninit' });

export const DEFAULT_CONVFMT = '%.6g';

// Whole-string numeric form: optional blanks, sign, mantissa, exponent
const NUMERIC_TEXT = /^[ \t\n\r\f\v]*[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?[ \t\n\r\f\v]*$/;

// Leading numeric prefix used in numeric context
const NUMERIC_PREFIX = /^[ \t\n\r\f\v]*([+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?)/;

export function num(n: number): AwkValue {
    return { kind: 'number', num: n };
}

export function str(s: string): AwkValue {
    return { kind: 'string', str: s };
}

export function bool(b: boolean): AwkValue {
    return num(b ? 1 : 0);
}

/**
 * Whether text read from input should behave as a number in comparisons
 */
export function looksNumeric(s: string): boolean {
    return NUMERIC_TEXT.test(s);
}

/**
 * Wrap text that came from input: strnum when it looks numeric, string otherwise
 */
export function fromInput(s: string): AwkValue {
    if (looksNumeric(s)) {
        return { kind: 'strnum', str: s, num: Number(s.trim()) };
    }
    return str(s);
}

/**
 * Parse the leading numeric prefix of a string; no prefix yields 0
 */
export function parseNumericPrefix(s: string): number {
    const m = NUMERIC_PREFIX.exec(s);
    if (!m) return 0;
    return Number(m[1]);
}

export function toNumber(v: AwkValue): number {
    switch (v.kind) {
        case 'uninit':
            return 0;
        case 'number':
        case 'strnum':
            return v.num;
        case 'string':
            return parseNumericPrefix(v.str);
    }
}

/**
 * Convert a number to its string form: integral values print as integers,
 * anything else goes through the conversion format
 */
export function numberToString(n: number, format: string = DEFAULT_CONVFMT): string {
    if (Number.isInteger(n)) {
        return BigInt(n).toString();
    }
    return formatNumber(format, n);
}

export function toStr(v: AwkValue, convfmt: string = DEFAULT_CONVFMT): string {
    switch (v.kind) {
        case 'uninit':
            return '';
        case 'number':
            return numberToString(v.num, convfmt);
        case 'string':
        case 'strnum':
            return v.str;
    }
}

export function toBool(v: AwkValue): boolean {
    switch (v.kind) {
        case 'uninit':
            return false;
        case 'number':
        case 'strnum':
            return v.num !== 0;
        case 'string':
            return v.str !== '';
    }
}

function isNumericKind(v: AwkValue): boolean {
    return v.kind === 'number' || v.kind === 'strnum' || v.kind === 'uninit';
}

/**
 * Compare two values: numerically when both are numbers, strnums or
 * uninitialized, otherwise as strings by code unit.
 * Returns negative, zero or positive; NaN when a numeric side is NaN.
 */
export function compareValues(a: AwkValue, b: AwkValue, convfmt: string = DEFAULT_CONVFMT): number {
    if (isNumericKind(a) && isNumericKind(b)) {
        const l = toNumber(a);
        const r = toNumber(b);
        if (l < r) return -1;
        if (l > r) return 1;
        return l === r ? 0 : Number.NaN;
    }

    const l = toStr(a, convfmt);
    const r = toStr(b, convfmt);
    if (l < r) return -1;
    if (l > r) return 1;
    return 0;
}

/**
 * Adapt a value for printf; strnums count as numbers for %c
 */
export function formatArg(v: AwkValue, convfmt: string = DEFAULT_CONVFMT): FormatArg {
    return {
        num: () => toNumber(v),
        str: () => toStr(v, convfmt),
        isNumber: v.kind === 'number' || v.kind === 'strnum',
    };
}
