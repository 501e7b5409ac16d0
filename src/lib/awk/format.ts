/**
 * AWK printf Formatting
 *
 * C-style format strings over a minimal argument interface, so the
 * same formatter serves printf/sprintf and CONVFMT/OFMT conversions.
 */

/**
 * One printf argument, coerced on demand by the conversion that consumes it
 */
export type FormatArg = {
    num(): number;
    str(): string;
    /** True for values that are numbers rather than text (used by %c) */
    isNumber: boolean;
};

type Spec = {
    flags: string;
    width: number | null;
    precision: number | null;
    conversion: string;
};

const MAX_PRECISION = 96;

export function numberArg(n: number): FormatArg {
    return { num: () => n, str: () => String(n), isNumber: true };
}

/**
 * Format a value list with a printf format string
 */
export function formatPrintf(format: string, args: FormatArg[]): string {
    let result = '';
    let argIdx = 0;
    let i = 0;

    const nextArg = (): FormatArg | null => (argIdx < args.length ? args[argIdx++] : null);

    while (i < format.length) {
        if (format[i] !== '%') {
            result += format[i++];
            continue;
        }

        i++; // skip %
        if (i >= format.length) {
            result += '%';
            break;
        }

        // %% escape
        if (format[i] === '%') {
            result += '%';
            i++;
            continue;
        }

        const start = i - 1;
        let flags = '';
        let width: number | null = null;
        let precision: number | null = null;

        // Flags: -, +, space, #, 0
        while (i < format.length && '-+ #0'.includes(format[i])) {
            flags += format[i++];
        }

        // Width
        if (format[i] === '*') {
            i++;
            width = Math.trunc(nextArg()?.num() ?? 0);
            if (width < 0) {
                flags += '-';
                width = -width;
            }
        } else {
            let digits = '';
            while (format[i] >= '0' && format[i] <= '9') {
                digits += format[i++];
            }
            if (digits) width = parseInt(digits, 10);
        }

        // Precision
        if (format[i] === '.') {
            i++;
            if (format[i] === '*') {
                i++;
                const p = Math.trunc(nextArg()?.num() ?? 0);
                precision = p < 0 ? null : p;
            } else {
                let digits = '';
                while (format[i] >= '0' && format[i] <= '9') {
                    digits += format[i++];
                }
                precision = digits ? parseInt(digits, 10) : 0;
            }
        }

        // Length modifiers carry no meaning here
        while (i < format.length && 'hlLqjzt'.includes(format[i])) {
            i++;
        }

        if (i >= format.length) {
            result += format.slice(start);
            break;
        }

        const conversion = format[i++];
        if (!'cdiouxXeEfFgGs'.includes(conversion)) {
            // Unknown conversion: emit the directive as written
            result += format.slice(start, i);
            continue;
        }

        const spec: Spec = {
            flags,
            width,
            precision: precision === null ? null : Math.min(precision, MAX_PRECISION),
            conversion,
        };
        result += formatOne(nextArg(), spec);
    }

    return result;
}

/**
 * Format a number with a single-conversion format such as CONVFMT ("%.6g")
 */
export function formatNumber(format: string, n: number): string {
    return formatPrintf(format, [numberArg(n)]);
}

function formatOne(arg: FormatArg | null, spec: Spec): string {
    switch (spec.conversion) {
        case 's': {
            let s = arg ? arg.str() : '';
            if (spec.precision !== null && s.length > spec.precision) {
                s = s.substring(0, spec.precision);
            }
            return pad(s, spec, false);
        }

        case 'c': {
            let s: string;
            if (!arg) {
                s = '';
            } else if (arg.isNumber) {
                const code = Math.trunc(arg.num());
                s = code >= 0 && code <= 0x10ffff ? String.fromCodePoint(code) : '';
            } else {
                s = Array.from(arg.str())[0] ?? '';
            }
            return pad(s, spec, false);
        }

        case 'd':
        case 'i':
            return formatInteger(arg ? arg.num() : 0, spec);

        case 'o':
        case 'u':
        case 'x':
        case 'X':
            return formatUnsigned(arg ? arg.num() : 0, spec);

        default:
            return formatFloat(arg ? arg.num() : 0, spec);
    }
}

function signOf(n: number, flags: string): string {
    if (n < 0) return '-';
    if (flags.includes('+')) return '+';
    if (flags.includes(' ')) return ' ';
    return '';
}

function nonFinite(n: number, spec: Spec, upper: boolean): string {
    let body = Number.isNaN(n) ? 'nan' : 'inf';
    if (upper) body = body.toUpperCase();
    const sign = Number.isNaN(n) ? '' : signOf(n, spec.flags);
    return pad(sign + body, spec, false);
}

function formatInteger(n: number, spec: Spec): string {
    if (!Number.isFinite(n)) return nonFinite(n, spec, false);

    let digits = BigInt(Math.trunc(Math.abs(n))).toString();
    if (spec.precision !== null) {
        if (spec.precision === 0 && digits === '0') digits = '';
        digits = digits.padStart(spec.precision, '0');
    }

    return padNumeric(signOf(n, spec.flags), digits, spec, spec.precision === null);
}

function formatUnsigned(n: number, spec: Spec): string {
    if (!Number.isFinite(n)) return nonFinite(n, spec, spec.conversion === 'X');

    const value = BigInt.asUintN(64, BigInt(Math.trunc(n)));
    let digits: string;
    let prefix = '';

    switch (spec.conversion) {
        case 'o':
            digits = value.toString(8);
            if (spec.flags.includes('#') && !digits.startsWith('0')) digits = '0' + digits;
            break;
        case 'x':
            digits = value.toString(16);
            if (spec.flags.includes('#') && value !== 0n) prefix = '0x';
            break;
        case 'X':
            digits = value.toString(16).toUpperCase();
            if (spec.flags.includes('#') && value !== 0n) prefix = '0X';
            break;
        default:
            digits = value.toString();
    }

    if (spec.precision !== null) {
        if (spec.precision === 0 && value === 0n) digits = '';
        digits = digits.padStart(spec.precision, '0');
    }

    return padNumeric(prefix, digits, spec, spec.precision === null);
}

function formatFloat(n: number, spec: Spec): string {
    const upper = spec.conversion === 'E' || spec.conversion === 'G' || spec.conversion === 'F';
    if (!Number.isFinite(n)) return nonFinite(n, spec, upper);

    const precision = spec.precision ?? 6;
    const alt = spec.flags.includes('#');
    const abs = Math.abs(n);
    let body: string;

    switch (spec.conversion) {
        case 'e':
        case 'E':
            body = formatExponential(abs, precision, alt);
            break;
        case 'f':
        case 'F':
            body = formatFixed(abs, precision, alt);
            break;
        default:
            body = formatGeneral(abs, precision, alt);
    }

    if (upper) body = body.toUpperCase();
    return padNumeric(signOf(n, spec.flags), body, spec, true);
}

// =============================================================================
// Exact decimal rounding
// =============================================================================

/**
 * A finite non-negative double written exactly as digits / 10^scale
 */
type Decimal = {
    digits: bigint;
    scale: number;
};

function exactDecimal(abs: number): Decimal {
    const view = new DataView(new ArrayBuffer(8));
    view.setFloat64(0, abs);
    const bits = view.getBigUint64(0);

    const biased = Number((bits >> 52n) & 0x7ffn);
    let mantissa = bits & 0xfffffffffffffn;
    let exp = -1074;
    if (biased !== 0) {
        mantissa |= 1n << 52n;
        exp = biased - 1075;
    }

    if (exp >= 0) {
        return { digits: mantissa << BigInt(exp), scale: 0 };
    }
    // m / 2^k == m * 5^k / 10^k
    return { digits: mantissa * 5n ** BigInt(-exp), scale: -exp };
}

/**
 * The value times 10^places, rounded to an integer with ties to even
 */
function roundScaled(dec: Decimal, places: number): bigint {
    if (places >= dec.scale) {
        return dec.digits * 10n ** BigInt(places - dec.scale);
    }
    const divisor = 10n ** BigInt(dec.scale - places);
    const quotient = dec.digits / divisor;
    const twice = (dec.digits % divisor) * 2n;
    if (twice > divisor || (twice === divisor && quotient % 2n === 1n)) {
        return quotient + 1n;
    }
    return quotient;
}

/**
 * Significant digits (precision + 1 of them) and decimal exponent, as %e
 * rounds them
 */
function exponentParts(abs: number, precision: number): { digits: string; exp: number } {
    if (abs === 0) {
        return { digits: '0'.repeat(precision + 1), exp: 0 };
    }

    const dec = exactDecimal(abs);
    let exp = dec.digits.toString().length - 1 - dec.scale;
    let scaled = roundScaled(dec, precision - exp);

    // Rounding carried into a new leading digit (9.99 -> 10.0)
    if (scaled >= 10n ** BigInt(precision + 1)) {
        scaled /= 10n;
        exp++;
    }
    return { digits: scaled.toString(), exp };
}

function formatFixed(abs: number, precision: number, alt: boolean): string {
    const text = roundScaled(exactDecimal(abs), precision).toString().padStart(precision + 1, '0');
    const whole = text.slice(0, text.length - precision);
    let body = precision > 0 ? `${whole}.${text.slice(text.length - precision)}` : whole;
    if (alt && precision === 0) body += '.';
    return body;
}

function formatExponential(abs: number, precision: number, alt: boolean): string {
    const { digits, exp } = exponentParts(abs, precision);
    const mantissa = precision > 0 ? `${digits[0]}.${digits.slice(1)}` : digits[0];
    const expSign = exp < 0 ? '-' : '+';
    const expDigits = String(Math.abs(exp)).padStart(2, '0');
    const dot = alt && precision === 0 ? '.' : '';
    return `${mantissa}${dot}e${expSign}${expDigits}`;
}

function formatGeneral(abs: number, precision: number, alt: boolean): string {
    const p = precision === 0 ? 1 : precision;
    const { exp } = exponentParts(abs, p - 1);

    if (exp < -4 || exp >= p) {
        const formatted = formatExponential(abs, p - 1, alt);
        if (alt) return formatted;
        const [mantissa, rest] = formatted.split('e');
        return `${stripTrailingZeros(mantissa)}e${rest}`;
    }

    const fixed = formatFixed(abs, p - 1 - exp, false);
    return alt ? fixed : stripTrailingZeros(fixed);
}

function stripTrailingZeros(s: string): string {
    if (!s.includes('.')) return s;
    return s.replace(/0+$/, '').replace(/\.$/, '');
}

/**
 * Pad a numeric body to the field width, zero-filling after the sign/prefix
 * when the 0 flag applies
 */
function padNumeric(prefix: string, body: string, spec: Spec, zeroAllowed: boolean): string {
    const width = spec.width ?? 0;
    const text = prefix + body;
    if (text.length >= width) return text;

    if (spec.flags.includes('-')) {
        return text + ' '.repeat(width - text.length);
    }
    if (zeroAllowed && spec.flags.includes('0')) {
        return prefix + '0'.repeat(width - text.length) + body;
    }
    return ' '.repeat(width - text.length) + text;
}

function pad(text: string, spec: Spec, zeroAllowed: boolean): string {
    return padNumeric('', text, spec, zeroAllowed);
}
