import { describe, it, expect } from 'vitest';
import { formatNumber, formatPrintf, numberArg, type FormatArg } from '@src/lib/awk/format.js';

function textArg(s: string): FormatArg {
    return { num: () => Number.parseFloat(s) || 0, str: () => s, isNumber: false };
}

describe('formatPrintf', () => {
    it('should pad and align strings', () => {
        expect(formatPrintf('[%5s]', [textArg('ab')])).toBe('[   ab]');
        expect(formatPrintf('[%-5s]', [textArg('ab')])).toBe('[ab   ]');
        expect(formatPrintf('[%.3s]', [textArg('abcdef')])).toBe('[abc]');
    });

    it('should format integers with sign and zero padding', () => {
        expect(formatPrintf('%d', [numberArg(3.99)])).toBe('3');
        expect(formatPrintf('%d', [numberArg(-3.99)])).toBe('-3');
        expect(formatPrintf('%05d', [numberArg(-42)])).toBe('-0042');
        expect(formatPrintf('%+d', [numberArg(5)])).toBe('+5');
        expect(formatPrintf('%-5d|', [numberArg(42)])).toBe('42   |');
    });

    it('should format unsigned conversions', () => {
        expect(formatPrintf('%x', [numberArg(255)])).toBe('ff');
        expect(formatPrintf('%#X', [numberArg(255)])).toBe('0XFF');
        expect(formatPrintf('%o', [numberArg(8)])).toBe('10');
    });

    it('should format floating point conversions', () => {
        expect(formatPrintf('%5.2f|', [numberArg(3.14159)])).toBe(' 3.14|');
        expect(formatPrintf('%e', [numberArg(12345.678)])).toBe('1.234568e+04');
        expect(formatPrintf('%g', [numberArg(0.0001)])).toBe('0.0001');
        expect(formatPrintf('%g', [numberArg(100000)])).toBe('100000');
        expect(formatPrintf('%g', [numberArg(1000000)])).toBe('1e+06');
    });

    it('should round exact ties to even', () => {
        expect(formatPrintf('%.0f %.2f', [numberArg(2.5), numberArg(0.125)])).toBe('2 0.12');
        expect(formatPrintf('%.0f %.0f', [numberArg(3.5), numberArg(0.5)])).toBe('4 0');
        expect(formatPrintf('%.0e', [numberArg(2.5)])).toBe('2e+00');
        expect(formatPrintf('%.2g', [numberArg(0.125)])).toBe('0.12');
    });

    it('should round from the stored binary value', () => {
        // 1.005 is stored just below 1.005
        expect(formatPrintf('%.2f', [numberArg(1.005)])).toBe('1.00');
        expect(formatPrintf('%.1f', [numberArg(0.35)])).toBe('0.3');
    });

    it('should carry rounding into a new leading digit', () => {
        expect(formatPrintf('%.2e', [numberArg(9.999)])).toBe('1.00e+01');
        expect(formatPrintf('%.3g', [numberArg(999.9)])).toBe('1e+03');
        expect(formatPrintf('%.1f', [numberArg(9.96)])).toBe('10.0');
    });

    it('should format large and tiny magnitudes', () => {
        expect(formatPrintf('%.0f', [numberArg(1e21)])).toBe('1000000000000000000000');
        expect(formatPrintf('%e', [numberArg(0)])).toBe('0.000000e+00');
        expect(formatPrintf('%g', [numberArg(1.5e-7)])).toBe('1.5e-07');
        expect(formatPrintf('%.1f', [numberArg(-0.25)])).toBe('-0.2');
    });

    it('should print a character for %c', () => {
        expect(formatPrintf('%c', [numberArg(65)])).toBe('A');
        expect(formatPrintf('%c', [textArg('hello')])).toBe('h');
    });

    it('should take width from the argument list for *', () => {
        expect(formatPrintf('%*d', [numberArg(4), numberArg(7)])).toBe('   7');
    });

    it('should treat missing arguments as empty or zero', () => {
        expect(formatPrintf('%s|%d', [])).toBe('|0');
    });

    it('should keep %% and unknown directives', () => {
        expect(formatPrintf('100%%', [])).toBe('100%');
        expect(formatPrintf('%k', [])).toBe('%k');
    });
});

describe('formatNumber', () => {
    it('should apply a single conversion', () => {
        expect(formatNumber('%.2f', 2.5)).toBe('2.50');
        expect(formatNumber('%.6g', 2 / 3)).toBe('0.666667');
        expect(formatNumber('%.6g', 12345.25)).toBe('12345.2');
        expect(formatNumber('%.0f', 2.5)).toBe('2');
    });
});
