import { describe, it, expect } from 'vitest';
import { parseArgs, type ArgSpec } from '@src/lib/commands/shared.js';

const specs: Record<string, ArgSpec> = {
    long: { short: 'l', desc: 'Long format' },
    all: { short: 'a', long: 'all', desc: 'Show all' },
    count: { short: 'n', long: 'count', value: true, desc: 'Line count' },
    variable: { short: 'v', value: true, required: true, multiple: true, desc: 'Assignment' },
};

describe('parseArgs', () => {
    it('should expand combined short flags', () => {
        const result = parseArgs(['-la', 'file.txt'], specs);
        expect(result.flags).toEqual({ long: true, all: true });
        expect(result.positional).toEqual(['file.txt']);
    });

    it('should read values attached or separate', () => {
        expect(parseArgs(['-n10'], specs).flags.count).toBe('10');
        expect(parseArgs(['-n', '10'], specs).flags.count).toBe('10');
        expect(parseArgs(['--count=7'], specs).flags.count).toBe('7');
        expect(parseArgs(['--count', '7'], specs).flags.count).toBe('7');
    });

    it('should take a dash-prefixed value only when the value is required', () => {
        expect(parseArgs(['-n', '-l'], specs).flags).toEqual({ count: true, long: true });
        expect(parseArgs(['-v', '-x=1'], specs).lists.variable).toEqual(['-x=1']);
    });

    it('should collect repeated flags', () => {
        const result = parseArgs(['-v', 'a=1', '-vb=2'], specs);
        expect(result.lists.variable).toEqual(['a=1', 'b=2']);
        expect(result.flags.variable).toBe('b=2');
    });

    it('should report missing required values and unknown flags', () => {
        expect(parseArgs(['-v'], specs).errors).toEqual(['-v requires a value']);
        expect(parseArgs(['-z', '--nope'], specs).unknown).toEqual(['-z', '--nope']);
    });

    it('should treat everything after -- as positional', () => {
        expect(parseArgs(['--', '-l', 'x'], specs).positional).toEqual(['-l', 'x']);
    });

    it('should stop at the first positional when asked', () => {
        const result = parseArgs(['-l', '{ print }', '-a', '-'], specs, { stopAtPositional: true });
        expect(result.flags).toEqual({ long: true });
        expect(result.positional).toEqual(['{ print }', '-a', '-']);
    });
});
