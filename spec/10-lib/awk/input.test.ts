import { describe, it, expect } from 'vitest';
import {
    FileRecordReader, RecordReader, fileSource, streamSource, stringSource,
    type InputChunk, type InputOperand,
} from '@src/lib/awk/input.js';
import { RuntimeIOError } from '@src/lib/errors/awk-error.js';

async function* chunks(...parts: InputChunk[]): AsyncGenerator<InputChunk> {
    for (const part of parts) {
        yield part;
    }
}

async function readAll(operands: InputOperand[], rs = '\n', assigned: string[] = []): Promise<string[]> {
    const reader = new RecordReader(operands, {
        recordSeparator: () => rs,
        assign: (name, value) => assigned.push(`${name}=${value}`),
    });
    const records: string[] = [];
    for (let event = await reader.next(); event; event = await reader.next()) {
        records.push(event.record);
    }
    return records;
}

describe('RecordReader', () => {
    it('should report the source and the first record of each source', async () => {
        const reader = new RecordReader([stringSource('a\nb\n', 'one'), stringSource('c', 'two')], {
            recordSeparator: () => '\n',
            assign: () => undefined,
        });

        expect(await reader.next()).toEqual({ record: 'a', newSource: true, filename: 'one' });
        expect(await reader.next()).toEqual({ record: 'b', newSource: false, filename: 'one' });
        expect(await reader.next()).toEqual({ record: 'c', newSource: true, filename: 'two' });
        expect(await reader.next()).toBeNull();
    });

    it('should apply assignment operands between sources', async () => {
        const assigned: string[] = [];
        const records = await readAll([
            stringSource('a\n'),
            { kind: 'assignment', name: 'v', value: '1' },
            stringSource('b\n'),
        ], '\n', assigned);

        expect(records).toEqual(['a', 'b']);
        expect(assigned).toEqual(['v=1']);
    });

    it('should join records split across chunks', async () => {
        expect(await readAll([streamSource(chunks('ab', 'c\nd'))])).toEqual(['abc', 'd']);
    });

    it('should decode multi-byte characters split across chunks', async () => {
        const source = streamSource(chunks(new Uint8Array([0x61, 0xc3]), new Uint8Array([0xa9, 0x0a])));
        expect(await readAll([source])).toEqual(['aé']);
    });

    it('should split on a custom record separator', async () => {
        expect(await readAll([stringSource('a;b;')], ';')).toEqual(['a', 'b']);
    });

    it('should read paragraphs when RS is empty', async () => {
        const text = '\n\npara one\nline2\n\n\npara two\n';
        expect(await readAll([stringSource(text)], '')).toEqual(['para one\nline2', 'para two']);
    });

    it('should report unreadable files as IO errors', async () => {
        await expect(readAll([fileSource('/nonexistent/aiawk-input')])).rejects.toThrow(RuntimeIOError);
    });
});

describe('FileRecordReader', () => {
    it('should read records until the source is exhausted', async () => {
        const reader = new FileRecordReader(stringSource('x\ny'));
        expect(await reader.next('\n')).toBe('x');
        expect(await reader.next('\n')).toBe('y');
        expect(await reader.next('\n')).toBeNull();
        await reader.close();
    });
});
