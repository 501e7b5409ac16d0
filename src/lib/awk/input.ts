/**
 * AWK Input
 *
 * Reads records from an ordered list of input operands. Sources are
 * consumed lazily, one chunk at a time; assignment operands take effect
 * when the reader reaches them.
 */

import { createReadStream } from 'node:fs';
import { RuntimeIOError } from '../errors/awk-error.js';

export type InputChunk = string | Uint8Array;

/**
 * A named stream of text. FILENAME is set from `name`.
 */
export type InputSource = {
    kind: 'source';
    name: string;
    open(): AsyncIterable<InputChunk>;
};

/**
 * A `name=value` operand between files
 */
export type InputAssignment = {
    kind: 'assignment';
    name: string;
    value: string;
};

export type InputOperand = InputSource | InputAssignment;

export function stringSource(text: string, name = ''): InputSource {
    return {
        kind: 'source',
        name,
        async *open() {
            yield text;
        },
    };
}

export function streamSource(stream: AsyncIterable<InputChunk>, name = ''): InputSource {
    return {
        kind: 'source',
        name,
        open: () => stream,
    };
}

export function fileSource(path: string): InputSource {
    return {
        kind: 'source',
        name: path,
        open: () => createReadStream(path),
    };
}

export type RecordEvent = {
    record: string;
    /** True for the first record of a new source (FNR resets) */
    newSource: boolean;
    filename: string;
};

export type ReaderHooks = {
    /** Current RS; only the first character is significant */
    recordSeparator(): string;
    assign(name: string, value: string): void;
};

/**
 * Splits one source's text into records as chunks arrive
 */
class SourceCursor {
    private buffer = '';
    private done = false;
    private iterator: AsyncIterator<InputChunk>;
    private decoder = new TextDecoder();

    constructor(public readonly source: InputSource) {
        this.iterator = source.open()[Symbol.asyncIterator]();
    }

    async nextRecord(rs: string): Promise<string | null> {
        if (rs === '') {
            return this.nextParagraph();
        }

        const sep = rs[0];
        for (;;) {
            const idx = this.buffer.indexOf(sep);
            if (idx !== -1) {
                const record = this.buffer.slice(0, idx);
                this.buffer = this.buffer.slice(idx + 1);
                return record;
            }
            if (this.done) {
                return this.takeRemainder();
            }
            await this.fill();
        }
    }

    private async nextParagraph(): Promise<string | null> {
        for (;;) {
            // Leading newlines never start a record
            const lead = /^\n+/.exec(this.buffer);
            if (lead) {
                this.buffer = this.buffer.slice(lead[0].length);
            }

            const blank = /\n\n+/.exec(this.buffer);
            // A separator touching the end of the buffer may still grow
            if (blank && (blank.index + blank[0].length < this.buffer.length || this.done)) {
                const record = this.buffer.slice(0, blank.index);
                this.buffer = this.buffer.slice(blank.index + blank[0].length);
                if (record !== '') return record;
                continue;
            }

            if (this.done) {
                const rest = this.takeRemainder();
                return rest === null ? null : rest.replace(/\n+$/, '');
            }
            await this.fill();
        }
    }

    private takeRemainder(): string | null {
        if (this.buffer === '') return null;
        const rest = this.buffer;
        this.buffer = '';
        return rest;
    }

    private async fill(): Promise<void> {
        let result: IteratorResult<InputChunk>;
        try {
            result = await this.iterator.next();
        } catch (err) {
            throw toIOError(this.source.name, err);
        }

        if (result.done) {
            this.buffer += this.decoder.decode();
            this.done = true;
            return;
        }

        const chunk = result.value;
        this.buffer += typeof chunk === 'string' ? chunk : this.decoder.decode(chunk, { stream: true });
    }

    async close(): Promise<void> {
        if (!this.done) {
            this.done = true;
            await this.iterator.return?.();
        }
    }
}

function toIOError(name: string, err: unknown): RuntimeIOError {
    const cause = err instanceof Error ? err : new Error(String(err));
    const label = name === '' ? 'standard input' : name;
    return new RuntimeIOError(`cannot read ${label}: ${cause.message}`, name, cause);
}

/**
 * Main-input reader: walks the operands in order and yields records
 */
export class RecordReader {
    private index = 0;
    private cursor: SourceCursor | null = null;
    private pendingNewSource = false;
    private exhausted = false;

    constructor(
        private readonly operands: InputOperand[],
        private readonly hooks: ReaderHooks
    ) {}

    async next(): Promise<RecordEvent | null> {
        while (!this.exhausted) {
            if (!this.cursor) {
                if (!this.advance()) {
                    this.exhausted = true;
                    return null;
                }
                continue;
            }

            const record = await this.cursor.nextRecord(this.hooks.recordSeparator());
            if (record !== null) {
                const newSource = this.pendingNewSource;
                this.pendingNewSource = false;
                return { record, newSource, filename: this.cursor.source.name };
            }

            await this.cursor.close();
            this.cursor = null;
        }
        return null;
    }

    /**
     * Move to the next source, applying assignments on the way
     */
    private advance(): boolean {
        while (this.index < this.operands.length) {
            const operand = this.operands[this.index++];
            if (operand.kind === 'assignment') {
                this.hooks.assign(operand.name, operand.value);
                continue;
            }
            this.cursor = new SourceCursor(operand);
            this.pendingNewSource = true;
            return true;
        }
        return false;
    }

    async close(): Promise<void> {
        await this.cursor?.close();
        this.cursor = null;
        this.exhausted = true;
    }
}

/**
 * Reader for `getline < file`: one source, no operand handling
 */
export class FileRecordReader {
    private cursor: SourceCursor;

    constructor(source: InputSource) {
        this.cursor = new SourceCursor(source);
    }

    async next(rs: string): Promise<string | null> {
        return this.cursor.nextRecord(rs);
    }

    async close(): Promise<void> {
        await this.cursor.close();
    }
}
