/**
 * AWK Record and Fields
 *
 * Holds the current record and its fields and keeps the two consistent:
 * assigning a field rebuilds $0 with OFS, assigning $0 re-splits it
 * with the current FS.
 */

import { AwkTypeError } from '../errors/awk-error.js';
import type { RegexCache } from './regex.js';
import { UNINIT, fromInput, toStr, type AwkValue } from './value.js';

/**
 * Separator settings the engine reads at the moment it splits or joins
 */
export type SeparatorSource = {
    fieldSeparator(): string;
    outputFieldSeparator(): string;
    convfmt(): string;
    /** Paragraph mode (RS == ""): newline also separates fields */
    paragraphMode(): boolean;
};

const DEFAULT_FS_SPLIT = /[ \t\n]+/;

/**
 * Split text into fields following FS rules:
 * " " splits on blank runs and trims, "" splits into characters,
 * any other single character is literal, longer separators are regexes.
 */
export function splitFields(text: string, fs: string, regexes: RegexCache, paragraphMode = false): string[] {
    if (fs === ' ') {
        const trimmed = text.replace(/^[ \t\n]+|[ \t\n]+$/g, '');
        return trimmed === '' ? [] : trimmed.split(DEFAULT_FS_SPLIT);
    }

    if (text === '') {
        return [];
    }

    if (fs === '') {
        return Array.from(text);
    }

    let parts: string[];
    if (fs.length === 1 && fs !== '\\') {
        parts = text.split(fs);
    } else {
        parts = regexSplit(text, regexes.compileGlobal(fs));
    }

    if (paragraphMode) {
        parts = parts.flatMap((part) => part.split('\n'));
    }

    return parts;
}

/**
 * Split on every non-empty match of a global regex; capture groups are
 * not spliced into the result
 */
export function regexSplit(text: string, re: RegExp): string[] {
    const parts: string[] = [];
    let last = 0;
    re.lastIndex = 0;

    let m: RegExpExecArray | null;
    while ((m = re.exec(text)) !== null) {
        if (m[0] === '') {
            re.lastIndex++;
            continue;
        }
        parts.push(text.slice(last, m.index));
        last = m.index + m[0].length;
    }

    parts.push(text.slice(last));
    return parts;
}

export class RecordState {
    private record = '';
    private fields: AwkValue[] = [];

    constructor(
        private readonly separators: SeparatorSource,
        private readonly regexes: RegexCache
    ) {}

    /**
     * Replace the current record and split it with the active FS
     */
    setRecord(raw: string): void {
        this.record = raw;
        this.fields = splitFields(
            raw,
            this.separators.fieldSeparator(),
            this.regexes,
            this.separators.paragraphMode()
        ).map(fromInput);
    }

    get nf(): number {
        return this.fields.length;
    }

    /**
     * Field i, where 0 is the whole record. Reading past NF yields an
     * uninitialized value and does not extend the record.
     */
    getField(i: number): AwkValue {
        const index = this.checkIndex(i);
        if (index === 0) {
            return fromInput(this.record);
        }
        return this.fields[index - 1] ?? UNINIT;
    }

    setField(i: number, value: AwkValue): void {
        const index = this.checkIndex(i);
        if (index === 0) {
            this.setRecord(toStr(value, this.separators.convfmt()));
            return;
        }

        while (this.fields.length < index) {
            this.fields.push(UNINIT);
        }
        this.fields[index - 1] = value;
        this.rebuild();
    }

    /**
     * Assign NF: truncate or pad with empty fields, then rebuild $0
     */
    setNF(n: number): void {
        const count = Math.trunc(n);
        if (count < 0) {
            throw new AwkTypeError(`NF set to negative value ${count}`);
        }

        if (count < this.fields.length) {
            this.fields.length = count;
        } else {
            while (this.fields.length < count) {
                this.fields.push(UNINIT);
            }
        }
        this.rebuild();
    }

    get text(): string {
        return this.record;
    }

    private rebuild(): void {
        const convfmt = this.separators.convfmt();
        this.record = this.fields
            .map((field) => toStr(field, convfmt))
            .join(this.separators.outputFieldSeparator());
    }

    private checkIndex(i: number): number {
        const index = Math.trunc(i);
        if (!Number.isFinite(index) || index < 0) {
            throw new AwkTypeError(`attempt to access field ${i}`);
        }
        return index;
    }
}
