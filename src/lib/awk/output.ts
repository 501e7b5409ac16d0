/**
 * AWK Output
 *
 * Buffers standard output and owns the files opened by print/printf
 * redirection. A file opened with ">" is truncated the first time it is
 * used in a run; later writes append until it is closed.
 */

import { open, type FileHandle } from 'node:fs/promises';
import { RuntimeIOError } from '../errors/awk-error.js';

export type OutputWriter = (text: string) => void | Promise<void>;

export type RedirectMode = 'truncate' | 'append';

export type OutputTarget = {
    mode: RedirectMode;
    path: string;
};

const DEFAULT_BUFFER_LIMIT = 64 * 1024;

export class OutputManager {
    private buffer: string[] = [];
    private buffered = 0;
    private files = new Map<string, FileHandle>();

    constructor(
        private readonly stdout: OutputWriter,
        private readonly stderr: OutputWriter,
        private readonly bufferLimit: number = DEFAULT_BUFFER_LIMIT
    ) {}

    async write(text: string, target: OutputTarget | null = null): Promise<void> {
        if (target === null || target.path === '/dev/stdout' || target.path === '-') {
            this.buffer.push(text);
            this.buffered += text.length;
            if (this.buffered >= this.bufferLimit) {
                await this.flushStdout();
            }
            return;
        }

        if (target.path === '/dev/stderr') {
            // Keep stdout and stderr in program order
            await this.flushStdout();
            await this.stderr(text);
            return;
        }

        const handle = await this.handleFor(target);
        try {
            await handle.write(text);
        } catch (err) {
            throw ioError(`cannot write to "${target.path}"`, target.path, err);
        }
    }

    /**
     * fflush(): everything; fflush(name): stdout or one open file.
     * Returns 0 on success, -1 when the name is not an open output.
     */
    async flush(name?: string): Promise<number> {
        if (name === undefined || name === '/dev/stdout' || name === '-') {
            await this.flushStdout();
            if (name === undefined) {
                for (const handle of this.files.values()) {
                    await handle.sync();
                }
            }
            return 0;
        }

        if (name === '/dev/stderr') {
            return 0;
        }

        const handle = this.files.get(name);
        if (!handle) {
            return -1;
        }
        await handle.sync();
        return 0;
    }

    /**
     * Close one redirection target. Returns 0 when it was open, -1 otherwise.
     */
    async close(name: string): Promise<number> {
        const handle = this.files.get(name);
        if (!handle) {
            return -1;
        }
        this.files.delete(name);
        await handle.close();
        return 0;
    }

    isOpen(name: string): boolean {
        return this.files.has(name);
    }

    async closeAll(): Promise<void> {
        await this.flushStdout();
        const handles = Array.from(this.files.values());
        this.files.clear();
        for (const handle of handles) {
            await handle.close();
        }
    }

    private async flushStdout(): Promise<void> {
        if (this.buffer.length === 0) {
            return;
        }
        const text = this.buffer.join('');
        this.buffer = [];
        this.buffered = 0;
        await this.stdout(text);
    }

    private async handleFor(target: OutputTarget): Promise<FileHandle> {
        const existing = this.files.get(target.path);
        if (existing) {
            return existing;
        }

        let handle: FileHandle;
        try {
            handle = await open(target.path, target.mode === 'append' ? 'a' : 'w');
        } catch (err) {
            throw ioError(`cannot open "${target.path}" for output`, target.path, err);
        }
        this.files.set(target.path, handle);
        return handle;
    }
}

function ioError(message: string, path: string, err: unknown): RuntimeIOError {
    const cause = err instanceof Error ? err : new Error(String(err));
    return new RuntimeIOError(`${message}: ${cause.message}`, path, cause);
}
