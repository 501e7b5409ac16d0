/**
 * Standalone Logger Utility
 *
 * Provides consistent logging with environment-aware formatting.
 * Everything goes to stderr: stdout belongs to the AWK program.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_ORDER;
}

export type LogSink = (line: string) => void;

export class Logger {
    private level: LogLevel;
    private sink: LogSink;

    constructor(level: LogLevel = 'warn', sink: LogSink = (line) => console.error(line)) {
        this.level = level;
        this.sink = sink;
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    getLevel(): LogLevel {
        return this.level;
    }

    /**
     * Replace the output sink (tests capture log lines this way)
     */
    setSink(sink: LogSink): void {
        this.sink = sink;
    }

    debug(message: string, meta?: Record<string, unknown>) {
        this.emit('debug', 'DEBUG', message, meta);
    }

    info(message: string, meta?: Record<string, unknown>) {
        this.emit('info', 'INFO', message, meta);
    }

    warn(message: string, meta?: Record<string, unknown>) {
        this.emit('warn', 'WARN', message, meta);
    }

    /**
     * Log failure message with context
     */
    fail(message: string, meta?: Record<string, unknown>) {
        this.emit('error', 'FAIL', message, meta);
    }

    error(message: string, meta?: Record<string, unknown>) {
        this.emit('error', 'ERROR', message, meta);
    }

    /**
     * Log timing data with calculated elapsed time using hrtime precision
     * Takes start time from process.hrtime.bigint() and calculates duration
     */
    time(label: string, startTime: bigint, meta: Record<string, unknown> = {}): void {
        const endTime = process.hrtime.bigint();
        const durationMs = Number(endTime - startTime) / 1_000_000;
        this.emit('debug', 'TIME', `${label} ${durationMs}ms`, meta);
    }

    private emit(level: LogLevel, label: string, message: string, meta?: Record<string, unknown>): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
            return;
        }
        this.sink(this.formatLog(label, message, meta));
    }

    /**
     * Format log message with environment-aware output
     */
    private formatLog(label: string, message: string, meta?: Record<string, unknown>): string {
        if (process.env.NODE_ENV === 'production') {
            // Structured JSON for production log aggregation
            return JSON.stringify({
                timestamp: new Date().toISOString(),
                level: label,
                message,
                ...(meta && { meta }),
            });
        }

        const metaStr = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${label} ${message}${metaStr}`;
    }
}

/**
 * Global logger instance for the command layer and collaborators
 */
export const logger = new Logger();
