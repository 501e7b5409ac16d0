/**
 * aiawk - an AWK interpreter with AI functions
 */

export * from './lib/awk/index.js';
export * from './lib/ai/index.js';
export {
    AwkError, LexError, ParseError, NameError, AwkTypeError, RuntimeIOError,
    AwkRuntimeError, ForeignCallError, FATAL_EXIT_STATUS, type SourcePosition,
} from './lib/errors/awk-error.js';
export { AwkEnv } from './lib/awk-env.js';
export { Logger, logger, type LogLevel } from './lib/logger.js';
export { createAwkCommand, awk, type AwkCommandOptions } from './lib/commands/awk.js';
export { parseArgs, type CommandHandler, type CommandIO } from './lib/commands/shared.js';
