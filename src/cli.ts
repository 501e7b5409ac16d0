#!/usr/bin/env node
/**
 * aiawk command-line entry point
 *
 * Runs the awk command on the process's standard streams with the AI
 * functions registered.
 */

import { createAIRegistry, selectProvider } from './lib/ai/index.js';
import { AwkEnv } from './lib/awk-env.js';
import { createAwkCommand } from './lib/commands/awk.js';
import { logger } from './lib/logger.js';

async function main(): Promise<number> {
    AwkEnv.load();
    logger.setLevel(AwkEnv.getLogLevel());

    const config = AwkEnv.getProviderConfig();
    const provider = selectProvider(config);
    logger.debug('AI provider selected', { provider: provider.name, timeoutMs: config.timeoutMs });

    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());

    const awk = createAwkCommand({
        foreign: createAIRegistry(provider, { timeoutMs: config.timeoutMs }),
        environ: process.env,
    });

    return awk(process.argv.slice(2), {
        stdin: process.stdin,
        stdout: process.stdout,
        stderr: process.stderr,
        signal: controller.signal,
    });
}

main().then(
    (status) => {
        process.exitCode = status;
    },
    (error: unknown) => {
        logger.fail('aiawk failed', { error: error instanceof Error ? error.message : String(error) });
        process.exitCode = 2;
    }
);
