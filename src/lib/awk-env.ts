import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import path from 'node:path';
import { load as decodeYaml } from 'js-yaml';
import { DEFAULT_AI_TIMEOUT_MS, DEFAULT_MODELS, type ProviderConfig } from './ai/providers.js';
import { isLogLevel, logger, type LogLevel } from './logger.js';

/**
 * Configuration file paths in order of precedence
 */
export function defaultConfigPaths(): string[] {
    const userDir = path.join(homedir(), '.config/aiawk');
    return [
        './.config/aiawk/env.json',  // Project environment (current directory)
        './.config/aiawk/env.yaml',
        path.join(userDir, 'env.json'),  // User environment
        path.join(userDir, 'env.yaml'),
    ];
}

/**
 * AwkEnv - Configuration management for aiawk
 *
 * Loads environment configuration from the first config file found:
 * 1. ./.config/aiawk/env.json or env.yaml (current directory)
 * 2. ~/.config/aiawk/env.json or env.yaml (user environment)
 * 3. process.env (system environment variables)
 *
 * Values from the file never override variables already set in the
 * environment.
 */
export class AwkEnv {
    private static loaded = false;
    private static source: string | null = null;

    /**
     * Load configuration into process.env. Safe to call multiple times;
     * only the first call reads files.
     */
    static load(configPaths: string[] = defaultConfigPaths()): void {
        if (this.loaded) {
            return;
        }
        this.loaded = true;

        for (const configPath of configPaths) {
            const configData = readConfigFile(configPath);
            if (configData === undefined) {
                continue;
            }

            // Validate config is an object
            if (typeof configData !== 'object' || configData === null || Array.isArray(configData)) {
                logger.warn('Invalid aiawk configuration - not an object', { configPath });
                continue;
            }

            let loadedCount = 0;
            for (const [key, value] of Object.entries(configData)) {
                if (process.env[key] === undefined && value !== null && value !== undefined) {
                    process.env[key] = String(value);
                    loadedCount++;
                }
            }

            logger.info('Loaded aiawk configuration', { configPath, variableCount: loadedCount });
            this.source = configPath;
            return;
        }

        logger.debug('No aiawk configuration found, using environment variables');
    }

    /**
     * Forget what load() did so the next call reads files again
     */
    static reset(): void {
        this.loaded = false;
        this.source = null;
    }

    /**
     * Get configuration value with required validation
     * @throws Error if required=true and key not found
     */
    static get(key: string, defaultValue?: string, required: boolean = false): string {
        this.load();

        const value = process.env[key] || defaultValue;

        if (required && !value) {
            throw new Error(
                `${key} not found in configuration. ` +
                `Ensure ~/.config/aiawk/env.json contains ${key}.`
            );
        }

        return value || '';
    }

    /**
     * Numeric configuration value; the default is used when the value is
     * missing or not a finite number
     */
    static getNumber(key: string, defaultValue: number): number {
        const raw = this.get(key);
        if (raw === '') {
            return defaultValue;
        }
        const value = Number(raw);
        if (!Number.isFinite(value)) {
            logger.warn('Ignoring non-numeric configuration value', { key, value: raw });
            return defaultValue;
        }
        return value;
    }

    static getLogLevel(defaultLevel: LogLevel = 'warn'): LogLevel {
        const level = this.get('AIAWK_LOG_LEVEL').toLowerCase();
        return isLogLevel(level) ? level : defaultLevel;
    }

    static getProviderConfig(): ProviderConfig {
        const optional = (key: string) => this.get(key) || undefined;

        return {
            provider: optional('AIAWK_AI_PROVIDER'),
            timeoutMs: this.getNumber('AIAWK_AI_TIMEOUT_MS', DEFAULT_AI_TIMEOUT_MS),
            anthropic: {
                apiKey: optional('ANTHROPIC_API_KEY'),
                model: this.get('AIAWK_ANTHROPIC_MODEL', DEFAULT_MODELS.anthropic),
            },
            openai: {
                apiKey: optional('OPENAI_API_KEY'),
                model: this.get('AIAWK_OPENAI_MODEL', DEFAULT_MODELS.openai),
            },
            gemini: {
                apiKey: optional('GEMINI_API_KEY') ?? optional('GOOGLE_API_KEY'),
                model: this.get('AIAWK_GEMINI_MODEL', DEFAULT_MODELS.gemini),
            },
            local: {
                url: optional('AIAWK_LOCAL_URL'),
                model: this.get('AIAWK_LOCAL_MODEL', DEFAULT_MODELS.local),
            },
        };
    }

    /**
     * Path of the config file that was loaded, if any
     */
    static configSource(): string | null {
        return this.source;
    }
}

/**
 * Parsed file contents, or undefined when the file does not exist
 */
function readConfigFile(configPath: string): unknown {
    let content: string;
    try {
        content = readFileSync(configPath, 'utf8');
    } catch (error) {
        logger.debug('Configuration file not readable', {
            configPath,
            error: error instanceof Error ? error.message : String(error),
        });
        return undefined;
    }

    try {
        return /\.ya?ml$/.test(configPath) ? decodeYaml(content) : JSON.parse(content);
    } catch (error) {
        logger.warn('Invalid aiawk configuration - cannot parse', {
            configPath,
            error: error instanceof Error ? error.message : String(error),
        });
        return undefined;
    }
}
