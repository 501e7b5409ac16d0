/**
 * AI Providers
 *
 * Each provider turns a prompt into a text completion. HTTP providers go
 * through an injectable fetch so tests can stand in for the services.
 * Failures are thrown; the foreign-function boundary turns them into "".
 */

import { logger } from '../logger.js';
import { simulateCompletion } from './simulated.js';

const ANTHROPIC_API_URL = 'https://api.anthropic.com/v1/messages';
const OPENAI_API_URL = 'https://api.openai.com/v1/chat/completions';
const GEMINI_API_URL = 'https://generativelanguage.googleapis.com/v1beta/models';

// =============================================================================
// Types
// =============================================================================

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface AIProvider {
    readonly name: ProviderName;
    complete(prompt: string, maxTokens: number, signal?: AbortSignal): Promise<string>;
}

export const PROVIDER_NAMES = ['anthropic', 'openai', 'gemini', 'local', 'simulated'] as const;

export type ProviderName = typeof PROVIDER_NAMES[number];

export function isProviderName(value: string): value is ProviderName {
    return PROVIDER_NAMES.some((name) => name === value);
}

export type ApiCredentials = {
    apiKey?: string;
    model: string;
};

/**
 * Provider settings as read from configuration
 */
export type ProviderConfig = {
    /** Explicit choice; auto-detected from credentials when omitted */
    provider?: string;
    timeoutMs: number;
    anthropic: ApiCredentials;
    openai: ApiCredentials;
    gemini: ApiCredentials;
    local: { url?: string; model: string };
};

// =============================================================================
// Default Configuration
// =============================================================================

export const DEFAULT_AI_TIMEOUT_MS = 10000;

export const DEFAULT_MODELS = {
    anthropic: 'claude-3-haiku-20240307',
    openai: 'gpt-3.5-turbo',
    gemini: 'gemini-1.5-flash',
    local: 'llama2',
} as const;

export const DEFAULT_LOCAL_URL = 'http://localhost:11434';

// =============================================================================
// Response helpers
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Follow keys and indexes into a parsed JSON body
 */
function pick(value: unknown, ...path: Array<string | number>): unknown {
    let current = value;
    for (const key of path) {
        if (typeof key === 'number') {
            current = Array.isArray(current) ? current[key] : undefined;
        } else {
            current = isRecord(current) ? current[key] : undefined;
        }
    }
    return current;
}

function requireText(value: unknown, provider: ProviderName): string {
    if (typeof value !== 'string') {
        throw new Error(`${provider} response contained no text`);
    }
    return value.trim();
}

async function postJson(
    fetchImpl: FetchLike,
    url: string,
    headers: Record<string, string>,
    body: unknown,
    signal?: AbortSignal
): Promise<unknown> {
    const response = await fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...headers },
        body: JSON.stringify(body),
        signal,
    });

    if (!response.ok) {
        const error = await response.text();
        throw new Error(`AI API error ${response.status}: ${error}`);
    }

    return response.json();
}

function requireKey(credentials: ApiCredentials, provider: ProviderName, variable: string): string {
    if (!credentials.apiKey) {
        throw new Error(`${variable} not configured for ${provider}`);
    }
    return credentials.apiKey;
}

// =============================================================================
// Providers
// =============================================================================

export class AnthropicProvider implements AIProvider {
    readonly name = 'anthropic';

    constructor(
        private readonly credentials: ApiCredentials,
        private readonly fetchImpl: FetchLike = fetch
    ) {}

    async complete(prompt: string, maxTokens: number, signal?: AbortSignal): Promise<string> {
        const apiKey = requireKey(this.credentials, this.name, 'ANTHROPIC_API_KEY');
        const result = await postJson(this.fetchImpl, ANTHROPIC_API_URL, {
            'x-api-key': apiKey,
            'anthropic-version': '2023-06-01',
        }, {
            model: this.credentials.model,
            max_tokens: maxTokens,
            messages: [{ role: 'user', content: prompt }],
        }, signal);

        const blocks = pick(result, 'content');
        const textBlock = Array.isArray(blocks)
            ? blocks.find((b) => pick(b, 'type') === 'text')
            : undefined;
        return requireText(pick(textBlock, 'text'), this.name);
    }
}

export class OpenAIProvider implements AIProvider {
    readonly name = 'openai';

    constructor(
        private readonly credentials: ApiCredentials,
        private readonly fetchImpl: FetchLike = fetch
    ) {}

    async complete(prompt: string, maxTokens: number, signal?: AbortSignal): Promise<string> {
        const apiKey = requireKey(this.credentials, this.name, 'OPENAI_API_KEY');
        const result = await postJson(this.fetchImpl, OPENAI_API_URL, {
            Authorization: `Bearer ${apiKey}`,
        }, {
            model: this.credentials.model,
            max_tokens: maxTokens,
            messages: [{ role: 'user', content: prompt }],
        }, signal);

        return requireText(pick(result, 'choices', 0, 'message', 'content'), this.name);
    }
}

export class GeminiProvider implements AIProvider {
    readonly name = 'gemini';

    constructor(
        private readonly credentials: ApiCredentials,
        private readonly fetchImpl: FetchLike = fetch
    ) {}

    async complete(prompt: string, maxTokens: number, signal?: AbortSignal): Promise<string> {
        const apiKey = requireKey(this.credentials, this.name, 'GEMINI_API_KEY');
        const url = `${GEMINI_API_URL}/${encodeURIComponent(this.credentials.model)}:generateContent`;
        const result = await postJson(this.fetchImpl, url, {
            'x-goog-api-key': apiKey,
        }, {
            contents: [{ parts: [{ text: prompt }] }],
            generationConfig: { maxOutputTokens: maxTokens, temperature: 0.7 },
        }, signal);

        return requireText(pick(result, 'candidates', 0, 'content', 'parts', 0, 'text'), this.name);
    }
}

/**
 * Local model server speaking the Ollama generate API
 */
export class LocalProvider implements AIProvider {
    readonly name = 'local';

    constructor(
        private readonly baseUrl: string,
        private readonly model: string,
        private readonly fetchImpl: FetchLike = fetch
    ) {}

    async complete(prompt: string, maxTokens: number, signal?: AbortSignal): Promise<string> {
        const url = `${this.baseUrl.replace(/\/+$/, '')}/api/generate`;
        const result = await postJson(this.fetchImpl, url, {}, {
            model: this.model,
            prompt,
            stream: false,
            options: { num_predict: maxTokens },
        }, signal);

        return requireText(pick(result, 'response'), this.name);
    }
}

/**
 * Keyword heuristics; never touches the network
 */
export class SimulatedProvider implements AIProvider {
    readonly name = 'simulated';

    async complete(prompt: string): Promise<string> {
        return simulateCompletion(prompt);
    }
}

// =============================================================================
// Selection
// =============================================================================

/**
 * Provider named by config.provider, else the first one with credentials,
 * else the simulated provider
 */
export function selectProvider(config: ProviderConfig, fetchImpl: FetchLike = fetch): AIProvider {
    const requested = config.provider?.toLowerCase();

    if (requested) {
        if (isProviderName(requested)) {
            return createProvider(requested, config, fetchImpl);
        }
        logger.warn('Unknown AI provider, detecting from credentials', { provider: config.provider });
    }

    if (config.anthropic.apiKey) return createProvider('anthropic', config, fetchImpl);
    if (config.openai.apiKey) return createProvider('openai', config, fetchImpl);
    if (config.gemini.apiKey) return createProvider('gemini', config, fetchImpl);
    if (config.local.url) return createProvider('local', config, fetchImpl);

    return new SimulatedProvider();
}

export function createProvider(name: ProviderName, config: ProviderConfig, fetchImpl: FetchLike = fetch): AIProvider {
    switch (name) {
        case 'anthropic':
            return new AnthropicProvider(config.anthropic, fetchImpl);
        case 'openai':
            return new OpenAIProvider(config.openai, fetchImpl);
        case 'gemini':
            return new GeminiProvider(config.gemini, fetchImpl);
        case 'local':
            return new LocalProvider(config.local.url ?? DEFAULT_LOCAL_URL, config.local.model, fetchImpl);
        case 'simulated':
            return new SimulatedProvider();
    }
}
