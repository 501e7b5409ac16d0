/**
 * AI Functions
 *
 * The ai_* family callable from AWK programs. Each function builds a
 * prompt, asks the provider, and normalizes the answer into a string the
 * program can use. Provider failures propagate to the foreign-function
 * boundary, which substitutes "".
 */

import {
    createForeignRegistry,
    type ForeignArg,
    type ForeignFunction,
    type ForeignRegistry,
} from '../awk/foreign.js';
import { DEFAULT_AI_TIMEOUT_MS, type AIProvider } from './providers.js';

export type AIRegistryOptions = {
    timeoutMs?: number;
};

export const DEFAULT_SUMMARY_WORDS = 50;

type Handler = (provider: AIProvider, args: ForeignArg[], signal?: AbortSignal) => Promise<string>;

type Definition = {
    minArgs: number;
    maxArgs: number;
    handler: Handler;
};

function text(arg: ForeignArg | undefined): string {
    return arg === undefined ? '' : String(arg);
}

/**
 * First category mentioned in the answer, else the first category offered
 */
export function pickCategory(answer: string, categories: string): string {
    const offered = categories.split(',').map((c) => c.trim());
    const lower = answer.toLowerCase();
    return offered.find((c) => c !== '' && lower.includes(c.toLowerCase())) ?? offered[0];
}

export function pickSentiment(answer: string): string {
    const lower = answer.toLowerCase();
    if (lower.includes('positive')) return 'positive';
    if (lower.includes('negative')) return 'negative';
    return 'neutral';
}

/**
 * First number in the answer, "0" when there is none
 */
export function pickNumber(answer: string): string {
    const match = /-?\d+(?:\.\d+)?/.exec(answer);
    return match ? String(Number(match[0])) : '0';
}

/**
 * Substitute `{0}`, `{1}`... by position, then fill the remaining named
 * placeholders with the arguments in order
 */
export function fillTemplate(template: string, args: ForeignArg[]): string {
    let filled = template;
    args.forEach((arg, i) => {
        filled = filled.split(`{${i}}`).join(text(arg));
    });

    const named = Array.from(filled.matchAll(/\{(\w+)\}/g), (m) => m[1]);
    named.slice(0, args.length).forEach((name, i) => {
        filled = filled.split(`{${name}}`).join(text(args[i]));
    });
    return filled;
}

const DEFINITIONS: Record<string, Definition> = {
    ai_sentiment: {
        minArgs: 1,
        maxArgs: 1,
        handler: async (provider, [input], signal) => pickSentiment(
            await provider.complete(`Analyze sentiment: positive, negative, or neutral?\n\nText: ${text(input)}`, 10, signal)
        ),
    },
    ai_classify: {
        minArgs: 2,
        maxArgs: 2,
        handler: async (provider, [input, categories], signal) => pickCategory(
            await provider.complete(`Classify into: ${text(categories)}\n\nText: ${text(input)}`, 20, signal),
            text(categories)
        ),
    },
    ai_translate: {
        minArgs: 2,
        maxArgs: 2,
        handler: (provider, [input, language], signal) =>
            provider.complete(`Translate to ${text(language)}: ${text(input)}`, 100, signal),
    },
    ai_summarize: {
        minArgs: 1,
        maxArgs: 2,
        handler: (provider, [input, maxWords], signal) => {
            const words = maxWords === undefined ? DEFAULT_SUMMARY_WORDS : Math.max(1, Math.trunc(Number(maxWords)) || DEFAULT_SUMMARY_WORDS);
            return provider.complete(`Summarize in ${words} words: ${text(input)}`, words * 2, signal);
        },
    },
    ai_entity_extract: {
        minArgs: 2,
        maxArgs: 2,
        handler: (provider, [input, type], signal) =>
            provider.complete(`Extract ${text(type)} entities: ${text(input)}`, 100, signal),
    },
    ai_fact_check: {
        minArgs: 1,
        maxArgs: 1,
        handler: async (provider, [statement], signal) => {
            const answer = await provider.complete(`Is this true or false? ${text(statement)}`, 10, signal);
            return answer.toLowerCase().includes('true') ? 'true' : 'false';
        },
    },
    ai_extract_info: {
        minArgs: 2,
        maxArgs: 2,
        handler: (provider, [input, what], signal) =>
            provider.complete(`Extract ${text(what)}: ${text(input)}`, 50, signal),
    },
    ai_math_word_problem: {
        minArgs: 1,
        maxArgs: 1,
        handler: async (provider, [problem], signal) =>
            pickNumber(await provider.complete(`Solve (number only): ${text(problem)}`, 20, signal)),
    },
    ai_generate: {
        minArgs: 1,
        maxArgs: Number.MAX_SAFE_INTEGER,
        handler: (provider, [template, ...rest], signal) =>
            provider.complete(`Generate: ${fillTemplate(text(template), rest)}`, 100, signal),
    },
};

export const AI_FUNCTION_NAMES = Object.keys(DEFINITIONS);

export function createAIFunctions(provider: AIProvider): ForeignFunction[] {
    return Object.entries(DEFINITIONS).map(([name, def]): ForeignFunction => ({
        name,
        minArgs: def.minArgs,
        maxArgs: def.maxArgs,
        invoke: (args, signal) => def.handler(provider, args, signal),
    }));
}

export function createAIRegistry(provider: AIProvider, options: AIRegistryOptions = {}): ForeignRegistry {
    return createForeignRegistry(createAIFunctions(provider), { timeoutMs: options.timeoutMs ?? DEFAULT_AI_TIMEOUT_MS });
}
