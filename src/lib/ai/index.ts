export {
    AnthropicProvider, OpenAIProvider, GeminiProvider, LocalProvider, SimulatedProvider,
    selectProvider, createProvider, isProviderName,
    DEFAULT_AI_TIMEOUT_MS, DEFAULT_MODELS, DEFAULT_LOCAL_URL, PROVIDER_NAMES,
    type AIProvider, type FetchLike, type ProviderConfig, type ProviderName, type ApiCredentials,
} from './providers.js';
export {
    createAIFunctions, createAIRegistry, fillTemplate, pickCategory, pickNumber, pickSentiment,
    AI_FUNCTION_NAMES, DEFAULT_SUMMARY_WORDS, type AIRegistryOptions,
} from './functions.js';
export { simulateCompletion } from './simulated.js';
