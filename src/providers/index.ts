/**
 * Provider exports for llm-unify.
 */

export { BaseProvider, type ProviderCall, type ProviderConstructor } from './base.js';
export { OpenAIProvider, OpenAICompatibleProvider } from './openai.js';
export { OpenRouterProvider } from './openrouter.js';
export { FireworksProvider } from './fireworks.js';
export { ChutesProvider } from './chutes.js';
export { GoogleProvider, normalizeFinishReason } from './google.js';
export { XAIProvider } from './xai.js';
export { MoonshotProvider } from './moonshot.js';
export { TNGTechProvider } from './tngtech.js';
