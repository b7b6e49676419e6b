/**
 * Provider registry for llm-unify.
 *
 * Maps lowercase provider names to adapter constructors and hands out
 * (optionally cached) instances.
 */

import type { BaseProvider, ProviderConstructor } from './providers/base.js';
import { ChutesProvider } from './providers/chutes.js';
import { FireworksProvider } from './providers/fireworks.js';
import { GoogleProvider } from './providers/google.js';
import { MoonshotProvider } from './providers/moonshot.js';
import { OpenAIProvider } from './providers/openai.js';
import { OpenRouterProvider } from './providers/openrouter.js';
import { TNGTechProvider } from './providers/tngtech.js';
import { XAIProvider } from './providers/xai.js';
import type { LLMProviderType, ParsedModel, ProviderConfig } from './types.js';
import { InvalidOptionError, UnsupportedProviderError } from './errors.js';

/**
 * Registry of provider constructors.
 */
const providerRegistry = new Map<string, ProviderConstructor>();

/**
 * Alternate names resolved before lookup.
 */
const providerAliases = new Map<string, string>([['gemini', 'google']]);

/**
 * Cache of provider instances (for reuse).
 */
const providerCache = new Map<string, BaseProvider>();

function normalize(name: string): string {
  const lower = name.trim().toLowerCase();
  return providerAliases.get(lower) ?? lower;
}

/**
 * Register a provider.
 *
 * @param name - Provider identifier
 * @param constructor - Provider constructor
 */
export function registerProvider(name: string, constructor: ProviderConstructor): void {
  providerRegistry.set(name.toLowerCase(), constructor);
}

/**
 * Get a registered provider constructor.
 *
 * @returns The provider constructor, or undefined if not found
 */
export function getProviderConstructor(name: string): ProviderConstructor | undefined {
  return providerRegistry.get(normalize(name));
}

/**
 * Check if a provider (or an alias of one) is registered.
 */
export function hasProvider(name: string): boolean {
  return providerRegistry.has(normalize(name));
}

/**
 * Get all registered provider names, aliases excluded.
 */
export function getRegisteredProviders(): string[] {
  return Array.from(providerRegistry.keys());
}

/**
 * Create a provider instance.
 *
 * @param name - Provider identifier or alias
 * @param config - Provider configuration
 * @param useCache - Whether to reuse an instance built from the same config (default: false)
 * @throws UnsupportedProviderError if provider is not registered
 */
export function createProvider(
  name: LLMProviderType | string,
  config: ProviderConfig = {},
  useCache: boolean = false,
): BaseProvider {
  const normalizedName = normalize(name);
  const cacheKey = `${normalizedName}:${JSON.stringify(config)}`;

  if (useCache) {
    const cached = providerCache.get(cacheKey);
    if (cached) {
      return cached;
    }
  }

  const Constructor = providerRegistry.get(normalizedName);
  if (!Constructor) {
    throw new UnsupportedProviderError(name, getRegisteredProviders());
  }

  const provider = new Constructor(config);

  if (useCache) {
    providerCache.set(cacheKey, provider);
  }

  return provider;
}

/**
 * Get a shared adapter for a provider name.
 *
 * @throws UnsupportedProviderError if provider is not registered
 */
export function getProvider(name: LLMProviderType | string, config?: ProviderConfig): BaseProvider {
  return createProvider(name, config, true);
}

/**
 * Clear the provider cache.
 */
export function clearProviderCache(): void {
  providerCache.clear();
}

/**
 * Parse a model string into provider and model parts.
 *
 * Supports formats:
 * - "provider:model" (recommended)
 * - "provider/model"
 * - "model" (requires separate provider parameter)
 *
 * A prefix only counts when it names a registered provider, so
 * "deepseek/deepseek-chat:free" is left alone.
 *
 * @returns Parsed model parts, or null if no provider prefix
 */
export function parseModelString(model: string): ParsedModel | null {
  for (const separator of [':', '/']) {
    const index = model.indexOf(separator);
    if (index === -1) continue;

    const potentialProvider = model.substring(0, index);
    const modelId = model.substring(index + 1);
    if (modelId && hasProvider(potentialProvider)) {
      return { provider: normalize(potentialProvider), model: modelId };
    }
  }

  return null;
}

/**
 * Resolve provider and model from request parameters.
 *
 * @param model - Model string (may include provider prefix)
 * @param provider - Explicit provider (optional)
 * @throws InvalidOptionError if provider cannot be determined
 */
export function resolveProviderAndModel(
  model: string,
  provider?: LLMProviderType | string,
): ParsedModel {
  if (provider) {
    return {
      provider: normalize(provider),
      model,
    };
  }

  const parsed = parseModelString(model);
  if (parsed) {
    return parsed;
  }

  throw new InvalidOptionError(
    `Cannot determine provider for model '${model}'. ` +
    `Use 'provider:model' format or pass explicit provider parameter.`,
  );
}

/**
 * Get a provider instance, resolving from model string if needed.
 *
 * @returns Object with provider instance and resolved model name
 */
export function getProviderForModel(
  model: string,
  provider?: LLMProviderType | string,
  config?: ProviderConfig,
): { provider: BaseProvider; model: string } {
  const resolved = resolveProviderAndModel(model, provider);
  return {
    provider: createProvider(resolved.provider, config),
    model: resolved.model,
  };
}

// =============================================================================
// Built-in Providers
// =============================================================================

registerProvider('openai', OpenAIProvider);
registerProvider('openrouter', OpenRouterProvider);
registerProvider('fireworks', FireworksProvider);
registerProvider('chutes', ChutesProvider);
registerProvider('google', GoogleProvider);
registerProvider('xai', XAIProvider);
registerProvider('moonshot', MoonshotProvider);
registerProvider('tngtech', TNGTechProvider);
