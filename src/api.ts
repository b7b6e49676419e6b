/**
 * Main API for llm-unify.
 *
 * Provides both function-based and class-based interfaces. Every call goes
 * through the retry orchestrator and resolves to exactly one LLMResponse.
 */

import {
  createProvider,
  getProvider,
  getRegisteredProviders,
  hasProvider,
  parseModelString,
  resolveProviderAndModel,
} from './registry.js';
import type { BaseProvider } from './providers/base.js';
import { classifyError, InvalidOptionError } from './errors.js';
import { retryRequest, type RetryOptions } from './retry.js';
import {
  LLMResponse,
  type CanonicalRequest,
  type LLMProviderType,
  type ParsedModel,
  type ProviderConfig,
  type ProviderMetadata,
} from './types.js';

/**
 * Request for the direct `completion` function. `model_id` may carry a
 * `provider:` prefix instead of an explicit `provider`.
 */
export interface CompletionRequest extends CanonicalRequest {
  provider?: LLMProviderType | string;
  /** API key for this call (overrides environment) */
  api_key?: string;
  /** Base URL override for this call */
  api_base?: string;
}

// =============================================================================
// Direct API Functions
// =============================================================================

/**
 * Create a chat completion with retries.
 *
 * @example
 * ```typescript
 * const response = await completion({
 *   model_id: 'openrouter:deepseek/deepseek-chat',
 *   messages: [{ role: 'user', content: 'Hello!' }],
 *   allow_list: ['DeepInfra'],
 * });
 * if (response.success) console.log(response.standardized_response?.content);
 * ```
 *
 * A model that names no provider fails as `invalid_option` without any request.
 *
 * @throws UnsupportedProviderError for an unknown provider name
 */
export async function completion(request: CompletionRequest, options?: RetryOptions): Promise<LLMResponse> {
  const { provider: providerName, api_key, api_base, ...rest } = request;

  let resolved: ParsedModel;
  try {
    resolved = resolveProviderAndModel(rest.model_id, providerName);
  } catch (error) {
    if (error instanceof InvalidOptionError) {
      return LLMResponse.fail(classifyError(error), undefined, options?.context);
    }
    throw error;
  }

  const config: ProviderConfig = {};
  if (api_key) config.apiKey = api_key;
  if (api_base) config.baseUrl = api_base;

  // Per-call credentials get their own adapter; only the env-configured one is shared
  const provider = api_key || api_base ? createProvider(resolved.provider, config) : getProvider(resolved.provider);
  return retryRequest(provider, { ...rest, model_id: resolved.model }, options);
}

/**
 * Get the list of supported provider names.
 */
export function getSupportedProviders(): string[] {
  return getRegisteredProviders();
}

// =============================================================================
// Class-based API
// =============================================================================

/**
 * Client bound to one provider adapter.
 *
 * @example
 * ```typescript
 * const client = LLMClient.create('google', { apiKey: 'placeholder' });
 * const response = await client.completion({
 *   model_id: 'gemini-2.5-flash',
 *   messages: [{ role: 'user', content: 'Hello!' }],
 * });
 * ```
 */
export class LLMClient {
  private constructor(private readonly provider: BaseProvider) {}

  /**
   * Create a client for a provider.
   *
   * @throws UnsupportedProviderError for an unknown provider name
   */
  static create(provider: LLMProviderType | string, config?: ProviderConfig): LLMClient {
    return new LLMClient(createProvider(provider, config));
  }

  /**
   * Wrap an existing adapter instance.
   */
  static fromProvider(provider: BaseProvider): LLMClient {
    return new LLMClient(provider);
  }

  static getSupportedProviders(): string[] {
    return getRegisteredProviders();
  }

  static hasProvider(name: string): boolean {
    return hasProvider(name);
  }

  static parseModelString(model: string): ParsedModel | null {
    return parseModelString(model);
  }

  /**
   * Get the provider name.
   */
  get name(): string {
    return this.provider.PROVIDER_NAME;
  }

  get metadata(): ProviderMetadata {
    return this.provider.getMetadata();
  }

  /**
   * Create a chat completion with retries.
   * Note: `model_id` should NOT include a provider prefix.
   */
  async completion(request: CanonicalRequest, options?: RetryOptions): Promise<LLMResponse> {
    return retryRequest(this.provider, request, options);
  }

  /**
   * Same as `completion`, over the aggregated SSE transport.
   */
  async streamCompletion(request: CanonicalRequest, options?: RetryOptions): Promise<LLMResponse> {
    return retryRequest(this.provider, { ...request, transport: 'stream' }, options);
  }

  /**
   * List the sub-providers serving a model (routing providers only).
   */
  async listSubProviders(modelId: string, signal?: AbortSignal): Promise<string[]> {
    return this.provider.listSubProviders(modelId, signal);
  }
}
