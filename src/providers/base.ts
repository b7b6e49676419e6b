/**
 * Base provider interface for llm-unify.
 *
 * All provider adapters extend this class. An adapter only translates between
 * the canonical request/response and its provider's wire format; retries and
 * classification happen above it.
 */

import { InvalidOptionError, MissingApiKeyError } from '../errors.js';
import { RequestController, resolveTimeout, DEFAULT_TIMEOUT_SECONDS, type TimeoutBudget } from '../http.js';
import { createLogger, type Logger } from '../logger.js';
import { validateRequest } from '../validation.js';
import type {
  CanonicalRequest,
  ProviderConfig,
  ProviderMetadata,
  ProviderResult,
  Timeout,
} from '../types.js';

/**
 * Abstract base class for LLM providers.
 *
 * Implementations should:
 * - Override the metadata properties
 * - Implement `complete` (and `streamCompletion` when SUPPORTS_STREAMING)
 * - Throw the typed errors from `errors.ts` on failure
 */
export abstract class BaseProvider {
  // =========================================================================
  // Provider Metadata (override in subclasses)
  // =========================================================================

  /** Provider identifier (e.g., 'openai', 'openrouter') */
  abstract readonly PROVIDER_NAME: string;

  /** Environment variable name for the API key */
  abstract readonly ENV_API_KEY_NAME: string;

  /** URL to provider documentation */
  abstract readonly PROVIDER_DOCUMENTATION_URL: string;

  /** Default API base URL */
  abstract readonly API_BASE: string;

  // =========================================================================
  // Feature Flags (override in subclasses)
  // =========================================================================

  /** Whether provider supports the aggregated SSE transport */
  readonly SUPPORTS_STREAMING: boolean = true;

  /** Whether provider routes to sub-providers (allow/ignore lists) */
  readonly SUPPORTS_ROUTING: boolean = false;

  /** Whether provider exposes reasoning/thinking content */
  readonly SUPPORTS_REASONING: boolean = false;

  /** Timeout in seconds when neither the request nor the config sets one */
  readonly DEFAULT_TIMEOUT: Timeout = DEFAULT_TIMEOUT_SECONDS;

  /** max_tokens sent when the request carries none */
  readonly DEFAULT_MAX_TOKENS: number = 4096;

  // =========================================================================
  // Instance Properties
  // =========================================================================

  /** Provider configuration */
  protected readonly config: ProviderConfig;

  private cachedLogger: Logger | undefined;

  constructor(config: ProviderConfig = {}) {
    this.config = config;
  }

  /**
   * Base URL for API requests. Resolved lazily so subclass metadata is in place.
   */
  protected get baseUrl(): string {
    return (this.config.baseUrl || this.API_BASE).replace(/\/+$/, '');
  }

  /**
   * API key, resolved from config or environment at call time.
   */
  protected get apiKey(): string | undefined {
    return this.resolveApiKey(this.config.apiKey);
  }

  protected get logger(): Logger {
    this.cachedLogger ??= createLogger(this.PROVIDER_NAME);
    return this.cachedLogger;
  }

  // =========================================================================
  // API Key Resolution
  // =========================================================================

  /**
   * Resolve the API key from config or environment.
   */
  protected resolveApiKey(configKey?: string): string | undefined {
    if (configKey) {
      return configKey;
    }
    return process.env[this.ENV_API_KEY_NAME] || undefined;
  }

  /**
   * Check if API key is required.
   */
  protected requiresApiKey(): boolean {
    return true;
  }

  /**
   * Return the API key or throw before any network call.
   */
  protected requireApiKey(): string {
    const key = this.apiKey;
    if (this.requiresApiKey() && !key) {
      throw new MissingApiKeyError(this.PROVIDER_NAME, this.ENV_API_KEY_NAME);
    }
    return key ?? '';
  }

  // =========================================================================
  // Metadata
  // =========================================================================

  /**
   * Get provider metadata.
   */
  getMetadata(): ProviderMetadata {
    return {
      name: this.PROVIDER_NAME,
      envKey: this.ENV_API_KEY_NAME,
      docUrl: this.PROVIDER_DOCUMENTATION_URL,
      streaming: this.SUPPORTS_STREAMING,
      routing: this.SUPPORTS_ROUTING,
      reasoning: this.SUPPORTS_REASONING,
    };
  }

  // =========================================================================
  // Request Execution
  // =========================================================================

  /**
   * Check the adapter-specific part of the option contract.
   * Overrides should call `super.validateOptions` first.
   */
  validateOptions(request: CanonicalRequest): InvalidOptionError | undefined {
    if (request.transport === 'stream' && !this.SUPPORTS_STREAMING) {
      return new InvalidOptionError(
        `${this.PROVIDER_NAME} does not support transport='stream'`,
        this.PROVIDER_NAME,
      );
    }
    if (!this.SUPPORTS_ROUTING && (request.allow_list?.length || request.ignore_list?.length)) {
      return new InvalidOptionError(
        `allow_list and ignore_list are only supported by routing providers, not ${this.PROVIDER_NAME}`,
        this.PROVIDER_NAME,
      );
    }
    return undefined;
  }

  /**
   * Perform exactly one attempt.
   *
   * @param request - The canonical request
   * @param signal - Aborts the attempt when triggered
   * @returns The standardized response and the parsed provider payload
   * @throws InvalidOptionError before any I/O when the request breaks a contract
   */
  async execute(request: CanonicalRequest, signal?: AbortSignal): Promise<ProviderResult> {
    const problem = validateRequest(request, this.PROVIDER_NAME) ?? this.validateOptions(request);
    if (problem) {
      throw problem;
    }
    const apiKey = this.requireApiKey();

    const budget = resolveTimeout(
      request.timeout,
      request.stream_idle_timeout,
      this.config.timeout ?? this.DEFAULT_TIMEOUT,
    );
    const controller = new RequestController(this.PROVIDER_NAME, signal);

    try {
      if (request.transport === 'stream') {
        return await this.streamCompletion(request, { apiKey, controller, budget });
      }
      return await this.complete(request, { apiKey, controller, budget });
    } finally {
      controller.dispose();
    }
  }

  /**
   * Perform one attempt over the SSE transport, aggregated into a single response.
   */
  async stream(request: CanonicalRequest, signal?: AbortSignal): Promise<ProviderResult> {
    return this.execute({ ...request, transport: 'stream' }, signal);
  }

  /**
   * Enumerate the upstream sub-providers serving a model.
   * Only routing providers implement this.
   */
  async listSubProviders(modelId: string, _signal?: AbortSignal): Promise<string[]> {
    throw new InvalidOptionError(
      `${this.PROVIDER_NAME} does not route to sub-providers (model ${modelId})`,
      this.PROVIDER_NAME,
    );
  }

  // =========================================================================
  // Abstract Methods (must be implemented by subclasses)
  // =========================================================================

  /**
   * Send one non-streaming request.
   */
  protected abstract complete(request: CanonicalRequest, call: ProviderCall): Promise<ProviderResult>;

  /**
   * Send one streaming request and aggregate it.
   */
  protected async streamCompletion(_request: CanonicalRequest, _call: ProviderCall): Promise<ProviderResult> {
    throw new InvalidOptionError(
      `${this.PROVIDER_NAME} does not support transport='stream'`,
      this.PROVIDER_NAME,
    );
  }

  /**
   * Headers sent on every request, before provider-specific auth.
   */
  protected baseHeaders(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      ...this.config.headers,
    };
  }
}

/**
 * Per-attempt context handed to `complete` and `streamCompletion`.
 */
export interface ProviderCall {
  apiKey: string;
  controller: RequestController;
  budget: TimeoutBudget;
}

/**
 * Type for a provider constructor.
 */
export type ProviderConstructor = new (config?: ProviderConfig) => BaseProvider;
