/**
 * Core types for llm-unify.
 *
 * Requests and responses use the OpenAI chat shape as the canonical form;
 * every provider adapter translates to and from it.
 */

// =============================================================================
// Provider Types
// =============================================================================

/**
 * Built-in provider names.
 */
export type LLMProviderType =
  | 'openai'
  | 'openrouter'
  | 'fireworks'
  | 'chutes'
  | 'google'
  | 'xai'
  | 'moonshot'
  | 'tngtech';

/**
 * Provider configuration.
 */
export interface ProviderConfig {
  /** API key for the provider (falls back to the provider's environment variable) */
  apiKey?: string;
  /** Base URL override for the provider's API */
  baseUrl?: string;
  /** Default request timeout in seconds, used when a request carries none */
  timeout?: Timeout;
  /** Extra headers sent with every request */
  headers?: Record<string, string>;
}

/**
 * Provider metadata describing capabilities.
 */
export interface ProviderMetadata {
  /** Provider identifier */
  name: string;
  /** Environment variable name for API key */
  envKey: string;
  /** Link to provider documentation */
  docUrl: string;
  /** Whether provider supports the aggregated SSE transport */
  streaming: boolean;
  /** Whether provider accepts sub-provider routing (allow/ignore lists) */
  routing: boolean;
  /** Whether provider exposes reasoning/thinking output */
  reasoning: boolean;
}

// =============================================================================
// Message Types
// =============================================================================

/**
 * Role of a message in a conversation.
 */
export type MessageRole = 'system' | 'user' | 'assistant';

/**
 * A message in a conversation.
 */
export interface Message {
  role: MessageRole;
  content: string;
}

// =============================================================================
// Request Types
// =============================================================================

/**
 * Timeout in seconds: a single read timeout, or a `[connect, read]` pair.
 */
export type Timeout = number | readonly [connect: number, read: number];

/**
 * How a request travels to the provider.
 *
 * `stream` opens an SSE connection and aggregates it into one response;
 * callers never see individual deltas.
 */
export type Transport = 'default' | 'stream';

export type ReasoningEffort = 'low' | 'medium' | 'high';

/**
 * Reasoning ("thinking") override. `max_tokens` and `effort` are mutually exclusive.
 */
export interface ReasoningConfig {
  enabled: boolean;
  max_tokens?: number;
  effort?: ReasoningEffort;
}

/**
 * Provider-neutral chat request.
 */
export interface CanonicalRequest {
  /** Conversation messages, in order */
  messages: Message[];

  /** Model identifier as the provider names it */
  model_id: string;

  /** Timeout in seconds (default provider-specific) */
  timeout?: Timeout;

  /** Maximum gap in seconds between two SSE events (default: the read timeout) */
  stream_idle_timeout?: number;

  /** Retry budget; 0 means a single attempt (default 3) */
  max_retries?: number;

  /** OpenRouter only: restrict routing to these sub-providers */
  allow_list?: string[];

  /** OpenRouter only: never route to these sub-providers */
  ignore_list?: string[];

  /** Transport selection (default `default`) */
  transport?: Transport;

  /** Reasoning override (default: provider behavior) */
  reasoning?: ReasoningConfig;

  /** Maximum tokens to generate (default 4096) */
  max_tokens?: number;

  /** Temperature for sampling */
  temperature?: number;

  /** Nucleus sampling probability */
  top_p?: number;

  /** Stop sequences */
  stop?: string | string[];

  /** Random seed for reproducibility */
  seed?: number;

  /**
   * Raw provider streaming flag. Always rejected: use `transport: 'stream'`.
   */
  stream?: boolean;
}

// =============================================================================
// Response Types
// =============================================================================

/**
 * Token usage statistics. Providers may omit any field.
 */
export interface CompletionUsage {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
  /** Tokens spent on hidden reasoning, where reported */
  reasoning_tokens?: number;
}

/**
 * Canonical response record, identical in shape for every provider.
 */
export interface StandardizedResponse {
  /** Provider-assigned id, or '' */
  readonly id: string;
  /** Unix timestamp, or null when the provider gives none */
  readonly created: number | null;
  readonly model: string;
  readonly provider: string;
  readonly content: string;
  readonly finish_reason: string;
  readonly usage: Readonly<CompletionUsage>;
  /** Reasoning/thinking text, when the provider returns it */
  readonly reasoning: string | null;
  /** Upstream that served an OpenRouter request */
  readonly sub_provider: string | null;
}

/**
 * Fields an adapter extracts from a reply; absent fields standardize to empty values.
 */
export interface StandardizedFields {
  id?: string | null;
  created?: number | null;
  model?: string | null;
  provider: string;
  content?: string | null;
  finish_reason?: string | null;
  usage?: CompletionUsage | null;
  reasoning?: string | null;
  sub_provider?: string | null;
}

/**
 * Build a frozen StandardizedResponse.
 */
export function createStandardizedResponse(fields: StandardizedFields): StandardizedResponse {
  const usage: CompletionUsage = {};
  if (fields.usage) {
    for (const key of ['prompt_tokens', 'completion_tokens', 'total_tokens', 'reasoning_tokens'] as const) {
      const value = fields.usage[key];
      if (typeof value === 'number') usage[key] = value;
    }
  }

  return Object.freeze({
    id: fields.id ?? '',
    created: fields.created ?? null,
    model: fields.model ?? '',
    provider: fields.provider,
    content: fields.content ?? '',
    finish_reason: fields.finish_reason ?? '',
    usage: Object.freeze(usage),
    reasoning: fields.reasoning ? fields.reasoning : null,
    sub_provider: fields.sub_provider ?? null,
  });
}

/**
 * What an adapter hands back for one successful attempt.
 */
export interface ProviderResult {
  response: StandardizedResponse;
  /** Parsed provider payload (last event for streams) */
  raw: unknown;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Error taxonomy. The first four kinds are retryable.
 */
export enum ErrorType {
  Network = 'network',
  Timeout = 'timeout',
  RateLimit = 'rate_limit',
  ServerError = 'server_error',
  Auth = 'auth',
  InvalidRequest = 'invalid_request',
  InvalidOption = 'invalid_option',
  ContentFilter = 'content_filter',
  Cancelled = 'cancelled',
  Unknown = 'unknown',
}

export const RETRYABLE_ERROR_TYPES: ReadonlySet<ErrorType> = new Set([
  ErrorType.Network,
  ErrorType.Timeout,
  ErrorType.RateLimit,
  ErrorType.ServerError,
]);

/**
 * Classified failure.
 */
export interface ErrorInfo {
  readonly type: ErrorType;
  readonly message: string;
  readonly retryable: boolean;
  readonly status_code?: number;
}

/**
 * Base class for every error thrown inside llm-unify.
 */
export class LLMClientError extends Error {
  constructor(
    message: string,
    public readonly provider?: string,
    public readonly statusCode?: number,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'LLMClientError';
  }
}

// =============================================================================
// LLMResponse
// =============================================================================

interface LLMResponseInit {
  standardized_response?: StandardizedResponse;
  error_info?: ErrorInfo;
  raw_provider_response?: unknown;
  context?: unknown;
}

/**
 * Final result of one logical call. Exactly one of `standardized_response`
 * and `error_info` is set.
 */
export class LLMResponse {
  readonly success: boolean;
  readonly standardized_response?: StandardizedResponse;
  readonly error_info?: ErrorInfo;
  readonly raw_provider_response?: unknown;
  readonly context?: unknown;

  constructor(init: LLMResponseInit) {
    const hasResponse = init.standardized_response !== undefined;
    const hasError = init.error_info !== undefined;
    if (hasResponse === hasError) {
      throw new TypeError('LLMResponse needs exactly one of standardized_response or error_info');
    }

    this.success = hasResponse;
    this.standardized_response = init.standardized_response;
    this.error_info = init.error_info;
    this.raw_provider_response = init.raw_provider_response;
    this.context = init.context;
    Object.freeze(this);
  }

  static ok(response: StandardizedResponse, raw?: unknown, context?: unknown): LLMResponse {
    return new LLMResponse({ standardized_response: response, raw_provider_response: raw, context });
  }

  static fail(error: ErrorInfo, raw?: unknown, context?: unknown): LLMResponse {
    return new LLMResponse({ error_info: error, raw_provider_response: raw, context });
  }
}

// =============================================================================
// Utility Types
// =============================================================================

/**
 * Parsed model string result.
 */
export interface ParsedModel {
  /** Provider identifier */
  provider: string;
  /** Model identifier */
  model: string;
}
