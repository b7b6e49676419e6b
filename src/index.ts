/**
 * llm-unify - one request/response shape for many LLM providers
 *
 * Canonical requests go through per-provider adapters, failures are classified
 * into a small taxonomy, retryable ones are retried with backoff, and every
 * call ends in exactly one LLMResponse.
 *
 * @example
 * ```typescript
 * import { completion, LLMClient } from 'llm-unify';
 *
 * // Direct function API
 * const response = await completion({
 *   model_id: 'openai:gpt-4o-mini',
 *   messages: [{ role: 'user', content: 'Hello!' }],
 * });
 *
 * // Class API (reuses the adapter)
 * const client = LLMClient.create('openrouter');
 * const routed = await client.completion({
 *   model_id: 'deepseek/deepseek-chat',
 *   messages: [{ role: 'user', content: 'Hello!' }],
 *   ignore_list: ['SomeHost'],
 *   transport: 'stream',
 * });
 * ```
 *
 * @module llm-unify
 * @packageDocumentation
 */

// =============================================================================
// Package Info
// =============================================================================

/** Package version */
export const VERSION = '0.1.0';

/** Package name */
export const PACKAGE_NAME = 'llm-unify';

// =============================================================================
// Main API
// =============================================================================

export {
  completion,
  getSupportedProviders,
  LLMClient,
  type CompletionRequest,
} from './api.js';

export {
  retryRequest,
  calculateBackoff,
  sleep,
  DEFAULT_BACKOFF,
  DEFAULT_MAX_RETRIES,
  type BackoffOptions,
  type RetryOptions,
  type RetryState,
} from './retry.js';

// =============================================================================
// Types
// =============================================================================

export type {
  LLMProviderType,
  ProviderConfig,
  ProviderMetadata,
  MessageRole,
  Message,
  Timeout,
  Transport,
  ReasoningEffort,
  ReasoningConfig,
  CanonicalRequest,
  CompletionUsage,
  StandardizedResponse,
  StandardizedFields,
  ProviderResult,
  ErrorInfo,
  ParsedModel,
} from './types.js';

export {
  ErrorType,
  RETRYABLE_ERROR_TYPES,
  LLMClientError,
  LLMResponse,
  createStandardizedResponse,
} from './types.js';

// =============================================================================
// Errors
// =============================================================================

export {
  ConnectionError,
  TimeoutError,
  ProviderHTTPError,
  ProviderResponseError,
  ContentFilterError,
  IncompleteStreamError,
  CancelledError,
  InvalidOptionError,
  MissingApiKeyError,
  UnsupportedProviderError,
  classifyError,
  isLLMClientError,
  isConnectionError,
  type TimeoutPhase,
} from './errors.js';

export { validateRequest, CanonicalRequestSchema } from './validation.js';

// =============================================================================
// Streaming and Transport
// =============================================================================

export {
  aggregateStream,
  readSSE,
  StreamAggregator,
  type StreamDelta,
  type SSEMessage,
} from './streaming.js';

export { resolveTimeout, DEFAULT_TIMEOUT_SECONDS, type TimeoutBudget } from './http.js';

export { createLogger, getLogLevel, setLogLevel, type Logger, type LogLevel } from './logger.js';

// =============================================================================
// Registry (for advanced usage)
// =============================================================================

export {
  registerProvider,
  getProviderConstructor,
  hasProvider,
  getRegisteredProviders,
  createProvider,
  getProvider,
  parseModelString,
  resolveProviderAndModel,
  getProviderForModel,
  clearProviderCache,
} from './registry.js';

// =============================================================================
// Providers (for advanced usage)
// =============================================================================

export {
  BaseProvider,
  type ProviderCall,
  type ProviderConstructor,
  OpenAIProvider,
  OpenAICompatibleProvider,
  OpenRouterProvider,
  FireworksProvider,
  ChutesProvider,
  GoogleProvider,
  normalizeFinishReason,
  XAIProvider,
  MoonshotProvider,
  TNGTechProvider,
} from './providers/index.js';

// =============================================================================
// Coherency Testing
// =============================================================================

export {
  CoherencyTester,
  runCoherencyTests,
  createJudgePrompt,
  DEFAULT_JUDGE,
  DEFAULT_TEST_PROMPTS,
  DEFAULT_NUM_WORKERS,
  type CoherencyOptions,
  type CoherencyOutcome,
  type CoherencyResult,
  type JudgeConfig,
  type TestPrompt,
} from './testing/coherency.js';

export { Semaphore } from './testing/semaphore.js';
