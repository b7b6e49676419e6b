/**
 * Error types for llm-unify.
 *
 * Adapters throw these classes; `classifyError` is the single place that turns
 * a failure into an `ErrorInfo` and decides whether it is retryable.
 */

import { ErrorType, LLMClientError, RETRYABLE_ERROR_TYPES, type ErrorInfo } from './types.js';

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Connection-level failure: DNS, refused or reset connection, TLS.
 */
export class ConnectionError extends LLMClientError {
  constructor(
    provider: string,
    message: string,
    public readonly code?: string,
    cause?: unknown,
  ) {
    super(`Cannot connect to ${provider}: ${message}`, provider, undefined, cause);
    this.name = 'ConnectionError';
  }
}

/**
 * Which bound a timeout exceeded.
 */
export type TimeoutPhase = 'connect' | 'read' | 'idle' | 'deadline';

/**
 * Error thrown when a request exceeds one of its time bounds.
 */
export class TimeoutError extends LLMClientError {
  constructor(
    provider: string,
    public readonly timeoutMs: number,
    public readonly phase: TimeoutPhase = 'read',
  ) {
    super(
      phase === 'idle'
        ? `Stream from ${provider} idle for more than ${timeoutMs}ms`
        : phase === 'deadline'
          ? `Request to ${provider} exceeded its deadline`
          : `Request to ${provider} timed out after ${timeoutMs}ms (${phase})`,
      provider,
    );
    this.name = 'TimeoutError';
  }
}

/**
 * Error thrown for a non-2xx HTTP reply.
 */
export class ProviderHTTPError extends LLMClientError {
  constructor(
    provider: string,
    statusCode: number,
    message: string,
    public readonly body?: unknown,
  ) {
    super(`Request to ${provider} failed (HTTP ${statusCode}): ${message}`, provider, statusCode);
    this.name = 'ProviderHTTPError';
  }
}

/**
 * Error reported inside a response body (HTTP 200 carrying an `error` object,
 * or an error event in a stream).
 */
export class ProviderResponseError extends LLMClientError {
  /** Provider's own error type string, when given */
  readonly errorType?: string;
  readonly body?: unknown;

  constructor(
    provider: string,
    message: string,
    options: { statusCode?: number; errorType?: string; body?: unknown } = {},
  ) {
    super(`${provider} returned an error: ${message}`, provider, options.statusCode);
    this.name = 'ProviderResponseError';
    this.errorType = options.errorType;
    this.body = options.body;
  }
}

/**
 * Error thrown when the provider withheld or blocked content.
 */
export class ContentFilterError extends LLMClientError {
  constructor(provider: string, reason: string) {
    super(`Response from ${provider} blocked: ${reason}`, provider);
    this.name = 'ContentFilterError';
  }
}

/**
 * Error thrown when an SSE stream closes before it finished.
 */
export class IncompleteStreamError extends LLMClientError {
  constructor(provider: string, public readonly partialContent: string) {
    super(`Stream from ${provider} closed before completion`, provider);
    this.name = 'IncompleteStreamError';
  }
}

/**
 * Error thrown when the caller aborted the call.
 */
export class CancelledError extends LLMClientError {
  constructor(provider?: string, reason?: unknown) {
    super(
      provider ? `Request to ${provider} was cancelled` : 'Request was cancelled',
      provider,
      undefined,
      reason,
    );
    this.name = 'CancelledError';
  }
}

/**
 * Error thrown for a request that breaks an option contract. Detected before any I/O.
 */
export class InvalidOptionError extends LLMClientError {
  constructor(message: string, provider?: string) {
    super(message, provider);
    this.name = 'InvalidOptionError';
  }
}

/**
 * Error thrown when an API key is missing.
 */
export class MissingApiKeyError extends LLMClientError {
  constructor(provider: string, envKey: string) {
    super(
      `API key not found for provider '${provider}'. ` +
      `Set the ${envKey} environment variable or pass apiKey in the provider config.`,
      provider,
    );
    this.name = 'MissingApiKeyError';
  }
}

/**
 * Error thrown when a provider is not supported.
 */
export class UnsupportedProviderError extends LLMClientError {
  constructor(provider: string, supported: string[]) {
    super(
      `Provider '${provider}' is not supported. ` +
      `Supported providers: ${supported.join(', ')}`,
    );
    this.name = 'UnsupportedProviderError';
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if an error is an llm-unify error.
 */
export function isLLMClientError(error: unknown): error is LLMClientError {
  return error instanceof LLMClientError;
}

const CONNECTION_ERROR_CODES = new Set([
  'ENOTFOUND',
  'EAI_AGAIN',
  'ECONNREFUSED',
  'ECONNRESET',
  'EPIPE',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'ETIMEDOUT',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
]);

const TLS_ERROR_CODE = /^(ERR_TLS_|ERR_SSL_|CERT_|UNABLE_TO_|DEPTH_ZERO_|SELF_SIGNED_)/;

function errorCode(error: unknown): string | undefined {
  if (error !== null && typeof error === 'object' && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Socket error code carried by a failed `fetch`, if any.
 *
 * Undici rejects with `TypeError('fetch failed')` and puts the socket error in `cause`.
 */
export function connectionErrorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 4 && current instanceof Error; depth++) {
    const code = errorCode(current);
    if (code && (CONNECTION_ERROR_CODES.has(code) || TLS_ERROR_CODE.test(code))) {
      return code;
    }
    current = current.cause;
  }
  return undefined;
}

/**
 * Check if an error is a connection error.
 */
export function isConnectionError(error: unknown): boolean {
  if (error instanceof ConnectionError) return true;
  if (connectionErrorCode(error)) return true;
  return error instanceof TypeError && error.message.toLowerCase() === 'fetch failed';
}

function isTimeoutLike(error: unknown): boolean {
  if (error instanceof TimeoutError) return true;
  if (error instanceof Error && error.name === 'TimeoutError') return true;
  return errorCode(error) === 'UND_ERR_CONNECT_TIMEOUT' || errorCode(error) === 'UND_ERR_HEADERS_TIMEOUT';
}

// =============================================================================
// Classification
// =============================================================================

function info(type: ErrorType, message: string, statusCode?: number): ErrorInfo {
  const result: { type: ErrorType; message: string; retryable: boolean; status_code?: number } = {
    type,
    message,
    retryable: RETRYABLE_ERROR_TYPES.has(type),
  };
  if (statusCode !== undefined) result.status_code = statusCode;
  return Object.freeze(result);
}

function classifyStatus(status: number): ErrorType {
  if (status === 408) return ErrorType.Timeout;
  if (status === 429) return ErrorType.RateLimit;
  if (status === 500 || status === 502 || status === 503 || status === 504) return ErrorType.ServerError;
  if (status === 401 || status === 403) return ErrorType.Auth;
  if (status === 400 || status === 422) return ErrorType.InvalidRequest;
  return ErrorType.Unknown;
}

function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

/**
 * Classify a failure.
 *
 * Rules apply in order: connection, timeout, HTTP status (429, 5xx, 401/403,
 * 400/422), body-level validation, local option contract, then `unknown`.
 * Content filtering and explicit cancellation are permanent kinds of their own.
 * Deterministic: the same failure always yields the same result.
 */
export function classifyError(failure: unknown): ErrorInfo {
  const message = messageOf(failure);

  if (failure instanceof CancelledError) {
    return info(ErrorType.Cancelled, message);
  }

  if (isConnectionError(failure)) {
    return info(ErrorType.Network, message);
  }

  if (isTimeoutLike(failure)) {
    return info(ErrorType.Timeout, message);
  }

  if (failure instanceof ProviderHTTPError && failure.statusCode !== undefined) {
    return info(classifyStatus(failure.statusCode), message, failure.statusCode);
  }

  if (failure instanceof MissingApiKeyError) {
    return info(ErrorType.Auth, message);
  }

  if (failure instanceof ProviderResponseError) {
    if (failure.statusCode !== undefined) {
      return info(classifyStatus(failure.statusCode), message, failure.statusCode);
    }
    const errorType = failure.errorType?.toLowerCase() ?? '';
    if (errorType.includes('invalid') || errorType.includes('validation')) {
      return info(ErrorType.InvalidRequest, message);
    }
    return info(ErrorType.Unknown, message);
  }

  if (failure instanceof InvalidOptionError || failure instanceof UnsupportedProviderError) {
    return info(ErrorType.InvalidOption, message);
  }

  if (failure instanceof ContentFilterError) {
    return info(ErrorType.ContentFilter, message);
  }

  return info(ErrorType.Unknown, message);
}
