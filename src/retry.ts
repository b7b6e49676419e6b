/**
 * Retry orchestration: one logical call, up to `maxRetries + 1` attempts,
 * always resolving to exactly one LLMResponse.
 */

import { classifyError, ProviderHTTPError, ProviderResponseError } from './errors.js';
import { RequestController, abortReasonToError, abortable } from './http.js';
import { createLogger } from './logger.js';
import type { BaseProvider } from './providers/base.js';
import { LLMResponse, type CanonicalRequest, type ErrorInfo } from './types.js';
import { validateRequest } from './validation.js';

const logger = createLogger('retry');

// =============================================================================
// Types
// =============================================================================

export interface BackoffOptions {
  /** Delay before the first retry, in milliseconds */
  initialDelay: number;
  /** Upper bound on any single delay, in milliseconds */
  maxDelay: number;
  /** Growth factor per attempt */
  factor: number;
  /** Relative jitter: the delay is scaled by a uniform factor in [1 - jitter, 1 + jitter] */
  jitter: number;
}

/**
 * Progress of one logical call. Replaced, never mutated, after each attempt.
 */
export interface RetryState {
  /** Zero-based index of the attempt that just ran */
  readonly attempt: number;
  readonly startedAt: number;
  readonly lastError?: ErrorInfo;
}

export interface RetryOptions extends Partial<BackoffOptions> {
  /** Overrides `request.max_retries` */
  maxRetries?: number;
  /** Caller cancellation. A reason named `TimeoutError` counts as a timeout. */
  signal?: AbortSignal;
  /** Overall bound on the whole call, in milliseconds */
  deadlineMs?: number;
  /** Opaque value handed back on the response */
  context?: unknown;
  /** Called before each backoff sleep */
  onRetry?: (state: RetryState, delayMs: number) => void;
  /** Uniform source in [0, 1) for jitter */
  random?: () => number;
}

export const DEFAULT_MAX_RETRIES = 3;

export const DEFAULT_BACKOFF: Readonly<BackoffOptions> = Object.freeze({
  initialDelay: 1000,
  maxDelay: 30_000,
  factor: 2,
  jitter: 0.2,
});

// =============================================================================
// Backoff
// =============================================================================

/**
 * Delay before the retry that follows attempt `attempt` (zero-based):
 * `min(initialDelay * factor^attempt, maxDelay)`, then jittered.
 */
export function calculateBackoff(
  attempt: number,
  options: BackoffOptions = DEFAULT_BACKOFF,
  random: () => number = Math.random,
): number {
  const base = Math.min(options.initialDelay * options.factor ** attempt, options.maxDelay);
  const spread = (random() * 2 - 1) * options.jitter;
  return Math.max(0, base * (1 + spread));
}

/**
 * Sleep that rejects with the signal's reason when aborted.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(signal.reason);
  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function rawOf(error: unknown): unknown {
  if (error instanceof ProviderHTTPError || error instanceof ProviderResponseError) {
    return error.body;
  }
  return undefined;
}

// =============================================================================
// Orchestrator
// =============================================================================

/**
 * Run a request against a provider with classification-driven retries.
 *
 * Never throws: every outcome, including invalid options and cancellation,
 * comes back as an LLMResponse. Option checks run before the first attempt
 * and do not consume the retry budget.
 */
export async function retryRequest(
  provider: BaseProvider,
  request: CanonicalRequest,
  options: RetryOptions = {},
): Promise<LLMResponse> {
  const name = provider.PROVIDER_NAME;
  const { context } = options;

  const problem = validateRequest(request, name) ?? provider.validateOptions(request);
  if (problem) {
    return LLMResponse.fail(classifyError(problem), undefined, context);
  }

  const backoff: BackoffOptions = {
    initialDelay: options.initialDelay ?? DEFAULT_BACKOFF.initialDelay,
    maxDelay: options.maxDelay ?? DEFAULT_BACKOFF.maxDelay,
    factor: options.factor ?? DEFAULT_BACKOFF.factor,
    jitter: options.jitter ?? DEFAULT_BACKOFF.jitter,
  };
  const maxRetries = Math.max(0, options.maxRetries ?? request.max_retries ?? DEFAULT_MAX_RETRIES);

  // Links the caller's signal and carries the overall deadline
  const controller = new RequestController(name, options.signal);
  if (options.deadlineMs !== undefined) {
    controller.arm('deadline', options.deadlineMs);
  }

  const aborted = (raw?: unknown): LLMResponse =>
    LLMResponse.fail(classifyError(abortReasonToError(controller.signal.reason, name)), raw, context);

  let state: RetryState = { attempt: 0, startedAt: Date.now() };

  try {
    while (true) {
      if (controller.signal.aborted) {
        return aborted();
      }

      let failure: unknown;
      try {
        const result = await abortable(provider.execute(request, controller.signal), controller.signal);
        return LLMResponse.ok(result.response, result.raw, context);
      } catch (error) {
        failure = error;
      }

      const raw = rawOf(failure);
      if (controller.signal.aborted) {
        return aborted(raw);
      }

      const info = classifyError(failure);
      state = { ...state, lastError: info };

      if (!info.retryable || state.attempt >= maxRetries) {
        if (info.retryable) {
          logger.warn('retries_exhausted', { provider: name, attempts: state.attempt + 1, error: info.message });
        }
        return LLMResponse.fail(info, raw, context);
      }

      const delayMs = calculateBackoff(state.attempt, backoff, options.random);
      logger.warn('retry_scheduled', {
        provider: name,
        attempt: state.attempt + 1,
        maxRetries,
        delayMs: Math.round(delayMs),
        type: info.type,
        error: info.message,
      });
      try {
        options.onRetry?.(state, delayMs);
      } catch (hookError) {
        logger.warn('retry_hook_failed', {
          provider: name,
          error: hookError instanceof Error ? hookError.message : String(hookError),
        });
      }

      try {
        await sleep(delayMs, controller.signal);
      } catch {
        return aborted(raw);
      }

      state = { ...state, attempt: state.attempt + 1 };
    }
  } finally {
    controller.dispose();
  }
}
