/**
 * Transport plumbing shared by all adapters: timeout budgets, abort handling
 * and conversion of `fetch` failures into typed errors.
 */

import {
  CancelledError,
  ConnectionError,
  TimeoutError,
  connectionErrorCode,
  isConnectionError,
  type TimeoutPhase,
} from './errors.js';
import { LLMClientError, type Timeout } from './types.js';

/** Default timeout in seconds when neither request nor provider sets one */
export const DEFAULT_TIMEOUT_SECONDS = 60;

/**
 * Timeout bounds in milliseconds for one attempt.
 *
 * `connectMs` covers the wait for response headers, `readMs` the body transfer,
 * `idleMs` the gap between two SSE events.
 */
export interface TimeoutBudget {
  connectMs: number;
  readMs: number;
  idleMs: number;
}

export function resolveTimeout(
  timeout: Timeout | undefined,
  idleSeconds?: number,
  fallback: Timeout = DEFAULT_TIMEOUT_SECONDS,
): TimeoutBudget {
  const value = timeout ?? fallback;
  const [connect, read] = typeof value === 'number' ? [value, value] : value;
  return {
    connectMs: connect * 1000,
    readMs: read * 1000,
    idleMs: (idleSeconds ?? read) * 1000,
  };
}

/**
 * Map an abort reason onto the error it stands for.
 *
 * A reason named `TimeoutError` (our own, or the DOMException from
 * `AbortSignal.timeout`) is a timeout; anything else is a cancellation.
 */
export function abortReasonToError(reason: unknown, provider?: string): LLMClientError {
  if (reason instanceof LLMClientError) return reason;
  if (reason instanceof Error && reason.name === 'TimeoutError') {
    return new TimeoutError(provider ?? 'request', 0, 'deadline');
  }
  return new CancelledError(provider, reason);
}

/**
 * One abort controller per attempt, linked to the caller's signal, with a
 * single re-armable timer for the current phase.
 */
export class RequestController {
  private readonly controller = new AbortController();
  private timer: ReturnType<typeof setTimeout> | undefined;
  private readonly detach: () => void;

  constructor(
    private readonly provider: string,
    external?: AbortSignal,
  ) {
    if (external?.aborted) {
      this.controller.abort(external.reason);
      this.detach = () => undefined;
    } else if (external) {
      const onAbort = (): void => this.controller.abort(external.reason);
      external.addEventListener('abort', onAbort, { once: true });
      this.detach = () => external.removeEventListener('abort', onAbort);
    } else {
      this.detach = () => undefined;
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Start (or restart) the timer for a phase.
   */
  arm(phase: TimeoutPhase, ms: number): void {
    this.clear();
    this.timer = setTimeout(() => {
      this.controller.abort(new TimeoutError(this.provider, ms, phase));
    }, ms);
  }

  clear(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  /**
   * Throw the abort reason if the attempt was aborted.
   */
  throwIfAborted(): void {
    if (this.controller.signal.aborted) {
      throw abortReasonToError(this.controller.signal.reason, this.provider);
    }
  }

  /**
   * Turn whatever a transport call threw into a typed error. An abort always
   * wins, since `fetch` reports it as a generic AbortError.
   */
  toError(error: unknown): unknown {
    if (this.controller.signal.aborted) {
      return abortReasonToError(this.controller.signal.reason, this.provider);
    }
    if (error instanceof LLMClientError) return error;
    if (isConnectionError(error)) {
      const cause = error instanceof Error && error.cause instanceof Error ? error.cause : error;
      const message = cause instanceof Error ? cause.message : String(cause);
      return new ConnectionError(this.provider, message, connectionErrorCode(error), error);
    }
    return error;
  }

  dispose(): void {
    this.clear();
    this.detach();
  }
}

/**
 * `fetch` bounded by the connect timeout (until headers arrive).
 */
export async function sendRequest(
  url: string,
  init: RequestInit,
  controller: RequestController,
  connectMs: number,
): Promise<Response> {
  controller.throwIfAborted();
  controller.arm('connect', connectMs);
  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } catch (error) {
    throw controller.toError(error);
  } finally {
    controller.clear();
  }
}

/**
 * Read a whole response body as text, bounded by the read timeout.
 */
export async function readBody(
  response: Response,
  controller: RequestController,
  readMs: number,
): Promise<string> {
  controller.arm('read', readMs);
  try {
    return await response.text();
  } catch (error) {
    throw controller.toError(error);
  } finally {
    controller.clear();
  }
}

/**
 * Race a promise against an abort signal; rejects with the abort reason.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    // The wrapped promise is still observed below, so a late rejection is never unhandled
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Parse JSON without throwing; undefined when the text is not JSON.
 */
export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
}
