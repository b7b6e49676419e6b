/**
 * Shared fixtures: in-process `fetch` stand-ins and SSE bodies.
 */

import { vi } from 'vitest';
import { BaseProvider, type ProviderCall } from '../providers/base.js';
import {
  createStandardizedResponse,
  type CanonicalRequest,
  type ProviderResult,
  type StandardizedFields,
} from '../types.js';

type FetchReply = Response | Error | (() => Promise<Response>);

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * One SSE event block. Strings are sent as-is, anything else as JSON.
 */
export function sseEvent(data: unknown, id?: string): string {
  const payload = typeof data === 'string' ? data : JSON.stringify(data);
  return `${id !== undefined ? `id: ${id}\n` : ''}data: ${payload}\n\n`;
}

/**
 * SSE response delivering the given chunks. With `keepOpen` the body never
 * closes, like a stalled upstream.
 */
export function sseResponse(chunks: string[], options: { keepOpen?: boolean } = {}): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(encoder.encode(chunk));
      if (!options.keepOpen) controller.close();
    },
  });
  return new Response(body, { status: 200, headers: { 'Content-Type': 'text/event-stream' } });
}

/**
 * Replace global fetch with a stub that plays the replies in order and repeats
 * the last one.
 */
export function stubFetch(...replies: FetchReply[]) {
  let index = 0;
  const mock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    const reply = replies[Math.min(index, replies.length - 1)];
    index += 1;
    if (reply === undefined) throw new Error('stubFetch has no replies');
    if (reply instanceof Error) throw reply;
    if (typeof reply === 'function') return reply();
    return reply.clone();
  });
  vi.stubGlobal('fetch', mock);
  return mock;
}

/**
 * A fetch that only settles when its signal aborts.
 */
export function hangingFetch() {
  const mock = vi.fn(
    (_input: string | URL | Request, init?: RequestInit): Promise<Response> =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          reject(new DOMException('This operation was aborted', 'AbortError'));
        });
      }),
  );
  vi.stubGlobal('fetch', mock);
  return mock;
}

type FetchMock = ReturnType<typeof stubFetch> | ReturnType<typeof hangingFetch>;

export function requestUrl(mock: FetchMock, call = 0): string {
  const input = mock.mock.calls[call]?.[0];
  return typeof input === 'string' ? input : String(input);
}

export function requestBody(mock: FetchMock, call = 0): unknown {
  const body = mock.mock.calls[call]?.[1]?.body;
  if (typeof body !== 'string') throw new Error(`fetch call ${call} has no JSON body`);
  return JSON.parse(body);
}

export function requestHeaders(mock: FetchMock, call = 0): Headers {
  return new Headers(mock.mock.calls[call]?.[1]?.headers);
}

// =============================================================================
// Stub Provider
// =============================================================================

export type StubHandler = (request: CanonicalRequest, signal: AbortSignal) => Promise<ProviderResult>;


/**
 * In-process adapter: every attempt is handed to `handler`.
 */
export class StubProvider extends BaseProvider {
  readonly PROVIDER_NAME = 'stub';
  readonly ENV_API_KEY_NAME = 'STUB_API_KEY';
  readonly PROVIDER_DOCUMENTATION_URL = 'https://example.test/docs';
  readonly API_BASE = 'https://example.test/v1';
  readonly SUPPORTS_REASONING = true;

  /** Every request that reached the adapter, in order */
  readonly requests: CanonicalRequest[] = [];

  constructor(private readonly handler: StubHandler) {
    super({ apiKey: 'test-key' });
  }

  protected async complete(request: CanonicalRequest, call: ProviderCall): Promise<ProviderResult> {
    this.requests.push(request);
    return this.handler(request, call.controller.signal);
  }
}

/**
 * Stub routing adapter. `listed` is what `listSubProviders` returns, or throws
 * when it is an Error.
 */
export class RoutingStubProvider extends StubProvider {
  readonly SUPPORTS_ROUTING = true;

  constructor(
    handler: StubHandler,
    private readonly listed: string[] | Error,
  ) {
    super(handler);
  }

  async listSubProviders(_modelId: string, _signal?: AbortSignal): Promise<string[]> {
    if (this.listed instanceof Error) throw this.listed;
    return [...this.listed];
  }
}

/**
 * Successful attempt result.
 */
export function reply(content: string, fields: Partial<StandardizedFields> = {}): ProviderResult {
  return {
    response: createStandardizedResponse({ provider: 'stub', finish_reason: 'stop', ...fields, content }),
    raw: { content },
  };
}

/**
 * Attempt that only settles when aborted.
 */
export function untilAborted(signal: AbortSignal): Promise<ProviderResult> {
  return new Promise<ProviderResult>((_resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}
