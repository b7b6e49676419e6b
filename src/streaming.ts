/**
 * Server-sent-events transport: reads an SSE body and reduces its deltas into
 * one StandardizedResponse. Callers only ever see the final result.
 */

import type { ReadableStreamReadResult } from 'node:stream/web';
import { ContentFilterError, IncompleteStreamError } from './errors.js';
import { abortable, parseJson, type RequestController, type TimeoutBudget } from './http.js';
import {
  createStandardizedResponse,
  type CompletionUsage,
  type ProviderResult,
  type StandardizedResponse,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Incremental update carried by one stream event, already in canonical terms.
 */
export interface StreamDelta {
  id?: string | null;
  created?: number | null;
  model?: string | null;
  content?: string | null;
  reasoning?: string | null;
  finishReason?: string | null;
  usage?: CompletionUsage | null;
  subProvider?: string | null;
}

/**
 * One dispatched SSE message.
 */
export interface SSEMessage {
  data: string;
  id?: string;
  event?: string;
}

export interface AggregateOptions {
  provider: string;
  controller: RequestController;
  budget: TimeoutBudget;
  /** Translate one parsed event; throws for error events */
  parseEvent: (event: unknown) => StreamDelta;
}

const DONE_SENTINEL = '[DONE]';

// =============================================================================
// SSE Reader
// =============================================================================

/**
 * Read SSE messages from a byte stream.
 *
 * Each read waits at most the idle gap, and the whole transfer at most the read
 * timeout; whichever is closer bounds the next read.
 */
export async function* readSSE(
  body: ReadableStream<Uint8Array>,
  controller: RequestController,
  budget: TimeoutBudget,
): AsyncGenerator<SSEMessage> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  const deadline = Date.now() + budget.readMs;

  let buffer = '';
  let data: string[] = [];
  let id: string | undefined;
  let event: string | undefined;

  // Fields apply to the event being built only
  const dispatch = (): SSEMessage | undefined => {
    const message: SSEMessage | undefined = data.length > 0 ? { data: data.join('\n'), id, event } : undefined;
    data = [];
    id = undefined;
    event = undefined;
    return message;
  };

  try {
    while (true) {
      const remaining = deadline - Date.now();
      if (budget.idleMs < remaining) {
        controller.arm('idle', budget.idleMs);
      } else {
        controller.arm('read', Math.max(remaining, 0));
      }

      let chunk: ReadableStreamReadResult<Uint8Array>;
      try {
        chunk = await abortable(reader.read(), controller.signal);
      } catch (error) {
        throw controller.toError(error);
      }
      controller.clear();

      if (chunk.done) break;
      buffer += decoder.decode(chunk.value, { stream: true });

      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';

      for (const rawLine of lines) {
        const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
        if (line === '') {
          const message = dispatch();
          if (message) yield message;
          continue;
        }
        if (line.startsWith(':')) continue;

        const colon = line.indexOf(':');
        const field = colon === -1 ? line : line.slice(0, colon);
        let value = colon === -1 ? '' : line.slice(colon + 1);
        if (value.startsWith(' ')) value = value.slice(1);

        if (field === 'data') data.push(value);
        else if (field === 'id') id = value;
        else if (field === 'event') event = value;
      }
    }

    // Trailing event without its blank line
    buffer += decoder.decode();
    if (buffer.startsWith('data:')) {
      data.push(buffer.slice(5).trimStart());
    }
    const last = dispatch();
    if (last) yield last;
  } finally {
    controller.clear();
    // The body is discarded either way; a failing cancel has nothing left to report.
    await reader.cancel().catch(() => undefined);
  }
}

// =============================================================================
// Aggregation
// =============================================================================

/**
 * Reduces stream deltas: ordered concatenation of content and reasoning, the
 * last non-empty finish reason and the last non-null usage snapshot.
 */
export class StreamAggregator {
  private content = '';
  private reasoning = '';
  private finishReason = '';
  private usage: CompletionUsage | null = null;
  private id: string | null = null;
  private created: number | null = null;
  private model: string | null = null;
  private subProvider: string | null = null;
  private terminated = false;

  apply(delta: StreamDelta): void {
    if (delta.id && !this.id) this.id = delta.id;
    if (typeof delta.created === 'number' && this.created === null) this.created = delta.created;
    if (delta.model && !this.model) this.model = delta.model;
    if (delta.subProvider) this.subProvider = delta.subProvider;
    if (delta.content) this.content += delta.content;
    if (delta.reasoning) this.reasoning += delta.reasoning;
    if (delta.finishReason) this.finishReason = delta.finishReason;
    if (delta.usage) this.usage = delta.usage;
  }

  /** Record the explicit end-of-stream terminator */
  markDone(): void {
    this.terminated = true;
  }

  /**
   * A stream is complete after the terminator, or once the provider sent a
   * finish reason (some servers close without `[DONE]`).
   */
  get isComplete(): boolean {
    return this.terminated || this.finishReason !== '';
  }

  get isEmpty(): boolean {
    return this.content === '' && this.reasoning === '';
  }

  get partialContent(): string {
    return this.content;
  }

  toResponse(provider: string): StandardizedResponse {
    return createStandardizedResponse({
      id: this.id,
      created: this.created,
      model: this.model,
      provider,
      content: this.content,
      finish_reason: this.finishReason || 'stop',
      usage: this.usage,
      reasoning: this.reasoning,
      sub_provider: this.subProvider,
    });
  }
}

/**
 * Payloads carried by one message. Servers that end each `data:` line with a
 * single newline run their events together into one multi-line message; when
 * the joined data is not one JSON document, each line is its own payload.
 */
export function payloadsOf(data: string): string[] {
  if (!data.includes('\n') || data.trim() === DONE_SENTINEL || parseJson(data) !== undefined) {
    return [data];
  }
  return data.split('\n');
}

/**
 * Consume an SSE body into one ProviderResult.
 *
 * @throws IncompleteStreamError when the body ends before completion
 * @throws ContentFilterError when a completed stream carried no content
 */
export async function aggregateStream(
  body: ReadableStream<Uint8Array>,
  options: AggregateOptions,
): Promise<ProviderResult> {
  const aggregator = new StreamAggregator();
  let lastRaw: unknown;
  let lastId: string | undefined;

  stream: for await (const message of readSSE(body, options.controller, options.budget)) {
    // Same event id twice in a row is a redelivery
    if (message.id !== undefined && message.id !== '' && message.id === lastId) continue;
    lastId = message.id;

    for (const payload of payloadsOf(message.data)) {
      if (payload.trim() === DONE_SENTINEL) {
        aggregator.markDone();
        break stream;
      }

      const event = parseJson(payload);
      if (event === undefined) continue;

      lastRaw = event;
      aggregator.apply(options.parseEvent(event));
    }
  }

  if (!aggregator.isComplete) {
    throw new IncompleteStreamError(options.provider, aggregator.partialContent);
  }
  if (aggregator.isEmpty) {
    throw new ContentFilterError(options.provider, 'stream completed with no content');
  }

  return { response: aggregator.toResponse(options.provider), raw: lastRaw };
}
