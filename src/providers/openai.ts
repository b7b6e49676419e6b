/**
 * OpenAI LLM Provider for llm-unify.
 *
 * Also the base for every provider that speaks the OpenAI chat-completions
 * dialect (Fireworks, Chutes, xAI, Moonshot, TNG, OpenRouter).
 *
 * @see https://platform.openai.com/docs/api-reference
 */

import { z } from 'zod';
import { BaseProvider, type ProviderCall } from './base.js';
import { ContentFilterError, ProviderHTTPError, ProviderResponseError } from '../errors.js';
import { parseJson, readBody, sendRequest } from '../http.js';
import { aggregateStream, type StreamDelta } from '../streaming.js';
import {
  createStandardizedResponse,
  type CanonicalRequest,
  type CompletionUsage,
  type ProviderResult,
  type ReasoningConfig,
  type StandardizedResponse,
} from '../types.js';

// =============================================================================
// OpenAI API Types
// =============================================================================

const TextPartSchema = z.object({ text: z.string().nullish() }).passthrough();

const ReasoningDetailSchema = z
  .object({
    text: z.string().nullish(),
    summary: z.string().nullish(),
  })
  .passthrough();

const OpenAIMessageSchema = z
  .object({
    role: z.string().nullish(),
    content: z.union([z.string(), z.array(TextPartSchema)]).nullish(),
    reasoning: z.string().nullish(),
    reasoning_content: z.string().nullish(),
    reasoning_details: z.array(ReasoningDetailSchema).nullish(),
  })
  .passthrough();

export const OpenAIErrorSchema = z
  .object({
    message: z.string().nullish(),
    type: z.string().nullish(),
    code: z.union([z.string(), z.number()]).nullish(),
  })
  .passthrough();

const OpenAIUsageSchema = z
  .object({
    prompt_tokens: z.number().nullish(),
    completion_tokens: z.number().nullish(),
    total_tokens: z.number().nullish(),
    completion_tokens_details: z
      .object({ reasoning_tokens: z.number().nullish() })
      .passthrough()
      .nullish(),
  })
  .passthrough();

const OpenAIChoiceSchema = z
  .object({
    index: z.number().nullish(),
    message: OpenAIMessageSchema.nullish(),
    delta: OpenAIMessageSchema.nullish(),
    finish_reason: z.string().nullish(),
    error: OpenAIErrorSchema.nullish(),
  })
  .passthrough();

/** Reply body and stream chunk share one shape */
const OpenAIChatResponseSchema = z
  .object({
    id: z.string().nullish(),
    created: z.number().nullish(),
    model: z.string().nullish(),
    provider: z.string().nullish(),
    choices: z.array(OpenAIChoiceSchema).nullish(),
    usage: OpenAIUsageSchema.nullish(),
    error: z.union([OpenAIErrorSchema, z.string()]).nullish(),
  })
  .passthrough();

type OpenAIMessage = z.infer<typeof OpenAIMessageSchema>;
type OpenAIError = z.infer<typeof OpenAIErrorSchema>;
type OpenAIUsage = z.infer<typeof OpenAIUsageSchema>;
type OpenAIChoice = z.infer<typeof OpenAIChoiceSchema>;
type OpenAIChatResponse = z.infer<typeof OpenAIChatResponseSchema>;

// =============================================================================
// Helpers
// =============================================================================

function textOf(content: OpenAIMessage['content']): string {
  if (typeof content === 'string') return content;
  if (Array.isArray(content)) return content.map((part) => part.text ?? '').join('');
  return '';
}

function reasoningOf(message: OpenAIMessage | null | undefined): string {
  if (!message) return '';
  if (message.reasoning) return message.reasoning;
  if (message.reasoning_content) return message.reasoning_content;
  if (message.reasoning_details) {
    return message.reasoning_details.map((detail) => detail.text ?? detail.summary ?? '').join('');
  }
  return '';
}

function toUsage(usage: OpenAIUsage | null | undefined): CompletionUsage | null {
  if (!usage) return null;
  return {
    prompt_tokens: usage.prompt_tokens ?? undefined,
    completion_tokens: usage.completion_tokens ?? undefined,
    total_tokens: usage.total_tokens ?? undefined,
    reasoning_tokens: usage.completion_tokens_details?.reasoning_tokens ?? undefined,
  };
}

/**
 * Pull a readable message out of an error body.
 */
export function extractErrorMessage(body: unknown, fallback: string): string {
  if (body !== null && typeof body === 'object' && 'error' in body) {
    const { error } = body;
    if (typeof error === 'string') return error;
    const parsed = OpenAIErrorSchema.safeParse(error);
    if (parsed.success && parsed.data.message) return parsed.data.message;
  }
  return fallback;
}

// =============================================================================
// OpenAI-Compatible Provider
// =============================================================================

/**
 * Base class for OpenAI-compatible providers.
 * Subclasses only declare their metadata; dialect differences go in the hooks.
 */
export abstract class OpenAICompatibleProvider extends BaseProvider {
  /**
   * Headers for one request.
   */
  protected buildHeaders(apiKey: string, stream: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      ...this.baseHeaders(),
      'Authorization': `Bearer ${apiKey}`,
    };
    if (stream) {
      headers['Accept'] = 'text/event-stream';
    }
    return headers;
  }

  /**
   * Translate a canonical request into the chat-completions body.
   */
  protected buildBody(request: CanonicalRequest, stream: boolean): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: request.model_id,
      messages: request.messages.map(({ role, content }) => ({ role, content })),
      max_tokens: request.max_tokens ?? this.DEFAULT_MAX_TOKENS,
    };

    if (request.temperature !== undefined) {
      body.temperature = request.temperature;
    }
    if (request.top_p !== undefined) {
      body.top_p = request.top_p;
    }
    if (request.stop !== undefined) {
      body.stop = request.stop;
    }
    if (request.seed !== undefined) {
      body.seed = request.seed;
    }
    if (request.reasoning) {
      Object.assign(body, this.serializeReasoning(request.reasoning));
    }
    if (stream) {
      body.stream = true;
    }

    return body;
  }

  /**
   * Reasoning fields for the request body. The plain dialect only knows an effort level.
   */
  protected serializeReasoning(reasoning: ReasoningConfig): Record<string, unknown> {
    if (reasoning.enabled && reasoning.effort) {
      return { reasoning_effort: reasoning.effort };
    }
    return {};
  }

  /**
   * Upstream name carried by a reply, for routing providers.
   */
  protected subProviderOf(_body: OpenAIChatResponse): string | null {
    return null;
  }

  protected async complete(request: CanonicalRequest, call: ProviderCall): Promise<ProviderResult> {
    const response = await sendRequest(
      `${this.baseUrl}/chat/completions`,
      {
        method: 'POST',
        headers: this.buildHeaders(call.apiKey, false),
        body: JSON.stringify(this.buildBody(request, false)),
      },
      call.controller,
      call.budget.connectMs,
    );
    const text = await readBody(response, call.controller, call.budget.readMs);
    const raw = parseJson(text);

    if (!response.ok) {
      throw this.httpError(response.status, raw, text);
    }

    return { response: this.standardize(raw), raw };
  }

  protected async streamCompletion(request: CanonicalRequest, call: ProviderCall): Promise<ProviderResult> {
    const response = await sendRequest(
      `${this.baseUrl}/chat/completions`,
      {
        method: 'POST',
        headers: this.buildHeaders(call.apiKey, true),
        body: JSON.stringify(this.buildBody(request, true)),
      },
      call.controller,
      call.budget.connectMs,
    );

    if (!response.ok) {
      const text = await readBody(response, call.controller, call.budget.readMs);
      throw this.httpError(response.status, parseJson(text), text);
    }
    if (!response.body) {
      throw new ProviderResponseError(this.PROVIDER_NAME, 'No response body for streaming');
    }

    return aggregateStream(response.body, {
      provider: this.PROVIDER_NAME,
      controller: call.controller,
      budget: call.budget,
      parseEvent: (event) => this.parseStreamEvent(event),
    });
  }

  /**
   * Build the error for a non-2xx reply.
   */
  protected httpError(status: number, body: unknown, text: string): ProviderHTTPError {
    const message = extractErrorMessage(body, text.slice(0, 200) || `HTTP ${status}`);
    return new ProviderHTTPError(this.PROVIDER_NAME, status, message, body ?? text);
  }

  /**
   * Error for an `error` object inside a 2xx body or stream event.
   * A numeric code in the HTTP range classifies like that status.
   */
  protected bodyError(error: OpenAIError | string, body: unknown): ProviderResponseError {
    if (typeof error === 'string') {
      return new ProviderResponseError(this.PROVIDER_NAME, error, { body });
    }
    const { code } = error;
    const statusCode = typeof code === 'number' && code >= 400 && code < 600 ? code : undefined;
    const errorType = error.type ?? (typeof code === 'string' ? code : undefined);
    return new ProviderResponseError(this.PROVIDER_NAME, error.message ?? 'Unknown error', {
      statusCode,
      errorType,
      body,
    });
  }

  private parseBody(raw: unknown): OpenAIChatResponse {
    const parsed = OpenAIChatResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProviderResponseError(this.PROVIDER_NAME, 'Malformed response body', { body: raw });
    }
    if (parsed.data.error) {
      throw this.bodyError(parsed.data.error, raw);
    }
    return parsed.data;
  }

  private checkChoice(choice: OpenAIChoice | undefined): void {
    if (!choice) return;
    if (choice.error) {
      throw new ContentFilterError(this.PROVIDER_NAME, choice.error.message ?? 'Content filtered');
    }
    if (choice.finish_reason === 'content_filter') {
      throw new ContentFilterError(this.PROVIDER_NAME, 'Response stopped due to content filter');
    }
  }

  /**
   * Convert a chat-completions reply to the canonical response.
   */
  protected standardize(raw: unknown): StandardizedResponse {
    const body = this.parseBody(raw);
    const choice = body.choices?.[0];
    this.checkChoice(choice);

    return createStandardizedResponse({
      id: body.id,
      created: body.created,
      model: body.model,
      provider: this.PROVIDER_NAME,
      content: textOf(choice?.message?.content),
      finish_reason: choice?.finish_reason,
      usage: toUsage(body.usage),
      reasoning: reasoningOf(choice?.message),
      sub_provider: this.subProviderOf(body),
    });
  }

  /**
   * Convert one stream chunk into a delta.
   */
  protected parseStreamEvent(event: unknown): StreamDelta {
    const body = this.parseBody(event);
    const choice = body.choices?.[0];
    this.checkChoice(choice);

    // Some servers send whole messages instead of deltas
    const part = choice?.delta ?? choice?.message;
    return {
      id: body.id,
      created: body.created,
      model: body.model,
      content: textOf(part?.content),
      reasoning: reasoningOf(part),
      finishReason: choice?.finish_reason,
      usage: toUsage(body.usage),
      subProvider: this.subProviderOf(body),
    };
  }
}

// =============================================================================
// OpenAI Provider Implementation
// =============================================================================

export class OpenAIProvider extends OpenAICompatibleProvider {
  readonly PROVIDER_NAME = 'openai';
  readonly ENV_API_KEY_NAME = 'OPENAI_API_KEY';
  readonly PROVIDER_DOCUMENTATION_URL = 'https://platform.openai.com/docs';
  readonly API_BASE = 'https://api.openai.com/v1';

  readonly SUPPORTS_REASONING = true;

  /**
   * o-series models only accept `max_completion_tokens`.
   */
  protected buildBody(request: CanonicalRequest, stream: boolean): Record<string, unknown> {
    const body = super.buildBody(request, stream);
    if (/^o\d/.test(request.model_id)) {
      body.max_completion_tokens = body.max_tokens;
      delete body.max_tokens;
    }
    return body;
  }
}
