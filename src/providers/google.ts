/**
 * Google Gemini provider for llm-unify.
 *
 * Speaks the native `generateContent` API rather than an OpenAI-compatible
 * endpoint. No SSE transport.
 *
 * @see https://ai.google.dev/api/generate-content
 */

import { z } from 'zod';
import { BaseProvider, type ProviderCall } from './base.js';
import { ContentFilterError, ProviderHTTPError, ProviderResponseError } from '../errors.js';
import { parseJson, readBody, sendRequest } from '../http.js';
import {
  createStandardizedResponse,
  type CanonicalRequest,
  type Message,
  type ProviderResult,
  type ReasoningConfig,
  type ReasoningEffort,
  type StandardizedResponse,
} from '../types.js';

// =============================================================================
// Gemini API Types
// =============================================================================

interface GeminiContent {
  role?: 'user' | 'model';
  parts: Array<{ text: string }>;
}

const GeminiErrorSchema = z
  .object({
    code: z.number().nullish(),
    message: z.string().nullish(),
    status: z.string().nullish(),
  })
  .passthrough();

const GeminiPartSchema = z
  .object({
    text: z.string().nullish(),
    thought: z.boolean().nullish(),
  })
  .passthrough();

const GeminiCandidateSchema = z
  .object({
    content: z.object({ parts: z.array(GeminiPartSchema).nullish() }).passthrough().nullish(),
    finishReason: z.string().nullish(),
  })
  .passthrough();

const GeminiResponseSchema = z
  .object({
    responseId: z.string().nullish(),
    modelVersion: z.string().nullish(),
    candidates: z.array(GeminiCandidateSchema).nullish(),
    promptFeedback: z.object({ blockReason: z.string().nullish() }).passthrough().nullish(),
    usageMetadata: z
      .object({
        promptTokenCount: z.number().nullish(),
        candidatesTokenCount: z.number().nullish(),
        totalTokenCount: z.number().nullish(),
        thoughtsTokenCount: z.number().nullish(),
      })
      .passthrough()
      .nullish(),
    error: GeminiErrorSchema.nullish(),
  })
  .passthrough();

const HARM_CATEGORIES = [
  'HARM_CATEGORY_HARASSMENT',
  'HARM_CATEGORY_HATE_SPEECH',
  'HARM_CATEGORY_SEXUALLY_EXPLICIT',
  'HARM_CATEGORY_DANGEROUS_CONTENT',
] as const;

/** Candidate finish reasons that mean the output was withheld */
const FILTERED_FINISH_REASONS = new Set(['SAFETY', 'RECITATION', 'OTHER']);

const FINISH_REASON_MAP: Record<string, string> = {
  STOP: 'stop',
  MAX_TOKENS: 'length',
  SAFETY: 'content_filter',
  RECITATION: 'content_filter',
  OTHER: 'error',
  FINISH_REASON_UNSPECIFIED: 'error',
};

/** Thinking budget per effort level, in tokens */
const THINKING_BUDGETS: Record<ReasoningEffort, number> = {
  low: 1024,
  medium: 8192,
  high: 24576,
};

/**
 * Map a Gemini finish reason to the canonical vocabulary.
 */
export function normalizeFinishReason(reason: string | null | undefined): string {
  if (!reason) return '';
  return FINISH_REASON_MAP[reason] ?? reason.toLowerCase();
}

// =============================================================================
// Google Provider Implementation
// =============================================================================

export class GoogleProvider extends BaseProvider {
  readonly PROVIDER_NAME = 'google';
  readonly ENV_API_KEY_NAME = 'GEMINI_API_KEY';
  readonly PROVIDER_DOCUMENTATION_URL = 'https://ai.google.dev/gemini-api/docs';
  readonly API_BASE = 'https://generativelanguage.googleapis.com/v1beta';

  readonly SUPPORTS_STREAMING = false;
  readonly SUPPORTS_REASONING = true;

  /**
   * Convert messages to Gemini contents. System messages go to `systemInstruction`
   * and empty messages are dropped.
   */
  private convertMessages(messages: Message[]): { contents: GeminiContent[]; system?: string } {
    const contents: GeminiContent[] = [];
    const system: string[] = [];

    for (const message of messages) {
      if (!message.content) continue;
      if (message.role === 'system') {
        system.push(message.content);
        continue;
      }
      contents.push({
        role: message.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: message.content }],
      });
    }

    return { contents, system: system.length > 0 ? system.join('\n\n') : undefined };
  }

  private thinkingConfig(reasoning: ReasoningConfig): Record<string, unknown> {
    if (!reasoning.enabled) {
      return { thinkingBudget: 0 };
    }
    const config: Record<string, unknown> = { includeThoughts: true };
    if (reasoning.max_tokens !== undefined) {
      config.thinkingBudget = reasoning.max_tokens;
    } else if (reasoning.effort !== undefined) {
      config.thinkingBudget = THINKING_BUDGETS[reasoning.effort];
    }
    return config;
  }

  protected buildBody(request: CanonicalRequest): Record<string, unknown> {
    const { contents, system } = this.convertMessages(request.messages);

    const generationConfig: Record<string, unknown> = {
      maxOutputTokens: request.max_tokens ?? this.DEFAULT_MAX_TOKENS,
    };
    if (request.temperature !== undefined) generationConfig.temperature = request.temperature;
    if (request.top_p !== undefined) generationConfig.topP = request.top_p;
    if (request.stop !== undefined) {
      generationConfig.stopSequences = typeof request.stop === 'string' ? [request.stop] : request.stop;
    }
    if (request.seed !== undefined) generationConfig.seed = request.seed;
    if (request.reasoning) generationConfig.thinkingConfig = this.thinkingConfig(request.reasoning);

    const body: Record<string, unknown> = {
      contents,
      safetySettings: HARM_CATEGORIES.map((category) => ({ category, threshold: 'BLOCK_NONE' })),
      generationConfig,
    };
    if (system) {
      body.systemInstruction = { parts: [{ text: system }] };
    }
    return body;
  }

  protected async complete(request: CanonicalRequest, call: ProviderCall): Promise<ProviderResult> {
    const response = await sendRequest(
      `${this.baseUrl}/models/${request.model_id}:generateContent`,
      {
        method: 'POST',
        headers: { ...this.baseHeaders(), 'x-goog-api-key': call.apiKey },
        body: JSON.stringify(this.buildBody(request)),
      },
      call.controller,
      call.budget.connectMs,
    );
    const text = await readBody(response, call.controller, call.budget.readMs);
    const raw = parseJson(text);

    if (!response.ok) {
      const parsed = z.object({ error: GeminiErrorSchema }).passthrough().safeParse(raw);
      const message = parsed.success && parsed.data.error.message
        ? parsed.data.error.message
        : text.slice(0, 200) || `HTTP ${response.status}`;
      throw new ProviderHTTPError(this.PROVIDER_NAME, response.status, message, raw ?? text);
    }

    return { response: this.standardize(raw, request.model_id), raw };
  }

  /**
   * Convert a generateContent reply to the canonical response.
   */
  protected standardize(raw: unknown, modelId: string): StandardizedResponse {
    const parsed = GeminiResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProviderResponseError(this.PROVIDER_NAME, 'Malformed response body', { body: raw });
    }
    const body = parsed.data;

    if (body.error) {
      const { code } = body.error;
      throw new ProviderResponseError(this.PROVIDER_NAME, body.error.message ?? 'Unknown error', {
        statusCode: typeof code === 'number' && code >= 400 && code < 600 ? code : undefined,
        errorType: body.error.status ?? undefined,
        body: raw,
      });
    }

    const blockReason = body.promptFeedback?.blockReason;
    if (blockReason) {
      throw new ContentFilterError(this.PROVIDER_NAME, `Prompt blocked due to: ${blockReason}`);
    }

    const candidate = body.candidates?.[0];
    const finishReason = candidate?.finishReason;
    if (finishReason && FILTERED_FINISH_REASONS.has(finishReason)) {
      throw new ContentFilterError(this.PROVIDER_NAME, `Response stopped due to: ${finishReason}`);
    }

    let content = '';
    let reasoning = '';
    for (const part of candidate?.content?.parts ?? []) {
      if (!part.text) continue;
      if (part.thought) reasoning += part.text;
      else content += part.text;
    }

    const usage = body.usageMetadata;
    return createStandardizedResponse({
      id: body.responseId,
      created: null,
      model: body.modelVersion ?? modelId,
      provider: this.PROVIDER_NAME,
      content,
      finish_reason: normalizeFinishReason(finishReason),
      usage: usage
        ? {
            prompt_tokens: usage.promptTokenCount ?? undefined,
            completion_tokens: usage.candidatesTokenCount ?? undefined,
            total_tokens: usage.totalTokenCount ?? undefined,
            reasoning_tokens: usage.thoughtsTokenCount ?? undefined,
          }
        : null,
      reasoning,
    });
  }
}
