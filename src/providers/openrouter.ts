/**
 * OpenRouter provider for llm-unify.
 *
 * OpenRouter fronts many upstream hosts ("sub-providers") for the same model.
 * Requests can pin or exclude them with `allow_list` / `ignore_list`, and the
 * reply names the one that served it.
 *
 * @see https://openrouter.ai/docs/features/provider-routing
 */

import { z } from 'zod';
import { OpenAICompatibleProvider } from './openai.js';
import { ProviderResponseError } from '../errors.js';
import { RequestController, parseJson, readBody, sendRequest } from '../http.js';
import type { CanonicalRequest, ReasoningConfig } from '../types.js';

// =============================================================================
// OpenRouter API Types
// =============================================================================

const EndpointSchema = z.object({ provider_name: z.string().nullish() }).passthrough();

const EndpointsResponseSchema = z
  .object({
    data: z.union([
      z.array(EndpointSchema),
      z.object({ endpoints: z.array(EndpointSchema) }).passthrough(),
    ]),
  })
  .passthrough();

/** Bound on the sub-provider listing call, in milliseconds */
const LIST_TIMEOUT_MS = 30_000;

// =============================================================================
// OpenRouter Provider Implementation
// =============================================================================

export class OpenRouterProvider extends OpenAICompatibleProvider {
  readonly PROVIDER_NAME = 'openrouter';
  readonly ENV_API_KEY_NAME = 'OPENROUTER_API_KEY';
  readonly PROVIDER_DOCUMENTATION_URL = 'https://openrouter.ai/docs';
  readonly API_BASE = 'https://openrouter.ai/api/v1';

  readonly SUPPORTS_ROUTING = true;
  readonly SUPPORTS_REASONING = true;

  /**
   * Attribution headers, sent only when configured.
   */
  protected buildHeaders(apiKey: string, stream: boolean): Record<string, string> {
    const headers = super.buildHeaders(apiKey, stream);
    const referer = process.env.OPENROUTER_REFERRER;
    const title = process.env.OPENROUTER_TITLE;
    if (referer && !('HTTP-Referer' in headers)) headers['HTTP-Referer'] = referer;
    if (title && !('X-Title' in headers)) headers['X-Title'] = title;
    return headers;
  }

  /**
   * Adds the `provider` routing object.
   * An allow list becomes a strict order with fallbacks disabled.
   */
  protected buildBody(request: CanonicalRequest, stream: boolean): Record<string, unknown> {
    const body = super.buildBody(request, stream);
    const routing: Record<string, unknown> = {};

    if (request.allow_list?.length) {
      routing.order = [...request.allow_list];
      routing.allow_fallbacks = false;
    }
    if (request.ignore_list?.length) {
      routing.ignore = [...request.ignore_list];
    }
    if (Object.keys(routing).length > 0) {
      body.provider = routing;
    }

    return body;
  }

  /**
   * OpenRouter takes the unified `reasoning` object as is.
   */
  protected serializeReasoning(reasoning: ReasoningConfig): Record<string, unknown> {
    const value: Record<string, unknown> = { enabled: reasoning.enabled };
    if (reasoning.max_tokens !== undefined) value.max_tokens = reasoning.max_tokens;
    if (reasoning.effort !== undefined) value.effort = reasoning.effort;
    return { reasoning: value };
  }

  protected subProviderOf(body: { provider?: string | null }): string | null {
    return body.provider ?? null;
  }

  /**
   * List the sub-providers currently serving a model, sorted and de-duplicated.
   *
   * Single attempt, bounded at 30s.
   *
   * @throws ProviderHTTPError, ConnectionError or TimeoutError on transport failure
   * @throws ProviderResponseError when the listing has an unexpected shape
   */
  async listSubProviders(modelId: string, signal?: AbortSignal): Promise<string[]> {
    const apiKey = this.requireApiKey();
    const controller = new RequestController(this.PROVIDER_NAME, signal);

    try {
      const response = await sendRequest(
        `${this.baseUrl}/models/${modelId}/endpoints`,
        { method: 'GET', headers: { ...this.config.headers, 'Authorization': `Bearer ${apiKey}` } },
        controller,
        LIST_TIMEOUT_MS,
      );
      const text = await readBody(response, controller, LIST_TIMEOUT_MS);
      const raw = parseJson(text);

      if (!response.ok) {
        throw this.httpError(response.status, raw, text);
      }

      const parsed = EndpointsResponseSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ProviderResponseError(
          this.PROVIDER_NAME,
          `Unexpected endpoint listing for ${modelId}`,
          { body: raw },
        );
      }

      const endpoints = Array.isArray(parsed.data.data) ? parsed.data.data : parsed.data.data.endpoints;
      const names = new Set<string>();
      for (const endpoint of endpoints) {
        if (endpoint.provider_name) names.add(endpoint.provider_name);
      }
      return [...names].sort();
    } finally {
      controller.dispose();
    }
  }

  /**
   * Check whether any sub-provider currently serves the model.
   */
  async isModelAvailable(modelId: string, signal?: AbortSignal): Promise<boolean> {
    try {
      const providers = await this.listSubProviders(modelId, signal);
      return providers.length > 0;
    } catch (error) {
      this.logger.warn('list_sub_providers_failed', {
        model: modelId,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
