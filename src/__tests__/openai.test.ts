/**
 * Tests for the OpenAI provider and the shared OpenAI-compatible dialect.
 *
 * `fetch` is stubbed; nothing leaves the process.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { OpenAIProvider } from '../providers/openai.js';
import { ChutesProvider } from '../providers/chutes.js';
import { FireworksProvider } from '../providers/fireworks.js';
import { MoonshotProvider } from '../providers/moonshot.js';
import { TNGTechProvider } from '../providers/tngtech.js';
import { XAIProvider } from '../providers/xai.js';
import {
  ContentFilterError,
  InvalidOptionError,
  MissingApiKeyError,
  ProviderHTTPError,
  ProviderResponseError,
} from '../errors.js';
import type { CanonicalRequest } from '../types.js';
import { jsonResponse, requestBody, requestHeaders, requestUrl, sseEvent, sseResponse, stubFetch } from './helpers.js';

const request: CanonicalRequest = {
  model_id: 'gpt-4o-mini',
  messages: [
    { role: 'system', content: 'Be brief.' },
    { role: 'user', content: 'Hi' },
  ],
};

function chatReply(overrides: Record<string, unknown> = {}, message: Record<string, unknown> = {}) {
  return {
    id: 'chatcmpl-1',
    created: 1_700_000_000,
    model: 'gpt-4o-mini',
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content: 'Hello there', ...message },
        finish_reason: 'stop',
      },
    ],
    usage: { prompt_tokens: 9, completion_tokens: 2, total_tokens: 11 },
    ...overrides,
  };
}

describe('OpenAIProvider', () => {
  describe('constructor and metadata', () => {
    it('should create provider with correct metadata', () => {
      const provider = new OpenAIProvider({ apiKey: 'test-key' });

      expect(provider.PROVIDER_NAME).toBe('openai');
      expect(provider.ENV_API_KEY_NAME).toBe('OPENAI_API_KEY');
      expect(provider.API_BASE).toBe('https://api.openai.com/v1');
      expect(provider.PROVIDER_DOCUMENTATION_URL).toBe('https://platform.openai.com/docs');
    });

    it('should get metadata correctly', () => {
      const provider = new OpenAIProvider({ apiKey: 'test-key' });

      expect(provider.getMetadata()).toEqual({
        name: 'openai',
        envKey: 'OPENAI_API_KEY',
        docUrl: 'https://platform.openai.com/docs',
        streaming: true,
        routing: false,
        reasoning: true,
      });
    });
  });

  describe('request translation', () => {
    it('should post the chat-completions body with bearer auth', async () => {
      const fetchMock = stubFetch(jsonResponse(chatReply()));
      const provider = new OpenAIProvider({ apiKey: 'test-key' });

      await provider.execute({ ...request, temperature: 0.2, stop: ['END'], seed: 7 });

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(requestUrl(fetchMock)).toBe('https://api.openai.com/v1/chat/completions');
      expect(requestHeaders(fetchMock).get('Authorization')).toBe('Bearer test-key');
      expect(requestHeaders(fetchMock).get('Content-Type')).toBe('application/json');
      expect(requestBody(fetchMock)).toEqual({
        model: 'gpt-4o-mini',
        messages: request.messages,
        max_tokens: 4096,
        temperature: 0.2,
        stop: ['END'],
        seed: 7,
      });
    });

    it('should honor a base URL override and extra headers', async () => {
      const fetchMock = stubFetch(jsonResponse(chatReply()));
      const provider = new OpenAIProvider({
        apiKey: 'test-key',
        baseUrl: 'http://localhost:8080/v1/',
        headers: { 'X-Trace': 'abc' },
      });

      await provider.execute(request);

      expect(requestUrl(fetchMock)).toBe('http://localhost:8080/v1/chat/completions');
      expect(requestHeaders(fetchMock).get('X-Trace')).toBe('abc');
    });

    it('should send an enabled reasoning effort as reasoning_effort', async () => {
      const fetchMock = stubFetch(jsonResponse(chatReply()));
      const provider = new OpenAIProvider({ apiKey: 'test-key' });

      await provider.execute({ ...request, reasoning: { enabled: true, effort: 'low' } });

      expect(requestBody(fetchMock)).toMatchObject({ reasoning_effort: 'low' });
    });

    it('should send max_completion_tokens to o-series models', async () => {
      const fetchMock = stubFetch(jsonResponse(chatReply()));
      const provider = new OpenAIProvider({ apiKey: 'test-key' });

      await provider.execute({ ...request, model_id: 'o3-mini', max_tokens: 256 });

      const body = requestBody(fetchMock);
      expect(body).toMatchObject({ model: 'o3-mini', max_completion_tokens: 256 });
      expect(body).not.toHaveProperty('max_tokens');
    });

    it('should read the key from the environment', async () => {
      vi.stubEnv('OPENAI_API_KEY', 'env-key');
      const fetchMock = stubFetch(jsonResponse(chatReply()));

      await new OpenAIProvider().execute(request);

      expect(requestHeaders(fetchMock).get('Authorization')).toBe('Bearer env-key');
    });
  });

  describe('validation', () => {
    beforeEach(() => {
      vi.stubEnv('OPENAI_API_KEY', '');
    });

    it('should throw for a missing key before any request', async () => {
      const fetchMock = stubFetch(jsonResponse(chatReply()));

      await expect(new OpenAIProvider().execute(request)).rejects.toBeInstanceOf(MissingApiKeyError);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should reject routing lists before any request', async () => {
      const fetchMock = stubFetch(jsonResponse(chatReply()));
      const provider = new OpenAIProvider({ apiKey: 'test-key' });

      await expect(provider.execute({ ...request, allow_list: ['Azure'] })).rejects.toThrow(
        'allow_list and ignore_list are only supported by routing providers, not openai',
      );
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should reject a raw stream flag', async () => {
      const fetchMock = stubFetch(jsonResponse(chatReply()));
      const provider = new OpenAIProvider({ apiKey: 'test-key' });

      await expect(provider.execute({ ...request, stream: true })).rejects.toBeInstanceOf(InvalidOptionError);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('response standardization', () => {
    it('should standardize a reply', async () => {
      stubFetch(jsonResponse(chatReply()));
      const provider = new OpenAIProvider({ apiKey: 'test-key' });

      const { response, raw } = await provider.execute(request);

      expect(response).toEqual({
        id: 'chatcmpl-1',
        created: 1_700_000_000,
        model: 'gpt-4o-mini',
        provider: 'openai',
        content: 'Hello there',
        finish_reason: 'stop',
        usage: { prompt_tokens: 9, completion_tokens: 2, total_tokens: 11 },
        reasoning: null,
        sub_provider: null,
      });
      expect(raw).toEqual(chatReply());
    });

    it('should pick up reasoning text and reasoning token usage', async () => {
      stubFetch(
        jsonResponse(
          chatReply(
            {
              usage: {
                prompt_tokens: 9,
                completion_tokens: 40,
                total_tokens: 49,
                completion_tokens_details: { reasoning_tokens: 38 },
              },
            },
            { reasoning_content: 'Greeting detected.' },
          ),
        ),
      );
      const provider = new OpenAIProvider({ apiKey: 'test-key' });

      const { response } = await provider.execute(request);

      expect(response.reasoning).toBe('Greeting detected.');
      expect(response.usage.reasoning_tokens).toBe(38);
    });

    it('should join reasoning details', async () => {
      stubFetch(
        jsonResponse(chatReply({}, { reasoning_details: [{ text: 'step one. ' }, { summary: 'step two.' }] })),
      );

      const { response } = await new OpenAIProvider({ apiKey: 'test-key' }).execute(request);

      expect(response.reasoning).toBe('step one. step two.');
    });

    it('should join content parts', async () => {
      stubFetch(jsonResponse(chatReply({}, { content: [{ type: 'text', text: 'Hel' }, { type: 'text', text: 'lo' }] })));

      const { response } = await new OpenAIProvider({ apiKey: 'test-key' }).execute(request);

      expect(response.content).toBe('Hello');
    });
  });

  describe('errors', () => {
    it('should throw ProviderHTTPError with the provider message', async () => {
      stubFetch(jsonResponse({ error: { message: 'Rate limit reached', type: 'requests' } }, 429));

      const failure = await new OpenAIProvider({ apiKey: 'test-key' }).execute(request).catch((e: unknown) => e);

      expect(failure).toBeInstanceOf(ProviderHTTPError);
      expect(failure).toMatchObject({
        statusCode: 429,
        message: 'Request to openai failed (HTTP 429): Rate limit reached',
        body: { error: { message: 'Rate limit reached', type: 'requests' } },
      });
    });

    it('should fall back to the raw text for a non-JSON error body', async () => {
      stubFetch(new Response('upstream exploded', { status: 502 }));

      await expect(new OpenAIProvider({ apiKey: 'test-key' }).execute(request)).rejects.toThrow(
        'Request to openai failed (HTTP 502): upstream exploded',
      );
    });

    it('should turn a body-level error into ProviderResponseError', async () => {
      stubFetch(jsonResponse({ error: { message: 'Overloaded', code: 503 } }));

      const failure = await new OpenAIProvider({ apiKey: 'test-key' }).execute(request).catch((e: unknown) => e);

      expect(failure).toBeInstanceOf(ProviderResponseError);
      expect(failure).toMatchObject({ statusCode: 503, message: 'openai returned an error: Overloaded' });
    });

    it('should keep a string error code as the error type', async () => {
      stubFetch(jsonResponse({ error: { message: 'bad field', code: 'invalid_value' } }));

      const failure = await new OpenAIProvider({ apiKey: 'test-key' }).execute(request).catch((e: unknown) => e);

      expect(failure).toMatchObject({ errorType: 'invalid_value', statusCode: undefined });
    });

    it('should fail closed on a body that is not a chat reply', async () => {
      stubFetch(new Response('<html>maintenance</html>', { status: 200 }));

      await expect(new OpenAIProvider({ apiKey: 'test-key' }).execute(request)).rejects.toThrow(
        'openai returned an error: Malformed response body',
      );
    });

    it('should report a content_filter finish as ContentFilterError', async () => {
      stubFetch(
        jsonResponse({ ...chatReply(), choices: [{ index: 0, message: { content: '' }, finish_reason: 'content_filter' }] }),
      );

      await expect(new OpenAIProvider({ apiKey: 'test-key' }).execute(request)).rejects.toBeInstanceOf(
        ContentFilterError,
      );
    });
  });

  describe('stream transport', () => {
    it('should aggregate chunks into one response', async () => {
      const fetchMock = stubFetch(
        sseResponse([
          sseEvent({ id: 'chatcmpl-9', model: 'gpt-4o-mini', choices: [{ delta: { role: 'assistant', content: 'Hel' } }] }),
          sseEvent({ id: 'chatcmpl-9', choices: [{ delta: { content: 'lo, ' } }] }),
          sseEvent({ id: 'chatcmpl-9', choices: [{ delta: { content: 'world' }, finish_reason: 'stop' }] }),
          sseEvent({ id: 'chatcmpl-9', choices: [], usage: { prompt_tokens: 3, completion_tokens: 3, total_tokens: 6 } }),
          sseEvent('[DONE]'),
        ]),
      );
      const provider = new OpenAIProvider({ apiKey: 'test-key' });

      const { response } = await provider.execute({ ...request, transport: 'stream' });

      expect(requestBody(fetchMock)).toMatchObject({ stream: true });
      expect(requestHeaders(fetchMock).get('Accept')).toBe('text/event-stream');
      expect(response.content).toBe('Hello, world');
      expect(response.finish_reason).toBe('stop');
      expect(response.id).toBe('chatcmpl-9');
      expect(response.usage).toEqual({ prompt_tokens: 3, completion_tokens: 3, total_tokens: 6 });
    });

    it('should accept data lines terminated by a single newline', async () => {
      stubFetch(
        sseResponse([
          `data: ${JSON.stringify({ choices: [{ delta: { content: 'Hello ' } }] })}\n`,
          `data: ${JSON.stringify({ choices: [{ delta: { content: 'world' }, finish_reason: 'stop' }] })}\n`,
          'data: [DONE]\n',
        ]),
      );
      const provider = new OpenAIProvider({ apiKey: 'test-key' });

      const { response } = await provider.execute({ ...request, transport: 'stream' });

      expect(response.content).toBe('Hello world');
      expect(response.finish_reason).toBe('stop');
    });

    it('should throw for an error event mid-stream', async () => {
      stubFetch(
        sseResponse([
          sseEvent({ choices: [{ delta: { content: 'par' } }] }),
          sseEvent({ error: { message: 'Provider disconnected', code: 502 } }),
        ]),
      );

      const failure = await new OpenAIProvider({ apiKey: 'test-key' })
        .stream(request)
        .catch((e: unknown) => e);

      expect(failure).toBeInstanceOf(ProviderResponseError);
      expect(failure).toMatchObject({ statusCode: 502 });
    });

    it('should throw ProviderHTTPError when the stream is refused', async () => {
      stubFetch(jsonResponse({ error: { message: 'Invalid key' } }, 401));

      await expect(new OpenAIProvider({ apiKey: 'test-key' }).stream(request)).rejects.toThrow(
        'Request to openai failed (HTTP 401): Invalid key',
      );
    });
  });
});

describe('OpenAI-compatible providers', () => {
  it.each([
    [new FireworksProvider({ apiKey: 'test-key' }), 'https://api.fireworks.ai/inference/v1/chat/completions'],
    [new ChutesProvider({ apiKey: 'test-key' }), 'https://llm.chutes.ai/v1/chat/completions'],
    [new XAIProvider({ apiKey: 'test-key' }), 'https://api.x.ai/v1/chat/completions'],
    [new MoonshotProvider({ apiKey: 'test-key' }), 'https://api.moonshot.ai/v1/chat/completions'],
    [new TNGTechProvider({ apiKey: 'test-key' }), 'https://chat.model.tngtech.com/v1/chat/completions'],
  ])('should post %s requests to its own endpoint', async (provider, url) => {
    const fetchMock = stubFetch(jsonResponse(chatReply()));

    const { response } = await provider.execute(request);

    expect(requestUrl(fetchMock)).toBe(url);
    expect(response.provider).toBe(provider.PROVIDER_NAME);
  });

  it('should name each environment variable', () => {
    expect(new FireworksProvider().ENV_API_KEY_NAME).toBe('FIREWORKS_API_KEY');
    expect(new ChutesProvider().ENV_API_KEY_NAME).toBe('CHUTES_API_TOKEN');
    expect(new XAIProvider().ENV_API_KEY_NAME).toBe('XAI_API_KEY');
    expect(new MoonshotProvider().ENV_API_KEY_NAME).toBe('MOONSHOT_API_KEY');
    expect(new TNGTechProvider().ENV_API_KEY_NAME).toBe('TNGTECH_API_KEY');
  });

  it('should reject a medium reasoning effort for xai', async () => {
    const fetchMock = stubFetch(jsonResponse(chatReply()));
    const provider = new XAIProvider({ apiKey: 'test-key' });

    await expect(
      provider.execute({ ...request, reasoning: { enabled: true, effort: 'medium' } }),
    ).rejects.toThrow("xai accepts reasoning effort 'low' or 'high' only");
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
