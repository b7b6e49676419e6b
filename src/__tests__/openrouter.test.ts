/**
 * Tests for OpenRouter routing, reasoning and sub-provider listing.
 */

import { describe, it, expect, vi } from 'vitest';
import { OpenRouterProvider } from '../providers/openrouter.js';
import { InvalidOptionError, ProviderHTTPError, ProviderResponseError } from '../errors.js';
import type { CanonicalRequest } from '../types.js';
import { jsonResponse, requestBody, requestHeaders, requestUrl, sseEvent, sseResponse, stubFetch } from './helpers.js';

const request: CanonicalRequest = {
  model_id: 'deepseek/deepseek-chat',
  messages: [{ role: 'user', content: 'Hi' }],
};

const reply = {
  id: 'gen-123',
  created: 1_700_000_000,
  model: 'deepseek/deepseek-chat',
  provider: 'DeepInfra',
  choices: [{ index: 0, message: { role: 'assistant', content: 'Hello!' }, finish_reason: 'stop' }],
  usage: { prompt_tokens: 4, completion_tokens: 2, total_tokens: 6 },
};

describe('OpenRouterProvider', () => {
  it('should report routing and reasoning support', () => {
    const metadata = new OpenRouterProvider({ apiKey: 'test-key' }).getMetadata();

    expect(metadata.name).toBe('openrouter');
    expect(metadata.envKey).toBe('OPENROUTER_API_KEY');
    expect(metadata.routing).toBe(true);
    expect(metadata.reasoning).toBe(true);
  });

  describe('routing', () => {
    it('should pin an allow list as a strict order without fallbacks', async () => {
      const fetchMock = stubFetch(jsonResponse(reply));
      const provider = new OpenRouterProvider({ apiKey: 'test-key' });

      await provider.execute({ ...request, allow_list: ['DeepInfra', 'Together'] });

      expect(requestUrl(fetchMock)).toBe('https://openrouter.ai/api/v1/chat/completions');
      expect(requestBody(fetchMock)).toMatchObject({
        provider: { order: ['DeepInfra', 'Together'], allow_fallbacks: false },
      });
    });

    it('should send an ignore list', async () => {
      const fetchMock = stubFetch(jsonResponse(reply));

      await new OpenRouterProvider({ apiKey: 'test-key' }).execute({ ...request, ignore_list: ['Novita'] });

      expect(requestBody(fetchMock)).toMatchObject({ provider: { ignore: ['Novita'] } });
    });

    it('should omit the routing object when no list is given', async () => {
      const fetchMock = stubFetch(jsonResponse(reply));

      await new OpenRouterProvider({ apiKey: 'test-key' }).execute(request);

      expect(requestBody(fetchMock)).not.toHaveProperty('provider');
    });

    it('should reject both lists before any request', async () => {
      const fetchMock = stubFetch(jsonResponse(reply));
      const provider = new OpenRouterProvider({ apiKey: 'test-key' });

      await expect(
        provider.execute({ ...request, allow_list: ['DeepInfra'], ignore_list: ['Novita'] }),
      ).rejects.toBeInstanceOf(InvalidOptionError);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should report the sub-provider that served the reply', async () => {
      stubFetch(jsonResponse(reply));

      const { response } = await new OpenRouterProvider({ apiKey: 'test-key' }).execute(request);

      expect(response.sub_provider).toBe('DeepInfra');
      expect(response.provider).toBe('openrouter');
      expect(response.content).toBe('Hello!');
    });

    it('should report the sub-provider on the stream transport', async () => {
      stubFetch(
        sseResponse([
          ': OPENROUTER PROCESSING\n\n',
          sseEvent({ id: 'gen-9', provider: 'Together', choices: [{ delta: { content: 'Hi' } }] }),
          sseEvent({ id: 'gen-9', provider: 'Together', choices: [{ delta: { content: '!' }, finish_reason: 'stop' }] }),
          sseEvent('[DONE]'),
        ]),
      );

      const { response } = await new OpenRouterProvider({ apiKey: 'test-key' }).stream(request);

      expect(response.content).toBe('Hi!');
      expect(response.sub_provider).toBe('Together');
    });
  });

  describe('reasoning', () => {
    it('should pass the reasoning object through', async () => {
      const fetchMock = stubFetch(jsonResponse(reply));

      await new OpenRouterProvider({ apiKey: 'test-key' }).execute({
        ...request,
        reasoning: { enabled: true, max_tokens: 2048 },
      });

      const body = requestBody(fetchMock);
      expect(body).toMatchObject({ reasoning: { enabled: true, max_tokens: 2048 } });
      expect(body).not.toHaveProperty('reasoning_effort');
    });

    it('should send a disabled reasoning override', async () => {
      const fetchMock = stubFetch(jsonResponse(reply));

      await new OpenRouterProvider({ apiKey: 'test-key' }).execute({ ...request, reasoning: { enabled: false } });

      expect(requestBody(fetchMock)).toMatchObject({ reasoning: { enabled: false } });
    });

    it('should read the reasoning field of the reply', async () => {
      stubFetch(
        jsonResponse({
          ...reply,
          choices: [{ message: { content: 'Hello!', reasoning: 'The user greets me.' }, finish_reason: 'stop' }],
        }),
      );

      const { response } = await new OpenRouterProvider({ apiKey: 'test-key' }).execute(request);

      expect(response.reasoning).toBe('The user greets me.');
    });
  });

  describe('attribution headers', () => {
    it('should send referrer and title only when configured', async () => {
      vi.stubEnv('OPENROUTER_REFERRER', 'https://example.test');
      vi.stubEnv('OPENROUTER_TITLE', 'Example App');
      const fetchMock = stubFetch(jsonResponse(reply));

      await new OpenRouterProvider({ apiKey: 'test-key' }).execute(request);

      expect(requestHeaders(fetchMock).get('HTTP-Referer')).toBe('https://example.test');
      expect(requestHeaders(fetchMock).get('X-Title')).toBe('Example App');
    });

    it('should not send attribution by default', async () => {
      vi.stubEnv('OPENROUTER_REFERRER', '');
      vi.stubEnv('OPENROUTER_TITLE', '');
      const fetchMock = stubFetch(jsonResponse(reply));

      await new OpenRouterProvider({ apiKey: 'test-key' }).execute(request);

      expect(requestHeaders(fetchMock).has('HTTP-Referer')).toBe(false);
      expect(requestHeaders(fetchMock).has('X-Title')).toBe(false);
    });
  });

  describe('listSubProviders', () => {
    it('should list sorted unique provider names', async () => {
      const fetchMock = stubFetch(
        jsonResponse({
          data: {
            id: 'deepseek/deepseek-chat',
            endpoints: [
              { provider_name: 'Together' },
              { provider_name: 'DeepInfra' },
              { provider_name: 'Together' },
              { provider_name: null },
            ],
          },
        }),
      );

      const names = await new OpenRouterProvider({ apiKey: 'test-key' }).listSubProviders('deepseek/deepseek-chat');

      expect(names).toEqual(['DeepInfra', 'Together']);
      expect(requestUrl(fetchMock)).toBe('https://openrouter.ai/api/v1/models/deepseek/deepseek-chat/endpoints');
      expect(requestHeaders(fetchMock).get('Authorization')).toBe('Bearer test-key');
    });

    it('should accept a flat endpoint array', async () => {
      stubFetch(jsonResponse({ data: [{ provider_name: 'Fireworks' }, { provider_name: 'Chutes' }] }));

      const names = await new OpenRouterProvider({ apiKey: 'test-key' }).listSubProviders('m');

      expect(names).toEqual(['Chutes', 'Fireworks']);
    });

    it('should throw ProviderHTTPError for an unknown model', async () => {
      stubFetch(jsonResponse({ error: { message: 'Model not found' } }, 404));

      const failure = await new OpenRouterProvider({ apiKey: 'test-key' })
        .listSubProviders('missing/model')
        .catch((e: unknown) => e);

      expect(failure).toBeInstanceOf(ProviderHTTPError);
      expect(failure).toMatchObject({ statusCode: 404 });
    });

    it('should throw ProviderResponseError for an unexpected shape', async () => {
      stubFetch(jsonResponse({ models: [] }));

      await expect(new OpenRouterProvider({ apiKey: 'test-key' }).listSubProviders('m')).rejects.toBeInstanceOf(
        ProviderResponseError,
      );
    });

    it('should report availability without throwing', async () => {
      stubFetch(jsonResponse({ data: [] }), new TypeError('fetch failed'));
      const provider = new OpenRouterProvider({ apiKey: 'test-key' });

      expect(await provider.isModelAvailable('m')).toBe(false);
      expect(await provider.isModelAvailable('m')).toBe(false);
    });
  });
});
