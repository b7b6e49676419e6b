/**
 * Chutes provider for llm-unify. Note the key variable is a token, not a key.
 */

import { OpenAICompatibleProvider } from './openai.js';

export class ChutesProvider extends OpenAICompatibleProvider {
  readonly PROVIDER_NAME = 'chutes';
  readonly ENV_API_KEY_NAME = 'CHUTES_API_TOKEN';
  readonly PROVIDER_DOCUMENTATION_URL = 'https://chutes.ai/docs';
  readonly API_BASE = 'https://llm.chutes.ai/v1';
}
