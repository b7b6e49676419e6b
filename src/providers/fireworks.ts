/**
 * Fireworks AI provider for llm-unify.
 *
 * @see https://docs.fireworks.ai/api-reference/post-chatcompletions
 */

import { OpenAICompatibleProvider } from './openai.js';

export class FireworksProvider extends OpenAICompatibleProvider {
  readonly PROVIDER_NAME = 'fireworks';
  readonly ENV_API_KEY_NAME = 'FIREWORKS_API_KEY';
  readonly PROVIDER_DOCUMENTATION_URL = 'https://docs.fireworks.ai';
  readonly API_BASE = 'https://api.fireworks.ai/inference/v1';

  readonly SUPPORTS_REASONING = true;
}
