import { OpenAICompatibleProvider } from './openai.js';

/**
 * Moonshot (Kimi) provider.
 */
export class MoonshotProvider extends OpenAICompatibleProvider {
  readonly PROVIDER_NAME = 'moonshot';
  readonly ENV_API_KEY_NAME = 'MOONSHOT_API_KEY';
  readonly PROVIDER_DOCUMENTATION_URL = 'https://platform.moonshot.ai/docs';
  readonly API_BASE = 'https://api.moonshot.ai/v1';
}
