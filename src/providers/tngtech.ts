import { OpenAICompatibleProvider } from './openai.js';

export class TNGTechProvider extends OpenAICompatibleProvider {
  readonly PROVIDER_NAME = 'tngtech';
  readonly ENV_API_KEY_NAME = 'TNGTECH_API_KEY';
  readonly PROVIDER_DOCUMENTATION_URL = 'https://chat.model.tngtech.com';
  readonly API_BASE = 'https://chat.model.tngtech.com/v1';
}
