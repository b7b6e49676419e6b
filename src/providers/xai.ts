/**
 * xAI (Grok) provider for llm-unify.
 *
 * @see https://docs.x.ai/docs/api-reference
 */

import { OpenAICompatibleProvider } from './openai.js';
import { InvalidOptionError } from '../errors.js';
import type { CanonicalRequest } from '../types.js';

export class XAIProvider extends OpenAICompatibleProvider {
  readonly PROVIDER_NAME = 'xai';
  readonly ENV_API_KEY_NAME = 'XAI_API_KEY';
  readonly PROVIDER_DOCUMENTATION_URL = 'https://docs.x.ai';
  readonly API_BASE = 'https://api.x.ai/v1';

  readonly SUPPORTS_REASONING = true;

  /**
   * Grok only takes `low` or `high` as reasoning effort.
   */
  validateOptions(request: CanonicalRequest): InvalidOptionError | undefined {
    const problem = super.validateOptions(request);
    if (problem) return problem;

    if (request.reasoning?.effort === 'medium') {
      return new InvalidOptionError("xai accepts reasoning effort 'low' or 'high' only", this.PROVIDER_NAME);
    }
    return undefined;
  }
}
