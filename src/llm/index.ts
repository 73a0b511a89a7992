/**
 * LLM abstraction module.
 * Provider-agnostic oracle interface for the planner, step resolver and
 * synthesizer. Only module allowed to make LLM API calls.
 */

import type { LLMClient, LLMClientConfig } from './client.js';
import { MissingCredentialError } from './client.js';
import { createAnthropicClient } from './anthropic.js';
import { createOpenAIClient } from './openai.js';
import { createMockClient } from './mock.js';
import { ORACLE } from '../config/defaults.js';

export * from './client.js';
export * from './parse.js';
export { createAnthropicClient } from './anthropic.js';
export { createOpenAIClient } from './openai.js';
export { createMockClient } from './mock.js';
export type { MockClient, MockCall } from './mock.js';
export { withRateLimitRetry, RateLimitedError, DEFAULT_RETRY } from './retry.js';
export type { RetryPolicy } from './retry.js';

// ── Provider factory ─────────────────────────────────────────

export function createLLMClient(config: LLMClientConfig): LLMClient {
  switch (config.provider) {
    case 'anthropic': {
      if (!config.apiKey) {
        throw new MissingCredentialError('ANTHROPIC_API_KEY', 'anthropic');
      }
      return createAnthropicClient({ ...ORACLE, apiKey: config.apiKey, model: config.model });
    }
    case 'openai': {
      if (!config.apiKey) {
        throw new MissingCredentialError('OPENAI_API_KEY', 'openai');
      }
      return createOpenAIClient({ ...ORACLE, apiKey: config.apiKey, model: config.model });
    }
    case 'mock':
      return createMockClient();
  }
}
