import Anthropic from '@anthropic-ai/sdk';

import type { LLMClient, ProviderOptions } from './client.js';
import { withRateLimitRetry } from './retry.js';

const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';

function isRateLimit(err: unknown): boolean {
  return err instanceof Anthropic.RateLimitError;
}

/** Oracle backed by the Anthropic Messages API; text blocks are joined. */
export function createAnthropicClient(options: ProviderOptions): LLMClient {
  const model = options.model ?? DEFAULT_MODEL;
  // The SDK has its own retry loop; ours logs, so turn the SDK's off
  const client = new Anthropic({ apiKey: options.apiKey, maxRetries: 0 });

  return {
    async generate(systemPrompt: string, userPrompt: string): Promise<string> {
      const message = await withRateLimitRetry(
        'anthropic',
        () =>
          client.messages.create({
            model,
            max_tokens: options.maxTokens,
            temperature: options.temperature,
            system: systemPrompt,
            messages: [{ role: 'user', content: userPrompt }],
          }),
        isRateLimit,
        options.retry,
      );

      const text = message.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('');
      if (text.length === 0) {
        throw new Error(`anthropic returned no text (stop reason: ${String(message.stop_reason)})`);
      }
      return text;
    },
  };
}
