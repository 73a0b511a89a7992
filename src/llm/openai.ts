import { z } from 'zod';

import type { LLMClient, ProviderOptions } from './client.js';
import { RateLimitedError, withRateLimitRetry } from './retry.js';

const DEFAULT_MODEL = 'gpt-4o-mini';
const COMPLETIONS_URL = 'https://api.openai.com/v1/chat/completions';

const completionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .nonempty(),
});

function retryAfterMs(response: Response): number | undefined {
  const header = response.headers.get('retry-after');
  if (header === null) return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) ? seconds * 1000 : undefined;
}

/** Oracle backed by the OpenAI chat completions endpoint over plain fetch. */
export function createOpenAIClient(options: ProviderOptions): LLMClient {
  const model = options.model ?? DEFAULT_MODEL;

  async function complete(systemPrompt: string, userPrompt: string): Promise<string> {
    const response = await fetch(COMPLETIONS_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${options.apiKey}`,
      },
      body: JSON.stringify({
        model,
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
      }),
    });

    if (response.status === 429) throw new RateLimitedError('openai', retryAfterMs(response));
    if (!response.ok) {
      throw new Error(`openai API error (${String(response.status)}): ${await response.text()}`);
    }

    const parsed = completionSchema.parse(await response.json());
    return parsed.choices[0].message.content ?? '';
  }

  return {
    generate: (systemPrompt, userPrompt) =>
      withRateLimitRetry(
        'openai',
        () => complete(systemPrompt, userPrompt),
        (err) => err instanceof RateLimitedError,
        options.retry,
      ),
  };
}
