import type { LLMClient } from './client.js';

const DEFAULT_RESPONSE = '{"result":"mock"}';

export interface MockCall {
  systemPrompt: string;
  userPrompt: string;
}

export interface MockClient extends LLMClient {
  /** Every prompt pair received, in call order. */
  readonly calls: readonly MockCall[];
}

/**
 * Mock LLM provider for testing and offline demos.
 * Replays the provided canned responses in order, falling back to a default.
 */
export function createMockClient(
  responses?: readonly string[],
): MockClient {
  const calls: MockCall[] = [];

  return {
    calls,
    async generate(systemPrompt: string, userPrompt: string): Promise<string> {
      const response = responses?.[calls.length] ?? DEFAULT_RESPONSE;
      calls.push({ systemPrompt, userPrompt });
      return response;
    },
  };
}
