import type { LLMProvider } from '../schema/config.js';
import type { RetryPolicy } from './retry.js';

// ── LLMClient interface ──────────────────────────────────────

/**
 * The reasoning oracle: a prompt goes in, free text comes out.
 * Nothing about the shape of the text is guaranteed; callers parse
 * defensively.
 */
export interface LLMClient {
  generate(systemPrompt: string, userPrompt: string): Promise<string>;
}

export interface LLMClientConfig {
  provider: LLMProvider;
  apiKey?: string | undefined;
  model?: string | undefined;
}

/** What a concrete provider client is built from. */
export interface ProviderOptions {
  apiKey: string;
  model?: string | undefined;
  maxTokens: number;
  temperature: number;
  retry?: RetryPolicy | undefined;
}

// ── Error ────────────────────────────────────────────────────

export class MissingCredentialError extends Error {
  readonly exitCode = 1;

  constructor(readonly variable: string, provider: LLMProvider) {
    super(`${variable} is required when using the ${provider} provider`);
    this.name = 'MissingCredentialError';
  }
}
