import type { LLMClient } from '../llm/index.js';
import type { InvocationRecord } from '../schema/history.js';
import { isSuccessRecord } from '../schema/history.js';
import type { OperationResult } from '../schema/operations.js';
import { APOLOGY_ANSWER, TOKEN_GUARDS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { renderPrompt } from './prompts.js';

export const TRUNCATION_MARKER = '\n...(truncated)';

export function truncate(text: string, limit: number = TOKEN_GUARDS.MAX_RESULT_CHARS): string {
  return text.length > limit ? text.slice(0, limit) + TRUNCATION_MARKER : text;
}

/** Prefer the precomputed summary; fall back to the match list as JSON. */
export function formatResult(result: OperationResult): string {
  const text = result.summary.trim().length > 0 ? result.summary : JSON.stringify(result.matches);
  return truncate(text);
}

/** Successful records only, one `**Step N: name**` block each. */
export function formatHistory(history: readonly InvocationRecord[]): string {
  return history
    .filter(isSuccessRecord)
    .map((r) => `**Step ${String(r.stepIndex + 1)}: ${r.operation ?? 'unknown'}**\n${formatResult(r.outcome.result)}`)
    .join('\n\n');
}

/**
 * One oracle call turning the gathered results into the final answer.
 * Error records are left out; a blank answer becomes the apology text.
 */
export async function synthesize(
  client: LLMClient,
  goal: string,
  history: readonly InvocationRecord[],
): Promise<string> {
  log.llm('Synthesizing final answer...');

  const systemPrompt = await renderPrompt('synthesizer', {});
  const userPrompt = await renderPrompt('synthesizer_user', {
    goal,
    results: formatHistory(history),
  });

  const answer = (await client.generate(systemPrompt, userPrompt)).trim();
  return answer.length > 0 ? answer : APOLOGY_ANSWER;
}
