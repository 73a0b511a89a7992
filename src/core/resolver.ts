import type { LLMClient } from '../llm/index.js';
import type { CapabilityTable } from '../operations/index.js';
import { describeCapabilities } from '../operations/index.js';
import { renderPrompt } from './prompts.js';

// ── Public types ─────────────────────────────────────────────

export interface StepResolverInput {
  readonly goal: string;
  readonly plan: readonly string[];
  readonly stepIndex: number;
  /** Number of history records so far, reported to the oracle. */
  readonly priorInvocations: number;
}

export type StepSelection =
  | { kind: 'selection'; stepText: string; raw: string }
  | { kind: 'complete'; message: string };

export const ALL_STEPS_COMPLETED = 'All steps completed';

// ── Main entry ───────────────────────────────────────────────

/**
 * Ask the oracle which operation serves the current plan step.
 * The raw answer is returned untouched; the repair layer interprets it.
 */
export async function resolveStep(
  client: LLMClient,
  capabilities: CapabilityTable,
  input: StepResolverInput,
): Promise<StepSelection> {
  const stepText = input.plan[input.stepIndex];
  if (stepText === undefined) {
    return { kind: 'complete', message: ALL_STEPS_COMPLETED };
  }

  const systemPrompt = await renderPrompt('selector', {
    operations: describeCapabilities(capabilities),
  });
  const userPrompt = await renderPrompt('selector_user', {
    step: stepText,
    priorCount: String(input.priorInvocations),
    goal: input.goal,
  });

  const raw = await client.generate(systemPrompt, userPrompt);
  return { kind: 'selection', stepText, raw };
}
