import type { LLMClient } from '../llm/index.js';
import { extractJSONArray, isPlainObject } from '../llm/index.js';
import type { CapabilityTable } from '../operations/index.js';
import { LIMITS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { renderPrompt } from './prompts.js';

// ── Public types ─────────────────────────────────────────────

export interface Plan {
  readonly steps: readonly string[];
  /** True when the oracle's answer was not a JSON array of steps. */
  readonly degraded: boolean;
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Ask the oracle to decompose the goal into ordered step texts.
 * Never fails on a malformed answer: it degrades to one step per line,
 * or to the goal itself when the answer is blank.
 */
export async function buildPlan(
  client: LLMClient,
  capabilities: CapabilityTable,
  goal: string,
): Promise<Plan> {
  log.llm('Planner decomposing goal...');

  const systemPrompt = await renderPrompt('planner', {
    operations: listOperations(capabilities),
    minSteps: String(LIMITS.MIN_PLAN_STEPS),
    maxSteps: String(LIMITS.MAX_PLAN_STEPS),
  });
  const userPrompt = await renderPrompt('planner_user', { goal });

  const raw = await client.generate(systemPrompt, userPrompt);
  const plan = parsePlan(raw, goal);

  if (plan.degraded) {
    log.warn('Planner answer was not a JSON array, falling back to line splitting');
  }
  log.planned(plan.steps.length);
  plan.steps.forEach((s, i) => {
    log.detail(`${String(i + 1)}. ${s}`);
  });

  return plan;
}

function listOperations(capabilities: CapabilityTable): string {
  return [...capabilities.values()]
    .map((c) => `- ${c.name}: ${c.description}`)
    .join('\n');
}

// ── Parsing ──────────────────────────────────────────────────

export function parsePlan(raw: string, goal: string): Plan {
  const items = tryParseArray(raw);
  if (items !== null) {
    const steps = items.map(stepText).filter((s) => s.length > 0);
    if (steps.length > 0) return { steps, degraded: false };
  }

  const lines = raw
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('```'));
  if (lines.length > 0) return { steps: lines, degraded: true };

  return { steps: [goal], degraded: true };
}

function tryParseArray(raw: string): unknown[] | null {
  const json = extractJSONArray(raw);
  if (json === null) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return null;
  }
  return Array.isArray(parsed) ? parsed : null;
}

function stepText(item: unknown): string {
  if (typeof item === 'string') return item.trim();
  if (isPlainObject(item)) {
    for (const key of ['step', 'description', 'task']) {
      const value = item[key];
      if (typeof value === 'string') return value.trim();
    }
  }
  if (item === null || item === undefined) return '';
  return JSON.stringify(item);
}
