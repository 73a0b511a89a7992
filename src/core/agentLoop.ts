import { randomUUID } from 'node:crypto';

import type { LLMClient } from '../llm/index.js';
import type { Capability, CapabilityTable } from '../operations/index.js';
import type { EmptySearchPolicy } from '../schema/config.js';
import type { InvocationRecord, SuccessRecord } from '../schema/history.js';
import { errorRecord, isErrorRecord } from '../schema/history.js';
import type { OperationName, ParameterMap } from '../schema/operations.js';
import { isOperationResult } from '../schema/operations.js';
import { APOLOGY_ANSWER, DEFAULTS, LIMITS, TOKEN_GUARDS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { findReusable } from './dedup.js';
import { buildPlan } from './planner.js';
import type { RepairOutcome } from './repair.js';
import { repairSelection } from './repair.js';
import { resolveStep } from './resolver.js';
import type { StepSelection } from './resolver.js';
import type { Phase, PhaseTransition } from './stateMachine.js';
import { canTransition, IllegalTransitionError } from './stateMachine.js';
import { synthesize } from './synthesizer.js';

// ── Public types ─────────────────────────────────────────────

export interface AgentLoopConfig {
  goal: string;
  maxIterations?: number | undefined;
  emptySearchPolicy?: EmptySearchPolicy | undefined;
  /** Checked at every phase boundary. */
  signal?: AbortSignal | undefined;
}

export type StopReason = 'iteration_ceiling' | 'error' | 'plan_complete';

/** Run state as it stands at any point; the full result adds the answer. */
export interface AgentRunSnapshot {
  runId: string;
  goal: string;
  plan: string[];
  history: InvocationRecord[];
  stepIndex: number;
  iterations: number;
  transitions: PhaseTransition[];
  startedAt: string;
}

export interface AgentRunResult extends AgentRunSnapshot {
  stopReason: StopReason;
  finalAnswer: string;
  finishedAt: string;
  durationMs: number;
}

// ── Errors ───────────────────────────────────────────────────

export class RunAbortedError extends Error {
  readonly exitCode = 130;

  constructor(readonly partial: AgentRunSnapshot) {
    super('Run interrupted');
    this.name = 'RunAbortedError';
  }
}

// ── Progress check ───────────────────────────────────────────

export interface ProgressState {
  readonly plan: readonly string[];
  readonly history: readonly InvocationRecord[];
  readonly stepIndex: number;
  readonly iterations: number;
}

/**
 * Null while the loop should keep selecting, otherwise why it stops.
 * The ceiling is checked first so a misbehaving oracle cannot outrun it.
 */
export function stopReason(state: ProgressState, maxIterations: number): StopReason | null {
  if (state.iterations >= maxIterations) return 'iteration_ceiling';
  const last = state.history[state.history.length - 1];
  if (last !== undefined && isErrorRecord(last)) return 'error';
  if (state.stepIndex >= state.plan.length) return 'plan_complete';
  return null;
}

// ── Execution ────────────────────────────────────────────────

async function execute(
  capability: Capability,
  stepIndex: number,
  operation: OperationName,
  parameters: ParameterMap,
): Promise<InvocationRecord> {
  let output: unknown;
  try {
    output = await capability.invoke(parameters);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return errorRecord(stepIndex, 'operation_failure', `Tool execution error: ${message}`, operation, parameters);
  }

  if (typeof output === 'string') {
    return errorRecord(stepIndex, 'operation_failure', output, operation, parameters);
  }
  if (!isOperationResult(output)) {
    return errorRecord(stepIndex, 'operation_failure', `${operation} returned an unrecognised result`, operation, parameters);
  }
  return {
    stepIndex,
    operation,
    parameters,
    outcome: { status: 'success', result: output, reused: false },
  };
}

function reuse(prior: SuccessRecord, stepIndex: number): InvocationRecord {
  return {
    stepIndex,
    operation: prior.operation,
    parameters: prior.parameters,
    outcome: { status: 'success', result: prior.outcome.result, reused: true },
  };
}

function preview(record: InvocationRecord): string {
  const text =
    record.outcome.status === 'success' ? record.outcome.result.summary : record.outcome.message;
  return text.length > TOKEN_GUARDS.RESULT_PREVIEW_CHARS
    ? `${text.slice(0, TOKEN_GUARDS.RESULT_PREVIEW_CHARS)}...`
    : text;
}

// ── Main loop ────────────────────────────────────────────────

/**
 * Plan, then repeatedly select → repair → (reuse | execute) → check
 * progress until the plan is done, a step fails or the iteration
 * ceiling is hit; always finishes with one synthesis call.
 */
export async function runAgentLoop(
  client: LLMClient,
  capabilities: CapabilityTable,
  config: AgentLoopConfig,
): Promise<AgentRunResult> {
  const { goal, signal } = config;
  const maxIterations = config.maxIterations ?? LIMITS.MAX_ITERATIONS;
  const emptySearchPolicy = config.emptySearchPolicy ?? DEFAULTS.EMPTY_SEARCH_POLICY;

  const startTime = Date.now();
  const state: AgentRunSnapshot = {
    runId: randomUUID(),
    goal,
    plan: [],
    history: [],
    stepIndex: 0,
    iterations: 0,
    transitions: [],
    startedAt: new Date(startTime).toISOString(),
  };

  let phase: Phase = 'PLANNING';

  const snapshot = (): AgentRunSnapshot => ({
    ...state,
    plan: [...state.plan],
    history: [...state.history],
    transitions: [...state.transitions],
  });

  const checkAbort = (): void => {
    if (signal?.aborted) throw new RunAbortedError(snapshot());
  };

  const moveTo = (next: Phase): void => {
    if (!canTransition(phase, next)) throw new IllegalTransitionError(phase, next);
    state.transitions.push({ from: phase, to: next });
    log.transition(phase, next);
    phase = next;
    if (next !== 'DONE') checkAbort();
  };

  log.section(`Goal: ${goal}`);
  checkAbort();

  const plan = await buildPlan(client, capabilities, goal);
  state.plan = [...plan.steps];
  moveTo('SELECTING');

  let reason: StopReason | null = null;
  while (reason === null) {
    const stepText = state.plan[state.stepIndex] ?? '';
    log.step(state.stepIndex, state.plan.length, stepText);

    let selection: StepSelection | null;
    try {
      selection = await resolveStep(client, capabilities, {
        goal,
        plan: state.plan,
        stepIndex: state.stepIndex,
        priorInvocations: state.history.length,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error(`Step resolver failed: ${message}`);
      state.history.push(errorRecord(state.stepIndex, 'oracle_failure', `Oracle call failed: ${message}`));
      selection = null;
    }
    moveTo('REPAIRING');

    const repaired: RepairOutcome | null =
      selection?.kind === 'selection'
        ? repairSelection({
            raw: selection.raw,
            goal,
            stepText: selection.stepText,
            stepIndex: state.stepIndex,
            history: state.history,
            capabilities,
            emptySearchPolicy,
          })
        : null;

    if (repaired === null) {
      if (selection?.kind === 'complete') log.info(selection.message);
    } else if (repaired.kind === 'fatal') {
      state.history.push(repaired.record);
      log.stepResult(state.stepIndex, state.plan.length, false, preview(repaired.record));
    } else {
      const { operation, parameters, notes } = repaired;
      for (const note of notes) log.detail(`repair: ${note}`);

      const prior = findReusable(state.history, operation, parameters);
      const capability = capabilities.get(operation);
      let record: InvocationRecord;
      if (prior !== undefined) {
        moveTo('DEDUP_HIT');
        log.reused(operation);
        record = reuse(prior, state.stepIndex);
      } else {
        moveTo('EXECUTING');
        log.operation(operation, JSON.stringify(parameters));
        record =
          capability === undefined
            ? errorRecord(state.stepIndex, 'unknown_operation', `Unknown tool: ${operation}`, operation, parameters)
            : await execute(capability, state.stepIndex, operation, parameters);
      }

      state.history.push(record);
      log.stepResult(state.stepIndex, state.plan.length, record.outcome.status === 'success', preview(record));
      state.stepIndex++;
    }

    moveTo('PROGRESS_CHECK');
    state.iterations++;

    reason = stopReason(state, maxIterations);
    moveTo(reason === null ? 'SELECTING' : 'SYNTHESIZING');
  }

  if (reason === 'iteration_ceiling') {
    log.warn(`Iteration ceiling (${String(maxIterations)}) reached, synthesizing from partial results`);
  }

  const finalAnswer = await synthesize(client, goal, state.history);
  moveTo('DONE');

  const finishTime = Date.now();
  return {
    ...snapshot(),
    stopReason: reason,
    finalAnswer,
    finishedAt: new Date(finishTime).toISOString(),
    durationMs: finishTime - startTime,
  };
}

// ── Caller-facing wrapper ────────────────────────────────────

export interface AgentAnswer {
  answer: string;
  /** Null when the run failed before producing a result. */
  run: AgentRunResult | null;
}

/**
 * Run the loop and always come back with text: any failure other than
 * an interrupt becomes the fixed apology answer.
 */
export async function runAgent(
  client: LLMClient,
  capabilities: CapabilityTable,
  config: AgentLoopConfig,
): Promise<AgentAnswer> {
  try {
    const run = await runAgentLoop(client, capabilities, config);
    return { answer: run.finalAnswer, run };
  } catch (err) {
    if (err instanceof RunAbortedError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    log.error(`Agent run failed: ${message}`);
    return { answer: APOLOGY_ANSWER, run: null };
  }
}
