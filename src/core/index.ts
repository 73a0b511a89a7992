/**
 * Core orchestration module.
 * Coordinates plan builder → step resolver → repair → dedup → operation
 * → synthesizer. No CLI and no direct provider calls.
 */

export { buildPlan, parsePlan } from './planner.js';
export type { Plan } from './planner.js';
export { resolveStep, ALL_STEPS_COMPLETED } from './resolver.js';
export type { StepResolverInput, StepSelection } from './resolver.js';
export { repairSelection, sanitizeParameters, isGoalDump } from './repair.js';
export type { RepairInput, RepairOutcome } from './repair.js';
export {
  deriveCategoryHint,
  inferAnalysisType,
  inferBounds,
  inferCount,
  inferOperationFromStep,
} from './rules.js';
export { canonicalize, invocationKey, findReusable } from './dedup.js';
export { synthesize, formatHistory, formatResult, truncate } from './synthesizer.js';
export {
  PHASES,
  TRANSITIONS,
  canTransition,
  describeStateMachine,
  IllegalTransitionError,
} from './stateMachine.js';
export type { Phase, PhaseTransition } from './stateMachine.js';
export { runAgentLoop, runAgent, stopReason, RunAbortedError } from './agentLoop.js';
export type {
  AgentLoopConfig,
  AgentRunResult,
  AgentRunSnapshot,
  AgentAnswer,
  StopReason,
} from './agentLoop.js';
