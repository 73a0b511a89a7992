// ── Phases ───────────────────────────────────────────────────

export const PHASES = [
  'PLANNING',
  'SELECTING',
  'REPAIRING',
  'DEDUP_HIT',
  'EXECUTING',
  'PROGRESS_CHECK',
  'SYNTHESIZING',
  'DONE',
] as const;

export type Phase = (typeof PHASES)[number];

export interface PhaseTransition {
  readonly from: Phase;
  readonly to: Phase;
}

// ── Transition table ─────────────────────────────────────────
// REPAIRING → PROGRESS_CHECK is taken when repair yields a fatal record
// or the resolver reported the plan complete.

export const TRANSITIONS: Readonly<Record<Phase, readonly Phase[]>> = {
  PLANNING: ['SELECTING'],
  SELECTING: ['REPAIRING'],
  REPAIRING: ['DEDUP_HIT', 'EXECUTING', 'PROGRESS_CHECK'],
  DEDUP_HIT: ['PROGRESS_CHECK'],
  EXECUTING: ['PROGRESS_CHECK'],
  PROGRESS_CHECK: ['SELECTING', 'SYNTHESIZING'],
  SYNTHESIZING: ['DONE'],
  DONE: [],
};

export function canTransition(from: Phase, to: Phase): boolean {
  return TRANSITIONS[from].includes(to);
}

export class IllegalTransitionError extends Error {
  constructor(readonly from: Phase, readonly to: Phase) {
    super(`Illegal phase transition: ${from} → ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

// ── Rendering ────────────────────────────────────────────────

/** Plain-text adjacency listing of the transition table, for `--graph`. */
export function describeStateMachine(): string {
  const width = Math.max(...PHASES.map((p) => p.length));
  const lines = ['Agent loop state machine', ''];
  for (const phase of PHASES) {
    const targets = TRANSITIONS[phase];
    const right = targets.length > 0 ? targets.join(' | ') : '(end)';
    lines.push(`  ${phase.padEnd(width)}  →  ${right}`);
  }
  return lines.join('\n');
}
