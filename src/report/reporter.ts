import type { AgentRunResult } from '../core/agentLoop.js';
import type { InvocationRecord } from '../schema/history.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput, JsonOutputInvocation } from '../schema/jsonOutput.js';

// Re-export contract types for consumers
export type { JsonOutput, JsonOutputInvocation };

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(run: AgentRunResult): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    runId: run.runId,
    goal: run.goal,
    plan: [...run.plan],
    stepIndex: run.stepIndex,
    iterations: run.iterations,
    stopReason: run.stopReason,
    transitions: run.transitions.map((t) => `${t.from} → ${t.to}`),
    invocations: run.history.map(invocationToJSON),
    finalAnswer: run.finalAnswer,
    startedAt: run.startedAt,
    finishedAt: run.finishedAt,
    durationMs: run.durationMs,
  };
}

function invocationToJSON(record: InvocationRecord, index: number): JsonOutputInvocation {
  const { outcome } = record;
  return {
    index,
    stepIndex: record.stepIndex,
    operation: record.operation,
    parameters: { ...record.parameters },
    status: outcome.status,
    reused: outcome.status === 'success' && outcome.reused,
    errorKind: outcome.status === 'error' ? outcome.kind : null,
    message: outcome.status === 'success' ? outcome.result.summary : outcome.message,
    matchCount: outcome.status === 'success' ? outcome.result.matches.length : 0,
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const sorted: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    sorted[k] = v;
  }
  return sorted;
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(run: AgentRunResult): string {
  const lines: string[] = [];

  // Header + metadata
  lines.push(`# Decision Agent Report`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Goal** | ${escapeMarkdownCell(run.goal)} |`);
  lines.push(`| **Run ID** | \`${run.runId}\` |`);
  lines.push(`| **Started** | ${run.startedAt} |`);
  lines.push(`| **Finished** | ${run.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(run.durationMs)} |`);
  lines.push(`| **Iterations** | ${String(run.iterations)} |`);
  lines.push(`| **Stopped** | ${stopReasonLabel(run.stopReason)} |`);
  lines.push('');

  // Plan
  lines.push(`## Plan`);
  lines.push('');
  run.plan.forEach((step, i) => {
    const marker = i < run.stepIndex ? '[x]' : '[ ]';
    lines.push(`${String(i + 1)}. ${marker} ${step}`);
  });
  lines.push('');

  // History table
  lines.push(`## Operations`);
  lines.push('');
  lines.push(`| # | Step | Operation | Parameters | Result |`);
  lines.push(`|---|------|-----------|------------|--------|`);

  run.history.forEach((record, i) => {
    lines.push(
      `| ${String(i + 1)} | ${String(record.stepIndex + 1)} | ${record.operation ?? '-'} | ${escapeMarkdownCell(JSON.stringify(record.parameters))} | ${escapeMarkdownCell(outcomeLabel(record))} |`,
    );
  });
  lines.push('');

  // Answer
  lines.push(`## Final Answer`);
  lines.push('');
  lines.push(run.finalAnswer);
  lines.push('');

  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function outcomeLabel(record: InvocationRecord): string {
  const { outcome } = record;
  if (outcome.status === 'error') return `[ERROR] ${outcome.kind}: ${outcome.message}`;
  const count = `${String(outcome.result.matches.length)} match(es)`;
  return outcome.reused ? `[REUSED] ${count}` : `[OK] ${count}`;
}

function stopReasonLabel(reason: AgentRunResult['stopReason']): string {
  switch (reason) {
    case 'plan_complete':
      return 'plan complete';
    case 'error':
      return 'stopped on error';
    case 'iteration_ceiling':
      return 'iteration ceiling reached';
  }
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
