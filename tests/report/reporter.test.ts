import { describe, expect, it } from 'vitest';

import type { AgentRunResult } from '../../src/core/agentLoop.js';
import { generateJSON, generateMarkdown, serializeJSON } from '../../src/report/reporter.js';
import { errorRecord } from '../../src/schema/history.js';
import { jsonOutputSchema } from '../../src/schema/jsonOutput.js';
import { searchRecord } from '../helpers.js';

function sampleRun(): AgentRunResult {
  return {
    runId: 'run-1',
    goal: 'Compare A | B',
    plan: ['Find speakers', 'Rank them'],
    history: [
      searchRecord(['Alpha Speaker', 'Delta Watch']),
      errorRecord(1, 'operation_failure', 'Unknown operation: median', 'calculate_statistics', {
        operation: 'median',
      }),
    ],
    stepIndex: 2,
    iterations: 2,
    transitions: [
      { from: 'PLANNING', to: 'SELECTING' },
      { from: 'SYNTHESIZING', to: 'DONE' },
    ],
    startedAt: '2026-01-01T00:00:00.000Z',
    stopReason: 'error',
    finalAnswer: 'Speakers win.',
    finishedAt: '2026-01-01T00:00:01.500Z',
    durationMs: 1500,
  };
}

describe('generateJSON', () => {
  it('produces output matching the contract', () => {
    const output = generateJSON(sampleRun());

    expect(jsonOutputSchema.safeParse(output).success).toBe(true);
    expect(output.transitions).toEqual(['PLANNING → SELECTING', 'SYNTHESIZING → DONE']);
    expect(output.invocations).toEqual([
      {
        index: 0,
        stepIndex: 0,
        operation: 'search_products',
        parameters: { category: 'Electronics' },
        status: 'success',
        reused: false,
        errorKind: null,
        message: 'Found 2 product(s)',
        matchCount: 2,
      },
      {
        index: 1,
        stepIndex: 1,
        operation: 'calculate_statistics',
        parameters: { operation: 'median' },
        status: 'error',
        reused: false,
        errorKind: 'operation_failure',
        message: 'Unknown operation: median',
        matchCount: 0,
      },
    ]);
  });
});

describe('serializeJSON', () => {
  it('sorts keys at every level', () => {
    const text = serializeJSON(generateJSON(sampleRun()));
    const topKeys = Object.keys(JSON.parse(text));

    expect(topKeys).toEqual([...topKeys].sort());
    expect(text.indexOf('"errorKind"')).toBeLessThan(text.indexOf('"index"'));
  });
});

describe('generateMarkdown', () => {
  const lines = generateMarkdown(sampleRun()).split('\n');

  it('writes the metadata table', () => {
    expect(lines[0]).toBe('# Decision Agent Report');
    expect(lines).toContain('| **Goal** | Compare A \\| B |');
    expect(lines).toContain('| **Duration** | 1.5s |');
    expect(lines).toContain('| **Stopped** | stopped on error |');
  });

  it('ticks completed plan steps', () => {
    expect(lines).toContain('1. [x] Find speakers');
    expect(lines).toContain('2. [x] Rank them');
  });

  it('lists every invocation', () => {
    expect(lines).toContain('| 1 | 1 | search_products | {"category":"Electronics"} | [OK] 2 match(es) |');
    expect(lines).toContain(
      '| 2 | 2 | calculate_statistics | {"operation":"median"} | [ERROR] operation_failure: Unknown operation: median |',
    );
  });

  it('ends with the answer', () => {
    const heading = lines.indexOf('## Final Answer');
    expect(lines[heading + 2]).toBe('Speakers win.');
  });
});
