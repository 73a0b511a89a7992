import { Command } from 'commander';
import { describe, expect, it } from 'vitest';

import { exitCodeFor, registerAgentCommand } from '../../src/cli/run.js';
import { ConfigError } from '../../src/config/loader.js';
import { RunAbortedError } from '../../src/core/agentLoop.js';
import { MissingCredentialError } from '../../src/llm/client.js';

describe('exitCodeFor', () => {
  it('maps known errors to their exit codes', () => {
    expect(exitCodeFor(new ConfigError('bad'))).toBe(2);
    expect(exitCodeFor(new MissingCredentialError('ANTHROPIC_API_KEY', 'anthropic'))).toBe(1);
    expect(
      exitCodeFor(
        new RunAbortedError({
          runId: 'run-1',
          goal: 'g',
          plan: [],
          history: [],
          stepIndex: 0,
          iterations: 0,
          transitions: [],
          startedAt: '2026-01-01T00:00:00.000Z',
        }),
      ),
    ).toBe(130);
  });

  it('falls back to 1', () => {
    expect(exitCodeFor(new Error('boom'))).toBe(1);
    expect(exitCodeFor('boom')).toBe(1);
  });
});

describe('registerAgentCommand', () => {
  function program(): Command {
    const cmd = new Command().exitOverride();
    registerAgentCommand(cmd);
    return cmd;
  }

  it('parses the iteration ceiling as a number', () => {
    const cmd = program();
    cmd.action(() => undefined);
    cmd.parse(['--max-iterations', '3', '--json'], { from: 'user' });

    expect(cmd.opts()).toMatchObject({ maxIterations: 3, json: true });
  });

  it('rejects a non-positive iteration ceiling', () => {
    const cmd = program().configureOutput({ writeErr: () => undefined });
    cmd.action(() => undefined);

    expect(() => cmd.parse(['--max-iterations', '0'], { from: 'user' })).toThrow('Must be a positive integer.');
  });
});
