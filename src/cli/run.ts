import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { createInterface } from 'node:readline';

import type { Command } from 'commander';
import { InvalidArgumentError } from 'commander';

import type { LLMClient } from '../llm/index.js';
import { createLLMClient, MissingCredentialError } from '../llm/index.js';
import type { CapabilityTable } from '../operations/index.js';
import { createCapabilityTable } from '../operations/index.js';
import type { AgentRunResult } from '../core/index.js';
import { describeStateMachine, runAgent, RunAbortedError } from '../core/index.js';
import { generateJSON, generateMarkdown, serializeJSON } from '../report/index.js';
import type { RunConfig } from '../schema/config.js';
import { ConfigError, loadConfigFile, loadEnvConfig, resolveRunConfig } from '../config/loader.js';
import { DEFAULTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { EXAMPLE_GOALS, HELP_GOALS } from './examples.js';

// ── Options ──────────────────────────────────────────────────

interface AgentOptions {
  query?: string;
  example?: true;
  graph?: true;
  json?: true;
  config?: string;
  maxIterations?: number;
  quiet?: true;
  reportPath?: string;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}

// ── Session ──────────────────────────────────────────────────

interface Session {
  config: Readonly<RunConfig>;
  client: LLMClient;
  capabilities: CapabilityTable;
}

async function createSession(opts: AgentOptions): Promise<Session> {
  // An explicitly named config file must exist; the default one may not
  const fileConfig = await loadConfigFile(
    opts.config ?? DEFAULTS.CONFIG_PATH,
    opts.config !== undefined,
  );
  const config = resolveRunConfig(fileConfig, loadEnvConfig(), {
    maxIterations: opts.maxIterations,
    verbose: opts.quiet ? false : undefined,
  });
  log.setVerbose(config.verbose);

  const client = createLLMClient({
    provider: config.provider,
    apiKey: config.apiKey,
    model: config.model,
  });
  const capabilities = createCapabilityTable({ datasetPath: path.resolve(config.datasetPath) });

  return { config, client, capabilities };
}

// ── Single goal ──────────────────────────────────────────────

async function answerGoal(
  session: Session,
  goal: string,
  opts: AgentOptions,
  signal: AbortSignal,
  reportPath?: string,
): Promise<AgentRunResult | null> {
  const { answer, run } = await runAgent(session.client, session.capabilities, {
    goal,
    maxIterations: session.config.maxIterations,
    emptySearchPolicy: session.config.emptySearchPolicy,
    signal,
  });

  if (opts.json && run !== null) {
    process.stdout.write(serializeJSON(generateJSON(run)) + '\n');
  } else {
    process.stdout.write(`\n${answer}\n`);
  }

  if (reportPath !== undefined && run !== null) {
    const target = path.resolve(reportPath);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, generateMarkdown(run), 'utf-8');
    log.info(`Report written to ${target}`);
  }

  return run;
}

/** Run `fn` with an abort signal wired to the first Ctrl-C. */
async function withInterrupt<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onSigint = (): void => {
    log.warn('Interrupt received, stopping at the next phase boundary...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);
  try {
    return await fn(controller.signal);
  } finally {
    process.off('SIGINT', onSigint);
  }
}

/** `report.md` → `report-2.md` for the second example run. */
function numberedPath(reportPath: string | undefined, index: number): string | undefined {
  if (reportPath === undefined) return undefined;
  const { dir, name, ext } = path.parse(reportPath);
  return path.join(dir, `${name}-${String(index + 1)}${ext}`);
}

// ── Interactive mode ─────────────────────────────────────────

async function runInteractive(session: Session, opts: AgentOptions): Promise<void> {
  process.stderr.write('\nDecision agent: interactive mode\n');
  process.stderr.write("Type 'quit' to exit, 'help' for example goals, 'graph' to see the workflow.\n\n");

  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: 'Your goal: ' });
  let current: AbortController | null = null;

  rl.on('SIGINT', () => {
    if (current !== null) {
      log.warn('Interrupt received, stopping at the next phase boundary...');
      current.abort();
    } else {
      process.stderr.write('\nGoodbye!\n');
      rl.close();
    }
  });

  rl.prompt();
  for await (const rawLine of rl) {
    const line = rawLine.trim();
    const command = line.toLowerCase();

    if (command === 'quit' || command === 'exit') {
      process.stderr.write('Goodbye!\n');
      rl.close();
      break;
    }
    if (command === 'help') {
      process.stdout.write('\nExample goals you can try:\n');
      HELP_GOALS.forEach((goal, i) => {
        process.stdout.write(`   ${String(i + 1)}. ${goal}\n`);
      });
    } else if (command === 'graph') {
      process.stdout.write(`\n${describeStateMachine()}\n`);
    } else if (line.length > 0) {
      current = new AbortController();
      try {
        await answerGoal(session, line, opts, current.signal, opts.reportPath);
      } catch (err) {
        if (!(err instanceof RunAbortedError)) throw err;
        log.warn(`Run interrupted after ${String(err.partial.history.length)} operation(s)`);
      } finally {
        current = null;
      }
    }

    process.stdout.write('\n');
    rl.prompt();
  }
}

// ── Error mapping ────────────────────────────────────────────

export function exitCodeFor(err: unknown): number {
  if (
    err instanceof MissingCredentialError ||
    err instanceof ConfigError ||
    err instanceof RunAbortedError
  ) {
    return err.exitCode;
  }
  return 1;
}

function reportError(err: unknown): void {
  if (err instanceof RunAbortedError) {
    log.warn(`Run interrupted after ${String(err.partial.history.length)} operation(s)`);
  } else if (err instanceof MissingCredentialError) {
    log.error(`${err.message}. Set it in your environment or a .env file.`);
  } else {
    log.error(err instanceof Error ? err.message : String(err));
  }
  process.exitCode = exitCodeFor(err);
}

// ── Command registration ─────────────────────────────────────

export function registerAgentCommand(program: Command): void {
  program
    .option('-q, --query <text>', 'Answer a single goal and exit')
    .option('-e, --example', 'Run the built-in example goals')
    .option('-g, --graph', 'Print the agent state machine and exit')
    .option('--json', 'Print the run report as JSON to stdout')
    .option('--config <path>', `Path to config file (default ${DEFAULTS.CONFIG_PATH})`)
    .option('--max-iterations <n>', 'Override the iteration ceiling', parsePositiveInt)
    .option('--quiet', 'Suppress progress output')
    .option('--report-path <file>', 'Write a markdown run report to this file')
    .action(async (opts: AgentOptions) => {
      if (opts.graph) {
        process.stdout.write(describeStateMachine() + '\n');
        return;
      }

      try {
        const session = await createSession(opts);

        if (opts.query !== undefined) {
          const goal = opts.query;
          await withInterrupt((signal) => answerGoal(session, goal, opts, signal, opts.reportPath));
          return;
        }

        if (opts.example) {
          for (const [i, goal] of EXAMPLE_GOALS.entries()) {
            log.section(`Example ${String(i + 1)} of ${String(EXAMPLE_GOALS.length)}`);
            await withInterrupt((signal) =>
              answerGoal(session, goal, opts, signal, numberedPath(opts.reportPath, i)),
            );
          }
          return;
        }

        await runInteractive(session, opts);
      } catch (err) {
        reportError(err);
      }
    });
}
