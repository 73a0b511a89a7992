/**
 * Live execution logger for decision-agent.
 *
 * All output goes to stderr so stdout stays clean for the final answer
 * and JSON output. Emoji prefixes give instant visual context in the
 * terminal. Progress lines are muted when verbose is off; warnings and
 * errors always print.
 */

let verbose = true;

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

function progress(message: string): void {
  if (verbose) write(message);
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  progress(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  progress(`   ${message}`);
}

export function step(index: number, total: number, description: string): void {
  progress(`📋 [${String(index + 1)}/${String(total)}] ${description}`);
}

export function stepResult(
  index: number,
  total: number,
  success: boolean,
  description: string,
): void {
  const icon = success ? '✅' : '❌';
  progress(`${icon} [${String(index + 1)}/${String(total)}] ${description}`);
}

export function section(title: string): void {
  progress(`\n${'─'.repeat(50)}`);
  progress(`▶  ${title}`);
  progress(`${'─'.repeat(50)}`);
}

export function transition(from: string, to: string): void {
  progress(`🔀 ${from} → ${to}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function planned(stepCount: number): void {
  progress(`🧠 Planner: generated ${String(stepCount)} steps`);
}

export function operation(name: string, parameters: string): void {
  progress(`🔧 ${name} ${parameters}`);
}

export function reused(name: string): void {
  progress(`♻️  ${name}: identical call already made, reusing its result`);
}

export function llm(message: string): void {
  progress(`🧠 ${message}`);
}
