import { isPlainObject, parseOracleJson } from '../llm/index.js';
import type { CapabilityTable } from '../operations/index.js';
import { splitTerms } from '../operations/index.js';
import type { EmptySearchPolicy } from '../schema/config.js';
import type { ErrorRecord, InvocationRecord } from '../schema/history.js';
import { errorRecord } from '../schema/history.js';
import type { OperationName, ParameterMap } from '../schema/operations.js';
import { analysisTypeSchema, isOperationName } from '../schema/operations.js';
import { TOKEN_GUARDS } from '../config/defaults.js';
import {
  BOUND_KEYS,
  deriveCategoryHint,
  inferAnalysisType,
  inferBounds,
  inferCount,
  inferOperationFromStep,
} from './rules.js';

// ── Public types ─────────────────────────────────────────────

export interface RepairInput {
  readonly raw: string;
  readonly goal: string;
  readonly stepText: string;
  readonly stepIndex: number;
  readonly history: readonly InvocationRecord[];
  readonly capabilities: CapabilityTable;
  readonly emptySearchPolicy: EmptySearchPolicy;
}

export type RepairOutcome =
  | {
      kind: 'ready';
      operation: OperationName;
      parameters: ParameterMap;
      /** Human-readable list of the corrections applied. */
      notes: string[];
    }
  | { kind: 'fatal'; record: ErrorRecord };

// ── Main entry ───────────────────────────────────────────────

/**
 * Turn the oracle's raw selection into an executable invocation, or a
 * fatal error record. Corrections run in a fixed order: name inference,
 * step-text override, per-operation fixups, then the pipeline rule that
 * narrows follow-up operations to the last search's products.
 */
export function repairSelection(input: RepairInput): RepairOutcome {
  const { raw, stepIndex, capabilities } = input;
  const notes: string[] = [];

  const parsed = parseOracleJson(raw);
  if (parsed.kind === 'unparseable') {
    return fatal(
      errorRecord(stepIndex, 'selector_parse_failure', `Failed to parse tool selection: ${parsed.reason}`),
    );
  }

  const rawParameters = parsed.value['parameters'];
  const parameters: ParameterMap = isPlainObject(rawParameters) ? sanitizeParameters(rawParameters) : {};

  let name = readToolName(parsed.value['tool']);
  if (name === undefined) {
    name = inferNameFromText(raw, capabilities);
    if (name !== undefined) notes.push(`inferred operation ${name} from answer text`);
  }

  const forced = inferOperationFromStep(input.stepText);
  if (forced !== undefined && forced !== name && capabilities.has(forced)) {
    notes.push(`step wording forces ${forced}${name ? ` over ${name}` : ''}`);
    name = forced;
  }

  if (name === undefined) {
    return fatal(errorRecord(stepIndex, 'unknown_operation', 'Tool selection named no operation', null, parameters));
  }
  if (!capabilities.has(name) || !isOperationName(name)) {
    return fatal(errorRecord(stepIndex, 'unknown_operation', `Unknown tool: ${name}`, name, parameters));
  }

  switch (name) {
    case 'search_products':
      repairSearch(parameters, input, notes);
      break;
    case 'analyze_reviews':
      repairAnalyze(parameters, input, notes);
      break;
    case 'calculate_statistics':
      repairStatistics(parameters, input, notes);
      break;
  }

  if (name !== 'search_products') {
    const violation = applyPipeline(name, parameters, input, notes);
    if (violation !== null) return fatal(violation);
  }

  return { kind: 'ready', operation: name, parameters, notes };
}

function fatal(record: ErrorRecord): RepairOutcome {
  return { kind: 'fatal', record };
}

function readToolName(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function inferNameFromText(raw: string, capabilities: CapabilityTable): string | undefined {
  const lowered = raw.toLowerCase();
  return [...capabilities.keys()].find((name) => lowered.includes(name));
}

// ── Sanitizing ───────────────────────────────────────────────

/** Drop null and blank values, trim strings, and drop empty lists. */
export function sanitizeParameters(parameters: Readonly<Record<string, unknown>>): ParameterMap {
  const clean: ParameterMap = {};
  for (const [key, value] of Object.entries(parameters)) {
    if (value === null || value === undefined) continue;

    if (typeof value === 'string') {
      const trimmed = value.trim();
      if (trimmed.length > 0) clean[key] = trimmed;
      continue;
    }

    if (Array.isArray(value)) {
      const items = value
        .filter((item) => item !== null && item !== undefined)
        .map((item) => (typeof item === 'string' ? item.trim() : item))
        .filter((item) => item !== '');
      if (items.length > 0) clean[key] = items;
      continue;
    }

    clean[key] = value;
  }
  return clean;
}

/** A comma-joined string or a list → list of trimmed strings. */
function toStringList(value: unknown): string[] | undefined {
  if (typeof value === 'string') return splitTerms(value);
  if (Array.isArray(value)) {
    return value.map((item) => String(item).trim()).filter((item) => item.length > 0);
  }
  return undefined;
}

function normalizeText(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ');
}

/** True when a free-text field is just the whole goal pasted in. */
export function isGoalDump(value: string, goal: string): boolean {
  return (
    value.length > TOKEN_GUARDS.MAX_CATEGORY_HINT_CHARS &&
    normalizeText(value) === normalizeText(goal)
  );
}

// ── Per-operation fixups ─────────────────────────────────────

function repairSearch(parameters: ParameterMap, input: RepairInput, notes: string[]): void {
  const { goal, stepText } = input;

  const categories = toStringList(parameters['category']);
  if (categories !== undefined) {
    const joined = categories.join(', ');
    if (joined.length === 0 || isGoalDump(joined, goal)) {
      delete parameters['category'];
      notes.push('dropped category that repeated the goal');
    } else {
      parameters['category'] = joined;
    }
  }

  if (parameters['category'] === undefined && parameters['keyword'] === undefined) {
    const hint = deriveCategoryHint([stepText, goal]);
    if (hint !== undefined && !isGoalDump(hint, goal)) {
      parameters['category'] = hint;
      notes.push(`derived category "${hint}"`);
    }
  }

  const bounds = inferBounds(goal);
  for (const key of BOUND_KEYS) {
    const value = bounds[key];
    if (value !== undefined && parameters[key] === undefined) {
      parameters[key] = value;
      notes.push(`${key}=${String(value)} from goal`);
    }
  }

  if (parameters['limit'] === undefined) {
    const count = inferCount(goal);
    if (count !== undefined) {
      parameters['limit'] = count;
      notes.push(`limit=${String(count)} from goal`);
    }
  }
}

function repairAnalyze(parameters: ParameterMap, input: RepairInput, notes: string[]): void {
  const names = toStringList(parameters['product_names']);
  if (names !== undefined) parameters['product_names'] = names;

  if (!analysisTypeSchema.safeParse(parameters['analysis_type']).success) {
    const inferred = inferAnalysisType(input.stepText);
    if (inferred !== undefined) {
      parameters['analysis_type'] = inferred;
      notes.push(`analysis_type=${inferred} from step wording`);
    } else {
      delete parameters['analysis_type'];
    }
  }
}

function repairStatistics(parameters: ParameterMap, input: RepairInput, notes: string[]): void {
  if (typeof parameters['operation'] !== 'string') {
    parameters['operation'] = 'summary';
    notes.push('operation defaulted to summary');
  }

  for (const key of ['product_names', 'categories']) {
    const list = toStringList(parameters[key]);
    if (list !== undefined) parameters[key] = list;
  }

  if (parameters['operation'] === 'rating_ranking' && parameters['top_n'] === undefined) {
    const count = inferCount(input.goal);
    if (count !== undefined) {
      parameters['top_n'] = count;
      notes.push(`top_n=${String(count)} from goal`);
    }
  }
}

// ── Pipeline rule ────────────────────────────────────────────

function hasValue(value: unknown): boolean {
  if (value === undefined) return false;
  if (Array.isArray(value)) return value.length > 0;
  return true;
}

function lastSearchRecord(history: readonly InvocationRecord[]): InvocationRecord | undefined {
  for (let i = history.length - 1; i >= 0; i--) {
    const record = history[i];
    if (record?.operation === 'search_products') return record;
  }
  return undefined;
}

/**
 * Follow-up operations without an explicit product scope run over the
 * most recent search's products. Returns an error record when that
 * search cannot provide a subset.
 */
function applyPipeline(
  name: Exclude<OperationName, 'search_products'>,
  parameters: ParameterMap,
  input: RepairInput,
  notes: string[],
): ErrorRecord | null {
  const explicit =
    name === 'analyze_reviews'
      ? parameters['product_names'] !== undefined || parameters['product_name'] !== undefined
      : parameters['product_names'] !== undefined || hasValue(parameters['categories']);
  if (explicit) return null;

  const search = lastSearchRecord(input.history);
  if (search === undefined) return null;

  if (search.outcome.status === 'error') {
    return errorRecord(
      input.stepIndex,
      'pipeline_violation',
      `Previous search failed, no product subset to work on: ${search.outcome.message}`,
      name,
      parameters,
    );
  }

  const productNames = search.outcome.result.matches
    .map((m) => m['product_name'])
    .filter((n): n is string => typeof n === 'string');

  if (productNames.length === 0 && input.emptySearchPolicy === 'halt') {
    return errorRecord(
      input.stepIndex,
      'pipeline_violation',
      'Previous search matched no products',
      name,
      parameters,
    );
  }

  parameters['product_names'] = productNames;
  notes.push(`scoped to ${String(productNames.length)} product(s) from the last search`);
  return null;
}
