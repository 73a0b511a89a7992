import type { AnalysisType, OperationName } from '../schema/operations.js';

// ── Prioritized rule tables ──────────────────────────────────
// Each table is scanned top to bottom; the first matching rule wins.

export interface Rule<T> {
  readonly pattern: RegExp;
  readonly value: T;
}

function firstMatch<T>(rules: readonly Rule<T>[], text: string): T | undefined {
  return rules.find((rule) => rule.pattern.test(text))?.value;
}

/** Step wording that overrides the oracle's choice of operation. */
export const OPERATION_OVERRIDES: readonly Rule<OperationName>[] = [
  // Needs analysis wording; "review count" alone stays with statistics
  {
    pattern:
      /\banaly[sz](?:e|es|ing|is)\s+(?:the\s+|their\s+|customer\s+)*reviews?\b|\breview\s+analysis\b|\bcomplain(?:t|ts|ing)?\b|\bpraise[sd]?\b|\bsentiment\b|\bfeedback\b/i,
    value: 'analyze_reviews',
  },
  {
    pattern: /\bstatistic(?:s|al)?\b|\bcompar(?:e|es|ing|ison)\b|\brank(?:s|ed|ing)?\b|\baverages?\b/i,
    value: 'calculate_statistics',
  },
];

export const ANALYSIS_KINDS: readonly Rule<AnalysisType>[] = [
  {
    pattern: /\bsuccess(?:ful)?\b|\bpraise[sd]?\b|\bpositive\b|\bstrengths?\b|\blove[sd]?\b|\bwhat makes\b/i,
    value: 'praise',
  },
  {
    pattern: /\bthemes?\b|\bpatterns?\b|\bcommon\b|\btopics?\b/i,
    value: 'themes',
  },
  {
    pattern: /\bcomplain(?:t|ts|ing)?\b|\bissues?\b|\bproblems?\b|\bavoid\b|\bnegative\b|\bimprove(?:ment)?s?\b/i,
    value: 'complaints',
  },
];

export function inferOperationFromStep(stepText: string): OperationName | undefined {
  return firstMatch(OPERATION_OVERRIDES, stepText);
}

export function inferAnalysisType(stepText: string): AnalysisType | undefined {
  return firstMatch(ANALYSIS_KINDS, stepText);
}

// ── Category hints ───────────────────────────────────────────

const TERM = String.raw`[A-Za-z][\w-]*(?:\s*&\s*[A-Za-z][\w-]*)?`;
const CAPITALIZED_TERM = String.raw`[A-Z][\w-]*(?:\s*&\s*[A-Z][\w-]*)?`;

const CATEGORY_PATTERNS: readonly RegExp[] = [
  new RegExp(String.raw`\b(?:in|for|from|across|between)\s+(?:the\s+)?(${TERM})\s+and\s+(${TERM})\s+categor(?:y|ies)\b`, 'i'),
  new RegExp(String.raw`\b(${TERM})\s+and\s+(${TERM})\s+categor(?:y|ies)\b`, 'i'),
  new RegExp(String.raw`\b(?:in|for|from)\s+(?:the\s+)?(${TERM})\s+category\b`, 'i'),
  new RegExp(String.raw`\b(${CAPITALIZED_TERM})\s+and\s+(${CAPITALIZED_TERM})\b`),
];

/**
 * Pull category names out of free text, e.g. "the Electronics and
 * Clothing categories" → "Electronics, Clothing". Sources are tried in
 * order; the first one yielding a hint wins.
 */
export function deriveCategoryHint(sources: readonly string[]): string | undefined {
  for (const text of sources) {
    for (const pattern of CATEGORY_PATTERNS) {
      const match = pattern.exec(text);
      if (!match) continue;
      const terms = match
        .slice(1)
        .filter((t): t is string => t !== undefined)
        .map((t) => t.trim())
        .filter((t) => t.length > 0);
      if (terms.length > 0) return terms.join(', ');
    }
  }
  return undefined;
}

// ── Numeric bounds ───────────────────────────────────────────

export const BOUND_KEYS = ['min_price', 'max_price', 'min_rating', 'max_rating'] as const;

export type BoundKey = (typeof BOUND_KEYS)[number];

export type NumericBounds = Partial<Record<BoundKey, number>>;

/** Values at or below this are read as star ratings, above it as prices. */
export const RATING_SCALE_MAX = 5;

const UPPER_WORDS = ['below', 'under', 'less than', 'lower than', 'at most'];

const BOUND_PATTERN =
  /\b(below|under|less than|lower than|at most|above|over|greater than|more than|higher than|at least)\s+(?:(?:a\s+)?(?:rating|price)\s+(?:of\s+)?)?(₹|rs\.?\s*|\$)?\s*(\d[\d,]*(?:\.\d+)?)(?![\d.,]*\s*(?:%|(?:reviews?|ratings?|products?|items?|units?)\b))/gi;

/**
 * Read phrases like "under 2000" or "rating below 4.0" as filter bounds.
 * Numbers followed by `%` or a count noun ("1000 reviews") are skipped.
 */
export function inferBounds(text: string): NumericBounds {
  const bounds: NumericBounds = {};

  for (const match of text.matchAll(BOUND_PATTERN)) {
    const word = match[1]?.toLowerCase();
    const currency = match[2];
    const digits = match[3];
    if (word === undefined || digits === undefined) continue;

    const value = Number(digits.replace(/,/g, ''));
    if (!Number.isFinite(value)) continue;

    const upper = UPPER_WORDS.includes(word);
    const isRating = currency === undefined && value <= RATING_SCALE_MAX;
    const key: BoundKey = isRating
      ? upper ? 'max_rating' : 'min_rating'
      : upper ? 'max_price' : 'min_price';

    if (bounds[key] === undefined) bounds[key] = value;
  }

  return bounds;
}

// ── Counts ───────────────────────────────────────────────────

const COUNT_PATTERNS: readonly RegExp[] = [
  /\btop\s+(\d{1,3})\b/i,
  /\b(\d{1,3})\s+(?:products?|items?)\b/i,
];

/** "top 5" or "10 products" → 5 / 10. */
export function inferCount(text: string): number | undefined {
  for (const pattern of COUNT_PATTERNS) {
    const digits = pattern.exec(text)?.[1];
    if (digits === undefined) continue;
    const n = Number(digits);
    if (n > 0) return n;
  }
  return undefined;
}
