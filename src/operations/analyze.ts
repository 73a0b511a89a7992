import type { AnalysisType, AnalyzeParams, OperationResult } from '../schema/operations.js';
import type { DatasetRow } from './dataset.js';
import { matchesAnyTerm, splitTerms, toProductRecord, uniqueProducts } from './dataset.js';
import type { ReviewLexicon } from './lexicon.js';

export const NO_REVIEWS_FOUND = 'No reviews found matching the specified criteria.';

type Sentiment = 'positive' | 'negative' | 'mixed';

// ── Entry ────────────────────────────────────────────────────

export function analyzeReviews(
  rows: readonly DatasetRow[],
  params: AnalyzeParams,
  lexicon: ReviewLexicon,
): OperationResult {
  const filtered = filterRows(rows, params);
  if (filtered.length === 0) {
    return { summary: NO_REVIEWS_FOUND, matches: [] };
  }

  const analysisType: AnalysisType = params.analysis_type ?? 'complaints';
  const reviews = filtered.map((r) => r.reviewContent).filter((r) => r.length > 0);
  const titles = filtered.map((r) => r.reviewTitle).filter((t) => t.length > 0);
  const products = uniqueProducts(filtered);

  const lines = [
    '**Review Analysis Report**',
    `   Products Analyzed: ${String(products.length)}`,
    `   Total Reviews: ${String(reviews.length)}`,
    `   Analysis Type: ${titleCase(analysisType)}`,
    '',
  ];

  switch (analysisType) {
    case 'complaints':
      lines.push(...complaintsSection(reviews, lexicon));
      break;
    case 'praise':
      lines.push(...praiseSection(reviews, lexicon));
      break;
    case 'themes':
      lines.push(...themesSection([...reviews, ...titles], lexicon));
      break;
    case 'all':
      lines.push(...overviewSection(reviews, lexicon));
      break;
  }

  return { summary: lines.join('\n'), matches: products.map(toProductRecord) };
}

function filterRows(rows: readonly DatasetRow[], params: AnalyzeParams): DatasetRow[] {
  let filtered = [...rows];

  if (params.category) {
    const terms = splitTerms(params.category);
    if (terms.length > 0) {
      filtered = filtered.filter((r) => matchesAnyTerm(r.categoryPath, terms));
    }
  }

  // An explicit list, even an empty one, wins over the partial-name filter
  if (params.product_names) {
    const names = new Set(params.product_names);
    filtered = filtered.filter((r) => names.has(r.productName));
  } else if (params.product_name) {
    const needle = params.product_name.toLowerCase();
    filtered = filtered.filter((r) => r.productName.toLowerCase().includes(needle));
  }

  const { min_rating, max_rating } = params;
  if (min_rating !== undefined) filtered = filtered.filter((r) => r.rating >= min_rating);
  if (max_rating !== undefined) filtered = filtered.filter((r) => r.rating <= max_rating);

  return filtered;
}

// ── Sentiment ────────────────────────────────────────────────

export function identifySentiment(review: string, lexicon: ReviewLexicon): Sentiment {
  const complaints = lexicon.complaintPatterns.filter((p) => p.test(review)).length;
  const praise = lexicon.praisePatterns.filter((p) => p.test(review)).length;

  if (complaints > praise) return 'negative';
  if (praise > complaints) return 'positive';
  return 'mixed';
}

/**
 * Bucket reviews into issue categories. Each review contributes at most
 * one excerpt per category: the first sentence mentioning a keyword.
 */
export function extractIssues(
  reviews: readonly string[],
  lexicon: ReviewLexicon,
): Map<string, string[]> {
  const found = new Map<string, string[]>();

  for (const review of reviews) {
    const lowered = review.toLowerCase();
    for (const [category, keywords] of Object.entries(lexicon.issueCategories)) {
      const keyword = keywords.find((k) => lowered.includes(k));
      if (keyword === undefined) continue;

      const sentence =
        review.split('.').find((s) => s.toLowerCase().includes(keyword))?.trim() ?? review;
      const bucket = found.get(category);
      if (bucket) bucket.push(sentence);
      else found.set(category, [sentence]);
    }
  }

  return found;
}

// ── Sections ─────────────────────────────────────────────────

function complaintsSection(reviews: readonly string[], lexicon: ReviewLexicon): string[] {
  const negative = reviews.filter((r) => identifySentiment(r, lexicon) === 'negative');
  const issues = extractIssues(reviews, lexicon);
  const lines = ['**Top Complaints Identified:**', ''];

  if (issues.size === 0) {
    lines.push('No significant complaints found.');
  } else {
    const ranked = [...issues.entries()].sort((a, b) => b[1].length - a[1].length);
    for (const [category, examples] of ranked) {
      lines.push(`**${category}** (${String(examples.length)} mentions)`);
      for (const example of examples.slice(0, 2)) {
        lines.push(`   • "${example}"`);
      }
      lines.push('');
    }
  }

  lines.push('**Complaint Summary:**');
  lines.push(`   - ${String(negative.length)} reviews with negative sentiment`);
  lines.push(`   - ${String(issues.size)} distinct issue categories identified`);
  return lines;
}

function praiseSection(reviews: readonly string[], lexicon: ReviewLexicon): string[] {
  const positive = reviews.filter((r) => identifySentiment(r, lexicon) === 'positive');
  const lines = ['**Positive Feedback Highlights:**', ''];

  for (const [theme, keywords] of Object.entries(lexicon.praiseThemes)) {
    const matching = positive.filter((r) => {
      const lowered = r.toLowerCase();
      return keywords.some((k) => lowered.includes(k));
    });
    const first = matching[0];
    if (first === undefined) continue;

    lines.push(`**${theme}** (${String(matching.length)} mentions)`);
    lines.push(`   • "${first.slice(0, 100)}${first.length > 100 ? '...' : ''}"`);
    lines.push('');
  }

  lines.push('**Positive Summary:**');
  lines.push(`   - ${String(positive.length)} reviews with positive sentiment`);
  return lines;
}

function themesSection(texts: readonly string[], lexicon: ReviewLexicon): string[] {
  const corpus = texts.join(' ').toLowerCase();
  const counts = lexicon.themeKeywords
    .map((keyword) => ({ keyword, count: countOccurrences(corpus, keyword) }))
    .filter((entry) => entry.count > 0)
    .sort((a, b) => b.count - a.count)
    .slice(0, 10);

  const lines = ['**Common Themes in Reviews:**', ''];
  if (counts.length === 0) {
    lines.push('No recurring themes found.');
  }
  for (const { keyword, count } of counts) {
    lines.push(`   • ${titleCase(keyword)}: ${String(count)} mentions`);
  }
  return lines;
}

function overviewSection(reviews: readonly string[], lexicon: ReviewLexicon): string[] {
  const tally: Record<Sentiment, string[]> = { positive: [], negative: [], mixed: [] };
  for (const review of reviews) {
    tally[identifySentiment(review, lexicon)].push(review);
  }

  const total = reviews.length;
  const pct = (n: number): string => String(total === 0 ? 0 : Math.floor((n * 100) / total));

  const lines = [
    '**Sentiment Distribution:**',
    `   Positive: ${String(tally.positive.length)} (${pct(tally.positive.length)}%)`,
    `   Negative: ${String(tally.negative.length)} (${pct(tally.negative.length)}%)`,
    `   Mixed: ${String(tally.mixed.length)} (${pct(tally.mixed.length)}%)`,
    '',
  ];

  const issues = [...extractIssues(reviews, lexicon).keys()].slice(0, 3);
  if (issues.length > 0) {
    lines.push('**Key Issues:**');
    for (const issue of issues) lines.push(`   • ${issue}`);
    lines.push('');
  }

  const sample = tally.positive[0];
  if (sample !== undefined) {
    lines.push('**Sample Positive Feedback:**');
    lines.push(`   "${sample.slice(0, 150)}${sample.length > 150 ? '...' : ''}"`);
  }
  return lines;
}

// ── Helpers ──────────────────────────────────────────────────

function countOccurrences(text: string, needle: string): number {
  let count = 0;
  let index = text.indexOf(needle);
  while (index !== -1) {
    count++;
    index = text.indexOf(needle, index + needle.length);
  }
  return count;
}

function titleCase(text: string): string {
  return text.replace(/\b\w/g, (c) => c.toUpperCase());
}
