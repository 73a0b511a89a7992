import { readFile } from 'node:fs/promises';

import { parse as parseCsv } from 'csv-parse/sync';
import { z } from 'zod';

// ── Row model ────────────────────────────────────────────────
// The dataset has one row per review, so a product repeats once per
// review it received.

export interface DatasetRow {
  productId: string;
  productName: string;
  /** Top-level category (first segment of the category path). */
  category: string;
  /** Full `A|B|C` category path as it appears in the file. */
  categoryPath: string;
  subCategory: string;
  discountedPrice: number;
  actualPrice: number;
  discountPercentage: number;
  rating: number;
  ratingCount: number;
  aboutProduct: string;
  reviewTitle: string;
  reviewContent: string;
}

const rawRowsSchema = z.array(z.record(z.string()));

const REQUIRED_COLUMNS = ['product_name', 'category', 'rating'] as const;

// ── Loading ──────────────────────────────────────────────────

/**
 * Read and normalise the CSV at `datasetPath`. Called once per operation
 * invocation; nothing is cached between calls.
 */
export async function loadDataset(datasetPath: string): Promise<DatasetRow[]> {
  let raw: string;
  try {
    raw = await readFile(datasetPath, 'utf-8');
  } catch {
    throw new Error(`Dataset not found at ${datasetPath}`);
  }
  return parseDataset(raw);
}

export function parseDataset(csv: string): DatasetRow[] {
  const records: unknown = parseCsv(csv, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    bom: true,
  });
  const rows = rawRowsSchema.parse(records);

  const first = rows[0];
  if (first) {
    const missing = REQUIRED_COLUMNS.filter((c) => !(c in first));
    if (missing.length > 0) {
      throw new Error(`Dataset is missing column(s): ${missing.join(', ')}`);
    }
  }

  return rows.map(normaliseRow);
}

function normaliseRow(row: Record<string, string>): DatasetRow {
  const categoryPath = row['category'] ?? '';
  const segments = categoryPath.split('|').map((s) => s.trim()).filter(Boolean);

  return {
    productId: row['product_id'] ?? '',
    productName: row['product_name'] ?? '',
    category: segments[0] ?? categoryPath,
    categoryPath,
    subCategory: row['sub_category'] || (segments.length > 1 ? segments[segments.length - 1] ?? '' : ''),
    discountedPrice: toNumber(row['discounted_price']),
    actualPrice: toNumber(row['actual_price']),
    discountPercentage: toNumber(row['discount_percentage']),
    rating: toNumber(row['rating']),
    ratingCount: Math.round(toNumber(row['rating_count'])),
    aboutProduct: row['about_product'] ?? '',
    reviewTitle: row['review_title'] ?? '',
    reviewContent: row['review_content'] ?? '',
  };
}

/** Strip currency symbols, thousands separators and `%`. Blank → 0. */
export function toNumber(value: string | undefined): number {
  const cleaned = (value ?? '').replace(/[^\d.]/g, '');
  const parsed = parseFloat(cleaned);
  return Number.isFinite(parsed) ? parsed : 0;
}

// ── Shared helpers ───────────────────────────────────────────

/** First row per product name, in file order. */
export function uniqueProducts(rows: readonly DatasetRow[]): DatasetRow[] {
  const seen = new Set<string>();
  const unique: DatasetRow[] = [];
  for (const row of rows) {
    if (seen.has(row.productName)) continue;
    seen.add(row.productName);
    unique.push(row);
  }
  return unique;
}

/** Case-insensitive substring match of any comma-separated term. */
export function matchesAnyTerm(haystack: string, terms: readonly string[]): boolean {
  const lowered = haystack.toLowerCase();
  return terms.some((term) => lowered.includes(term.toLowerCase()));
}

export function splitTerms(value: string): string[] {
  return value
    .split(',')
    .map((t) => t.trim())
    .filter((t) => t.length > 0);
}

export function toProductRecord(row: DatasetRow): Record<string, unknown> {
  return {
    product_id: row.productId,
    product_name: row.productName,
    category: row.category,
    sub_category: row.subCategory,
    discounted_price: row.discountedPrice,
    actual_price: row.actualPrice,
    discount_percentage: row.discountPercentage,
    rating: row.rating,
    rating_count: row.ratingCount,
  };
}
