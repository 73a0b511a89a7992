import { beforeAll, describe, expect, it } from 'vitest';

import type { DatasetRow } from '../../src/operations/dataset.js';
import { loadDataset } from '../../src/operations/dataset.js';
import { NO_PRODUCTS_FOUND, searchProducts } from '../../src/operations/search.js';
import { FIXTURE_CSV } from '../helpers.js';

let rows: DatasetRow[];

beforeAll(async () => {
  rows = await loadDataset(FIXTURE_CSV);
});

function names(matches: readonly Record<string, unknown>[]): unknown[] {
  return matches.map((m) => m['product_name']);
}

describe('searchProducts', () => {
  it('filters by category path', () => {
    const result = searchProducts(rows, { category: 'Electronics' });
    expect(names(result.matches)).toEqual(['Alpha Speaker', 'Delta Watch']);
    expect(result.summary.startsWith('Found 2 product(s) matching your criteria:\n')).toBe(true);
  });

  it('accepts several comma-separated categories', () => {
    const result = searchProducts(rows, { category: 'Electronics, Clothing' });
    expect(names(result.matches)).toEqual(['Alpha Speaker', 'Gamma Shirt', 'Delta Watch', 'Zeta Jacket']);
  });

  it('applies price and rating bounds', () => {
    const result = searchProducts(rows, { max_price: 2000, min_rating: 4 });
    expect(names(result.matches)).toEqual(['Alpha Speaker', 'Gamma Shirt', 'Epsilon Kettle']);
  });

  it('matches a keyword in the name', () => {
    expect(names(searchProducts(rows, { keyword: 'kettle' }).matches)).toEqual(['Epsilon Kettle']);
  });

  it('honours the limit', () => {
    expect(names(searchProducts(rows, { limit: 1 }).matches)).toEqual(['Alpha Speaker']);
  });

  it('returns an empty structured result when nothing matches', () => {
    expect(searchProducts(rows, { category: 'Toys' })).toEqual({ summary: NO_PRODUCTS_FOUND, matches: [] });
  });

  it('formats each product block', () => {
    const { summary } = searchProducts(rows, { keyword: 'kettle' });
    expect(summary.split('\n')).toContain('   - Discounted Price: 1500.00');
    expect(summary.split('\n')).toContain('   - Rating: 4.3 (800 ratings)');
  });
});
