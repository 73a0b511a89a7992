import { beforeAll, describe, expect, it } from 'vitest';

import { analyzeReviews, extractIssues, identifySentiment, NO_REVIEWS_FOUND } from '../../src/operations/analyze.js';
import type { DatasetRow } from '../../src/operations/dataset.js';
import { loadDataset } from '../../src/operations/dataset.js';
import type { ReviewLexicon } from '../../src/operations/lexicon.js';
import { loadLexicon } from '../../src/operations/lexicon.js';
import { FIXTURE_CSV } from '../helpers.js';

let rows: DatasetRow[];
let lexicon: ReviewLexicon;

beforeAll(async () => {
  [rows, lexicon] = await Promise.all([loadDataset(FIXTURE_CSV), loadLexicon()]);
});

describe('identifySentiment', () => {
  it('reads complaint-heavy text as negative', () => {
    expect(identifySentiment('Terrible, it broke and I want a refund', lexicon)).toBe('negative');
  });

  it('reads praise-heavy text as positive', () => {
    expect(identifySentiment('Excellent and easy to use, highly recommend', lexicon)).toBe('positive');
  });

  it('calls a tie mixed', () => {
    expect(identifySentiment('It arrived on a Tuesday', lexicon)).toBe('mixed');
  });
});

describe('extractIssues', () => {
  it('keeps the sentence that mentions the keyword', () => {
    const issues = extractIssues(['The bass is weak. Bluetooth disconnects.'], lexicon);
    expect(issues.get('Sound & Audio')).toEqual(['The bass is weak']);
    expect(issues.get('Connectivity')).toEqual(['Bluetooth disconnects']);
  });
});

describe('analyzeReviews', () => {
  it('reports complaints for an exact product list', () => {
    const { summary, matches } = analyzeReviews(rows, { product_names: ['Alpha Speaker'] }, lexicon);
    const lines = summary.split('\n');

    expect(lines).toContain('   Products Analyzed: 1');
    expect(lines).toContain('   Total Reviews: 2');
    expect(lines).toContain('   Analysis Type: Complaints');
    expect(lines).toContain('**Sound & Audio** (2 mentions)');
    expect(matches).toHaveLength(1);
  });

  it('finds nothing for an empty product list', () => {
    expect(analyzeReviews(rows, { product_names: [] }, lexicon)).toEqual({
      summary: NO_REVIEWS_FOUND,
      matches: [],
    });
  });

  it('matches partial product names', () => {
    const { summary } = analyzeReviews(rows, { product_name: 'kettle', analysis_type: 'praise' }, lexicon);
    expect(summary.split('\n')).toContain('   Analysis Type: Praise');
    expect(summary.split('\n')).toContain('   - 1 reviews with positive sentiment');
  });
});
