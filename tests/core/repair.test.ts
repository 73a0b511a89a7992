import { describe, expect, it } from 'vitest';

import type { RepairInput, RepairOutcome } from '../../src/core/repair.js';
import { repairSelection, sanitizeParameters } from '../../src/core/repair.js';
import { errorRecord } from '../../src/schema/history.js';
import { fixtureCapabilities, searchRecord } from '../helpers.js';

const capabilities = fixtureCapabilities();

function repair(overrides: Partial<RepairInput> & { raw: string }): RepairOutcome {
  return repairSelection({
    goal: 'Help me pick products',
    stepText: 'Do the next thing',
    stepIndex: 0,
    history: [],
    capabilities,
    emptySearchPolicy: 'continue',
    ...overrides,
  });
}

function ready(outcome: RepairOutcome): Extract<RepairOutcome, { kind: 'ready' }> {
  if (outcome.kind !== 'ready') {
    throw new Error(`expected a ready invocation, got ${outcome.record.outcome.message}`);
  }
  return outcome;
}

function fatalKind(outcome: RepairOutcome): string {
  if (outcome.kind !== 'fatal') throw new Error('expected a fatal outcome');
  return outcome.record.outcome.kind;
}

describe('repairSelection: parsing and names', () => {
  it('records a parse failure when there is no JSON object', () => {
    const outcome = repair({ raw: 'I would search for speakers.' });
    expect(fatalKind(outcome)).toBe('selector_parse_failure');
  });

  it('infers a missing tool name from the answer text', () => {
    const outcome = ready(
      repair({ raw: 'Use search_products with {"parameters": {"keyword": "kettle"}}', stepText: 'Find kettles' }),
    );
    expect(outcome.operation).toBe('search_products');
    expect(outcome.parameters).toEqual({ keyword: 'kettle' });
  });

  it('rejects an operation outside the catalogue', () => {
    const outcome = repair({ raw: '{"tool": "delete_everything", "parameters": {}}' });
    expect(outcome.kind).toBe('fatal');
    if (outcome.kind === 'fatal') {
      expect(outcome.record.operation).toBe('delete_everything');
      expect(outcome.record.outcome).toEqual({
        status: 'error',
        kind: 'unknown_operation',
        message: 'Unknown tool: delete_everything',
      });
    }
  });

  it('rejects a selection with no name anywhere', () => {
    const outcome = repair({ raw: '{"parameters": {}}' });
    expect(fatalKind(outcome)).toBe('unknown_operation');
  });
});

describe('repairSelection: step wording overrides', () => {
  it('forces review analysis when the step asks to analyze reviews for complaints', () => {
    const outcome = ready(
      repair({
        raw: '{"tool": "search_products", "parameters": {}}',
        stepText: 'Analyze reviews for complaints',
      }),
    );
    expect(outcome.operation).toBe('analyze_reviews');
    expect(outcome.parameters).toEqual({ analysis_type: 'complaints' });
  });

  it('keeps statistics when the step only mentions a review count', () => {
    const outcome = ready(
      repair({
        raw: '{"tool": "calculate_statistics", "parameters": {"operation": "category_comparison"}}',
        stepText: 'Calculate average rating and review count for each category',
      }),
    );
    expect(outcome.operation).toBe('calculate_statistics');
    expect(outcome.notes).toEqual([]);
  });

  it('forces statistics for comparison wording and defaults the kind to summary', () => {
    const outcome = ready(
      repair({ raw: '{"tool": "search_products", "parameters": {}}', stepText: 'Compare average ratings' }),
    );
    expect(outcome.operation).toBe('calculate_statistics');
    expect(outcome.parameters).toEqual({ operation: 'summary' });
  });
});

describe('repairSelection: search fixups', () => {
  it('reads price and rating bounds from the goal', () => {
    const outcome = ready(
      repair({
        raw: '{"tool": "search_products", "parameters": {}}',
        goal: 'find products under 2000 with rating below 4.0',
        stepText: 'Search for matching products',
      }),
    );
    expect(outcome.parameters).toEqual({ max_price: 2000, max_rating: 4 });
  });

  it('keeps bounds the oracle already set', () => {
    const outcome = ready(
      repair({
        raw: '{"tool": "search_products", "parameters": {"keyword": "speaker", "max_price": 1500}}',
        goal: 'speakers under 2000',
        stepText: 'Search speakers',
      }),
    );
    expect(outcome.parameters).toEqual({ keyword: 'speaker', max_price: 1500 });
  });

  it('derives a two-category hint from the step text', () => {
    const outcome = ready(
      repair({
        raw: '{"tool": "search_products", "parameters": {}}',
        goal: 'Which is better?',
        stepText: 'Search for products in the Electronics and Clothing categories',
      }),
    );
    expect(outcome.parameters).toEqual({ category: 'Electronics, Clothing' });
  });

  it('drops a category that is the whole goal pasted in', () => {
    const goal = 'Which speakers have the best battery life for outdoor parties';
    const outcome = ready(
      repair({
        raw: JSON.stringify({ tool: 'search_products', parameters: { category: goal } }),
        goal,
        stepText: 'Search speakers',
      }),
    );
    expect(outcome.parameters).toEqual({});
  });

  it('joins a category list into one comma-separated filter', () => {
    const outcome = ready(
      repair({
        raw: '{"tool": "search_products", "parameters": {"category": ["Electronics", "Clothing"]}}',
        stepText: 'Search both',
      }),
    );
    expect(outcome.parameters).toEqual({ category: 'Electronics, Clothing' });
  });

  it('keeps a single string category', () => {
    const outcome = ready(
      repair({ raw: '{"tool": "search_products", "parameters": {"category": "Toys"}}', stepText: 'Search toys' }),
    );
    expect(outcome.parameters).toEqual({ category: 'Toys' });
  });

  it('does not read a review count as a price bound', () => {
    const outcome = ready(
      repair({
        raw: '{"tool": "search_products", "parameters": {"keyword": "speaker"}}',
        goal: 'Find speakers with more than 1000 reviews',
        stepText: 'Search speakers',
      }),
    );
    expect(outcome.parameters).toEqual({ keyword: 'speaker' });
    expect(outcome.notes).toEqual([]);
  });

  it('takes a result limit from "top N" in the goal', () => {
    const outcome = ready(
      repair({
        raw: '{"tool": "search_products", "parameters": {"keyword": "kettle"}}',
        goal: 'Find the top 5 kettles',
        stepText: 'Search kettles',
      }),
    );
    expect(outcome.parameters).toEqual({ keyword: 'kettle', limit: 5 });
  });
});

describe('repairSelection: statistics and analysis fixups', () => {
  it('fills top_n for a ranking from the goal', () => {
    const outcome = ready(
      repair({
        raw: '{"tool": "calculate_statistics", "parameters": {"operation": "rating_ranking"}}',
        goal: 'Show the top 3 products by rating',
        stepText: 'Order products by rating',
      }),
    );
    expect(outcome.parameters).toEqual({ operation: 'rating_ranking', top_n: 3 });
  });

  it('reads praise from success wording', () => {
    const outcome = ready(
      repair({
        raw: '{"tool": "analyze_reviews", "parameters": {}}',
        stepText: 'Analyze what makes them successful',
      }),
    );
    expect(outcome.parameters).toEqual({ analysis_type: 'praise' });
  });

  it('reads themes from pattern wording', () => {
    const outcome = ready(
      repair({
        raw: '{"tool": "analyze_reviews", "parameters": {}}',
        stepText: 'Find common themes in customer feedback',
      }),
    );
    expect(outcome.parameters).toEqual({ analysis_type: 'themes' });
  });

  it('drops an invalid analysis kind when the step gives no cue', () => {
    const outcome = ready(
      repair({
        raw: '{"tool": "analyze_reviews", "parameters": {"analysis_type": "angry"}}',
        stepText: 'Look at the products',
      }),
    );
    expect(outcome.parameters).toEqual({});
  });
});

describe('repairSelection: pipeline scope', () => {
  const analyze = '{"tool": "analyze_reviews", "parameters": {"analysis_type": "complaints"}}';

  it('narrows analysis to the last search results', () => {
    const outcome = ready(
      repair({ raw: analyze, history: [searchRecord(['Alpha Speaker', 'Delta Watch'])] }),
    );
    expect(outcome.parameters).toEqual({
      analysis_type: 'complaints',
      product_names: ['Alpha Speaker', 'Delta Watch'],
    });
  });

  it('uses the most recent search', () => {
    const outcome = ready(
      repair({
        raw: analyze,
        history: [searchRecord(['Alpha Speaker']), searchRecord(['Epsilon Kettle'], 1)],
      }),
    );
    expect(outcome.parameters['product_names']).toEqual(['Epsilon Kettle']);
  });

  it('leaves an explicit product name alone', () => {
    const outcome = ready(
      repair({
        raw: '{"tool": "analyze_reviews", "parameters": {"product_name": "Gamma"}}',
        history: [searchRecord(['Alpha Speaker'])],
      }),
    );
    expect(outcome.parameters).toEqual({ product_name: 'Gamma' });
  });

  it('leaves statistics with explicit categories alone', () => {
    const outcome = ready(
      repair({
        raw: '{"tool": "calculate_statistics", "parameters": {"operation": "category_comparison", "categories": "Electronics, Clothing"}}',
        history: [searchRecord(['Alpha Speaker'])],
      }),
    );
    expect(outcome.parameters).toEqual({
      operation: 'category_comparison',
      categories: ['Electronics', 'Clothing'],
    });
  });

  it('refuses to run after a failed search', () => {
    const failed = errorRecord(0, 'operation_failure', 'Dataset not found', 'search_products', {});
    const outcome = repair({ raw: analyze, stepIndex: 1, history: [failed] });
    expect(fatalKind(outcome)).toBe('pipeline_violation');
  });

  it('halts on an empty search under the halt policy', () => {
    const outcome = repair({ raw: analyze, history: [searchRecord([])], emptySearchPolicy: 'halt' });
    expect(fatalKind(outcome)).toBe('pipeline_violation');
  });

  it('passes an empty product list under the continue policy', () => {
    const outcome = ready(repair({ raw: analyze, history: [searchRecord([])] }));
    expect(outcome.parameters['product_names']).toEqual([]);
  });
});

describe('sanitizeParameters', () => {
  it('drops null and blank values and trims strings', () => {
    expect(
      sanitizeParameters({ keyword: '  kettle ', category: '', min_price: null, product_names: [], limit: 3 }),
    ).toEqual({ keyword: 'kettle', limit: 3 });
  });
});
