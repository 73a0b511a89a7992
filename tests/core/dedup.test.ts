import { describe, expect, it } from 'vitest';

import { canonicalize, findReusable, invocationKey } from '../../src/core/dedup.js';
import { errorRecord } from '../../src/schema/history.js';
import { searchRecord } from '../helpers.js';

describe('canonicalize', () => {
  it('sorts object keys and list items', () => {
    expect(JSON.stringify(canonicalize({ b: 1, a: [3, 1, 2] }))).toBe('{"a":[1,2,3],"b":1}');
  });

  it('sorts nested objects inside lists', () => {
    const left = canonicalize([{ y: 2, x: 1 }, 'z']);
    const right = canonicalize(['z', { x: 1, y: 2 }]);
    expect(left).toEqual(right);
  });

  it('drops undefined entries and maps non-finite numbers to null', () => {
    expect(canonicalize({ a: undefined, b: Number.NaN })).toEqual({ b: null });
  });
});

describe('invocationKey', () => {
  it('ignores list order', () => {
    expect(invocationKey('analyze_reviews', { product_names: ['b', 'a'] })).toBe(
      invocationKey('analyze_reviews', { product_names: ['a', 'b'] }),
    );
  });

  it('distinguishes operations', () => {
    expect(invocationKey('search_products', {})).not.toBe(invocationKey('calculate_statistics', {}));
  });
});

describe('findReusable', () => {
  it('returns the latest equivalent successful call', () => {
    const first = searchRecord(['Alpha Speaker']);
    const second = searchRecord(['Delta Watch'], 1);
    expect(findReusable([first, second], 'search_products', { category: 'Electronics' })).toBe(second);
  });

  it('never reuses an error record', () => {
    const failed = errorRecord(0, 'operation_failure', 'boom', 'search_products', { keyword: 'x' });
    expect(findReusable([failed], 'search_products', { keyword: 'x' })).toBeUndefined();
  });

  it('needs equal parameters', () => {
    expect(findReusable([searchRecord(['Alpha Speaker'])], 'search_products', { category: 'Clothing' })).toBeUndefined();
  });
});
