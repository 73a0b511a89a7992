import { describe, expect, it } from 'vitest';

import { loadDataset, parseDataset, toNumber, uniqueProducts } from '../../src/operations/dataset.js';
import { FIXTURE_CSV } from '../helpers.js';

describe('toNumber', () => {
  it('strips currency symbols and separators', () => {
    expect(toNumber('₹1,000')).toBe(1000);
    expect(toNumber('67%')).toBe(67);
  });

  it('reads blanks as zero', () => {
    expect(toNumber('')).toBe(0);
    expect(toNumber(undefined)).toBe(0);
  });
});

describe('loadDataset', () => {
  it('normalises every review row', async () => {
    const rows = await loadDataset(FIXTURE_CSV);

    expect(rows).toHaveLength(7);
    expect(rows[0]).toMatchObject({
      productId: 'A1',
      productName: 'Alpha Speaker',
      category: 'Electronics',
      categoryPath: 'Electronics|Audio|Speakers',
      subCategory: 'Speakers',
      discountedPrice: 1000,
      actualPrice: 2000,
      discountPercentage: 50,
      rating: 4.5,
      ratingCount: 1000,
    });
  });

  it('collapses repeated products', async () => {
    const rows = await loadDataset(FIXTURE_CSV);
    expect(uniqueProducts(rows).map((r) => r.productName)).toEqual([
      'Alpha Speaker',
      'Beta Printer',
      'Gamma Shirt',
      'Delta Watch',
      'Epsilon Kettle',
      'Zeta Jacket',
    ]);
  });

  it('reports a missing file', async () => {
    await expect(loadDataset('/nonexistent/products.csv')).rejects.toThrow(
      'Dataset not found at /nonexistent/products.csv',
    );
  });
});

describe('parseDataset', () => {
  it('rejects a file without the required columns', () => {
    expect(() => parseDataset('product_name,price\nThing,10\n')).toThrow(
      'Dataset is missing column(s): category, rating',
    );
  });
});
