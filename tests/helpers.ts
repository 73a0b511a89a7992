import { fileURLToPath } from 'node:url';

import { createCapabilityTable } from '../src/operations/index.js';
import type { CapabilityTable } from '../src/operations/index.js';
import type { InvocationRecord } from '../src/schema/history.js';

export const FIXTURE_CSV = fileURLToPath(new URL('./fixtures/products.csv', import.meta.url));

export function fixtureCapabilities(): CapabilityTable {
  return createCapabilityTable({ datasetPath: FIXTURE_CSV });
}

export function searchRecord(productNames: readonly string[], stepIndex = 0): InvocationRecord {
  return {
    stepIndex,
    operation: 'search_products',
    parameters: { category: 'Electronics' },
    outcome: {
      status: 'success',
      result: {
        summary: `Found ${String(productNames.length)} product(s)`,
        matches: productNames.map((name) => ({ product_name: name })),
      },
      reused: false,
    },
  };
}
