import type { z } from 'zod';

import type { OperationName, OperationOutput, ParameterMap } from '../schema/operations.js';
import {
  analyzeParamsSchema,
  searchParamsSchema,
  statisticsParamsSchema,
} from '../schema/operations.js';
import { analyzeReviews } from './analyze.js';
import { loadDataset } from './dataset.js';
import { DEFAULT_LEXICON_PATH, loadLexicon } from './lexicon.js';
import { searchProducts } from './search.js';
import { calculateStatistics } from './statistics.js';

// ── Public types ─────────────────────────────────────────────

export interface Capability {
  readonly name: OperationName;
  readonly description: string;
  /** One line per parameter, shown to the step resolver. */
  readonly parameters: readonly string[];
  invoke(parameters: ParameterMap): Promise<OperationOutput>;
}

/** Immutable name → capability table, built once per process; it has no `set` or `delete`. */
export type CapabilityTable = ReadonlyMap<string, Capability>;

export interface CapabilityTableOptions {
  datasetPath: string;
  lexiconPath?: string | undefined;
}

// ── Definition helper ────────────────────────────────────────

interface CapabilityDefinition<S extends z.ZodTypeAny> {
  name: OperationName;
  description: string;
  parameters: readonly string[];
  schema: S;
  run(params: z.infer<S>): Promise<OperationOutput>;
}

/**
 * Wrap an operation so that invalid parameters and thrown errors both
 * come back as an error string, never as an exception.
 */
export function defineCapability<S extends z.ZodTypeAny>(
  definition: CapabilityDefinition<S>,
): Capability {
  return Object.freeze({
    name: definition.name,
    description: definition.description,
    parameters: Object.freeze([...definition.parameters]),
    async invoke(parameters: ParameterMap): Promise<OperationOutput> {
      const parsed = definition.schema.safeParse(parameters);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((i) => `${i.path.join('.')}: ${i.message}`)
          .join('; ');
        return `Invalid parameters for ${definition.name}: ${issues}`;
      }

      try {
        return await definition.run(parsed.data);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return `Error running ${definition.name}: ${message}`;
      }
    },
  });
}

// ── Table ────────────────────────────────────────────────────

export function createCapabilityTable(options: CapabilityTableOptions): CapabilityTable {
  const { datasetPath } = options;
  const lexiconPath = options.lexiconPath ?? DEFAULT_LEXICON_PATH;

  const capabilities = [
    defineCapability({
      name: 'search_products',
      description: 'Find products by category, price, rating, or keywords',
      parameters: [
        'category: str (partial match, case-insensitive; comma-join several categories)',
        'sub_category: str (partial match)',
        'min_price: float',
        'max_price: float',
        'min_rating: float (1.0-5.0)',
        'max_rating: float (1.0-5.0)',
        'keyword: str (search in product name/description)',
        'limit: int (optional, default 10)',
      ],
      schema: searchParamsSchema,
      run: async (params) => searchProducts(await loadDataset(datasetPath), params),
    }),
    defineCapability({
      name: 'analyze_reviews',
      description: 'Analyze customer reviews for complaints, praise, or themes',
      parameters: [
        'category: str',
        'product_name: str (partial match)',
        'product_names: list[str] (exact list)',
        'analysis_type: str ("complaints", "praise", "themes", "all")',
        'min_rating: float',
        'max_rating: float',
      ],
      schema: analyzeParamsSchema,
      run: async (params) => {
        const [rows, lexicon] = await Promise.all([
          loadDataset(datasetPath),
          loadLexicon(lexiconPath),
        ]);
        return analyzeReviews(rows, params, lexicon);
      },
    }),
    defineCapability({
      name: 'calculate_statistics',
      description: 'Calculate statistics, comparisons, and rankings',
      parameters: [
        'operation: str ("category_comparison", "price_analysis", "rating_ranking", "discount_effectiveness", "summary")',
        'product_names: list[str] (exact list)',
        'categories: list[str] (for comparison)',
        'top_n: int (for rankings)',
        'group_by: str ("category", "sub_category")',
      ],
      schema: statisticsParamsSchema,
      run: async (params) => calculateStatistics(await loadDataset(datasetPath), params),
    }),
  ];

  return new FrozenCapabilityTable(capabilities.map((c) => [c.name, c] as const));
}

/** A map with no mutators, frozen once built. */
class FrozenCapabilityTable implements ReadonlyMap<string, Capability> {
  private readonly byName: Map<string, Capability>;

  constructor(entries: Iterable<readonly [string, Capability]>) {
    this.byName = new Map(entries);
    Object.freeze(this);
  }

  get size(): number {
    return this.byName.size;
  }

  get(name: string): Capability | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  forEach(callback: (capability: Capability, name: string, table: ReadonlyMap<string, Capability>) => void): void {
    for (const [name, capability] of this.byName) callback(capability, name, this);
  }

  entries() {
    return this.byName.entries();
  }

  keys() {
    return this.byName.keys();
  }

  values() {
    return this.byName.values();
  }

  [Symbol.iterator]() {
    return this.byName[Symbol.iterator]();
  }
}

/** Render the table as the catalogue text the step resolver shows the oracle. */
export function describeCapabilities(table: CapabilityTable): string {
  const blocks: string[] = [];
  let index = 1;
  for (const capability of table.values()) {
    blocks.push(
      [
        `${String(index)}) ${capability.name} - ${capability.description}`,
        ...capability.parameters.map((p) => `   - ${p}`),
      ].join('\n'),
    );
    index++;
  }
  return blocks.join('\n\n');
}
