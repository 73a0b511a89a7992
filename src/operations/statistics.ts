import type {
  OperationOutput,
  OperationResult,
  StatisticsOperation,
  StatisticsParams,
} from '../schema/operations.js';
import { statisticsOperationSchema } from '../schema/operations.js';
import { LIMITS } from '../config/defaults.js';
import { correlation, groupBy, max, mean, min, round2, sum } from './aggregate.js';
import type { DatasetRow } from './dataset.js';
import { matchesAnyTerm, uniqueProducts } from './dataset.js';

export const NO_DATA = 'No data available for the selected products.';

const OPERATIONS = statisticsOperationSchema.options;

/**
 * Aggregate statistics over unique products. An unknown `operation`
 * yields an error string; an empty selection yields a structured
 * "no data" result.
 */
export function calculateStatistics(
  rows: readonly DatasetRow[],
  params: StatisticsParams,
): OperationOutput {
  const parsedOperation = statisticsOperationSchema.safeParse(params.operation);
  if (!parsedOperation.success) {
    return `Unknown operation: ${params.operation}. Available operations: ${OPERATIONS.join(', ')}`;
  }
  const operation: StatisticsOperation = parsedOperation.data;

  const selected = selectRows(rows, params);
  const products = uniqueProducts(selected);
  if (products.length === 0) {
    return { summary: NO_DATA, matches: [] };
  }

  switch (operation) {
    case 'category_comparison':
      return categoryComparison(products);
    case 'price_analysis':
      return priceAnalysis(products, params.group_by);
    case 'rating_ranking':
      return ratingRanking(products, params.top_n ?? LIMITS.DEFAULT_TOP_N, params.group_by);
    case 'discount_effectiveness':
      return discountEffectiveness(products);
    case 'summary':
      return datasetSummary(products, selected.length);
  }
}

function selectRows(rows: readonly DatasetRow[], params: StatisticsParams): DatasetRow[] {
  let selected = [...rows];

  // An empty name list selects nothing; it never widens to the whole dataset
  if (params.product_names) {
    const names = new Set(params.product_names);
    selected = selected.filter((r) => names.has(r.productName));
  }

  if (params.categories && params.categories.length > 0) {
    const terms = params.categories;
    selected = selected.filter((r) => matchesAnyTerm(r.categoryPath, terms));
  }

  return selected;
}

// ── Operations ───────────────────────────────────────────────

function categoryComparison(products: readonly DatasetRow[]): OperationResult {
  const groups = groupBy(products, (p) => p.category);
  const lines = ['**Category Comparison Analysis**', ''];
  const matches: Record<string, unknown>[] = [];

  for (const [category, members] of groups) {
    const ratings = members.map((m) => m.rating);
    const row = {
      category,
      products: members.length,
      avg_rating: round2(mean(ratings)),
      min_rating: min(ratings),
      max_rating: max(ratings),
      avg_price: round2(mean(members.map((m) => m.discountedPrice))),
      avg_discount: round2(mean(members.map((m) => m.discountPercentage))),
      total_reviews: sum(members.map((m) => m.ratingCount)),
    };
    matches.push(row);

    lines.push(`**${category}**`);
    lines.push(`Products: ${String(row.products)}`);
    lines.push(
      `Avg Rating: ${row.avg_rating.toFixed(2)} (Range: ${row.min_rating.toFixed(1)} - ${row.max_rating.toFixed(1)})`,
    );
    lines.push(`Avg Price: ${row.avg_price.toFixed(0)}`);
    lines.push(`Avg Discount: ${row.avg_discount.toFixed(1)}%`);
    lines.push(`Total Reviews: ${String(row.total_reviews)}`);
    lines.push('');
  }

  lines.push('**Key Insights:**');
  lines.push(`• Highest rated category: ${argMax(matches, 'avg_rating')}`);
  lines.push(`• Highest discounts: ${argMax(matches, 'avg_discount')}`);
  lines.push(`• Most reviewed: ${argMax(matches, 'total_reviews')}`);

  return { summary: lines.join('\n'), matches };
}

function priceAnalysis(
  products: readonly DatasetRow[],
  groupField: StatisticsParams['group_by'],
): OperationResult {
  const lines = ['**Price Analysis Report**', ''];
  const matches: Record<string, unknown>[] = [];

  if (groupField) {
    const groups = groupBy(products, (p) => (groupField === 'category' ? p.category : p.subCategory));
    for (const [group, members] of groups) {
      const actual = members.map((m) => m.actualPrice);
      const discounted = members.map((m) => m.discountedPrice);
      const row = {
        group,
        min_actual_price: min(actual),
        max_actual_price: max(actual),
        avg_actual_price: round2(mean(actual)),
        min_discounted_price: min(discounted),
        max_discounted_price: max(discounted),
        avg_discounted_price: round2(mean(discounted)),
        avg_discount: round2(mean(members.map((m) => m.discountPercentage))),
      };
      matches.push(row);

      lines.push(`**${group || '(none)'}**`);
      lines.push(
        `Original: ${row.min_actual_price.toFixed(0)} - ${row.max_actual_price.toFixed(0)} (Avg: ${row.avg_actual_price.toFixed(0)})`,
      );
      lines.push(
        `Discounted: ${row.min_discounted_price.toFixed(0)} - ${row.max_discounted_price.toFixed(0)} (Avg: ${row.avg_discounted_price.toFixed(0)})`,
      );
      lines.push(`Avg Discount: ${row.avg_discount.toFixed(1)}%`);
      lines.push('');
    }
    return { summary: lines.join('\n'), matches };
  }

  const discounted = products.map((p) => p.discountedPrice);
  const discounts = products.map((p) => p.discountPercentage);
  const savings = sum(products.map((p) => p.actualPrice - p.discountedPrice));
  const row = {
    min_price: min(discounted),
    max_price: max(discounted),
    avg_price: round2(mean(discounted)),
    min_discount: min(discounts),
    max_discount: max(discounts),
    avg_discount: round2(mean(discounts)),
    total_savings: round2(savings),
  };
  matches.push(row);

  lines.push('**Overall Price Statistics:**');
  lines.push(`Price Range: ${row.min_price.toFixed(0)} - ${row.max_price.toFixed(0)}`);
  lines.push(`Average Price: ${row.avg_price.toFixed(0)}`);
  lines.push(`Discount Range: ${row.min_discount.toFixed(0)}% - ${row.max_discount.toFixed(0)}%`);
  lines.push(`Average Discount: ${row.avg_discount.toFixed(1)}%`);
  lines.push(`Total Savings: ${row.total_savings.toFixed(0)}`);

  return { summary: lines.join('\n'), matches };
}

function ratingRanking(
  products: readonly DatasetRow[],
  topN: number,
  groupField: StatisticsParams['group_by'],
): OperationResult {
  const lines = ['**Rating Rankings**', ''];

  if (groupField) {
    const groups = groupBy(products, (p) => (groupField === 'category' ? p.category : p.subCategory));
    const ranked = [...groups.entries()]
      .map(([group, members]) => ({ group, avg_rating: round2(mean(members.map((m) => m.rating))) }))
      .sort((a, b) => b.avg_rating - a.avg_rating)
      .slice(0, topN);

    const label = groupField === 'category' ? 'Categories' : 'Sub-categories';
    lines.push(`**${label} Ranked by Average Rating:**`);
    ranked.forEach((entry, i) => {
      lines.push(`${String(i + 1)}. ${entry.group}: ${entry.avg_rating.toFixed(2)}`);
    });
    return { summary: lines.join('\n'), matches: ranked.map((r, i) => ({ rank: i + 1, ...r })) };
  }

  // Stable sorts keep file order among equal ratings
  const top = [...products].sort((a, b) => b.rating - a.rating).slice(0, topN);
  const bottom = [...products].sort((a, b) => a.rating - b.rating).slice(0, topN);

  lines.push(`**Top ${String(topN)} Products by Rating:**`);
  top.forEach((p, i) => lines.push(...rankLine(p, i)));
  lines.push('');
  lines.push(`**Bottom ${String(topN)} Products by Rating:**`);
  bottom.forEach((p, i) => lines.push(...rankLine(p, i)));

  const matches = top.map((p, i) => ({
    rank: i + 1,
    product_name: p.productName,
    rating: p.rating,
    discounted_price: p.discountedPrice,
  }));
  return { summary: lines.join('\n'), matches };
}

function rankLine(product: DatasetRow, index: number): string[] {
  const name =
    product.productName.length > 40 ? `${product.productName.slice(0, 40)}...` : product.productName;
  return [
    `${String(index + 1)}. ${name}`,
    `   Rating: ${product.rating.toFixed(1)} | Price: ${product.discountedPrice.toFixed(2)}`,
  ];
}

const DISCOUNT_LEVELS = [
  { label: 'Low (≤35%)', upTo: 35 },
  { label: 'Medium (35-45%)', upTo: 45 },
  { label: 'High (>45%)', upTo: Number.POSITIVE_INFINITY },
] as const;

function discountEffectiveness(products: readonly DatasetRow[]): OperationResult {
  const lines = ['**Discount Effectiveness Analysis**', '', '**Impact of Discount Level on Performance:**', ''];
  const matches: Record<string, unknown>[] = [];

  let floor: number = Number.NEGATIVE_INFINITY;
  for (const level of DISCOUNT_LEVELS) {
    const lower = floor;
    floor = level.upTo;
    const members = products.filter(
      (p) => p.discountPercentage > lower && p.discountPercentage <= level.upTo,
    );
    if (members.length === 0) continue;

    const row = {
      level: level.label,
      products: members.length,
      avg_rating: round2(mean(members.map((m) => m.rating))),
      avg_review_count: round2(mean(members.map((m) => m.ratingCount))),
    };
    matches.push(row);

    lines.push(`**${row.level}**`);
    lines.push(`Products: ${String(row.products)}`);
    lines.push(`Avg Rating: ${row.avg_rating.toFixed(2)}`);
    lines.push(`Avg Review Count: ${row.avg_review_count.toFixed(0)}`);
    lines.push('');
  }

  const r = correlation(
    products.map((p) => p.discountPercentage),
    products.map((p) => p.rating),
  );

  lines.push('**Insights:**');
  if (r > 0.1) {
    lines.push(`   • Higher discounts show positive correlation with ratings (${r.toFixed(2)})`);
  } else if (r < -0.1) {
    lines.push(`   • Higher discounts show negative correlation with ratings (${r.toFixed(2)})`);
    lines.push('   • Customers may perceive heavily discounted items as lower quality');
  } else {
    lines.push(`   • Discount level has minimal correlation with ratings (${r.toFixed(2)})`);
  }

  return { summary: lines.join('\n'), matches };
}

function datasetSummary(products: readonly DatasetRow[], reviewRows: number): OperationResult {
  const ratings = products.map((p) => p.rating);
  const prices = products.map((p) => p.discountedPrice);
  const categories = groupBy(products, (p) => p.category);
  const subCategories = new Set(products.map((p) => p.subCategory).filter(Boolean));

  const lines = [
    '**Dataset Summary Statistics**',
    '',
    '**Overview:**',
    `Total Products: ${String(products.length)}`,
    `Total Reviews: ${String(reviewRows)}`,
    `Categories: ${String(categories.size)}`,
    `Sub-categories: ${String(subCategories.size)}`,
    '',
    '**Rating Statistics:**',
    `Average Rating: ${mean(ratings).toFixed(2)}`,
    `Rating Range: ${min(ratings).toFixed(1)} - ${max(ratings).toFixed(1)}`,
    `Avg Reviews per Product: ${mean(products.map((p) => p.ratingCount)).toFixed(0)}`,
    '',
    '**Price Statistics:**',
    `Price Range: ${min(prices).toFixed(0)} - ${max(prices).toFixed(0)}`,
    `Average Price: ${mean(prices).toFixed(0)}`,
    `Average Discount: ${mean(products.map((p) => p.discountPercentage)).toFixed(1)}%`,
    '',
    '**Categories Available:**',
  ];

  const matches: Record<string, unknown>[] = [];
  for (const [category, members] of categories) {
    lines.push(`- ${category}: ${String(members.length)} products`);
    matches.push({ category, products: members.length });
  }

  return { summary: lines.join('\n'), matches };
}

// ── Helpers ──────────────────────────────────────────────────

function argMax(rows: readonly Record<string, unknown>[], field: string): string {
  let best: Record<string, unknown> | undefined;
  for (const row of rows) {
    const value = row[field];
    const bestValue = best?.[field];
    if (typeof value !== 'number') continue;
    if (best === undefined || typeof bestValue !== 'number' || value > bestValue) best = row;
  }
  return String(best?.['category'] ?? 'n/a');
}
