import type { OperationResult, SearchParams } from '../schema/operations.js';
import { LIMITS, TOKEN_GUARDS } from '../config/defaults.js';
import type { DatasetRow } from './dataset.js';
import { matchesAnyTerm, splitTerms, toProductRecord, uniqueProducts } from './dataset.js';

export const NO_PRODUCTS_FOUND = 'No products found matching the specified criteria.';

/**
 * Filter products by category terms, sub-category, keyword, price and
 * rating bounds. Zero matches is a structured, empty result.
 */
export function searchProducts(
  rows: readonly DatasetRow[],
  params: SearchParams,
): OperationResult {
  let filtered = rows;

  if (params.category) {
    const terms = splitTerms(params.category);
    if (terms.length > 0) {
      filtered = filtered.filter((r) => matchesAnyTerm(r.categoryPath, terms));
    }
  }

  if (params.sub_category) {
    const terms = splitTerms(params.sub_category);
    filtered = filtered.filter((r) => matchesAnyTerm(r.subCategory, terms));
  }

  const { min_price, max_price, min_rating, max_rating } = params;
  if (min_price !== undefined) filtered = filtered.filter((r) => r.discountedPrice >= min_price);
  if (max_price !== undefined) filtered = filtered.filter((r) => r.discountedPrice <= max_price);
  if (min_rating !== undefined) filtered = filtered.filter((r) => r.rating >= min_rating);
  if (max_rating !== undefined) filtered = filtered.filter((r) => r.rating <= max_rating);

  if (params.keyword) {
    const keyword = params.keyword.toLowerCase();
    filtered = filtered.filter(
      (r) =>
        r.productName.toLowerCase().includes(keyword) ||
        r.aboutProduct.toLowerCase().includes(keyword),
    );
  }

  const products = uniqueProducts(filtered).slice(0, params.limit ?? LIMITS.DEFAULT_SEARCH_LIMIT);

  if (products.length === 0) {
    return { summary: NO_PRODUCTS_FOUND, matches: [] };
  }

  const blocks = products.map(formatProduct);
  const header = `Found ${String(products.length)} product(s) matching your criteria:\n`;

  return {
    summary: header + blocks.join('\n'),
    matches: products.map(toProductRecord),
  };
}

function formatProduct(row: DatasetRow): string {
  const description =
    row.aboutProduct.length > TOKEN_GUARDS.MAX_EXCERPT_CHARS
      ? `${row.aboutProduct.slice(0, TOKEN_GUARDS.MAX_EXCERPT_CHARS)}...`
      : row.aboutProduct;

  return [
    `**${row.productName}**`,
    `   - Category: ${row.category}${row.subCategory ? ` > ${row.subCategory}` : ''}`,
    `   - Original Price: ${row.actualPrice.toFixed(2)}`,
    `   - Discounted Price: ${row.discountedPrice.toFixed(2)}`,
    `   - Discount: ${String(row.discountPercentage)}%`,
    `   - Rating: ${row.rating.toFixed(1)} (${String(row.ratingCount)} ratings)`,
    `   - Description: ${description}`,
  ].join('\n');
}
