/**
 * Dataset operations module.
 * The three operations the loop can invoke, and the capability table
 * that exposes them by name.
 */

export { createCapabilityTable, defineCapability, describeCapabilities } from './catalog.js';
export type { Capability, CapabilityTable, CapabilityTableOptions } from './catalog.js';
export { loadDataset, parseDataset, splitTerms, uniqueProducts } from './dataset.js';
export type { DatasetRow } from './dataset.js';
export { loadLexicon, compileLexicon, DEFAULT_LEXICON_PATH } from './lexicon.js';
export type { ReviewLexicon } from './lexicon.js';
export { searchProducts, NO_PRODUCTS_FOUND } from './search.js';
export { analyzeReviews, identifySentiment, extractIssues, NO_REVIEWS_FOUND } from './analyze.js';
export { calculateStatistics, NO_DATA } from './statistics.js';
