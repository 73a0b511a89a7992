import { z } from 'zod';

// ── Operation names ──────────────────────────────────────────

export const operationNameSchema = z.enum([
  'search_products',
  'analyze_reviews',
  'calculate_statistics',
]);

export type OperationName = z.infer<typeof operationNameSchema>;

export function isOperationName(value: unknown): value is OperationName {
  return operationNameSchema.safeParse(value).success;
}

// ── Parameter maps ───────────────────────────────────────────
// Oracle output is untrusted: numbers may arrive as strings, so the
// numeric fields coerce. Unknown keys are stripped.

export type ParameterMap = Record<string, unknown>;

const optionalNumber = z.coerce.number().finite().optional();
const optionalCount = z.coerce.number().int().positive().optional();

export const searchParamsSchema = z.object({
  category: z.string().optional(),
  sub_category: z.string().optional(),
  keyword: z.string().optional(),
  min_price: optionalNumber,
  max_price: optionalNumber,
  min_rating: optionalNumber,
  max_rating: optionalNumber,
  limit: optionalCount,
});

export type SearchParams = z.infer<typeof searchParamsSchema>;

export const analysisTypeSchema = z.enum(['complaints', 'praise', 'themes', 'all']);

export type AnalysisType = z.infer<typeof analysisTypeSchema>;

export const analyzeParamsSchema = z.object({
  category: z.string().optional(),
  product_name: z.string().optional(),
  product_names: z.array(z.string()).optional(),
  analysis_type: analysisTypeSchema.optional(),
  min_rating: optionalNumber,
  max_rating: optionalNumber,
});

export type AnalyzeParams = z.infer<typeof analyzeParamsSchema>;

export const statisticsOperationSchema = z.enum([
  'category_comparison',
  'price_analysis',
  'rating_ranking',
  'discount_effectiveness',
  'summary',
]);

export type StatisticsOperation = z.infer<typeof statisticsOperationSchema>;

export const groupBySchema = z.enum(['category', 'sub_category']);

export const statisticsParamsSchema = z.object({
  // Left as a plain string so an unknown kind reaches the operation and
  // comes back as its own error message.
  operation: z.string().min(1),
  product_names: z.array(z.string()).optional(),
  categories: z.array(z.string()).optional(),
  top_n: optionalCount,
  group_by: groupBySchema.optional(),
});

export type StatisticsParams = z.infer<typeof statisticsParamsSchema>;

// ── Results ──────────────────────────────────────────────────

export const operationResultSchema = z.object({
  summary: z.string(),
  matches: z.array(z.record(z.unknown())),
});

export type OperationResult = z.infer<typeof operationResultSchema>;

/** What an operation hands back: a structured result or an error string. */
export type OperationOutput = OperationResult | string;

export function isOperationResult(value: unknown): value is OperationResult {
  return operationResultSchema.safeParse(value).success;
}
