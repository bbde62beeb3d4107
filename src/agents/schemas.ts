import { z } from 'zod';

export const SearchQueriesSchema = z.record(z.string(), z.unknown());

export const QueryPlanResponseSchema = z
  .object({
    canonical: z.string().optional(),
    search_queries: SearchQueriesSchema.optional(),
  })
  .passthrough();

export const RelevanceVerdictSchema = z.object({
  relevance: z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.enum(['high', 'medium', 'low'])
  ),
  confidence: z.coerce.number().min(0).max(1),
  reasoning: z.string().default(''),
});

export type RelevanceVerdict = z.infer<typeof RelevanceVerdictSchema>;
