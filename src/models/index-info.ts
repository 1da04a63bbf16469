// Модели индексов.
import { z } from 'zod';

export const IndexInfoSchema = z.object({
  uid: z.string(),
  primaryKey: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

// Постраничный список индексов (GET /indexes).
export const IndexesResultsSchema = z.object({
  results: z.array(IndexInfoSchema),
  offset: z.number(),
  limit: z.number(),
  total: z.number(),
});

export const IndexStatsSchema = z.object({
  numberOfDocuments: z.number(),
  isIndexing: z.boolean(),
  fieldDistribution: z.record(z.number()),
});

export type IndexInfo = z.infer<typeof IndexInfoSchema>;
export type IndexesResults = z.infer<typeof IndexesResultsSchema>;
export type IndexStats = z.infer<typeof IndexStatsSchema>;
