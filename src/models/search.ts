// Модели поиска.
import { z } from 'zod';
import { DocumentSchema } from './documents.js';

export const SearchResultsSchema = z.object({
  hits: z.array(DocumentSchema),
  query: z.string(),
  processingTimeMs: z.number(),
  offset: z.number().optional(),
  limit: z.number().optional(),
  estimatedTotalHits: z.number().optional(),
  page: z.number().optional(),
  hitsPerPage: z.number().optional(),
  totalHits: z.number().optional(),
  totalPages: z.number().optional(),
  facetDistribution: z.record(z.record(z.number())).optional(),
  facetStats: z.record(z.object({ min: z.number(), max: z.number() })).optional(),
});

export type SearchResults = z.infer<typeof SearchResultsSchema>;

export type MatchingStrategy = 'last' | 'all';

// Фильтр: строка или массив (вложенные массивы объединяются через OR).
export type Filter = string | Array<string | string[]>;

// Параметры поиска (POST /indexes/:uid/search).
export interface SearchParams {
  offset?: number;
  limit?: number;
  page?: number;
  hitsPerPage?: number;
  filter?: Filter;
  facets?: string[];
  attributesToRetrieve?: string[];
  attributesToCrop?: string[];
  cropLength?: number;
  attributesToHighlight?: string[];
  sort?: string[];
  showMatchesPosition?: boolean;
  highlightPreTag?: string;
  highlightPostTag?: string;
  cropMarker?: string;
  matchingStrategy?: MatchingStrategy;
}
