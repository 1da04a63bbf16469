// Модели настроек индекса.
import { z } from 'zod';

export const TypoToleranceSchema = z.object({
  enabled: z.boolean(),
  minWordSizeForTypos: z.object({
    oneTypo: z.number(),
    twoTypos: z.number(),
  }).partial(),
  disableOnWords: z.array(z.string()),
  disableOnAttributes: z.array(z.string()),
}).partial();

export const FacetingSchema = z.object({
  maxValuesPerFacet: z.number(),
}).partial();

export const PaginationSchema = z.object({
  maxTotalHits: z.number(),
}).partial();

export const StringListSchema = z.array(z.string());
export const SynonymsSchema = z.record(z.array(z.string()));
export const DistinctAttributeSchema = z.string().nullable();

export const SettingsSchema = z.object({
  rankingRules: StringListSchema,
  distinctAttribute: DistinctAttributeSchema,
  searchableAttributes: StringListSchema,
  displayedAttributes: StringListSchema,
  stopWords: StringListSchema,
  synonyms: SynonymsSchema,
  filterableAttributes: StringListSchema,
  sortableAttributes: StringListSchema,
  typoTolerance: TypoToleranceSchema,
  faceting: FacetingSchema,
  pagination: PaginationSchema,
}).partial();

export type TypoTolerance = z.infer<typeof TypoToleranceSchema>;
export type Faceting = z.infer<typeof FacetingSchema>;
export type Pagination = z.infer<typeof PaginationSchema>;
export type Synonyms = z.infer<typeof SynonymsSchema>;
export type Settings = z.infer<typeof SettingsSchema>;
