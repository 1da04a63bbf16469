// Barrel-файл моделей ответов Meilisearch.
export {
  TaskStatusSchema,
  TaskErrorSchema,
  TaskInfoSchema,
  TaskSchema,
  TasksResultsSchema,
} from './task.js';
export type { TaskStatus, TaskError, TaskInfo, Task, TasksResults } from './task.js';

export { IndexInfoSchema, IndexesResultsSchema, IndexStatsSchema } from './index-info.js';
export type { IndexInfo, IndexesResults, IndexStats } from './index-info.js';

export {
  ClientStatsSchema,
  KeySchema,
  KeysResultsSchema,
  HealthSchema,
  VersionSchema,
} from './client.js';
export type {
  ClientStats,
  Key,
  KeysResults,
  KeyCreate,
  KeyUpdate,
  Health,
  Version,
} from './client.js';

export { DocumentSchema, DocumentsInfoSchema } from './documents.js';
export type { Document, DocumentsInfo, DocumentType } from './documents.js';

export { SearchResultsSchema } from './search.js';
export type { SearchResults, SearchParams, Filter, MatchingStrategy } from './search.js';

export {
  SettingsSchema,
  TypoToleranceSchema,
  FacetingSchema,
  PaginationSchema,
  SynonymsSchema,
  StringListSchema,
  DistinctAttributeSchema,
} from './settings.js';
export type {
  Settings,
  TypoTolerance,
  Faceting,
  Pagination,
  Synonyms,
} from './settings.js';
