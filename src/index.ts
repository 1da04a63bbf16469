// Публичный API пакета.
export { Client } from './client/index.js';
export type { ClientOptions, PageQuery, TenantTokenPayload, SearchRules } from './client/index.js';
export { signTenantToken, findDefaultSearchKey } from './client/index.js';

export { Index } from './indexes/index.js';
export type {
  IndexDefaults,
  DocumentsQuery,
  BatchOptions,
  AutoBatchOptions,
  DirectoryOptions,
  DirectoryBatchOptions,
} from './indexes/index.js';
export { batch, autoBatch, loadDocumentsFromFile, combineDocuments } from './indexes/index.js';

export { HttpRequests } from './http/index.js';
export type { HttpRequestsOptions, HttpResponse, RetryOptions } from './http/index.js';

export { getTasks, getTask, waitForTask, statusCheck, formatFailedTask } from './tasks/index.js';
export type { TasksQuery, WaitOptions, TaskSource } from './tasks/index.js';

export { loadConfig, ClientConfigSchema, defaultConfig } from './config/index.js';
export type { ClientConfig } from './config/index.js';

export * from './errors.js';
export * from './models/index.js';
