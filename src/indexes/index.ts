// Barrel-файл модуля индексов.
export { Index } from './meili-index.js';
export type {
  IndexDefaults,
  DocumentsQuery,
  BatchOptions,
  AutoBatchOptions,
  DirectoryOptions,
  DirectoryBatchOptions,
} from './meili-index.js';

export { batch, autoBatch, jsonByteLength } from './batches.js';
export {
  loadDocumentsFromFile,
  loadDocumentsFromDirectory,
  findDocumentFiles,
  combineDocuments,
  readRawDocumentsFile,
} from './documents-file.js';
export type { RawDocumentsFile } from './documents-file.js';
