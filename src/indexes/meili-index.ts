// Индекс Meilisearch: документы, поиск, настройки, задачи.
import type { z } from 'zod';
import type { HttpRequests, HttpResponse } from '../http/index.js';
import { MeilisearchApiError, MeilisearchTaskError } from '../errors.js';
import {
  DistinctAttributeSchema,
  DocumentSchema,
  DocumentsInfoSchema,
  FacetingSchema,
  IndexInfoSchema,
  IndexStatsSchema,
  PaginationSchema,
  SearchResultsSchema,
  SettingsSchema,
  StringListSchema,
  SynonymsSchema,
  TaskInfoSchema,
  TypoToleranceSchema,
} from '../models/index.js';
import type {
  Document,
  DocumentsInfo,
  DocumentType,
  Faceting,
  IndexInfo,
  IndexStats,
  Pagination,
  SearchParams,
  SearchResults,
  Settings,
  Synonyms,
  Task,
  TaskInfo,
  TasksResults,
  TypoTolerance,
} from '../models/index.js';
import { getTasks, waitForTask } from '../tasks/index.js';
import type { TasksQuery, WaitOptions } from '../tasks/index.js';
import { autoBatch, batch } from './batches.js';
import {
  combineDocuments,
  loadDocumentsFromDirectory,
  loadDocumentsFromFile,
  readRawDocumentsFile,
} from './documents-file.js';

// Параметры по умолчанию, которые индекс получает от клиента.
export interface IndexDefaults {
  wait: WaitOptions;
  batchSize: number;
  maxPayloadSize: number;
}

export interface DocumentsQuery {
  offset?: number;
  limit?: number;
  fields?: string[];
}

export interface BatchOptions {
  batchSize?: number;
  primaryKey?: string;
}

export interface AutoBatchOptions {
  maxPayloadSize?: number;
  primaryKey?: string;
}

export interface DirectoryOptions {
  primaryKey?: string;
  documentType?: DocumentType;
  combineDocuments?: boolean;
}

export interface DirectoryBatchOptions extends DirectoryOptions {
  batchSize?: number;
}

// POST заменяет документы целиком, PUT обновляет их частично.
type DocumentsMethod = 'POST' | 'PUT';

const DEFAULT_INDEX_DEFAULTS: IndexDefaults = {
  wait: {},
  batchSize: 1000,
  maxPayloadSize: 104_857_600,
};

// Проверяет результат задачи и выбрасывает ошибку, если она упала.
function assertSucceeded(task: Task): Task {
  if (task.status === 'failed') {
    throw new MeilisearchTaskError(task.uid, task.error ?? {});
  }
  return task;
}

export class Index {
  primaryKey: string | null;
  createdAt: string | null;
  updatedAt: string | null;
  private readonly defaults: IndexDefaults;

  constructor(
    private readonly http: HttpRequests,
    readonly uid: string,
    info?: Partial<Omit<IndexInfo, 'uid'>>,
    defaults?: Partial<IndexDefaults>,
  ) {
    this.primaryKey = info?.primaryKey ?? null;
    this.createdAt = info?.createdAt ?? null;
    this.updatedAt = info?.updatedAt ?? null;
    this.defaults = { ...DEFAULT_INDEX_DEFAULTS, ...defaults };
  }

  // Создаёт индекс, дожидается задачи и загружает его описание.
  static async create(
    http: HttpRequests,
    uid: string,
    primaryKey?: string,
    defaults?: Partial<IndexDefaults>,
  ): Promise<Index> {
    const response = await http.post('indexes', { uid, primaryKey });
    const taskInfo = TaskInfoSchema.parse(response.data);
    const index = new Index(http, uid, undefined, defaults);
    assertSucceeded(await index.waitForTask(taskInfo.taskUid));
    return index.fetchInfo();
  }

  // Путь относительно индекса.
  private path(suffix = ''): string {
    return suffix ? `indexes/${this.uid}/${suffix}` : `indexes/${this.uid}`;
  }

  private toTaskInfo(response: HttpResponse): TaskInfo {
    return TaskInfoSchema.parse(response.data);
  }

  // --- Информация об индексе ---

  async fetchInfo(): Promise<Index> {
    const response = await this.http.get(this.path());
    const info = IndexInfoSchema.parse(response.data);
    this.primaryKey = info.primaryKey;
    this.createdAt = info.createdAt;
    this.updatedAt = info.updatedAt;
    return this;
  }

  async getPrimaryKey(): Promise<string | null> {
    const info = await this.fetchInfo();
    return info.primaryKey;
  }

  // Меняет первичный ключ индекса и обновляет локальное состояние.
  async update(primaryKey: string): Promise<Index> {
    const response = await this.http.patch(this.path(), { primaryKey });
    const taskInfo = this.toTaskInfo(response);
    assertSucceeded(await this.waitForTask(taskInfo.taskUid));
    return this.fetchInfo();
  }

  async delete(): Promise<TaskInfo> {
    return this.toTaskInfo(await this.http.delete(this.path()));
  }

  // true, если индекс существовал и был удалён.
  async deleteIfExists(): Promise<boolean> {
    let taskInfo: TaskInfo;
    try {
      taskInfo = await this.delete();
    } catch (error) {
      if (error instanceof MeilisearchApiError && error.code === 'index_not_found') {
        return false;
      }
      throw error;
    }
    const task = await this.waitForTask(taskInfo.taskUid);
    return task.status === 'succeeded';
  }

  async getStats(): Promise<IndexStats> {
    const response = await this.http.get(this.path('stats'));
    return IndexStatsSchema.parse(response.data);
  }

  // --- Задачи ---

  async getTasks(query: Omit<TasksQuery, 'indexUids'> = {}): Promise<TasksResults> {
    return getTasks(this.http, { ...query, indexUids: [this.uid] });
  }

  async waitForTask(taskUid: number, options?: WaitOptions): Promise<Task> {
    return waitForTask(this.http, taskUid, { ...this.defaults.wait, ...options });
  }

  // --- Поиск ---

  async search(query?: string, params: SearchParams = {}): Promise<SearchResults> {
    const response = await this.http.post(this.path('search'), { q: query, ...params });
    return SearchResultsSchema.parse(response.data);
  }

  // --- Чтение документов ---

  async getDocument(documentId: string | number, fields?: string[]): Promise<Document> {
    const response = await this.http.get(
      this.path(`documents/${encodeURIComponent(String(documentId))}`),
      { fields },
    );
    return DocumentSchema.parse(response.data);
  }

  async getDocuments(query: DocumentsQuery = {}): Promise<DocumentsInfo> {
    const response = await this.http.get(this.path('documents'), {
      offset: query.offset,
      limit: query.limit,
      fields: query.fields,
    });
    return DocumentsInfoSchema.parse(response.data);
  }

  // --- Добавление и обновление документов ---

  private async sendDocuments(
    method: DocumentsMethod,
    documents: readonly Document[],
    primaryKey?: string,
  ): Promise<TaskInfo> {
    const options = { query: { primaryKey } };
    const response = method === 'POST'
      ? await this.http.post(this.path('documents'), documents, options)
      : await this.http.put(this.path('documents'), documents, options);
    return this.toTaskInfo(response);
  }

  // Батчи отправляются параллельно; порядок результатов совпадает с порядком батчей.
  private async sendInBatches(
    method: DocumentsMethod,
    documents: readonly Document[],
    options: BatchOptions,
  ): Promise<TaskInfo[]> {
    const batches = batch(documents, options.batchSize ?? this.defaults.batchSize);
    return Promise.all(batches.map((b) => this.sendDocuments(method, b, options.primaryKey)));
  }

  private async sendAutoBatch(
    method: DocumentsMethod,
    documents: readonly Document[],
    options: AutoBatchOptions,
  ): Promise<TaskInfo[]> {
    const batches = autoBatch(documents, options.maxPayloadSize ?? this.defaults.maxPayloadSize);
    return Promise.all(batches.map((b) => this.sendDocuments(method, b, options.primaryKey)));
  }

  private async sendFromDirectory(
    method: DocumentsMethod,
    dirPath: string,
    options: DirectoryOptions,
  ): Promise<TaskInfo[]> {
    const perFile = await loadDocumentsFromDirectory(dirPath, options.documentType ?? 'json');
    if (options.combineDocuments ?? true) {
      return [await this.sendDocuments(method, combineDocuments(perFile), options.primaryKey)];
    }
    return Promise.all(perFile.map((docs) => this.sendDocuments(method, docs, options.primaryKey)));
  }

  private async sendFromDirectoryInBatches(
    method: DocumentsMethod,
    dirPath: string,
    options: DirectoryBatchOptions,
  ): Promise<TaskInfo[]> {
    const perFile = await loadDocumentsFromDirectory(dirPath, options.documentType ?? 'json');
    const groups = (options.combineDocuments ?? true) ? [combineDocuments(perFile)] : perFile;
    const results = await Promise.all(
      groups.map((docs) => this.sendInBatches(method, docs, options)),
    );
    return results.flat();
  }

  private async sendRawFile(
    method: DocumentsMethod,
    filePath: string,
    primaryKey?: string,
  ): Promise<TaskInfo> {
    const { content, contentType } = await readRawDocumentsFile(filePath);
    const options = { contentType, query: { primaryKey } };
    const response = method === 'POST'
      ? await this.http.post(this.path('documents'), content, options)
      : await this.http.put(this.path('documents'), content, options);
    return this.toTaskInfo(response);
  }

  async addDocuments(documents: readonly Document[], primaryKey?: string): Promise<TaskInfo> {
    return this.sendDocuments('POST', documents, primaryKey);
  }

  async addDocumentsInBatches(
    documents: readonly Document[],
    options: BatchOptions = {},
  ): Promise<TaskInfo[]> {
    return this.sendInBatches('POST', documents, options);
  }

  async addDocumentsAutoBatch(
    documents: readonly Document[],
    options: AutoBatchOptions = {},
  ): Promise<TaskInfo[]> {
    return this.sendAutoBatch('POST', documents, options);
  }

  async addDocumentsFromFile(filePath: string, primaryKey?: string): Promise<TaskInfo> {
    return this.sendDocuments('POST', await loadDocumentsFromFile(filePath), primaryKey);
  }

  async addDocumentsFromFileInBatches(
    filePath: string,
    options: BatchOptions = {},
  ): Promise<TaskInfo[]> {
    return this.sendInBatches('POST', await loadDocumentsFromFile(filePath), options);
  }

  async addDocumentsFromDirectory(
    dirPath: string,
    options: DirectoryOptions = {},
  ): Promise<TaskInfo[]> {
    return this.sendFromDirectory('POST', dirPath, options);
  }

  async addDocumentsFromDirectoryInBatches(
    dirPath: string,
    options: DirectoryBatchOptions = {},
  ): Promise<TaskInfo[]> {
    return this.sendFromDirectoryInBatches('POST', dirPath, options);
  }

  async addDocumentsFromRawFile(filePath: string, primaryKey?: string): Promise<TaskInfo> {
    return this.sendRawFile('POST', filePath, primaryKey);
  }

  async updateDocuments(documents: readonly Document[], primaryKey?: string): Promise<TaskInfo> {
    return this.sendDocuments('PUT', documents, primaryKey);
  }

  async updateDocumentsInBatches(
    documents: readonly Document[],
    options: BatchOptions = {},
  ): Promise<TaskInfo[]> {
    return this.sendInBatches('PUT', documents, options);
  }

  async updateDocumentsAutoBatch(
    documents: readonly Document[],
    options: AutoBatchOptions = {},
  ): Promise<TaskInfo[]> {
    return this.sendAutoBatch('PUT', documents, options);
  }

  async updateDocumentsFromFile(filePath: string, primaryKey?: string): Promise<TaskInfo> {
    return this.sendDocuments('PUT', await loadDocumentsFromFile(filePath), primaryKey);
  }

  async updateDocumentsFromFileInBatches(
    filePath: string,
    options: BatchOptions = {},
  ): Promise<TaskInfo[]> {
    return this.sendInBatches('PUT', await loadDocumentsFromFile(filePath), options);
  }

  async updateDocumentsFromDirectory(
    dirPath: string,
    options: DirectoryOptions = {},
  ): Promise<TaskInfo[]> {
    return this.sendFromDirectory('PUT', dirPath, options);
  }

  async updateDocumentsFromDirectoryInBatches(
    dirPath: string,
    options: DirectoryBatchOptions = {},
  ): Promise<TaskInfo[]> {
    return this.sendFromDirectoryInBatches('PUT', dirPath, options);
  }

  async updateDocumentsFromRawFile(filePath: string, primaryKey?: string): Promise<TaskInfo> {
    return this.sendRawFile('PUT', filePath, primaryKey);
  }

  // --- Удаление документов ---

  async deleteDocument(documentId: string | number): Promise<TaskInfo> {
    const response = await this.http.delete(
      this.path(`documents/${encodeURIComponent(String(documentId))}`),
    );
    return this.toTaskInfo(response);
  }

  async deleteDocuments(documentIds: ReadonlyArray<string | number>): Promise<TaskInfo> {
    const response = await this.http.post(this.path('documents/delete-batch'), documentIds);
    return this.toTaskInfo(response);
  }

  async deleteAllDocuments(): Promise<TaskInfo> {
    return this.toTaskInfo(await this.http.delete(this.path('documents')));
  }

  // --- Настройки ---

  async getSettings(): Promise<Settings> {
    const response = await this.http.get(this.path('settings'));
    return SettingsSchema.parse(response.data);
  }

  async updateSettings(settings: Settings): Promise<TaskInfo> {
    return this.toTaskInfo(await this.http.patch(this.path('settings'), settings));
  }

  async resetSettings(): Promise<TaskInfo> {
    return this.toTaskInfo(await this.http.delete(this.path('settings')));
  }

  private async getSetting<S extends z.ZodTypeAny>(route: string, schema: S): Promise<z.infer<S>> {
    const response = await this.http.get(this.path(`settings/${route}`));
    return schema.parse(response.data);
  }

  // Списки заменяются целиком (PUT), объектные настройки сливаются (PATCH).
  private async updateSetting(route: string, value: unknown, method: 'PUT' | 'PATCH'): Promise<TaskInfo> {
    const path = this.path(`settings/${route}`);
    const response = method === 'PUT'
      ? await this.http.put(path, value)
      : await this.http.patch(path, value);
    return this.toTaskInfo(response);
  }

  private async resetSetting(route: string): Promise<TaskInfo> {
    return this.toTaskInfo(await this.http.delete(this.path(`settings/${route}`)));
  }

  async getRankingRules(): Promise<string[]> {
    return this.getSetting('ranking-rules', StringListSchema);
  }

  async updateRankingRules(rankingRules: string[]): Promise<TaskInfo> {
    return this.updateSetting('ranking-rules', rankingRules, 'PUT');
  }

  async resetRankingRules(): Promise<TaskInfo> {
    return this.resetSetting('ranking-rules');
  }

  async getDistinctAttribute(): Promise<string | null> {
    return this.getSetting('distinct-attribute', DistinctAttributeSchema);
  }

  async updateDistinctAttribute(attribute: string): Promise<TaskInfo> {
    return this.updateSetting('distinct-attribute', attribute, 'PUT');
  }

  async resetDistinctAttribute(): Promise<TaskInfo> {
    return this.resetSetting('distinct-attribute');
  }

  async getSearchableAttributes(): Promise<string[]> {
    return this.getSetting('searchable-attributes', StringListSchema);
  }

  async updateSearchableAttributes(attributes: string[]): Promise<TaskInfo> {
    return this.updateSetting('searchable-attributes', attributes, 'PUT');
  }

  async resetSearchableAttributes(): Promise<TaskInfo> {
    return this.resetSetting('searchable-attributes');
  }

  async getDisplayedAttributes(): Promise<string[]> {
    return this.getSetting('displayed-attributes', StringListSchema);
  }

  async updateDisplayedAttributes(attributes: string[]): Promise<TaskInfo> {
    return this.updateSetting('displayed-attributes', attributes, 'PUT');
  }

  async resetDisplayedAttributes(): Promise<TaskInfo> {
    return this.resetSetting('displayed-attributes');
  }

  async getStopWords(): Promise<string[]> {
    return this.getSetting('stop-words', StringListSchema);
  }

  async updateStopWords(stopWords: string[]): Promise<TaskInfo> {
    return this.updateSetting('stop-words', stopWords, 'PUT');
  }

  async resetStopWords(): Promise<TaskInfo> {
    return this.resetSetting('stop-words');
  }

  async getSynonyms(): Promise<Synonyms> {
    return this.getSetting('synonyms', SynonymsSchema);
  }

  async updateSynonyms(synonyms: Synonyms): Promise<TaskInfo> {
    return this.updateSetting('synonyms', synonyms, 'PUT');
  }

  async resetSynonyms(): Promise<TaskInfo> {
    return this.resetSetting('synonyms');
  }

  async getFilterableAttributes(): Promise<string[]> {
    return this.getSetting('filterable-attributes', StringListSchema);
  }

  async updateFilterableAttributes(attributes: string[]): Promise<TaskInfo> {
    return this.updateSetting('filterable-attributes', attributes, 'PUT');
  }

  async resetFilterableAttributes(): Promise<TaskInfo> {
    return this.resetSetting('filterable-attributes');
  }

  async getSortableAttributes(): Promise<string[]> {
    return this.getSetting('sortable-attributes', StringListSchema);
  }

  async updateSortableAttributes(attributes: string[]): Promise<TaskInfo> {
    return this.updateSetting('sortable-attributes', attributes, 'PUT');
  }

  async resetSortableAttributes(): Promise<TaskInfo> {
    return this.resetSetting('sortable-attributes');
  }

  async getTypoTolerance(): Promise<TypoTolerance> {
    return this.getSetting('typo-tolerance', TypoToleranceSchema);
  }

  async updateTypoTolerance(typoTolerance: TypoTolerance): Promise<TaskInfo> {
    return this.updateSetting('typo-tolerance', typoTolerance, 'PATCH');
  }

  async resetTypoTolerance(): Promise<TaskInfo> {
    return this.resetSetting('typo-tolerance');
  }

  async getFaceting(): Promise<Faceting> {
    return this.getSetting('faceting', FacetingSchema);
  }

  async updateFaceting(faceting: Faceting): Promise<TaskInfo> {
    return this.updateSetting('faceting', faceting, 'PATCH');
  }

  async resetFaceting(): Promise<TaskInfo> {
    return this.resetSetting('faceting');
  }

  async getPagination(): Promise<Pagination> {
    return this.getSetting('pagination', PaginationSchema);
  }

  async updatePagination(pagination: Pagination): Promise<TaskInfo> {
    return this.updateSetting('pagination', pagination, 'PATCH');
  }

  async resetPagination(): Promise<TaskInfo> {
    return this.resetSetting('pagination');
  }
}
