// Клиент Meilisearch: индексы, ключи, задачи, статистика.
import { HttpRequests } from '../http/index.js';
import type { RetryOptions } from '../http/index.js';
import { MeilisearchApiError } from '../errors.js';
import type { BatchesConfig, ClientConfig } from '../config/index.js';
import { Index } from '../indexes/index.js';
import type { IndexDefaults } from '../indexes/index.js';
import {
  ClientStatsSchema,
  HealthSchema,
  IndexInfoSchema,
  IndexesResultsSchema,
  KeySchema,
  KeysResultsSchema,
  TaskInfoSchema,
  VersionSchema,
} from '../models/index.js';
import type {
  ClientStats,
  Health,
  IndexInfo,
  Key,
  KeyCreate,
  KeysResults,
  KeyUpdate,
  Task,
  TaskInfo,
  TasksResults,
  Version,
} from '../models/index.js';
import { getTask, getTasks, waitForTask } from '../tasks/index.js';
import type { TasksQuery, WaitOptions } from '../tasks/index.js';
import { findDefaultSearchKey, signTenantToken } from './tenant-token.js';
import type { TenantTokenPayload } from './tenant-token.js';

// Дополнительные параметры клиента.
export interface ClientOptions {
  timeoutMs?: number;
  retry?: Partial<RetryOptions>;
  tasks?: WaitOptions;
  batches?: Partial<BatchesConfig>;
}

// Пагинация списков индексов и ключей.
export interface PageQuery {
  offset?: number;
  limit?: number;
}

function isIndexNotFound(error: unknown): boolean {
  return error instanceof MeilisearchApiError && error.code === 'index_not_found';
}

function isNotFound(error: unknown): boolean {
  return error instanceof MeilisearchApiError && error.status === 404;
}

/**
 * Асинхронный клиент Meilisearch.
 *
 * @example
 * ```typescript
 * const client = new Client('http://localhost:7700', 'masterKey');
 * const index = await client.getOrCreateIndex('movies', 'id');
 * await index.addDocuments([{ id: 1, title: 'Alpha' }]);
 * client.close();
 * ```
 */
export class Client {
  readonly http: HttpRequests;
  private readonly indexDefaults: IndexDefaults;

  constructor(url: string, apiKey?: string, options: ClientOptions = {}) {
    this.http = new HttpRequests({
      url,
      apiKey,
      timeoutMs: options.timeoutMs,
      retry: options.retry,
    });
    this.indexDefaults = {
      wait: options.tasks ?? {},
      batchSize: options.batches?.batchSize ?? 1000,
      maxPayloadSize: options.batches?.maxPayloadSize ?? 104_857_600,
    };
  }

  // Клиент из загруженного конфига.
  static fromConfig(config: ClientConfig): Client {
    return new Client(config.url, config.apiKey, {
      timeoutMs: config.timeoutMs,
      retry: config.retry,
      tasks: config.tasks,
      batches: config.batches,
    });
  }

  // Прерывает запросы в полёте; клиент после этого непригоден.
  close(): void {
    this.http.close();
  }

  // --- Индексы ---

  // Локальный объект индекса без обращения к серверу.
  index(uid: string): Index {
    return new Index(this.http, uid, undefined, this.indexDefaults);
  }

  async createIndex(uid: string, primaryKey?: string): Promise<Index> {
    return Index.create(this.http, uid, primaryKey, this.indexDefaults);
  }

  async deleteIndexIfExists(uid: string): Promise<boolean> {
    return this.index(uid).deleteIfExists();
  }

  async getIndex(uid: string): Promise<Index> {
    return this.index(uid).fetchInfo();
  }

  // null на любой 404.
  async getRawIndex(uid: string): Promise<IndexInfo | null> {
    try {
      const response = await this.http.get(`indexes/${uid}`);
      return IndexInfoSchema.parse(response.data);
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  // null, если индексов нет.
  async getRawIndexes(query: PageQuery = {}): Promise<IndexInfo[] | null> {
    const response = await this.http.get('indexes', { offset: query.offset, limit: query.limit });
    const { results } = IndexesResultsSchema.parse(response.data);
    return results.length > 0 ? results : null;
  }

  async getIndexes(query: PageQuery = {}): Promise<Index[] | null> {
    const infos = await this.getRawIndexes(query);
    if (!infos) {
      return null;
    }
    return infos.map((info) => new Index(this.http, info.uid, info, this.indexDefaults));
  }

  // Возвращает индекс, создавая его при отсутствии.
  async getOrCreateIndex(uid: string, primaryKey?: string): Promise<Index> {
    try {
      return await this.getIndex(uid);
    } catch (error) {
      if (isIndexNotFound(error)) {
        return this.createIndex(uid, primaryKey);
      }
      throw error;
    }
  }

  // --- Инстанс ---

  async createDump(): Promise<TaskInfo> {
    const response = await this.http.post('dumps');
    return TaskInfoSchema.parse(response.data);
  }

  async getAllStats(): Promise<ClientStats> {
    const response = await this.http.get('stats');
    return ClientStatsSchema.parse(response.data);
  }

  async getVersion(): Promise<Version> {
    const response = await this.http.get('version');
    return VersionSchema.parse(response.data);
  }

  async health(): Promise<Health> {
    const response = await this.http.get('health');
    return HealthSchema.parse(response.data);
  }

  // true, если сервер отвечает status: available.
  async isHealthy(): Promise<boolean> {
    try {
      const { status } = await this.health();
      return status === 'available';
    } catch {
      return false;
    }
  }

  // --- Ключи ---

  async createKey(key: KeyCreate): Promise<Key> {
    const response = await this.http.post('keys', {
      ...key,
      expiresAt: key.expiresAt ?? null,
    });
    return KeySchema.parse(response.data);
  }

  async getKeys(query: PageQuery = {}): Promise<KeysResults> {
    const response = await this.http.get('keys', { offset: query.offset, limit: query.limit });
    return KeysResultsSchema.parse(response.data);
  }

  async getKey(key: string): Promise<Key> {
    const response = await this.http.get(`keys/${key}`);
    return KeySchema.parse(response.data);
  }

  // Меняются только name и description.
  async updateKey(update: KeyUpdate): Promise<Key> {
    const { key, ...fields } = update;
    const response = await this.http.patch(`keys/${key}`, fields);
    return KeySchema.parse(response.data);
  }

  // Возвращает HTTP-статус (204 при успехе).
  async deleteKey(key: string): Promise<number> {
    const response = await this.http.delete(`keys/${key}`);
    return response.status;
  }

  /**
   * Подписывает tenant-токен. Без key используется ключ
   * "Default Search API Key", найденный среди ключей инстанса.
   */
  async generateTenantToken(payload: TenantTokenPayload, key?: Key): Promise<string> {
    const signingKey = key ?? findDefaultSearchKey((await this.getKeys()).results);
    return signTenantToken(payload, signingKey);
  }

  // --- Задачи ---

  async getTasks(query?: TasksQuery): Promise<TasksResults> {
    return getTasks(this.http, query);
  }

  async getTask(taskUid: number): Promise<Task> {
    return getTask(this.http, taskUid);
  }

  async waitForTask(taskUid: number, options?: WaitOptions): Promise<Task> {
    return waitForTask(this.http, taskUid, { ...this.indexDefaults.wait, ...options });
  }
}
