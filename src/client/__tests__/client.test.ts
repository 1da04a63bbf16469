import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import jwt from 'jsonwebtoken';
import { Client } from '../client.js';
import { ClientConfigSchema } from '../../config/index.js';
import { MeilisearchApiError } from '../../errors.js';
import {
  apiErrorResponse,
  emptyResponse,
  enqueuedTask,
  indexBody,
  jsonResponse,
  recordedRequest,
  requestJson,
  taskBody,
} from '../../__tests__/fetch-mock.js';

const BASE_URL = 'http://localhost:7700';

function keyBody(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    uid: 'search-uid',
    key: 'test-secret',
    name: 'Default Search API Key',
    description: 'Default Search API Key (Use it to search from the frontend)',
    actions: ['search'],
    indexes: ['*'],
    expiresAt: null,
    createdAt: '2026-01-10T10:00:00.000Z',
    updatedAt: '2026-01-10T10:00:00.000Z',
    ...overrides,
  };
}

describe('Client', () => {
  let fetchMock: Mock;
  let client: Client;

  beforeEach(() => {
    fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    client = new Client(BASE_URL, 'test-key');
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  describe('fromConfig', () => {
    it('берёт url и apiKey из конфига', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ status: 'available' }));

      const fromConfig = Client.fromConfig(
        ClientConfigSchema.parse({ url: 'http://search.local:7700', apiKey: 'config-key' }),
      );
      await fromConfig.health();

      const request = recordedRequest(fetchMock);
      expect(request.url).toBe('http://search.local:7700/health');
      expect(request.headers['Authorization']).toBe('Bearer config-key');
    });
  });

  describe('индексы', () => {
    it('index() не обращается к серверу', () => {
      const index = client.index('movies');

      expect(index.uid).toBe('movies');
      expect(index.primaryKey).toBeNull();
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('getIndexes возвращает объекты Index', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({
        results: [indexBody('movies', 'id'), indexBody('books', 'isbn')],
        offset: 0,
        limit: 20,
        total: 2,
      }));

      const indexes = await client.getIndexes({ limit: 20 });

      expect(indexes?.map((i) => [i.uid, i.primaryKey])).toEqual([
        ['movies', 'id'],
        ['books', 'isbn'],
      ]);
      expect(recordedRequest(fetchMock).url).toBe(`${BASE_URL}/indexes?limit=20`);
    });

    it('getIndexes и getRawIndexes возвращают null без индексов', async () => {
      fetchMock.mockImplementation(async () => jsonResponse({ results: [], offset: 0, limit: 20, total: 0 }));

      expect(await client.getIndexes()).toBeNull();
      expect(await client.getRawIndexes()).toBeNull();
    });

    it('getRawIndex возвращает null для несуществующего индекса', async () => {
      fetchMock.mockResolvedValueOnce(
        apiErrorResponse(404, 'index_not_found', 'Index `missing` not found.'),
      );

      expect(await client.getRawIndex('missing')).toBeNull();
    });

    it('getRawIndex возвращает null для 404 с не-JSON телом', async () => {
      fetchMock.mockResolvedValueOnce(new Response('Not Found', { status: 404, statusText: 'Not Found' }));

      expect(await client.getRawIndex('missing')).toBeNull();
    });

    it('getRawIndex возвращает описание индекса', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(indexBody('movies')));

      expect(await client.getRawIndex('movies')).toEqual({
        uid: 'movies',
        primaryKey: 'id',
        createdAt: '2026-01-10T10:00:00.000Z',
        updatedAt: '2026-01-10T10:00:01.000Z',
      });
    });

    it('getOrCreateIndex создаёт индекс, если его нет', async () => {
      fetchMock
        .mockResolvedValueOnce(apiErrorResponse(404, 'index_not_found', 'Index `movies` not found.'))
        .mockResolvedValueOnce(enqueuedTask(1, 'indexCreation'))
        .mockResolvedValueOnce(jsonResponse(taskBody(1, 'succeeded', { type: 'indexCreation' })))
        .mockResolvedValueOnce(jsonResponse(indexBody('movies', 'id')));

      const index = await client.getOrCreateIndex('movies', 'id');

      expect(index.primaryKey).toBe('id');
      expect(recordedRequest(fetchMock, 1).method).toBe('POST');
      expect(requestJson(fetchMock, 1)).toEqual({ uid: 'movies', primaryKey: 'id' });
    });

    it('getOrCreateIndex пробрасывает прочие ошибки', async () => {
      fetchMock.mockResolvedValueOnce(
        apiErrorResponse(401, 'missing_authorization_header', 'The Authorization header is missing.'),
      );

      const error = await client.getOrCreateIndex('movies').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(MeilisearchApiError);
      expect((error as MeilisearchApiError).code).toBe('missing_authorization_header');
      expect(fetchMock).toHaveBeenCalledOnce();
    });

    it('deleteIndexIfExists возвращает false для несуществующего индекса', async () => {
      fetchMock.mockResolvedValueOnce(
        apiErrorResponse(404, 'index_not_found', 'Index `movies` not found.'),
      );

      expect(await client.deleteIndexIfExists('movies')).toBe(false);
    });
  });

  describe('инстанс', () => {
    it('createDump ставит задачу дампа', async () => {
      fetchMock.mockResolvedValueOnce(enqueuedTask(9, 'dumpCreation', null));

      const taskInfo = await client.createDump();

      expect(taskInfo).toEqual({
        taskUid: 9,
        indexUid: null,
        status: 'enqueued',
        type: 'dumpCreation',
        enqueuedAt: '2026-01-10T10:00:00.000Z',
      });
      expect(recordedRequest(fetchMock).url).toBe(`${BASE_URL}/dumps`);
    });

    it('getAllStats разбирает статистику по индексам', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({
        databaseSize: 4096,
        lastUpdate: '2026-01-10T10:00:00.000Z',
        indexes: {
          movies: { numberOfDocuments: 3, isIndexing: false, fieldDistribution: { id: 3 } },
        },
      }));

      const stats = await client.getAllStats();

      expect(stats.databaseSize).toBe(4096);
      expect(stats.indexes['movies']?.numberOfDocuments).toBe(3);
    });

    it('getVersion разбирает версию', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({
        commitSha: 'abc123',
        commitDate: '2026-01-01T00:00:00Z',
        pkgVersion: '1.6.0',
      }));

      expect((await client.getVersion()).pkgVersion).toBe('1.6.0');
    });

    it('isHealthy: true для available', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ status: 'available' }));

      expect(await client.isHealthy()).toBe(true);
    });

    it('isHealthy: false при сетевой ошибке', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

      expect(await client.isHealthy()).toBe(false);
    });

    it('после close() запросы завершаются ошибкой', async () => {
      client.close();

      await expect(client.health()).rejects.toThrow('Client is closed');
    });
  });

  describe('ключи', () => {
    it('createKey сериализует expiresAt в ISO-строку', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(keyBody({ uid: 'new-key' }), 201));

      const key = await client.createKey({
        description: 'Search movies',
        actions: ['search'],
        indexes: ['movies'],
        expiresAt: new Date('2030-01-01T00:00:00.000Z'),
      });

      expect(key.uid).toBe('new-key');
      expect(requestJson(fetchMock)).toEqual({
        description: 'Search movies',
        actions: ['search'],
        indexes: ['movies'],
        expiresAt: '2030-01-01T00:00:00.000Z',
      });
    });

    it('createKey без expiresAt отправляет null', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(keyBody(), 201));

      await client.createKey({ actions: ['search'], indexes: ['*'] });

      expect(requestJson(fetchMock)).toEqual({ actions: ['search'], indexes: ['*'], expiresAt: null });
    });

    it('getKeys передаёт пагинацию', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ results: [keyBody()], offset: 10, limit: 5, total: 11 }));

      const keys = await client.getKeys({ offset: 10, limit: 5 });

      expect(keys.total).toBe(11);
      expect(recordedRequest(fetchMock).url).toBe(`${BASE_URL}/keys?offset=10&limit=5`);
    });

    it('updateKey отправляет PATCH без поля key', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(keyBody({ name: 'Renamed' })));

      const key = await client.updateKey({ key: 'search-uid', name: 'Renamed' });

      expect(key.name).toBe('Renamed');
      const request = recordedRequest(fetchMock);
      expect(request.method).toBe('PATCH');
      expect(request.url).toBe(`${BASE_URL}/keys/search-uid`);
      expect(request.body).toBe('{"name":"Renamed"}');
    });

    it('deleteKey возвращает HTTP-статус', async () => {
      fetchMock.mockResolvedValueOnce(emptyResponse(204));

      expect(await client.deleteKey('search-uid')).toBe(204);
    });
  });

  describe('generateTenantToken', () => {
    it('без ключа использует Default Search API Key', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({
        results: [
          keyBody({ uid: 'admin-uid', key: 'admin-secret', description: 'Default Admin API Key', actions: ['*'] }),
          keyBody(),
        ],
        offset: 0,
        limit: 20,
        total: 2,
      }));

      const token = await client.generateTenantToken({ searchRules: ['*'] });

      expect(jwt.verify(token, 'test-secret')).toMatchObject({
        searchRules: ['*'],
        apiKeyUid: 'search-uid',
      });
    });

    it('с переданным ключом не обращается к серверу', async () => {
      const key = {
        uid: 'own-uid',
        key: 'own-secret',
        name: null,
        description: null,
        actions: ['search'],
        indexes: ['movies'],
        expiresAt: null,
        createdAt: '2026-01-10T10:00:00.000Z',
        updatedAt: '2026-01-10T10:00:00.000Z',
      };

      const token = await client.generateTenantToken({ searchRules: ['movies'], indexes: ['movies'] }, key);

      expect(jwt.verify(token, 'own-secret')).toMatchObject({ apiKeyUid: 'own-uid' });
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('задачи', () => {
    it('waitForTask использует настройки ожидания клиента', async () => {
      vi.useFakeTimers();
      try {
        fetchMock.mockImplementation(async () => jsonResponse(taskBody(3, 'enqueued')));
        const slowClient = new Client(BASE_URL, undefined, { tasks: { timeoutMs: 200, intervalMs: 100 } });

        const promise = slowClient.waitForTask(3).catch((err: unknown) => err);
        await vi.advanceTimersByTimeAsync(200);

        expect(await promise).toBeInstanceOf(Error);
        // Опросы на 0, 100 и 200 мс.
        expect(fetchMock).toHaveBeenCalledTimes(3);
      } finally {
        vi.useRealTimers();
      }
    });

    it('getTasks передаёт фильтры', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ results: [], limit: 20, from: null, next: null }));

      await client.getTasks({ statuses: ['failed'] });

      expect(recordedRequest(fetchMock).url).toBe(`${BASE_URL}/tasks?status=failed`);
    });
  });
});
