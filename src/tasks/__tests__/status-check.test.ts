import { describe, it, expect, vi, afterEach } from 'vitest';
import { statusCheck, formatFailedTask } from '../status-check.js';
import type { TaskSource } from '../status-check.js';
import { TaskSchema } from '../../models/index.js';
import type { Task, TasksResults } from '../../models/index.js';
import { taskBody } from '../../__tests__/fetch-mock.js';

const failedError = {
  message: 'Document identifier is invalid.',
  code: 'invalid_document_id',
  type: 'invalid_request',
  link: 'https://docs.meilisearch.com/errors#invalid_document_id',
};

function task(uid: number, status: string, extra: Record<string, unknown> = {}): Task {
  return TaskSchema.parse(taskBody(uid, status, extra));
}

function page(results: Task[], next: number | null): TasksResults {
  return { results, limit: 20, from: results[0]?.uid ?? null, next };
}

// Индекс-заглушка: очередь ответов getTasks и итоговые статусы задач.
function fakeIndex(pages: TasksResults[], finished: Map<number, Task>): TaskSource {
  const getTasks = vi.fn();
  for (const p of pages) {
    getTasks.mockResolvedValueOnce(p);
  }
  return {
    uid: 'movies',
    getTasks,
    waitForTask: vi.fn(async (uid: number) => {
      const result = finished.get(uid);
      if (!result) {
        throw new Error(`unexpected task ${uid}`);
      }
      return result;
    }),
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('formatFailedTask', () => {
  it('включает uid, тип, индекс, статус и ошибку', () => {
    expect(formatFailedTask(task(12, 'failed', { error: failedError }))).toBe(
      "Task 12 (documentAdditionOrUpdate) on index 'movies' status='failed': "
        + 'invalid_document_id: Document identifier is invalid.',
    );
  });

  it('без ошибки пишет no error details', () => {
    expect(formatFailedTask(task(13, 'failed'))).toBe(
      "Task 13 (documentAdditionOrUpdate) on index 'movies' status='failed': no error details",
    );
  });
});

describe('statusCheck', () => {
  it('выводит упавшие задачи, поставленные во время операции', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const index = fakeIndex(
      [
        page([task(10, 'succeeded')], 9),
        page([task(12, 'enqueued'), task(11, 'enqueued'), task(10, 'succeeded')], 9),
      ],
      new Map([
        [11, task(11, 'succeeded')],
        [12, task(12, 'failed', { error: failedError })],
      ]),
    );

    const result = await statusCheck(index, async () => 'done');

    expect(result).toBe('done');
    expect(index.waitForTask).toHaveBeenCalledTimes(2);
    expect(log).toHaveBeenCalledOnce();
    expect(log).toHaveBeenCalledWith(
      "Task 12 (documentAdditionOrUpdate) on index 'movies' status='failed': "
        + 'invalid_document_id: Document identifier is invalid.',
    );
  });

  it('проходит по страницам, пока не встретит старую задачу', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const index = fakeIndex(
      [
        page([task(3, 'succeeded')], 2),
        page([task(6, 'enqueued'), task(5, 'enqueued')], 4),
        page([task(4, 'enqueued'), task(3, 'succeeded')], 2),
      ],
      new Map([
        [4, task(4, 'succeeded')],
        [5, task(5, 'succeeded')],
        [6, task(6, 'succeeded')],
      ]),
    );

    await statusCheck(index, async () => undefined);

    expect(index.getTasks).toHaveBeenNthCalledWith(1, { limit: 1 });
    expect(index.getTasks).toHaveBeenNthCalledWith(2, {});
    expect(index.getTasks).toHaveBeenNthCalledWith(3, { from: 4 });
    expect(vi.mocked(index.waitForTask).mock.calls.map((c) => c[0])).toEqual([4, 5, 6]);
  });

  it('для индекса без задач проверяет все новые задачи', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const index = fakeIndex(
      [page([], null), page([task(0, 'enqueued')], null)],
      new Map([[0, task(0, 'succeeded')]]),
    );

    await statusCheck(index, async () => undefined);

    expect(index.waitForTask).toHaveBeenCalledWith(0, undefined);
    expect(log).not.toHaveBeenCalled();
  });
});
