// Чтение и ожидание асинхронных задач Meilisearch.
import type { HttpRequests } from '../http/index.js';
import { MeilisearchTimeoutError } from '../errors.js';
import { TaskSchema, TasksResultsSchema } from '../models/index.js';
import type { Task, TasksResults, TaskStatus } from '../models/index.js';

// Фильтры списка задач (GET /tasks).
export interface TasksQuery {
  indexUids?: string[];
  statuses?: TaskStatus[];
  types?: string[];
  limit?: number;
  from?: number;
}

// Параметры ожидания задачи. При timeoutMs = null ждать без ограничения.
export interface WaitOptions {
  timeoutMs?: number | null;
  intervalMs?: number;
}

export const DEFAULT_WAIT_TIMEOUT_MS = 5000;
export const DEFAULT_WAIT_INTERVAL_MS = 50;

// Промис с задержкой между опросами.
function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// Задача ещё не завершена.
export function isPending(task: Task): boolean {
  return task.status === 'enqueued' || task.status === 'processing';
}

export async function getTasks(http: HttpRequests, query: TasksQuery = {}): Promise<TasksResults> {
  const response = await http.get('tasks', {
    indexUid: query.indexUids,
    status: query.statuses,
    type: query.types,
    limit: query.limit,
    from: query.from,
  });
  return TasksResultsSchema.parse(response.data);
}

export async function getTask(http: HttpRequests, taskUid: number): Promise<Task> {
  const response = await http.get(`tasks/${taskUid}`);
  return TaskSchema.parse(response.data);
}

/**
 * Опрашивает задачу, пока она не выйдет из статусов enqueued/processing.
 * По истечении timeoutMs выбрасывает MeilisearchTimeoutError.
 */
export async function waitForTask(
  http: HttpRequests,
  taskUid: number,
  options: WaitOptions = {},
): Promise<Task> {
  const timeoutMs = options.timeoutMs === undefined ? DEFAULT_WAIT_TIMEOUT_MS : options.timeoutMs;
  const intervalMs = options.intervalMs ?? DEFAULT_WAIT_INTERVAL_MS;
  const startedAt = Date.now();

  for (;;) {
    const task = await getTask(http, taskUid);
    if (!isPending(task)) {
      return task;
    }

    if (timeoutMs !== null && Date.now() - startedAt >= timeoutMs) {
      throw new MeilisearchTimeoutError(
        `Task ${taskUid} did not finish within ${timeoutMs}ms (last status: ${task.status})`,
      );
    }

    await delay(intervalMs);
  }
}
