// Проверка статусов задач, поставленных в очередь внутри операции.
import type { Task, TasksResults } from '../models/index.js';
import type { TasksQuery, WaitOptions } from './tasks.js';

// Минимальный интерфейс индекса, нужный для проверки.
export interface TaskSource {
  readonly uid: string;
  getTasks(query?: Omit<TasksQuery, 'indexUids'>): Promise<TasksResults>;
  waitForTask(taskUid: number, options?: WaitOptions): Promise<Task>;
}

// Строка отчёта о неудачной задаче.
export function formatFailedTask(task: Task): string {
  const reason = task.error ? `${task.error.code}: ${task.error.message}` : 'no error details';
  return `Task ${task.uid} (${task.type}) on index '${task.indexUid ?? ''}' status='${task.status}': ${reason}`;
}

// Собирает задачи индекса с uid больше sinceUid, проходя по страницам.
async function collectTasksSince(index: TaskSource, sinceUid: number): Promise<Task[]> {
  const collected: Task[] = [];
  let from: number | undefined;

  for (;;) {
    const page = await index.getTasks(from === undefined ? {} : { from });
    let reachedOld = false;

    for (const task of page.results) {
      if (task.uid > sinceUid) {
        collected.push(task);
      } else {
        reachedOld = true;
      }
    }

    if (reachedOld || page.next === null) {
      break;
    }
    from = page.next;
  }

  return collected.sort((a, b) => a.uid - b.uid);
}

/**
 * Выполняет fn и выводит в консоль все упавшие задачи индекса,
 * которые были поставлены в очередь во время её выполнения.
 * Возвращает результат fn.
 */
export async function statusCheck<T>(
  index: TaskSource,
  fn: () => Promise<T>,
  options?: WaitOptions,
): Promise<T> {
  const before = await index.getTasks({ limit: 1 });
  const lastUid = before.results[0]?.uid ?? -1;

  const result = await fn();

  const newTasks = await collectTasksSince(index, lastUid);
  for (const task of newTasks) {
    const finished = await index.waitForTask(task.uid, options);
    if (finished.status === 'failed') {
      console.log(formatFailedTask(finished));
    }
  }

  return result;
}
