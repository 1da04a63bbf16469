// Barrel-файл модуля задач.
export type { TasksQuery, WaitOptions } from './tasks.js';
export {
  getTasks,
  getTask,
  waitForTask,
  isPending,
  DEFAULT_WAIT_TIMEOUT_MS,
  DEFAULT_WAIT_INTERVAL_MS,
} from './tasks.js';

export type { TaskSource } from './status-check.js';
export { statusCheck, formatFailedTask } from './status-check.js';
