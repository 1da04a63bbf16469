// Команда meili task-wait — ожидание завершения задачи.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { Client } from '../client/index.js';
import { formatFailedTask } from '../tasks/index.js';
import { errorMessage, parseNonNegativeInt, parsePositiveInt } from './options.js';

export const taskWaitCommand = new Command('task-wait')
  .description('Wait until a task finishes')
  .argument('<taskUid>', 'Task uid', parseNonNegativeInt)
  .option('-t, --timeout <ms>', 'Give up after this many milliseconds', parsePositiveInt)
  .option('-c, --config <path>', 'Path to config file')
  .action(async (taskUid: number, options: { timeout?: number; config?: string }) => {
    try {
      const config = await loadConfig(options.config);
      const client = Client.fromConfig(config);

      try {
        const task = await client.waitForTask(
          taskUid,
          options.timeout === undefined ? undefined : { timeoutMs: options.timeout },
        );

        if (task.status === 'failed') {
          console.error(formatFailedTask(task));
          process.exitCode = 1;
          return;
        }
        console.log(`Задача ${task.uid} (${task.type}): ${task.status}, ${task.duration ?? '—'}`);
      } finally {
        client.close();
      }
    } catch (error) {
      console.error(`Ошибка: ${errorMessage(error)}`);
      process.exit(1);
    }
  });
