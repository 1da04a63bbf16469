// Команда meili dump — создание дампа.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { Client } from '../client/index.js';
import { formatFailedTask } from '../tasks/index.js';
import { errorMessage } from './options.js';

export const dumpCommand = new Command('dump')
  .description('Create a database dump')
  .option('-w, --wait', 'Wait until the dump is written')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: { wait?: boolean; config?: string }) => {
    try {
      const config = await loadConfig(options.config);
      const client = Client.fromConfig(config);

      try {
        const taskInfo = await client.createDump();
        console.log(`Дамп поставлен в очередь (задача ${taskInfo.taskUid}).`);

        if (options.wait) {
          // Дамп пишется дольше обычных задач.
          const task = await client.waitForTask(taskInfo.taskUid, { timeoutMs: null });
          if (task.status === 'failed') {
            console.error(formatFailedTask(task));
            process.exitCode = 1;
            return;
          }
          console.log(`Дамп готов: ${String(task.details?.['dumpUid'] ?? '')}`);
        }
      } finally {
        client.close();
      }
    } catch (error) {
      console.error(`Ошибка: ${errorMessage(error)}`);
      process.exit(1);
    }
  });
