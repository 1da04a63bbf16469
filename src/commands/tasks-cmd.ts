// Команда meili tasks — список задач.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { Client } from '../client/index.js';
import { TaskStatusSchema } from '../models/index.js';
import { errorMessage, parsePositiveInt } from './options.js';

// Параметры команды tasks.
interface TasksOptions {
  index?: string[];
  status?: string[];
  type?: string[];
  limit?: number;
  config?: string;
}

export const tasksCommand = new Command('tasks')
  .description('List tasks, newest first')
  .option('-i, --index <uid...>', 'Only tasks of these indexes')
  .option('-s, --status <status...>', 'Only tasks with these statuses')
  .option('-t, --type <type...>', 'Only tasks of these types')
  .option('-l, --limit <n>', 'Maximum number of tasks', parsePositiveInt)
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: TasksOptions) => {
    try {
      const config = await loadConfig(options.config);
      const client = Client.fromConfig(config);

      try {
        const statuses = options.status ? TaskStatusSchema.array().parse(options.status) : undefined;
        const { results } = await client.getTasks({
          indexUids: options.index,
          statuses,
          types: options.type,
          limit: options.limit,
        });

        if (results.length === 0) {
          console.log('Задачи не найдены.');
          return;
        }

        const COL_UID = 8;
        const COL_STATUS = 12;
        const COL_TYPE = 28;
        const COL_INDEX = 20;

        const header =
          'UID'.padEnd(COL_UID) + ' ' +
          'Статус'.padEnd(COL_STATUS) + ' ' +
          'Тип'.padEnd(COL_TYPE) + ' ' +
          'Индекс'.padEnd(COL_INDEX) + ' ' +
          'Длительность';

        console.log('');
        console.log(header);
        console.log('-'.repeat(header.length + 4));

        for (const task of results) {
          console.log(
            String(task.uid).padEnd(COL_UID) + ' ' +
            task.status.padEnd(COL_STATUS) + ' ' +
            task.type.padEnd(COL_TYPE) + ' ' +
            (task.indexUid ?? '—').padEnd(COL_INDEX) + ' ' +
            (task.duration ?? ''),
          );
        }
      } finally {
        client.close();
      }
    } catch (error) {
      console.error(`Ошибка: ${errorMessage(error)}`);
      process.exit(1);
    }
  });
