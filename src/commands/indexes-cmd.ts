// Команда meili indexes — список индексов.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { Client } from '../client/index.js';
import { errorMessage, parsePositiveInt } from './options.js';

export const indexesCommand = new Command('indexes')
  .description('List indexes')
  .option('--limit <n>', 'Maximum number of indexes', parsePositiveInt)
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: { limit?: number; config?: string }) => {
    try {
      const config = await loadConfig(options.config);
      const client = Client.fromConfig(config);

      try {
        const indexes = await client.getRawIndexes({ limit: options.limit });

        if (!indexes) {
          console.log('Индексы не найдены.');
          return;
        }

        const COL_UID = 30;
        const COL_KEY = 20;

        const header = 'UID'.padEnd(COL_UID) + ' ' + 'Первичный ключ'.padEnd(COL_KEY) + ' ' + 'Обновлён';

        console.log('');
        console.log(header);
        console.log('-'.repeat(header.length + 10));

        for (const info of indexes) {
          const uid = info.uid.slice(0, COL_UID - 1).padEnd(COL_UID);
          const primaryKey = (info.primaryKey ?? '—').padEnd(COL_KEY);
          const updated = new Date(info.updatedAt).toLocaleString('ru-RU');
          console.log(`${uid} ${primaryKey} ${updated}`);
        }

        console.log('');
        console.log(`Итого: ${indexes.length} индексов`);
      } finally {
        client.close();
      }
    } catch (error) {
      console.error(`Ошибка: ${errorMessage(error)}`);
      process.exit(1);
    }
  });
