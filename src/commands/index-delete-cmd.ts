// Команда meili index-delete — удаление индекса.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { Client } from '../client/index.js';
import { errorMessage } from './options.js';

export const indexDeleteCommand = new Command('index-delete')
  .description('Delete an index if it exists')
  .argument('<uid>', 'Index uid')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (uid: string, options: { config?: string }) => {
    try {
      const config = await loadConfig(options.config);
      const client = Client.fromConfig(config);

      try {
        const deleted = await client.deleteIndexIfExists(uid);
        if (!deleted) {
          console.error(`Индекс "${uid}" не найден.`);
          process.exitCode = 1;
          return;
        }
        console.log(`Индекс "${uid}" удалён.`);
      } finally {
        client.close();
      }
    } catch (error) {
      console.error(`Ошибка: ${errorMessage(error)}`);
      process.exit(1);
    }
  });
