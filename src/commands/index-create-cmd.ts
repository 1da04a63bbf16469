// Команда meili index-create — создание индекса.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { Client } from '../client/index.js';
import { errorMessage } from './options.js';

export const indexCreateCommand = new Command('index-create')
  .description('Create an index and wait until it exists')
  .argument('<uid>', 'Index uid')
  .option('-p, --primary-key <field>', 'Primary key of the documents')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (uid: string, options: { primaryKey?: string; config?: string }) => {
    try {
      const config = await loadConfig(options.config);
      const client = Client.fromConfig(config);

      try {
        const index = await client.createIndex(uid, options.primaryKey);
        console.log(`Индекс "${index.uid}" создан (первичный ключ: ${index.primaryKey ?? 'не задан'}).`);
      } finally {
        client.close();
      }
    } catch (error) {
      console.error(`Ошибка: ${errorMessage(error)}`);
      process.exit(1);
    }
  });
