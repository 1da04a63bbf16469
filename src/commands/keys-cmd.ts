// Команда meili keys — список API-ключей.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { Client } from '../client/index.js';
import { errorMessage } from './options.js';

export const keysCommand = new Command('keys')
  .description('List API keys')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: { config?: string }) => {
    try {
      const config = await loadConfig(options.config);
      const client = Client.fromConfig(config);

      try {
        const { results, total } = await client.getKeys();

        if (results.length === 0) {
          console.log('Ключи не найдены.');
          return;
        }

        for (const key of results) {
          console.log('');
          console.log(`${key.name ?? key.uid}`);
          console.log(`  uid:      ${key.uid}`);
          console.log(`  описание: ${key.description ?? '—'}`);
          console.log(`  действия: ${key.actions.join(', ')}`);
          console.log(`  индексы:  ${key.indexes.join(', ')}`);
          console.log(`  истекает: ${key.expiresAt ? new Date(key.expiresAt).toLocaleString('ru-RU') : 'никогда'}`);
        }

        console.log('');
        console.log(`Итого: ${total} ключей`);
      } finally {
        client.close();
      }
    } catch (error) {
      console.error(`Ошибка: ${errorMessage(error)}`);
      process.exit(1);
    }
  });
