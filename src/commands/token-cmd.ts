// Команда meili token — генерация tenant-токена.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { Client } from '../client/index.js';
import type { SearchRules } from '../client/index.js';
import { errorMessage, parsePositiveInt } from './options.js';

// Параметры команды token.
interface TokenOptions {
  index?: string[];
  filter?: string;
  expiresIn?: number;
  key?: string;
  config?: string;
}

// Без индексов токен разрешает всё, что разрешает ключ. Фильтр применяется к каждому индексу.
function buildSearchRules(indexes: string[] | undefined, filter: string | undefined): SearchRules {
  if (!indexes || indexes.length === 0) {
    return filter ? { '*': { filter } } : ['*'];
  }
  if (!filter) {
    return indexes;
  }
  return Object.fromEntries(indexes.map((uid) => [uid, { filter }]));
}

export const tokenCommand = new Command('token')
  .description('Generate a tenant token for searching')
  .option('-i, --index <uid...>', 'Restrict the token to these indexes')
  .option('-f, --filter <expression>', 'Filter applied to every search')
  .option('-e, --expires-in <seconds>', 'Token lifetime in seconds', parsePositiveInt)
  .option('-k, --key <uid>', 'Search API key to sign with (default: Default Search API Key)')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: TokenOptions) => {
    try {
      const config = await loadConfig(options.config);
      const client = Client.fromConfig(config);

      try {
        const key = options.key ? await client.getKey(options.key) : undefined;
        const expiresAt = options.expiresIn === undefined
          ? undefined
          : new Date(Date.now() + options.expiresIn * 1000);

        const token = await client.generateTenantToken(
          {
            searchRules: buildSearchRules(options.index, options.filter),
            indexes: options.index,
            expiresAt,
          },
          key,
        );

        console.log(token);
      } finally {
        client.close();
      }
    } catch (error) {
      console.error(`Ошибка: ${errorMessage(error)}`);
      process.exit(1);
    }
  });
