// Команда meili search — поиск по индексу.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { Client } from '../client/index.js';
import type { SearchParams } from '../models/index.js';
import { errorMessage, parseNonNegativeInt, parsePositiveInt } from './options.js';

// Параметры команды search.
interface SearchOptions {
  limit?: number;
  offset?: number;
  filter?: string;
  sort?: string[];
  attributes?: string[];
  config?: string;
}

export const searchCommand = new Command('search')
  .description('Search an index and print hits as JSON')
  .argument('<uid>', 'Index uid')
  .argument('[query]', 'Search query')
  .option('-l, --limit <n>', 'Maximum number of hits', parsePositiveInt)
  .option('--offset <n>', 'Number of hits to skip', parseNonNegativeInt)
  .option('-f, --filter <expression>', 'Filter expression')
  .option('-s, --sort <rule...>', 'Sort rules (e.g. year:desc)')
  .option('-a, --attributes <name...>', 'Attributes to retrieve')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (uid: string, query: string | undefined, options: SearchOptions) => {
    try {
      const config = await loadConfig(options.config);
      const client = Client.fromConfig(config);

      try {
        const params: SearchParams = {
          limit: options.limit,
          offset: options.offset,
          filter: options.filter,
          sort: options.sort,
          attributesToRetrieve: options.attributes,
        };
        const results = await client.index(uid).search(query, params);

        console.log(JSON.stringify(results.hits, null, 2));
        const total = results.estimatedTotalHits ?? results.totalHits ?? results.hits.length;
        console.error(`Найдено: ~${total}, показано: ${results.hits.length} (${results.processingTimeMs} мс)`);
      } finally {
        client.close();
      }
    } catch (error) {
      console.error(`Ошибка: ${errorMessage(error)}`);
      process.exit(1);
    }
  });
