// Команда meili status — состояние сервера.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { Client } from '../client/index.js';
import { errorMessage } from './options.js';

// Размер в человекочитаемом виде.
function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export const statusCommand = new Command('status')
  .description('Show server health, version and stats')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: { config?: string }) => {
    try {
      const config = await loadConfig(options.config);
      const client = Client.fromConfig(config);

      try {
        const healthy = await client.isHealthy();

        console.log('');
        console.log('=== Статус Meilisearch ===');
        console.log('');
        console.log(`Адрес:     ${config.url}`);
        console.log(`Состояние: ${healthy ? 'доступен' : 'недоступен'}`);

        if (!healthy) {
          process.exitCode = 1;
          return;
        }

        const version = await client.getVersion();
        const stats = await client.getAllStats();

        console.log(`Версия:    ${version.pkgVersion}`);
        console.log(`Размер БД: ${formatBytes(stats.databaseSize)}`);
        console.log(
          `Последнее обновление: ${stats.lastUpdate ? new Date(stats.lastUpdate).toLocaleString('ru-RU') : 'нет'}`,
        );
        console.log('');

        const entries = Object.entries(stats.indexes);
        if (entries.length === 0) {
          console.log('Индексов нет.');
          return;
        }
        for (const [uid, indexStats] of entries) {
          const indexing = indexStats.isIndexing ? ' (индексируется)' : '';
          console.log(`  ${uid}: ${indexStats.numberOfDocuments} документов${indexing}`);
        }
      } finally {
        client.close();
      }
    } catch (error) {
      console.error(`Ошибка: ${errorMessage(error)}`);
      process.exit(1);
    }
  });
