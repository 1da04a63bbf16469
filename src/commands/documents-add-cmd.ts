// Команда meili documents-add — загрузка документов из файла или директории.
import { Command, Option } from 'commander';
import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { loadConfig } from '../config/index.js';
import { Client } from '../client/index.js';
import type { Index } from '../indexes/index.js';
import type { DocumentType, TaskInfo } from '../models/index.js';
import { statusCheck } from '../tasks/index.js';
import { errorMessage, parsePositiveInt } from './options.js';

// Параметры команды documents-add.
interface DocumentsAddOptions {
  primaryKey?: string;
  batchSize?: number;
  type: DocumentType;
  separate?: boolean;
  wait?: boolean;
  config?: string;
}

// Отправляет документы из файла или директории, выбирая подходящий метод индекса.
async function sendDocuments(index: Index, path: string, options: DocumentsAddOptions): Promise<TaskInfo[]> {
  const { primaryKey, batchSize } = options;
  const info = await stat(path);

  if (info.isDirectory()) {
    const dirOptions = {
      primaryKey,
      documentType: options.type,
      combineDocuments: !options.separate,
    };
    return batchSize === undefined
      ? index.addDocumentsFromDirectory(path, dirOptions)
      : index.addDocumentsFromDirectoryInBatches(path, { ...dirOptions, batchSize });
  }

  return batchSize === undefined
    ? [await index.addDocumentsFromFile(path, primaryKey)]
    : index.addDocumentsFromFileInBatches(path, { batchSize, primaryKey });
}

export const documentsAddCommand = new Command('documents-add')
  .description('Add documents to an index from a .json, .csv or .ndjson file or directory')
  .argument('<uid>', 'Index uid')
  .argument('<path>', 'Documents file or directory')
  .option('-p, --primary-key <field>', 'Primary key of the documents')
  .option('-b, --batch-size <n>', 'Send documents in batches of n', parsePositiveInt)
  .addOption(
    new Option('-t, --type <type>', 'File type to read from a directory')
      .choices(['json', 'csv', 'ndjson'])
      .default('json'),
  )
  .option('--separate', 'One request per file when reading a directory')
  .option('-w, --wait', 'Wait for the tasks and report failures')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (uid: string, path: string, options: DocumentsAddOptions) => {
    try {
      const config = await loadConfig(options.config);
      const client = Client.fromConfig(config);

      try {
        const index = client.index(uid);
        const absolutePath = resolve(path);

        console.log(`Загрузка документов в "${uid}": ${absolutePath}`);

        const tasks = options.wait
          ? await statusCheck(index, () => sendDocuments(index, absolutePath, options), config.tasks)
          : await sendDocuments(index, absolutePath, options);

        console.log(`Задач поставлено: ${tasks.length} (uid: ${tasks.map((t) => t.taskUid).join(', ')})`);
        if (options.wait) {
          console.log('Все задачи завершены.');
        }
      } finally {
        client.close();
      }
    } catch (error) {
      console.error(`Ошибка: ${errorMessage(error)}`);
      process.exit(1);
    }
  });
