// Команда meili init — создание файла конфигурации.
import { Command } from 'commander';
import { access, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { stringify as stringifyYaml } from 'yaml';
import { defaultConfig } from '../config/index.js';
import { errorMessage } from './options.js';

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export const initCommand = new Command('init')
  .description('Write a config file with default settings')
  .option('-o, --output <path>', 'Config file path', 'meili.config.yaml')
  .option('-f, --force', 'Overwrite an existing file')
  .action(async (options: { output: string; force?: boolean }) => {
    try {
      const path = resolve(options.output);

      if (!options.force && (await exists(path))) {
        console.error(`Файл ${path} уже существует. Используйте --force для перезаписи.`);
        process.exit(1);
      }

      const content = stringifyYaml(defaultConfig);
      await writeFile(path, content, 'utf-8');
      console.log(`Конфигурация записана: ${path}`);
    } catch (error) {
      console.error(`Ошибка инициализации: ${errorMessage(error)}`);
      process.exit(1);
    }
  });
