#!/usr/bin/env node

// Точка входа CLI для работы с сервером Meilisearch.
import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { statusCommand } from './commands/status-cmd.js';
import { indexesCommand } from './commands/indexes-cmd.js';
import { indexCreateCommand } from './commands/index-create-cmd.js';
import { indexDeleteCommand } from './commands/index-delete-cmd.js';
import { documentsAddCommand } from './commands/documents-add-cmd.js';
import { searchCommand } from './commands/search-cmd.js';
import { tasksCommand } from './commands/tasks-cmd.js';
import { taskWaitCommand } from './commands/task-wait-cmd.js';
import { keysCommand } from './commands/keys-cmd.js';
import { tokenCommand } from './commands/token-cmd.js';
import { dumpCommand } from './commands/dump-cmd.js';

const program = new Command()
  .name('meili')
  .description('Meilisearch client: indexes, documents, search and tasks')
  .version('0.1.0');

program.addCommand(initCommand);
program.addCommand(statusCommand);
program.addCommand(indexesCommand);
program.addCommand(indexCreateCommand);
program.addCommand(indexDeleteCommand);
program.addCommand(documentsAddCommand);
program.addCommand(searchCommand);
program.addCommand(tasksCommand);
program.addCommand(taskWaitCommand);
program.addCommand(keysCommand);
program.addCommand(tokenCommand);
program.addCommand(dumpCommand);

program.parse();
