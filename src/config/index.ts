// Barrel-файл модуля конфигурации.
export {
  ClientConfigSchema,
  RetryConfigSchema,
  TasksConfigSchema,
  BatchesConfigSchema,
} from './schema.js';

export type {
  ClientConfig,
  RetryConfig,
  TasksConfig,
  BatchesConfig,
} from './schema.js';

export { defaultConfig } from './defaults.js';

export {
  loadConfig,
  resolveConfigPath,
  resolveEnvVars,
  applyEnvOverrides,
  deepMerge,
} from './loader.js';
