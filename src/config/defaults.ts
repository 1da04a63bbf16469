import type { ClientConfig } from './schema.js';

// Значения по умолчанию для конфигурации.
// Используются при deep-merge с пользовательским конфигом до валидации.
export const defaultConfig: ClientConfig = {
  url: 'http://localhost:7700',
  retry: {
    maxRetries: 3,
    baseDelayMs: 1000,
  },
  tasks: {
    timeoutMs: 5000,
    intervalMs: 50,
  },
  batches: {
    batchSize: 1000,
    maxPayloadSize: 104_857_600,
  },
};
