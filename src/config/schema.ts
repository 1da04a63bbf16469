import { z } from 'zod';

// Схема повторных попыток HTTP-запросов.
export const RetryConfigSchema = z.object({
  maxRetries: z.number().int().min(0).default(3),
  baseDelayMs: z.number().int().min(0).default(1000),
});

// Схема ожидания асинхронных задач Meilisearch.
export const TasksConfigSchema = z.object({
  // null означает ожидание без ограничения.
  timeoutMs: z.number().int().positive().nullable().default(5000),
  intervalMs: z.number().int().positive().default(50),
});

// Схема разбиения документов на батчи.
export const BatchesConfigSchema = z.object({
  batchSize: z.number().int().positive().default(1000),
  // 100 МБ, лимит payload Meilisearch по умолчанию.
  maxPayloadSize: z.number().int().positive().default(104_857_600),
});

// Корневая схема конфигурации клиента.
export const ClientConfigSchema = z.object({
  url: z.string().url().default('http://localhost:7700'),
  apiKey: z.string().optional(),
  timeoutMs: z.number().int().positive().optional(),
  retry: RetryConfigSchema.default(() => ({
    maxRetries: 3,
    baseDelayMs: 1000,
  })),
  tasks: TasksConfigSchema.default(() => ({
    timeoutMs: 5000,
    intervalMs: 50,
  })),
  batches: BatchesConfigSchema.default(() => ({
    batchSize: 1000,
    maxPayloadSize: 104_857_600,
  })),
});

// Типы, выведенные из схем.
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type TasksConfig = z.infer<typeof TasksConfigSchema>;
export type BatchesConfig = z.infer<typeof BatchesConfigSchema>;
export type ClientConfig = z.infer<typeof ClientConfigSchema>;
