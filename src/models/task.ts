// Модели асинхронных задач Meilisearch.
import { z } from 'zod';

export const TaskStatusSchema = z.enum([
  'enqueued',
  'processing',
  'succeeded',
  'failed',
  'canceled',
]);

// Ошибка, с которой завершилась задача.
export const TaskErrorSchema = z.object({
  message: z.string(),
  code: z.string(),
  type: z.string(),
  link: z.string(),
});

// Ответ на постановку задачи в очередь (202 Accepted).
export const TaskInfoSchema = z.object({
  taskUid: z.number(),
  indexUid: z.string().nullable(),
  status: TaskStatusSchema,
  type: z.string(),
  enqueuedAt: z.string(),
});

export const TaskSchema = z.object({
  uid: z.number(),
  indexUid: z.string().nullable(),
  status: TaskStatusSchema,
  type: z.string(),
  details: z.record(z.unknown()).nullish(),
  error: TaskErrorSchema.nullish(),
  duration: z.string().nullish(),
  enqueuedAt: z.string(),
  startedAt: z.string().nullish(),
  finishedAt: z.string().nullish(),
});

export const TasksResultsSchema = z.object({
  results: z.array(TaskSchema),
  limit: z.number(),
  from: z.number().nullable(),
  next: z.number().nullable(),
});

export type TaskStatus = z.infer<typeof TaskStatusSchema>;
export type TaskError = z.infer<typeof TaskErrorSchema>;
export type TaskInfo = z.infer<typeof TaskInfoSchema>;
export type Task = z.infer<typeof TaskSchema>;
export type TasksResults = z.infer<typeof TasksResultsSchema>;
