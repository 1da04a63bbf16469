// Модели уровня инстанса: статистика, ключи, health, версия.
import { z } from 'zod';
import { IndexStatsSchema } from './index-info.js';

export const ClientStatsSchema = z.object({
  databaseSize: z.number(),
  lastUpdate: z.string().nullable(),
  indexes: z.record(IndexStatsSchema),
});

export const KeySchema = z.object({
  uid: z.string(),
  key: z.string(),
  name: z.string().nullish(),
  description: z.string().nullish(),
  actions: z.array(z.string()),
  indexes: z.array(z.string()),
  expiresAt: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const KeysResultsSchema = z.object({
  results: z.array(KeySchema),
  offset: z.number(),
  limit: z.number(),
  total: z.number(),
});

export const HealthSchema = z.object({
  status: z.string(),
});

export const VersionSchema = z.object({
  commitSha: z.string(),
  commitDate: z.string(),
  pkgVersion: z.string(),
});

export type ClientStats = z.infer<typeof ClientStatsSchema>;
export type Key = z.infer<typeof KeySchema>;
export type KeysResults = z.infer<typeof KeysResultsSchema>;
export type Health = z.infer<typeof HealthSchema>;
export type Version = z.infer<typeof VersionSchema>;

// Параметры создания ключа. expiresAt задаётся в UTC.
export interface KeyCreate {
  actions: string[];
  indexes: string[];
  description?: string | null;
  name?: string | null;
  uid?: string;
  expiresAt?: Date | null;
}

// Изменяемые поля ключа.
export interface KeyUpdate {
  key: string;
  name?: string | null;
  description?: string | null;
}
