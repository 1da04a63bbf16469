// Модели документов.
import { z } from 'zod';

export const DocumentSchema = z.record(z.unknown());

export const DocumentsInfoSchema = z.object({
  results: z.array(DocumentSchema),
  offset: z.number(),
  limit: z.number(),
  total: z.number(),
});

export type Document = z.infer<typeof DocumentSchema>;
export type DocumentsInfo = z.infer<typeof DocumentsInfoSchema>;

// Поддерживаемые форматы файлов документов.
export type DocumentType = 'json' | 'csv' | 'ndjson';
