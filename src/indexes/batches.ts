// Разбиение документов на батчи.
import { PayloadTooLargeError } from '../errors.js';
import type { Document } from '../models/index.js';

// Разбивает массив на батчи по size элементов.
export function batch<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }

  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

// Размер JSON-представления в байтах.
export function jsonByteLength(value: unknown): number {
  return Buffer.byteLength(JSON.stringify(value), 'utf-8');
}

/**
 * Жадно упаковывает документы в батчи так, чтобы JSON-массив каждого батча
 * занимал не больше maxPayloadSize байт. Порядок документов сохраняется.
 */
export function autoBatch(documents: readonly Document[], maxPayloadSize: number): Document[][] {
  const batches: Document[][] = [];
  let current: Document[] = [];
  // Скобки массива.
  let currentSize = 2;

  for (const document of documents) {
    const size = jsonByteLength(document);
    if (size + 2 > maxPayloadSize) {
      throw new PayloadTooLargeError(
        `Document of ${size} bytes exceeds the maximum payload size of ${maxPayloadSize} bytes`,
      );
    }

    // Запятая-разделитель для всех документов, кроме первого.
    let added = current.length === 0 ? size : size + 1;
    if (currentSize + added > maxPayloadSize) {
      batches.push(current);
      current = [];
      currentSize = 2;
      added = size;
    }

    current.push(document);
    currentSize += added;
  }

  if (current.length > 0) {
    batches.push(current);
  }

  return batches;
}
