import { describe, it, expect } from 'vitest';
import { batch, autoBatch, jsonByteLength } from '../batches.js';
import { PayloadTooLargeError } from '../../errors.js';

describe('batch', () => {
  it('разбивает массив на батчи по size элементов', () => {
    expect(batch([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('возвращает пустой список для пустого массива', () => {
    expect(batch([], 10)).toEqual([]);
  });

  it('один батч, если size больше длины массива', () => {
    expect(batch(['a', 'b'], 1000)).toEqual([['a', 'b']]);
  });

  it('выбрасывает RangeError при size <= 0', () => {
    expect(() => batch([1], 0)).toThrow(RangeError);
    expect(() => batch([1], -3)).toThrow('Batch size must be a positive integer, got -3');
  });
});

describe('jsonByteLength', () => {
  it('считает байты UTF-8, а не символы', () => {
    expect(jsonByteLength({ id: 1 })).toBe(8);
    // "ё" занимает 2 байта.
    expect(jsonByteLength('ё')).toBe(4);
  });
});

describe('autoBatch', () => {
  // JSON каждого документа занимает 8 байт: {"id":1}
  const docs = [{ id: 1 }, { id: 2 }, { id: 3 }];

  it('упаковывает документы, пока JSON-массив помещается в лимит', () => {
    // [{"id":1},{"id":2}]: 19 байт, третий документ уже не помещается.
    expect(autoBatch(docs, 20)).toEqual([[{ id: 1 }, { id: 2 }], [{ id: 3 }]]);
  });

  it('каждый батч укладывается в maxPayloadSize', () => {
    const many = Array.from({ length: 50 }, (_, i) => ({ id: i, title: `Movie ${i}` }));
    const batches = autoBatch(many, 200);

    expect(batches.flat()).toEqual(many);
    for (const b of batches) {
      expect(jsonByteLength(b)).toBeLessThanOrEqual(200);
    }
  });

  it('документ впритык к лимиту попадает в отдельный батч', () => {
    expect(autoBatch(docs.slice(0, 2), 10)).toEqual([[{ id: 1 }], [{ id: 2 }]]);
  });

  it('выбрасывает PayloadTooLargeError для документа больше лимита', () => {
    expect(() => autoBatch(docs, 9)).toThrow(PayloadTooLargeError);
    expect(() => autoBatch(docs, 9)).toThrow(
      'Document of 8 bytes exceeds the maximum payload size of 9 bytes',
    );
  });
});
