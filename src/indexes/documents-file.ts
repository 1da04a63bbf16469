// Загрузка документов из файлов и директорий (json, csv, ndjson).
import fg from 'fast-glob';
import { parse as parseCsv } from 'csv-parse/sync';
import { readFile, access } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import { z } from 'zod';
import { InvalidDocumentError, MeilisearchError } from '../errors.js';
import { DocumentSchema } from '../models/index.js';
import type { Document, DocumentType } from '../models/index.js';

// Content-Type для отправки файла без разбора.
const RAW_CONTENT_TYPES = new Map<string, string>([
  ['.json', 'application/json'],
  ['.csv', 'text/csv'],
  ['.ndjson', 'application/x-ndjson'],
]);

const DocumentListSchema = z.array(DocumentSchema);

// Содержимое файла и его Content-Type.
export interface RawDocumentsFile {
  content: string;
  contentType: string;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

// Проверяет, что значение является массивом объектов.
function toDocuments(value: unknown, filePath: string): Document[] {
  if (!Array.isArray(value)) {
    throw new InvalidDocumentError(`Documents file ${filePath} must contain a list of documents`);
  }
  const parsed = DocumentListSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidDocumentError(`Documents file ${filePath} contains entries that are not objects`);
  }
  return parsed.data;
}

function parseJsonDocuments(raw: string, filePath: string): Document[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new InvalidDocumentError(`Invalid JSON in documents file: ${filePath}`);
  }
  return toDocuments(parsed, filePath);
}

// Каждая непустая строка содержит отдельный JSON-объект.
function parseNdjsonDocuments(raw: string, filePath: string): Document[] {
  const documents: unknown[] = [];
  const lines = raw.split('\n');

  for (const [lineIndex, line] of lines.entries()) {
    const trimmed = line.trim();
    if (trimmed === '') {
      continue;
    }
    try {
      documents.push(JSON.parse(trimmed));
    } catch {
      throw new InvalidDocumentError(`Invalid JSON on line ${lineIndex + 1} of ${filePath}`);
    }
  }

  return toDocuments(documents, filePath);
}

// Первая строка задаёт заголовок; значения остаются строками.
function parseCsvDocuments(raw: string, filePath: string): Document[] {
  let records: unknown;
  try {
    records = parseCsv(raw, { bom: true, columns: true, skip_empty_lines: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidDocumentError(`Invalid CSV in documents file ${filePath}: ${message}`);
  }
  return toDocuments(records, filePath);
}

/**
 * Загружает документы из файла. Формат определяется расширением.
 * Неподдерживаемое расширение или отсутствующий файл дают MeilisearchError,
 * содержимое не в виде списка документов даёт InvalidDocumentError.
 */
export async function loadDocumentsFromFile(filePath: string): Promise<Document[]> {
  const ext = extname(filePath).toLowerCase();
  if (!RAW_CONTENT_TYPES.has(ext)) {
    throw new MeilisearchError(
      `Documents file must have a .json, .csv or .ndjson extension: ${filePath}`,
    );
  }

  if (!(await fileExists(filePath))) {
    throw new MeilisearchError(`Documents file not found: ${filePath}`);
  }

  const raw = await readFile(filePath, 'utf-8');

  switch (ext) {
  case '.csv':
    return parseCsvDocuments(raw, filePath);
  case '.ndjson':
    return parseNdjsonDocuments(raw, filePath);
  default:
    return parseJsonDocuments(raw, filePath);
  }
}

// Список файлов заданного типа в директории, отсортированный по имени.
export async function findDocumentFiles(dirPath: string, documentType: DocumentType): Promise<string[]> {
  const paths = await fg(`*.${documentType}`, {
    cwd: resolve(dirPath),
    onlyFiles: true,
    absolute: true,
  });
  return paths.sort();
}

/**
 * Загружает документы из всех файлов заданного типа в директории.
 * Возвращает документы по файлам; если файлов нет, выбрасывает MeilisearchError.
 */
export async function loadDocumentsFromDirectory(
  dirPath: string,
  documentType: DocumentType,
): Promise<Document[][]> {
  const files = await findDocumentFiles(dirPath, documentType);
  if (files.length === 0) {
    throw new MeilisearchError(`No ${documentType} files found in directory: ${dirPath}`);
  }

  const perFile: Document[][] = [];
  for (const file of files) {
    perFile.push(await loadDocumentsFromFile(file));
  }
  return perFile;
}

// Объединяет документы из нескольких файлов в один список.
export function combineDocuments(documents: Document[][]): Document[] {
  return documents.flat();
}

/**
 * Читает файл без разбора для отправки как есть.
 * Для отсутствующего файла MeilisearchError, для чужого расширения RangeError.
 */
export async function readRawDocumentsFile(filePath: string): Promise<RawDocumentsFile> {
  if (!(await fileExists(filePath))) {
    throw new MeilisearchError(`Documents file not found: ${filePath}`);
  }

  const contentType = RAW_CONTENT_TYPES.get(extname(filePath).toLowerCase());
  if (contentType === undefined) {
    throw new RangeError(
      `Raw documents file must have a .json, .csv or .ndjson extension: ${filePath}`,
    );
  }

  const content = await readFile(filePath, 'utf-8');
  return { content, contentType };
}
