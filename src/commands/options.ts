// Общие парсеры опций CLI.
import { InvalidArgumentError } from 'commander';

// Положительное целое для числовых опций (--limit, --batch-size).
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

// Неотрицательное целое для uid задач.
export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

// Текст ошибки для вывода в консоль.
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
