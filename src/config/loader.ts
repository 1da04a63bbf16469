import { readFile, access } from 'node:fs/promises';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { ClientConfigSchema } from './schema.js';
import { defaultConfig } from './defaults.js';
import type { ClientConfig } from './schema.js';

// Паттерн для подстановки переменных окружения: ${ENV_VAR}.
const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;

/**
 * Рекурсивно обходит объект и заменяет строки вида ${ENV_VAR}
 * на значения из process.env. Ненайденные переменные остаются как есть.
 */
export function resolveEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return obj.replace(ENV_VAR_PATTERN, (match, varName: string) => {
      const value = process.env[varName];
      if (value === undefined) {
        return match;
      }
      return value;
    });
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value);
    }
    return result;
  }

  // Числа, boolean и null возвращаем без изменений.
  return obj;
}

// Проверяет, что значение является простым объектом (не массив и не null).
function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Рекурсивный deep-merge двух объектов.
 * Значения из source перезаписывают target, кроме случаев, когда оба значения являются объектами.
 * Массивы из source полностью заменяют массивы в target (не сливаются).
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      // Оба значения объекты, сливаем рекурсивно.
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      // Во всех остальных случаях source перезаписывает target.
      result[key] = sourceValue;
    }
  }

  return result;
}

// MEILI_URL и MEILI_API_KEY имеют приоритет над значениями из файла.
export function applyEnvOverrides(config: Record<string, unknown>): Record<string, unknown> {
  const result = { ...config };
  const url = process.env['MEILI_URL'];
  if (url) {
    result['url'] = url;
  }
  const apiKey = process.env['MEILI_API_KEY'];
  if (apiKey) {
    result['apiKey'] = apiKey;
  }
  return result;
}

/**
 * Проверяет существование файла по указанному пути.
 */
async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Определяет путь к конфиг-файлу.
 * Порядок поиска:
 * 0. Переданный configPath (--config). Если файла нет, throw Error.
 * 1. MEILI_CONFIG env var. Если файла нет, throw Error.
 * 2. ./meili.config.yaml (текущая директория).
 * 3. ~/.config/meili/config.yaml (домашняя директория).
 */
export async function resolveConfigPath(configPath?: string): Promise<string | null> {
  if (configPath) {
    const resolved = resolve(configPath);
    if (await fileExists(resolved)) {
      return resolved;
    }
    throw new Error(`Config file not found at path: ${resolved}`);
  }

  // Шаг 1: переменная окружения MEILI_CONFIG.
  const envConfigPath = process.env['MEILI_CONFIG'];
  if (envConfigPath) {
    const resolved = resolve(envConfigPath);
    if (await fileExists(resolved)) {
      return resolved;
    }
    throw new Error(`Config file not found at MEILI_CONFIG path: ${resolved}`);
  }

  // Поиск в текущей директории.
  const localPath = resolve('meili.config.yaml');
  if (await fileExists(localPath)) {
    return localPath;
  }

  // Поиск в домашней директории.
  const globalPath = join(homedir(), '.config', 'meili', 'config.yaml');
  if (await fileExists(globalPath)) {
    return globalPath;
  }

  return null;
}

/**
 * Загружает конфигурацию клиента из YAML-файла.
 *
 * 1. Определяет путь к конфиг-файлу (аргумент или поиск).
 * 2. Читает YAML и подставляет переменные окружения.
 * 3. Deep merge с дефолтами, затем MEILI_URL / MEILI_API_KEY.
 * 4. Валидирует через ClientConfigSchema.parse().
 *
 * Если конфиг-файл не найден, используются дефолты.
 */
export async function loadConfig(configPath?: string): Promise<ClientConfig> {
  const resolvedPath = await resolveConfigPath(configPath);
  const defaults: Record<string, unknown> = { ...defaultConfig };

  let merged = defaults;

  if (resolvedPath) {
    const raw = await readFile(resolvedPath, 'utf-8');
    const parsed: unknown = parseYaml(raw);

    // Для пустого или невалидного YAML остаются дефолты.
    if (isPlainObject(parsed)) {
      const withEnvVars = resolveEnvVars(parsed);
      if (isPlainObject(withEnvVars)) {
        merged = deepMerge(defaults, withEnvVars);
      }
    }
  }

  return ClientConfigSchema.parse(applyEnvOverrides(merged));
}
