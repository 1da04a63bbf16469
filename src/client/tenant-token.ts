// Подпись tenant-токенов (JWT HS256) для поиска с ограничениями.
import jwt from 'jsonwebtoken';
import { InvalidKeyError, InvalidRestrictionError, KeyNotFoundError } from '../errors.js';
import type { Key } from '../models/index.js';

// Правила поиска: список индексов или индекс -> параметры (filter и т.п.).
export type SearchRules = string[] | Record<string, Record<string, unknown> | null>;

/**
 * Содержимое токена. searchRules: ['*'] разрешает всё, что разрешает ключ.
 * indexes не может быть шире индексов ключа. Срок жизни задаётся через
 * expiresAt (Date) или exp (unix-время в секундах).
 */
export interface TenantTokenPayload {
  searchRules: SearchRules;
  indexes?: string[];
  apiKeyUid?: string;
  exp?: number;
  expiresAt?: Date;
}

const DEFAULT_SEARCH_KEY_DESCRIPTION = 'Default Search API Key';

// Ключ по умолчанию для поиска, создаваемый Meilisearch при старте.
export function findDefaultSearchKey(keys: readonly Key[]): Key {
  const found = keys.find((k) => k.description?.includes(DEFAULT_SEARCH_KEY_DESCRIPTION));
  if (!found) {
    throw new KeyNotFoundError('No API search key found');
  }
  return found;
}

// Проверяет, что ключ годится для подписи и ограничения не шире его прав.
export function assertTokenRestrictions(payload: TenantTokenPayload, key: Key): void {
  if (key.actions.length !== 1 || key.actions[0] !== 'search') {
    throw new InvalidKeyError('Only search keys can be used for tokens');
  }

  if (key.indexes.includes('*')) {
    return;
  }
  for (const index of payload.indexes ?? []) {
    if (!key.indexes.includes(index)) {
      throw new InvalidRestrictionError(
        'Invalid index. The token cannot be less restrictive than the API key',
      );
    }
  }
}

/**
 * Подписывает токен секретом ключа. apiKeyUid добавляется из ключа,
 * если не задан; expiresAt превращается в exp.
 */
export function signTenantToken(payload: TenantTokenPayload, key: Key): string {
  assertTokenRestrictions(payload, key);

  const { expiresAt, ...rest } = payload;
  const claims: Record<string, unknown> = {
    ...rest,
    apiKeyUid: payload.apiKeyUid ?? key.uid,
  };
  if (expiresAt) {
    claims['exp'] = Math.floor(expiresAt.getTime() / 1000);
  }

  return jwt.sign(claims, key.key, { algorithm: 'HS256' });
}
