// HTTP-транспорт клиента Meilisearch поверх fetch.
import { z } from 'zod';
import {
  MeilisearchApiError,
  MeilisearchCommunicationError,
  MeilisearchError,
  MeilisearchTimeoutError,
} from '../errors.js';

// Параметры повторных попыток.
export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
}

// Параметры транспорта.
export interface HttpRequestsOptions {
  url: string;
  apiKey?: string;
  timeoutMs?: number;
  retry?: Partial<RetryOptions>;
}

// Значение query-параметра: массивы склеиваются через запятую, undefined/null пропускаются.
export type QueryValue = string | number | boolean | readonly string[] | null | undefined;
export type QueryParams = Record<string, QueryValue>;

// Опции отдельного запроса.
export interface RequestOptions {
  query?: QueryParams;
  // Если задан, строковое body отправляется как есть (CSV, NDJSON).
  contentType?: string;
}

// Ответ: статус и разобранный JSON (null для пустого тела).
export interface HttpResponse {
  status: number;
  data: unknown;
}

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

// Тело ошибки Meilisearch; любые поля могут отсутствовать.
const ApiErrorBodySchema = z.object({
  message: z.string(),
  code: z.string(),
  type: z.string(),
  link: z.string(),
}).partial();

const DEFAULT_RETRY: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 1000,
};

// Ответ с уже прочитанным телом.
interface FetchedResponse {
  response: Response;
  text: string;
}

// Отклоняет промис при срабатывании signal.
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

// Разбирает тело ответа. Пустое тело даёт null, не-JSON остаётся строкой.
function parseBody(text: string): unknown {
  if (text.length === 0) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

// Задержка перед повтором: Retry-After (секунды) для 429, иначе экспонента.
function retryDelayMs(response: Response, attempt: number, baseDelayMs: number): number {
  if (response.status === 429) {
    const retryAfter = Number(response.headers.get('retry-after'));
    if (Number.isFinite(retryAfter) && retryAfter > 0) {
      return retryAfter * 1000;
    }
  }
  return baseDelayMs * Math.pow(2, attempt - 1);
}

function toApiError(response: Response, text: string): MeilisearchApiError {
  const parsed = ApiErrorBodySchema.safeParse(parseBody(text));
  const body = parsed.success ? parsed.data : {};
  return new MeilisearchApiError(response.status, body, response.statusText);
}

// Строит URL с query-параметрами.
export function buildUrl(baseUrl: string, path: string, query?: QueryParams): string {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  const url = new URL(path.replace(/^\/+/, ''), base);

  if (query) {
    for (const [key, value] of Object.entries(query)) {
      if (value === undefined || value === null) {
        continue;
      }
      const serialized = Array.isArray(value) ? value.join(',') : String(value);
      url.searchParams.set(key, serialized);
    }
  }

  return url.toString();
}

// Обёртка над fetch: заголовки, таймаут, retry на 429/5xx, маппинг ошибок.
export class HttpRequests {
  readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number | undefined;
  private readonly retry: RetryOptions;
  private readonly inFlight = new Set<AbortController>();
  // Отмена ожидающих пауз перед retry.
  private readonly pendingDelays = new Set<() => void>();
  private closed = false;

  constructor(options: HttpRequestsOptions) {
    this.baseUrl = options.url;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
    this.retry = { ...DEFAULT_RETRY, ...options.retry };
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async get(path: string, query?: QueryParams): Promise<HttpResponse> {
    return this.send('GET', path, undefined, { query });
  }

  async post(path: string, body?: unknown, options?: RequestOptions): Promise<HttpResponse> {
    return this.send('POST', path, body, options);
  }

  async put(path: string, body?: unknown, options?: RequestOptions): Promise<HttpResponse> {
    return this.send('PUT', path, body, options);
  }

  async patch(path: string, body?: unknown, options?: RequestOptions): Promise<HttpResponse> {
    return this.send('PATCH', path, body, options);
  }

  async delete(path: string, body?: unknown): Promise<HttpResponse> {
    return this.send('DELETE', path, body);
  }

  // Прерывает запросы в полёте и паузы перед retry; последующие вызовы завершаются ошибкой.
  close(): void {
    this.closed = true;
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
    for (const cancel of this.pendingDelays) {
      cancel();
    }
    this.pendingDelays.clear();
  }

  // Пауза перед retry, прерываемая close().
  private delay(ms: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const cancel = (): void => {
        clearTimeout(timer);
        reject(new MeilisearchError('Client is closed'));
      };
      const timer = setTimeout(() => {
        this.pendingDelays.delete(cancel);
        resolve();
      }, ms);
      this.pendingDelays.add(cancel);
    });
  }

  private headers(contentType: string): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': contentType,
    };
    if (this.apiKey) {
      headers['Authorization'] = `Bearer ${this.apiKey}`;
    }
    return headers;
  }

  private async send(
    method: HttpMethod,
    path: string,
    body: unknown,
    options?: RequestOptions,
  ): Promise<HttpResponse> {
    if (this.closed) {
      throw new MeilisearchError('Client is closed');
    }

    const url = buildUrl(this.baseUrl, path, options?.query);
    const isRaw = options?.contentType !== undefined && typeof body === 'string';
    const contentType = options?.contentType ?? 'application/json';
    let payload: string | undefined;
    if (body !== undefined) {
      payload = isRaw && typeof body === 'string' ? body : JSON.stringify(body);
    }

    for (let attempt = 0; ; attempt++) {
      const { response, text } = await this.fetchOnce(method, url, contentType, payload);

      if (response.ok) {
        return { status: response.status, data: parseBody(text) };
      }

      // Retry на 429 (rate limit) и 5xx (серверные ошибки).
      const retriable = response.status === 429 || response.status >= 500;
      if (retriable && attempt < this.retry.maxRetries) {
        const delayMs = retryDelayMs(response, attempt + 1, this.retry.baseDelayMs);
        process.stderr.write(
          `  [meili] retry ${attempt + 1}/${this.retry.maxRetries}, wait ${Math.round(delayMs / 1000)}s\n`,
        );
        await this.delay(delayMs);
        if (this.closed) {
          throw new MeilisearchError('Client is closed');
        }
        continue;
      }

      throw toApiError(response, text);
    }
  }

  private async fetchOnce(
    method: HttpMethod,
    url: string,
    contentType: string,
    payload: string | undefined,
  ): Promise<FetchedResponse> {
    const controller = new AbortController();
    this.inFlight.add(controller);

    let timedOut = false;
    const timer = this.timeoutMs === undefined
      ? undefined
      : setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, this.timeoutMs);

    // Таймаут и close() покрывают и чтение тела.
    try {
      const response = await fetch(url, {
        method,
        headers: this.headers(contentType),
        body: payload,
        signal: controller.signal,
      });
      const text = await untilAborted(response.text(), controller.signal);
      return { response, text };
    } catch (error) {
      if (timedOut) {
        throw new MeilisearchTimeoutError(
          `Request ${method} ${url} timed out after ${this.timeoutMs}ms`,
        );
      }
      if (this.closed) {
        throw new MeilisearchError('Client is closed');
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new MeilisearchCommunicationError(
        `Unable to reach Meilisearch at ${url}: ${message}`,
        { cause: error },
      );
    } finally {
      if (timer !== undefined) {
        clearTimeout(timer);
      }
      this.inFlight.delete(controller);
    }
  }
}
