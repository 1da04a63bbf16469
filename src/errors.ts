// Иерархия ошибок клиента Meilisearch.

// Тело ошибки, которое возвращает Meilisearch API.
export interface ApiErrorBody {
  message: string;
  code: string;
  type: string;
  link: string;
}

// Базовая ошибка клиента.
export class MeilisearchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MeilisearchError';
  }
}

// Сервер ответил не-2xx статусом.
export class MeilisearchApiError extends MeilisearchError {
  readonly status: number;
  readonly code: string;
  readonly type: string;
  readonly link: string;

  constructor(status: number, body: Partial<ApiErrorBody>, statusText = '') {
    super(
      body.message
        ? `Meilisearch API error: ${status} ${body.code ?? 'unknown'}: ${body.message}`
        : `Meilisearch API error: ${status} ${statusText}`.trimEnd(),
    );
    this.name = 'MeilisearchApiError';
    this.status = status;
    this.code = body.code ?? 'unknown';
    this.type = body.type ?? 'unknown';
    this.link = body.link ?? '';
  }
}

// Асинхронная задача завершилась со статусом failed.
export class MeilisearchTaskError extends MeilisearchError {
  readonly taskUid: number;
  readonly code: string;
  readonly type: string;
  readonly link: string;

  constructor(taskUid: number, body: Partial<ApiErrorBody>) {
    super(`Task ${taskUid} failed: ${body.code ?? 'unknown'}: ${body.message ?? 'no error details'}`);
    this.name = 'MeilisearchTaskError';
    this.taskUid = taskUid;
    this.code = body.code ?? 'unknown';
    this.type = body.type ?? 'unknown';
    this.link = body.link ?? '';
  }
}

// Запрос не получил ответа (сеть, DNS, обрыв соединения).
export class MeilisearchCommunicationError extends MeilisearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = 'MeilisearchCommunicationError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

// Истёк таймаут запроса или ожидания задачи.
export class MeilisearchTimeoutError extends MeilisearchError {
  constructor(message: string) {
    super(message);
    this.name = 'MeilisearchTimeoutError';
  }
}

// Файл документов не содержит список документов.
export class InvalidDocumentError extends MeilisearchError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidDocumentError';
  }
}

// Один документ больше допустимого размера батча.
export class PayloadTooLargeError extends MeilisearchError {
  constructor(message: string) {
    super(message);
    this.name = 'PayloadTooLargeError';
  }
}

// Ключ не подходит для подписи tenant-токена.
export class InvalidKeyError extends MeilisearchError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidKeyError';
  }
}

// Ограничения токена шире, чем права ключа.
export class InvalidRestrictionError extends MeilisearchError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRestrictionError';
  }
}

// Поисковый API-ключ не найден.
export class KeyNotFoundError extends MeilisearchError {
  constructor(message: string) {
    super(message);
    this.name = 'KeyNotFoundError';
  }
}
