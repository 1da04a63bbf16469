// Barrel-файл HTTP-транспорта.
export type {
  HttpRequestsOptions,
  HttpResponse,
  QueryParams,
  QueryValue,
  RequestOptions,
  RetryOptions,
} from './requests.js';

export { HttpRequests, buildUrl } from './requests.js';
