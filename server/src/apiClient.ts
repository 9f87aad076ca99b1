import fetch, { FetchError, Headers, type RequestInit, type Response } from 'node-fetch';
import { ApiError, errorMessage, isApiError, type ApiErrorOptions, type ErrorKind, type Vendor } from './errors.js';
import { log } from './logging.js';
import { canonicalJson, LruCache } from './lruCache.js';
import { defaultSleep, type Sleep } from './rateLimiter.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';
export type QueryValue = string | number | boolean | null | undefined;
export type QueryParams = Record<string, QueryValue>;
export type JsonBody = Record<string, unknown> | unknown[];
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface ApiClientOptions {
  baseUrl: string;
  /** Maximum number of cached GET responses. */
  cacheSize?: number;
  /** Wait and retry when the server answers 429. */
  autoRetry?: boolean;
  timeoutSeconds?: number;
  /** How many times a rate-limited request is retried before giving up. */
  maxRateLimitRetries?: number;
  fetch?: FetchLike;
  sleep?: Sleep;
}

export interface GetOptions {
  params?: QueryParams;
  headers?: Record<string, string>;
  useCache?: boolean;
}

export interface SendOptions {
  body?: JsonBody;
  params?: QueryParams;
  headers?: Record<string, string>;
}

interface RequestSpec extends SendOptions {
  useCache?: boolean;
}

type Attempt =
  | { status: 'ok'; data: unknown }
  | { status: 'rate-limited'; retryAfter: number };

type CachedResponse = { data: unknown };

export const DEFAULT_CACHE_SIZE = 100;
export const DEFAULT_TIMEOUT_SECONDS = 10;
export const DEFAULT_RETRY_AFTER_SECONDS = 60;

const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  'Content-Type': 'application/json',
  Accept: 'application/json',
};

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT']);
const ABORTED_BODY = /operation was aborted/i;

/** Integer seconds from a Retry-After header, or the 60 second default. */
export function parseRetryAfter(header: string | null): number {
  const value = header?.trim() ?? '';
  return /^\d+$/.test(value) ? Number.parseInt(value, 10) : DEFAULT_RETRY_AFTER_SECONDS;
}

export function joinUrl(baseUrl: string, endpoint: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${endpoint.replace(/^\/+/, '')}`;
}

export function withQuery(url: string, params?: QueryParams): string {
  if (!params) return url;
  const qs = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null) continue;
    qs.append(key, String(value));
  }
  const query = qs.toString();
  if (!query) return url;
  return `${url}${url.includes('?') ? '&' : '?'}${query}`;
}

export function cacheKey(method: HttpMethod, url: string, spec: RequestSpec): string {
  return [
    method,
    url,
    canonicalJson(spec.params ?? {}),
    canonicalJson(spec.body ?? {}),
    canonicalJson(spec.headers ?? {}),
  ].join('\u0000');
}

/**
 * Shared request pipeline for catalog clients: URL building, header
 * merging, an LRU cache for GETs, status classification into `ApiError`
 * and an optional bounded retry after 429 responses.
 */
export abstract class ApiClient {
  readonly baseUrl: string;
  readonly autoRetry: boolean;
  readonly timeoutSeconds: number;
  readonly maxRateLimitRetries: number;
  protected readonly vendor: Vendor | null = null;
  protected readonly sleep: Sleep;
  private readonly fetchImpl: FetchLike;
  private readonly cache: LruCache<CachedResponse>;

  constructor(options: ApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.autoRetry = options.autoRetry ?? false;
    this.timeoutSeconds = options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
    this.maxRateLimitRetries = options.maxRateLimitRetries ?? 1;
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.cache = new LruCache<CachedResponse>(options.cacheSize ?? DEFAULT_CACHE_SIZE);
  }

  /**
   * Establishes whatever credentials `authHeaders()` needs. Throws an
   * AuthenticationFailure when the catalog rejects them.
   */
  abstract authenticate(): Promise<void>;

  /** Per-client headers (auth tokens, user agents) layered over the JSON defaults. */
  protected authHeaders(): Record<string, string> {
    return {};
  }

  /** Runs before every network attempt, retries included. */
  protected async beforeAttempt(): Promise<void> {
    return;
  }

  /** Milliseconds to wait after a 429 before the next attempt. */
  protected rateLimitCooldownMs(retryAfterSeconds: number): number {
    return retryAfterSeconds * 1000;
  }

  protected get label(): string {
    return this.vendor ?? 'api';
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  get(endpoint: string, options: GetOptions = {}): Promise<unknown> {
    const { useCache = true, ...rest } = options;
    return this.request('GET', endpoint, { ...rest, useCache });
  }

  post(endpoint: string, options: SendOptions = {}): Promise<unknown> {
    return this.request('POST', endpoint, options);
  }

  put(endpoint: string, options: SendOptions = {}): Promise<unknown> {
    return this.request('PUT', endpoint, options);
  }

  delete(endpoint: string, options: Omit<SendOptions, 'body'> = {}): Promise<unknown> {
    return this.request('DELETE', endpoint, options);
  }

  clearCache(): void {
    this.cache.clear();
    log('info', `${this.label} cache cleared`);
  }

  protected error(kind: ErrorKind, message: string, options: ApiErrorOptions = {}): ApiError {
    return new ApiError(kind, message, { ...options, vendor: this.vendor });
  }

  private async request(method: HttpMethod, endpoint: string, spec: RequestSpec): Promise<unknown> {
    const url = joinUrl(this.baseUrl, endpoint);
    const key = method === 'GET' && spec.useCache ? cacheKey(method, url, spec) : null;

    if (key !== null) {
      const hit = this.cache.get(key);
      if (hit) {
        log('debug', `${this.label}: cache hit ${method} ${url}`);
        return hit.data;
      }
    }

    try {
      let retries = 0;
      for (;;) {
        const attempt = await this.attempt(method, url, spec);
        if (attempt.status === 'ok') {
          if (key !== null) this.cache.set(key, { data: attempt.data });
          return attempt.data;
        }
        if (retries >= this.maxRateLimitRetries) {
          throw this.error('RateLimitExceeded', `Rate limit exceeded after ${retries} retries. Retry after ${attempt.retryAfter} seconds`, {
            retryAfter: attempt.retryAfter,
          });
        }
        retries++;
        const waitMs = this.rateLimitCooldownMs(attempt.retryAfter);
        log('info', `${this.label}: auto-retrying ${method} ${url} in ${waitMs}ms (retry ${retries}/${this.maxRateLimitRetries})`);
        await this.sleep(waitMs);
      }
    } catch (err) {
      if (isApiError(err)) throw err;
      log('error', `${this.label}: unexpected error in API request: ${errorMessage(err)}`);
      throw this.error('RequestFailure', `Unexpected error: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async attempt(method: HttpMethod, url: string, spec: RequestSpec): Promise<Attempt> {
    await this.beforeAttempt();
    const signal = AbortSignal.timeout(Math.ceil(this.timeoutSeconds * 1000));
    const init: RequestInit = { method, headers: mergeHeaders(this.authHeaders(), spec.headers ?? {}), signal };
    if (spec.body !== undefined) init.body = JSON.stringify(spec.body);

    let response: Response;
    try {
      log('debug', `${this.label}: ${method} ${url}`);
      response = await this.fetchImpl(withQuery(url, spec.params), init);
    } catch (err) {
      throw this.transportError(err, signal);
    }
    return this.classify(response, url, signal);
  }

  private async classify(response: Response, url: string, signal: AbortSignal): Promise<Attempt> {
    const { status } = response;

    if (status === 200) {
      const text = await this.readBody(response, signal);
      try {
        const data: unknown = JSON.parse(text);
        return { status: 'ok', data };
      } catch (err) {
        log('error', `${this.label}: failed to parse JSON response: ${errorMessage(err)}`);
        throw this.error('ResponseParseFailure', `Failed to parse JSON response: ${errorMessage(err)}`, { statusCode: status, cause: err });
      }
    }

    if (status === 429) {
      const retryAfter = parseRetryAfter(response.headers.get('Retry-After'));
      // drain so the connection goes back to the pool
      await this.readBody(response, signal);
      log('warn', `${this.label}: rate limit exceeded. Retry after ${retryAfter} seconds`);
      if (this.autoRetry) return { status: 'rate-limited', retryAfter };
      throw this.error('RateLimitExceeded', `Rate limit exceeded. Retry after ${retryAfter} seconds`, { retryAfter });
    }

    const text = await this.readBody(response, signal);

    if (status === 404) {
      log('warn', `${this.label}: resource not found at ${url}`);
      throw this.error('NotFound', `Resource not found: ${url}`);
    }
    if (status === 401 || status === 403) {
      log('error', `${this.label}: authentication error: ${status} - ${text}`);
      throw this.error('AuthenticationFailure', `Authentication error: ${status} - ${text}`, { statusCode: status });
    }
    if (status >= 500 && status < 600) {
      log('error', `${this.label}: server error: ${status} - ${text}`);
      throw this.error('ServerFailure', `Server error: ${status} - ${text}`, { statusCode: status });
    }
    log('error', `${this.label}: API error: ${status} - ${text}`);
    throw this.error('RequestFailure', `API error: ${status} - ${text}`, { statusCode: status });
  }

  /** The body streams after the headers arrive, so it can still time out or lose the connection. */
  private async readBody(response: Response, signal: AbortSignal): Promise<string> {
    try {
      return await response.text();
    } catch (err) {
      throw this.transportError(err, signal);
    }
  }

  private transportError(err: unknown, signal: AbortSignal): ApiError {
    const message = errorMessage(err);
    if (signal.aborted || isTimeout(err)) {
      log('error', `${this.label}: request timeout: ${message}`);
      return this.error('Timeout', `Request timed out: ${message}`, { cause: err });
    }
    if (err instanceof FetchError && err.type === 'system') {
      log('error', `${this.label}: connection error: ${message}`);
      return this.error('ConnectionFailure', `Connection error: ${message}`, { cause: err });
    }
    log('error', `${this.label}: request failed: ${message}`);
    return this.error('RequestFailure', `Request failed: ${message}`, { cause: err });
  }
}

/** Later layers win; names compare case-insensitively. */
function mergeHeaders(...layers: Record<string, string>[]): Headers {
  const headers = new Headers(DEFAULT_HEADERS);
  for (const layer of layers) {
    for (const [name, value] of Object.entries(layer)) headers.set(name, value);
  }
  return headers;
}

function isTimeout(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (err.name === 'AbortError' || err.name === 'TimeoutError') return true;
  if (err instanceof FetchError) {
    if (err.type === 'request-timeout') return true;
    if (err.code !== undefined) return TIMEOUT_CODES.has(err.code);
    // node-fetch wraps body stream failures and keeps only the inner message
    return err.type === 'system' && ABORTED_BODY.test(err.message);
  }
  return isTimeout(err.cause);
}
