// Error taxonomy shared by every catalog client.
//
// A single error class carries two independent classification axes: the
// generic `kind` (with a small is-a hierarchy) and an optional `vendor` tag.
// Callers filter on whichever axis they care about.

export type ErrorKind =
  | 'ConnectionFailure'
  | 'Timeout'
  | 'AuthenticationFailure'
  | 'RequestFailure'
  | 'ResponseParseFailure'
  | 'RateLimitExceeded'
  | 'NotFound'
  | 'ServerFailure'
  | 'ClientConfigurationFailure'
  | 'ResourceUnavailable';

export type Vendor = 'tvdb' | 'tmdb' | 'tvmaze' | 'anidb' | 'musicbrainz' | 'llm';

export const VENDORS: readonly Vendor[] = ['tvdb', 'tmdb', 'tvmaze', 'anidb', 'musicbrainz', 'llm'];

/** Parent of each kind that refines another one. */
const PARENT: Partial<Record<ErrorKind, ErrorKind>> = {
  Timeout: 'ConnectionFailure',
  NotFound: 'RequestFailure',
};

const DEFAULT_STATUS: Partial<Record<ErrorKind, number>> = {
  RateLimitExceeded: 429,
  NotFound: 404,
};

export interface ApiErrorOptions {
  statusCode?: number;
  vendor?: Vendor | null;
  /** Seconds to wait before retrying, for RateLimitExceeded. */
  retryAfter?: number;
  /** Identifier of the missing resource, for NotFound. */
  resourceId?: string;
  /** Vendor-specific context such as the failed search query. */
  detail?: Record<string, string | number | null>;
  cause?: unknown;
}

export class ApiError extends Error {
  readonly kind: ErrorKind;
  readonly statusCode?: number;
  readonly vendor: Vendor | null;
  readonly retryAfter?: number;
  readonly resourceId?: string;
  readonly detail?: Record<string, string | number | null>;

  constructor(kind: ErrorKind, message: string, options: ApiErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ApiError';
    this.kind = kind;
    this.statusCode = options.statusCode ?? DEFAULT_STATUS[kind];
    this.vendor = options.vendor ?? null;
    this.retryAfter = options.retryAfter;
    this.resourceId = options.resourceId;
    this.detail = options.detail;
  }

  /** Same error, re-tagged for a vendor. The original tag wins if already set. */
  withVendor(vendor: Vendor): ApiError {
    if (this.vendor) return this;
    return new ApiError(this.kind, this.message, {
      statusCode: this.statusCode,
      vendor,
      retryAfter: this.retryAfter,
      resourceId: this.resourceId,
      detail: this.detail,
      cause: this.cause,
    });
  }
}

/** True when `kind` equals `ancestor` or refines it. */
export function kindIsA(kind: ErrorKind, ancestor: ErrorKind): boolean {
  let current: ErrorKind | undefined = kind;
  while (current) {
    if (current === ancestor) return true;
    current = PARENT[current];
  }
  return false;
}

export function isApiError(err: unknown): err is ApiError {
  return err instanceof ApiError;
}

export function isErrorKind(err: unknown, kind: ErrorKind): err is ApiError {
  return isApiError(err) && kindIsA(err.kind, kind);
}

export function isVendorError(err: unknown, vendor?: Vendor): err is ApiError {
  if (!isApiError(err) || err.vendor === null) return false;
  return vendor === undefined || err.vendor === vendor;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
