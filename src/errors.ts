/**
 * Error kinds raised by the cache, the orchestrator and the wiki client.
 * The HTTP layer maps each `code` onto a status.
 */
export type WikiCacheErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_ARGUMENT'
  | 'UPSTREAM_UNAVAILABLE'
  | 'CACHE_UNAVAILABLE'
  | 'CODEC';

export class WikiCacheError extends Error {
  public readonly code: WikiCacheErrorCode;

  constructor(code: WikiCacheErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotFoundError extends WikiCacheError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('NOT_FOUND', message, options);
  }
}

export class InvalidArgumentError extends WikiCacheError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_ARGUMENT', message, options);
  }
}

/** The wiki could not be reached or answered with a failure. */
export class UpstreamUnavailableError extends WikiCacheError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UPSTREAM_UNAVAILABLE', message, options);
  }
}

/** Every cache tier failed the same operation. */
export class CacheUnavailableError extends WikiCacheError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CACHE_UNAVAILABLE', message, options);
  }
}

export class CodecError extends WikiCacheError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CODEC', message, options);
  }
}

export const isWikiCacheError = (error: unknown): error is WikiCacheError =>
  error instanceof WikiCacheError;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
