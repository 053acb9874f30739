export type ErrorCode =
  | 'FETCH_TRANSIENT'
  | 'FETCH_REJECTED'
  | 'FETCH_MALFORMED'
  | 'FETCH_FAILED'
  | 'PERSISTENCE_FAILED'
  | 'CONFIG_INVALID';

export class SyncError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Network error, timeout, 429 or 5xx. Worth another attempt. */
export class TransientFetchError extends SyncError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super('FETCH_TRANSIENT', message, options);
    this.status = status;
  }
}

/** 4xx other than 429: the same request will keep failing. */
export class RejectedRequestError extends SyncError {
  readonly status: number;

  constructor(message: string, status: number) {
    super('FETCH_REJECTED', message);
    this.status = status;
  }
}

export class MalformedResponseError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FETCH_MALFORMED', message, options);
  }
}

export type FetchWindow = { product: string; start: number; end: number };

export class FetchFailedError extends SyncError {
  readonly window: FetchWindow;
  readonly attempts: number;

  constructor(window: FetchWindow, attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('FETCH_FAILED', `unable to fetch candles after ${attempts} attempt(s): ${reason}`, { cause });
    this.window = window;
    this.attempts = attempts;
  }
}

export class PersistenceError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE_FAILED', message, options);
  }
}

export class ConfigurationError extends SyncError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
  }
}

export function isRetryable(err: unknown): boolean {
  return !(err instanceof RejectedRequestError);
}
