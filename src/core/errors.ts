/**
 * Failure taxonomy of a run.
 *
 * Only ConfigurationError and StateStoreError end a run early; LockContentionError
 * ends it cleanly before anything is touched. The remaining errors are caught per
 * source, per post or per media item and only logged.
 */
export class RelayError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
  }
}

export class LockContentionError extends RelayError {
  constructor(public lockFilePath: string, public ownerPid: number) {
    super(`Already running (pid ${ownerPid} holds ${lockFilePath})`, 'LOCK_CONTENTION', {
      lockFilePath,
      ownerPid
    });
  }
}

export class FetchError extends RelayError {
  constructor(
    message: string,
    public status?: number,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, 'FETCH_FAILED', { ...details, status }, options);
  }
}

export class TransformError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'TRANSFORM_FAILED', details, options);
  }
}

export class DeliveryError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'DELIVERY_FAILED', details, options);
  }
}

export class StateStoreError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'STATE_IO', details, options);
  }
}

/**
 * Errors raised by Node internals can come from another realm (Jest runs each
 * suite in its own context), where `instanceof Error` is false. Every helper
 * below inspects the shape instead.
 */
function errorLike(error: unknown): error is { name?: unknown; message?: unknown; code?: unknown; cause?: unknown } {
  return typeof error === 'object' && error !== null;
}

export function errorMessage(error: unknown): string {
  if (errorLike(error) && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Timeouts are routine for federated instances and are logged as warnings
 * rather than errors.
 */
export function isTimeoutError(error: unknown): boolean {
  if (!errorLike(error)) {
    return false;
  }
  if (error.name === 'TimeoutError' || error.name === 'AbortError') {
    return true;
  }
  if (typeof error.message === 'string' && /timed out|timeout/i.test(error.message)) {
    return true;
  }
  return error.cause !== undefined && isTimeoutError(error.cause);
}

export function errnoCode(error: unknown): string | undefined {
  if (errorLike(error) && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
