// src/errors.ts
// What: Typed error taxonomy shared by ingestion, ranking and summaries.
// How: Every error carries a stable `code` (used as the ingestion reason code and in HTTP bodies)
//      and the HTTP status the central error handler responds with.

export type ErrorCode =
  | 'ExtractionError'
  | 'EmptyContentError'
  | 'ProviderUnavailable'
  | 'ProviderAuthError'
  | 'TransientProviderError'
  | 'DataIntegrityError'
  | 'InvalidInput'
  | 'NotFound';

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly status: number;
  constructor(code: ErrorCode, status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = code;
    this.code = code;
    this.status = status;
  }
}

/** Source bytes could not be turned into text (corrupt or unreadable file). */
export class ExtractionError extends AppError {
  readonly stderr?: string;
  constructor(message: string, options?: { cause?: unknown; stderr?: string }) {
    super('ExtractionError', 422, message, options);
    this.stderr = options?.stderr;
  }
}

export class EmptyContentError extends AppError {
  constructor(message = 'No text could be extracted') {
    super('EmptyContentError', 422, message);
  }
}

/** Provider still failing after the retry policy gave up. */
export class ProviderUnavailable extends AppError {
  readonly attempts: number;
  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super('ProviderUnavailable', 503, message, options);
    this.attempts = attempts;
  }
}

/** Credentials or permissions are wrong; a configuration problem, so ingestion halts. */
export class ProviderAuthError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ProviderAuthError', 500, message, options);
  }
}

// Marker for failures worth retrying (rate limit, timeout, 5xx). Never leaves the retry loop as-is.
export class TransientProviderError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TransientProviderError', 503, message, options);
  }
}

export class DataIntegrityError extends AppError {
  constructor(message: string) {
    super('DataIntegrityError', 500, message);
  }
}

export class InvalidInput extends AppError {
  constructor(message: string) {
    super('InvalidInput', 400, message);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NotFound', 404, message);
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
