/**
 * Application errors.
 *
 * Every failure that crosses a module boundary is an AppError, so the
 * HTTP layer and the job runner can report it by code.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'CANCELLED'
  | 'UPSTREAM_API_ERROR'
  | 'DATABASE_ERROR'
  | 'INTERNAL_ERROR';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

/** Malformed required field; aborts the affected page. */
export class ValidationError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('VALIDATION_ERROR', message, 400, options);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super('CONFLICT', message, 409);
    this.name = 'ConflictError';
  }
}

export class CancelledError extends AppError {
  constructor(message = 'Operation cancelled') {
    super('CANCELLED', message, 499);
    this.name = 'CancelledError';
  }
}

/** HTTP or network failure talking to the ratings feed. */
export class UpstreamError extends AppError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super('UPSTREAM_API_ERROR', message, 502, options);
    this.name = 'UpstreamError';
  }
}

/** Transaction failure; nothing from the batch was written. */
export class StoreError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DATABASE_ERROR', message, 500, options);
    this.name = 'StoreError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Normalizes anything thrown into an AppError, keeping the original as cause.
 */
export function toAppError(err: unknown): AppError {
  if (err instanceof AppError) return err;
  return new AppError('INTERNAL_ERROR', errorMessage(err), 500, { cause: err });
}
