/**
 * Error classes for the event search service.
 *
 * Every error carries an HTTP `statusCode` and a machine-readable `code`
 * so the Fastify error handler can map it without inspecting messages.
 *
 * Stale deltas are deliberately absent: a redelivered or out-of-order
 * delta is an `ApplyOutcome`, never an exception.
 */

export abstract class AppError extends Error {
  /** HTTP status code */
  abstract readonly statusCode: number;
  /** Machine-readable error code */
  abstract readonly code: string;
  /** Optional additional details */
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

export type InvalidQueryReason =
  | 'MALFORMED_REQUEST'
  | 'TEXT_TOO_LONG'
  | 'TEXT_WITHOUT_TERMS'
  | 'INVALID_RADIUS'
  | 'INVALID_COORDINATES'
  | 'PRICE_RANGE_INVERTED'
  | 'DATE_RANGE_INVERTED'
  | 'PAGE_OUT_OF_BOUNDS'
  | 'PAGE_SIZE_OUT_OF_BOUNDS'
  | 'SORT_REQUIRES_GEO'
  | 'INVALID_CURSOR'
  | 'INVALID_PREFIX';

/**
 * Malformed or out-of-range search request - 400.
 * Never retried; always fails fast.
 */
export class InvalidQueryError extends AppError {
  readonly statusCode = 400;
  readonly code = 'INVALID_QUERY';
  readonly reason: InvalidQueryReason;
  readonly field?: string;

  constructor(reason: InvalidQueryReason, message: string, field?: string) {
    super(message, { reason, ...(field && { field }) });
    this.name = 'InvalidQueryError';
    this.reason = reason;
    this.field = field;
  }
}

/**
 * Backend timeout or failure - 503. Absorbed by retry until the budget runs out.
 */
export class TransientBackendError extends AppError {
  readonly statusCode = 503;
  readonly code = 'TRANSIENT_BACKEND_ERROR';
  readonly operation: string;

  constructor(operation: string, message: string = 'Search backend temporarily unavailable') {
    super(message, { operation });
    this.name = 'TransientBackendError';
    this.operation = operation;
  }
}

/**
 * Retry budget exhausted - 503.
 * The affected event or query is marked degraded before this surfaces.
 */
export class ExhaustedError extends AppError {
  readonly statusCode = 503;
  readonly code = 'RETRY_EXHAUSTED';
  readonly operation: string;
  readonly attempts: number;

  constructor(operation: string, attempts: number, reason: string, subject?: string) {
    super(`${operation} failed after ${attempts} attempts: ${reason}`, {
      operation,
      attempts,
      reason,
      ...(subject && { subject }),
    });
    this.name = 'ExhaustedError';
    this.operation = operation;
    this.attempts = attempts;
  }
}

/**
 * Dependency index no longer matches the stored entries - 500.
 * The cache heals itself by clearing the namespace; this never reaches a caller.
 */
export class InvalidCacheStateError extends AppError {
  readonly statusCode = 500;
  readonly code = 'INVALID_CACHE_STATE';
  readonly namespace: string;

  constructor(namespace: string, message: string) {
    super(message, { namespace });
    this.name = 'InvalidCacheStateError';
    this.namespace = namespace;
  }
}

/**
 * Not Found error - 404
 */
export class NotFoundError extends AppError {
  readonly statusCode = 404;
  readonly code = 'NOT_FOUND';
  readonly resourceType?: string;

  constructor(resourceType: string, id?: string) {
    super(id ? `${resourceType} with ID ${id} not found` : `${resourceType} not found`);
    this.name = 'NotFoundError';
    this.resourceType = resourceType;
  }
}

/**
 * Conflict error - 409
 */
export class ConflictError extends AppError {
  readonly statusCode = 409;
  readonly code = 'CONFLICT';

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'ConflictError';
  }
}

/**
 * Request was cancelled by its caller before a result was produced - 499.
 */
export class RequestCancelledError extends AppError {
  readonly statusCode = 499;
  readonly code = 'REQUEST_CANCELLED';

  constructor(message: string = 'Request cancelled') {
    super(message);
    this.name = 'RequestCancelledError';
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
