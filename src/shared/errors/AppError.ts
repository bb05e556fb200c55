/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Operational errors (bad request parameters, a missing source file, a store
 * that is already loaded, a failed ingestion) carry the HTTP status the error
 * handler should answer with. Anything that is not an AppError is treated as a
 * programmer error and answered with a generic 500.
 *
 * Row-level problems in the source data are never errors: the normalization
 * pipeline tallies them as rejections instead.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for subclasses when compiled to older targets.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier: string) {
    super(`${resource} not found: ${identifier}`, 404);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

/** The ETL run failed: the worker crashed or the store rejected a batch. */
export class IngestionError extends AppError {
  constructor(message: string) {
    super(`Ingestion failed: ${message}`, 500);
  }
}
