/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * Registered last. Express 5 forwards rejected promises from async handlers
 * here, so controllers simply throw.
 *
 *   - AppError (ValidationError, NotFoundError, ConflictError, IngestionError):
 *     logged at warn, answered with its statusCode and message.
 *   - Anything else is a bug: logged at error with the stack, answered with a
 *     generic 500 that leaks nothing.
 *
 * Express only treats a middleware as an error handler when it declares all
 * four parameters.
 */
import { logger } from '@core/logger';
import { AppError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';
export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError) {
    logger.warn({ statusCode: err.statusCode, message: err.message }, 'Operational error');
    res.status(err.statusCode).json({
      status: 'error',
      message: err.message,
    });
    return;
  }

  logger.error({ err }, 'Unhandled error');
  res.status(500).json({
    status: 'error',
    message: 'Internal server error',
  });
}
