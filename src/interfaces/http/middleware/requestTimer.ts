/// <reference path="../../../shared/express.d.ts" />
/**
 * Request Timer Middleware
 * Layer: Interfaces (HTTP)
 *
 * Stamps req.requestStartTime on arrival; the compensation controller turns it
 * into meta.totalTimeMs. Registered first so the measurement covers body
 * parsing and logging as well.
 */
import type { NextFunction, Request, Response } from 'express';

export function requestTimer(req: Request, _res: Response, next: NextFunction): void {
  req.requestStartTime = Date.now();
  next();
}
