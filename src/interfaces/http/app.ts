/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Returns a new app per call: each cluster worker builds its own, and
 * integration tests build one after overriding container registrations.
 *
 * Middleware order:
 *   1. requestTimer   — req.requestStartTime for meta.totalTimeMs
 *   2. helmet / cors / compression
 *   3. express.json   — POST /ingest body
 *   4. requestLogger  — pino-http
 *   5. routes         — /health, /compensation/search, /ingest
 *   6. errorHandler   — last, catches everything above
 *
 * The side-effect import of '@core/container' bootstraps DI before any route
 * module resolves a controller's service.
 */
import '@core/container';

import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { requestTimer } from '@interfaces/http/middleware/requestTimer';
import { compensationRoutes } from '@interfaces/http/routes/compensationRoutes';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import { ingestionRoutes } from '@interfaces/http/routes/ingestionRoutes';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

export function createApp(): express.Express {
  const app = express();

  // Request timing (must be first)
  app.use(requestTimer);

  // Security & compression
  app.use(helmet());
  app.use(cors());
  app.use(compression());

  // Body parsing
  app.use(express.json());

  // Request logging
  app.use(requestLogger);

  // Routes
  app.use('/api/v1', healthRoutes);
  app.use('/api/v1/compensation', compensationRoutes);
  app.use('/api/v1', ingestionRoutes);

  // Global error handler (must be registered last)
  app.use(errorHandler);

  return app;
}
