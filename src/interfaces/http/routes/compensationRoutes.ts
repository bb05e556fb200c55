/**
 * Compensation Routes
 * Layer: Interfaces (HTTP)
 *
 * Mounted under `/api/v1/compensation` in app.ts:
 *
 *   GET /api/v1/compensation/search?title=...&location=...  →  controller.search
 */
import { CompensationController } from '@interfaces/http/controllers/CompensationController';
import { Router } from 'express';

const router = Router();
const controller = new CompensationController();

router.get('/search', controller.search);

export { router as compensationRoutes };
