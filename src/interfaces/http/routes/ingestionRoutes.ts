/**
 * Ingestion Routes
 * Layer: Interfaces (HTTP)
 *
 *   POST /api/v1/ingest  { "filePath": "./temp/wage_disclosures.xlsx", "force": false }
 *
 * Mounted under `/api/v1`. The seed script is the usual loader; this route is
 * for triggering a load remotely.
 */
import { IngestionController } from '@interfaces/http/controllers/IngestionController';
import { Router } from 'express';

const router = Router();
const controller = new IngestionController();

router.post('/ingest', controller.ingest);

export { router as ingestionRoutes };
