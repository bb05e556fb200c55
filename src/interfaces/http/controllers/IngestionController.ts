/**
 * Ingestion Controller — HTTP Trigger for the ETL Pipeline
 * Layer: Interfaces (HTTP)
 *
 * Validates the body ({ filePath, force? }) and hands the path to
 * IngestionService, which runs the worker thread. The seed
 * script is the usual way to load data; this endpoint is for remote triggers
 * and should sit behind admin authentication in a real deployment.
 */
import { IngestionService } from '@application/services/IngestionService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { parseRequest } from '@interfaces/http/middleware/validation';
import type { Request, Response } from 'express';
import { z } from 'zod/v4';

export const ingestBodySchema = z.object({
  filePath: z.string().trim().min(1, 'filePath is required in the request body'),
  force: z.boolean().default(false),
});

export class IngestionController {
  private service: IngestionService;

  constructor() {
    this.service = container.resolve<IngestionService>(TOKENS.IngestionService);
  }

  ingest = async (req: Request, res: Response): Promise<void> => {
    const { filePath, force } = parseRequest(ingestBodySchema, req.body);
    const result = await this.service.ingest(filePath, { force });
    res.status(200).json({ status: 'success', data: result });
  };
}
