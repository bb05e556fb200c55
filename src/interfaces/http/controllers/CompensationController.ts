/// <reference path="../../../shared/express.d.ts" />
/**
 * Compensation Controller — HTTP Boundary for Salary Search
 * Layer: Interfaces (HTTP)
 *
 * Thin: parse the query string, call SearchService, send JSON. No search or
 * aggregation logic lives here. Arrow-function handlers keep `this` bound
 * when Express invokes them.
 *
 *   GET /api/v1/compensation/search?title=software+engineer&location=austin+tx
 *
 * Both text fields are optional; with neither, the summary covers every
 * stored record.
 */
import { SearchService } from '@application/services/SearchService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { parseRequest } from '@interfaces/http/middleware/validation';
import { DEFAULT_TECHNIQUE, SEARCH_TECHNIQUES } from '@shared/constants';
import type { Request, Response } from 'express';
import { z } from 'zod/v4';

export const searchQuerySchema = z.object({
  title: z.string().trim().default(''),
  location: z.string().trim().default(''),
  technique: z.enum(SEARCH_TECHNIQUES).default(DEFAULT_TECHNIQUE),
  limit: z.coerce.number().int().min(1).optional(),
});

export class CompensationController {
  private service: SearchService;

  constructor() {
    this.service = container.resolve<SearchService>(TOKENS.SearchService);
  }

  search = async (req: Request, res: Response): Promise<void> => {
    const input = parseRequest(searchQuerySchema, req.query);
    const result = await this.service.search(input);

    const totalTimeMs =
      req.requestStartTime != null ? Math.round(Date.now() - req.requestStartTime) : undefined;

    res.status(200).json({
      status: 'success',
      data: result.summary,
      ...(result.records !== undefined && { records: result.records }),
      ...(result.truncated !== undefined && { truncated: result.truncated }),
      meta: {
        ...result.meta,
        ...(totalTimeMs != null && { totalTimeMs }),
      },
    });
  };
}
