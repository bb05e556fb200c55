/**
 * Integration Tests — Ingestion Endpoint
 *
 *   POST /api/v1/ingest { filePath, force? }
 *
 * The repository is in memory and the ETL runner is a stub that reports a
 * fixed result, so no worker thread or database is involved.
 */
import { TOKENS } from '@core/types';
import type { ICompensationRepository } from '@domain/interfaces/ICompensationRepository';
import { createRejectionTally } from '@domain/entities/Rejection';
import { destroyDbConnection } from '@infrastructure/database/connection';
import type { IngestionResult } from '@shared/types';
import type { EtlRunner } from '@workers/etl/runEtlWorker';
import type { Express } from 'express';
import fs from 'fs';
import os from 'os';
import path from 'path';
import request from 'supertest';
import { container } from 'tsyringe';

import { sampleRecords, testPayUnitPolicy } from '../helpers/fixtures';
import { InMemoryCompensationRepository } from '../helpers/InMemoryCompensationRepository';

const result: IngestionResult = {
  totalProcessed: 4,
  totalInserted: 3,
  totalRejected: 1,
  rejections: { ...createRejectionTally(), MISSING_OR_INVALID_SALARY: 1 },
  durationMs: 12,
};

let app: Express;
let dir: string;
let workbook: string;
const runner: jest.MockedFunction<EtlRunner> = jest.fn();

beforeAll(async () => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ingest-http-'));
  workbook = path.join(dir, 'wages.xlsx');
  fs.writeFileSync(workbook, 'placeholder');

  await import('@core/container');

  container.register<ICompensationRepository>(TOKENS.CompensationRepository, {
    useValue: new InMemoryCompensationRepository(testPayUnitPolicy, sampleRecords),
  });
  container.register<EtlRunner>(TOKENS.EtlRunner, { useValue: runner });

  const { createApp } = await import('@interfaces/http/app');
  app = createApp();
});

afterAll(async () => {
  fs.rmSync(dir, { recursive: true, force: true });
  await destroyDbConnection();
});

beforeEach(() => {
  runner.mockReset();
  runner.mockResolvedValue(result);
});

describe('POST /api/v1/ingest', () => {
  it('should return 400 when filePath is missing', async () => {
    const res = await request(app).post('/api/v1/ingest').send({});

    expect(res.status).toBe(400);
    expect(res.body.status).toBe('error');
    expect(res.body.message).toMatch(/^filePath: /);
  });

  it('should return 404 when the file does not exist', async () => {
    const missing = path.join(dir, 'missing.xlsx');

    const res = await request(app).post('/api/v1/ingest').send({ filePath: missing });

    expect(res.status).toBe(404);
    expect(res.body.message).toBe(`Source file not found: ${missing}`);
  });

  it('should return 409 when the store is already loaded', async () => {
    const res = await request(app).post('/api/v1/ingest').send({ filePath: workbook });

    expect(res.status).toBe(409);
    expect(runner).not.toHaveBeenCalled();
  });

  it('should reload with force and return the ingestion result', async () => {
    const res = await request(app)
      .post('/api/v1/ingest')
      .send({ filePath: workbook, force: true });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'success', data: result });
    expect(runner).toHaveBeenCalledWith(
      expect.objectContaining({ filePath: workbook }),
      expect.any(Function),
    );
  });

  it('should load once and return 409 to an overlapping request', async () => {
    runner.mockImplementation(
      () => new Promise<IngestionResult>((resolve) => setTimeout(() => resolve(result), 200)),
    );

    const responses = await Promise.all([
      request(app).post('/api/v1/ingest').send({ filePath: workbook, force: true }),
      request(app).post('/api/v1/ingest').send({ filePath: workbook, force: true }),
    ]);

    expect(responses.map((res) => res.status).sort()).toEqual([200, 409]);
    expect(runner).toHaveBeenCalledTimes(1);
  });
});
