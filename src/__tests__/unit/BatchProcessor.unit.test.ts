/**
 * Unit Tests — BatchProcessor
 *
 * The repository is a jest mock whose bulkInsert reports the batch size.
 * Retry delays are zero so backoff does not slow the suite.
 */
import type { CompensationRecord } from '@domain/entities/CompensationRecord';
import { BatchProcessor, isRetryableConnectionError } from '@workers/etl/batchProcessor';

import { record } from '../helpers/fixtures';
import { createMockRepository, type MockCompensationRepository } from '../helpers/mockRepository';

const records = [
  record('Engineer', 100000, 'YEARLY', 'Austin', 'Texas'),
  record('Analyst', 40, 'HOURLY', 'Denver', 'Colorado'),
  record('Nurse', 2000, 'WEEKLY', 'Boston', 'Massachusetts'),
];

function connectionReset(): Error {
  return Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' });
}

describe('BatchProcessor', () => {
  let repo: MockCompensationRepository;

  beforeEach(() => {
    repo = createMockRepository();
    repo.bulkInsert.mockImplementation(async (batch: readonly CompensationRecord[]) => batch.length);
  });

  it('should write a batch as soon as it is full and the rest on flush', async () => {
    const processor = new BatchProcessor(repo, 2, { retryDelayMs: 0 });

    for (const r of records) await processor.add(r);
    expect(repo.bulkInsert).toHaveBeenCalledTimes(1);
    expect(repo.bulkInsert).toHaveBeenLastCalledWith([records[0], records[1]]);

    await processor.flush();
    expect(repo.bulkInsert).toHaveBeenCalledTimes(2);
    expect(repo.bulkInsert).toHaveBeenLastCalledWith([records[2]]);
    expect(processor.inserted).toBe(3);
  });

  it('should not write anything when flushing an empty buffer', async () => {
    const processor = new BatchProcessor(repo, 10);

    await processor.flush();

    expect(repo.bulkInsert).not.toHaveBeenCalled();
    expect(processor.inserted).toBe(0);
  });

  it('should retry a batch after a connection error', async () => {
    repo.bulkInsert.mockRejectedValueOnce(connectionReset());
    const processor = new BatchProcessor(repo, 10, { retryDelayMs: 0 });

    await processor.add(records[0]);
    await processor.flush();

    expect(repo.bulkInsert).toHaveBeenCalledTimes(2);
    expect(processor.inserted).toBe(1);
  });

  it('should give up after the configured number of attempts', async () => {
    repo.bulkInsert.mockRejectedValue(connectionReset());
    const processor = new BatchProcessor(repo, 10, { retryAttempts: 3, retryDelayMs: 0 });

    await processor.add(records[0]);

    await expect(processor.flush()).rejects.toThrow('read ECONNRESET');
    expect(repo.bulkInsert).toHaveBeenCalledTimes(3);
  });

  it('should propagate other errors without retrying', async () => {
    repo.bulkInsert.mockRejectedValueOnce(new Error('value too long for type character varying'));
    const processor = new BatchProcessor(repo, 10, { retryDelayMs: 0 });

    await processor.add(records[0]);

    await expect(processor.flush()).rejects.toThrow('value too long');
    expect(repo.bulkInsert).toHaveBeenCalledTimes(1);
  });

  it('should keep accepting batches after a failed flush', async () => {
    repo.bulkInsert.mockRejectedValueOnce(new Error('check constraint violated'));
    const processor = new BatchProcessor(repo, 10, { retryDelayMs: 0 });

    await processor.add(records[0]);
    await expect(processor.flush()).rejects.toThrow('check constraint violated');

    await processor.add(records[1]);
    await processor.flush();

    expect(repo.bulkInsert).toHaveBeenLastCalledWith([records[1]]);
    expect(processor.inserted).toBe(1);
  });
});

describe('isRetryableConnectionError', () => {
  it('should recognise connection error codes', () => {
    expect(isRetryableConnectionError(connectionReset())).toBe(true);
    expect(
      isRetryableConnectionError(
        Object.assign(new Error('terminating connection due to administrator command'), {
          code: '57P01',
        }),
      ),
    ).toBe(true);
  });

  it('should recognise connection error messages', () => {
    expect(isRetryableConnectionError(new Error('Connection terminated unexpectedly'))).toBe(true);
    expect(
      isRetryableConnectionError(
        new Error('Knex: Timeout acquiring a connection. The pool is probably full.'),
      ),
    ).toBe(true);
  });

  it('should reject everything else', () => {
    expect(isRetryableConnectionError(new Error('syntax error at or near "FROM"'))).toBe(false);
    expect(isRetryableConnectionError('ECONNRESET')).toBe(false);
  });
});
