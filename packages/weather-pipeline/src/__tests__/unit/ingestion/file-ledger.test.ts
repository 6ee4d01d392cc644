/**
 * File Ledger Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { SQLiteAdapter } from '../../../persistence/adapters/sqlite.js';
import { FileLedger } from '../../../ingestion/file-ledger.js';
import { createTestDatabase, FIXED_NOW } from '../../fixtures/database.js';

const COUNTS = { accepted: 98, skipped: 1, rejected: 1, blank: 0 };

let adapter: SQLiteAdapter;
let ledger: FileLedger;

beforeEach(async () => {
  ({ adapter } = await createTestDatabase());
  ledger = new FileLedger(adapter, FIXED_NOW);
});

afterEach(async () => {
  await adapter.close();
});

describe('FileLedger', () => {
  it('records a discovered file once', async () => {
    await ledger.markDiscovered('S1.txt', 'S1');
    await ledger.markDiscovered('S1.txt', 'S1');

    expect(await ledger.get('S1.txt')).toEqual({
      fileName: 'S1.txt',
      stationId: 'S1',
      state: 'discovered',
      attemptCount: 0,
      acceptedLines: 0,
      skippedLines: 0,
      rejectedLines: 0,
      lastError: null,
      ingestRunId: null,
      firstSeenAt: '2024-03-01T00:00:00.000Z',
      updatedAt: '2024-03-01T00:00:00.000Z',
      archivedAt: null,
    });
  });

  it('counts attempts across a failure and a retry', async () => {
    await ledger.markDiscovered('S1.txt', 'S1');
    await ledger.markProcessing('S1.txt', 'run-a');
    await ledger.markFailed('S1.txt', 'disk full', { ...COUNTS, accepted: 49 });

    const failed = await ledger.get('S1.txt');
    expect(failed).toMatchObject({
      state: 'failed_retryable',
      attemptCount: 1,
      acceptedLines: 49,
      lastError: 'disk full',
      ingestRunId: 'run-a',
    });

    await ledger.markProcessing('S1.txt', 'run-b');
    await ledger.markArchived('S1.txt', COUNTS);

    expect(await ledger.get('S1.txt')).toMatchObject({
      state: 'archived',
      attemptCount: 2,
      acceptedLines: 98,
      skippedLines: 1,
      rejectedLines: 1,
      lastError: null,
      ingestRunId: 'run-b',
      archivedAt: '2024-03-01T00:00:00.000Z',
    });
  });

  it('lists by state and reports totals', async () => {
    await ledger.markDiscovered('A.txt', 'A');
    await ledger.markDiscovered('B.txt', 'B');
    await ledger.markProcessing('B.txt', 'run-a');
    await ledger.markFailed('B.txt', 'boom', COUNTS);

    expect((await ledger.list()).map((r) => r.fileName)).toEqual(['A.txt', 'B.txt']);
    expect((await ledger.list('failed_retryable')).map((r) => r.fileName)).toEqual(['B.txt']);
    expect(await ledger.getStats()).toEqual({
      total: 2,
      byState: { discovered: 1, processing: 0, archived: 0, failed_retryable: 1, unprocessable: 0 },
    });
  });

  it('returns null for unknown files', async () => {
    expect(await ledger.get('missing.txt')).toBeNull();
  });
});
