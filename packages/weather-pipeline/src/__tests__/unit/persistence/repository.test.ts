/**
 * Weather Repository Tests
 *
 * Tests run against in-memory SQLite.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { AggregationRecord } from '../../../core/types.js';
import { ConstraintViolationError } from '../../../core/errors.js';
import type { SQLiteAdapter } from '../../../persistence/adapters/sqlite.js';
import { assertRawBounds, WeatherRepository } from '../../../persistence/repository.js';
import { createTestDatabase, makeFact } from '../../fixtures/database.js';

let adapter: SQLiteAdapter;
let repo: WeatherRepository;

beforeEach(async () => {
  ({ adapter, repo } = await createTestDatabase());
  await repo.ensureStation('TEST001');
});

afterEach(async () => {
  await adapter.close();
});

describe('WeatherRepository - Stations', () => {
  it('creates a placeholder station when no metadata is known', async () => {
    const inserted = await repo.ensureStation('USC00999999');
    const station = await repo.getStation('USC00999999');

    expect(inserted).toBe(true);
    expect(station).toMatchObject({
      stationId: 'USC00999999',
      name: 'Weather Station USC00999999',
      latitude: null,
      longitude: null,
      elevation: null,
      state: 'XX',
      country: 'USA',
      timezone: 'UTC',
      active: true,
    });
  });

  it('stores reference metadata when supplied', async () => {
    await repo.ensureStation('USC00110072', {
      name: 'Lincoln Municipal Airport',
      latitude: 40.85,
      longitude: -96.75,
      elevation: 362,
      state: 'NE',
    });

    const station = await repo.getStation('USC00110072');
    expect(station?.name).toBe('Lincoln Municipal Airport');
    expect(station?.latitude).toBe(40.85);
    expect(station?.state).toBe('NE');
  });

  it('leaves an existing station untouched', async () => {
    const inserted = await repo.ensureStation('TEST001', {
      name: 'Renamed',
      latitude: 1,
      longitude: 1,
      elevation: null,
      state: 'NE',
    });

    expect(inserted).toBe(false);
    expect((await repo.getStation('TEST001'))?.name).toBe('Weather Station TEST001');
  });

  it('rejects invalid metadata before writing', async () => {
    await expect(
      repo.ensureStation('BAD1', {
        name: 'Nowhere',
        latitude: 91,
        longitude: 0,
        elevation: null,
        state: 'NE',
      })
    ).rejects.toThrow('Invalid metadata for station BAD1: latitude: Latitude must be <= 90');

    expect(await repo.getStation('BAD1')).toBeNull();
  });

  it('rejects station ids that are not path-safe', async () => {
    await expect(repo.ensureStation('bad id!')).rejects.toThrow(/Invalid station id/);
  });

  it('lists stations ordered by id', async () => {
    await repo.ensureStation('AAA');
    const ids = (await repo.listStations()).map((s) => s.stationId);
    expect(ids).toEqual(['AAA', 'TEST001']);
  });
});

describe('WeatherRepository - Facts', () => {
  it('round-trips a fact', async () => {
    const fact = makeFact({ qualityScore: 0.8, dataQuality: 'good', rawPrecip: null, precipMm: null, precipCm: null });
    await repo.upsertFact(fact);

    expect(await repo.getFact('TEST001', '2020-01-01', 'manual')).toEqual(fact);
  });

  it('replaces every non-key column on conflict', async () => {
    await repo.upsertFact(makeFact());
    const replacement = makeFact({
      rawMaxTemp: 150,
      maxTempC: 15,
      qualityNotes: null,
      ingestRunId: 'run-second',
      ingestedAt: '2024-04-01T00:00:00.000Z',
    });
    await repo.upsertFact(replacement);

    expect(await repo.countFacts()).toBe(1);
    expect(await repo.getFact('TEST001', '2020-01-01', 'manual')).toEqual(replacement);
  });

  it('keeps facts from different sources apart', async () => {
    await repo.upsertFact(makeFact());
    await repo.upsertFact(makeFact({ source: 'ghcn' }));

    expect(await repo.countFacts()).toBe(2);
    expect(await repo.countFacts({ source: 'ghcn' })).toBe(1);
  });

  it('rejects a raw value outside the admitted range without writing', async () => {
    await expect(repo.upsertFact(makeFact({ rawMaxTemp: 99999 }))).rejects.toBeInstanceOf(
      ConstraintViolationError
    );
    await expect(repo.upsertFact(makeFact({ rawPrecip: -1 }))).rejects.toThrow(
      'raw_precip=-1 outside allowed range [0, 10000]'
    );

    expect(await repo.countFacts()).toBe(0);
  });

  it('admits values on the range limits', async () => {
    await repo.upsertFact(makeFact({ rawMaxTemp: 6000, rawMinTemp: -9998, rawPrecip: 10000 }));
    expect(await repo.countFacts()).toBe(1);
  });

  it('refuses facts for unknown stations', async () => {
    await expect(repo.upsertFact(makeFact({ stationId: 'GHOST' }))).rejects.toThrow();
  });

  it('filters and pages facts in key order', async () => {
    for (const day of ['03', '01', '02', '04']) {
      await repo.upsertFact(makeFact({ observationDate: `2020-01-${day}` }));
    }

    const range = await repo.listFacts({ from: '2020-01-02', to: '2020-01-03' });
    expect(range.map((f) => f.observationDate)).toEqual(['2020-01-02', '2020-01-03']);

    const page = await repo.listFacts({ limit: 2, offset: 1 });
    expect(page.map((f) => f.observationDate)).toEqual(['2020-01-02', '2020-01-03']);
  });

  it('summarizes stations, facts and the quality distribution', async () => {
    await repo.upsertFact(makeFact({ observationDate: '2020-01-01', dataQuality: 'good', qualityScore: 0.8 }));
    await repo.upsertFact(makeFact({ observationDate: '2020-01-02', dataQuality: 'good', qualityScore: 0.7 }));
    await repo.upsertFact(makeFact({ observationDate: '2020-01-03', dataQuality: 'poor', qualityScore: 0.4 }));

    expect(await repo.getIngestionSummary()).toEqual({
      stations: 1,
      weatherFacts: 3,
      qualityDistribution: { excellent: 0, good: 2, fair: 0, poor: 1 },
    });
  });
});

describe('assertRawBounds', () => {
  it('ignores missing values', () => {
    expect(() => assertRawBounds(makeFact({ rawMaxTemp: null, rawMinTemp: null, rawPrecip: null }))).not.toThrow();
  });

  it('carries the offending field and bounds', () => {
    try {
      assertRawBounds(makeFact({ rawMinTemp: 6001 }));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConstraintViolationError);
      expect(error).toMatchObject({ field: 'raw_min_temp', value: 6001, min: -9999, max: 6000 });
    }
  });
});

describe('WeatherRepository - Aggregates', () => {
  function annual(stationId: string, year: number): AggregationRecord {
    return {
      stationId,
      granularity: 'annual',
      periodStart: `${year}-01-01`,
      year,
      month: null,
      quarter: null,
      avgMaxTempC: 11,
      avgMinTempC: 2,
      totalPrecipMm: 3.5,
      recordCount: 2,
      avgQualityScore: 0.9,
    };
  }

  it('replaces all rows of a granularity', async () => {
    await repo.replaceAggregates('annual', [annual('TEST001', 2020), annual('TEST001', 2021)]);
    const written = await repo.replaceAggregates('annual', [annual('TEST001', 2022)]);

    expect(written).toBe(1);
    expect(await repo.getAggregates('annual')).toEqual([annual('TEST001', 2022)]);
  });

  it('keeps the previous rows when a replacement fails', async () => {
    const original = [annual('TEST001', 2020), annual('TEST001', 2021)];
    await repo.replaceAggregates('annual', original);

    const mismatched: AggregationRecord = { ...annual('TEST001', 2022), granularity: 'monthly', month: 1 };
    await expect(
      repo.replaceAggregates('annual', [annual('TEST001', 2023), mismatched])
    ).rejects.toThrow(/expected annual/);

    expect(await repo.getAggregates('annual')).toEqual(original);
  });

  it('filters aggregates by station', async () => {
    await repo.replaceAggregates('annual', [annual('AAA', 2020), annual('TEST001', 2020)]);

    expect(await repo.getAggregates('annual', 'AAA')).toEqual([annual('AAA', 2020)]);
    expect(await repo.getAggregates('monthly')).toEqual([]);
  });
});
