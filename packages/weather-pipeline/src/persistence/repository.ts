/**
 * Weather Database Repository
 *
 * Type-safe database operations for stations, weather facts and
 * materialized aggregates. Works with both SQLite (better-sqlite3) and
 * PostgreSQL (pg) through the DatabaseAdapter contract; the SQL here is
 * written once and never branches on the backend.
 *
 * Design principles:
 *   1. All queries return strongly-typed results
 *   2. One fact per (station_id, observation_date, source), replaced in full
 *   3. Raw bounds checked before a row is admitted
 *   4. Transactions for multi-row replacements
 */

import type {
  AggregationRecord,
  Granularity,
  QualityTier,
  Station,
  StationMetadata,
  WeatherFact,
} from '../core/types.js';
import { ConstraintViolationError } from '../core/errors.js';
import { StationIdSchema, validateStationMetadata } from '../core/validation.js';
import type {
  AggregateRow,
  StationRow,
  WeatherFactRow,
} from './schema.types.js';
import {
  FACT_KEY_COLUMNS,
  FACT_VALUE_COLUMNS,
  factToParams,
  isQualityTier,
  nowISO8601,
  toAggregationRecord,
  toStation,
  toWeatherFact,
} from './schema.types.js';

// ============================================================================
// Database Adapter Interface - Supports SQLite and PostgreSQL
// ============================================================================

/**
 * Unified database interface for SQLite and PostgreSQL.
 * Implementations handle driver-specific details.
 */
export interface DatabaseAdapter {
  /**
   * Execute query returning single row or null.
   */
  queryOne<T>(sql: string, params?: ReadonlyArray<unknown>): Promise<T | null>;

  /**
   * Execute query returning multiple rows.
   */
  queryMany<T>(sql: string, params?: ReadonlyArray<unknown>): Promise<ReadonlyArray<T>>;

  /**
   * Execute statement (INSERT, UPDATE, DELETE).
   * Returns number of affected rows.
   */
  execute(sql: string, params?: ReadonlyArray<unknown>): Promise<number>;

  /**
   * Execute transaction with automatic rollback on error.
   */
  transaction<T>(fn: () => Promise<T>): Promise<T>;

  /**
   * Close database connection.
   */
  close(): Promise<void>;
}

// ============================================================================
// Raw Value Bounds
// ============================================================================

/**
 * Inclusive bounds on raw tenths-of-unit values. Mirrors the CHECK
 * constraints in schema.sql.
 */
export const RAW_BOUNDS = {
  raw_max_temp: { min: -9999, max: 6000 },
  raw_min_temp: { min: -9999, max: 6000 },
  raw_precip: { min: 0, max: 10000 },
} as const;

/**
 * Throw if any raw value of the fact falls outside RAW_BOUNDS
 *
 * @throws ConstraintViolationError
 */
export function assertRawBounds(fact: WeatherFact): void {
  const checks: ReadonlyArray<readonly [keyof typeof RAW_BOUNDS, number | null]> = [
    ['raw_max_temp', fact.rawMaxTemp],
    ['raw_min_temp', fact.rawMinTemp],
    ['raw_precip', fact.rawPrecip],
  ];

  for (const [field, value] of checks) {
    if (value === null) continue;
    const { min, max } = RAW_BOUNDS[field];
    if (!Number.isInteger(value) || value < min || value > max) {
      throw new ConstraintViolationError(field, value, min, max);
    }
  }
}

// ============================================================================
// Query Types
// ============================================================================

export interface FactQuery {
  readonly stationId?: string;
  readonly source?: string;
  /** Inclusive ISO date */
  readonly from?: string;
  /** Inclusive ISO date */
  readonly to?: string;
  readonly dataQuality?: QualityTier;
  readonly limit?: number;
  readonly offset?: number;
}

export interface IngestionSummary {
  readonly stations: number;
  readonly weatherFacts: number;
  readonly qualityDistribution: Record<QualityTier, number>;
}

// ============================================================================
// Statements
// ============================================================================

const FACT_COLUMNS = [...FACT_KEY_COLUMNS, ...FACT_VALUE_COLUMNS];

/**
 * Latest-write-wins upsert: every non-key column is taken from the incoming row.
 * `ON CONFLICT ... DO UPDATE` with `excluded` is shared by SQLite and PostgreSQL.
 */
const UPSERT_FACT_SQL =
  `INSERT INTO weather_facts (${FACT_COLUMNS.join(', ')}) ` +
  `VALUES (${FACT_COLUMNS.map(() => '?').join(', ')}) ` +
  `ON CONFLICT (${FACT_KEY_COLUMNS.join(', ')}) DO UPDATE SET ` +
  FACT_VALUE_COLUMNS.map((col) => `${col} = excluded.${col}`).join(', ');

const INSERT_AGGREGATE_SQL =
  `INSERT INTO weather_aggregates (
    granularity, station_id, period_start, year, month, quarter,
    avg_max_temp_c, avg_min_temp_c, total_precip_mm,
    record_count, avg_quality_score, computed_at
  ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`;

// ============================================================================
// Repository Implementation
// ============================================================================

export class WeatherRepository {
  constructor(private readonly db: DatabaseAdapter) {}

  // ==========================================================================
  // Stations - dimension rows, created on first reference
  // ==========================================================================

  /**
   * Make sure a station row exists. Existing rows are left untouched.
   *
   * Without metadata a placeholder is created: null coordinates, state "XX".
   *
   * @returns true if a row was inserted
   */
  async ensureStation(stationId: string, metadata?: StationMetadata): Promise<boolean> {
    const id = StationIdSchema.safeParse(stationId);
    if (!id.success) {
      throw new Error(`Invalid station id "${stationId}": ${id.error.errors[0]?.message ?? 'invalid'}`);
    }

    let meta: StationMetadata | null = null;
    if (metadata) {
      const validated = validateStationMetadata(metadata);
      if (!validated.success) {
        throw new Error(`Invalid metadata for station ${stationId}: ${validated.error}`);
      }
      meta = validated.data;
    }

    const now = nowISO8601();
    const changes = await this.db.execute(
      `INSERT INTO stations (
        station_id, name, latitude, longitude, elevation,
        state, country, timezone, active, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT (station_id) DO NOTHING`,
      [
        stationId,
        meta?.name ?? `Weather Station ${stationId}`,
        meta?.latitude ?? null,
        meta?.longitude ?? null,
        meta?.elevation ?? null,
        meta?.state ?? 'XX',
        meta?.country ?? 'USA',
        meta?.timezone ?? 'UTC',
        1,
        now,
        now,
      ]
    );

    return changes > 0;
  }

  async getStation(stationId: string): Promise<Station | null> {
    const row = await this.db.queryOne<StationRow>(
      'SELECT * FROM stations WHERE station_id = ?',
      [stationId]
    );
    return row ? toStation(row) : null;
  }

  async listStations(): Promise<readonly Station[]> {
    const rows = await this.db.queryMany<StationRow>(
      'SELECT * FROM stations ORDER BY station_id'
    );
    return rows.map(toStation);
  }

  // ==========================================================================
  // Weather Facts - one row per (station, date, source)
  // ==========================================================================

  /**
   * Insert or fully replace one fact.
   *
   * @throws ConstraintViolationError before touching the database when a raw value is out of range
   */
  async upsertFact(fact: WeatherFact): Promise<void> {
    assertRawBounds(fact);
    await this.db.execute(UPSERT_FACT_SQL, factToParams(fact));
  }

  async getFact(
    stationId: string,
    observationDate: string,
    source: string
  ): Promise<WeatherFact | null> {
    const row = await this.db.queryOne<WeatherFactRow>(
      `SELECT * FROM weather_facts
       WHERE station_id = ? AND observation_date = ? AND source = ?`,
      [stationId, observationDate, source]
    );
    return row ? toWeatherFact(row) : null;
  }

  /**
   * Facts matching the query, ordered by station, date, source
   */
  async listFacts(query: FactQuery = {}): Promise<readonly WeatherFact[]> {
    const { where, params } = buildFactFilter(query);
    const paging: unknown[] = [];
    let sql = `SELECT * FROM weather_facts${where} ORDER BY station_id, observation_date, source`;

    if (query.limit !== undefined) {
      sql += ' LIMIT ? OFFSET ?';
      paging.push(query.limit, query.offset ?? 0);
    }

    const rows = await this.db.queryMany<WeatherFactRow>(sql, [...params, ...paging]);
    return rows.map(toWeatherFact);
  }

  async countFacts(query: Omit<FactQuery, 'limit' | 'offset'> = {}): Promise<number> {
    const { where, params } = buildFactFilter(query);
    const row = await this.db.queryOne<{ count: number }>(
      `SELECT CAST(COUNT(*) AS INTEGER) AS count FROM weather_facts${where}`,
      params
    );
    return Number(row?.count ?? 0);
  }

  // ==========================================================================
  // Summary
  // ==========================================================================

  async getIngestionSummary(): Promise<IngestionSummary> {
    const stations = await this.db.queryOne<{ count: number }>(
      'SELECT CAST(COUNT(*) AS INTEGER) AS count FROM stations'
    );
    const facts = await this.db.queryOne<{ count: number }>(
      'SELECT CAST(COUNT(*) AS INTEGER) AS count FROM weather_facts'
    );
    const tiers = await this.db.queryMany<{ data_quality: string; count: number }>(
      `SELECT data_quality, CAST(COUNT(*) AS INTEGER) AS count
       FROM weather_facts GROUP BY data_quality`
    );

    const qualityDistribution: Record<QualityTier, number> = {
      excellent: 0,
      good: 0,
      fair: 0,
      poor: 0,
    };
    for (const row of tiers) {
      if (isQualityTier(row.data_quality)) {
        qualityDistribution[row.data_quality] = Number(row.count);
      }
    }

    return {
      stations: Number(stations?.count ?? 0),
      weatherFacts: Number(facts?.count ?? 0),
      qualityDistribution,
    };
  }

  // ==========================================================================
  // Aggregates - derived, replaced wholesale per granularity
  // ==========================================================================

  /**
   * Replace every aggregate row of one granularity in a single transaction.
   * If any insert fails the previous rows stay in place.
   *
   * @returns number of rows written
   */
  async replaceAggregates(
    granularity: Granularity,
    records: readonly AggregationRecord[]
  ): Promise<number> {
    const computedAt = nowISO8601();

    return this.db.transaction(async () => {
      await this.db.execute('DELETE FROM weather_aggregates WHERE granularity = ?', [granularity]);

      for (const record of records) {
        if (record.granularity !== granularity) {
          throw new Error(
            `Aggregate for ${record.stationId}/${record.periodStart} is ${record.granularity}, expected ${granularity}`
          );
        }
        await this.db.execute(INSERT_AGGREGATE_SQL, [
          granularity,
          record.stationId,
          record.periodStart,
          record.year,
          record.month,
          record.quarter,
          record.avgMaxTempC,
          record.avgMinTempC,
          record.totalPrecipMm,
          record.recordCount,
          record.avgQualityScore,
          computedAt,
        ]);
      }

      return records.length;
    });
  }

  async getAggregates(
    granularity: Granularity,
    stationId?: string
  ): Promise<readonly AggregationRecord[]> {
    const params: unknown[] = [granularity];
    let sql = 'SELECT * FROM weather_aggregates WHERE granularity = ?';
    if (stationId !== undefined) {
      sql += ' AND station_id = ?';
      params.push(stationId);
    }
    sql += ' ORDER BY station_id, period_start';

    const rows = await this.db.queryMany<AggregateRow>(sql, params);
    return rows.map(toAggregationRecord);
  }
}

// ============================================================================
// Helpers
// ============================================================================

function buildFactFilter(query: FactQuery): { where: string; params: unknown[] } {
  const clauses: string[] = [];
  const params: unknown[] = [];

  if (query.stationId !== undefined) {
    clauses.push('station_id = ?');
    params.push(query.stationId);
  }
  if (query.source !== undefined) {
    clauses.push('source = ?');
    params.push(query.source);
  }
  if (query.from !== undefined) {
    clauses.push('observation_date >= ?');
    params.push(query.from);
  }
  if (query.to !== undefined) {
    clauses.push('observation_date <= ?');
    params.push(query.to);
  }
  if (query.dataQuality !== undefined) {
    clauses.push('data_quality = ?');
    params.push(query.dataQuality);
  }

  return {
    where: clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '',
    params,
  };
}
