/**
 * Persistence Schema Types
 *
 * Row shapes exactly as they come back from `schema.sql`, plus the
 * conversions to the domain types in `core/types`.
 *
 * Design principles:
 *   1. Snake-case row types mirror the columns; camel-case domain types do not leak SQL
 *   2. ISO8601 timestamp strings (not Date objects - DB format)
 *   3. Booleans stored as 0/1 integers on every backend
 *   4. Explicit null handling (not undefined)
 */

import type {
  AggregationRecord,
  FileState,
  Granularity,
  QualityTier,
  Station,
  WeatherFact,
} from '../core/types.js';
import { QUALITY_TIERS } from '../core/types.js';

// ============================================================================
// ISO8601 Timestamp Type - Database format
// ============================================================================

/**
 * ISO8601 timestamp string in UTC.
 * Example: "2025-12-17T10:30:00.000Z"
 */
export type ISO8601Timestamp = string;

export function nowISO8601(): ISO8601Timestamp {
  return new Date().toISOString();
}

// ============================================================================
// Table Row Types
// ============================================================================

export interface StationRow {
  readonly station_id: string;
  readonly name: string;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly elevation: number | null;
  readonly state: string;
  readonly country: string;
  readonly timezone: string;
  readonly active: number;
  readonly created_at: ISO8601Timestamp;
  readonly updated_at: ISO8601Timestamp;
}

export interface WeatherFactRow {
  readonly station_id: string;
  readonly observation_date: string;
  readonly source: string;
  readonly raw_max_temp: number | null;
  readonly raw_min_temp: number | null;
  readonly raw_precip: number | null;
  readonly max_temp_c: number | null;
  readonly min_temp_c: number | null;
  readonly precip_mm: number | null;
  readonly precip_cm: number | null;
  readonly data_quality: string;
  readonly quality_score: number;
  readonly missing_values: number;
  readonly outlier_count: number;
  readonly quality_notes: string | null;
  readonly ingested_at: ISO8601Timestamp;
  readonly ingest_run_id: string | null;
}

export interface AggregateRow {
  readonly granularity: Granularity;
  readonly station_id: string;
  readonly period_start: string;
  readonly year: number;
  readonly month: number | null;
  readonly quarter: number | null;
  readonly avg_max_temp_c: number | null;
  readonly avg_min_temp_c: number | null;
  readonly total_precip_mm: number | null;
  readonly record_count: number;
  readonly avg_quality_score: number | null;
  readonly computed_at: ISO8601Timestamp;
}

export interface SourceFileRow {
  readonly file_name: string;
  readonly station_id: string;
  readonly state: FileState;
  readonly attempt_count: number;
  readonly accepted_lines: number;
  readonly skipped_lines: number;
  readonly rejected_lines: number;
  readonly last_error: string | null;
  readonly ingest_run_id: string | null;
  readonly first_seen_at: ISO8601Timestamp;
  readonly updated_at: ISO8601Timestamp;
  readonly archived_at: ISO8601Timestamp | null;
}

// ============================================================================
// Column Lists
// ============================================================================

/**
 * weather_facts columns in insert order. The first three form the key.
 */
export const FACT_KEY_COLUMNS = ['station_id', 'observation_date', 'source'] as const;

export const FACT_VALUE_COLUMNS = [
  'raw_max_temp',
  'raw_min_temp',
  'raw_precip',
  'max_temp_c',
  'min_temp_c',
  'precip_mm',
  'precip_cm',
  'data_quality',
  'quality_score',
  'missing_values',
  'outlier_count',
  'quality_notes',
  'ingested_at',
  'ingest_run_id',
] as const;

// ============================================================================
// Type Guards
// ============================================================================

export function isQualityTier(value: string): value is QualityTier {
  return QUALITY_TIERS.some((tier) => tier === value);
}

// ============================================================================
// Row <-> Domain Conversions
// ============================================================================

export function toWeatherFact(row: WeatherFactRow): WeatherFact {
  if (!isQualityTier(row.data_quality)) {
    throw new Error(`Unknown data_quality "${row.data_quality}" for ${row.station_id}/${row.observation_date}`);
  }

  return {
    stationId: row.station_id,
    observationDate: row.observation_date,
    source: row.source,
    rawMaxTemp: row.raw_max_temp,
    rawMinTemp: row.raw_min_temp,
    rawPrecip: row.raw_precip,
    maxTempC: row.max_temp_c,
    minTempC: row.min_temp_c,
    precipMm: row.precip_mm,
    precipCm: row.precip_cm,
    dataQuality: row.data_quality,
    qualityScore: row.quality_score,
    missingValues: row.missing_values,
    outlierCount: row.outlier_count,
    qualityNotes: row.quality_notes,
    ingestedAt: row.ingested_at,
    ingestRunId: row.ingest_run_id,
  };
}

/**
 * Values for one weather_facts row, ordered as key columns then value columns
 */
export function factToParams(fact: WeatherFact): unknown[] {
  return [
    fact.stationId,
    fact.observationDate,
    fact.source,
    fact.rawMaxTemp,
    fact.rawMinTemp,
    fact.rawPrecip,
    fact.maxTempC,
    fact.minTempC,
    fact.precipMm,
    fact.precipCm,
    fact.dataQuality,
    fact.qualityScore,
    fact.missingValues,
    fact.outlierCount,
    fact.qualityNotes,
    fact.ingestedAt,
    fact.ingestRunId,
  ];
}

export function toStation(row: StationRow): Station {
  return {
    stationId: row.station_id,
    name: row.name,
    latitude: row.latitude,
    longitude: row.longitude,
    elevation: row.elevation,
    state: row.state,
    country: row.country,
    timezone: row.timezone,
    active: row.active === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toAggregationRecord(row: AggregateRow): AggregationRecord {
  return {
    stationId: row.station_id,
    granularity: row.granularity,
    periodStart: row.period_start,
    year: row.year,
    month: row.month,
    quarter: row.quarter,
    avgMaxTempC: row.avg_max_temp_c,
    avgMinTempC: row.avg_min_temp_c,
    totalPrecipMm: row.total_precip_mm,
    recordCount: row.record_count,
    avgQualityScore: row.avg_quality_score,
  };
}
