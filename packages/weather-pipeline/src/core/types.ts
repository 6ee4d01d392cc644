/**
 * Station Weather Domain Types
 *
 * Typed shapes shared by the decoder, scorer, fact store and aggregation
 * engine. Physical-unit values are plain numbers; absent measurements are
 * `null`, never `undefined` and never the source sentinel.
 *
 * @module core/types
 */

// ============================================================================
// Observations
// ============================================================================

/**
 * ISO calendar date, `YYYY-MM-DD`.
 */
export type ISODate = string;

/**
 * One decoded source line: raw tenths-of-unit integers plus the derived
 * physical-unit values.
 */
export interface DecodedObservation {
  readonly observationDate: ISODate;

  /** Raw tenths of °C (null when the source held the missing sentinel) */
  readonly rawMaxTemp: number | null;
  readonly rawMinTemp: number | null;
  /** Raw tenths of mm */
  readonly rawPrecip: number | null;

  readonly maxTempC: number | null;
  readonly minTempC: number | null;
  readonly precipMm: number | null;
  readonly precipCm: number | null;
}

/**
 * Reasons a line never becomes an observation.
 */
export type SkipReason =
  | 'blank_line'
  | 'field_count'
  | 'invalid_date'
  | 'non_numeric';

export type DecodeResult =
  | { readonly ok: true; readonly observation: DecodedObservation }
  | { readonly ok: false; readonly reason: SkipReason; readonly detail: string };

// ============================================================================
// Quality
// ============================================================================

/**
 * Ordered quality tiers, best first.
 */
export const QUALITY_TIERS = ['excellent', 'good', 'fair', 'poor'] as const;

export type QualityTier = (typeof QUALITY_TIERS)[number];

export interface CleanValues {
  readonly maxTempC: number | null;
  readonly minTempC: number | null;
  readonly precipMm: number | null;
}

export interface QualityAssessment {
  readonly missingValues: number;
  readonly outlierCount: number;
  /** Continuous score in [0, 1], two decimal places */
  readonly qualityScore: number;
  readonly dataQuality: QualityTier;
  readonly notes: string;
}

// ============================================================================
// Facts and Stations
// ============================================================================

/**
 * A fully-formed fact, written in full on every (re)ingestion.
 *
 * Natural key: (stationId, observationDate, source).
 */
export interface WeatherFact {
  readonly stationId: string;
  readonly observationDate: ISODate;
  readonly source: string;

  readonly rawMaxTemp: number | null;
  readonly rawMinTemp: number | null;
  readonly rawPrecip: number | null;

  readonly maxTempC: number | null;
  readonly minTempC: number | null;
  readonly precipMm: number | null;
  readonly precipCm: number | null;

  readonly dataQuality: QualityTier;
  readonly qualityScore: number;
  readonly missingValues: number;
  readonly outlierCount: number;
  readonly qualityNotes: string | null;

  readonly ingestedAt: string;
  readonly ingestRunId: string | null;
}

/**
 * Static reference metadata for a station.
 */
export interface StationMetadata {
  readonly name: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly elevation: number | null;
  /** Two-letter region code */
  readonly state: string;
  readonly country?: string;
  readonly timezone?: string;
}

export interface Station {
  readonly stationId: string;
  readonly name: string;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly elevation: number | null;
  readonly state: string;
  readonly country: string;
  readonly timezone: string;
  readonly active: boolean;
  readonly createdAt: string;
  readonly updatedAt: string;
}

// ============================================================================
// Aggregation
// ============================================================================

export type Granularity = 'annual' | 'monthly' | 'quarterly';

export const GRANULARITIES: readonly Granularity[] = ['annual', 'monthly', 'quarterly'];

export interface AggregationRecord {
  readonly stationId: string;
  readonly granularity: Granularity;
  /** First day of the period */
  readonly periodStart: ISODate;
  readonly year: number;
  /** 1-12 for monthly rows, null otherwise */
  readonly month: number | null;
  /** 1-4 for quarterly rows, null otherwise */
  readonly quarter: number | null;
  readonly avgMaxTempC: number | null;
  readonly avgMinTempC: number | null;
  readonly totalPrecipMm: number | null;
  readonly recordCount: number;
  readonly avgQualityScore: number | null;
}

// ============================================================================
// File Lifecycle
// ============================================================================

/**
 * `unprocessable` files have a name that cannot identify a station. They are
 * left in place and never retried.
 */
export type FileState = 'discovered' | 'processing' | 'archived' | 'failed_retryable' | 'unprocessable';

export interface LineCounts {
  /** Lines upserted into the fact store */
  readonly accepted: number;
  /** Lines the decoder refused (malformed) */
  readonly skipped: number;
  /** Lines the fact store refused (raw bounds) */
  readonly rejected: number;
  /** Empty lines, ignored */
  readonly blank: number;
}

export interface FileOutcome extends LineCounts {
  readonly fileName: string;
  readonly stationId: string;
  readonly state: Extract<FileState, 'archived' | 'failed_retryable' | 'unprocessable'> | 'loaded';
  readonly error?: string;
  /** Set when the ledger could not record this outcome */
  readonly ledgerError?: string;
  readonly durationMs: number;
}

export interface SweepReport {
  readonly ingestRunId: string;
  readonly archived: readonly FileOutcome[];
  readonly failed: readonly FileOutcome[];
  readonly loaded: readonly FileOutcome[];
  readonly unprocessable: readonly FileOutcome[];
  readonly totals: LineCounts & { readonly files: number };
  readonly durationMs: number;
}
