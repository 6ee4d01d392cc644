/**
 * Station Weather Pipeline
 *
 * Decode daily station observation files, score their quality, upsert them
 * into a fact store and materialize per-station aggregates.
 *
 * @example
 * ```typescript
 * import {
 *   createDatabaseAdapter, WeatherRepository, FileLedger,
 *   FileLifecycleManager, AggregationEngine, resolvePipelineConfig,
 * } from '@station-weather/pipeline';
 *
 * const adapter = await createDatabaseAdapter('sqlite:///var/lib/wx/weather.db');
 * const repository = new WeatherRepository(adapter);
 * const manager = new FileLifecycleManager({
 *   repository,
 *   ledger: new FileLedger(adapter),
 *   config: resolvePipelineConfig({ watchDir: '/var/lib/wx/incoming' }),
 * });
 * await manager.sweep();
 * await new AggregationEngine(repository).runAll();
 * ```
 *
 * @module station-weather
 */

export * from './core/types.js';
export * from './core/errors.js';
export {
  DEFAULT_CONFIG,
  DEFAULT_SOURCE,
  DEFAULT_SQLITE_PATH,
  generateIngestRunId,
  resolvePipelineConfig,
} from './core/config.js';
export type { PipelineConfig } from './core/config.js';
export { Logger, createLogger, logger } from './core/utils/logger.js';
export type { LogLevel, LogMetadata } from './core/utils/logger.js';
export {
  StationIdSchema,
  StationMetadataSchema,
  StationDirectorySchema,
  validateStationMetadata,
} from './core/validation.js';

// Ingestion
export { decodeLine, parseCompactDate, MISSING_SENTINEL } from './ingestion/record-decoder.js';
export { scoreObservation, tierForScore, OUTLIER_BOUNDS } from './ingestion/quality-scorer.js';
export { StaticStationDirectory, DEFAULT_STATIONS_PATH } from './ingestion/station-directory.js';
export type { StationDirectory } from './ingestion/station-directory.js';
export { FileLedger } from './ingestion/file-ledger.js';
export type { SourceFileRecord, LedgerStats } from './ingestion/file-ledger.js';
export { FileLifecycleManager } from './ingestion/file-lifecycle.js';
export type { FileLifecycleOptions, ProcessFileOptions } from './ingestion/file-lifecycle.js';

// Persistence
export { WeatherRepository, RAW_BOUNDS, assertRawBounds } from './persistence/repository.js';
export type { DatabaseAdapter, FactQuery, IngestionSummary } from './persistence/repository.js';
export { SQLiteAdapter } from './persistence/adapters/sqlite.js';
export { PostgreSQLAdapter } from './persistence/adapters/postgresql.js';
export {
  createDatabaseAdapter,
  createAdapterFromConfig,
  parseDatabaseUrl,
  DEFAULT_SCHEMA_PATH,
} from './persistence/adapters/factory.js';
export type { AdapterConfig } from './persistence/adapters/factory.js';

// Aggregation
export { AggregationEngine, aggregateFacts, quarterOf } from './aggregation/aggregation-engine.js';
export type { AggregationResult } from './aggregation/aggregation-engine.js';
