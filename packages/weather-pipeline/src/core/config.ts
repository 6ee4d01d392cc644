/**
 * Pipeline Configuration
 *
 * Explicit configuration handed to the ingestion entry points. Nothing here
 * is read from module state at call time: callers build a `PipelineConfig`
 * (usually through `resolvePipelineConfig`) and pass it in.
 */

import { randomBytes } from 'node:crypto';

// ============================================================================
// Types
// ============================================================================

export interface PipelineConfig {
  /** Provenance label written into every fact's key */
  readonly source: string;

  /** Lineage tag for every fact written during this run */
  readonly ingestRunId: string;

  /** Directory swept for new source files */
  readonly watchDir: string;

  /** Destination for successfully processed files */
  readonly archiveDir: string;

  /** Source file extension, including the dot */
  readonly fileExtension: string;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_SOURCE = 'manual';

export const DEFAULT_SQLITE_PATH = '.weather-pipeline/weather.db';

/**
 * Default configuration
 *
 * `ingestRunId` is absent on purpose: every run gets a fresh one.
 */
export const DEFAULT_CONFIG: Omit<PipelineConfig, 'ingestRunId'> = {
  source: DEFAULT_SOURCE,
  watchDir: 'data/incoming',
  archiveDir: 'data/archive',
  fileExtension: '.txt',
};

/**
 * Generate an opaque ingestion run identifier
 *
 * Format: `run-<base36 timestamp>-<8 hex chars>`
 */
export function generateIngestRunId(): string {
  const timestamp = Date.now().toString(36);
  const random = randomBytes(4).toString('hex');
  return `run-${timestamp}-${random}`;
}

/**
 * Merge partial configuration with defaults
 *
 * @example
 * ```typescript
 * const config = resolvePipelineConfig({ watchDir: '/srv/wx/incoming' });
 * ```
 */
export function resolvePipelineConfig(
  overrides: Partial<PipelineConfig> = {}
): PipelineConfig {
  const fileExtension = overrides.fileExtension ?? DEFAULT_CONFIG.fileExtension;

  return {
    source: overrides.source ?? DEFAULT_CONFIG.source,
    ingestRunId: overrides.ingestRunId ?? generateIngestRunId(),
    watchDir: overrides.watchDir ?? DEFAULT_CONFIG.watchDir,
    archiveDir: overrides.archiveDir ?? DEFAULT_CONFIG.archiveDir,
    fileExtension: fileExtension.startsWith('.') ? fileExtension : `.${fileExtension}`,
  };
}
