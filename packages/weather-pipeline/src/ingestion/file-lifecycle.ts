/**
 * File Lifecycle Manager
 *
 * Drives source files from a watch directory through decode, score and
 * upsert, then archives them:
 *
 *   discovered -> processing -> archived
 *                            -> failed_retryable (left in place, picked up
 *                               again by the next sweep)
 *   a name that is not a valid station id -> unprocessable (left in place,
 *                                             not retried)
 *
 * Line-level problems (malformed lines, out-of-range raw values) are counted
 * and skipped. Anything else aborts the file. Because every write is an
 * upsert on the natural key, reprocessing a partially ingested file
 * converges to the same rows.
 */

import { copyFile, mkdir, readdir, readFile, rename, unlink } from 'node:fs/promises';
import { basename, extname, join, resolve } from 'node:path';
import type {
  FileOutcome,
  LineCounts,
  SweepReport,
  WeatherFact,
} from '../core/types.js';
import type { PipelineConfig } from '../core/config.js';
import { FileProcessingError, isConstraintViolation } from '../core/errors.js';
import { StationIdSchema } from '../core/validation.js';
import type { Logger } from '../core/utils/logger.js';
import { createLogger } from '../core/utils/logger.js';
import type { WeatherRepository } from '../persistence/repository.js';
import type { FileLedger } from './file-ledger.js';
import { decodeLine } from './record-decoder.js';
import { scoreObservation } from './quality-scorer.js';
import type { StationDirectory } from './station-directory.js';
import { StaticStationDirectory } from './station-directory.js';

// ============================================================================
// Types
// ============================================================================

export interface FileLifecycleOptions {
  readonly repository: WeatherRepository;
  readonly ledger: FileLedger;
  readonly config: PipelineConfig;

  /** Reference metadata; unknown stations get a placeholder row */
  readonly stations?: StationDirectory;

  /** Clock for `ingestedAt` lineage */
  readonly now?: () => Date;

  readonly logger?: Logger;
}

export interface ProcessFileOptions {
  /** Move the file to the archive directory on success (default: true) */
  readonly archive?: boolean;
}

interface MutableCounts {
  accepted: number;
  skipped: number;
  rejected: number;
  blank: number;
}

// ============================================================================
// Manager
// ============================================================================

/**
 * @example
 * ```typescript
 * const manager = new FileLifecycleManager({ repository, ledger, config });
 * const report = await manager.sweep();
 * console.log(`${report.archived.length} archived, ${report.failed.length} pending retry`);
 * ```
 */
export class FileLifecycleManager {
  private readonly repository: WeatherRepository;
  private readonly ledger: FileLedger;
  private readonly config: PipelineConfig;
  private readonly stations: StationDirectory;
  private readonly now: () => Date;
  private readonly log: Logger;

  /** Resolved file path -> running attempt */
  private readonly inFlight = new Map<string, Promise<FileOutcome>>();
  private activeSweep: Promise<SweepReport> | null = null;

  constructor(options: FileLifecycleOptions) {
    this.repository = options.repository;
    this.ledger = options.ledger;
    this.config = options.config;
    this.stations = options.stations ?? new StaticStationDirectory();
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? createLogger({ module: 'file-lifecycle' });
  }

  /**
   * Matching files in the watch directory, sorted by name.
   * The directory is created if it does not exist yet.
   */
  async discover(): Promise<string[]> {
    await mkdir(this.config.watchDir, { recursive: true });
    return this.listSourceFiles(this.config.watchDir);
  }

  /**
   * Process every file currently in the watch directory.
   *
   * A call made while a sweep is running gets that sweep's report.
   */
  sweep(): Promise<SweepReport> {
    if (this.activeSweep) {
      return this.activeSweep;
    }

    const sweep = this.runSweep().finally(() => {
      this.activeSweep = null;
    });
    this.activeSweep = sweep;
    return sweep;
  }

  /**
   * Historical bulk load: ingest every matching file in `dir` and leave
   * the files where they are. The ledger is not touched.
   */
  async ingestDirectory(dir: string): Promise<SweepReport> {
    const started = performance.now();
    const files = await this.listSourceFiles(dir);

    this.log.info('Bulk load started', { dir, files: files.length, ingestRunId: this.config.ingestRunId });

    const outcomes: FileOutcome[] = [];
    for (const file of files) {
      outcomes.push(await this.processFile(file, { archive: false }));
    }

    return this.buildReport(outcomes, started);
  }

  /**
   * Ingest one file. Concurrent calls for the same path share one attempt.
   * Never rejects: every failure is reported in the outcome.
   */
  processFile(filePath: string, options: ProcessFileOptions = {}): Promise<FileOutcome> {
    const key = resolve(filePath);
    const running = this.inFlight.get(key);
    if (running) {
      return running;
    }

    const attempt = this.attemptFile(filePath, options.archive ?? true).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, attempt);
    return attempt;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async runSweep(): Promise<SweepReport> {
    const started = performance.now();
    const files = await this.discover();

    this.log.info('Sweep started', {
      watchDir: this.config.watchDir,
      files: files.length,
      ingestRunId: this.config.ingestRunId,
    });

    const outcomes: FileOutcome[] = [];
    for (const file of files) {
      outcomes.push(await this.processFile(file, { archive: true }));
    }

    const report = this.buildReport(outcomes, started);
    this.log.info('Sweep completed', {
      archived: report.archived.length,
      failed: report.failed.length,
      unprocessable: report.unprocessable.length,
      accepted: report.totals.accepted,
      durationMs: report.durationMs,
    });
    return report;
  }

  private async attemptFile(filePath: string, archive: boolean): Promise<FileOutcome> {
    const started = performance.now();
    const fileName = basename(filePath);
    const stationId = basename(fileName, extname(fileName));
    const counts: MutableCounts = { accepted: 0, skipped: 0, rejected: 0, blank: 0 };

    const id = StationIdSchema.safeParse(stationId);
    if (!id.success) {
      const reason = `Cannot derive a station id from ${fileName}: ${id.error.errors[0]?.message ?? 'invalid'}`;
      this.log.warn('File name rejected, file left in place', { fileName, reason });

      const ledgerError = archive
        ? await this.recordInLedger(fileName, () => this.ledger.markUnprocessable(fileName, stationId, reason))
        : undefined;
      return this.outcome(fileName, stationId, 'unprocessable', counts, started, reason, ledgerError);
    }

    let lineNumber: number | null = null;
    try {
      if (archive) {
        await this.ledger.markDiscovered(fileName, stationId);
        await this.ledger.markProcessing(fileName, this.config.ingestRunId);
      }

      await this.repository.ensureStation(stationId, this.stations.get(stationId));

      const content = await readFile(filePath, 'utf-8');
      const lines = content.split('\n');
      if (lines[lines.length - 1] === '') {
        lines.pop();
      }

      for (let i = 0; i < lines.length; i++) {
        lineNumber = i + 1;
        await this.ingestLine(lines[i] ?? '', stationId, fileName, lineNumber, counts);
      }
      lineNumber = null;

      // Marked archived before the move; a failed move is recorded over it
      if (archive) {
        await this.ledger.markArchived(fileName, counts);
        await this.archiveFile(filePath, fileName);
      }
    } catch (cause) {
      const error = new FileProcessingError(fileName, lineNumber, cause);
      this.log.error('File processing failed, will retry on next sweep', {
        fileName,
        lineNumber,
        error: error.message,
        accepted: counts.accepted,
      });

      const ledgerError = archive
        ? await this.recordInLedger(fileName, () => this.ledger.markFailed(fileName, error.message, counts))
        : undefined;
      return this.outcome(fileName, stationId, 'failed_retryable', counts, started, error.message, ledgerError);
    }

    this.log.info(archive ? 'File archived' : 'File loaded', {
      fileName,
      stationId,
      accepted: counts.accepted,
      skipped: counts.skipped,
      rejected: counts.rejected,
    });

    return this.outcome(fileName, stationId, archive ? 'archived' : 'loaded', counts, started);
  }

  /**
   * Apply a ledger write for a file that has already failed or been
   * rejected. A ledger failure is logged and returned, not thrown.
   */
  private async recordInLedger(fileName: string, write: () => Promise<void>): Promise<string | undefined> {
    try {
      await write();
      return undefined;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.error('File ledger update failed', { fileName, error: message });
      return message;
    }
  }

  private async ingestLine(
    line: string,
    stationId: string,
    fileName: string,
    lineNumber: number,
    counts: MutableCounts
  ): Promise<void> {
    const decoded = decodeLine(line);
    if (!decoded.ok) {
      if (decoded.reason === 'blank_line') {
        counts.blank++;
        this.log.debug('Blank line ignored', { fileName, lineNumber });
      } else {
        counts.skipped++;
        this.log.warn('Malformed line skipped', {
          fileName,
          lineNumber,
          reason: decoded.reason,
          detail: decoded.detail,
        });
      }
      return;
    }

    const { observation } = decoded;
    const quality = scoreObservation(observation);

    const fact: WeatherFact = {
      stationId,
      observationDate: observation.observationDate,
      source: this.config.source,
      rawMaxTemp: observation.rawMaxTemp,
      rawMinTemp: observation.rawMinTemp,
      rawPrecip: observation.rawPrecip,
      maxTempC: observation.maxTempC,
      minTempC: observation.minTempC,
      precipMm: observation.precipMm,
      precipCm: observation.precipCm,
      dataQuality: quality.dataQuality,
      qualityScore: quality.qualityScore,
      missingValues: quality.missingValues,
      outlierCount: quality.outlierCount,
      qualityNotes: quality.notes,
      ingestedAt: this.now().toISOString(),
      ingestRunId: this.config.ingestRunId,
    };

    try {
      await this.repository.upsertFact(fact);
      counts.accepted++;
    } catch (error) {
      if (!isConstraintViolation(error)) {
        throw error;
      }
      counts.rejected++;
      this.log.warn('Line rejected by fact store', {
        fileName,
        lineNumber,
        field: error.field,
        value: error.value,
      });
    }
  }

  /**
   * Move a processed file into the archive directory, replacing any
   * earlier file of the same name
   */
  private async archiveFile(filePath: string, fileName: string): Promise<void> {
    await mkdir(this.config.archiveDir, { recursive: true });
    const target = join(this.config.archiveDir, fileName);

    try {
      await rename(filePath, target);
    } catch (error) {
      if (!isCrossDeviceError(error)) {
        throw error;
      }
      await copyFile(filePath, target);
      await unlink(filePath);
    }
  }

  private async listSourceFiles(dir: string): Promise<string[]> {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && extname(entry.name) === this.config.fileExtension)
      .map((entry) => entry.name)
      .sort()
      .map((name) => join(dir, name));
  }

  private outcome(
    fileName: string,
    stationId: string,
    state: FileOutcome['state'],
    counts: LineCounts,
    started: number,
    error?: string,
    ledgerError?: string
  ): FileOutcome {
    return {
      fileName,
      stationId,
      state,
      accepted: counts.accepted,
      skipped: counts.skipped,
      rejected: counts.rejected,
      blank: counts.blank,
      ...(error !== undefined ? { error } : {}),
      ...(ledgerError !== undefined ? { ledgerError } : {}),
      durationMs: Math.round(performance.now() - started),
    };
  }

  private buildReport(outcomes: readonly FileOutcome[], started: number): SweepReport {
    const sum = (key: keyof LineCounts): number =>
      outcomes.reduce((total, outcome) => total + outcome[key], 0);

    return {
      ingestRunId: this.config.ingestRunId,
      archived: outcomes.filter((o) => o.state === 'archived'),
      failed: outcomes.filter((o) => o.state === 'failed_retryable'),
      loaded: outcomes.filter((o) => o.state === 'loaded'),
      unprocessable: outcomes.filter((o) => o.state === 'unprocessable'),
      totals: {
        files: outcomes.length,
        accepted: sum('accepted'),
        skipped: sum('skipped'),
        rejected: sum('rejected'),
        blank: sum('blank'),
      },
      durationMs: Math.round(performance.now() - started),
    };
  }
}

function isCrossDeviceError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EXDEV';
}
