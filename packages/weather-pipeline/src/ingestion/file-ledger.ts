/**
 * Source File Ledger
 *
 * Persistent record of every source file the pipeline has seen and the
 * lifecycle state it reached. Retry-pending and archived sets survive a
 * process restart.
 *
 * STATE MACHINE:
 *   discovered -> processing -> archived
 *                            -> failed_retryable -> processing -> ...
 *   (any) -> unprocessable (name rejected; terminal until renamed)
 */

import type { FileState, LineCounts } from '../core/types.js';
import type { DatabaseAdapter } from '../persistence/repository.js';
import type { SourceFileRow } from '../persistence/schema.types.js';
import { nowISO8601 } from '../persistence/schema.types.js';

// ============================================================================
// Types
// ============================================================================

export interface SourceFileRecord {
  readonly fileName: string;
  readonly stationId: string;
  readonly state: FileState;
  readonly attemptCount: number;
  readonly acceptedLines: number;
  readonly skippedLines: number;
  readonly rejectedLines: number;
  readonly lastError: string | null;
  readonly ingestRunId: string | null;
  readonly firstSeenAt: string;
  readonly updatedAt: string;
  readonly archivedAt: string | null;
}

export interface LedgerStats {
  readonly total: number;
  readonly byState: Record<FileState, number>;
}

function toRecord(row: SourceFileRow): SourceFileRecord {
  return {
    fileName: row.file_name,
    stationId: row.station_id,
    state: row.state,
    attemptCount: Number(row.attempt_count),
    acceptedLines: Number(row.accepted_lines),
    skippedLines: Number(row.skipped_lines),
    rejectedLines: Number(row.rejected_lines),
    lastError: row.last_error,
    ingestRunId: row.ingest_run_id,
    firstSeenAt: row.first_seen_at,
    updatedAt: row.updated_at,
    archivedAt: row.archived_at,
  };
}

// ============================================================================
// Ledger
// ============================================================================

/**
 * @example
 * ```typescript
 * const ledger = new FileLedger(adapter);
 * await ledger.markDiscovered('USC00110072.txt', 'USC00110072');
 * await ledger.markProcessing('USC00110072.txt', runId);
 * await ledger.markArchived('USC00110072.txt', counts);
 * ```
 */
export class FileLedger {
  constructor(
    private readonly db: DatabaseAdapter,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Record a file the first time it is seen. A file already in the ledger
   * keeps its state and history.
   */
  async markDiscovered(fileName: string, stationId: string): Promise<void> {
    const timestamp = this.timestamp();
    await this.db.execute(
      `INSERT INTO source_files (file_name, station_id, state, first_seen_at, updated_at)
       VALUES (?, ?, 'discovered', ?, ?)
       ON CONFLICT (file_name) DO NOTHING`,
      [fileName, stationId, timestamp, timestamp]
    );
  }

  /**
   * Start an attempt: state `processing`, attempt count incremented
   */
  async markProcessing(fileName: string, ingestRunId: string): Promise<void> {
    await this.db.execute(
      `UPDATE source_files
       SET state = 'processing', attempt_count = attempt_count + 1,
           ingest_run_id = ?, updated_at = ?
       WHERE file_name = ?`,
      [ingestRunId, this.timestamp(), fileName]
    );
  }

  async markArchived(fileName: string, counts: LineCounts): Promise<void> {
    const timestamp = this.timestamp();
    await this.db.execute(
      `UPDATE source_files
       SET state = 'archived', accepted_lines = ?, skipped_lines = ?, rejected_lines = ?,
           last_error = NULL, updated_at = ?, archived_at = ?
       WHERE file_name = ?`,
      [counts.accepted, counts.skipped, counts.rejected, timestamp, timestamp, fileName]
    );
  }

  async markFailed(fileName: string, error: string, counts: LineCounts): Promise<void> {
    await this.db.execute(
      `UPDATE source_files
       SET state = 'failed_retryable', accepted_lines = ?, skipped_lines = ?, rejected_lines = ?,
           last_error = ?, updated_at = ?, archived_at = NULL
       WHERE file_name = ?`,
      [counts.accepted, counts.skipped, counts.rejected, error, this.timestamp(), fileName]
    );
  }

  /**
   * Record a file whose name cannot be ingested. The attempt count is left
   * alone: nothing was attempted.
   */
  async markUnprocessable(fileName: string, stationId: string, reason: string): Promise<void> {
    const timestamp = this.timestamp();
    await this.db.execute(
      `INSERT INTO source_files (file_name, station_id, state, last_error, first_seen_at, updated_at)
       VALUES (?, ?, 'unprocessable', ?, ?, ?)
       ON CONFLICT (file_name) DO UPDATE SET
         state = 'unprocessable', last_error = excluded.last_error, updated_at = excluded.updated_at`,
      [fileName, stationId, reason, timestamp, timestamp]
    );
  }

  async get(fileName: string): Promise<SourceFileRecord | null> {
    const row = await this.db.queryOne<SourceFileRow>(
      'SELECT * FROM source_files WHERE file_name = ?',
      [fileName]
    );
    return row ? toRecord(row) : null;
  }

  async list(state?: FileState): Promise<readonly SourceFileRecord[]> {
    const rows = state
      ? await this.db.queryMany<SourceFileRow>(
          'SELECT * FROM source_files WHERE state = ? ORDER BY file_name',
          [state]
        )
      : await this.db.queryMany<SourceFileRow>('SELECT * FROM source_files ORDER BY file_name');
    return rows.map(toRecord);
  }

  async getStats(): Promise<LedgerStats> {
    const rows = await this.db.queryMany<{ state: FileState; count: number }>(
      `SELECT state, CAST(COUNT(*) AS INTEGER) AS count
       FROM source_files GROUP BY state`
    );

    const byState: Record<FileState, number> = {
      discovered: 0,
      processing: 0,
      archived: 0,
      failed_retryable: 0,
      unprocessable: 0,
    };
    let total = 0;
    for (const row of rows) {
      byState[row.state] = Number(row.count);
      total += Number(row.count);
    }

    return { total, byState };
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
