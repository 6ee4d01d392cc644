/**
 * Ingest Commands
 *
 * Usage:
 *   weather-pipeline ingest sweep [--run-id <id>]
 *   weather-pipeline ingest load <dir> [--run-id <id>]
 *
 * `sweep` processes the watch directory once and archives what succeeds.
 * `load` seeds the store from a directory of historical files and leaves
 * them in place.
 */

import type { Command } from 'commander';
import type { SweepReport } from '../../core/types.js';
import { FileLifecycleManager } from '../../ingestion/file-lifecycle.js';
import { toPipelineConfig } from '../lib/config.js';
import type { CommandContext } from '../lib/context.js';
import { getGlobalContext, withPipeline } from '../lib/context.js';
import type { ExitCode } from '../lib/exit-codes.js';
import { EXIT_CODES } from '../lib/exit-codes.js';
import { formatDuration } from '../lib/logger.js';

interface IngestOptions {
  readonly runId?: string;
}

export function registerIngestCommands(program: Command): void {
  const ingest = program
    .command('ingest')
    .description('Ingest station observation files');

  ingest
    .command('sweep')
    .description('Process every file in the watch directory and archive the successes')
    .option('--run-id <id>', 'Lineage tag for this run (default: generated)')
    .action(async (options: IngestOptions) => {
      process.exitCode = await runIngestSweep(getGlobalContext(), options);
    });

  ingest
    .command('load')
    .description('Bulk-load a directory of historical files without moving them')
    .argument('<dir>', 'Directory holding station files')
    .option('--run-id <id>', 'Lineage tag for this run (default: generated)')
    .action(async (dir: string, options: IngestOptions) => {
      process.exitCode = await runIngestLoad(getGlobalContext(), dir, options);
    });
}

export async function runIngestSweep(
  context: CommandContext,
  options: IngestOptions = {}
): Promise<ExitCode> {
  const { config, logger } = context;
  const pipeline = toPipelineConfig(config, options.runId);
  logger.commandStart('ingest sweep', { watchDir: pipeline.watchDir, ingestRunId: pipeline.ingestRunId });

  const report = await withPipeline(config, async ({ repository, ledger, stations }) => {
    const manager = new FileLifecycleManager({ repository, ledger, stations, config: pipeline });
    return manager.sweep();
  });

  return finish(context, report);
}

export async function runIngestLoad(
  context: CommandContext,
  dir: string,
  options: IngestOptions = {}
): Promise<ExitCode> {
  const { config, logger } = context;
  const pipeline = toPipelineConfig(config, options.runId);
  logger.commandStart('ingest load', { dir, ingestRunId: pipeline.ingestRunId });

  const report = await withPipeline(config, async ({ repository, ledger, stations }) => {
    const manager = new FileLifecycleManager({ repository, ledger, stations, config: pipeline });
    return manager.ingestDirectory(dir);
  });

  return finish(context, report);
}

function finish(context: CommandContext, report: SweepReport): ExitCode {
  printReport(context, report);
  context.logger.commandEnd(true, {
    files: report.totals.files,
    failed: report.failed.length,
    unprocessable: report.unprocessable.length,
  });
  return report.failed.length > 0 || report.unprocessable.length > 0
    ? EXIT_CODES.WARNINGS
    : EXIT_CODES.SUCCESS;
}

function printReport({ logger }: CommandContext, report: SweepReport): void {
  const { totals } = report;
  const lines = [
    `Run ${report.ingestRunId}: ${totals.files} file(s) in ${formatDuration(report.durationMs)}`,
    `  archived: ${report.archived.length}  loaded: ${report.loaded.length}  failed: ${report.failed.length}`,
    `  lines accepted: ${totals.accepted}  skipped: ${totals.skipped}  rejected: ${totals.rejected}`,
    ...report.failed.map((outcome) => `  retry pending: ${outcome.fileName} (${outcome.error ?? 'unknown error'})`),
    ...report.unprocessable.map((outcome) => `  unprocessable: ${outcome.fileName} (${outcome.error ?? 'invalid name'})`),
  ];
  logger.result(report, lines);
}
