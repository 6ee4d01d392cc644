/**
 * Run Command
 *
 * Usage:
 *   weather-pipeline run [--run-id <id>]
 *
 * One full pass: sweep the watch directory, then recompute every
 * aggregate granularity over the updated store.
 */

import type { Command } from 'commander';
import { AggregationEngine } from '../../aggregation/aggregation-engine.js';
import { FileLifecycleManager } from '../../ingestion/file-lifecycle.js';
import { toPipelineConfig } from '../lib/config.js';
import type { CommandContext } from '../lib/context.js';
import { getGlobalContext, withPipeline } from '../lib/context.js';
import type { ExitCode } from '../lib/exit-codes.js';
import { EXIT_CODES } from '../lib/exit-codes.js';

interface RunOptions {
  readonly runId?: string;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Sweep the watch directory, then recompute all aggregates')
    .option('--run-id <id>', 'Lineage tag for this run (default: generated)')
    .action(async (options: RunOptions) => {
      process.exitCode = await runPipeline(getGlobalContext(), options);
    });
}

export async function runPipeline(
  context: CommandContext,
  options: RunOptions = {}
): Promise<ExitCode> {
  const { config, logger } = context;
  const pipeline = toPipelineConfig(config, options.runId);
  logger.commandStart('run', { ingestRunId: pipeline.ingestRunId });

  const { report, aggregations } = await withPipeline(config, async ({ repository, ledger, stations }) => {
    const manager = new FileLifecycleManager({ repository, ledger, stations, config: pipeline });
    const sweepReport = await manager.sweep();
    const results = await new AggregationEngine(repository).runAll();
    return { report: sweepReport, aggregations: results };
  });

  const failedAggregations = aggregations.filter((result) => !result.success);
  logger.result({ sweep: report, aggregations }, [
    `Run ${report.ingestRunId}: ${report.archived.length} archived, ${report.failed.length} retry pending, ${report.totals.accepted} line(s) accepted`,
    ...aggregations.map((result) =>
      result.success
        ? `${result.granularity}: ${result.groups} group(s)`
        : `${result.granularity}: FAILED (${result.error ?? 'unknown error'})`
    ),
  ]);

  const clean =
    report.failed.length === 0 && report.unprocessable.length === 0 && failedAggregations.length === 0;
  logger.commandEnd(clean, {
    failedFiles: report.failed.length,
    unprocessableFiles: report.unprocessable.length,
    failedAggregations: failedAggregations.length,
  });
  return clean ? EXIT_CODES.SUCCESS : EXIT_CODES.WARNINGS;
}
