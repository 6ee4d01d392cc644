/**
 * Aggregate Command
 *
 * Usage:
 *   weather-pipeline aggregate [--granularity annual|monthly|quarterly|all]
 */

import type { Command } from 'commander';
import type { Granularity } from '../../core/types.js';
import { GRANULARITIES } from '../../core/types.js';
import type { AggregationResult } from '../../aggregation/aggregation-engine.js';
import { AggregationEngine } from '../../aggregation/aggregation-engine.js';
import type { CommandContext } from '../lib/context.js';
import { getGlobalContext, withPipeline } from '../lib/context.js';
import type { ExitCode } from '../lib/exit-codes.js';
import { EXIT_CODES } from '../lib/exit-codes.js';

interface AggregateOptions {
  readonly granularity: string;
}

function isGranularity(value: string): value is Granularity {
  return GRANULARITIES.some((granularity) => granularity === value);
}

export function registerAggregateCommand(program: Command): void {
  program
    .command('aggregate')
    .description('Recompute materialized station summaries')
    .option('-g, --granularity <name>', 'annual|monthly|quarterly|all', 'all')
    .action(async (options: AggregateOptions) => {
      process.exitCode = await runAggregate(getGlobalContext(), options);
    });
}

export async function runAggregate(
  context: CommandContext,
  options: AggregateOptions
): Promise<ExitCode> {
  const { config, logger } = context;
  const { granularity } = options;

  if (granularity !== 'all' && !isGranularity(granularity)) {
    logger.error(`Invalid granularity: ${granularity}. Valid: ${[...GRANULARITIES, 'all'].join(', ')}`);
    return EXIT_CODES.ERRORS;
  }

  logger.commandStart('aggregate', { granularity });

  const results: AggregationResult[] = await withPipeline(config, async ({ repository }) => {
    const engine = new AggregationEngine(repository);
    return granularity === 'all' ? engine.runAll() : [await engine.run(granularity)];
  });

  const failed = results.filter((result) => !result.success);
  logger.result(
    results,
    results.map((result) =>
      result.success
        ? `${result.granularity}: ${result.groups} group(s)`
        : `${result.granularity}: FAILED (${result.error ?? 'unknown error'})`
    )
  );
  logger.commandEnd(failed.length === 0, { failed: failed.length });

  return failed.length > 0 ? EXIT_CODES.WARNINGS : EXIT_CODES.SUCCESS;
}
