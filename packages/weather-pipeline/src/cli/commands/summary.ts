/**
 * Summary Command
 *
 * Usage:
 *   weather-pipeline summary
 */

import type { Command } from 'commander';
import { QUALITY_TIERS } from '../../core/types.js';
import type { CommandContext } from '../lib/context.js';
import { getGlobalContext, withPipeline } from '../lib/context.js';
import type { ExitCode } from '../lib/exit-codes.js';
import { EXIT_CODES } from '../lib/exit-codes.js';

export function registerSummaryCommand(program: Command): void {
  program
    .command('summary')
    .description('Station, fact and file counts with the quality distribution')
    .action(async () => {
      process.exitCode = await runSummary(getGlobalContext());
    });
}

export async function runSummary(context: CommandContext): Promise<ExitCode> {
  const { config, logger } = context;

  const { summary, files } = await withPipeline(config, async ({ repository, ledger }) => ({
    summary: await repository.getIngestionSummary(),
    files: await ledger.getStats(),
  }));

  logger.result({ ...summary, files }, [
    `Stations:      ${summary.stations}`,
    `Weather facts: ${summary.weatherFacts}`,
    ...QUALITY_TIERS.map((tier) => `  ${tier.padEnd(10)} ${summary.qualityDistribution[tier]}`),
    `Source files:  ${files.total} (archived ${files.byState.archived}, retry pending ${files.byState.failed_retryable})`,
  ]);

  return EXIT_CODES.SUCCESS;
}
