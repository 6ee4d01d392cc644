/**
 * Files Command
 *
 * Usage:
 *   weather-pipeline files [--state discovered|processing|archived|failed_retryable|unprocessable]
 */

import type { Command } from 'commander';
import type { FileState } from '../../core/types.js';
import type { CommandContext } from '../lib/context.js';
import { getGlobalContext, withPipeline } from '../lib/context.js';
import type { ExitCode } from '../lib/exit-codes.js';
import { EXIT_CODES } from '../lib/exit-codes.js';

const FILE_STATES: readonly FileState[] = [
  'discovered',
  'processing',
  'archived',
  'failed_retryable',
  'unprocessable',
];

interface FilesOptions {
  readonly state?: string;
}

function isFileState(value: string): value is FileState {
  return FILE_STATES.some((state) => state === value);
}

export function registerFilesCommand(program: Command): void {
  program
    .command('files')
    .description('List source files recorded in the file ledger')
    .option('-s, --state <state>', FILE_STATES.join('|'))
    .action(async (options: FilesOptions) => {
      process.exitCode = await runFiles(getGlobalContext(), options);
    });
}

export async function runFiles(context: CommandContext, options: FilesOptions = {}): Promise<ExitCode> {
  const { config, logger } = context;
  const { state } = options;

  if (state !== undefined && !isFileState(state)) {
    logger.error(`Invalid state: ${state}. Valid: ${FILE_STATES.join(', ')}`);
    return EXIT_CODES.ERRORS;
  }

  const records = await withPipeline(config, ({ ledger }) => ledger.list(state));

  logger.table(
    records.map((record) => ({
      file: record.fileName,
      station: record.stationId,
      state: record.state,
      attempts: record.attemptCount,
      accepted: record.acceptedLines,
      skipped: record.skippedLines,
      rejected: record.rejectedLines,
      error: record.lastError ?? '',
    }))
  );

  return EXIT_CODES.SUCCESS;
}
