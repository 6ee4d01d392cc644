/**
 * Weather Pipeline CLI Program
 *
 * @module cli/program
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { ConfigurationError } from '../core/errors.js';
import { registerCommands } from './commands/index.js';
import { initializeContext, peekGlobalContext } from './lib/context.js';
import type { GlobalOptions } from './lib/context.js';
import { EXIT_CODES } from './lib/exit-codes.js';

function getVersion(): string {
  const packageJsonPath = fileURLToPath(new URL('../../package.json', import.meta.url));
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return String(packageJson.version);
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('weather-pipeline')
    .description('Station weather ingestion, quality scoring and aggregation')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .weather-pipelinerc)')
    .option('--database <url>', 'Database URL (default: DATABASE_URL or local SQLite)')
    .hook('preAction', async (thisCommand) => {
      const options: GlobalOptions = thisCommand.opts();
      await initializeContext(options);
    });

  registerCommands(program);

  return program;
}

/**
 * Exit code for an error that escaped a command
 */
export function exitCodeForError(error: unknown): number {
  return error instanceof ConfigurationError ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.ERRORS;
}

export async function main(argv: readonly string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const context = peekGlobalContext();
    if (context) {
      context.logger.error('Command failed', {
        error: message,
        duration_ms: Date.now() - context.startTime,
      });
    } else {
      console.error(`${error instanceof ConfigurationError ? 'Configuration error' : 'Error'}: ${message}`);
    }
    process.exitCode = exitCodeForError(error);
  }
}
