/**
 * Command Context
 *
 * Resolved configuration and logger for the running command, plus the
 * storage services a command opens for its duration.
 *
 * @module cli/lib/context
 */

import { FileLedger } from '../../ingestion/file-ledger.js';
import type { StationDirectory } from '../../ingestion/station-directory.js';
import { StaticStationDirectory } from '../../ingestion/station-directory.js';
import { createDatabaseAdapter } from '../../persistence/adapters/factory.js';
import type { DatabaseAdapter } from '../../persistence/repository.js';
import { WeatherRepository } from '../../persistence/repository.js';
import type { CLIConfig } from './config.js';
import { loadConfig } from './config.js';
import type { CLILogger } from './logger.js';
import { createCLILogger } from './logger.js';

export interface CommandContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
}

export interface GlobalContext extends CommandContext {
  readonly startTime: number;
}

export interface GlobalOptions {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
  readonly database?: string;
}

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

/**
 * Context if a command got far enough to load one
 */
export function peekGlobalContext(): GlobalContext | null {
  return globalContext;
}

/**
 * @throws ConfigurationError when the config file is missing or invalid
 */
export async function initializeContext(options: GlobalOptions): Promise<GlobalContext> {
  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      databaseUrl: options.database,
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  globalContext = { config, logger, startTime: Date.now() };
  return globalContext;
}

// ============================================================================
// Pipeline Services
// ============================================================================

export interface PipelineServices {
  readonly adapter: DatabaseAdapter;
  readonly repository: WeatherRepository;
  readonly ledger: FileLedger;
  readonly stations: StationDirectory;
}

/**
 * Open the database, run `fn`, and close the connection whatever happens
 */
export async function withPipeline<T>(
  config: CLIConfig,
  fn: (services: PipelineServices) => Promise<T>
): Promise<T> {
  const stations = config.paths.stations
    ? StaticStationDirectory.fromFile(config.paths.stations)
    : StaticStationDirectory.fromFile();

  const adapter = await createDatabaseAdapter(config.databaseUrl);
  try {
    return await fn({
      adapter,
      repository: new WeatherRepository(adapter),
      ledger: new FileLedger(adapter),
      stations,
    });
  } finally {
    await adapter.close();
  }
}
