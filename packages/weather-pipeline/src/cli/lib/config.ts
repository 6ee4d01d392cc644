/**
 * Weather Pipeline CLI Configuration
 *
 * Loads configuration from .weather-pipelinerc (YAML) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (WEATHER_PIPELINE_*, DATABASE_URL)
 * 3. Config file (.weather-pipelinerc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { PipelineConfig } from '../../core/config.js';
import { DEFAULT_CONFIG, resolvePipelineConfig } from '../../core/config.js';
import { ConfigurationError } from '../../core/errors.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface PathsConfig {
  /** Directory swept for new files */
  readonly watch: string;
  /** Archive for processed files */
  readonly archive: string;
  /** Station metadata table; null for the bundled one */
  readonly stations: string | null;
}

export interface IngestConfig {
  readonly source: string;
  readonly fileExtension: string;
}

export interface CLIConfig {
  readonly version: number;
  /** Undefined selects the default SQLite file */
  readonly databaseUrl: string | undefined;
  readonly paths: PathsConfig;
  readonly ingest: IngestConfig;

  // Runtime flags
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

const ConfigFileSchema = z
  .object({
    version: z.literal(1).optional(),
    database: z.string().min(1).optional(),
    paths: z
      .object({
        watch: z.string().min(1).optional(),
        archive: z.string().min(1).optional(),
        stations: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    ingest: z
      .object({
        source: z.string().min(1).max(50).optional(),
        file_extension: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.weather-pipelinerc',
  '.weather-pipelinerc.yaml',
  '.weather-pipelinerc.yml',
];

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and validate a config file
 *
 * @throws ConfigurationError on unreadable YAML or unknown/invalid keys
 */
export function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot parse config file ${filePath}`, error);
  }

  // An empty file parses to null
  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.errors[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigurationError(
      `Invalid config file ${filePath}: ${where}${issue?.message ?? 'invalid'}`
    );
  }
  return result.data;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory the search starts from (default: process.cwd()) */
  readonly cwd?: string;
  /** Environment (default: process.env) */
  readonly env?: NodeJS.ProcessEnv;
  /** CLI flag overrides */
  readonly overrides?: {
    readonly verbose?: boolean;
    readonly json?: boolean;
    readonly databaseUrl?: string;
  };
}

function envBool(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Load and merge configuration from all sources.
 * Relative paths from a config file resolve against that file's directory.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const getEnvVar = (name: string): string | undefined => env[`WEATHER_PIPELINE_${name}`];

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? getEnvVar('CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const fileBase = configPath ? dirname(configPath) : cwd;
  const fromFile = (value: string | undefined): string | undefined =>
    value === undefined ? undefined : resolve(fileBase, value);
  const fromEnv = (value: string | undefined): string | undefined =>
    value === undefined ? undefined : resolve(cwd, value);

  const stations = fromEnv(getEnvVar('STATIONS_FILE')) ?? fromFile(fileConfig.paths?.stations);

  return {
    version: fileConfig.version ?? 1,
    databaseUrl: options.overrides?.databaseUrl ?? env.DATABASE_URL ?? fileConfig.database,
    paths: {
      watch:
        fromEnv(getEnvVar('WATCH_DIR')) ??
        fromFile(fileConfig.paths?.watch) ??
        resolve(cwd, DEFAULT_CONFIG.watchDir),
      archive:
        fromEnv(getEnvVar('ARCHIVE_DIR')) ??
        fromFile(fileConfig.paths?.archive) ??
        resolve(cwd, DEFAULT_CONFIG.archiveDir),
      stations: stations ?? null,
    },
    ingest: {
      source: getEnvVar('SOURCE') ?? fileConfig.ingest?.source ?? DEFAULT_CONFIG.source,
      fileExtension:
        getEnvVar('FILE_EXTENSION') ??
        fileConfig.ingest?.file_extension ??
        DEFAULT_CONFIG.fileExtension,
    },
    verbose: options.overrides?.verbose ?? envBool(getEnvVar('VERBOSE')) ?? false,
    json: options.overrides?.json ?? envBool(getEnvVar('JSON')) ?? false,
    configPath,
  };
}

/**
 * Pipeline settings for one run
 */
export function toPipelineConfig(config: CLIConfig, ingestRunId?: string): PipelineConfig {
  return resolvePipelineConfig({
    source: config.ingest.source,
    watchDir: config.paths.watch,
    archiveDir: config.paths.archive,
    fileExtension: config.ingest.fileExtension,
    ...(ingestRunId !== undefined ? { ingestRunId } : {}),
  });
}
