/**
 * CLI Configuration Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { ConfigurationError } from '../../../core/errors.js';
import { resolvePipelineConfig } from '../../../core/config.js';
import { loadConfig, toPipelineConfig } from '../../../cli/lib/config.js';

const RC = `version: 1
database: sqlite:///srv/wx/weather.db
paths:
  watch: incoming
  archive: archive
ingest:
  source: noaa
  file_extension: .dat
`;

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'wx-config-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('loadConfig', () => {
  it('falls back to defaults without a config file', async () => {
    const config = await loadConfig({ cwd: dir, env: {} });

    expect(config).toEqual({
      version: 1,
      databaseUrl: undefined,
      paths: {
        watch: resolve(dir, 'data/incoming'),
        archive: resolve(dir, 'data/archive'),
        stations: null,
      },
      ingest: { source: 'manual', fileExtension: '.txt' },
      verbose: false,
      json: false,
      configPath: null,
    });
  });

  it('reads .weather-pipelinerc and resolves paths against its directory', async () => {
    await writeFile(join(dir, '.weather-pipelinerc'), RC);
    const nested = join(dir, 'a', 'b');
    await mkdir(nested, { recursive: true });

    const config = await loadConfig({ cwd: nested, env: {} });

    expect(config.configPath).toBe(join(dir, '.weather-pipelinerc'));
    expect(config.databaseUrl).toBe('sqlite:///srv/wx/weather.db');
    expect(config.paths.watch).toBe(join(dir, 'incoming'));
    expect(config.paths.archive).toBe(join(dir, 'archive'));
    expect(config.ingest).toEqual({ source: 'noaa', fileExtension: '.dat' });
  });

  it('lets environment variables override the file', async () => {
    await writeFile(join(dir, '.weather-pipelinerc'), RC);

    const config = await loadConfig({
      cwd: dir,
      env: {
        DATABASE_URL: 'sqlite::memory:',
        WEATHER_PIPELINE_SOURCE: 'ghcn',
        WEATHER_PIPELINE_WATCH_DIR: 'drop',
        WEATHER_PIPELINE_VERBOSE: 'true',
      },
    });

    expect(config.databaseUrl).toBe('sqlite::memory:');
    expect(config.ingest.source).toBe('ghcn');
    expect(config.paths.watch).toBe(join(dir, 'drop'));
    expect(config.verbose).toBe(true);
  });

  it('lets flags override the environment', async () => {
    const config = await loadConfig({
      cwd: dir,
      env: { DATABASE_URL: 'sqlite::memory:', WEATHER_PIPELINE_JSON: '1' },
      overrides: { databaseUrl: 'postgres://localhost/weather', json: false },
    });

    expect(config.databaseUrl).toBe('postgres://localhost/weather');
    expect(config.json).toBe(false);
  });

  it('uses an explicit config path', async () => {
    await writeFile(join(dir, 'custom.yaml'), 'ingest:\n  source: custom\n');

    const config = await loadConfig({ cwd: dir, env: {}, configPath: 'custom.yaml' });

    expect(config.configPath).toBe(join(dir, 'custom.yaml'));
    expect(config.ingest.source).toBe('custom');
  });

  it('fails on a missing explicit config file', async () => {
    await expect(loadConfig({ cwd: dir, env: {}, configPath: 'nope.yaml' })).rejects.toThrow(
      `Config file not found: ${join(dir, 'nope.yaml')}`
    );
  });

  it('rejects unknown keys', async () => {
    await writeFile(join(dir, '.weather-pipelinerc'), 'bogus: 1\n');

    await expect(loadConfig({ cwd: dir, env: {} })).rejects.toBeInstanceOf(ConfigurationError);
    await expect(loadConfig({ cwd: dir, env: {} })).rejects.toThrow(/Invalid config file/);
  });

  it('treats an empty file as no settings', async () => {
    await writeFile(join(dir, '.weather-pipelinerc'), '');

    const config = await loadConfig({ cwd: dir, env: {} });
    expect(config.ingest.source).toBe('manual');
  });
});

describe('toPipelineConfig', () => {
  it('carries paths and ingest settings into the pipeline config', async () => {
    await writeFile(join(dir, '.weather-pipelinerc'), RC);
    const config = await loadConfig({ cwd: dir, env: {} });

    expect(toPipelineConfig(config, 'run-fixed')).toEqual({
      source: 'noaa',
      ingestRunId: 'run-fixed',
      watchDir: join(dir, 'incoming'),
      archiveDir: join(dir, 'archive'),
      fileExtension: '.dat',
    });
  });

  it('generates a run id when none is given', async () => {
    const config = await loadConfig({ cwd: dir, env: {} });
    expect(toPipelineConfig(config).ingestRunId).toMatch(/^run-[0-9a-z]+-[0-9a-f]{8}$/);
  });
});

describe('resolvePipelineConfig', () => {
  it('adds the leading dot to a bare extension', () => {
    expect(resolvePipelineConfig({ fileExtension: 'txt', ingestRunId: 'r' }).fileExtension).toBe('.txt');
  });
});
