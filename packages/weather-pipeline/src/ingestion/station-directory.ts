/**
 * Station Directory
 *
 * Static reference metadata for known stations, keyed by station id.
 * Unknown ids fall through to a placeholder station in the fact store.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { StationMetadata } from '../core/types.js';
import { ConfigurationError } from '../core/errors.js';
import { StationDirectorySchema } from '../core/validation.js';

export interface StationDirectory {
  get(stationId: string): StationMetadata | undefined;
}

export const DEFAULT_STATIONS_PATH = fileURLToPath(new URL('../data/stations.json', import.meta.url));

export class StaticStationDirectory implements StationDirectory {
  private readonly stations: ReadonlyMap<string, StationMetadata>;

  constructor(stations: Readonly<Record<string, StationMetadata>> = {}) {
    this.stations = new Map(Object.entries(stations));
  }

  /**
   * Load and validate a JSON station table
   *
   * @throws ConfigurationError when the file is missing or malformed
   */
  static fromFile(path: string = DEFAULT_STATIONS_PATH): StaticStationDirectory {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Cannot read station table: ${path}`, error);
    }

    const result = StationDirectorySchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.errors[0];
      throw new ConfigurationError(
        `Invalid station table ${path}: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}`.trim()
      );
    }

    return new StaticStationDirectory(result.data);
  }

  get(stationId: string): StationMetadata | undefined {
    return this.stations.get(stationId);
  }

  get size(): number {
    return this.stations.size;
  }
}
