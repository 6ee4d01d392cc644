/**
 * Aggregation Engine
 *
 * Materializes per-station summaries over annual, monthly and quarterly
 * periods. Each run recomputes one granularity from the full fact table and
 * swaps it in atomically, so readers see either the old set or the new one.
 */

import type {
  AggregationRecord,
  Granularity,
  WeatherFact,
} from '../core/types.js';
import { GRANULARITIES } from '../core/types.js';
import type { Logger } from '../core/utils/logger.js';
import { createLogger } from '../core/utils/logger.js';
import type { WeatherRepository } from '../persistence/repository.js';

// ============================================================================
// Types
// ============================================================================

export interface AggregationResult {
  readonly granularity: Granularity;
  readonly success: boolean;
  /** Rows written (0 on failure) */
  readonly groups: number;
  readonly error?: string;
  readonly durationMs: number;
}

interface PeriodKey {
  readonly periodStart: string;
  readonly year: number;
  readonly month: number | null;
  readonly quarter: number | null;
}

// ============================================================================
// Grouping
// ============================================================================

export function quarterOf(month: number): number {
  return Math.floor((month - 1) / 3) + 1;
}

function periodOf(observationDate: string, granularity: Granularity): PeriodKey {
  const year = Number(observationDate.slice(0, 4));
  const month = Number(observationDate.slice(5, 7));
  const yyyy = observationDate.slice(0, 4);

  switch (granularity) {
    case 'annual':
      return { periodStart: `${yyyy}-01-01`, year, month: null, quarter: null };
    case 'monthly':
      return {
        periodStart: `${yyyy}-${String(month).padStart(2, '0')}-01`,
        year,
        month,
        quarter: null,
      };
    case 'quarterly': {
      const quarter = quarterOf(month);
      const firstMonth = (quarter - 1) * 3 + 1;
      return {
        periodStart: `${yyyy}-${String(firstMonth).padStart(2, '0')}-01`,
        year,
        month: null,
        quarter,
      };
    }
  }
}

function mean(values: ReadonlyArray<number | null>): number | null {
  const present = values.filter((v): v is number => v !== null);
  if (present.length === 0) return null;
  return present.reduce((a, b) => a + b, 0) / present.length;
}

function total(values: ReadonlyArray<number | null>): number | null {
  const present = values.filter((v): v is number => v !== null);
  if (present.length === 0) return null;
  return present.reduce((a, b) => a + b, 0);
}

/**
 * Group facts by (station, period) and summarize each group.
 *
 * Nulls are ignored by every mean and by the precipitation total; a metric
 * with no values in its group is null. Output is ordered by station, then
 * period start.
 *
 * @example
 * ```typescript
 * aggregateFacts(facts, 'annual');
 * // [{ stationId: 'USC00110072', periodStart: '2020-01-01', avgMaxTempC: 11, recordCount: 2, ... }]
 * ```
 */
export function aggregateFacts(
  facts: readonly WeatherFact[],
  granularity: Granularity
): AggregationRecord[] {
  const groups = new Map<string, { key: PeriodKey; stationId: string; facts: WeatherFact[] }>();

  for (const fact of facts) {
    const key = periodOf(fact.observationDate, granularity);
    const id = `${fact.stationId}\u0000${key.periodStart}`;
    const group = groups.get(id);
    if (group) {
      group.facts.push(fact);
    } else {
      groups.set(id, { key, stationId: fact.stationId, facts: [fact] });
    }
  }

  const records: AggregationRecord[] = [];
  for (const { key, stationId, facts: members } of groups.values()) {
    records.push({
      stationId,
      granularity,
      periodStart: key.periodStart,
      year: key.year,
      month: key.month,
      quarter: key.quarter,
      avgMaxTempC: mean(members.map((f) => f.maxTempC)),
      avgMinTempC: mean(members.map((f) => f.minTempC)),
      totalPrecipMm: total(members.map((f) => f.precipMm)),
      recordCount: members.length,
      avgQualityScore: mean(members.map((f) => f.qualityScore)),
    });
  }

  return records.sort((a, b) => {
    if (a.stationId !== b.stationId) return a.stationId < b.stationId ? -1 : 1;
    if (a.periodStart !== b.periodStart) return a.periodStart < b.periodStart ? -1 : 1;
    return 0;
  });
}

// ============================================================================
// Engine
// ============================================================================

export class AggregationEngine {
  private readonly log: Logger;

  /** Tail of the run queue per granularity */
  private readonly queues = new Map<Granularity, Promise<AggregationResult>>();

  constructor(
    private readonly repository: WeatherRepository,
    logger?: Logger
  ) {
    this.log = logger ?? createLogger({ module: 'aggregation' });
  }

  /**
   * Recompute one granularity. Runs for the same granularity queue behind
   * each other. Failures are reported, not thrown; the previous rows stay.
   */
  run(granularity: Granularity): Promise<AggregationResult> {
    const previous: Promise<unknown> = this.queues.get(granularity) ?? Promise.resolve();
    const next = previous.then(() => this.execute(granularity));
    this.queues.set(granularity, next);
    return next;
  }

  /**
   * Annual, monthly, then quarterly
   */
  async runAll(): Promise<AggregationResult[]> {
    const results: AggregationResult[] = [];
    for (const granularity of GRANULARITIES) {
      results.push(await this.run(granularity));
    }
    return results;
  }

  getAggregates(granularity: Granularity, stationId?: string): Promise<readonly AggregationRecord[]> {
    return this.repository.getAggregates(granularity, stationId);
  }

  private async execute(granularity: Granularity): Promise<AggregationResult> {
    const started = performance.now();

    try {
      const facts = await this.repository.listFacts();
      const records = aggregateFacts(facts, granularity);
      const groups = await this.repository.replaceAggregates(granularity, records);

      const durationMs = Math.round(performance.now() - started);
      this.log.info('Aggregation completed', { granularity, facts: facts.length, groups, durationMs });
      return { granularity, success: true, groups, durationMs };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const durationMs = Math.round(performance.now() - started);
      this.log.error('Aggregation failed, previous aggregates kept', { granularity, error: message });
      return { granularity, success: false, groups: 0, error: message, durationMs };
    }
  }
}
