/**
 * Quality Scorer
 *
 * Grades a decoded observation from its three clean values.
 *
 * SCORING:
 * - start at 1.00
 * - minus 0.20 per missing value
 * - minus 0.10 per outlier (one check per measurement)
 * - minus 0.30 when max < min
 * - clamped to 0 after every deduction
 *
 * The arithmetic runs in integer hundredths so scores land exactly on
 * two-decimal values (1.00 - 0.30 is 0.70, not 0.7000000000000001).
 */

import type { CleanValues, QualityAssessment, QualityTier } from '../core/types.js';

// ============================================================================
// Thresholds
// ============================================================================

/** Plausible ranges; values outside count as outliers */
export const OUTLIER_BOUNDS = {
  maxTempC: { min: -50, max: 50 },
  minTempC: { min: -60, max: 40 },
  precipMm: { min: Number.NEGATIVE_INFINITY, max: 1000 },
} as const;

/** Deductions in hundredths of a point */
const MISSING_PENALTY = 20;
const OUTLIER_PENALTY = 10;
const INCONSISTENCY_PENALTY = 30;

/**
 * Tier lower bounds (inclusive), best first
 */
const TIER_THRESHOLDS: ReadonlyArray<readonly [QualityTier, number]> = [
  ['excellent', 0.9],
  ['good', 0.7],
  ['fair', 0.5],
];

// ============================================================================
// Scoring
// ============================================================================

/**
 * Map a score to its tier
 */
export function tierForScore(score: number): QualityTier {
  for (const [tier, threshold] of TIER_THRESHOLDS) {
    if (score >= threshold) return tier;
  }
  return 'poor';
}

function isOutlier(value: number | null, bounds: { readonly min: number; readonly max: number }): boolean {
  return value !== null && (value > bounds.max || value < bounds.min);
}

/**
 * Score one observation. Total: any mix of null and numeric values works.
 *
 * @example
 * ```typescript
 * scoreObservation({ maxTempC: 10, minTempC: 2, precipMm: null });
 * // { missingValues: 1, outlierCount: 0, qualityScore: 0.8, dataQuality: 'good', ... }
 * ```
 */
export function scoreObservation(values: CleanValues): QualityAssessment {
  const { maxTempC, minTempC, precipMm } = values;

  let hundredths = 100;
  const deduct = (points: number): void => {
    hundredths = Math.max(0, hundredths - points);
  };

  const missingValues = [maxTempC, minTempC, precipMm].filter((v) => v === null).length;
  for (let i = 0; i < missingValues; i++) {
    deduct(MISSING_PENALTY);
  }

  let outlierCount = 0;
  if (isOutlier(maxTempC, OUTLIER_BOUNDS.maxTempC)) outlierCount++;
  if (isOutlier(minTempC, OUTLIER_BOUNDS.minTempC)) outlierCount++;
  if (isOutlier(precipMm, OUTLIER_BOUNDS.precipMm)) outlierCount++;
  for (let i = 0; i < outlierCount; i++) {
    deduct(OUTLIER_PENALTY);
  }

  const inconsistent = maxTempC !== null && minTempC !== null && maxTempC < minTempC;
  if (inconsistent) {
    deduct(INCONSISTENCY_PENALTY);
  }

  const qualityScore = hundredths / 100;

  const notes = `Missing: ${missingValues}, Outliers: ${outlierCount}`;

  return {
    missingValues,
    outlierCount,
    qualityScore,
    dataQuality: tierForScore(qualityScore),
    notes,
  };
}
