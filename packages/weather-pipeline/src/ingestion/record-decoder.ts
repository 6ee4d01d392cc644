/**
 * Record Decoder
 *
 * Turns one raw source line into a typed observation:
 *
 *   DATE<TAB>MAXTEMP<TAB>MINTEMP<TAB>PRECIP
 *
 * DATE is `YYYYMMDD`; the numeric fields are integers in tenths of a unit
 * (°C for temperatures, mm for precipitation). `-9999` marks a missing value.
 *
 * The decoder is pure and never throws: a line it cannot use comes back as
 * a skip result carrying the reason.
 */

import type { DecodeResult, DecodedObservation, ISODate } from '../core/types.js';

// ============================================================================
// Constants
// ============================================================================

/** Literal used by the source files for a missing measurement */
export const MISSING_SENTINEL = '-9999';

export const FIELD_COUNT = 4;

const DATE_PATTERN = /^(\d{4})(\d{2})(\d{2})$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

// ============================================================================
// Field Parsing
// ============================================================================

/**
 * Parse `YYYYMMDD` into an ISO date, or null if it is not a calendar date
 */
export function parseCompactDate(value: string): ISODate | null {
  const match = DATE_PATTERN.exec(value);
  if (!match) return null;

  const [, yearStr, monthStr, dayStr] = match;
  const year = Number(yearStr);
  const month = Number(monthStr);
  const day = Number(dayStr);

  if (month < 1 || month > 12 || day < 1) return null;

  // Day 0 of the next month is the last day of this one
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) return null;

  return `${yearStr}-${monthStr}-${dayStr}`;
}

/**
 * Parse a tenths-encoded field. `undefined` means "not an integer".
 */
function parseTenths(value: string): number | null | undefined {
  if (value === MISSING_SENTINEL) return null;
  if (!INTEGER_PATTERN.test(value)) return undefined;
  return Number.parseInt(value, 10);
}

function tenthsToUnit(raw: number | null): number | null {
  return raw === null ? null : raw / 10;
}

// ============================================================================
// Decoder
// ============================================================================

/**
 * Decode one line
 *
 * @example
 * ```typescript
 * decodeLine('20200101\t-9999\t10\t5');
 * // { ok: true, observation: { maxTempC: null, minTempC: 1, precipMm: 0.5, ... } }
 * ```
 */
export function decodeLine(line: string): DecodeResult {
  const trimmed = line.trim();
  if (trimmed.length === 0) {
    return { ok: false, reason: 'blank_line', detail: 'empty line' };
  }

  const fields = trimmed.split('\t');
  if (fields.length !== FIELD_COUNT) {
    return {
      ok: false,
      reason: 'field_count',
      detail: `expected ${FIELD_COUNT} fields, got ${fields.length}`,
    };
  }

  const [dateStr, maxStr, minStr, precipStr] = fields.map((field) => field.trim());

  const observationDate = parseCompactDate(dateStr ?? '');
  if (observationDate === null) {
    return { ok: false, reason: 'invalid_date', detail: `unparseable date "${dateStr}"` };
  }

  const rawMaxTemp = parseTenths(maxStr ?? '');
  const rawMinTemp = parseTenths(minStr ?? '');
  const rawPrecip = parseTenths(precipStr ?? '');

  if (rawMaxTemp === undefined || rawMinTemp === undefined || rawPrecip === undefined) {
    return {
      ok: false,
      reason: 'non_numeric',
      detail: `non-integer value in "${maxStr}", "${minStr}", "${precipStr}"`,
    };
  }

  const precipMm = tenthsToUnit(rawPrecip);

  const observation: DecodedObservation = {
    observationDate,
    rawMaxTemp,
    rawMinTemp,
    rawPrecip,
    maxTempC: tenthsToUnit(rawMaxTemp),
    minTempC: tenthsToUnit(rawMinTemp),
    precipMm,
    precipCm: precipMm === null ? null : precipMm / 10,
  };

  return { ok: true, observation };
}
