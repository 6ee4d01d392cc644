/**
 * Record Decoder Tests
 */

import { describe, it, expect } from 'vitest';
import { decodeLine, parseCompactDate } from '../../../ingestion/record-decoder.js';

describe('parseCompactDate', () => {
  it('converts YYYYMMDD to an ISO date', () => {
    expect(parseCompactDate('20200131')).toBe('2020-01-31');
  });

  it('accepts Feb 29 only in leap years', () => {
    expect(parseCompactDate('20200229')).toBe('2020-02-29');
    expect(parseCompactDate('20190229')).toBeNull();
  });

  it('rejects impossible calendar dates', () => {
    expect(parseCompactDate('20210230')).toBeNull();
    expect(parseCompactDate('20201301')).toBeNull();
    expect(parseCompactDate('20200100')).toBeNull();
    expect(parseCompactDate('2020-01-01')).toBeNull();
    expect(parseCompactDate('202001')).toBeNull();
  });
});

describe('decodeLine', () => {
  it('maps the missing sentinel to null and scales tenths', () => {
    const result = decodeLine('20200101\t-9999\t10\t5');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.observation.observationDate).toBe('2020-01-01');
    expect(result.observation.rawMaxTemp).toBeNull();
    expect(result.observation.maxTempC).toBeNull();
    expect(result.observation.rawMinTemp).toBe(10);
    expect(result.observation.minTempC).toBe(1);
    expect(result.observation.rawPrecip).toBe(5);
    expect(result.observation.precipMm).toBe(0.5);
    expect(result.observation.precipCm).toBeCloseTo(0.05, 10);
  });

  it('keeps negative temperatures and strips a trailing carriage return', () => {
    const result = decodeLine('20200115\t-50\t-123\t0\r');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.observation.maxTempC).toBe(-5);
    expect(result.observation.minTempC).toBe(-12.3);
    expect(result.observation.precipMm).toBe(0);
  });

  it('yields precipCm null when precipitation is missing', () => {
    const result = decodeLine('20200101\t10\t5\t-9999');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.observation.precipMm).toBeNull();
    expect(result.observation.precipCm).toBeNull();
  });

  it('reports blank lines separately', () => {
    expect(decodeLine('')).toEqual({ ok: false, reason: 'blank_line', detail: 'empty line' });
    expect(decodeLine('   \t  ')).toMatchObject({ ok: false, reason: 'blank_line' });
  });

  it('skips lines with the wrong number of fields', () => {
    expect(decodeLine('20200101\t10\t5')).toEqual({
      ok: false,
      reason: 'field_count',
      detail: 'expected 4 fields, got 3',
    });
    expect(decodeLine('20200101\t10\t5\t1\t9')).toMatchObject({ reason: 'field_count' });
  });

  it('skips lines with an invalid date', () => {
    expect(decodeLine('20210230\t10\t5\t1')).toMatchObject({ ok: false, reason: 'invalid_date' });
    expect(decodeLine('notadate\t10\t5\t1')).toMatchObject({ ok: false, reason: 'invalid_date' });
  });

  it('skips lines with non-integer measurements', () => {
    expect(decodeLine('20200101\tabc\t5\t1')).toMatchObject({ ok: false, reason: 'non_numeric' });
    expect(decodeLine('20200101\t10\t1.5\t1')).toMatchObject({ ok: false, reason: 'non_numeric' });
    expect(decodeLine('20200101\t10\t5\t')).toMatchObject({ ok: false, reason: 'field_count' });
  });

  it('recovers the raw integer from the clean value', () => {
    for (const raw of [-9998, -600, -123, -1, 0, 1, 7, 99, 250, 333, 5999]) {
      const result = decodeLine(`20200101\t${raw}\t${raw}\t${Math.abs(raw)}`);
      expect(result.ok).toBe(true);
      if (!result.ok) continue;

      const { maxTempC, precipMm } = result.observation;
      expect(maxTempC).not.toBeNull();
      expect(Math.round((maxTempC ?? Number.NaN) * 10)).toBe(raw);
      expect(Math.round((precipMm ?? Number.NaN) * 10)).toBe(Math.abs(raw));
    }
  });
});
