// Tests for FeatureBuilder: rolling windows, momentum, seasonality, series validation

import { describe, it, expect } from 'vitest';
import { FEATURE_NAMES, FeatureBuilder, featureColumns } from '../forecast/feature-builder.js';
import { ValidationError } from '../utils/errors.js';
import { monthlySeries } from './fixtures/records.js';

const builder = new FeatureBuilder();

// E climbs 10 → 70, S flat at 50, G flat at 90; 2023-01 … 2023-07
const series = monthlySeries([10, 20, 30, 40, 50, 60, 70].map(e => [e, 50, 90] as const));

describe('FeatureBuilder', () => {
  it('builds one row per period', () => {
    const fv = builder.build(series);
    expect(fv.rows).toHaveLength(7);
    expect(fv.rows.map(r => r.period)).toEqual(series.map(p => p.period));
  });

  it('leaves windows without enough history as NaN and marks the row incomplete', () => {
    const [first] = builder.build(series).rows;
    expect(first.metrics.E.value).toBe(10);
    expect(first.metrics.E.rollingMean3).toBeNaN();
    expect(first.metrics.E.rollingMean6).toBeNaN();
    expect(first.metrics.E.momentum3).toBeNaN();
    expect(first.complete).toBe(false);
  });

  it('computes rolling means, std and momentum from trailing values only', () => {
    const { rows } = builder.build(series);
    expect(rows[2].metrics.E.rollingMean3).toBe(20);
    expect(rows[3].metrics.E.momentum3).toBe(3);
    expect(rows[4].complete).toBe(false);

    const row = rows[5];
    expect(row.complete).toBe(true);
    expect(row.metrics.E.rollingMean6).toBe(35);
    expect(row.metrics.E.rollingStd6).toBeCloseTo(Math.sqrt(350), 10);
    expect(row.metrics.S.rollingStd6).toBe(0);
    expect(row.metrics.S.momentum3).toBe(0);
  });

  it('treats momentum from a zero base as 0', () => {
    const zeros = monthlySeries([0, 5, 5, 5].map(e => [e, 50, 50] as const));
    expect(builder.build(zeros).rows[3].metrics.E.momentum3).toBe(0);
  });

  it('adds calendar fields, quarter means and the E/S/G balance', () => {
    const fv = builder.build(series);
    expect(fv.seasonalMeans.E).toEqual({ 1: 20, 2: 50, 3: 70 });

    const last = fv.rows[6];
    expect(last).toMatchObject({ month: 7, quarter: 3, year: 2023 });
    expect(last.metrics.E.seasonalMean).toBe(70);
    expect(fv.rows[0].esgBalance).toBe(40);
  });

  it('lays out model columns in FEATURE_NAMES order', () => {
    const row = builder.build(series).rows[5];
    const columns = featureColumns(row, 'E');
    expect(columns).toHaveLength(FEATURE_NAMES.length);
    expect(columns[0]).toBe(60);
    expect(columns[FEATURE_NAMES.indexOf('month')]).toBe(6);
    expect(columns[FEATURE_NAMES.indexOf('quarter')]).toBe(2);
  });

  it('accepts an empty series', () => {
    expect(builder.build([]).rows).toEqual([]);
  });

  describe('validation', () => {
    it('rejects a duplicated period', () => {
      const dup = [series[0], series[1], { ...series[2], period: series[1].period }];
      expect(() => builder.build(dup, 'Acme Test Co'))
        .toThrow('Acme Test Co: period 2023-02 duplicates the period before it');
    });

    it('rejects periods out of order', () => {
      const swapped = [series[1], series[0]];
      try {
        builder.build(swapped, 'Acme Test Co');
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ValidationError);
        if (!(err instanceof ValidationError)) return;
        expect(err.message).toContain('precedes');
        expect(err.field).toBe('history[1].period');
      }
    });

    it('rejects malformed periods and out-of-range scores', () => {
      expect(() => builder.build([{ ...series[0], period: '2023-13' }])).toThrow('must be YYYY-MM');
      expect(() => builder.build([{ ...series[0], G: 120 }])).toThrow(ValidationError);
    });
  });
});
