// FeatureBuilder: rolling statistics, momentum, seasonality and balance
// over a company's monthly E/S/G history.
//
// Rows are never dropped here. A row whose windows lack history holds NaN in
// those columns and `complete: false`; ForecastModel.fit() drops such rows.

import { z } from 'zod';
import { ValidationError } from '../utils/errors.js';
import { deepFreeze, mean, sampleStd } from '../utils/stats.js';
import { PILLARS, type Pillar } from '../types/scoring.js';
import type {
  FeatureRow,
  FeatureVector,
  HistoricalSeries,
  MetricFeatures,
  SeasonalMeans,
  SeriesPoint,
} from '../types/forecast.js';
import { parsePeriod, periodIndex, quarterOf } from './periods.js';

export const SHORT_WINDOW = 3;
export const LONG_WINDOW = 6;
export const MOMENTUM_LAG = 3;
/** Index of the first row whose every window is filled. */
export const FIRST_COMPLETE_INDEX = LONG_WINDOW - 1;

export const FEATURE_NAMES = [
  'value',
  'rollingMean3',
  'rollingMean6',
  'rollingStd6',
  'momentum3',
  'seasonalMean',
  'month',
  'quarter',
  'year',
  'esgBalance',
] as const;

const ScoreSchema = z.number().finite().min(0).max(100);

export const SeriesPointSchema = z.object({
  period: z.string().regex(/^\d{4}-(0[1-9]|1[0-2])$/, 'must be YYYY-MM'),
  E: ScoreSchema,
  S: ScoreSchema,
  G: ScoreSchema,
});

/**
 * Check shape, value range and strict chronological order.
 * @throws ValidationError naming the offending point
 */
export function validateSeries(series: HistoricalSeries, subject = 'series'): void {
  let prev: number | null = null;
  for (const [i, point] of series.entries()) {
    const parsed = SeriesPointSchema.safeParse(point);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = `history[${i}].${issue.path.join('.')}`;
      throw new ValidationError(`${subject}: ${field} ${issue.message}`, subject, field);
    }
    const ym = parsePeriod(parsed.data.period);
    if (ym === null) {
      throw new ValidationError(`${subject}: history[${i}].period is not a valid month`, subject, `history[${i}].period`);
    }
    const idx = periodIndex(ym);
    if (prev !== null && idx <= prev) {
      const problem = idx === prev ? 'duplicates' : 'precedes';
      throw new ValidationError(
        `${subject}: period ${point.period} ${problem} the period before it`,
        subject,
        `history[${i}].period`,
      );
    }
    prev = idx;
  }
}

/** Mean of each metric per calendar quarter, over the whole series. */
export function computeSeasonalMeans(series: HistoricalSeries): SeasonalMeans {
  const buckets: Record<Pillar, Map<number, number[]>> = { E: new Map(), S: new Map(), G: new Map() };

  for (const point of series) {
    const ym = parsePeriod(point.period);
    if (ym === null) continue;
    const q = quarterOf(ym.month);
    for (const metric of PILLARS) {
      const list = buckets[metric].get(q) ?? [];
      list.push(point[metric]);
      buckets[metric].set(q, list);
    }
  }

  const toRecord = (m: Map<number, number[]>): Record<number, number> => {
    const out: Record<number, number> = {};
    for (const [q, values] of [...m.entries()].sort((a, b) => a[0] - b[0])) out[q] = mean(values);
    return out;
  };

  return { E: toRecord(buckets.E), S: toRecord(buckets.S), G: toRecord(buckets.G) };
}

function trailing(values: readonly number[], index: number, width: number): number[] | null {
  if (index + 1 < width) return null;
  return values.slice(index + 1 - width, index + 1);
}

function metricFeatures(values: readonly number[], index: number, seasonal: number): MetricFeatures {
  const short = trailing(values, index, SHORT_WINDOW);
  const long = trailing(values, index, LONG_WINDOW);
  const value = values[index];

  let momentum3 = NaN;
  if (index >= MOMENTUM_LAG) {
    const base = values[index - MOMENTUM_LAG];
    momentum3 = base === 0 ? 0 : (value - base) / base;
  }

  return {
    value,
    rollingMean3: short ? mean(short) : NaN,
    rollingMean6: long ? mean(long) : NaN,
    rollingStd6: long ? sampleStd(long) : NaN,
    momentum3,
    seasonalMean: seasonal,
  };
}

/**
 * Feature row for position `index` of `history`, using only points at or before it
 * plus the supplied quarter means. Pure, so the forecaster can call it on a history
 * extended with its own predictions.
 */
export function computeFeatureRow(
  history: readonly SeriesPoint[],
  index: number,
  seasonalMeans: SeasonalMeans,
): FeatureRow {
  const point = history[index];
  const ym = parsePeriod(point.period);
  if (ym === null) {
    throw new ValidationError(`period ${point.period} is not YYYY-MM`, 'series', `history[${index}].period`);
  }
  const quarter = quarterOf(ym.month);

  const series: Record<Pillar, number[]> = {
    E: history.map(p => p.E),
    S: history.map(p => p.S),
    G: history.map(p => p.G),
  };

  const metrics: Record<Pillar, MetricFeatures> = {
    E: metricFeatures(series.E, index, seasonalMeans.E[quarter] ?? NaN),
    S: metricFeatures(series.S, index, seasonalMeans.S[quarter] ?? NaN),
    G: metricFeatures(series.G, index, seasonalMeans.G[quarter] ?? NaN),
  };

  return {
    period: point.period,
    month: ym.month,
    quarter,
    year: ym.year,
    esgBalance: sampleStd([point.E, point.S, point.G]),
    metrics,
    complete: index >= FIRST_COMPLETE_INDEX,
  };
}

/** Model input columns for one metric, in FEATURE_NAMES order. */
export function featureColumns(row: FeatureRow, metric: Pillar): number[] {
  const f = row.metrics[metric];
  return [
    f.value,
    f.rollingMean3,
    f.rollingMean6,
    f.rollingStd6,
    f.momentum3,
    f.seasonalMean,
    row.month,
    row.quarter,
    row.year,
    row.esgBalance,
  ];
}

export class FeatureBuilder {
  /**
   * Build one feature row per period. Never throws on a short series.
   * @throws ValidationError for malformed or out-of-order points
   */
  build(series: HistoricalSeries, subject = 'series'): FeatureVector {
    validateSeries(series, subject);

    const points: SeriesPoint[] = series.map(p => ({ period: p.period, E: p.E, S: p.S, G: p.G }));
    const seasonalMeans = computeSeasonalMeans(points);
    const rows = points.map((_, i) => computeFeatureRow(points, i, seasonalMeans));

    return deepFreeze({ series: points, rows, seasonalMeans });
  }
}
