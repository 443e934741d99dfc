// ForecastModel: one bagged-tree regressor per metric, trained one step ahead
// and rolled forward recursively over the horizon.
//
// Each step rebuilds its feature row from (observed history + predictions so far);
// nothing is carried between steps except that accumulator and the running
// variance used for the confidence band.

import { DEFAULT_SETTINGS, type ForecastSettings } from '../config/settings.js';
import { InsufficientHistoryError, ValidationError } from '../utils/errors.js';
import { clamp, deepFreeze, roundTo } from '../utils/stats.js';
import { PILLARS, type Pillar } from '../types/scoring.js';
import type {
  ConfidenceBand,
  FeatureVector,
  ForecastConfidence,
  ForecastResult,
  SeriesPoint,
} from '../types/forecast.js';
import { RandomForestRegressor } from './ensemble.js';
import { LONG_WINDOW, computeFeatureRow, computeSeasonalMeans, featureColumns } from './feature-builder.js';
import { addMonths, formatPeriod, parsePeriod } from './periods.js';

/** Largest rolling window plus the one period a training target needs. */
export const MIN_HISTORY = LONG_WINDOW + 1;
export const MAX_HORIZON = 36;

const METRIC_SEED_OFFSET: Readonly<Record<Pillar, number>> = { E: 0, S: 7919, G: 15838 };

export interface TrainedModel {
  readonly subject: string;
  readonly seed: number;
  readonly series: readonly SeriesPoint[];
  readonly trainingRows: number;
  readonly regressors: Readonly<Record<Pillar, RandomForestRegressor>>;
}

export class ForecastModel {
  private readonly settings: ForecastSettings;

  constructor(settings: Partial<ForecastSettings> = {}) {
    this.settings = { ...DEFAULT_SETTINGS.forecast, ...settings };
  }

  get seed(): number {
    return this.settings.seed;
  }

  /**
   * Train the three per-metric regressors on (features at t, value at t+1),
   * using only rows whose rolling windows are complete.
   * @throws InsufficientHistoryError below MIN_HISTORY periods
   */
  fit(features: FeatureVector, subject = 'series'): TrainedModel {
    const { series, rows } = features;
    if (series.length < MIN_HISTORY) {
      throw new InsufficientHistoryError(
        `${subject}: forecasting needs at least ${MIN_HISTORY} monthly periods, got ${series.length}`,
        subject,
        MIN_HISTORY,
        series.length,
      );
    }

    const X: Record<Pillar, number[][]> = { E: [], S: [], G: [] };
    const y: Record<Pillar, number[]> = { E: [], S: [], G: [] };
    for (let t = 0; t < rows.length - 1; t++) {
      const row = rows[t];
      if (!row.complete) continue;
      for (const metric of PILLARS) {
        X[metric].push(featureColumns(row, metric));
        y[metric].push(series[t + 1][metric]);
      }
    }

    const regressor = (metric: Pillar) => RandomForestRegressor.fit(X[metric], y[metric], {
      trees: this.settings.trees,
      maxDepth: this.settings.maxDepth,
      seed: (this.settings.seed + METRIC_SEED_OFFSET[metric]) >>> 0,
    });

    const model: TrainedModel = {
      subject,
      seed: this.settings.seed,
      series: series.map(p => ({ ...p })),
      trainingRows: X.E.length,
      regressors: { E: regressor('E'), S: regressor('S'), G: regressor('G') },
    };
    return deepFreeze(model);
  }

  /**
   * Roll the model forward `horizonMonths` steps. Band half-width at step h is
   * z * sqrt(sum of member variances up to h), so it never narrows.
   * @throws ValidationError for a horizon outside 1..MAX_HORIZON
   */
  predict(model: TrainedModel, horizonMonths: number): ForecastResult {
    if (!Number.isInteger(horizonMonths) || horizonMonths < 1 || horizonMonths > MAX_HORIZON) {
      throw new ValidationError(
        `${model.subject}: horizon must be an integer between 1 and ${MAX_HORIZON} (got ${horizonMonths})`,
        model.subject,
        'horizonMonths',
      );
    }

    const origin = model.series[model.series.length - 1];
    const originMonth = parsePeriod(origin.period);
    if (originMonth === null) {
      throw new ValidationError(`${model.subject}: origin period ${origin.period} is not YYYY-MM`, model.subject, 'series');
    }

    const history: SeriesPoint[] = [...model.series];
    const periods: string[] = [];
    const predictions: Record<Pillar, number[]> = { E: [], S: [], G: [] };
    const lower: Record<Pillar, number[]> = { E: [], S: [], G: [] };
    const upper: Record<Pillar, number[]> = { E: [], S: [], G: [] };
    const cumulativeVariance: Record<Pillar, number> = { E: 0, S: 0, G: 0 };

    for (let step = 1; step <= horizonMonths; step++) {
      const row = computeFeatureRow(history, history.length - 1, computeSeasonalMeans(history));
      const next: Record<Pillar, number> = { E: 0, S: 0, G: 0 };

      for (const metric of PILLARS) {
        const { mean, variance } = model.regressors[metric].predict(featureColumns(row, metric));
        const value = clamp(mean, 0, 100);
        cumulativeVariance[metric] += variance;
        const halfWidth = this.settings.confidenceZ * Math.sqrt(cumulativeVariance[metric]);

        next[metric] = value;
        predictions[metric].push(value);
        lower[metric].push(value - halfWidth);
        upper[metric].push(value + halfWidth);
      }

      const period = formatPeriod(addMonths(originMonth, step));
      periods.push(period);
      history.push({ period, E: next.E, S: next.S, G: next.G });
    }

    const band = (m: Pillar): ConfidenceBand => ({ lower: lower[m], upper: upper[m] });
    const result: ForecastResult = {
      origin: origin.period,
      horizon: horizonMonths,
      periods,
      predictions,
      confidence: { E: band('E'), S: band('S'), G: band('G') },
    };
    return deepFreeze(result);
  }
}

/**
 * Condense band widths at the final step into a 0-100 confidence score.
 * A mean band of 20 points or more scores 0.
 */
export function summarizeConfidence(result: ForecastResult): ForecastConfidence {
  const last = result.horizon - 1;
  const widths = PILLARS.map(m => result.confidence[m].upper[last] - result.confidence[m].lower[last]);
  const meanWidth = widths.reduce((s, w) => s + w, 0) / widths.length;
  const score = roundTo(clamp(100 - meanWidth * 5, 0, 100), 1);

  return {
    score,
    reliability: score >= 80 ? 'high' : score >= 60 ? 'medium' : 'low',
  };
}
