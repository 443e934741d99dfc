// Forecasting: historical series, feature rows, trajectories

import type { Pillar } from './scoring.js';

export interface SeriesPoint {
  readonly period: string;         // 'YYYY-MM'
  readonly E: number;
  readonly S: number;
  readonly G: number;
}

export type HistoricalSeries = readonly SeriesPoint[];

/** Per-metric features. NaN marks a window without enough history. */
export interface MetricFeatures {
  readonly value: number;
  readonly rollingMean3: number;
  readonly rollingMean6: number;
  readonly rollingStd6: number;
  readonly momentum3: number;
  readonly seasonalMean: number;
}

export interface FeatureRow {
  readonly period: string;
  readonly month: number;          // 1-12
  readonly quarter: number;        // 1-4
  readonly year: number;
  readonly esgBalance: number;
  readonly metrics: Readonly<Record<Pillar, MetricFeatures>>;
  readonly complete: boolean;      // false while any rolling window lacks history
}

export type SeasonalMeans = Readonly<Record<Pillar, Readonly<Record<number, number>>>>;

export interface FeatureVector {
  readonly series: HistoricalSeries;
  readonly rows: readonly FeatureRow[];
  readonly seasonalMeans: SeasonalMeans;
}

export interface ConfidenceBand {
  readonly lower: readonly number[];
  readonly upper: readonly number[];
}

export interface ForecastResult {
  readonly origin: string;         // last observed period
  readonly horizon: number;
  readonly periods: readonly string[];
  readonly predictions: Readonly<Record<Pillar, readonly number[]>>;
  readonly confidence: Readonly<Record<Pillar, ConfidenceBand>>;
}

export type Reliability = 'high' | 'medium' | 'low';

export interface ForecastConfidence {
  readonly score: number;          // 0-100
  readonly reliability: Reliability;
}
