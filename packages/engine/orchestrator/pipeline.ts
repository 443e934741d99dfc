// EsgPipeline runs one company through every stage:
// suppliers → score → features → forecast → product matching, then the
// improvement plan toward the next grade and, given a loan amount, its benefits.
//
// A short history skips the forecast (reason recorded); matching still runs
// and projected conditions then fail.

import { DEFAULT_CONDITION_REGISTRY, type ConditionRegistry } from '../config/conditions.js';
import { DEFAULT_FACTOR_TABLE } from '../config/improvement-factors.js';
import { DEFAULT_POLICY, type Policy } from '../config/policy.js';
import { DEFAULT_SETTINGS, type Settings } from '../config/settings.js';
import { ScoreEngine } from '../scoring/score-engine.js';
import { analyzeImprovementDrivers } from '../scoring/improvement-drivers.js';
import { SupplyChainAnalyzer } from '../supply-chain/supply-chain-analyzer.js';
import { FeatureBuilder } from '../forecast/feature-builder.js';
import { ForecastModel, summarizeConfidence } from '../forecast/forecast-model.js';
import { addMonths, formatPeriod, parsePeriod, periodIndex } from '../forecast/periods.js';
import { ProductMatcher } from '../products/product-matcher.js';
import { estimateBenefits } from '../products/benefits.js';
import { InsufficientHistoryError, ValidationError } from '../utils/errors.js';
import type { CompanyProfile } from '../types/catalog.js';
import type { ForecastConfidence, ForecastResult, SeriesPoint } from '../types/forecast.js';
import type { BenefitSummary, MatchResult, ProductSpec } from '../types/products.js';
import type { Grade, ImprovementFactor, ImprovementPlan, Pillar, ScoreBreakdown } from '../types/scoring.js';
import type { ScopeAggregate, SupplierAssessment } from '../types/supply-chain.js';

export type PipelineStage = 'supply-chain' | 'scoring' | 'features' | 'forecast' | 'matching';

export interface PipelineConfig {
  policy: Policy;
  registry: ConditionRegistry;
  settings: Settings;
  factors: readonly ImprovementFactor[];
  onStatus?: (stage: PipelineStage, message: string) => void;
}

export interface RunOptions {
  catalog: readonly ProductSpec[];
  /** Defaults to the configured forecast horizon. */
  horizonMonths?: number;
  /** Period of the current evaluation; defaults to the month after the last history point. */
  asOfPeriod?: string;
  /** Grade the improvement plan aims for; defaults to one grade up. */
  targetGrade?: Grade;
  /** Loan amount the benefit estimate is priced on; no estimate without it. */
  loanAmount?: number;
}

export interface PipelineResult {
  company: string;
  asOfPeriod: string | null;
  supplyChain: ScopeAggregate;
  supplierAssessment: SupplierAssessment | null;
  breakdown: ScoreBreakdown;
  improvementAreas: Pillar[];
  forecast: ForecastResult | null;
  confidence: ForecastConfidence | null;
  forecastSkipped?: string;
  matches: MatchResult[];
  improvementPlan: ImprovementPlan;
  benefits: BenefitSummary | null;
  timings: {
    totalMs: number;
  };
}

const DEFAULT_CONFIG: PipelineConfig = {
  policy: DEFAULT_POLICY,
  registry: DEFAULT_CONDITION_REGISTRY,
  settings: DEFAULT_SETTINGS,
  factors: DEFAULT_FACTOR_TABLE,
};

export class EsgPipeline {
  private readonly config: PipelineConfig;
  private readonly scorer: ScoreEngine;
  private readonly supplyChain: SupplyChainAnalyzer;
  private readonly features = new FeatureBuilder();
  private readonly forecaster: ForecastModel;
  private readonly matcher: ProductMatcher;

  constructor(config?: Partial<PipelineConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.scorer = new ScoreEngine(this.config.policy);
    this.supplyChain = new SupplyChainAnalyzer(this.config.settings.supplyChain);
    this.forecaster = new ForecastModel(this.config.settings.forecast);
    this.matcher = new ProductMatcher(this.config.policy, this.config.registry);
  }

  async run(company: CompanyProfile, options: RunOptions): Promise<PipelineResult> {
    const start = Date.now();
    const name = company.indicators.company.name;
    const horizon = options.horizonMonths ?? this.config.settings.forecast.horizon;

    // ── Supply chain ────────────────────────────────────────────────
    this.status('supply-chain', `${name}: ${company.suppliers.length} suppliers`);
    const supplyChain = this.supplyChain.aggregate(company.suppliers, name);
    const supplierAssessment = company.suppliers.length > 0 ? this.supplyChain.assess(company.suppliers, name) : null;

    // ── Scoring ─────────────────────────────────────────────────────
    const breakdown = this.scorer.evaluate(company.indicators, supplyChain.riskPropagation);
    this.status('scoring', `${name}: total ${breakdown.total} (${breakdown.grade})`);

    // ── Features + forecast ─────────────────────────────────────────
    const asOfPeriod = this.resolveAsOf(company, options.asOfPeriod);
    const series: SeriesPoint[] = [...company.history];
    if (asOfPeriod !== null) {
      series.push({ period: asOfPeriod, E: breakdown.E, S: breakdown.S, G: breakdown.G });
    }

    let forecast: ForecastResult | null = null;
    let confidence: ForecastConfidence | null = null;
    let forecastSkipped: string | undefined;

    const features = this.features.build(series, name);
    this.status('features', `${name}: ${features.rows.filter(r => r.complete).length}/${features.rows.length} complete rows`);

    try {
      const model = this.forecaster.fit(features, name);
      forecast = this.forecaster.predict(model, horizon);
      confidence = summarizeConfidence(forecast);
      this.status('forecast', `${name}: ${horizon} months from ${forecast.origin}, confidence ${confidence.reliability}`);
    } catch (err) {
      if (!(err instanceof InsufficientHistoryError)) throw err;
      forecastSkipped = err.message;
      this.status('forecast', `${name}: skipped (${err.actual}/${err.required} periods)`);
    }

    // ── Matching ────────────────────────────────────────────────────
    const matches = this.matcher.match(breakdown, forecast, options.catalog);
    this.status('matching', `${name}: ${matches.filter(m => m.eligible).length}/${matches.length} products eligible`);

    const improvementPlan = analyzeImprovementDrivers(breakdown, options.targetGrade, {
      policy: this.config.policy,
      factors: this.config.factors,
    });
    const benefits = options.loanAmount === undefined
      ? null
      : estimateBenefits(matches, options.catalog, { loanAmount: options.loanAmount });

    const result: PipelineResult = {
      company: name,
      asOfPeriod,
      supplyChain,
      supplierAssessment,
      breakdown,
      improvementAreas: this.scorer.improvementAreas(breakdown),
      forecast,
      confidence,
      matches,
      improvementPlan,
      benefits,
      timings: { totalMs: Date.now() - start },
    };
    if (forecastSkipped !== undefined) result.forecastSkipped = forecastSkipped;
    return result;
  }

  /** The period the current breakdown is recorded under, or null with neither history nor asOf. */
  private resolveAsOf(company: CompanyProfile, asOf: string | undefined): string | null {
    const name = company.indicators.company.name;
    const last = company.history.at(-1);
    const lastMonth = last === undefined ? null : parsePeriod(last.period);

    if (asOf === undefined) {
      return lastMonth === null ? null : formatPeriod(addMonths(lastMonth, 1));
    }

    const asOfMonth = parsePeriod(asOf);
    if (asOfMonth === null) {
      throw new ValidationError(`${name}: asOfPeriod ${asOf} is not YYYY-MM`, name, 'asOfPeriod');
    }
    if (last !== undefined && lastMonth !== null && periodIndex(asOfMonth) <= periodIndex(lastMonth)) {
      throw new ValidationError(
        `${name}: asOfPeriod ${asOf} must follow the last history period ${last.period}`,
        name,
        'asOfPeriod',
      );
    }
    return asOf;
  }

  private status(stage: PipelineStage, message: string): void {
    this.config.onStatus?.(stage, message);
  }
}
