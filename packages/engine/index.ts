// ESG credit engine
// Scores companies, folds in supplier risk, forecasts E/S/G trajectories and
// matches the result against a financial product catalog.

export { ScoreEngine, IndicatorRecordSchema, complianceStatus, normalizeIndicator, SCORE_PRECISION } from './scoring/score-engine.js';
export { analyzeImprovementDrivers, nextGrade } from './scoring/improvement-drivers.js';
export type { DriverOptions } from './scoring/improvement-drivers.js';
export { SupplyChainAnalyzer, SupplierRecordSchema } from './supply-chain/supply-chain-analyzer.js';
export { FeatureBuilder, FEATURE_NAMES, SeriesPointSchema, validateSeries } from './forecast/feature-builder.js';
export { ForecastModel, summarizeConfidence, MIN_HISTORY, MAX_HORIZON } from './forecast/forecast-model.js';
export type { TrainedModel } from './forecast/forecast-model.js';
export { ProductMatcher, ProductSpecSchema, projectedTotals } from './products/product-matcher.js';
export { calculateLoanTerms, simulateGradeUpgrade } from './products/loan-terms.js';
export type { UpgradeOptions } from './products/loan-terms.js';
export { estimateBenefits, gradeRateBenefit, REFERENCE_BASE_RATE } from './products/benefits.js';
export type { BenefitOptions } from './products/benefits.js';

export {
  loadCompanyCatalog,
  loadProductCatalog,
  parseCompanyCatalog,
  parseProductCatalog,
} from './catalog/loader.js';
export type { ProductCatalogOptions } from './catalog/loader.js';
export { BUNDLED_PRODUCT_CATALOG } from './catalog/bundled.js';
export { CompanyEntrySchema } from './catalog/schemas.js';

// Orchestration: full pipeline per company, batches across a portfolio
export { EsgPipeline } from './orchestrator/pipeline.js';
export type { PipelineConfig, PipelineResult, PipelineStage, RunOptions } from './orchestrator/pipeline.js';
export { BatchEvaluator } from './orchestrator/batch-evaluator.js';
export type { BatchOptions, BatchProgress, BatchResult, CompanyOutcome } from './orchestrator/batch-evaluator.js';
export { buildComparativeReport, rankByMetric, findOutliers, extractMetrics } from './utils/comparative-reporter.js';

export * from './config/index.js';
export * from './types/index.js';
export {
  ValidationError,
  InsufficientHistoryError,
  ConfigurationError,
  isEngineError,
  errorSubject,
} from './utils/errors.js';
export type { EngineError } from './utils/errors.js';
