export {
  loadPolicy, validateBuckets, gradeRank, isGrade,
  DEFAULT_POLICY, DEFAULT_POLICY_INPUT, GradeSchema, PolicyInputSchema,
} from './policy.js';
export type { Policy, PolicyInput, PillarWeights, GradeBucket, IndicatorSpec, IndicatorRegistry } from './policy.js';
export { loadConditionRegistry, DEFAULT_CONDITIONS, DEFAULT_CONDITION_REGISTRY } from './conditions.js';
export type { ConditionRegistry, ConditionDefinition, ConditionSource } from './conditions.js';
export { loadImprovementFactors, DEFAULT_IMPROVEMENT_FACTORS, DEFAULT_FACTOR_TABLE } from './improvement-factors.js';
export { loadSettings, DEFAULT_SETTINGS } from './settings.js';
export type { Settings, ForecastSettings, SupplyChainSettings } from './settings.js';
