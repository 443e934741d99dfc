// Improvement drivers: which initiatives close the gap to a target grade,
// ranked by weighted score gain per unit of cost.

import { DEFAULT_FACTOR_TABLE } from '../config/improvement-factors.js';
import { DEFAULT_POLICY, gradeRank, type Policy } from '../config/policy.js';
import { ValidationError } from '../utils/errors.js';
import { deepFreeze, roundTo } from '../utils/stats.js';
import type {
  DriverRecommendation,
  Grade,
  ImprovementFactor,
  ImprovementPlan,
  ImprovementStatus,
  Pillar,
  ScoreBreakdown,
} from '../types/scoring.js';
import { ScoreEngine, SCORE_PRECISION } from './score-engine.js';

export interface DriverOptions {
  policy?: Policy;
  factors?: readonly ImprovementFactor[];
}

/** The grade one bucket above `grade`; the top grade maps to itself. */
export function nextGrade(grade: Grade, policy: Policy = DEFAULT_POLICY): Grade {
  const rank = gradeRank(policy, grade);
  return rank > 0 ? policy.buckets[rank - 1].grade : grade;
}

function rankRecommendations(a: DriverRecommendation, b: DriverRecommendation): number {
  if (a.efficiency !== b.efficiency) return b.efficiency - a.efficiency;
  if (a.totalGain !== b.totalGain) return b.totalGain - a.totalGain;
  return a.factor < b.factor ? -1 : a.factor > b.factor ? 1 : 0;
}

/**
 * Rank every factor by weighted gain per cost, then take factors in that order
 * until the projected total reaches the target bucket's floor. A factor's gain
 * is capped by what its pillar has left below 100, so stacking factors on one
 * pillar stops paying once it is full.
 *
 * `targetGrade` defaults to the grade one bucket above the current one.
 * @throws ValidationError for a grade the policy does not define
 */
export function analyzeImprovementDrivers(
  breakdown: ScoreBreakdown,
  targetGrade?: Grade,
  options: DriverOptions = {},
): ImprovementPlan {
  const policy = options.policy ?? DEFAULT_POLICY;
  const factors = options.factors ?? DEFAULT_FACTOR_TABLE;
  const engine = new ScoreEngine(policy);
  const target = targetGrade ?? nextGrade(breakdown.grade, policy);

  const bucket = policy.buckets.find(b => b.grade === target);
  if (bucket === undefined) {
    throw new ValidationError(`${breakdown.company}: grade ${target} is not in the policy`, breakdown.company, 'targetGrade');
  }

  const gap = roundTo(Math.max(0, bucket.min - breakdown.total), SCORE_PRECISION);
  const pillarGain = (factor: ImprovementFactor, score: number) => Math.max(0, Math.min(factor.impact, 100 - score));

  const recommendations = factors.map((factor): DriverRecommendation => {
    const gain = pillarGain(factor, breakdown[factor.pillar]);
    const totalGain = policy.weights[factor.pillar] * gain;
    return {
      factor: factor.name,
      pillar: factor.pillar,
      description: factor.description,
      pillarGain: roundTo(gain, SCORE_PRECISION),
      totalGain: roundTo(totalGain, SCORE_PRECISION),
      cost: factor.cost,
      months: factor.months,
      efficiency: roundTo(totalGain / factor.cost, 4),
    };
  }).sort(rankRecommendations);

  const byName = new Map(factors.map(f => [f.name, f]));
  const projected: Record<Pillar, number> = { E: breakdown.E, S: breakdown.S, G: breakdown.G };
  let projectedTotal = breakdown.total;
  const plan: string[] = [];
  let planCost = 0;
  let planMonths = 0;

  if (gap > 0) {
    for (const rec of recommendations) {
      if (projectedTotal >= bucket.min) break;
      const factor = byName.get(rec.factor);
      if (factor === undefined) continue;
      const gain = pillarGain(factor, projected[factor.pillar]);
      if (gain <= 0) continue;
      projected[factor.pillar] = roundTo(projected[factor.pillar] + gain, SCORE_PRECISION);
      projectedTotal = engine.totalOf(projected);
      plan.push(factor.name);
      planCost += factor.cost;
      // Initiatives run side by side; the plan lasts as long as its longest one.
      planMonths = Math.max(planMonths, factor.months);
    }
  }

  const status: ImprovementStatus = gap === 0
    ? 'achieved'
    : projectedTotal >= bucket.min ? 'reachable' : 'unreachable';

  const result: ImprovementPlan = {
    company: breakdown.company,
    currentGrade: breakdown.grade,
    targetGrade: target,
    currentTotal: breakdown.total,
    targetTotal: bucket.min,
    gap,
    status,
    recommendations,
    plan,
    planCost,
    planMonths,
    projectedScores: { E: projected.E, S: projected.S, G: projected.G },
    projectedTotal,
    projectedGrade: engine.gradeFor(projectedTotal),
  };
  return deepFreeze(result);
}
