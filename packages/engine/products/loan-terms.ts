// Loan terms and grade-upgrade simulation on top of the product matcher.

import { DEFAULT_CONDITION_REGISTRY, type ConditionRegistry } from '../config/conditions.js';
import { DEFAULT_POLICY, gradeRank, type Policy } from '../config/policy.js';
import { ValidationError } from '../utils/errors.js';
import { deepFreeze, roundTo } from '../utils/stats.js';
import type { Grade, ScoreBreakdown } from '../types/scoring.js';
import type { ForecastResult } from '../types/forecast.js';
import type { GradeUpgrade, LoanTerms, MatchResult, ProductSpec } from '../types/products.js';
import { ProductMatcher } from './product-matcher.js';

/**
 * Level-payment amortization. `rate` is an annual percentage; a zero rate
 * repays the principal in equal instalments.
 */
export function calculateLoanTerms(amount: number, rate: number, termYears: number): LoanTerms {
  if (!Number.isFinite(amount) || amount <= 0) {
    throw new ValidationError(`Loan amount must be positive (got ${amount})`, 'loan', 'amount');
  }
  if (!Number.isFinite(rate) || rate < 0) {
    throw new ValidationError(`Loan rate must be non-negative (got ${rate})`, 'loan', 'rate');
  }
  if (!Number.isInteger(termYears) || termYears < 1) {
    throw new ValidationError(`Loan term must be a whole number of years (got ${termYears})`, 'loan', 'termYears');
  }

  const payments = termYears * 12;
  const monthlyRate = rate / 12 / 100;
  const monthlyPayment = monthlyRate > 0
    ? (amount * monthlyRate * (1 + monthlyRate) ** payments) / ((1 + monthlyRate) ** payments - 1)
    : amount / payments;
  const totalPayment = monthlyPayment * payments;

  return {
    amount,
    rate,
    termYears,
    monthlyPayment: roundTo(monthlyPayment, 2),
    totalPayment: roundTo(totalPayment, 2),
    totalInterest: roundTo(totalPayment - amount, 2),
  };
}

export interface UpgradeOptions {
  policy?: Policy;
  registry?: ConditionRegistry;
  forecast?: ForecastResult | null;
}

function eligibleIds(results: readonly MatchResult[]): string[] {
  return results.filter(r => r.eligible).map(r => r.productId).sort();
}

function bestRate(results: readonly MatchResult[]): number | null {
  const eligible = results.filter(r => r.eligible);
  return eligible.length === 0 ? null : Math.min(...eligible.map(r => r.effectiveRate));
}

/**
 * Re-run matching as if the company held `targetGrade`: the grade, its bucket
 * discount, and a total lifted to the bucket's floor. Pillar scores, indicators
 * and the forecast stay as they are.
 */
export function simulateGradeUpgrade(
  breakdown: ScoreBreakdown,
  targetGrade: Grade,
  catalog: readonly ProductSpec[],
  options: UpgradeOptions = {},
): GradeUpgrade {
  const policy = options.policy ?? DEFAULT_POLICY;
  const matcher = new ProductMatcher(policy, options.registry ?? DEFAULT_CONDITION_REGISTRY);
  const forecast = options.forecast ?? null;

  const bucket = policy.buckets.find(b => b.grade === targetGrade);
  if (bucket === undefined) {
    throw new ValidationError(`${breakdown.company}: grade ${targetGrade} is not in the policy`, breakdown.company, 'targetGrade');
  }
  if (gradeRank(policy, targetGrade) > gradeRank(policy, breakdown.grade)) {
    throw new ValidationError(
      `${breakdown.company}: ${targetGrade} is below the current grade ${breakdown.grade}`,
      breakdown.company,
      'targetGrade',
    );
  }

  const upgraded: ScoreBreakdown = {
    ...breakdown,
    total: Math.max(breakdown.total, bucket.min),
    grade: targetGrade,
    discountPct: bucket.discountPct,
  };

  const now = matcher.match(breakdown, forecast, catalog);
  const target = matcher.match(upgraded, forecast, catalog);
  const currentEligible = eligibleIds(now);
  const targetEligible = eligibleIds(target);
  const bestRateNow = bestRate(now);
  const bestRateAtTarget = bestRate(target);

  const result: GradeUpgrade = {
    currentGrade: breakdown.grade,
    targetGrade,
    currentEligible,
    targetEligible,
    newProducts: targetEligible.filter(id => !currentEligible.includes(id)),
    bestRateNow,
    bestRateAtTarget,
    rateImprovement: bestRateNow !== null && bestRateAtTarget !== null
      ? roundTo(bestRateNow - bestRateAtTarget, 4)
      : 0,
  };
  return deepFreeze(result);
}
