// Financial benefits of an ESG grade: interest saved on matched products and
// the value of the whole package over a number of years.

import { ValidationError } from '../utils/errors.js';
import { deepFreeze, roundTo } from '../utils/stats.js';
import type { ScoreBreakdown } from '../types/scoring.js';
import type {
  BenefitSummary,
  GradeRateBenefit,
  MatchResult,
  ProductBenefit,
  ProductSpec,
} from '../types/products.js';

/** Reference rate, in percent, the grade discount is taken off. */
export const REFERENCE_BASE_RATE = 3.5;

export interface BenefitOptions {
  loanAmount: number;
  /** Defaults to 5. */
  years?: number;
  /** Non-rate benefits (fee waivers, advisory) counted once per package. Defaults to 0. */
  additionalBenefits?: number;
}

function requirePositive(value: number, field: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`${field} must be positive (got ${value})`, 'benefits', field);
  }
}

/**
 * Interest saved on each eligible, discounted match and the package built on
 * the best one. Amounts are in the catalog's currency unit; a product with a
 * `maxAmount` below the loan finances only up to that cap.
 *
 * With no discounted product, every value is 0.
 * @throws ValidationError for a non-positive amount or term
 */
export function estimateBenefits(
  matches: readonly MatchResult[],
  catalog: readonly ProductSpec[],
  options: BenefitOptions,
): BenefitSummary {
  const { loanAmount } = options;
  const years = options.years ?? 5;
  const additional = options.additionalBenefits ?? 0;
  requirePositive(loanAmount, 'loanAmount');
  if (!Number.isInteger(years) || years < 1) {
    throw new ValidationError(`years must be a whole number of years (got ${years})`, 'benefits', 'years');
  }
  if (!Number.isFinite(additional) || additional < 0) {
    throw new ValidationError(`additionalBenefits must be non-negative (got ${additional})`, 'benefits', 'additionalBenefits');
  }

  const caps = new Map(catalog.map(p => [p.id, p.maxAmount]));
  const products: ProductBenefit[] = matches
    .filter(m => m.eligible && m.discountPct > 0)
    .map(m => {
      const financedAmount = Math.min(loanAmount, caps.get(m.productId) ?? loanAmount);
      return {
        productId: m.productId,
        productName: m.productName,
        discountPct: m.discountPct,
        financedAmount,
        annualSavings: roundTo((financedAmount * m.discountPct) / 100, 2),
      };
    });

  // Ties keep match order, which is by effective rate.
  let best: ProductBenefit | null = null;
  for (const p of products) {
    if (best === null || p.annualSavings > best.annualSavings) best = p;
  }

  const annualSavings = best?.annualSavings ?? 0;
  const cumulativeSavings = roundTo(annualSavings * years, 2);
  const additionalBenefits = best === null ? 0 : additional;

  const summary: BenefitSummary = {
    loanAmount,
    years,
    products,
    bestProductId: best?.productId ?? null,
    bestDiscountPct: best?.discountPct ?? 0,
    annualSavings,
    cumulativeSavings,
    additionalBenefits,
    packageValue: roundTo(cumulativeSavings + additionalBenefits, 2),
  };
  return deepFreeze(summary);
}

/** Interest saved in a year by the grade's own discount on a reference-rate loan. */
export function gradeRateBenefit(
  breakdown: ScoreBreakdown,
  loanAmount: number,
  baseRate: number = REFERENCE_BASE_RATE,
): GradeRateBenefit {
  requirePositive(loanAmount, 'loanAmount');
  if (!Number.isFinite(baseRate) || baseRate < 0) {
    throw new ValidationError(`baseRate must be non-negative (got ${baseRate})`, 'benefits', 'baseRate');
  }
  const discountPct = breakdown.discountPct;
  const finalRate = roundTo(Math.max(0, baseRate - discountPct), 4);
  return {
    grade: breakdown.grade,
    loanAmount,
    baseRate,
    discountPct,
    finalRate,
    annualSavings: roundTo((loanAmount * (baseRate - finalRate)) / 100, 2),
  };
}
