// Tests for interest-saving and package-benefit estimates

import { describe, it, expect } from 'vitest';
import { estimateBenefits, gradeRateBenefit } from '../products/benefits.js';
import { ValidationError } from '../utils/errors.js';
import type { MatchResult } from '../types/products.js';
import { breakdownFor, product } from './fixtures/records.js';

function match(productId: string, discountPct: number, eligible = true): MatchResult {
  return {
    productId,
    productName: `Product ${productId}`,
    eligible,
    failedConditions: eligible ? [] : ['min_grade'],
    discountPct,
    effectiveRate: 5 - discountPct,
  };
}

const catalog = [
  product('capped', {}, { maxAmount: 500 }),
  product('open', {}),
  product('closed', {}),
  product('flat', {}, { esgDiscount: false }),
];

describe('estimateBenefits', () => {
  it('prices each discounted match and builds the package on the best one', () => {
    const matches = [match('capped', 1.8), match('open', 1.0), match('closed', 0, false), match('flat', 0)];
    const summary = estimateBenefits(matches, catalog, { loanAmount: 1000, additionalBenefits: 50 });

    expect(summary.products).toEqual([
      { productId: 'capped', productName: 'Product capped', discountPct: 1.8, financedAmount: 500, annualSavings: 9 },
      { productId: 'open', productName: 'Product open', discountPct: 1.0, financedAmount: 1000, annualSavings: 10 },
    ]);
    expect(summary).toMatchObject({
      loanAmount: 1000,
      years: 5,
      bestProductId: 'open',
      bestDiscountPct: 1.0,
      annualSavings: 10,
      cumulativeSavings: 50,
      additionalBenefits: 50,
      packageValue: 100,
    });
  });

  it('keeps match order between products that save the same', () => {
    const summary = estimateBenefits([match('open', 1.8), match('capped', 1.8)], catalog, { loanAmount: 400 });
    expect(summary.bestProductId).toBe('open');
    expect(summary.annualSavings).toBe(7.2);
  });

  it('is all zeros without a discounted product', () => {
    const summary = estimateBenefits([match('closed', 0, false)], catalog, { loanAmount: 1000, additionalBenefits: 50 });
    expect(summary).toEqual({
      loanAmount: 1000,
      years: 5,
      products: [],
      bestProductId: null,
      bestDiscountPct: 0,
      annualSavings: 0,
      cumulativeSavings: 0,
      additionalBenefits: 0,
      packageValue: 0,
    });
  });

  it('rejects a non-positive amount and a fractional term', () => {
    expect(() => estimateBenefits([], catalog, { loanAmount: 0 })).toThrow(ValidationError);
    expect(() => estimateBenefits([], catalog, { loanAmount: 100, years: 2.5 })).toThrow('years must be a whole number of years (got 2.5)');
  });
});

describe('gradeRateBenefit', () => {
  it('takes the grade discount off the reference rate', () => {
    expect(gradeRateBenefit(breakdownFor(100, 100, 100), 1000)).toEqual({
      grade: 'A+',
      loanAmount: 1000,
      baseRate: 3.5,
      discountPct: 2.7,
      finalRate: 0.8,
      annualSavings: 27,
    });
  });

  it('saves no more than the base rate', () => {
    const benefit = gradeRateBenefit(breakdownFor(100, 100, 100), 1000, 2);
    expect(benefit.finalRate).toBe(0);
    expect(benefit.annualSavings).toBe(20);
  });
});
