// Tests for loan amortization and grade-upgrade simulation

import { describe, it, expect } from 'vitest';
import { calculateLoanTerms, simulateGradeUpgrade } from '../products/loan-terms.js';
import { ValidationError } from '../utils/errors.js';
import { breakdownFor, product, uniformPolicy } from './fixtures/records.js';

describe('calculateLoanTerms', () => {
  it('splits a zero-rate loan into equal instalments', () => {
    expect(calculateLoanTerms(12_000, 0, 1)).toEqual({
      amount: 12_000,
      rate: 0,
      termYears: 1,
      monthlyPayment: 1000,
      totalPayment: 12_000,
      totalInterest: 0,
    });
  });

  it('amortizes at a level monthly payment', () => {
    const terms = calculateLoanTerms(100_000, 12, 1);
    expect(terms.monthlyPayment).toBeCloseTo(8884.88, 2);
    expect(terms.totalInterest).toBeCloseTo(terms.totalPayment - 100_000, 2);
    expect(terms.totalInterest).toBeGreaterThan(6600);
    expect(terms.totalInterest).toBeLessThan(6650);
  });

  it('charges more interest over a longer term', () => {
    const short = calculateLoanTerms(50_000, 4.5, 3);
    const long = calculateLoanTerms(50_000, 4.5, 10);
    expect(long.monthlyPayment).toBeLessThan(short.monthlyPayment);
    expect(long.totalInterest).toBeGreaterThan(short.totalInterest);
  });

  it.each([
    [0, 5, 3, 'amount'],
    [-1000, 5, 3, 'amount'],
    [1000, -0.5, 3, 'rate'],
    [1000, 5, 0, 'termYears'],
    [1000, 5, 2.5, 'termYears'],
  ])('rejects amount=%d rate=%d years=%d', (amount, rate, years, field) => {
    try {
      calculateLoanTerms(amount, rate, years);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (!(err instanceof ValidationError)) return;
      expect(err.subject).toBe('loan');
      expect(err.field).toBe(field);
    }
  });
});

describe('simulateGradeUpgrade', () => {
  const breakdown = breakdownFor(80, 70, 90);   // total 80, A-, 1.8
  const catalog = [
    product('open', {}),
    product('a-only', { min_grade: 'A' }),
    product('high-total', { min_total_score: 84 }),
    product('green', { min_e_score: 90 }),
  ];

  it('lists products that open up at the target grade', () => {
    const upgrade = simulateGradeUpgrade(breakdown, 'A', catalog, { policy: uniformPolicy });

    expect(upgrade.currentGrade).toBe('A-');
    expect(upgrade.targetGrade).toBe('A');
    expect(upgrade.currentEligible).toEqual(['open']);
    expect(upgrade.targetEligible).toEqual(['a-only', 'high-total', 'open']);
    expect(upgrade.newProducts).toEqual(['a-only', 'high-total']);
  });

  it('uses the target bucket discount for the best rate', () => {
    const upgrade = simulateGradeUpgrade(breakdown, 'A', catalog, { policy: uniformPolicy });
    expect(upgrade.bestRateNow).toBe(3.2);
    expect(upgrade.bestRateAtTarget).toBe(2.8);
    expect(upgrade.rateImprovement).toBe(0.4);
  });

  it('leaves pillar conditions untouched', () => {
    const upgrade = simulateGradeUpgrade(breakdown, 'A+', catalog, { policy: uniformPolicy });
    expect(upgrade.targetEligible).not.toContain('green');
  });

  it('reports null rates when nothing is eligible', () => {
    const upgrade = simulateGradeUpgrade(breakdown, 'A', [product('top', { min_grade: 'A+' })], { policy: uniformPolicy });
    expect(upgrade).toMatchObject({ bestRateNow: null, bestRateAtTarget: null, rateImprovement: 0, newProducts: [] });
  });

  it('rejects a target below the current grade', () => {
    expect(() => simulateGradeUpgrade(breakdown, 'B', catalog, { policy: uniformPolicy }))
      .toThrow('Acme Test Co: B is below the current grade A-');
  });
});
