// Products: catalog entries and match outcomes

import type { Grade } from './scoring.js';

export type ProjectionAggregate = 'final' | 'mean';

/** A number, a grade, or the names a membership condition admits. */
export type ThresholdValue = number | string | string[];

export interface ConditionThreshold {
  readonly threshold: ThresholdValue;
  readonly aggregate?: ProjectionAggregate;
}

export type ConditionValue = ThresholdValue | ConditionThreshold;

export interface ProductSpec {
  readonly id: string;
  readonly name: string;
  readonly baseRate: number;       // percent
  readonly esgDiscount: boolean;
  readonly conditions: Readonly<Record<string, ConditionValue>>;
  readonly gradeDiscounts?: Readonly<Partial<Record<Grade, number>>>;
  readonly category?: string;
  readonly maxAmount?: number;
}

export interface MatchResult {
  readonly productId: string;
  readonly productName: string;
  readonly eligible: boolean;
  readonly failedConditions: readonly string[];
  readonly discountPct: number;
  readonly effectiveRate: number;
}

export interface LoanTerms {
  readonly amount: number;
  readonly rate: number;
  readonly termYears: number;
  readonly monthlyPayment: number;
  readonly totalPayment: number;
  readonly totalInterest: number;
}

export interface GradeUpgrade {
  readonly currentGrade: Grade;
  readonly targetGrade: Grade;
  readonly currentEligible: readonly string[];
  readonly targetEligible: readonly string[];
  readonly newProducts: readonly string[];
  readonly bestRateNow: number | null;
  readonly bestRateAtTarget: number | null;
  readonly rateImprovement: number;
}

export interface ProductBenefit {
  readonly productId: string;
  readonly productName: string;
  readonly discountPct: number;
  readonly financedAmount: number;  // loan amount capped at the product's maxAmount
  readonly annualSavings: number;
}

export interface BenefitSummary {
  readonly loanAmount: number;
  readonly years: number;
  readonly products: readonly ProductBenefit[];
  readonly bestProductId: string | null;
  readonly bestDiscountPct: number;
  readonly annualSavings: number;
  readonly cumulativeSavings: number;
  readonly additionalBenefits: number;
  readonly packageValue: number;
}

export interface GradeRateBenefit {
  readonly grade: Grade;
  readonly loanAmount: number;
  readonly baseRate: number;
  readonly discountPct: number;
  readonly finalRate: number;
  readonly annualSavings: number;
}
