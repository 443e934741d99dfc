// Scoring: IndicatorRecord in, ScoreBreakdown out

export type Pillar = 'E' | 'S' | 'G';

export const PILLARS: readonly Pillar[] = ['E', 'S', 'G'];

export type Grade = 'A+' | 'A' | 'A-' | 'B+' | 'B' | 'B-' | 'C';

export interface CompanyIdentity {
  readonly name: string;
  readonly industry: string;
  readonly sizeClass: string;      // e.g. 'large', 'mid', 'small'
}

/** Regulatory disclosure flags as reported; absent flags count as not met. */
export interface ComplianceFlags {
  readonly kTaxonomy?: boolean;
  readonly tcfd?: boolean;
  readonly gri?: boolean;
}

export interface IndicatorRecord {
  readonly company: CompanyIdentity;
  readonly environmental: Readonly<Record<string, number>>;
  readonly social: Readonly<Record<string, number>>;
  readonly governance: Readonly<Record<string, number>>;
  readonly compliance?: ComplianceFlags;
}

export interface ComplianceStatus {
  readonly kTaxonomy: boolean;
  readonly tcfd: boolean;
  readonly gri: boolean;
  readonly overall: number;        // share of frameworks met, percent at 1 decimal
}

export interface IndicatorDetail {
  readonly raw: number | null;     // null when the record did not supply it
  readonly normalized: number;     // 0-100
}

export interface ScoreBreakdown {
  readonly company: string;
  readonly industry: string;
  readonly sizeClass: string;
  readonly E: number;
  readonly S: number;
  readonly G: number;
  readonly total: number;
  readonly grade: Grade;
  readonly discountPct: number;
  readonly scopeAdjustment: number;
  readonly details: Readonly<Record<Pillar, Readonly<Record<string, IndicatorDetail>>>>;
  readonly missing: Readonly<Record<Pillar, readonly string[]>>;
  readonly compliance: ComplianceStatus;
}

export interface ImprovementFactor {
  readonly name: string;
  readonly pillar: Pillar;
  readonly impact: number;         // pillar points gained
  readonly cost: number;           // millions
  readonly months: number;
  readonly description: string;
}

export interface DriverRecommendation {
  readonly factor: string;
  readonly pillar: Pillar;
  readonly description: string;
  readonly pillarGain: number;     // impact capped at the pillar's headroom
  readonly totalGain: number;      // pillarGain at the pillar's policy weight
  readonly cost: number;
  readonly months: number;
  readonly efficiency: number;     // totalGain per unit of cost
}

export type ImprovementStatus = 'achieved' | 'reachable' | 'unreachable';

export interface ImprovementPlan {
  readonly company: string;
  readonly currentGrade: Grade;
  readonly targetGrade: Grade;
  readonly currentTotal: number;
  readonly targetTotal: number;
  readonly gap: number;
  readonly status: ImprovementStatus;
  readonly recommendations: readonly DriverRecommendation[];
  readonly plan: readonly string[];
  readonly planCost: number;
  readonly planMonths: number;
  readonly projectedScores: Readonly<Record<Pillar, number>>;
  readonly projectedTotal: number;
  readonly projectedGrade: Grade;
}
