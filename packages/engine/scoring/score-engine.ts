// ScoreEngine: weighted E/S/G scoring with bucketed grade and rate discount.
// Stateless: every evaluate() is a pure function of its arguments and the policy.

import { z } from 'zod';
import { DEFAULT_POLICY, type GradeBucket, type IndicatorSpec, type Policy } from '../config/policy.js';
import { ValidationError } from '../utils/errors.js';
import { clamp, deepFreeze, mean, roundTo } from '../utils/stats.js';
import {
  PILLARS,
  type ComplianceFlags,
  type ComplianceStatus,
  type IndicatorDetail,
  type IndicatorRecord,
  type Pillar,
  type ScoreBreakdown,
} from '../types/scoring.js';

/** Scores are reported, and graded, at this many decimals. */
export const SCORE_PRECISION = 2;

export const PILLAR_FIELDS: Readonly<Record<Pillar, 'environmental' | 'social' | 'governance'>> = {
  E: 'environmental',
  S: 'social',
  G: 'governance',
};

const IndicatorValuesSchema = z.record(z.number({ invalid_type_error: 'must be numeric' }).finite('must be finite'));

export const IndicatorRecordSchema = z.object({
  company: z.object({
    name: z.string().min(1),
    industry: z.string(),
    sizeClass: z.string(),
  }),
  environmental: IndicatorValuesSchema,
  social: IndicatorValuesSchema,
  governance: IndicatorValuesSchema,
  compliance: z.object({
    kTaxonomy: z.boolean().optional(),
    tcfd: z.boolean().optional(),
    gri: z.boolean().optional(),
  }).strict().optional(),
});

const IMPROVEMENT_THRESHOLD = 70;

/** Met frameworks as a percentage of the three, at 1 decimal. */
export function complianceStatus(flags: ComplianceFlags = {}): ComplianceStatus {
  const kTaxonomy = flags.kTaxonomy ?? false;
  const tcfd = flags.tcfd ?? false;
  const gri = flags.gri ?? false;
  const met = [kTaxonomy, tcfd, gri].filter(Boolean).length;
  return { kTaxonomy, tcfd, gri, overall: roundTo((met / 3) * 100, 1) };
}

interface PillarScore {
  score: number;
  details: Record<string, IndicatorDetail>;
  missing: string[];
}

/** Map a raw value onto 0-100 using its registry range and direction. */
export function normalizeIndicator(raw: number, spec: IndicatorSpec): number {
  const span = spec.max - spec.min;
  const scaled = spec.direction === 'higher'
    ? ((raw - spec.min) * 100) / span
    : ((spec.max - raw) * 100) / span;
  return clamp(scaled, 0, 100);
}

function companyLabel(input: unknown): string {
  if (input !== null && typeof input === 'object' && 'company' in input) {
    const company = input.company;
    if (company !== null && typeof company === 'object' && 'name' in company && typeof company.name === 'string') {
      return company.name;
    }
  }
  return 'unknown company';
}

export class ScoreEngine {
  constructor(private readonly policy: Policy = DEFAULT_POLICY) {}

  /**
   * Score one company.
   *
   * `scopeAdjustment` is the supply-chain penalty subtracted from E (floored at 0).
   * @throws ValidationError for non-numeric, out-of-range or unknown indicators
   */
  evaluate(indicators: IndicatorRecord, scopeAdjustment = 0): ScoreBreakdown {
    const subject = companyLabel(indicators);
    const parsed = IndicatorRecordSchema.safeParse(indicators);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue.path.join('.');
      throw new ValidationError(`${subject}: ${field || 'record'} ${issue.message}`, subject, field || undefined);
    }
    if (!Number.isFinite(scopeAdjustment) || scopeAdjustment < 0) {
      throw new ValidationError(
        `${subject}: scope adjustment must be a non-negative number (got ${scopeAdjustment})`,
        subject,
        'scopeAdjustment',
      );
    }

    const record = parsed.data;
    const e = this.scorePillar('E', record.environmental, subject);
    const s = this.scorePillar('S', record.social, subject);
    const g = this.scorePillar('G', record.governance, subject);

    const E = roundTo(Math.max(0, e.score - scopeAdjustment), SCORE_PRECISION);
    const S = roundTo(s.score, SCORE_PRECISION);
    const G = roundTo(g.score, SCORE_PRECISION);
    const total = this.totalOf({ E, S, G });
    const bucket = this.bucketFor(total);

    return deepFreeze({
      company: record.company.name,
      industry: record.company.industry,
      sizeClass: record.company.sizeClass,
      E,
      S,
      G,
      total,
      grade: bucket.grade,
      discountPct: bucket.discountPct,
      scopeAdjustment,
      details: { E: e.details, S: s.details, G: g.details },
      missing: { E: e.missing, S: s.missing, G: g.missing },
      compliance: complianceStatus(record.compliance),
    });
  }

  /**
   * Mean of the pillar's normalized registry indicators; absent ones count as 0.
   */
  private scorePillar(pillar: Pillar, values: Readonly<Record<string, number>>, subject: string): PillarScore {
    const field = PILLAR_FIELDS[pillar];
    const registry = this.policy.indicators[pillar];

    for (const name of Object.keys(values)) {
      if (!Object.hasOwn(registry, name)) {
        throw new ValidationError(`${subject}: unknown ${field} indicator "${name}"`, subject, `${field}.${name}`);
      }
    }

    const details: Record<string, IndicatorDetail> = {};
    const missing: string[] = [];
    const normalized: number[] = [];

    for (const [name, spec] of Object.entries(registry)) {
      const raw = values[name];
      if (raw === undefined) {
        missing.push(name);
        details[name] = { raw: null, normalized: 0 };
        normalized.push(0);
        continue;
      }
      if (raw < spec.min || raw > spec.max) {
        throw new ValidationError(
          `${subject}: ${field}.${name} = ${raw} is outside [${spec.min}, ${spec.max}]`,
          subject,
          `${field}.${name}`,
        );
      }
      const score = normalizeIndicator(raw, spec);
      details[name] = { raw, normalized: roundTo(score, SCORE_PRECISION) };
      normalized.push(score);
    }

    return { score: clamp(mean(normalized), 0, 100), details, missing };
  }

  /** Weighted total of pillar scores, at reporting precision. */
  totalOf(scores: Readonly<Record<Pillar, number>>): number {
    const { weights } = this.policy;
    const total = weights.E * scores.E + weights.S * scores.S + weights.G * scores.G;
    return roundTo(clamp(total, 0, 100), SCORE_PRECISION);
  }

  /** First bucket, scanning from the top, whose lower bound is at or below total. */
  bucketFor(total: number): Readonly<GradeBucket> {
    for (const bucket of this.policy.buckets) {
      if (total >= bucket.min) return bucket;
    }
    // Table coverage down to 0 is checked at load; totals are clamped to [0, 100].
    return this.policy.buckets[this.policy.buckets.length - 1];
  }

  gradeFor(total: number): GradeBucket['grade'] {
    return this.bucketFor(total).grade;
  }

  /** Pillars scoring below 70, weakest first. */
  improvementAreas(breakdown: ScoreBreakdown): Pillar[] {
    return PILLARS
      .filter(p => breakdown[p] < IMPROVEMENT_THRESHOLD)
      .sort((a, b) => breakdown[a] - breakdown[b] || a.localeCompare(b));
  }

  get weights(): Policy['weights'] {
    return this.policy.weights;
  }
}
