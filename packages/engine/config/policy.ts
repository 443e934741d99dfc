// Scoring policy: pillar weights, grade buckets, indicator registry.
// Validated once when loaded; engines trust a Policy afterwards.

import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';
import { deepFreeze } from '../utils/stats.js';
import { PILLARS, type Grade, type Pillar } from '../types/scoring.js';

const GRADES = ['A+', 'A', 'A-', 'B+', 'B', 'B-', 'C'] as const satisfies readonly Grade[];

export const GradeSchema = z.enum(GRADES);

const WeightsSchema = z.object({
  E: z.number().min(0),
  S: z.number().min(0),
  G: z.number().min(0),
});

const BucketSchema = z.object({
  grade: GradeSchema,
  min: z.number(),
  max: z.number(),
  discountPct: z.number(),
});

const IndicatorSpecSchema = z.object({
  min: z.number(),
  max: z.number(),
  direction: z.enum(['higher', 'lower']),
});

const RegistrySchema = z.object({
  E: z.record(IndicatorSpecSchema),
  S: z.record(IndicatorSpecSchema),
  G: z.record(IndicatorSpecSchema),
});

export const PolicyInputSchema = z.object({
  weights: WeightsSchema,
  buckets: z.array(BucketSchema).min(1),
  indicators: RegistrySchema,
});

export type PillarWeights = z.infer<typeof WeightsSchema>;
export type GradeBucket = z.infer<typeof BucketSchema>;
export type IndicatorSpec = z.infer<typeof IndicatorSpecSchema>;
export type IndicatorRegistry = z.infer<typeof RegistrySchema>;
export type PolicyInput = z.infer<typeof PolicyInputSchema>;

export interface Policy {
  readonly weights: Readonly<PillarWeights>;
  /** Descending by lower bound; contiguous over [0, 100]. */
  readonly buckets: readonly Readonly<GradeBucket>[];
  readonly indicators: Readonly<Record<Pillar, Readonly<Record<string, Readonly<IndicatorSpec>>>>>;
}

const WEIGHT_TOLERANCE = 1e-9;

export const DEFAULT_POLICY_INPUT: PolicyInput = {
  weights: { E: 0.30, S: 0.35, G: 0.35 },
  buckets: [
    { grade: 'A+', min: 90, max: 100, discountPct: 2.7 },
    { grade: 'A', min: 85, max: 90, discountPct: 2.2 },
    { grade: 'A-', min: 80, max: 85, discountPct: 1.8 },
    { grade: 'B+', min: 75, max: 80, discountPct: 1.3 },
    { grade: 'B', min: 70, max: 75, discountPct: 1.2 },
    { grade: 'B-', min: 65, max: 70, discountPct: 0.8 },
    { grade: 'C', min: 0, max: 65, discountPct: 0.4 },
  ],
  indicators: {
    E: {
      renewable_energy_ratio: { min: 0, max: 1, direction: 'higher' },
      waste_recycling_rate: { min: 0, max: 1, direction: 'higher' },
      carbon_intensity_ratio: { min: 0, max: 2, direction: 'lower' },  // emissions vs industry benchmark
    },
    S: {
      diversity_ratio: { min: 0, max: 1, direction: 'higher' },
      accident_rate: { min: 0, max: 1, direction: 'lower' },
      customer_satisfaction: { min: 0, max: 100, direction: 'higher' },
      donation_ratio: { min: 0, max: 0.05, direction: 'higher' },
      employee_retention_rate: { min: 0, max: 1, direction: 'higher' },
    },
    G: {
      independent_director_ratio: { min: 0, max: 1, direction: 'higher' },
      disclosure_score: { min: 0, max: 100, direction: 'higher' },
      ethics_violations: { min: 0, max: 10, direction: 'lower' },
    },
  },
};

function validateWeights(weights: PillarWeights): void {
  const sum = weights.E + weights.S + weights.G;
  if (Math.abs(sum - 1) > WEIGHT_TOLERANCE) {
    throw new ConfigurationError(`Pillar weights must sum to 1 (got ${sum})`, 'weights');
  }
}

/**
 * Buckets must be listed from the top of the scale down, each one's upper bound
 * equal to the previous one's lower bound, covering exactly [0, 100].
 */
export function validateBuckets(buckets: readonly GradeBucket[]): void {
  if (buckets.length === 0) {
    throw new ConfigurationError('Grade bucket table is empty', 'buckets');
  }

  const seen = new Set<Grade>();
  for (const [i, b] of buckets.entries()) {
    if (seen.has(b.grade)) {
      throw new ConfigurationError(`Grade ${b.grade} appears twice in bucket table`, 'buckets');
    }
    seen.add(b.grade);

    if (!(b.min < b.max)) {
      throw new ConfigurationError(`Bucket ${b.grade} has empty range [${b.min}, ${b.max}]`, 'buckets');
    }
    if (b.discountPct < 0) {
      throw new ConfigurationError(`Bucket ${b.grade} has negative discount ${b.discountPct}`, 'buckets');
    }

    if (i === 0) {
      if (b.max !== 100) {
        throw new ConfigurationError(`Top bucket ${b.grade} must end at 100 (ends at ${b.max})`, 'buckets');
      }
      continue;
    }

    const prev = buckets[i - 1];
    if (b.max > prev.min) {
      throw new ConfigurationError(`Buckets ${prev.grade} and ${b.grade} overlap`, 'buckets');
    }
    if (b.max < prev.min) {
      throw new ConfigurationError(`Gap between ${b.grade} (max ${b.max}) and ${prev.grade} (min ${prev.min})`, 'buckets');
    }
  }

  const bottom = buckets[buckets.length - 1];
  if (bottom.min !== 0) {
    throw new ConfigurationError(`Bottom bucket ${bottom.grade} must start at 0 (starts at ${bottom.min})`, 'buckets');
  }
}

function validateRegistry(indicators: IndicatorRegistry): void {
  for (const pillar of PILLARS) {
    const entries = Object.entries(indicators[pillar]);
    if (entries.length === 0) {
      throw new ConfigurationError(`Pillar ${pillar} has no indicators`, `indicators.${pillar}`);
    }
    for (const [name, spec] of entries) {
      if (!(spec.min < spec.max)) {
        throw new ConfigurationError(
          `Indicator ${name} has empty raw range [${spec.min}, ${spec.max}]`,
          `indicators.${pillar}.${name}`,
        );
      }
    }
  }
}

/**
 * Parse and validate a scoring policy.
 * @throws ConfigurationError on any structural or semantic defect
 */
export function loadPolicy(input: unknown = DEFAULT_POLICY_INPUT): Policy {
  const parsed = PolicyInputSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue.path.join('.') || 'policy';
    throw new ConfigurationError(`Invalid policy at ${path}: ${issue.message}`, path);
  }

  const policy = parsed.data;
  validateWeights(policy.weights);
  validateBuckets(policy.buckets);
  validateRegistry(policy.indicators);

  return deepFreeze(policy);
}

/** Position of a grade in the table, 0 = best. -1 if unknown. */
export function gradeRank(policy: Policy, grade: string): number {
  return policy.buckets.findIndex(b => b.grade === grade);
}

export function isGrade(value: string): value is Grade {
  return GradeSchema.safeParse(value).success;
}

export const DEFAULT_POLICY: Policy = loadPolicy();
