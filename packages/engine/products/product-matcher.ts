// ProductMatcher: multi-condition eligibility of financial products against
// current scores and, where a product asks for it, the forecast trajectory.

import { z } from 'zod';
import { DEFAULT_CONDITION_REGISTRY, type ConditionDefinition, type ConditionRegistry } from '../config/conditions.js';
import { DEFAULT_POLICY, GradeSchema, gradeRank, type Policy } from '../config/policy.js';
import { ValidationError } from '../utils/errors.js';
import { clamp, deepFreeze, mean, roundTo } from '../utils/stats.js';
import type { Grade, Pillar, ScoreBreakdown } from '../types/scoring.js';
import type { ForecastResult } from '../types/forecast.js';
import type { MatchResult, ProductSpec, ProjectionAggregate } from '../types/products.js';

const ThresholdSchema = z.union([
  z.number().finite(),
  z.string().min(1),
  z.array(z.string().min(1)).min(1),
]);

const ConditionValueSchema = z.union([
  ThresholdSchema,
  z.object({
    threshold: ThresholdSchema,
    aggregate: z.enum(['final', 'mean']).optional(),
  }),
]);

/** Matches any company in a membership condition. */
const ANY = '*';

export const ProductSpecSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  baseRate: z.number().finite().min(0),
  esgDiscount: z.boolean(),
  conditions: z.record(ConditionValueSchema).default({}),
  gradeDiscounts: z.record(GradeSchema, z.number().finite().min(0)).optional(),
  category: z.string().optional(),
  maxAmount: z.number().positive().optional(),
});

interface ResolvedCondition {
  name: string;
  definition: ConditionDefinition;
  threshold: number | Grade | string[];
  aggregate: ProjectionAggregate;
}

const normalizeName = (value: string) => value.trim().toLowerCase();

const RATE_PRECISION = 4;

function compareByRateThenId(a: MatchResult, b: MatchResult): number {
  if (a.effectiveRate !== b.effectiveRate) return a.effectiveRate - b.effectiveRate;
  return a.productId < b.productId ? -1 : a.productId > b.productId ? 1 : 0;
}

export class ProductMatcher {
  constructor(
    private readonly policy: Policy = DEFAULT_POLICY,
    private readonly registry: ConditionRegistry = DEFAULT_CONDITION_REGISTRY,
  ) {}

  /**
   * Evaluate every product and order the results by effective rate, then id.
   *
   * Without a forecast, conditions on projected values fail and are reported.
   * @throws ValidationError for a malformed product or an unregistered condition
   */
  match(breakdown: ScoreBreakdown, forecast: ForecastResult | null, catalog: readonly ProductSpec[]): MatchResult[] {
    const results = catalog.map(product => this.evaluateProduct(breakdown, forecast, product));
    return deepFreeze(results.sort(compareByRateThenId));
  }

  /** Validate one catalog entry against the schema and the condition registry. */
  validateProduct(product: unknown, position = 0): ProductSpec {
    const parsed = ProductSpecSchema.safeParse(product);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const subject = productLabel(product, position);
      const field = issue.path.join('.');
      throw new ValidationError(`${subject}: ${field || 'product'} ${issue.message}`, subject, field || undefined);
    }
    this.resolveConditions(parsed.data);
    return parsed.data;
  }

  private evaluateProduct(breakdown: ScoreBreakdown, forecast: ForecastResult | null, product: ProductSpec): MatchResult {
    const spec = this.validateProduct(product);
    const failed: string[] = [];

    for (const condition of this.resolveConditions(spec)) {
      if (!this.satisfies(condition, breakdown, forecast)) failed.push(condition.name);
    }
    failed.sort();

    const eligible = failed.length === 0;
    const discountPct = spec.esgDiscount && eligible
      ? spec.gradeDiscounts?.[breakdown.grade] ?? breakdown.discountPct
      : 0;

    return {
      productId: spec.id,
      productName: spec.name,
      eligible,
      failedConditions: failed,
      discountPct,
      effectiveRate: roundTo(Math.max(0, spec.baseRate - discountPct), RATE_PRECISION),
    };
  }

  private resolveConditions(product: ProductSpec): ResolvedCondition[] {
    return Object.entries(product.conditions).map(([name, value]) => {
      const definition = this.registry[name];
      if (definition === undefined || !Object.hasOwn(this.registry, name)) {
        throw new ValidationError(`${product.id}: unknown condition "${name}"`, product.id, `conditions.${name}`);
      }

      const raw = typeof value === 'object' && !Array.isArray(value) ? value.threshold : value;
      const aggregate = typeof value === 'object' && !Array.isArray(value) && value.aggregate !== undefined
        ? value.aggregate
        : definition.defaultAggregate;

      if (definition.comparator === 'in') {
        if (typeof raw === 'number') {
          throw new ValidationError(`${product.id}: ${name} needs a list of names, got ${raw}`, product.id, `conditions.${name}`);
        }
        const names = (typeof raw === 'string' ? [raw] : raw).map(normalizeName);
        return { name, definition, threshold: names, aggregate };
      }

      if (definition.source.kind === 'grade') {
        const grade = GradeSchema.safeParse(raw);
        if (!grade.success || gradeRank(this.policy, grade.data) < 0) {
          throw new ValidationError(`${product.id}: ${name} needs a grade, got ${String(raw)}`, product.id, `conditions.${name}`);
        }
        return { name, definition, threshold: grade.data, aggregate };
      }

      if (typeof raw !== 'number') {
        throw new ValidationError(`${product.id}: ${name} needs a numeric threshold, got ${JSON.stringify(raw)}`, product.id, `conditions.${name}`);
      }
      return { name, definition, threshold: raw, aggregate };
    });
  }

  private satisfies(condition: ResolvedCondition, breakdown: ScoreBreakdown, forecast: ForecastResult | null): boolean {
    const { definition, threshold } = condition;

    if (definition.source.kind === 'grade') {
      // Lower rank is better; at or above the named grade passes.
      return typeof threshold === 'string'
        && gradeRank(this.policy, breakdown.grade) <= gradeRank(this.policy, threshold);
    }
    if (definition.comparator === 'in') {
      const actual = this.memberValue(definition, breakdown);
      return Array.isArray(threshold) && actual !== null
        && (threshold.includes(ANY) || threshold.includes(normalizeName(actual)));
    }
    if (typeof threshold !== 'number') return false;

    const actual = definition.horizon === 'projected'
      ? this.projectedValue(definition, condition.aggregate, forecast)
      : this.currentValue(definition, breakdown);
    if (actual === null) return false;

    return definition.comparator === 'min' ? actual >= threshold : actual <= threshold;
  }

  private currentValue(definition: ConditionDefinition, breakdown: ScoreBreakdown): number | null {
    const source = definition.source;
    switch (source.kind) {
      case 'pillar':
        return breakdown[source.pillar];
      case 'total':
        return breakdown.total;
      case 'scope_adjustment':
        return breakdown.scopeAdjustment;
      case 'indicator':
        return breakdown.details[source.pillar][source.indicator]?.raw ?? null;
      case 'compliance':
        return breakdown.compliance.overall;
      case 'grade':
      case 'industry':
      case 'size_class':
        return null;
    }
  }

  private memberValue(definition: ConditionDefinition, breakdown: ScoreBreakdown): string | null {
    switch (definition.source.kind) {
      case 'industry':
        return breakdown.industry;
      case 'size_class':
        return breakdown.sizeClass;
      default:
        return null;
    }
  }

  private projectedValue(
    definition: ConditionDefinition,
    aggregate: ProjectionAggregate,
    forecast: ForecastResult | null,
  ): number | null {
    if (forecast === null || forecast.horizon === 0) return null;
    const source = definition.source;

    let trajectory: readonly number[];
    if (source.kind === 'pillar') {
      trajectory = forecast.predictions[source.pillar];
    } else if (source.kind === 'total') {
      trajectory = projectedTotals(forecast, this.policy);
    } else {
      return null;
    }

    return aggregate === 'mean' ? mean(trajectory) : trajectory[trajectory.length - 1];
  }
}

/** Policy-weighted total at each forecast step, at score precision. */
export function projectedTotals(forecast: ForecastResult, policy: Policy = DEFAULT_POLICY): number[] {
  const { weights } = policy;
  const p: Readonly<Record<Pillar, readonly number[]>> = forecast.predictions;
  return p.E.map((e, i) => roundTo(clamp(weights.E * e + weights.S * p.S[i] + weights.G * p.G[i], 0, 100), 2));
}

function productLabel(product: unknown, position: number): string {
  if (product !== null && typeof product === 'object' && 'id' in product && typeof product.id === 'string') {
    return product.id;
  }
  return `product #${position}`;
}
