// Product condition registry: what each eligibility condition name reads
// and which way its threshold compares. Names are never inferred.

import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';
import { deepFreeze } from '../utils/stats.js';

const ConditionSourceSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('pillar'), pillar: z.enum(['E', 'S', 'G']) }),
  z.object({ kind: z.literal('total') }),
  z.object({ kind: z.literal('grade') }),
  z.object({ kind: z.literal('indicator'), pillar: z.enum(['E', 'S', 'G']), indicator: z.string().min(1) }),
  z.object({ kind: z.literal('scope_adjustment') }),
  z.object({ kind: z.literal('compliance') }),
  z.object({ kind: z.literal('industry') }),
  z.object({ kind: z.literal('size_class') }),
]);

const ConditionDefinitionSchema = z.object({
  source: ConditionSourceSchema,
  // 'in': the company's value is one of the listed names
  comparator: z.enum(['min', 'max', 'in']),
  horizon: z.enum(['current', 'projected']),
  defaultAggregate: z.enum(['final', 'mean']).default('final'),
  description: z.string(),
});

const RegistryInputSchema = z.record(ConditionDefinitionSchema);

export type ConditionSource = z.infer<typeof ConditionSourceSchema>;
export type ConditionDefinition = z.infer<typeof ConditionDefinitionSchema>;
export type ConditionRegistry = Readonly<Record<string, Readonly<ConditionDefinition>>>;

export const DEFAULT_CONDITIONS: z.input<typeof RegistryInputSchema> = {
  min_total_score: {
    source: { kind: 'total' }, comparator: 'min', horizon: 'current',
    description: 'Current total score at or above threshold',
  },
  min_e_score: {
    source: { kind: 'pillar', pillar: 'E' }, comparator: 'min', horizon: 'current',
    description: 'Current environmental score at or above threshold',
  },
  min_s_score: {
    source: { kind: 'pillar', pillar: 'S' }, comparator: 'min', horizon: 'current',
    description: 'Current social score at or above threshold',
  },
  min_g_score: {
    source: { kind: 'pillar', pillar: 'G' }, comparator: 'min', horizon: 'current',
    description: 'Current governance score at or above threshold',
  },
  min_grade: {
    source: { kind: 'grade' }, comparator: 'min', horizon: 'current',
    description: 'Current grade at or above the named grade',
  },
  renewable_ratio: {
    source: { kind: 'indicator', pillar: 'E', indicator: 'renewable_energy_ratio' }, comparator: 'min', horizon: 'current',
    description: 'Reported renewable energy ratio at or above threshold',
  },
  max_supply_chain_penalty: {
    source: { kind: 'scope_adjustment' }, comparator: 'max', horizon: 'current',
    description: 'Supply-chain penalty applied to E at or below threshold',
  },
  min_compliance_score: {
    source: { kind: 'compliance' }, comparator: 'min', horizon: 'current',
    description: 'Share of K-Taxonomy, TCFD and GRI requirements met, in percent, at or above threshold',
  },
  target_industries: {
    source: { kind: 'industry' }, comparator: 'in', horizon: 'current',
    description: 'Company industry among the listed industries ("*" admits any)',
  },
  target_size_classes: {
    source: { kind: 'size_class' }, comparator: 'in', horizon: 'current',
    description: 'Company size class among the listed classes ("*" admits any)',
  },
  projected_total_score: {
    source: { kind: 'total' }, comparator: 'min', horizon: 'projected',
    description: 'Forecast total score at or above threshold',
  },
  projected_e_score: {
    source: { kind: 'pillar', pillar: 'E' }, comparator: 'min', horizon: 'projected',
    description: 'Forecast environmental score at or above threshold',
  },
  projected_s_score: {
    source: { kind: 'pillar', pillar: 'S' }, comparator: 'min', horizon: 'projected',
    description: 'Forecast social score at or above threshold',
  },
  projected_g_score: {
    source: { kind: 'pillar', pillar: 'G' }, comparator: 'min', horizon: 'projected',
    description: 'Forecast governance score at or above threshold',
  },
};

const FORECAST_SOURCES: ReadonlySet<ConditionSource['kind']> = new Set(['pillar', 'total']);
const MEMBERSHIP_SOURCES: ReadonlySet<ConditionSource['kind']> = new Set(['industry', 'size_class']);

/**
 * Parse and validate a condition registry.
 * @throws ConfigurationError on malformed entries
 */
export function loadConditionRegistry(input: unknown = DEFAULT_CONDITIONS): ConditionRegistry {
  const parsed = RegistryInputSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue.path.join('.') || 'conditions';
    throw new ConfigurationError(`Invalid condition registry at ${path}: ${issue.message}`, `conditions.${path}`);
  }

  const registry = parsed.data;
  if (Object.keys(registry).length === 0) {
    throw new ConfigurationError('Condition registry is empty', 'conditions');
  }
  for (const [name, def] of Object.entries(registry)) {
    if (def.source.kind === 'grade' && def.horizon === 'projected') {
      throw new ConfigurationError(`Condition ${name}: projected grade conditions are not supported`, `conditions.${name}`);
    }
    if (!FORECAST_SOURCES.has(def.source.kind) && def.horizon === 'projected') {
      throw new ConfigurationError(`Condition ${name}: ${def.source.kind} has no forecast`, `conditions.${name}`);
    }
    if ((def.comparator === 'in') !== MEMBERSHIP_SOURCES.has(def.source.kind)) {
      throw new ConfigurationError(
        `Condition ${name}: ${def.source.kind} cannot use the ${def.comparator} comparator`,
        `conditions.${name}`,
      );
    }
  }

  return deepFreeze(registry);
}

export const DEFAULT_CONDITION_REGISTRY: ConditionRegistry = loadConditionRegistry();
