// Improvement factors: initiatives a company can take, with the pillar points
// each adds, its estimated cost (millions) and the months it takes.

import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';
import { deepFreeze } from '../utils/stats.js';
import type { ImprovementFactor } from '../types/scoring.js';

const FactorSchema = z.object({
  name: z.string().min(1),
  pillar: z.enum(['E', 'S', 'G']),
  impact: z.number().positive().max(100),
  cost: z.number().positive(),
  months: z.number().int().positive(),
  description: z.string().default(''),
});

const FactorTableSchema = z.array(FactorSchema).min(1);

export const DEFAULT_IMPROVEMENT_FACTORS: z.input<typeof FactorTableSchema> = [
  { name: 'renewable_energy_transition', pillar: 'E', impact: 15, cost: 500, months: 12, description: 'Move purchased power to renewable sources' },
  { name: 'carbon_reduction_tech', pillar: 'E', impact: 20, cost: 800, months: 18, description: 'Install process-level carbon reduction equipment' },
  { name: 'waste_management', pillar: 'E', impact: 10, cost: 200, months: 6, description: 'Raise waste sorting and recycling rates' },
  { name: 'water_efficiency', pillar: 'E', impact: 8, cost: 150, months: 9, description: 'Cut water withdrawal per unit of output' },
  { name: 'green_certification', pillar: 'E', impact: 5, cost: 50, months: 3, description: 'Obtain environmental management certification' },
  { name: 'diversity_program', pillar: 'S', impact: 12, cost: 100, months: 6, description: 'Hiring and promotion diversity targets' },
  { name: 'safety_enhancement', pillar: 'S', impact: 15, cost: 300, months: 9, description: 'Workplace safety systems and training' },
  { name: 'employee_wellbeing', pillar: 'S', impact: 10, cost: 200, months: 6, description: 'Benefits and retention programmes' },
  { name: 'community_engagement', pillar: 'S', impact: 8, cost: 150, months: 3, description: 'Local community investment' },
  { name: 'supply_chain_audit', pillar: 'S', impact: 10, cost: 250, months: 12, description: 'ESG audits of tier-1 suppliers' },
  { name: 'esg_committee', pillar: 'G', impact: 20, cost: 50, months: 3, description: 'Board-level ESG committee' },
  { name: 'board_diversity', pillar: 'G', impact: 15, cost: 30, months: 6, description: 'Independent and diverse board seats' },
  { name: 'transparency_enhancement', pillar: 'G', impact: 12, cost: 100, months: 6, description: 'Expanded sustainability disclosure' },
  { name: 'risk_management', pillar: 'G', impact: 10, cost: 200, months: 9, description: 'Enterprise risk management framework' },
  { name: 'compliance_system', pillar: 'G', impact: 8, cost: 300, months: 12, description: 'Compliance monitoring and whistleblowing channel' },
];

/**
 * Parse and validate an improvement factor table.
 * @throws ConfigurationError on malformed entries or a repeated factor name
 */
export function loadImprovementFactors(input: unknown = DEFAULT_IMPROVEMENT_FACTORS): readonly ImprovementFactor[] {
  const parsed = FactorTableSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue.path.join('.') || 'factors';
    throw new ConfigurationError(`Invalid improvement factor at ${path}: ${issue.message}`, `factors.${path}`);
  }

  const seen = new Set<string>();
  for (const factor of parsed.data) {
    if (seen.has(factor.name)) {
      throw new ConfigurationError(`Improvement factor ${factor.name} is listed twice`, `factors.${factor.name}`);
    }
    seen.add(factor.name);
  }
  return deepFreeze(parsed.data);
}

export const DEFAULT_FACTOR_TABLE: readonly ImprovementFactor[] = loadImprovementFactors();
