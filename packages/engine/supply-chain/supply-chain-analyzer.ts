// SupplyChainAnalyzer: Scope 3 estimate and ESG risk propagation from supplier data.
// Aggregates are computed fresh per call; nothing is cached between supplier sets.

import { z } from 'zod';
import { DEFAULT_SETTINGS, type SupplyChainSettings } from '../config/settings.js';
import { ValidationError } from '../utils/errors.js';
import { clamp, deepFreeze, roundTo } from '../utils/stats.js';
import type {
  RiskLevel,
  ScopeAggregate,
  SupplierAssessment,
  SupplierRecord,
  SupplierRisk,
} from '../types/supply-chain.js';

export const SupplierRecordSchema = z.object({
  supplierId: z.string().min(1),
  emissions: z.number().finite().min(0),
  esgScore: z.number().min(0).max(100),
  weight: z.number().finite().min(0),
  tier: z.union([z.literal(1), z.literal(2)]).optional(),
  location: z.string().optional(),
});

/** Regional multipliers on supplier risk; unlisted regions use the fallback. */
const LOCATION_FACTORS: Readonly<Record<string, number>> = {
  Korea: 1.0,
  Japan: 1.0,
  EU: 1.0,
  USA: 1.1,
  China: 1.3,
  Vietnam: 1.4,
  India: 1.5,
};
const FALLBACK_LOCATION_FACTOR = 1.2;
const TIER2_FACTOR = 0.7;

function riskLevel(score: number): RiskLevel {
  if (score < 40) return 'High';
  if (score < 70) return 'Medium';
  return 'Low';
}

export class SupplyChainAnalyzer {
  private readonly settings: SupplyChainSettings;

  constructor(settings: SupplyChainSettings = DEFAULT_SETTINGS.supplyChain) {
    this.settings = settings;
  }

  /**
   * Spend-weighted Scope 3 estimate and risk-propagation penalty.
   *
   * Suppliers are summed in supplierId order, so any permutation of the same list
   * yields the same aggregate.
   */
  aggregate(suppliers: readonly SupplierRecord[], subject = 'supply chain'): ScopeAggregate {
    const ordered = this.canonicalise(suppliers, subject);

    if (ordered.length === 0) {
      return deepFreeze({
        supplierCount: 0,
        totalWeight: 0,
        scope3Emissions: 0,
        riskPropagation: 0,
        weights: {},
      });
    }

    const totalWeight = ordered.reduce((s, r) => s + r.weight, 0);
    // All-zero weights carry no spend information: every supplier counts equally.
    const share = (r: SupplierRecord) => (totalWeight > 0 ? r.weight / totalWeight : 1 / ordered.length);

    const weights: Record<string, number> = {};
    let scope3 = 0;
    let deficit = 0;
    for (const r of ordered) {
      const w = share(r);
      weights[r.supplierId] = w;
      scope3 += w * r.emissions;
      deficit += w * Math.max(0, this.settings.targetScore - r.esgScore);
    }

    return deepFreeze({
      supplierCount: ordered.length,
      totalWeight,
      scope3Emissions: scope3,
      riskPropagation: clamp(deficit * this.settings.riskScale, 0, 100),
      weights,
    });
  }

  /**
   * Per-supplier risk levels and spend concentration. Tier-2 suppliers and
   * higher-risk regions lower a supplier's risk score.
   */
  assess(suppliers: readonly SupplierRecord[], subject = 'supply chain'): SupplierAssessment {
    const ordered = this.canonicalise(suppliers, subject);
    const counts: Record<RiskLevel, number> = { High: 0, Medium: 0, Low: 0 };

    const risks: SupplierRisk[] = ordered.map(r => {
      const tierFactor = r.tier === 2 ? TIER2_FACTOR : 1.0;
      const locationFactor = r.location !== undefined
        ? LOCATION_FACTORS[r.location] ?? FALLBACK_LOCATION_FACTOR
        : 1.0;
      const riskScore = roundTo(clamp((r.esgScore * tierFactor) / locationFactor, 0, 100), 1);
      const level = riskLevel(riskScore);
      counts[level] += 1;
      return {
        supplierId: r.supplierId,
        deficit: Math.max(0, this.settings.targetScore - r.esgScore),
        tierFactor,
        locationFactor,
        riskScore,
        level,
      };
    });

    const totalWeight = ordered.reduce((s, r) => s + r.weight, 0);
    const top5 = [...ordered]
      .sort((a, b) => b.weight - a.weight || (a.supplierId < b.supplierId ? -1 : 1))
      .slice(0, 5)
      .reduce((s, r) => s + r.weight, 0);
    const top5Share = totalWeight > 0 ? roundTo((top5 / totalWeight) * 100, 1) : 0;

    const assessment: SupplierAssessment = {
      suppliers: risks,
      counts,
      concentration: {
        top5Share,
        level: top5Share > 80 ? 'High' : top5Share > 50 ? 'Medium' : 'Low',
      },
    };
    return deepFreeze(assessment);
  }

  private canonicalise(suppliers: readonly SupplierRecord[], subject: string): SupplierRecord[] {
    const seen = new Set<string>();
    const records: SupplierRecord[] = [];

    for (const [i, supplier] of suppliers.entries()) {
      const parsed = SupplierRecordSchema.safeParse(supplier);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const field = `suppliers[${i}].${issue.path.join('.')}`;
        throw new ValidationError(`${subject}: ${field} ${issue.message}`, subject, field);
      }
      if (seen.has(parsed.data.supplierId)) {
        throw new ValidationError(
          `${subject}: duplicate supplier ${parsed.data.supplierId}`,
          subject,
          `suppliers[${i}].supplierId`,
        );
      }
      seen.add(parsed.data.supplierId);
      records.push(parsed.data);
    }

    // Each weight is finite, but their sum can still overflow.
    const totalWeight = records.reduce((s, r) => s + r.weight, 0);
    if (!Number.isFinite(totalWeight)) {
      throw new ValidationError(`${subject}: supplier weights sum past the largest finite number`, subject, 'weight');
    }

    return records.sort((a, b) => (a.supplierId < b.supplierId ? -1 : a.supplierId > b.supplierId ? 1 : 0));
  }
}
