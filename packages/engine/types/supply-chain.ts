// Supply chain: supplier-level emissions and ESG deficits

export type SupplierTier = 1 | 2;

export interface SupplierRecord {
  readonly supplierId: string;
  readonly emissions: number;      // tCO2e attributed to the buyer
  readonly esgScore: number;       // 0-100
  readonly weight: number;         // spend / ownership share, any scale
  readonly tier?: SupplierTier;
  readonly location?: string;
}

export interface ScopeAggregate {
  readonly supplierCount: number;
  readonly totalWeight: number;    // caller-supplied weight sum before renormalization
  readonly scope3Emissions: number;
  readonly riskPropagation: number;  // 0-100 penalty consumed by ScoreEngine
  readonly weights: Readonly<Record<string, number>>;  // normalized, sums to 1
}

export type RiskLevel = 'High' | 'Medium' | 'Low';

export interface SupplierRisk {
  readonly supplierId: string;
  readonly deficit: number;
  readonly tierFactor: number;
  readonly locationFactor: number;
  readonly riskScore: number;      // higher is safer
  readonly level: RiskLevel;
}

export interface ConcentrationRisk {
  readonly top5Share: number;      // percent of total weight
  readonly level: RiskLevel;
}

export interface SupplierAssessment {
  readonly suppliers: readonly SupplierRisk[];
  readonly counts: Readonly<Record<RiskLevel, number>>;
  readonly concentration: ConcentrationRisk;
}
