import { z } from "zod";

const IndicatorValuesSchema = z
  .record(z.coerce.number())
  .describe("Indicator name → raw reported value");

export const CompanyIdentitySchema = z.object({
  name: z.string().min(1).describe("Company name, used as the subject of every error"),
  industry: z.string().describe("Industry classification"),
  sizeClass: z.string().describe("Size class, e.g. large, mid, small"),
});

export const IndicatorFieldsSchema = {
  company: CompanyIdentitySchema.describe("Company identity"),
  environmental: IndicatorValuesSchema.describe(
    "Environmental indicators: renewable_energy_ratio (0-1), waste_recycling_rate (0-1), carbon_intensity_ratio (0-2, lower is better)"
  ),
  social: IndicatorValuesSchema.describe(
    "Social indicators: diversity_ratio, accident_rate (lower is better), customer_satisfaction (0-100), donation_ratio (0-0.05), employee_retention_rate"
  ),
  governance: IndicatorValuesSchema.describe(
    "Governance indicators: independent_director_ratio, disclosure_score (0-100), ethics_violations (0-10, lower is better)"
  ),
  compliance: z
    .object({
      kTaxonomy: z.boolean().optional().describe("Meets K-Taxonomy disclosure requirements"),
      tcfd: z.boolean().optional().describe("Reports under TCFD"),
      gri: z.boolean().optional().describe("Reports under GRI standards"),
    })
    .strict()
    .optional()
    .describe("Regulatory framework flags; absent flags count as not met"),
};

export const SeriesPointSchema = z.object({
  period: z.string().describe("Month as YYYY-MM"),
  E: z.coerce.number().min(0).max(100).describe("Environmental score"),
  S: z.coerce.number().min(0).max(100).describe("Social score"),
  G: z.coerce.number().min(0).max(100).describe("Governance score"),
});

export const SupplierSchema = z.object({
  supplierId: z.string().min(1).describe("Unique supplier identifier"),
  emissions: z.coerce.number().min(0).describe("Emissions attributed to the buyer (tCO2e)"),
  esgScore: z.coerce.number().min(0).max(100).describe("Supplier ESG score (0-100)"),
  weight: z.coerce.number().min(0).describe("Spend or ownership share, any scale"),
  tier: z.union([z.literal(1), z.literal(2)]).optional().describe("Supply tier (1 or 2)"),
  location: z.string().optional().describe("Region, e.g. Korea, China, EU"),
});

const ThresholdSchema = z.union([z.number(), z.string(), z.array(z.string())]);

const ConditionValueSchema = z.union([
  ThresholdSchema,
  z.object({
    threshold: ThresholdSchema.describe("Threshold value, grade, or list of admitted names"),
    aggregate: z.enum(["final", "mean"]).optional().describe("How projected values are aggregated over the horizon"),
  }),
]);

export const ProductSchema = z.object({
  id: z.string().min(1).describe("Product identifier"),
  name: z.string().min(1).describe("Product display name"),
  baseRate: z.coerce.number().min(0).describe("Base annual rate in percent"),
  esgDiscount: z.boolean().describe("Whether the ESG grade discount applies"),
  conditions: z
    .record(ConditionValueSchema)
    .default({})
    .describe(
      "Eligibility conditions, e.g. { min_grade: 'B+', projected_e_score: 70, target_size_classes: ['small', 'mid'] }"
    ),
  gradeDiscounts: z
    .record(z.coerce.number().min(0))
    .optional()
    .describe("Per-grade discount in percentage points; overrides the grade table"),
  category: z.string().optional().describe("Product category"),
  maxAmount: z.coerce.number().positive().optional().describe("Maximum loan amount"),
});
