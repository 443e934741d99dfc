import { z } from "zod";
import {
  IndicatorFieldsSchema,
  ProductSchema,
  SeriesPointSchema,
  SupplierSchema,
} from "./records.js";

const HorizonSchema = z.coerce
  .number()
  .int()
  .min(1)
  .max(36)
  .optional()
  .describe("Forecast horizon in months (1-36, default from ESG_FORECAST_HORIZON)");

const GradeSchema = z.enum(["A+", "A", "A-", "B+", "B", "B-", "C"]);

const ProductsSchema = z
  .array(ProductSchema)
  .optional()
  .describe("Product catalog to match against; the bundled catalog when omitted");

export const EvaluateSchema = z.object({
  ...IndicatorFieldsSchema,
  scope_adjustment: z.coerce
    .number()
    .min(0)
    .optional()
    .describe("Supply-chain penalty subtracted from the E score (default 0)"),
});

export const SupplyChainSchema = z.object({
  suppliers: z.array(SupplierSchema).describe("Supplier records; order does not matter"),
  include_assessment: z
    .boolean()
    .optional()
    .describe("Also return per-supplier risk levels and spend concentration"),
});

export const FeaturesSchema = z.object({
  history: z.array(SeriesPointSchema).describe("Monthly E/S/G scores in chronological order"),
});

export const ForecastSchema = z.object({
  history: z.array(SeriesPointSchema).min(1).describe("Monthly E/S/G scores in chronological order (at least 7)"),
  horizon_months: HorizonSchema,
});

export const MatchProductsSchema = z.object({
  ...IndicatorFieldsSchema,
  scope_adjustment: z.coerce.number().min(0).optional().describe("Supply-chain penalty subtracted from E"),
  history: z
    .array(SeriesPointSchema)
    .optional()
    .describe("Monthly history; projected conditions are evaluated only when it is long enough to forecast"),
  horizon_months: HorizonSchema,
  products: ProductsSchema,
});

export const PipelineSchema = z.object({
  ...IndicatorFieldsSchema,
  suppliers: z.array(SupplierSchema).default([]).describe("Supplier records"),
  history: z.array(SeriesPointSchema).default([]).describe("Monthly E/S/G history before the current evaluation"),
  as_of_period: z
    .string()
    .optional()
    .describe("Period (YYYY-MM) of the current evaluation; defaults to the month after the last history point"),
  horizon_months: HorizonSchema,
  products: ProductsSchema,
  target_grade: GradeSchema.optional().describe("Grade the improvement plan aims for (default one grade up)"),
  loan_amount: z.coerce
    .number()
    .positive()
    .optional()
    .describe("Loan amount to estimate interest savings on; no estimate when omitted"),
});

export const LoanTermsSchema = z.object({
  amount: z.coerce.number().positive().describe("Principal"),
  rate: z.coerce.number().min(0).describe("Annual rate in percent"),
  term_years: z.coerce.number().int().min(1).describe("Term in whole years"),
});

export const GradeUpgradeSchema = z.object({
  ...IndicatorFieldsSchema,
  scope_adjustment: z.coerce.number().min(0).optional().describe("Supply-chain penalty subtracted from E"),
  target_grade: GradeSchema.describe("Grade to simulate"),
  products: ProductsSchema,
});

export const ImprovementDriversSchema = z.object({
  ...IndicatorFieldsSchema,
  scope_adjustment: z.coerce.number().min(0).optional().describe("Supply-chain penalty subtracted from E"),
  target_grade: GradeSchema.optional().describe("Grade to reach (default one grade above the current one)"),
});

export const BenefitsSchema = z.object({
  ...IndicatorFieldsSchema,
  scope_adjustment: z.coerce.number().min(0).optional().describe("Supply-chain penalty subtracted from E"),
  history: z
    .array(SeriesPointSchema)
    .optional()
    .describe("Monthly history; projected conditions are evaluated only when it is long enough to forecast"),
  horizon_months: HorizonSchema,
  products: ProductsSchema,
  loan_amount: z.coerce.number().positive().describe("Loan amount the savings are priced on"),
  years: z.coerce.number().int().min(1).optional().describe("Years of savings in the package value (default 5)"),
  additional_benefits: z.coerce
    .number()
    .min(0)
    .optional()
    .describe("Non-rate benefits added once to the package value (default 0)"),
  base_rate: z.coerce
    .number()
    .min(0)
    .optional()
    .describe("Reference rate in percent for the grade-discount estimate (default 3.5)"),
});
