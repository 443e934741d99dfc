import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  FeatureBuilder,
  ForecastModel,
  InsufficientHistoryError,
  ProductMatcher,
  ScoreEngine,
  calculateLoanTerms,
  estimateBenefits,
  gradeRateBenefit,
  simulateGradeUpgrade,
  type ForecastResult,
  type HistoricalSeries,
} from "@esg-credit/engine";
import { BenefitsSchema, GradeUpgradeSchema, LoanTermsSchema, MatchProductsSchema } from "../schemas/esg_credit.js";
import { coerceNumbers, runTool } from "../formatters/response.js";
import { resolveProducts, type ToolContext } from "./context.js";

export function registerProductTools(server: McpServer, ctx: ToolContext) {
  const engine = new ScoreEngine(ctx.policy);
  const matcher = new ProductMatcher(ctx.policy, ctx.registry);
  const builder = new FeatureBuilder();
  const model = new ForecastModel(ctx.settings.forecast);

  const forecastOrSkip = (history: HistoricalSeries, horizon: number, subject: string): ForecastResult | string => {
    try {
      return model.predict(model.fit(builder.build(history, subject), subject), horizon);
    } catch (err) {
      if (err instanceof InsufficientHistoryError) return err.message;
      throw err;
    }
  };

  server.tool(
    "esg_match_products",
    "Match a company against financial products. Conditions cover current scores, grade, renewable ratio, supply-chain penalty, compliance share, target industries and size classes, and forecast (projected) scores; all must pass. Eligible products with an ESG discount get the grade discount off the base rate. Projected conditions fail when no history or too short a history is given. Results are ordered by effective rate.",
    MatchProductsSchema.shape,
    async (params) => runTool(() => {
      const { scope_adjustment, history, horizon_months, products, ...record } =
        MatchProductsSchema.parse(coerceNumbers(params));
      const catalog = resolveProducts(ctx, products);
      const breakdown = engine.evaluate(record, scope_adjustment ?? 0);

      const forecast = history === undefined
        ? "no history supplied"
        : forecastOrSkip(history, horizon_months ?? ctx.settings.forecast.horizon, breakdown.company);
      const matches = matcher.match(breakdown, typeof forecast === "string" ? null : forecast, catalog);

      return {
        company: breakdown.company,
        grade: breakdown.grade,
        total: breakdown.total,
        discountPct: breakdown.discountPct,
        forecastSkipped: typeof forecast === "string" ? forecast : undefined,
        matches,
      };
    })
  );

  server.tool(
    "esg_benefits",
    "Estimate what a company's ESG grade is worth on a loan: annual interest saved on each eligible discounted product (the loan capped at the product's maximum amount), the package built on the best product over a number of years plus any non-rate benefits, and the saving from the grade discount on a reference-rate loan.",
    BenefitsSchema.shape,
    async (params) => runTool(() => {
      const {
        scope_adjustment, history, horizon_months, products, loan_amount, years, additional_benefits, base_rate, ...record
      } = BenefitsSchema.parse(coerceNumbers(params));
      const catalog = resolveProducts(ctx, products);
      const breakdown = engine.evaluate(record, scope_adjustment ?? 0);

      const forecast = history === undefined
        ? null
        : forecastOrSkip(history, horizon_months ?? ctx.settings.forecast.horizon, breakdown.company);
      const matches = matcher.match(breakdown, forecast === null || typeof forecast === "string" ? null : forecast, catalog);

      return {
        company: breakdown.company,
        grade: breakdown.grade,
        package: estimateBenefits(matches, catalog, {
          loanAmount: loan_amount,
          years,
          additionalBenefits: additional_benefits,
        }),
        gradeDiscount: gradeRateBenefit(breakdown, loan_amount, base_rate),
      };
    })
  );

  server.tool(
    "esg_loan_terms",
    "Level-payment loan amortization: monthly payment, total payment and total interest for a principal, annual rate (percent) and term in years.",
    LoanTermsSchema.shape,
    async (params) => runTool(() => {
      const { amount, rate, term_years } = LoanTermsSchema.parse(coerceNumbers(params));
      return calculateLoanTerms(amount, rate, term_years);
    })
  );

  server.tool(
    "esg_grade_upgrade",
    "Simulate reaching a higher ESG grade: re-runs product matching with the target grade and its discount, and reports newly eligible products and the best-rate improvement.",
    GradeUpgradeSchema.shape,
    async (params) => runTool(() => {
      const { scope_adjustment, target_grade, products, ...record } = GradeUpgradeSchema.parse(coerceNumbers(params));
      const breakdown = engine.evaluate(record, scope_adjustment ?? 0);
      return simulateGradeUpgrade(breakdown, target_grade, resolveProducts(ctx, products), {
        policy: ctx.policy,
        registry: ctx.registry,
      });
    })
  );
}
