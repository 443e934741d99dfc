import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { EsgPipeline } from "@esg-credit/engine";
import { PipelineSchema } from "../schemas/esg_credit.js";
import { coerceNumbers, runTool } from "../formatters/response.js";
import { resolveProducts, type ToolContext } from "./context.js";

export function registerPipelineTools(server: McpServer, ctx: ToolContext) {
  const pipeline = new EsgPipeline({ policy: ctx.policy, registry: ctx.registry, settings: ctx.settings });

  server.tool(
    "esg_pipeline",
    "Run the full ESG credit pipeline for one company: supplier aggregation → supply-chain-adjusted scoring → the current scores appended to the monthly history → features → forecast → product matching → an improvement plan toward the target grade (default one grade up) and, given loan_amount, the interest-saving estimate. A history too short to forecast skips the forecast (reason returned) and matching still runs.",
    PipelineSchema.shape,
    async (params) => runTool(async () => {
      const { suppliers, history, as_of_period, horizon_months, products, target_grade, loan_amount, ...indicators } =
        PipelineSchema.parse(coerceNumbers(params));
      return pipeline.run(
        { indicators, history, suppliers },
        {
          catalog: resolveProducts(ctx, products),
          horizonMonths: horizon_months,
          asOfPeriod: as_of_period,
          targetGrade: target_grade,
          loanAmount: loan_amount,
        },
      );
    })
  );
}
