import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ScoreEngine, analyzeImprovementDrivers } from "@esg-credit/engine";
import { EvaluateSchema, ImprovementDriversSchema } from "../schemas/esg_credit.js";
import { coerceNumbers, runTool } from "../formatters/response.js";
import type { ToolContext } from "./context.js";

export function registerScoringTools(server: McpServer, ctx: ToolContext) {
  const engine = new ScoreEngine(ctx.policy);

  server.tool(
    "esg_evaluate",
    "Score a company's E/S/G pillars from raw indicators. Each registered indicator is normalized to 0-100 by its range and direction; missing indicators count as 0. The supply-chain penalty is subtracted from E. Returns pillar scores, the weighted total (E 30%, S 35%, G 35%), grade (A+ to C), rate discount, K-Taxonomy/TCFD/GRI compliance with an overall percentage, per-indicator details and pillars needing improvement.",
    EvaluateSchema.shape,
    async (params) => runTool(() => {
      const { scope_adjustment, ...record } = EvaluateSchema.parse(coerceNumbers(params));
      const breakdown = engine.evaluate(record, scope_adjustment ?? 0);
      return { ...breakdown, improvementAreas: engine.improvementAreas(breakdown) };
    })
  );

  server.tool(
    "esg_improvement_drivers",
    "Plan the initiatives that lift a company to a target grade (default one grade up). Every improvement factor is ranked by weighted total-score gain per unit of cost, with gains capped at what each pillar has left below 100; factors are then taken in that order until the target grade's floor is reached. Returns the ranked recommendations, the chosen plan with its cost and duration, and the projected scores and grade.",
    ImprovementDriversSchema.shape,
    async (params) => runTool(() => {
      const { scope_adjustment, target_grade, ...record } = ImprovementDriversSchema.parse(coerceNumbers(params));
      const breakdown = engine.evaluate(record, scope_adjustment ?? 0);
      return analyzeImprovementDrivers(breakdown, target_grade, { policy: ctx.policy });
    })
  );
}
