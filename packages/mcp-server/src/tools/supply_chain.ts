import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SupplyChainAnalyzer } from "@esg-credit/engine";
import { SupplyChainSchema } from "../schemas/esg_credit.js";
import { coerceNumbers, runTool } from "../formatters/response.js";
import type { ToolContext } from "./context.js";

export function registerSupplyChainTools(server: McpServer, ctx: ToolContext) {
  const analyzer = new SupplyChainAnalyzer(ctx.settings.supplyChain);

  server.tool(
    "esg_supply_chain",
    "Estimate Scope 3 emissions and the ESG risk propagated from suppliers. Weights are renormalized to sum to 1 (equal weights when all are zero); riskPropagation is the weighted shortfall below the target supplier score, scaled and capped at 100, and is the penalty esg_evaluate subtracts from E. Optionally returns per-supplier risk levels and top-5 spend concentration.",
    SupplyChainSchema.shape,
    async (params) => runTool(() => {
      const { suppliers, include_assessment } = SupplyChainSchema.parse(coerceNumbers(params));
      const aggregate = analyzer.aggregate(suppliers);
      return include_assessment ? { ...aggregate, assessment: analyzer.assess(suppliers) } : aggregate;
    })
  );
}
