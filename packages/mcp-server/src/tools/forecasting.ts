import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { FeatureBuilder, ForecastModel, summarizeConfidence } from "@esg-credit/engine";
import { FeaturesSchema, ForecastSchema } from "../schemas/esg_credit.js";
import { coerceNumbers, runTool } from "../formatters/response.js";
import type { ToolContext } from "./context.js";

export function registerForecastingTools(server: McpServer, ctx: ToolContext) {
  const builder = new FeatureBuilder();
  const model = new ForecastModel(ctx.settings.forecast);

  server.tool(
    "esg_features",
    "Build the per-period feature rows used by the forecaster: value, 3- and 6-month rolling means, 6-month rolling std, 3-month momentum and quarterly seasonal mean per metric, plus month, quarter, year and the E/S/G balance. Windows without enough history are null and the row is marked incomplete.",
    FeaturesSchema.shape,
    async (params) => runTool(() => {
      const { history } = FeaturesSchema.parse(coerceNumbers(params));
      return builder.build(history);
    })
  );

  server.tool(
    "esg_forecast",
    "Forecast E/S/G scores month by month with a seeded bagged regression-tree ensemble per metric, rolled forward recursively. Needs at least 7 monthly periods. Returns predicted scores clamped to 0-100, confidence bands that never narrow with the horizon, and a 0-100 confidence summary.",
    ForecastSchema.shape,
    async (params) => runTool(() => {
      const { history, horizon_months } = ForecastSchema.parse(coerceNumbers(params));
      const trained = model.fit(builder.build(history));
      const result = model.predict(trained, horizon_months ?? ctx.settings.forecast.horizon);
      return { ...result, seed: model.seed, summary: summarizeConfidence(result) };
    })
  );
}
