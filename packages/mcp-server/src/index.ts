#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createToolContext } from "./tools/context.js";
import { registerScoringTools } from "./tools/scoring.js";
import { registerSupplyChainTools } from "./tools/supply_chain.js";
import { registerForecastingTools } from "./tools/forecasting.js";
import { registerProductTools } from "./tools/products.js";
import { registerPipelineTools } from "./tools/pipeline.js";

const server = new McpServer({
  name: "esg-credit-mcp",
  version: "0.1.0",
});

const ctx = createToolContext();

registerScoringTools(server, ctx);
registerSupplyChainTools(server, ctx);
registerForecastingTools(server, ctx);
registerProductTools(server, ctx);
registerPipelineTools(server, ctx);

const transport = new StdioServerTransport();
await server.connect(transport);
