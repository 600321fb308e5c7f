import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ToolContext } from "./context.js";
import { registerQueryTools } from "./tools/query.js";
import { registerInsightTools } from "./tools/insight.js";

export const SERVER_NAME = "insight-desk";
export const SERVER_VERSION = "0.1.0";

export function createServer(ctx: ToolContext): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerQueryTools(server, ctx);
  registerInsightTools(server, ctx);

  return server;
}

export { pinnedCallerFromEnv, resolveCaller, CallerError } from "./caller.js";
export type { Caller } from "./caller.js";
export type { ToolContext } from "./context.js";
