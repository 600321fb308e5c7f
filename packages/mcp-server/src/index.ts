#!/usr/bin/env node
import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createInsightEngine, createLogger, loadConfig } from "@insight-desk/engine";
import { pinnedCallerFromEnv } from "./caller.js";
import { createServer } from "./server.js";

const log = createLogger("McpServer");

const engine = createInsightEngine(loadConfig());
const caller = pinnedCallerFromEnv();
const server = createServer({ engine, caller });

const transport = new StdioServerTransport();
await server.connect(transport);

log.info("Listening on stdio", caller ? { role: caller.role } : { role: "per-call" });
