import type { InsightEngine } from "@insight-desk/engine";
import type { Caller } from "./caller.js";

export interface ToolContext {
  engine: InsightEngine;
  /** Fixed caller for every tool call; null when callers name themselves */
  caller: Caller | null;
}
