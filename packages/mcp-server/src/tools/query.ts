import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ForecastRecord } from "@insight-desk/engine";
import { resolveCaller } from "../caller.js";
import type { ToolContext } from "../context.js";
import { DescribeSchemaSchema, AskQuestionSchema, type AskQuestionInput } from "../schemas/insight.js";
import type { CallerInput } from "../schemas/common.js";
import { runTool } from "../formatters/response.js";

/** Forecast record without its daily series, for compact tool output */
export function summarizeForecast(record: ForecastRecord) {
  return {
    productId: record.productId,
    productName: record.productName,
    stockLevel: record.stockLevel,
    burnRate: record.burnRate,
    projectedDaysToStockout: record.projectedDaysToStockout,
    riskLevel: record.riskLevel,
    anomalyFlag: record.anomalyFlag,
    anomalousDays: record.anomalousDays,
  };
}

export async function askQuestion(ctx: ToolContext, params: AskQuestionInput) {
  const { role, identity } = resolveCaller(params, ctx.caller);
  const result = await ctx.engine.ask(params.question, identity, role, { asOf: params.as_of });
  return {
    request_id: result.requestId,
    answer: result.answer,
    result: result.structuredResult,
    ...(result.forecastSnapshot ? { forecast: result.forecastSnapshot.map(summarizeForecast) } : {}),
  };
}

export async function describeSchema(ctx: ToolContext, params: CallerInput): Promise<string> {
  const { role } = resolveCaller(params, ctx.caller);
  return ctx.engine.schema(role);
}

export function registerQueryTools(server: McpServer, ctx: ToolContext) {
  server.tool(
    "ask_question",
    "Answer a natural-language question about orders, products and revenue. Customers only ever see their own orders and the products those orders reference; business callers see every table. Returns the answer text, the structured result it was composed from, and for stock questions by business callers a stock-out forecast.",
    AskQuestionSchema.shape,
    async (params) => runTool("ask_question", () => askQuestion(ctx, AskQuestionSchema.parse(params)))
  );

  server.tool(
    "describe_schema",
    "Describe the tables, columns and joins the caller's role may query.",
    DescribeSchemaSchema.shape,
    async (params) => runTool("describe_schema", () => describeSchema(ctx, DescribeSchemaSchema.parse(params)))
  );
}
