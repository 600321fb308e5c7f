import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ForbiddenOperation } from "@insight-desk/engine";
import { resolveCaller } from "../caller.js";
import type { ToolContext } from "../context.js";
import {
  ForecastSchema,
  OrderStatusSchema,
  DelayReportSchema,
  RevenueAnomaliesSchema,
  SystemAuditSchema,
  RefreshDataSchema,
  type ForecastInput,
  type OrderStatusInput,
  type DelayReportInput,
  type RevenueAnomaliesInput,
  type SystemAuditInput,
} from "../schemas/insight.js";
import type { CallerInput } from "../schemas/common.js";
import { runTool } from "../formatters/response.js";
import { summarizeForecast } from "./query.js";

export const ORDER_NOT_VISIBLE = "No order with that id is visible to this caller.";

export async function getForecast(ctx: ToolContext, params: ForecastInput) {
  const { role, identity } = resolveCaller(params, ctx.caller);
  const records = await ctx.engine.getForecast(identity, role, { asOf: params.as_of });
  return records
    .filter(r => !params.at_risk_only || r.riskLevel !== "Low")
    .map(summarizeForecast);
}

export async function orderStatus(ctx: ToolContext, params: OrderStatusInput) {
  const { role, identity } = resolveCaller(params, ctx.caller);
  const view = await ctx.engine.orderStatus(params.order_id, identity, role, { asOf: params.as_of });
  // Same answer for a missing order and someone else's
  return view ?? { found: false, message: ORDER_NOT_VISIBLE };
}

export async function delayReport(ctx: ToolContext, params: DelayReportInput) {
  const { role, identity } = resolveCaller(params, ctx.caller);
  return ctx.engine.delayReport(identity, role, {
    asOf: params.as_of,
    minDaysOverdue: params.min_days_overdue,
    atRiskWindowDays: params.at_risk_window_days,
  });
}

export async function revenueAnomalies(ctx: ToolContext, params: RevenueAnomaliesInput) {
  const { role, identity } = resolveCaller(params, ctx.caller);
  const report = await ctx.engine.revenueAnomalies(identity, role, {
    days: params.days,
    threshold: params.threshold,
  });
  return report ?? { report: null, message: "No revenue data available." };
}

export async function systemAudit(ctx: ToolContext, params: SystemAuditInput) {
  const { role, identity } = resolveCaller(params, ctx.caller);
  return ctx.engine.audit(identity, role, { asOf: params.as_of });
}

export async function refreshData(ctx: ToolContext, params: CallerInput) {
  const { role } = resolveCaller(params, ctx.caller);
  if (role !== "business") throw new ForbiddenOperation("refreshData");
  ctx.engine.invalidate();
  return { refreshed: true };
}

export function registerInsightTools(server: McpServer, ctx: ToolContext) {
  server.tool(
    "get_forecast",
    "Forecast days until stock-out for every product from the last 30 days of order volume, excluding demand spikes flagged by an isolation forest. Returns burn rate, projected days to stock-out and a Critical/High/Moderate/Low risk level per product. Business role only.",
    ForecastSchema.shape,
    async (params) => runTool("get_forecast", () => getForecast(ctx, ForecastSchema.parse(params)))
  );

  server.tool(
    "order_status",
    "Look up a single order: status, shipping dates, processing time and a delay description (on track, due today, overdue by N days). Customers can only look up their own orders.",
    OrderStatusSchema.shape,
    async (params) => runTool("order_status", () => orderStatus(ctx, OrderStatusSchema.parse(params)))
  );

  server.tool(
    "delay_report",
    "List pending orders that are overdue or at risk of missing their estimated delivery, with a count of affected orders per shipping method. Customers see only their own orders.",
    DelayReportSchema.shape,
    async (params) => runTool("delay_report", () => delayReport(ctx, DelayReportSchema.parse(params)))
  );

  server.tool(
    "revenue_anomalies",
    "Flag revenue entries in the recent window whose z-score against the whole history exceeds the threshold, and compare the recent average with the historical one to report a trend. Business role only.",
    RevenueAnomaliesSchema.shape,
    async (params) => runTool("revenue_anomalies", () => revenueAnomalies(ctx, RevenueAnomaliesSchema.parse(params)))
  );

  server.tool(
    "system_audit",
    "Run revenue anomaly detection and delay detection together and summarise both as alert levels. Business role only.",
    SystemAuditSchema.shape,
    async (params) => runTool("system_audit", () => systemAudit(ctx, SystemAuditSchema.parse(params)))
  );

  server.tool(
    "refresh_data",
    "Drop cached tables and forecasts so the next request reloads from the document store. Business role only.",
    RefreshDataSchema.shape,
    async (params) => runTool("refresh_data", () => refreshData(ctx, RefreshDataSchema.parse(params)))
  );
}
