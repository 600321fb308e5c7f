import { z } from "zod";
import { AsOfSchema, CallerShape } from "./common.js";

export const AskQuestionSchema = z.object({
  ...CallerShape,
  question: z.string().trim().min(1).max(2000).describe("Natural-language question about orders, products or revenue"),
  as_of: AsOfSchema.optional(),
});

export const DescribeSchemaSchema = z.object({
  ...CallerShape,
});

export const ForecastSchema = z.object({
  ...CallerShape,
  as_of: AsOfSchema.optional(),
  at_risk_only: z
    .preprocess(v => (v === "true" ? true : v === "false" ? false : v), z.boolean())
    .optional()
    .describe("Only return products with a Critical, High or Moderate risk level"),
});

export const OrderStatusSchema = z.object({
  ...CallerShape,
  order_id: z.string().trim().min(1).max(128).describe("Order id, e.g. ORD_001"),
  as_of: AsOfSchema.optional(),
});

export const DelayReportSchema = z.object({
  ...CallerShape,
  as_of: AsOfSchema.optional(),
  min_days_overdue: z.coerce
    .number()
    .int()
    .min(0)
    .optional()
    .describe("Overdue orders must be late by more than this many days (default 0)"),
  at_risk_window_days: z.coerce
    .number()
    .int()
    .min(0)
    .optional()
    .describe("Open orders due within this many days count as at risk (default 2)"),
});

export const RevenueAnomaliesSchema = z.object({
  ...CallerShape,
  days: z.coerce.number().int().min(1).max(3650).optional().describe("Recent window in days (default 7)"),
  threshold: z.coerce.number().positive().optional().describe("Absolute z-score threshold (default 2)"),
});

export const SystemAuditSchema = z.object({
  ...CallerShape,
  as_of: AsOfSchema.optional(),
});

export const RefreshDataSchema = z.object({
  ...CallerShape,
});

export type AskQuestionInput = z.infer<typeof AskQuestionSchema>;
export type ForecastInput = z.infer<typeof ForecastSchema>;
export type OrderStatusInput = z.infer<typeof OrderStatusSchema>;
export type DelayReportInput = z.infer<typeof DelayReportSchema>;
export type RevenueAnomaliesInput = z.infer<typeof RevenueAnomaliesSchema>;
export type SystemAuditInput = z.infer<typeof SystemAuditSchema>;
