import { z } from "zod";

export const RoleSchema = z
  .enum(["customer", "business"])
  .describe("Caller role: customers see only their own orders, business sees everything");

export const IdentitySchema = z
  .string()
  .trim()
  .min(1)
  .max(128)
  .describe("Caller identity; the customer id (e.g. CUST_001) for the customer role");

export const AsOfSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD")
  .refine(isCalendarDay, "Not a calendar day")
  .describe("Request day (YYYY-MM-DD); defaults to today in UTC");

/** Caller fields shared by every tool; a pinned server caller takes precedence */
export const CallerShape = {
  role: RoleSchema.optional(),
  identity: IdentitySchema.optional(),
};

export const CallerSchema = z.object(CallerShape);

export type CallerInput = z.infer<typeof CallerSchema>;

function isCalendarDay(day: string): boolean {
  const parsed = new Date(`${day}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === day;
}
