// QueryPlan grammar: a declarative description of a computation over the
// known tables. Plans are data, interpreted by the execution engine.

import { z } from 'zod';
import { TABLE_NAMES, type CellValue } from './entities.js';

export const AGGREGATE_FUNCTIONS = ['sum', 'count', 'average', 'min', 'max'] as const;
export type AggregateFunction = typeof AGGREGATE_FUNCTIONS[number];

export const COMPARISON_OPERATORS = ['eq', 'neq', 'gt', 'gte', 'lt', 'lte', 'in', 'not_in', 'contains'] as const;
export type ComparisonOperator = typeof COMPARISON_OPERATORS[number];

export const MAX_PLAN_LIMIT = 1000;

const ScalarSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

const ColumnRefSchema = z.string().min(1).max(64);

export const ConditionSchema = z.object({
  column: ColumnRefSchema,
  operator: z.enum(COMPARISON_OPERATORS),
  value: z.union([ScalarSchema, z.array(ScalarSchema).max(100)]),
}).strict();

export const MeasureSchema = z.object({
  fn: z.enum(AGGREGATE_FUNCTIONS),
  column: ColumnRefSchema.optional(),
  as: z.string().regex(/^[a-z][a-z0-9_]{0,47}$/, 'alias must be snake_case'),
}).strict();

export const SortKeySchema = z.object({
  column: ColumnRefSchema,
  direction: z.enum(['asc', 'desc']).default('asc'),
}).strict();

export const PlanOperationSchema = z.discriminatedUnion('op', [
  z.object({ op: z.literal('select'), columns: z.array(ColumnRefSchema).min(1).max(32) }).strict(),
  z.object({ op: z.literal('filter'), where: z.array(ConditionSchema).min(1).max(16) }).strict(),
  z.object({
    op: z.literal('aggregate'),
    groupBy: z.array(ColumnRefSchema).max(4).default([]),
    measures: z.array(MeasureSchema).min(1).max(8),
  }).strict(),
  z.object({ op: z.literal('sort'), by: z.array(SortKeySchema).min(1).max(4) }).strict(),
  z.object({ op: z.literal('limit'), count: z.number().int().positive().max(MAX_PLAN_LIMIT) }).strict(),
]);

export const QueryPlanSchema = z.object({
  source: z.enum(TABLE_NAMES),
  joins: z.array(z.enum(TABLE_NAMES)).max(3).default([]),
  operations: z.array(PlanOperationSchema).max(5).default([]),
}).strict();

export type Condition = z.infer<typeof ConditionSchema>;
export type Measure = z.infer<typeof MeasureSchema>;
export type SortKey = z.infer<typeof SortKeySchema>;
export type PlanOperation = z.infer<typeof PlanOperationSchema>;
export type QueryPlan = z.infer<typeof QueryPlanSchema>;

export type SelectOperation = Extract<PlanOperation, { op: 'select' }>;
export type FilterOperation = Extract<PlanOperation, { op: 'filter' }>;
export type AggregateOperation = Extract<PlanOperation, { op: 'aggregate' }>;
export type SortOperation = Extract<PlanOperation, { op: 'sort' }>;
export type LimitOperation = Extract<PlanOperation, { op: 'limit' }>;

export function findOperation<K extends PlanOperation['op']>(
  plan: QueryPlan,
  op: K,
): Extract<PlanOperation, { op: K }> | undefined {
  for (const operation of plan.operations) {
    if (isOperation(operation, op)) return operation;
  }
  return undefined;
}

function isOperation<K extends PlanOperation['op']>(
  operation: PlanOperation,
  op: K,
): operation is Extract<PlanOperation, { op: K }> {
  return operation.op === op;
}

// ── Results ─────────────────────────────────────────────────────────

export interface TableResult {
  kind: 'table';
  columns: string[];
  rows: Array<Record<string, CellValue>>;
  rowCount: number;
  empty: boolean;
  /** Columns holding monetary values, rounded only when presented */
  moneyColumns: string[];
}

export interface ScalarResult {
  kind: 'scalar';
  column: string;
  value: CellValue;
  empty: boolean;
  moneyColumns: string[];
}

export type QueryResult = TableResult | ScalarResult;
