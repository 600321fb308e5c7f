// Plan validation — resolves every table and column reference against the
// entity schemas and produces the ResolvedPlan the executor interprets.
// Nothing reaches the executor without passing through here.

import {
  ORDER_STATUSES, TABLE_SCHEMAS,
  isNumericColumn, isTableName,
  type CellValue, type ColumnDef, type TableName,
} from '../types/entities.js';
import {
  QueryPlanSchema, findOperation,
  type AggregateFunction, type ComparisonOperator, type Condition, type QueryPlan,
} from '../types/plan.js';
import type { Role } from '../types/scope.js';
import { UnknownColumn, UnsupportedPlan } from '../types/errors.js';
import { normalizeDay } from '../utils/dates.js';

// ── Join graph ──────────────────────────────────────────────────────

export interface JoinPath {
  from: TableName;
  to: TableName;
  /** Column on the owning side of the foreign key */
  foreignKey: string;
  /** 'forward': from.foreignKey → to.id; 'reverse': to.foreignKey → from.id (one-to-one) */
  direction: 'forward' | 'reverse';
}

export const JOIN_PATHS: readonly JoinPath[] = [
  { from: 'orders', to: 'customers', foreignKey: 'customer_id', direction: 'forward' },
  { from: 'orders', to: 'products', foreignKey: 'product_id', direction: 'forward' },
  { from: 'revenue', to: 'orders', foreignKey: 'order_id', direction: 'forward' },
  { from: 'orders', to: 'revenue', foreignKey: 'order_id', direction: 'reverse' },
];

// ── Resolved plan ───────────────────────────────────────────────────

export interface ResolvedColumn {
  table: TableName;
  column: string;
  def: ColumnDef;
  /** Key in the joined working row: `table.column` */
  key: string;
  /** Label in the result: bare for source columns, qualified otherwise */
  label: string;
}

export interface ResolvedCondition {
  column: ResolvedColumn;
  operator: ComparisonOperator;
  value: CellValue | CellValue[];
}

export interface ResolvedMeasure {
  fn: AggregateFunction;
  column: ResolvedColumn | null;
  label: string;
  money: boolean;
}

/** Sort key over working rows (by column key) or aggregated rows (by label) */
export interface ResolvedSortKey {
  key: string;
  direction: 'asc' | 'desc';
}

export interface ResolvedPlan {
  source: TableName;
  joins: JoinPath[];
  filters: ResolvedCondition[];
  aggregate: { groupBy: ResolvedColumn[]; measures: ResolvedMeasure[] } | null;
  sort: ResolvedSortKey[];
  limit: number | null;
  /** Output column labels in order, with the working-row key each reads from */
  projection: Array<{ label: string; key: string }>;
  moneyColumns: string[];
  scalar: boolean;
}

/** Parse untrusted plan JSON into the plan grammar */
export function parsePlan(input: unknown): QueryPlan {
  if (input !== null && typeof input === 'object' && 'source' in input) {
    const source = input.source;
    if (typeof source === 'string' && !isTableName(source)) {
      throw new UnsupportedPlan(`Unknown table "${source}"`, 'table');
    }
  }
  const parsed = QueryPlanSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.join('.') || 'plan';
    const kind = issue.path.includes('joins') || issue.path.includes('source') ? 'table'
      : issue.path.includes('fn') ? 'operator'
        : 'grammar';
    throw new UnsupportedPlan(`Invalid plan at ${where}: ${issue.message}`, kind);
  }
  return parsed.data;
}

/** Validate a plan against the schemas and resolve it for execution */
export function validatePlan(plan: QueryPlan): ResolvedPlan {
  const seen = new Set<string>();
  for (const op of plan.operations) {
    if (seen.has(op.op)) throw new UnsupportedPlan(`Operation "${op.op}" appears more than once`, 'shape');
    seen.add(op.op);
  }

  const tables: TableName[] = [plan.source];
  const joins: JoinPath[] = [];
  for (const target of plan.joins) {
    if (tables.includes(target)) {
      throw new UnsupportedPlan(`Table "${target}" is joined more than once`, 'join');
    }
    const path = JOIN_PATHS.find(p => p.to === target && tables.includes(p.from));
    if (!path) {
      throw new UnsupportedPlan(`No declared relationship reaches "${target}"`, 'join');
    }
    joins.push(path);
    tables.push(target);
  }

  const resolve = (ref: string): ResolvedColumn => resolveColumn(ref, plan.source, tables);

  const filters = (findOperation(plan, 'filter')?.where ?? []).map(c => resolveCondition(c, resolve(c.column)));

  const aggOp = findOperation(plan, 'aggregate');
  let aggregate: ResolvedPlan['aggregate'] = null;
  if (aggOp) {
    const groupBy = aggOp.groupBy.map(resolve);
    const labels = new Set(groupBy.map(g => g.label));
    const measures = aggOp.measures.map((m): ResolvedMeasure => {
      const column = m.column === undefined ? null : resolve(m.column);
      checkMeasure(m.fn, column);
      if (labels.has(m.as)) throw new UnsupportedPlan(`Output column "${m.as}" is defined twice`, 'shape');
      labels.add(m.as);
      return {
        fn: m.fn,
        column,
        label: m.as,
        money: column !== null && column.def.type === 'money' && m.fn !== 'count',
      };
    });
    aggregate = { groupBy, measures };
  }

  // After aggregation only output columns exist
  const outputKeys = aggregate
    ? new Map<string, string>([
      ...aggregate.groupBy.map((g): [string, string] => [g.label, g.label]),
      ...aggregate.measures.map((m): [string, string] => [m.label, m.label]),
    ])
    : null;

  const resolveOutput = (ref: string): { label: string; key: string } => {
    if (outputKeys) {
      const key = outputKeys.get(ref) ?? outputKeys.get(resolveLabelOrNull(ref, plan.source, tables) ?? '');
      if (key === undefined) throw new UnknownColumn(ref);
      return { label: key, key };
    }
    const col = resolve(ref);
    return { label: col.label, key: col.key };
  };

  const sortOp = findOperation(plan, 'sort');
  const sort: ResolvedSortKey[] = (sortOp?.by ?? []).map(s => ({
    key: resolveOutput(s.column).key,
    direction: s.direction,
  }));

  const selectOp = findOperation(plan, 'select');
  let projection: ResolvedPlan['projection'];
  if (selectOp) {
    projection = selectOp.columns.map(resolveOutput);
  } else if (aggregate) {
    projection = [...(outputKeys?.keys() ?? [])].map(label => ({ label, key: label }));
  } else {
    projection = tables.flatMap(t => Object.keys(TABLE_SCHEMAS[t]).map(c => {
      const col = resolveColumn(`${t}.${c}`, plan.source, tables);
      return { label: col.label, key: col.key };
    }));
  }
  const labelsSeen = new Set<string>();
  for (const p of projection) {
    if (labelsSeen.has(p.label)) throw new UnsupportedPlan(`Column "${p.label}" is selected twice`, 'shape');
    labelsSeen.add(p.label);
  }

  const moneyLabels = new Set<string>();
  if (aggregate) {
    for (const m of aggregate.measures) if (m.money) moneyLabels.add(m.label);
    for (const g of aggregate.groupBy) if (g.def.type === 'money') moneyLabels.add(g.label);
  } else {
    for (const t of tables) {
      for (const [c, def] of Object.entries(TABLE_SCHEMAS[t])) {
        if (def.type === 'money') moneyLabels.add(t === plan.source ? c : `${t}.${c}`);
      }
    }
  }

  const limitOp = findOperation(plan, 'limit');
  return {
    source: plan.source,
    joins,
    filters,
    aggregate,
    sort,
    limit: limitOp ? limitOp.count : null,
    projection,
    moneyColumns: projection.map(p => p.label).filter(l => moneyLabels.has(l)),
    scalar: aggregate !== null && aggregate.groupBy.length === 0 && aggregate.measures.length === 1
      && projection.length === 1,
  };
}

// ── Role rules ──────────────────────────────────────────────────────

const CUSTOMER_TABLES: ReadonlySet<TableName> = new Set(['orders', 'products']);

/**
 * Customer plans may read only their orders (optionally with product names)
 * and may not aggregate: aggregates can reveal facts about other customers
 * even when rows are filtered.
 */
export function checkRolePermissions(plan: QueryPlan, role: Role): void {
  if (role === 'business') return;
  if (plan.source !== 'orders') {
    throw new UnsupportedPlan(`Table "${plan.source}" is not available for customer requests`, 'role');
  }
  for (const table of plan.joins) {
    if (!CUSTOMER_TABLES.has(table)) {
      throw new UnsupportedPlan(`Table "${table}" is not available for customer requests`, 'role');
    }
  }
  if (findOperation(plan, 'aggregate')) {
    throw new UnsupportedPlan('Aggregate queries are not available for customer requests', 'role');
  }
}

// ── Helpers ─────────────────────────────────────────────────────────

function resolveColumn(ref: string, source: TableName, tables: TableName[]): ResolvedColumn {
  const trimmed = ref.trim();
  const dot = trimmed.indexOf('.');
  if (dot !== -1) {
    const table = trimmed.slice(0, dot);
    const column = trimmed.slice(dot + 1);
    if (!isTableName(table) || !tables.includes(table)) throw new UnknownColumn(ref);
    const def = TABLE_SCHEMAS[table][column];
    if (!def || !Object.hasOwn(TABLE_SCHEMAS[table], column)) throw new UnknownColumn(ref);
    return {
      table,
      column,
      def,
      key: `${table}.${column}`,
      label: table === source ? column : `${table}.${column}`,
    };
  }

  // Bare names resolve against the source first, then joined tables in order
  for (const table of tables) {
    if (Object.hasOwn(TABLE_SCHEMAS[table], trimmed)) {
      return {
        table,
        column: trimmed,
        def: TABLE_SCHEMAS[table][trimmed],
        key: `${table}.${trimmed}`,
        label: table === source ? trimmed : `${table}.${trimmed}`,
      };
    }
  }
  throw new UnknownColumn(ref);
}

function resolveLabelOrNull(ref: string, source: TableName, tables: TableName[]): string | null {
  try {
    return resolveColumn(ref, source, tables).label;
  } catch {
    return null;
  }
}

function checkMeasure(fn: AggregateFunction, column: ResolvedColumn | null): void {
  if (fn === 'count') return;
  if (column === null) {
    throw new UnsupportedPlan(`Aggregate "${fn}" needs a column`, 'operator');
  }
  if ((fn === 'sum' || fn === 'average') && !isNumericColumn(column.def)) {
    throw new UnsupportedPlan(`Aggregate "${fn}" needs a numeric column`, 'operator');
  }
  if ((fn === 'min' || fn === 'max') && column.def.type === 'id') {
    throw new UnsupportedPlan(`Aggregate "${fn}" is not meaningful on identifiers`, 'operator');
  }
}

function resolveCondition(condition: Condition, column: ResolvedColumn): ResolvedCondition {
  const { operator } = condition;
  const listOperator = operator === 'in' || operator === 'not_in';
  const raw = condition.value;

  if (listOperator !== Array.isArray(raw)) {
    throw new UnsupportedPlan(
      listOperator ? `Operator "${operator}" needs a list value` : `Operator "${operator}" needs a single value`,
      'grammar',
    );
  }
  if (operator === 'contains' && (column.def.type === 'integer' || column.def.type === 'money' || column.def.type === 'date')) {
    throw new UnsupportedPlan('Operator "contains" applies to text columns only', 'operator');
  }

  const value = Array.isArray(raw)
    ? raw.map(v => coerceLiteral(v, column, operator))
    : coerceLiteral(raw, column, operator);
  return { column, operator, value };
}

function coerceLiteral(value: CellValue, column: ResolvedColumn, operator: ComparisonOperator): CellValue {
  if (value === null) {
    if (operator !== 'eq' && operator !== 'neq') {
      throw new UnsupportedPlan(`Operator "${operator}" cannot compare with null`, 'grammar');
    }
    return null;
  }

  switch (column.def.type) {
    case 'integer':
    case 'money': {
      const n = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
      if (!Number.isFinite(n)) {
        throw new UnsupportedPlan(`Column "${column.label}" compares with numbers`, 'grammar');
      }
      return n;
    }
    case 'date': {
      const day = normalizeDay(value);
      if (day === null) {
        throw new UnsupportedPlan(`Column "${column.label}" compares with dates (YYYY-MM-DD)`, 'grammar');
      }
      return day;
    }
    case 'enum': {
      const text = String(value);
      if (operator === 'contains') return text;
      const status = ORDER_STATUSES.find(s => s.toLowerCase() === text.trim().toLowerCase());
      if (!status) {
        throw new UnsupportedPlan(`"${text}" is not a valid value for "${column.label}"`, 'grammar');
      }
      return status;
    }
    default:
      if (typeof value === 'boolean') {
        throw new UnsupportedPlan(`Column "${column.label}" compares with text`, 'grammar');
      }
      return String(value);
  }
}
