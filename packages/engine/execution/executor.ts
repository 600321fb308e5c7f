// Safe Execution Engine — interprets a validated QueryPlan over the cached
// tables. Stages run in a fixed order regardless of how the plan lists its
// operations: scope → filter → aggregate → sort → limit → select.
// The engine never evaluates code and never writes.

import { TABLE_SCHEMAS, type CellValue, type Row, type TableName } from '../types/entities.js';
import type { QueryPlan, QueryResult } from '../types/plan.js';
import type { ScopeFilter } from '../types/scope.js';
import type { Tables } from '../data/tables.js';
import { scopedRows } from '../scope/resolver.js';
import { fromCents, toCents } from '../utils/money.js';
import {
  checkRolePermissions, validatePlan,
  type JoinPath, type ResolvedCondition, type ResolvedMeasure, type ResolvedPlan, type ResolvedSortKey,
} from './validate.js';

type WorkingRow = Record<string, CellValue>;

export interface ExecutionStats {
  scannedRows: number;
  matchedRows: number;
  outputRows: number;
}

export interface Execution {
  result: QueryResult;
  resolved: ResolvedPlan;
  stats: ExecutionStats;
}

/**
 * Validate `plan` for the filter's role and run it against `tables`.
 * Every table read, joined reads included, passes through `filter`.
 */
export function executePlan(plan: QueryPlan, tables: Tables, filter: ScopeFilter): Execution {
  checkRolePermissions(plan, filter.scope.role);
  const resolved = validatePlan(plan);

  // scope
  const base = scopedRows(tables, resolved.source, filter);
  const joined = joinRows(resolved, base, tables, filter);

  // filter
  const matched = joined.filter(row => resolved.filters.every(c => matches(row, c)));

  let rows: WorkingRow[];
  let tieBreak: ResolvedSortKey[];
  if (resolved.aggregate) {
    rows = aggregate(matched, resolved.aggregate.groupBy.map(g => ({ key: g.key, label: g.label })), resolved.aggregate.measures);
    tieBreak = resolved.aggregate.groupBy.map((g): ResolvedSortKey => ({ key: g.label, direction: 'asc' }));
  } else {
    rows = matched;
    tieBreak = [{ key: `${resolved.source}.id`, direction: 'asc' }];
  }

  // sort, with a deterministic tie-break
  const keys = [...resolved.sort, ...tieBreak];
  rows = [...rows].sort((a, b) => {
    for (const { key, direction } of keys) {
      const cmp = compareCells(a[key] ?? null, b[key] ?? null);
      if (cmp !== 0) return direction === 'asc' ? cmp : -cmp;
    }
    return 0;
  });

  // limit
  if (resolved.limit !== null) rows = rows.slice(0, resolved.limit);

  // select
  const output = rows.map(row => {
    const out: Record<string, CellValue> = {};
    for (const { label, key } of resolved.projection) out[label] = row[key] ?? null;
    return out;
  });

  const stats: ExecutionStats = {
    scannedRows: base.length,
    matchedRows: matched.length,
    outputRows: output.length,
  };

  if (resolved.scalar) {
    const [column] = resolved.projection;
    // A count of zero is an answer; other measures over no rows are not
    const counted = resolved.aggregate?.measures[0]?.fn === 'count';
    return {
      resolved,
      stats,
      result: {
        kind: 'scalar',
        column: column.label,
        value: output[0]?.[column.label] ?? null,
        empty: matched.length === 0 && !counted,
        moneyColumns: resolved.moneyColumns,
      },
    };
  }

  return {
    resolved,
    stats,
    result: {
      kind: 'table',
      columns: resolved.projection.map(p => p.label),
      rows: output,
      rowCount: output.length,
      empty: output.length === 0,
      moneyColumns: resolved.moneyColumns,
    },
  };
}

// ── Joins ───────────────────────────────────────────────────────────

function joinRows(
  plan: ResolvedPlan,
  base: readonly Row[],
  tables: Tables,
  filter: ScopeFilter,
): WorkingRow[] {
  const lookups = plan.joins.map(path => ({ path, lookup: joinLookup(path, tables, filter) }));

  return base.map(source => {
    const row: WorkingRow = {};
    prefixInto(row, plan.source, source);
    for (const { path, lookup } of lookups) {
      const ref = path.direction === 'forward'
        ? row[`${path.from}.${path.foreignKey}`]
        : row[`${path.from}.id`];
      const target = typeof ref === 'string' ? lookup(ref) : undefined;
      if (target) {
        prefixInto(row, path.to, target);
      } else {
        nullsInto(row, path.to);
      }
    }
    return row;
  });
}

/**
 * Lookup from the joining key to the visible target row. Rows hidden by the
 * scope filter resolve to nothing, so a join cannot reach them.
 */
function joinLookup(path: JoinPath, tables: Tables, filter: ScopeFilter): (ref: string) => Row | undefined {
  const targets: readonly Row[] = scopedRows(tables, path.to, filter);
  const byKey = new Map<string, Row>();
  for (const target of targets) {
    const key = path.direction === 'forward' ? target.id : target[path.foreignKey];
    // rows are in id order; the first match wins for reverse joins
    if (typeof key === 'string' && !byKey.has(key)) byKey.set(key, target);
  }
  return ref => byKey.get(ref);
}

function prefixInto(row: WorkingRow, table: TableName, entity: Row): void {
  for (const column of Object.keys(TABLE_SCHEMAS[table])) {
    row[`${table}.${column}`] = entity[column] ?? null;
  }
}

function nullsInto(row: WorkingRow, table: TableName): void {
  for (const column of Object.keys(TABLE_SCHEMAS[table])) row[`${table}.${column}`] = null;
}

// ── Filter ──────────────────────────────────────────────────────────

function matches(row: WorkingRow, condition: ResolvedCondition): boolean {
  const cell = row[condition.column.key] ?? null;
  const { operator, value } = condition;

  switch (operator) {
    case 'eq':
      return Array.isArray(value) ? false : cell === value;
    case 'neq':
      return Array.isArray(value) ? false : cell !== value;
    case 'in':
      return cell !== null && Array.isArray(value) && value.includes(cell);
    case 'not_in':
      return cell !== null && Array.isArray(value) && !value.includes(cell);
    case 'contains':
      return typeof cell === 'string' && typeof value === 'string'
        && cell.toLowerCase().includes(value.toLowerCase());
    default: {
      if (cell === null || value === null || Array.isArray(value)) return false;
      const cmp = compareCells(cell, value);
      if (operator === 'gt') return cmp > 0;
      if (operator === 'gte') return cmp >= 0;
      if (operator === 'lt') return cmp < 0;
      return cmp <= 0;
    }
  }
}

/**
 * Total order over cells: numbers numerically, everything else by UTF-16
 * code units. Nulls sort after every value.
 */
export function compareCells(a: CellValue, b: CellValue): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  if (typeof a === 'number' && typeof b === 'number') return a < b ? -1 : 1;
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

// ── Aggregate ───────────────────────────────────────────────────────

interface Accumulator {
  count: number;
  /** Integer cents for money columns, plain units otherwise */
  total: number;
  min: CellValue;
  max: CellValue;
}

function aggregate(
  rows: WorkingRow[],
  groupBy: Array<{ key: string; label: string }>,
  measures: ResolvedMeasure[],
): WorkingRow[] {
  const groups = new Map<string, { keys: CellValue[]; accs: Accumulator[] }>();

  // A global aggregate produces one row even over zero input rows
  if (groupBy.length === 0) {
    groups.set('[]', { keys: [], accs: measures.map(newAccumulator) });
  }

  for (const row of rows) {
    const keys = groupBy.map(g => row[g.key] ?? null);
    const id = JSON.stringify(keys);
    const group = groups.get(id) ?? { keys, accs: measures.map(newAccumulator) };
    groups.set(id, group);
    measures.forEach((m, i) => accumulate(group.accs[i], m, row));
  }

  return [...groups.values()].map(({ keys, accs }) => {
    const out: WorkingRow = {};
    groupBy.forEach((g, i) => { out[g.label] = keys[i]; });
    measures.forEach((m, i) => { out[m.label] = finish(accs[i], m); });
    return out;
  });
}

function newAccumulator(): Accumulator {
  return { count: 0, total: 0, min: null, max: null };
}

function accumulate(acc: Accumulator, measure: ResolvedMeasure, row: WorkingRow): void {
  if (measure.column === null) {
    acc.count++;
    return;
  }
  const cell = row[measure.column.key] ?? null;
  if (cell === null) return;

  acc.count++;
  if (typeof cell === 'number') {
    acc.total += measure.column.def.type === 'money' ? toCents(cell) : cell;
  }
  if (acc.min === null || compareCells(cell, acc.min) < 0) acc.min = cell;
  if (acc.max === null || compareCells(cell, acc.max) > 0) acc.max = cell;
}

function finish(acc: Accumulator, measure: ResolvedMeasure): CellValue {
  const money = measure.column?.def.type === 'money';
  switch (measure.fn) {
    case 'count':
      return acc.count;
    case 'sum':
      return money ? fromCents(acc.total) : acc.total;
    case 'average':
      if (acc.count === 0) return null;
      return money ? acc.total / acc.count / 100 : acc.total / acc.count;
    case 'min':
      return acc.min;
    case 'max':
      return acc.max;
  }
}
