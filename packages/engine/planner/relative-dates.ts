// Relative date literals in plan filters ("today", "3 days ago", "in 2 weeks")
// are resolved to ISO days against the request's date before validation,
// so an accepted plan only ever carries absolute dates.

import { TABLE_NAMES, TABLE_SCHEMAS, type CellValue } from '../types/entities.js';
import type { Condition, QueryPlan } from '../types/plan.js';
import { addDays } from '../utils/dates.js';

const UNIT_DAYS: Record<string, number> = { day: 1, week: 7 };

export function resolveRelativeDay(value: string, today: string): string | null {
  const text = value.trim().toLowerCase();
  if (text === 'today') return today;
  if (text === 'yesterday') return addDays(today, -1);
  if (text === 'tomorrow') return addDays(today, 1);

  const ago = /^(\d{1,4}) (day|week)s? ago$/.exec(text);
  if (ago) return addDays(today, -Number(ago[1]) * UNIT_DAYS[ago[2]]);
  const ahead = /^in (\d{1,4}) (day|week)s?$/.exec(text);
  if (ahead) return addDays(today, Number(ahead[1]) * UNIT_DAYS[ahead[2]]);
  return null;
}

export function resolveRelativeDates(plan: QueryPlan, today: string): QueryPlan {
  const resolveValue = (value: CellValue): CellValue =>
    typeof value === 'string' ? resolveRelativeDay(value, today) ?? value : value;

  const resolveCondition = (c: Condition): Condition => (isDateColumnRef(c.column)
    ? { ...c, value: Array.isArray(c.value) ? c.value.map(resolveValue) : resolveValue(c.value) }
    : c);

  return {
    ...plan,
    operations: plan.operations.map(op =>
      op.op === 'filter' ? { ...op, where: op.where.map(resolveCondition) } : op),
  };
}

function isDateColumnRef(ref: string): boolean {
  const column = ref.slice(ref.lastIndexOf('.') + 1).trim();
  return TABLE_NAMES.some(t => Object.hasOwn(TABLE_SCHEMAS[t], column) && TABLE_SCHEMAS[t][column].type === 'date');
}
