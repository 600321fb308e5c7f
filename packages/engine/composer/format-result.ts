// Plain-text rendering of query results, shared by the composer prompt
// and the CLI. Money is rounded to cents only here.

import type { CellValue } from '../types/entities.js';
import type { QueryResult } from '../types/plan.js';
import { formatMoney } from '../utils/money.js';

export function formatCell(value: CellValue, money: boolean): string {
  if (value === null) return 'n/a';
  if (typeof value === 'number') {
    if (money) return formatMoney(value);
    return Number.isInteger(value) ? String(value) : value.toFixed(2);
  }
  return String(value);
}

export function formatResult(result: QueryResult, maxRows: number): string {
  const money = new Set(result.moneyColumns);

  if (result.kind === 'scalar') {
    return `${result.column}: ${formatCell(result.value, money.has(result.column))}`;
  }

  const shown = result.rows.slice(0, maxRows);
  const lines = [result.columns.join(' | ')];
  for (const row of shown) {
    lines.push(result.columns.map(c => formatCell(row[c] ?? null, money.has(c))).join(' | '));
  }
  lines.push(shown.length < result.rowCount
    ? `(showing ${shown.length} of ${result.rowCount} rows)`
    : `(${result.rowCount} ${result.rowCount === 1 ? 'row' : 'rows'})`);
  return lines.join('\n');
}
