// Planner and composer prompts

import { TABLE_SCHEMAS, type TableName } from '../types/entities.js';
import { AGGREGATE_FUNCTIONS, COMPARISON_OPERATORS, MAX_PLAN_LIMIT } from '../types/plan.js';
import type { Role } from '../types/scope.js';
import { JOIN_PATHS } from '../execution/validate.js';

const ROLE_TABLES: Record<Role, readonly TableName[]> = {
  business: ['customers', 'orders', 'products', 'revenue'],
  customer: ['orders', 'products'],
};

/** Schema section of the planner prompt, limited to what `role` may query */
export function describeSchema(role: Role): string {
  const tables = ROLE_TABLES[role];
  const lines: string[] = [];
  for (const table of tables) {
    lines.push(`Table ${table}:`);
    for (const [column, def] of Object.entries(TABLE_SCHEMAS[table])) {
      const ref = def.references ? ` -> ${def.references}.id` : '';
      lines.push(`  - ${column} (${def.type})${ref}: ${def.description}`);
    }
  }
  const joins = JOIN_PATHS
    .filter(p => tables.includes(p.from) && tables.includes(p.to))
    .map(p => `  - ${p.from} -> ${p.to}`);
  if (joins.length > 0) {
    lines.push('Joinable (source or already-joined table -> joined table):', ...joins);
  }
  return lines.join('\n');
}

export function plannerSystemPrompt(role: Role, today: string): string {
  const roleRules = role === 'customer'
    ? `The caller is a customer. Plans must use source "orders" (optionally joining "products") and must not contain an "aggregate" operation. Rows are already limited to the caller's own orders; do not filter by customer.`
    : 'The caller is a business analyst with access to every table.';

  return `You translate questions about an order-management dataset into a JSON query plan.
Respond with a single JSON object and nothing else.

Today is ${today}. Write dates as YYYY-MM-DD; "today", "yesterday", "N days ago" and "in N days" are also accepted in filters on date columns.

${roleRules}

Plan grammar:
{
  "source": "<table>",
  "joins": ["<table>", ...],
  "operations": [
    { "op": "filter", "where": [{ "column": "<col>", "operator": "<op>", "value": <literal or list> }] },
    { "op": "aggregate", "groupBy": ["<col>", ...], "measures": [{ "fn": "<fn>", "column": "<col>", "as": "<snake_case_name>" }] },
    { "op": "sort", "by": [{ "column": "<col or measure name>", "direction": "asc" | "desc" }] },
    { "op": "limit", "count": <1..${MAX_PLAN_LIMIT}> },
    { "op": "select", "columns": ["<col or measure name>", ...] }
  ]
}
Each operation appears at most once. Operators: ${COMPARISON_OPERATORS.join(', ')} ("in"/"not_in" take a list).
Aggregate functions: ${AGGREGATE_FUNCTIONS.join(', ')} ("count" may omit the column).
Columns of joined tables are written "table.column".

Schema:
${describeSchema(role)}`;
}

export function plannerUserPrompt(question: string, rejection: string | null): string {
  if (rejection === null) return `Question: ${question}`;
  return `Question: ${question}

Your previous plan was rejected: ${rejection}
Return a corrected plan.`;
}

export const COMPOSER_SYSTEM_PROMPT = `You answer questions about orders, products and revenue using only the query result provided.
Write a short, direct answer in plain text (no markdown tables). Quote figures exactly as given.
Do not speculate about data that is not in the result, and do not mention queries, plans or databases.`;

export function composerUserPrompt(question: string, resultText: string): string {
  return `Question: ${question}

Query result:
${resultText}`;
}
