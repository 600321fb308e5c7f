// Deterministic fallback plans for the common questions
// Used when the model's plans are rejected; each intent lists the roles it
// may serve, so a fallback never grants more than a model plan could.

import type { QueryPlan } from '../types/plan.js';
import type { Role } from '../types/scope.js';

export interface CannedIntent {
  name: string;
  description: string;
  roles: readonly Role[];
  matches: (question: string) => boolean;
  plan: (today: string) => QueryPlan;
}

const words = (pattern: RegExp) => (question: string) => pattern.test(question.toLowerCase());

const both = (a: RegExp, b: RegExp) => (question: string) => {
  const q = question.toLowerCase();
  return a.test(q) && b.test(q);
};

// Checked in order; the first intent that matches and admits the role wins
export const CANNED_INTENTS: readonly CannedIntent[] = [
  {
    name: 'delayed_orders',
    description: 'Open orders past their estimated delivery day',
    roles: ['customer', 'business'],
    matches: words(/\b(delay(ed|s)?|late|overdue)\b/),
    plan: today => ({
      source: 'orders',
      joins: [],
      operations: [
        {
          op: 'filter',
          where: [
            { column: 'status', operator: 'not_in', value: ['Delivered', 'Cancelled'] },
            { column: 'estimated_delivery', operator: 'lt', value: today },
          ],
        },
        { op: 'sort', by: [{ column: 'estimated_delivery', direction: 'asc' }] },
        { op: 'select', columns: ['id', 'customer_id', 'status', 'estimated_delivery', 'shipping_method'] },
      ],
    }),
  },
  {
    name: 'revenue_by_payment_method',
    description: 'Revenue totals per payment method',
    roles: ['business'],
    matches: both(/\b(revenue|sales|payments?)\b/, /\b(method|methods|card|by payment)\b/),
    plan: () => ({
      source: 'revenue',
      joins: [],
      operations: [
        {
          op: 'aggregate',
          groupBy: ['payment_method'],
          measures: [
            { fn: 'sum', column: 'amount', as: 'total_revenue' },
            { fn: 'count', as: 'payments' },
          ],
        },
        { op: 'sort', by: [{ column: 'total_revenue', direction: 'desc' }] },
      ],
    }),
  },
  {
    name: 'total_revenue',
    description: 'Total revenue received',
    roles: ['business'],
    matches: words(/\b(revenue|sales|income|earnings)\b/),
    plan: () => ({
      source: 'revenue',
      joins: [],
      operations: [
        { op: 'aggregate', groupBy: [], measures: [{ fn: 'sum', column: 'amount', as: 'total_revenue' }] },
      ],
    }),
  },
  {
    name: 'order_status_breakdown',
    description: 'Number of orders in each status',
    roles: ['business'],
    matches: both(/\bstatus(es)?\b/, /\b(breakdown|by status|per status|each status|count|how many|distribution)\b/),
    plan: () => ({
      source: 'orders',
      joins: [],
      operations: [
        { op: 'aggregate', groupBy: ['status'], measures: [{ fn: 'count', as: 'orders' }] },
        { op: 'sort', by: [{ column: 'orders', direction: 'desc' }] },
      ],
    }),
  },
  {
    name: 'low_stock_products',
    description: 'Products with the least stock on hand',
    roles: ['business'],
    matches: words(/\b(low stock|stock|inventory|stock-?outs?|restock)\b/),
    plan: () => ({
      source: 'products',
      joins: [],
      operations: [
        { op: 'sort', by: [{ column: 'stock_level', direction: 'asc' }] },
        { op: 'limit', count: 10 },
        { op: 'select', columns: ['id', 'name', 'category', 'stock_level'] },
      ],
    }),
  },
  {
    name: 'my_orders',
    description: 'Orders with product names, newest first',
    roles: ['customer', 'business'],
    matches: words(/\b(my|orders?|purchases?|bought)\b/),
    plan: () => ({
      source: 'orders',
      joins: ['products'],
      operations: [
        { op: 'sort', by: [{ column: 'order_date', direction: 'desc' }] },
        { op: 'limit', count: 100 },
        {
          op: 'select',
          columns: ['id', 'products.name', 'status', 'order_date', 'estimated_delivery', 'quantity'],
        },
      ],
    }),
  },
];

/** First canned intent matching `question` that `role` may use */
export function matchCannedIntent(question: string, role: Role): CannedIntent | null {
  return CANNED_INTENTS.find(intent => intent.roles.includes(role) && intent.matches(question)) ?? null;
}
