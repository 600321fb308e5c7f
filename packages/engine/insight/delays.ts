// Delivery delay detection over open orders

import { CLOSED_STATUSES, type Order } from '../types/entities.js';
import type { DelayRecord, DelayReport } from '../types/insight.js';
import { diffDays } from '../utils/dates.js';

export interface DelayReportOptions {
  /** Overdue orders must be late by more than this many days */
  minDaysOverdue?: number;
  /** Open orders due within this many days count as at risk */
  atRiskWindowDays?: number;
}

export function isOpen(order: Order): boolean {
  return !CLOSED_STATUSES.includes(order.status);
}

/** Days from `asOf` to the promised delivery; negative when overdue */
export function slackDays(order: Order, asOf: string): number {
  return diffDays(asOf, order.estimated_delivery);
}

export function toDelayRecord(order: Order, asOf: string): DelayRecord {
  const slack = slackDays(order, asOf);
  return {
    orderId: order.id,
    customerId: order.customer_id,
    status: order.status,
    estimatedDelivery: order.estimated_delivery,
    shippingMethod: order.shipping_method,
    slackDays: slack,
    delayed: slack < 0,
  };
}

export function buildDelayReport(
  orders: readonly Order[],
  asOf: string,
  options: DelayReportOptions = {},
): DelayReport {
  const minDaysOverdue = options.minDaysOverdue ?? 0;
  const atRiskWindow = options.atRiskWindowDays ?? 2;
  const pending = orders.filter(isOpen).map(order => toDelayRecord(order, asOf));

  const overdue = pending.filter(r => r.slackDays < -minDaysOverdue).sort(bySlack);
  const atRisk = pending
    .filter(r => r.slackDays >= -minDaysOverdue && r.slackDays <= atRiskWindow)
    .sort(bySlack);

  const shippingMethodIssues: Record<string, number> = {};
  for (const record of overdue) {
    const method = record.shippingMethod ?? 'Unknown';
    shippingMethodIssues[method] = (shippingMethodIssues[method] ?? 0) + 1;
  }

  return {
    asOf,
    totalPending: pending.length,
    overdue,
    atRisk,
    onTrackCount: pending.filter(r => r.slackDays > atRiskWindow).length,
    shippingMethodIssues,
  };
}

function bySlack(a: DelayRecord, b: DelayRecord): number {
  if (a.slackDays !== b.slackDays) return a.slackDays - b.slackDays;
  return a.orderId < b.orderId ? -1 : a.orderId > b.orderId ? 1 : 0;
}
