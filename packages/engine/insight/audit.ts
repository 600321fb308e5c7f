// System audit: revenue anomalies and delivery delays rolled into two
// dashboard indicators.

import type { Tables } from '../data/tables.js';
import type { AuditReport } from '../types/insight.js';
import { buildDelayReport, type DelayReportOptions } from './delays.js';
import { detectRevenueAnomalies, type RevenueAnomalyOptions } from './revenue-anomalies.js';

export interface AuditOptions {
  revenue?: RevenueAnomalyOptions;
  delays?: DelayReportOptions;
}

export function runAudit(tables: Tables, asOf: string, options: AuditOptions = {}): AuditReport {
  const revenueReport = detectRevenueAnomalies(tables.revenue.rows, options.revenue);
  const delayReport = buildDelayReport(tables.orders.rows, asOf, options.delays);

  const revenue = revenueReport && revenueReport.anomalies.length > 0 ? 'alert' : 'normal';
  const logistics = delayReport.overdue.length > 0 ? 'critical'
    : delayReport.atRisk.length > 0 ? 'warning'
      : 'normal';

  const lines: string[] = [];
  if (!revenueReport) {
    lines.push('Revenue: no revenue recorded.');
  } else if (revenueReport.anomalies.length > 0) {
    lines.push(`Revenue: ${plural(revenueReport.anomalies.length, 'anomaly', 'anomalies')} detected (trend ${revenueReport.trend}).`);
  } else {
    lines.push(`Revenue: no significant anomalies (trend ${revenueReport.trend}).`);
  }
  if (delayReport.overdue.length > 0) {
    lines.push(`Logistics: ${plural(delayReport.overdue.length, 'order', 'orders')} overdue.`);
  } else if (delayReport.atRisk.length > 0) {
    lines.push(`Logistics: ${plural(delayReport.atRisk.length, 'order', 'orders')} at risk of delay.`);
  } else {
    lines.push('Logistics: all pending orders on track.');
  }

  return { asOf, revenue, logistics, revenueReport, delayReport, summary: lines.join('\n') };
}

function plural(n: number, one: string, many: string): string {
  return `${n} ${n === 1 ? one : many}`;
}
