// Revenue anomaly scan: z-scores of recent entries against the full history,
// plus a coarse trend over the recent window.

import type { Revenue } from '../types/entities.js';
import type { RevenueAnomaly, RevenueAnomalyReport, RevenueTrend } from '../types/insight.js';
import { addDays } from '../utils/dates.js';
import { averageMoney, sumMoney } from '../utils/money.js';

export interface RevenueAnomalyOptions {
  /** Calendar days before the latest entry to include */
  days?: number;
  /** Absolute z-score above which an entry is anomalous */
  threshold?: number;
}

const TREND_BAND = 0.1;

/** Sample standard deviation; 0 for fewer than two values */
function standardDeviation(values: readonly number[], mean: number): number {
  if (values.length < 2) return 0;
  let squares = 0;
  for (const v of values) squares += (v - mean) ** 2;
  return Math.sqrt(squares / (values.length - 1));
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;
}

export function revenueTrend(recent: readonly Revenue[]): RevenueTrend {
  if (recent.length < 3) return 'INSUFFICIENT_DATA';
  const ordered = [...recent].sort((a, b) =>
    a.date !== b.date ? (a.date < b.date ? -1 : 1) : a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
  const half = Math.floor(ordered.length / 2);
  const first = mean(ordered.slice(0, half).map(r => r.amount));
  const second = mean(ordered.slice(ordered.length - half).map(r => r.amount));
  if (second > first * (1 + TREND_BAND)) return 'INCREASING';
  if (second < first * (1 - TREND_BAND)) return 'DECREASING';
  return 'STABLE';
}

/** null when there is no revenue at all */
export function detectRevenueAnomalies(
  revenue: readonly Revenue[],
  options: RevenueAnomalyOptions = {},
): RevenueAnomalyReport | null {
  if (revenue.length === 0) return null;
  const days = options.days ?? 7;
  const threshold = options.threshold ?? 2.0;

  let latest = revenue[0].date;
  for (const r of revenue) if (r.date > latest) latest = r.date;
  const start = addDays(latest, -days);
  const recent = revenue.filter(r => r.date >= start && r.date <= latest);

  const amounts = revenue.map(r => r.amount);
  const overallMean = mean(amounts);
  const std = standardDeviation(amounts, overallMean);

  const anomalies: RevenueAnomaly[] = [];
  if (std > 0) {
    for (const r of recent) {
      const z = (r.amount - overallMean) / std;
      if (Math.abs(z) > threshold) {
        anomalies.push({
          revenueId: r.id,
          date: r.date,
          amount: r.amount,
          zScore: Math.round(z * 100) / 100,
          direction: z > 0 ? 'High' : 'Low',
        });
      }
    }
  }
  anomalies.sort((a, b) =>
    a.date !== b.date ? (a.date < b.date ? -1 : 1) : a.revenueId < b.revenueId ? -1 : 1);

  const recentAmounts = recent.map(r => r.amount);
  return {
    periodStart: start,
    periodEnd: latest,
    recentTotal: sumMoney(recentAmounts),
    recentAverage: averageMoney(recentAmounts) ?? 0,
    historicalAverage: averageMoney(amounts) ?? 0,
    trend: revenueTrend(recent),
    anomalies,
  };
}
