import { describe, it, expect } from 'vitest';
import { detectRevenueAnomalies, revenueTrend } from '../insight/revenue-anomalies.js';
import type { Revenue } from '../types/entities.js';
import { REVENUE } from './fixtures.js';

function entry(id: string, date: string, amount: number): Revenue {
  return { id, order_id: `ORD_${id}`, amount, date, payment_method: 'Credit Card' };
}

/** Twenty quiet September payments, then a recent week with one large payment */
function history(): Revenue[] {
  const quiet = Array.from({ length: 20 }, (_, i) =>
    entry(`R${String(i + 1).padStart(2, '0')}`, `2026-09-${String(i + 1).padStart(2, '0')}`, 100));
  return [
    ...quiet,
    entry('R21', '2026-10-10', 100),
    entry('R22', '2026-10-12', 100),
    entry('R23', '2026-10-15', 1000),
  ];
}

describe('detectRevenueAnomalies', () => {
  it('flags a recent entry far from the historical mean', () => {
    const report = detectRevenueAnomalies(history());

    expect(report?.periodStart).toBe('2026-10-08');
    expect(report?.periodEnd).toBe('2026-10-15');
    expect(report?.anomalies).toEqual([
      { revenueId: 'R23', date: '2026-10-15', amount: 1000, zScore: 4.59, direction: 'High' },
    ]);
    expect(report?.recentTotal).toBe(1200);
    expect(report?.recentAverage).toBe(400);
    expect(report?.historicalAverage).toBeCloseTo(139.13, 2);
    expect(report?.trend).toBe('INCREASING');
  });

  it('narrows the window and raises the threshold', () => {
    expect(detectRevenueAnomalies(history(), { threshold: 5 })?.anomalies).toEqual([]);
    const report = detectRevenueAnomalies(history(), { days: 2 });
    expect(report?.periodStart).toBe('2026-10-13');
    expect(report?.trend).toBe('INSUFFICIENT_DATA');
  });

  it('summarizes the fixture revenue without anomalies', () => {
    const report = detectRevenueAnomalies(REVENUE);

    expect(report?.periodStart).toBe('2026-10-10');
    expect(report?.periodEnd).toBe('2026-10-17');
    expect(report?.recentTotal).toBe(308.98);
    expect(report?.historicalAverage).toBeCloseTo(92.694, 6);
    expect(report?.anomalies).toEqual([]);
    expect(report?.trend).toBe('DECREASING');
  });

  it('finds nothing in a constant history', () => {
    const flat = [entry('A', '2026-10-01', 50), entry('B', '2026-10-02', 50), entry('C', '2026-10-03', 50)];
    const report = detectRevenueAnomalies(flat);
    expect(report?.anomalies).toEqual([]);
    expect(report?.trend).toBe('STABLE');
  });

  it('returns null without revenue', () => {
    expect(detectRevenueAnomalies([])).toBeNull();
  });
});

describe('revenueTrend', () => {
  it('compares the first and last halves of the window', () => {
    const steady = [entry('A', '2026-10-01', 10), entry('B', '2026-10-02', 50), entry('C', '2026-10-03', 10.5)];
    expect(revenueTrend(steady)).toBe('STABLE');
    const falling = [
      entry('A', '2026-10-01', 100), entry('B', '2026-10-02', 100),
      entry('C', '2026-10-03', 50), entry('D', '2026-10-04', 60),
    ];
    expect(revenueTrend(falling)).toBe('DECREASING');
  });
});
