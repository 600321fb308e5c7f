// Stock-out forecast — per-product burn rate from recent daily consumption,
// with anomalous spike days excluded, mapped onto configurable risk bands.

import type { ForecastConfig, RiskBand } from '../config/index.js';
import type { Order, Product } from '../types/entities.js';
import { RISK_LEVELS, type DailyConsumption, type ForecastRecord, type RiskLevel } from '../types/insight.js';
import type { TableSnapshot } from '../data/table-cache.js';
import { addDays } from '../utils/dates.js';
import { createLogger } from '../utils/log.js';
import { detectSpikes } from './isolation-forest.js';

const log = createLogger('Forecast');

function windowDaysEnding(asOf: string, windowDays: number): string[] {
  const start = addDays(asOf, -(windowDays - 1));
  return Array.from({ length: windowDays }, (_, i) => addDays(start, i));
}

/** Zero-filled daily units per product over `windowDays` ending at `asOf` */
export function buildConsumptionSeries(
  orders: readonly Order[],
  asOf: string,
  windowDays: number,
): Map<string, DailyConsumption[]> {
  const days = windowDaysEnding(asOf, windowDays);
  const position = new Map(days.map((day, i): [string, number] => [day, i]));

  const units = new Map<string, number[]>();
  for (const order of orders) {
    if (order.status === 'Cancelled') continue;
    const i = position.get(order.order_date);
    if (i === undefined) continue;
    let counts = units.get(order.product_id);
    if (!counts) {
      counts = new Array<number>(windowDays).fill(0);
      units.set(order.product_id, counts);
    }
    counts[i] += order.quantity;
  }

  const series = new Map<string, DailyConsumption[]>();
  for (const [productId, counts] of units) {
    series.set(productId, days.map((date, i) => ({ date, units: counts[i] })));
  }
  return series;
}

/**
 * Risk from projected days to stock-out. Bands are ascending exclusive upper
 * bounds; anything at or past the last band (or the horizon) is Low.
 */
export function classifyRisk(days: number | null, bands: readonly RiskBand[], horizonDays: number): RiskLevel {
  if (days === null || days >= horizonDays) return 'Low';
  for (const band of bands) {
    if (days < band.below) return band.level;
  }
  return 'Low';
}

export function forecastProduct(
  product: Product,
  series: DailyConsumption[],
  config: ForecastConfig,
): ForecastRecord {
  const values = series.map(d => d.units);
  let flags = detectSpikes(values, config.isolation);
  // Sparse demand: with no consumption left outside the flagged days there is
  // no baseline to call them spikes against
  if (values.every((v, i) => flags[i] || v === 0)) flags = values.map(() => false);

  let total = 0;
  let count = 0;
  const anomalousDays: string[] = [];
  series.forEach((day, i) => {
    if (flags[i]) {
      anomalousDays.push(day.date);
    } else {
      total += day.units;
      count++;
    }
  });
  const burnRate = count > 0 ? total / count : 0;

  let days: number | null = burnRate > 0 ? product.stock_level / burnRate : null;
  if (days !== null && days >= config.horizonDays) days = null;

  return {
    productId: product.id,
    productName: product.name,
    stockLevel: product.stock_level,
    series,
    burnRate,
    projectedDaysToStockout: days,
    riskLevel: classifyRisk(days, config.riskBands, config.horizonDays),
    anomalyFlag: anomalousDays.length > 0,
    anomalousDays,
  };
}

/** Severity first (Critical → Low), then soonest stock-out, then product id */
export function compareForecasts(a: ForecastRecord, b: ForecastRecord): number {
  const severity = RISK_LEVELS.indexOf(a.riskLevel) - RISK_LEVELS.indexOf(b.riskLevel);
  if (severity !== 0) return severity;
  const da = a.projectedDaysToStockout;
  const db = b.projectedDaysToStockout;
  if (da !== db) {
    if (da === null) return 1;
    if (db === null) return -1;
    return da - db;
  }
  return a.productId < b.productId ? -1 : a.productId > b.productId ? 1 : 0;
}

export function computeForecast(
  products: readonly Product[],
  orders: readonly Order[],
  asOf: string,
  config: ForecastConfig,
): ForecastRecord[] {
  const seriesByProduct = buildConsumptionSeries(orders, asOf, config.windowDays);
  const zeros = (): DailyConsumption[] =>
    windowDaysEnding(asOf, config.windowDays).map(date => ({ date, units: 0 }));

  return products
    .map(product => forecastProduct(product, seriesByProduct.get(product.id) ?? zeros(), config))
    .sort(compareForecasts);
}

// ── Cache ───────────────────────────────────────────────────────────

export interface ForecastRun {
  asOf: string;
  snapshotVersion: number;
  records: ForecastRecord[];
  cached: boolean;
}

/**
 * Forecasts are recomputed only when the table snapshot or the day changes;
 * only the latest run is kept. Every caller gets its own copy of the records.
 */
export class ForecastService {
  private last: { key: string; records: ForecastRecord[] } | null = null;

  constructor(private readonly config: ForecastConfig) {}

  get(snapshot: TableSnapshot, asOf: string): ForecastRun {
    const key = `${snapshot.version}:${asOf}`;
    if (this.last?.key === key) {
      return { asOf, snapshotVersion: snapshot.version, records: copyRecords(this.last.records), cached: true };
    }

    const started = Date.now();
    const records = computeForecast(snapshot.tables.products.rows, snapshot.tables.orders.rows, asOf, this.config);
    this.last = { key, records };
    log.debug('forecast computed', {
      asOf,
      version: snapshot.version,
      products: records.length,
      atRisk: records.filter(r => r.riskLevel !== 'Low').length,
      ms: Date.now() - started,
    });
    return { asOf, snapshotVersion: snapshot.version, records: copyRecords(records), cached: false };
  }

  clear(): void {
    this.last = null;
  }
}

function copyRecords(records: readonly ForecastRecord[]): ForecastRecord[] {
  return records.map(r => ({
    ...r,
    series: r.series.map(d => ({ ...d })),
    anomalousDays: [...r.anomalousDays],
  }));
}
