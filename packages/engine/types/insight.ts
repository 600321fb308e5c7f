// Anomaly & forecast outputs

export const RISK_LEVELS = ['Critical', 'High', 'Moderate', 'Low'] as const;

export type RiskLevel = typeof RISK_LEVELS[number];

export interface DailyConsumption {
  date: string;
  units: number;
}

export interface ForecastRecord {
  productId: string;
  productName: string;
  stockLevel: number;
  series: DailyConsumption[];
  /** Mean daily units over non-anomalous days of the window */
  burnRate: number;
  /** null when no stock-out is projected within the horizon */
  projectedDaysToStockout: number | null;
  riskLevel: RiskLevel;
  anomalyFlag: boolean;
  anomalousDays: string[];
}

export interface DelayRecord {
  orderId: string;
  customerId: string;
  status: string;
  estimatedDelivery: string;
  shippingMethod: string | null;
  /** Negative when overdue */
  slackDays: number;
  delayed: boolean;
}

export interface DelayReport {
  asOf: string;
  totalPending: number;
  overdue: DelayRecord[];
  atRisk: DelayRecord[];
  onTrackCount: number;
  shippingMethodIssues: Record<string, number>;
}

export type RevenueTrend = 'INCREASING' | 'DECREASING' | 'STABLE' | 'INSUFFICIENT_DATA';

export interface RevenueAnomaly {
  revenueId: string;
  date: string;
  amount: number;
  zScore: number;
  direction: 'High' | 'Low';
}

export interface RevenueAnomalyReport {
  periodStart: string;
  periodEnd: string;
  recentTotal: number;
  recentAverage: number;
  historicalAverage: number;
  trend: RevenueTrend;
  anomalies: RevenueAnomaly[];
}

export interface OrderStatusView {
  orderId: string;
  status: string;
  orderDate: string;
  shipDate: string | null;
  estimatedDelivery: string;
  shippingMethod: string | null;
  processingDays: number | null;
  daysUntilDelivery: number;
  delayStatus: string;
  overdue: boolean;
}

export interface AuditReport {
  asOf: string;
  revenue: 'normal' | 'alert';
  logistics: 'normal' | 'warning' | 'critical';
  revenueReport: RevenueAnomalyReport | null;
  delayReport: DelayReport;
  summary: string;
}
