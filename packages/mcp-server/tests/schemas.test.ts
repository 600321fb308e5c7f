import { describe, it, expect } from 'vitest';
import { AsOfSchema, CallerSchema } from '../src/schemas/common.js';
import {
  AskQuestionSchema, DelayReportSchema, OrderStatusSchema, RevenueAnomaliesSchema, ForecastSchema,
} from '../src/schemas/insight.js';

describe('Schema Validation', () => {
  describe('CallerSchema', () => {
    it('accepts an empty caller', () => {
      expect(CallerSchema.parse({})).toEqual({});
    });

    it('trims identities and rejects unknown roles', () => {
      expect(CallerSchema.parse({ role: 'customer', identity: ' CUST_001 ' }).identity).toBe('CUST_001');
      expect(() => CallerSchema.parse({ role: 'admin' })).toThrow();
      expect(() => CallerSchema.parse({ identity: '   ' })).toThrow();
    });
  });

  describe('AsOfSchema', () => {
    it('accepts calendar days only', () => {
      expect(AsOfSchema.parse('2026-10-18')).toBe('2026-10-18');
      expect(() => AsOfSchema.parse('2026-02-30')).toThrow();
      expect(() => AsOfSchema.parse('18/10/2026')).toThrow();
    });
  });

  describe('AskQuestionSchema', () => {
    it('requires a question', () => {
      expect(AskQuestionSchema.parse({ question: '  where is my order? ' }).question).toBe('where is my order?');
      expect(() => AskQuestionSchema.parse({ question: ' ' })).toThrow();
      expect(() => AskQuestionSchema.parse({})).toThrow();
    });
  });

  describe('numeric and boolean options', () => {
    it('coerces string arguments', () => {
      expect(DelayReportSchema.parse({ min_days_overdue: '2', at_risk_window_days: 5 })).toEqual({
        min_days_overdue: 2,
        at_risk_window_days: 5,
      });
      expect(RevenueAnomaliesSchema.parse({ days: '14', threshold: '1.5' })).toEqual({ days: 14, threshold: 1.5 });
      expect(ForecastSchema.parse({ at_risk_only: 'false' }).at_risk_only).toBe(false);
      expect(ForecastSchema.parse({ at_risk_only: true }).at_risk_only).toBe(true);
    });

    it('rejects out-of-range values', () => {
      expect(() => DelayReportSchema.parse({ min_days_overdue: '1.5' })).toThrow();
      expect(() => RevenueAnomaliesSchema.parse({ days: 0 })).toThrow();
      expect(() => RevenueAnomaliesSchema.parse({ threshold: -1 })).toThrow();
      expect(() => ForecastSchema.parse({ at_risk_only: 'yes' })).toThrow();
    });
  });

  describe('OrderStatusSchema', () => {
    it('requires an order id', () => {
      expect(OrderStatusSchema.parse({ order_id: 'ORD_001' })).toEqual({ order_id: 'ORD_001' });
      expect(() => OrderStatusSchema.parse({})).toThrow();
    });
  });
});
