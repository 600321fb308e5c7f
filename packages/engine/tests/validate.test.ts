import { describe, it, expect } from 'vitest';
import { parsePlan, validatePlan, checkRolePermissions } from '../execution/validate.js';
import { UnknownColumn, UnsupportedPlan } from '../types/errors.js';

function rejection(fn: () => unknown): UnsupportedPlan {
  try {
    fn();
  } catch (err) {
    if (err instanceof UnsupportedPlan) return err;
    throw err;
  }
  throw new Error('expected the plan to be rejected');
}

describe('parsePlan', () => {
  it('fills defaults for joins and operations', () => {
    expect(parsePlan({ source: 'orders' })).toEqual({ source: 'orders', joins: [], operations: [] });
  });

  it('rejects an unknown table', () => {
    const err = rejection(() => parsePlan({ source: 'employees' }));
    expect(err.kind).toBe('table');
    expect(err.message).toBe('Unknown table "employees"');
  });

  it('rejects an unknown operation', () => {
    const err = rejection(() => parsePlan({ source: 'orders', operations: [{ op: 'delete' }] }));
    expect(err.kind).toBe('grammar');
  });

  it('rejects an unknown aggregate function', () => {
    const err = rejection(() => parsePlan({
      source: 'revenue',
      operations: [{ op: 'aggregate', measures: [{ fn: 'median', column: 'amount', as: 'm' }] }],
    }));
    expect(err.kind).toBe('operator');
  });

  it('rejects extra keys', () => {
    expect(() => parsePlan({ source: 'orders', sql: 'DROP TABLE orders' })).toThrow(UnsupportedPlan);
  });

  it('rejects a non-object', () => {
    expect(() => parsePlan('SELECT * FROM orders')).toThrow(UnsupportedPlan);
  });
});

describe('validatePlan', () => {
  it('resolves bare and qualified columns', () => {
    const resolved = validatePlan(parsePlan({
      source: 'orders',
      joins: ['products'],
      operations: [{ op: 'select', columns: ['id', 'products.name', 'stock_level'] }],
    }));
    expect(resolved.projection).toEqual([
      { label: 'id', key: 'orders.id' },
      { label: 'products.name', key: 'products.name' },
      { label: 'products.stock_level', key: 'products.stock_level' },
    ]);
  });

  it('projects every column of every table without a select', () => {
    const resolved = validatePlan(parsePlan({ source: 'revenue' }));
    expect(resolved.projection.map(p => p.label)).toEqual(['id', 'order_id', 'amount', 'date', 'payment_method']);
    expect(resolved.moneyColumns).toEqual(['amount']);
  });

  it('rejects an operation listed twice', () => {
    const err = rejection(() => validatePlan(parsePlan({
      source: 'orders',
      operations: [{ op: 'limit', count: 5 }, { op: 'limit', count: 2 }],
    })));
    expect(err.kind).toBe('shape');
  });

  it('rejects a join no relationship reaches', () => {
    const err = rejection(() => validatePlan(parsePlan({ source: 'products', joins: ['customers'] })));
    expect(err.kind).toBe('join');
  });

  it('reaches customers from revenue through orders', () => {
    const resolved = validatePlan(parsePlan({ source: 'revenue', joins: ['orders', 'customers'] }));
    expect(resolved.joins.map(j => `${j.from}->${j.to}`)).toEqual(['revenue->orders', 'orders->customers']);
  });

  it('rejects unknown columns', () => {
    expect(() => validatePlan(parsePlan({
      source: 'orders',
      operations: [{ op: 'select', columns: ['password'] }],
    }))).toThrow(UnknownColumn);
    expect(() => validatePlan(parsePlan({
      source: 'orders',
      operations: [{ op: 'select', columns: ['customers.email'] }],
    }))).toThrow(UnknownColumn);
  });

  it('requires numeric columns for sum and average', () => {
    const err = rejection(() => validatePlan(parsePlan({
      source: 'orders',
      operations: [{ op: 'aggregate', measures: [{ fn: 'sum', column: 'status', as: 'total' }] }],
    })));
    expect(err.kind).toBe('operator');
  });

  it('canonicalizes literals by column type', () => {
    const resolved = validatePlan(parsePlan({
      source: 'orders',
      operations: [{
        op: 'filter',
        where: [
          { column: 'status', operator: 'in', value: ['shipped', 'DELAYED'] },
          { column: 'quantity', operator: 'gte', value: '2' },
          { column: 'order_date', operator: 'gt', value: '2026-10-01T12:00:00Z' },
        ],
      }],
    }));
    expect(resolved.filters.map(f => f.value)).toEqual([['Shipped', 'Delayed'], 2, '2026-10-01']);
  });

  it('rejects list and scalar mismatches', () => {
    expect(() => validatePlan(parsePlan({
      source: 'orders',
      operations: [{ op: 'filter', where: [{ column: 'status', operator: 'in', value: 'Shipped' }] }],
    }))).toThrow('Operator "in" needs a list value');
    expect(() => validatePlan(parsePlan({
      source: 'orders',
      operations: [{ op: 'filter', where: [{ column: 'quantity', operator: 'contains', value: '1' }] }],
    }))).toThrow('Operator "contains" applies to text columns only');
  });

  it('rejects an unknown status value', () => {
    expect(() => validatePlan(parsePlan({
      source: 'orders',
      operations: [{ op: 'filter', where: [{ column: 'status', operator: 'eq', value: 'Lost' }] }],
    }))).toThrow('"Lost" is not a valid value for "status"');
  });

  it('sorts aggregated rows by output labels only', () => {
    const plan = {
      source: 'orders',
      operations: [
        { op: 'aggregate', groupBy: ['status'], measures: [{ fn: 'count', as: 'orders' }] },
        { op: 'sort', by: [{ column: 'orders', direction: 'desc' }] },
      ],
    };
    const resolved = validatePlan(parsePlan(plan));
    expect(resolved.sort).toEqual([{ key: 'orders', direction: 'desc' }]);
    expect(resolved.projection).toEqual([
      { label: 'status', key: 'status' },
      { label: 'orders', key: 'orders' },
    ]);

    expect(() => validatePlan(parsePlan({
      ...plan,
      operations: [plan.operations[0], { op: 'sort', by: [{ column: 'quantity' }] }],
    }))).toThrow(UnknownColumn);
  });

  it('marks a single global measure as scalar', () => {
    const resolved = validatePlan(parsePlan({
      source: 'revenue',
      operations: [{ op: 'aggregate', measures: [{ fn: 'sum', column: 'amount', as: 'total_revenue' }] }],
    }));
    expect(resolved.scalar).toBe(true);
    expect(resolved.moneyColumns).toEqual(['total_revenue']);
  });
});

describe('checkRolePermissions', () => {
  it('allows business plans on any table', () => {
    expect(() => checkRolePermissions(parsePlan({ source: 'revenue' }), 'business')).not.toThrow();
  });

  it('allows customer plans over orders and products', () => {
    expect(() => checkRolePermissions(parsePlan({ source: 'orders', joins: ['products'] }), 'customer')).not.toThrow();
  });

  it('rejects other tables for customers', () => {
    expect(rejection(() => checkRolePermissions(parsePlan({ source: 'revenue' }), 'customer')).kind).toBe('role');
    expect(rejection(() => checkRolePermissions(
      parsePlan({ source: 'orders', joins: ['customers'] }), 'customer',
    )).kind).toBe('role');
  });

  it('rejects aggregates for customers', () => {
    const err = rejection(() => checkRolePermissions(parsePlan({
      source: 'orders',
      operations: [{ op: 'aggregate', measures: [{ fn: 'count', as: 'n' }] }],
    }), 'customer'));
    expect(err.kind).toBe('role');
  });
});
