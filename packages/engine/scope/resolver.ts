// Scope Resolver — caller identity + role → row-visibility filter
// The filter is applied by the execution engine on every table read,
// so no plan can widen what a customer sees.

import type { EntityRowMap, Row, TableName } from '../types/entities.js';
import { UnknownCustomer } from '../types/errors.js';
import type { AccessScope, Role, ScopeFilter } from '../types/scope.js';
import type { Tables } from '../data/tables.js';

export function resolveScope(identity: string, role: Role, tables: Tables): AccessScope {
  const id = identity.trim();
  if (role === 'business') {
    return { role: 'business', identity: id };
  }
  if (id === '' || !tables.customers.index.has(id)) {
    throw new UnknownCustomer();
  }
  return { role: 'customer', identity: id, subjectId: id };
}

class BusinessScopeFilter implements ScopeFilter {
  constructor(readonly scope: AccessScope) {}

  admits(): boolean {
    return true;
  }
}

/**
 * Customer visibility: own customer row, own orders, revenue settling own
 * orders, and the products those orders reference.
 */
class CustomerScopeFilter implements ScopeFilter {
  private readonly orderIds: ReadonlySet<string>;
  private readonly productIds: ReadonlySet<string>;

  constructor(
    readonly scope: Extract<AccessScope, { role: 'customer' }>,
    tables: Tables,
  ) {
    const orderIds = new Set<string>();
    const productIds = new Set<string>();
    for (const order of tables.orders.rows) {
      if (order.customer_id === scope.subjectId) {
        orderIds.add(order.id);
        productIds.add(order.product_id);
      }
    }
    this.orderIds = orderIds;
    this.productIds = productIds;
  }

  admits(table: TableName, row: Row): boolean {
    const subject = this.scope.subjectId;
    switch (table) {
      case 'customers':
        return row.id === subject;
      case 'orders':
        return row.customer_id === subject;
      case 'revenue':
        return typeof row.order_id === 'string' && this.orderIds.has(row.order_id);
      case 'products':
        return typeof row.id === 'string' && this.productIds.has(row.id);
    }
  }
}

export function createScopeFilter(scope: AccessScope, tables: Tables): ScopeFilter {
  return scope.role === 'business'
    ? new BusinessScopeFilter(scope)
    : new CustomerScopeFilter(scope, tables);
}

/** Rows of `table` visible under `filter` */
export function scopedRows<K extends TableName>(
  tables: Tables,
  table: K,
  filter: ScopeFilter,
): readonly EntityRowMap[K][] {
  const rows: readonly EntityRowMap[K][] = tables[table].rows;
  return rows.filter(row => filter.admits(table, row));
}
