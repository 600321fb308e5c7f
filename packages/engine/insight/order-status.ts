// Single-order status lookup with delay wording
// A missing order and an order outside the caller's scope both yield null.

import type { Order } from '../types/entities.js';
import type { OrderStatusView } from '../types/insight.js';
import type { ScopeFilter } from '../types/scope.js';
import type { Tables } from '../data/tables.js';
import { diffDays } from '../utils/dates.js';
import { isOpen } from './delays.js';

export function describeDelay(daysUntilDelivery: number): string {
  if (daysUntilDelivery < 0) {
    const late = -daysUntilDelivery;
    return `OVERDUE by ${late} ${late === 1 ? 'day' : 'days'}`;
  }
  if (daysUntilDelivery === 0) return 'Due today';
  return `On track, ${daysUntilDelivery} ${daysUntilDelivery === 1 ? 'day' : 'days'} remaining`;
}

function findOrder(tables: Tables, orderId: string): Order | undefined {
  const id = orderId.trim();
  const exact = tables.orders.index.get(id);
  if (exact) return exact;
  const upper = id.toUpperCase();
  return tables.orders.rows.find(o => o.id.toUpperCase() === upper);
}

export function lookupOrderStatus(
  orderId: string,
  tables: Tables,
  filter: ScopeFilter,
  asOf: string,
): OrderStatusView | null {
  const order = findOrder(tables, orderId);
  if (!order || !filter.admits('orders', order)) return null;

  const open = isOpen(order);
  const daysUntilDelivery = diffDays(asOf, order.estimated_delivery);
  return {
    orderId: order.id,
    status: order.status,
    orderDate: order.order_date,
    shipDate: order.ship_date,
    estimatedDelivery: order.estimated_delivery,
    shippingMethod: order.shipping_method,
    processingDays: order.ship_date ? diffDays(order.order_date, order.ship_date) : null,
    daysUntilDelivery,
    delayStatus: open ? describeDelay(daysUntilDelivery) : order.status,
    overdue: open && daysUntilDelivery < 0,
  };
}
