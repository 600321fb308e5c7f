// Shared test data and fakes

import { loadConfig, type EngineConfig } from '../config/index.js';
import { InMemoryDocumentStore, type RawDocument } from '../data/document-store.js';
import { buildTable, type Tables } from '../data/tables.js';
import type { Customer, Order, Product, Revenue, TableName } from '../types/entities.js';
import type { CompletionRequest, LlmService } from '../planner/llm-service.js';
import { COMPOSER_SYSTEM_PROMPT } from '../planner/prompts.js';
import { RequestCancelled } from '../types/errors.js';

export const AS_OF = '2026-10-18';

export const CUSTOMERS: Customer[] = [
  { id: 'CUST_001', name: 'Ada Brennan', email: 'ada@example.com', region: 'North' },
  { id: 'CUST_002', name: 'Bilal Osei', email: 'bilal@example.com', region: 'South' },
  { id: 'CUST_003', name: 'Carmen Ruiz', email: 'carmen@example.com', region: 'West' },
];

export const PRODUCTS: Product[] = [
  { id: 'PROD_001', name: 'Trail Shoes', category: 'Footwear', price: 89.99, stock_level: 50 },
  { id: 'PROD_002', name: 'Base Layer', category: 'Apparel', price: 64.5, stock_level: 200 },
  { id: 'PROD_003', name: 'Bottle', category: 'Accessories', price: 24.95, stock_level: 0 },
];

export const ORDERS: Order[] = [
  order('ORD_001', 'CUST_001', 'PROD_001', 'Delivered', '2026-10-01', '2026-10-05', '2026-10-02', 'Standard', 1),
  order('ORD_002', 'CUST_001', 'PROD_002', 'Shipped', '2026-10-10', '2026-10-15', '2026-10-11', 'Express', 2),
  order('ORD_003', 'CUST_001', 'PROD_001', 'Placed', '2026-10-17', '2026-10-20', null, 'Standard', 1),
  order('ORD_004', 'CUST_002', 'PROD_002', 'Delayed', '2026-10-05', '2026-10-10', '2026-10-07', 'Standard', 1),
  order('ORD_005', 'CUST_002', 'PROD_003', 'Cancelled', '2026-10-12', '2026-10-14', null, 'Express', 3),
  order('ORD_006', 'CUST_002', 'PROD_001', 'Shipped', '2026-10-16', '2026-10-25', '2026-10-17', 'Overnight', 1),
];

export const REVENUE: Revenue[] = [
  { id: 'REV_001', order_id: 'ORD_001', amount: 89.99, date: '2026-10-01', payment_method: 'Credit Card' },
  { id: 'REV_002', order_id: 'ORD_002', amount: 129, date: '2026-10-10', payment_method: 'PayPal' },
  { id: 'REV_003', order_id: 'ORD_003', amount: 89.99, date: '2026-10-17', payment_method: 'Credit Card' },
  { id: 'REV_004', order_id: 'ORD_004', amount: 64.5, date: '2026-10-05', payment_method: 'Credit Card' },
  { id: 'REV_006', order_id: 'ORD_006', amount: 89.99, date: '2026-10-16', payment_method: 'PayPal' },
];

export function order(
  id: string,
  customerId: string,
  productId: string,
  status: Order['status'],
  orderDate: string,
  estimatedDelivery: string,
  shipDate: string | null = null,
  shippingMethod: string | null = 'Standard',
  quantity = 1,
): Order {
  return {
    id,
    customer_id: customerId,
    product_id: productId,
    status,
    order_date: orderDate,
    estimated_delivery: estimatedDelivery,
    ship_date: shipDate,
    shipping_method: shippingMethod,
    quantity,
  };
}

export interface TableRows {
  customers?: Customer[];
  orders?: Order[];
  products?: Product[];
  revenue?: Revenue[];
}

export function makeTables(rows: TableRows = {}): Tables {
  return {
    customers: buildTable('customers', (rows.customers ?? CUSTOMERS).map(r => ({ ...r }))),
    orders: buildTable('orders', (rows.orders ?? ORDERS).map(r => ({ ...r }))),
    products: buildTable('products', (rows.products ?? PRODUCTS).map(r => ({ ...r }))),
    revenue: buildTable('revenue', (rows.revenue ?? REVENUE).map(r => ({ ...r }))),
  };
}

export function makeStore(rows: TableRows = {}): InMemoryDocumentStore {
  const docs = (list: object[]): RawDocument[] => list.map(r => ({ ...r }));
  const collections: Record<TableName, RawDocument[]> = {
    customers: docs(rows.customers ?? CUSTOMERS),
    orders: docs(rows.orders ?? ORDERS),
    products: docs(rows.products ?? PRODUCTS),
    revenue: docs(rows.revenue ?? REVENUE),
  };
  return new InMemoryDocumentStore(collections);
}

export function testConfig(): EngineConfig {
  return loadConfig({ INSIGHT_LOG_LEVEL: 'silent', INSIGHT_LLM_RETRIES: '0' });
}

// ── Scripted language model ─────────────────────────────────────────

export type ScriptStep = string | Error | ((request: CompletionRequest) => string);

/**
 * Fake model with separate scripts for planner and composer calls.
 * Calls beyond the script fail, as an unavailable service would.
 */
export class ScriptedLlm implements LlmService {
  readonly name = 'scripted';
  readonly plannerCalls: CompletionRequest[] = [];
  readonly composerCalls: CompletionRequest[] = [];

  constructor(
    private readonly plans: ScriptStep[] = [],
    private readonly answers: ScriptStep[] = [],
  ) {}

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) throw new RequestCancelled('call');
    const composer = request.system === COMPOSER_SYSTEM_PROMPT;
    (composer ? this.composerCalls : this.plannerCalls).push(request);
    const step = (composer ? this.answers : this.plans).shift();
    if (step === undefined) throw new Error('scripted model has no more responses');
    if (step instanceof Error) throw step;
    return typeof step === 'function' ? step(request) : step;
  }
}

export const planJson = (plan: object): string => JSON.stringify(plan);
