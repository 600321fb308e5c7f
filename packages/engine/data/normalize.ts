// Normalize raw store documents into typed entity rows
// Accepts snake_case fields and the legacy PascalCase export fields
// (OrderID, CustomerID, EstDeliveryDate, ...).

import { z } from 'zod';
import {
  ORDER_STATUSES, type EntityRowMap, type OrderStatus, type TableName,
} from '../types/entities.js';
import { normalizeDay } from '../utils/dates.js';
import { DOC_ID_FIELD, type RawDocument } from './document-store.js';

/** Canonical field → accepted source field names, in priority order */
const FIELD_ALIASES: Record<TableName, Record<string, string[]>> = {
  customers: {
    id: ['id', 'customer_id', 'CustomerID', DOC_ID_FIELD],
    name: ['name', 'Name', 'CustomerName'],
    email: ['email', 'Email'],
    region: ['region', 'Region'],
  },
  orders: {
    id: ['id', 'order_id', 'OrderID', DOC_ID_FIELD],
    customer_id: ['customer_id', 'CustomerID'],
    product_id: ['product_id', 'ProductID'],
    status: ['status', 'Status'],
    order_date: ['order_date', 'OrderDate'],
    estimated_delivery: ['estimated_delivery', 'EstDeliveryDate', 'EstimatedDelivery'],
    ship_date: ['ship_date', 'ShipDate'],
    shipping_method: ['shipping_method', 'ShippingMethod'],
    quantity: ['quantity', 'Quantity'],
  },
  products: {
    id: ['id', 'product_id', 'ProductID', DOC_ID_FIELD],
    name: ['name', 'Name', 'ProductName'],
    category: ['category', 'Category'],
    price: ['price', 'Price'],
    stock_level: ['stock_level', 'StockLevel', 'Stock'],
  },
  revenue: {
    id: ['id', 'revenue_id', 'RevenueID', DOC_ID_FIELD],
    order_id: ['order_id', 'OrderID'],
    amount: ['amount', 'Amount'],
    date: ['date', 'Date'],
    payment_method: ['payment_method', 'PaymentMethod'],
  },
};

function pickFields(table: TableName, doc: RawDocument): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [field, aliases] of Object.entries(FIELD_ALIASES[table])) {
    for (const alias of aliases) {
      const value = doc[alias];
      if (value !== undefined && value !== null && value !== '') {
        out[field] = value;
        break;
      }
    }
  }
  return out;
}

// ── Field schemas ───────────────────────────────────────────────────

const IdSchema = z.union([z.string(), z.number()])
  .transform(v => String(v).trim())
  .pipe(z.string().min(1));

const TextSchema = z.union([z.string(), z.number()]).transform(v => String(v).trim());

const DaySchema = z.unknown().transform((v, ctx) => {
  const day = normalizeDay(v);
  if (day === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'invalid date' });
    return z.NEVER;
  }
  return day;
});

const OptionalDaySchema = z.unknown().transform(v => normalizeDay(v));

const StatusSchema = z.string().transform((v, ctx): OrderStatus => {
  const match = ORDER_STATUSES.find(s => s.toLowerCase() === v.trim().toLowerCase());
  if (!match) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown status "${v}"` });
    return z.NEVER;
  }
  return match;
});

const NonNegativeNumberSchema = z.coerce.number().finite().nonnegative();

const CustomerSchema = z.object({
  id: IdSchema,
  name: TextSchema.default(''),
  email: TextSchema.default(''),
  region: TextSchema.default(''),
});

const OrderSchema = z.object({
  id: IdSchema,
  customer_id: IdSchema,
  product_id: IdSchema,
  status: StatusSchema,
  order_date: DaySchema,
  estimated_delivery: DaySchema,
  ship_date: OptionalDaySchema,
  shipping_method: TextSchema.nullable().default(null),
  quantity: z.coerce.number().int().positive().default(1),
});

const ProductSchema = z.object({
  id: IdSchema,
  name: TextSchema.default(''),
  category: TextSchema.default(''),
  price: NonNegativeNumberSchema,
  stock_level: z.coerce.number().int().nonnegative(),
});

const RevenueSchema = z.object({
  id: IdSchema,
  order_id: IdSchema,
  amount: NonNegativeNumberSchema,
  date: DaySchema,
  payment_method: TextSchema.default(''),
});

const ENTITY_SCHEMAS: { [K in TableName]: z.ZodType<EntityRowMap[K], z.ZodTypeDef, unknown> } = {
  customers: CustomerSchema,
  orders: OrderSchema,
  products: ProductSchema,
  revenue: RevenueSchema,
};

export interface NormalizedCollection<K extends TableName> {
  rows: EntityRowMap[K][];
  rejected: number;
  /** First few rejection reasons, for diagnostics */
  issues: string[];
}

export function normalizeCollection<K extends TableName>(
  table: K,
  docs: RawDocument[],
): NormalizedCollection<K> {
  const schema = ENTITY_SCHEMAS[table];
  const rows: EntityRowMap[K][] = [];
  const issues: string[] = [];
  const seen = new Set<string>();
  let rejected = 0;

  for (const doc of docs) {
    const result = schema.safeParse(pickFields(table, doc));
    if (!result.success) {
      rejected++;
      if (issues.length < 5) {
        const issue = result.error.issues[0];
        issues.push(`${issue.path.join('.') || 'document'}: ${issue.message}`);
      }
      continue;
    }
    // Duplicate ids would make id lookups ambiguous; first one wins
    if (seen.has(result.data.id)) {
      rejected++;
      if (issues.length < 5) issues.push(`id: duplicate "${result.data.id}"`);
      continue;
    }
    seen.add(result.data.id);
    rows.push(result.data);
  }

  return { rows, rejected, issues };
}
