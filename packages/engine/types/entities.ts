// Entities of the shared transactional dataset and their column schemas
// Dates are UTC calendar days (YYYY-MM-DD) so they compare lexicographically.
// Entity rows are type aliases so they are assignable to the generic `Row`.

export const TABLE_NAMES = ['customers', 'orders', 'products', 'revenue'] as const;

export type TableName = typeof TABLE_NAMES[number];

export const ORDER_STATUSES = ['Placed', 'Shipped', 'Delivered', 'Delayed', 'Cancelled'] as const;

export type OrderStatus = typeof ORDER_STATUSES[number];

/** Statuses that end an order's delivery lifecycle */
export const CLOSED_STATUSES: readonly OrderStatus[] = ['Delivered', 'Cancelled'];

export type Customer = {
  id: string;
  name: string;
  email: string;
  region: string;
};

export type Order = {
  id: string;
  customer_id: string;
  product_id: string;
  status: OrderStatus;
  order_date: string;
  estimated_delivery: string;
  ship_date: string | null;
  shipping_method: string | null;
  quantity: number;
};

export type Product = {
  id: string;
  name: string;
  category: string;
  price: number;
  stock_level: number;
};

export type Revenue = {
  id: string;
  order_id: string;
  amount: number;
  date: string;
  payment_method: string;
};

export interface EntityRowMap {
  customers: Customer;
  orders: Order;
  products: Product;
  revenue: Revenue;
}

export type CellValue = string | number | boolean | null;

/** A row as seen by the execution engine: column name → value */
export type Row = Readonly<Record<string, CellValue>>;

// ── Column schema ───────────────────────────────────────────────────

export type ColumnType = 'id' | 'string' | 'enum' | 'date' | 'integer' | 'money';

export interface ColumnDef {
  type: ColumnType;
  description: string;
  /** Foreign key target table, joined on the target's `id` */
  references?: TableName;
}

export type TableSchema = Readonly<Record<string, ColumnDef>>;

export const TABLE_SCHEMAS: Readonly<Record<TableName, TableSchema>> = {
  customers: {
    id: { type: 'id', description: 'Customer identifier, e.g. CUST_001' },
    name: { type: 'string', description: 'Customer display name' },
    email: { type: 'string', description: 'Contact email' },
    region: { type: 'string', description: 'Sales region' },
  },
  orders: {
    id: { type: 'id', description: 'Order identifier' },
    customer_id: { type: 'id', description: 'Ordering customer', references: 'customers' },
    product_id: { type: 'id', description: 'Ordered product', references: 'products' },
    status: { type: 'enum', description: `One of ${ORDER_STATUSES.join(', ')}` },
    order_date: { type: 'date', description: 'Day the order was placed' },
    estimated_delivery: { type: 'date', description: 'Promised delivery day' },
    ship_date: { type: 'date', description: 'Day the order shipped, null if not shipped' },
    shipping_method: { type: 'string', description: 'Carrier service level' },
    quantity: { type: 'integer', description: 'Units ordered' },
  },
  products: {
    id: { type: 'id', description: 'Product identifier, e.g. PROD_001' },
    name: { type: 'string', description: 'Product name' },
    category: { type: 'string', description: 'Product category' },
    price: { type: 'money', description: 'Unit price' },
    stock_level: { type: 'integer', description: 'Units currently in stock' },
  },
  revenue: {
    id: { type: 'id', description: 'Revenue entry identifier' },
    order_id: { type: 'id', description: 'Order this payment settles', references: 'orders' },
    amount: { type: 'money', description: 'Amount received' },
    date: { type: 'date', description: 'Payment day' },
    payment_method: { type: 'string', description: 'Payment instrument' },
  },
};

export function isTableName(value: string): value is TableName {
  return (TABLE_NAMES as readonly string[]).includes(value);
}

export function isNumericColumn(def: ColumnDef): boolean {
  return def.type === 'integer' || def.type === 'money';
}
