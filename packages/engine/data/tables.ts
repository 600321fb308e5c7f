// In-memory tables built from the document store
// Rows are sorted by id and frozen; joins resolve through the id index.

import {
  TABLE_NAMES, type EntityRowMap, type TableName,
} from '../types/entities.js';
import { DataUnavailable, EngineError } from '../types/errors.js';
import { createLogger, errorMessage } from '../utils/log.js';
import { throwIfAborted } from '../utils/retry.js';
import type { DocumentStore, RawDocument } from './document-store.js';
import { normalizeCollection } from './normalize.js';

const log = createLogger('DataAccess');

export interface Table<T extends { id: string }> {
  readonly name: TableName;
  readonly rows: readonly T[];
  readonly index: ReadonlyMap<string, T>;
  /** Documents dropped during normalization */
  readonly rejected: number;
}

export type Tables = { readonly [K in TableName]: Table<EntityRowMap[K]> };

export function buildTable<K extends TableName>(
  name: K,
  rows: EntityRowMap[K][],
  rejected = 0,
): Table<EntityRowMap[K]> {
  const sorted = [...rows].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  const index = new Map<string, EntityRowMap[K]>();
  for (const row of sorted) {
    Object.freeze(row);
    index.set(row.id, row);
  }
  return { name, rows: Object.freeze(sorted), index, rejected };
}

async function loadCollection<K extends TableName>(
  store: DocumentStore,
  name: K,
  signal?: AbortSignal,
): Promise<Table<EntityRowMap[K]>> {
  let docs: RawDocument[];
  try {
    docs = await store.listCollection(name, signal);
  } catch (err) {
    if (err instanceof EngineError) throw err;
    throw new DataUnavailable(`Failed to retrieve collection '${name}': ${errorMessage(err)}`, err);
  }

  if (docs.length === 0) {
    throw new DataUnavailable(`Collection '${name}' is empty or does not exist`);
  }

  const { rows, rejected, issues } = normalizeCollection(name, docs);
  if (rejected > 0) {
    log.warn('dropped malformed documents', { collection: name, rejected, issues });
  }
  if (rows.length === 0) {
    throw new DataUnavailable(`Collection '${name}' has no usable documents`);
  }
  return buildTable(name, rows, rejected);
}

/**
 * Load all four collections. Any failing or empty collection fails the whole
 * load: a partial dataset would produce misleading analytics.
 */
export async function loadTables(store: DocumentStore, signal?: AbortSignal): Promise<Tables> {
  throwIfAborted(signal, 'data');

  const [customers, orders, products, revenue] = await Promise.all([
    loadCollection(store, 'customers', signal),
    loadCollection(store, 'orders', signal),
    loadCollection(store, 'products', signal),
    loadCollection(store, 'revenue', signal),
  ]);

  const tables: Tables = { customers, orders, products, revenue };
  log.info('tables loaded', Object.fromEntries(
    TABLE_NAMES.map(name => [name, tables[name].rows.length]),
  ));
  return tables;
}
