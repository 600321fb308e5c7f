// Document store abstraction over the four named collections
// Read path only; writes belong to the order/stock system.

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { TableName } from '../types/entities.js';
import { DataUnavailable } from '../types/errors.js';

export type RawDocument = Record<string, unknown>;

export interface DocumentStore {
  readonly name: string;
  listCollection(collection: TableName, signal?: AbortSignal): Promise<RawDocument[]>;
}

/** Field holding the store-level document id when the body carries none */
export const DOC_ID_FIELD = '_docId';

// ── In-memory store (tests, embedding) ──────────────────────────────

export class InMemoryDocumentStore implements DocumentStore {
  readonly name = 'memory';
  private collections: Partial<Record<TableName, RawDocument[]>>;
  /** Number of listCollection calls, by collection */
  readonly reads = new Map<TableName, number>();

  constructor(collections: Partial<Record<TableName, RawDocument[]>> = {}) {
    this.collections = collections;
  }

  setCollection(collection: TableName, docs: RawDocument[]): void {
    this.collections[collection] = docs;
  }

  async listCollection(collection: TableName): Promise<RawDocument[]> {
    this.reads.set(collection, (this.reads.get(collection) ?? 0) + 1);
    const docs = this.collections[collection];
    if (!docs) {
      throw new DataUnavailable(`Collection '${collection}' does not exist`);
    }
    return docs.map(d => ({ ...d }));
  }
}

// ── JSON file store (local runs, demos) ─────────────────────────────

const DatasetFileSchema = z.object({
  customers: z.array(z.record(z.unknown())).optional(),
  orders: z.array(z.record(z.unknown())).optional(),
  products: z.array(z.record(z.unknown())).optional(),
  revenue: z.array(z.record(z.unknown())).optional(),
});

export class FileDocumentStore implements DocumentStore {
  readonly name = 'file';

  constructor(private readonly path: string) {}

  async listCollection(collection: TableName): Promise<RawDocument[]> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (err) {
      throw new DataUnavailable(`Dataset file could not be read: ${this.path}`, err);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new DataUnavailable(`Dataset file is not valid JSON: ${this.path}`, err);
    }

    const parsed = DatasetFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new DataUnavailable(`Dataset file has an unexpected shape: ${this.path}`);
    }
    const docs = parsed.data[collection];
    if (!docs) {
      throw new DataUnavailable(`Collection '${collection}' does not exist`);
    }
    return docs;
  }
}
