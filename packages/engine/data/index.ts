import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import type { StoreConfig } from '../config/index.js';
import { FileDocumentStore, type DocumentStore } from './document-store.js';
import { FirestoreRestStore } from './firestore-store.js';

export { InMemoryDocumentStore, FileDocumentStore, DOC_ID_FIELD } from './document-store.js';
export type { DocumentStore, RawDocument } from './document-store.js';
export { FirestoreRestStore, decodeValue, decodeFields, decodeDocument } from './firestore-store.js';
export type { FirestoreValue, FirestoreStoreConfig } from './firestore-store.js';
export { normalizeCollection } from './normalize.js';
export { loadTables, buildTable } from './tables.js';
export type { Table, Tables } from './tables.js';
export { TableCache } from './table-cache.js';
export type { TableSnapshot, TableCacheOptions } from './table-cache.js';

const __dataDir = dirname(fileURLToPath(import.meta.url));

/** Bundled demo dataset, used when no data file is configured */
export const SAMPLE_DATASET_PATH = join(__dataDir, '..', 'datasets', 'sample-dataset.json');

export function createDocumentStore(config: StoreConfig): DocumentStore {
  if (config.kind === 'firestore') {
    if (!config.firestore) {
      throw new Error('Firestore store selected without Firestore settings');
    }
    return new FirestoreRestStore(config.firestore);
  }
  return new FileDocumentStore(config.dataFile ?? SAMPLE_DATASET_PATH);
}
