// Firestore REST client — pages through a collection and decodes typed values

import type { TableName } from '../types/entities.js';
import { DataUnavailable, RequestCancelled } from '../types/errors.js';
import { DOC_ID_FIELD, type DocumentStore, type RawDocument } from './document-store.js';
import { createLogger } from '../utils/log.js';

const log = createLogger('FirestoreStore');

export interface FirestoreStoreConfig {
  projectId: string;
  accessToken: string;
  baseUrl: string;
  pageSize: number;
  timeoutMs: number;
}

export interface FirestoreValue {
  nullValue?: null;
  booleanValue?: boolean;
  integerValue?: string;
  doubleValue?: number;
  timestampValue?: string;
  stringValue?: string;
  bytesValue?: string;
  referenceValue?: string;
  geoPointValue?: { latitude: number; longitude: number };
  arrayValue?: { values?: FirestoreValue[] };
  mapValue?: { fields?: Record<string, FirestoreValue> };
}

interface FirestoreDocument {
  name: string;
  fields?: Record<string, FirestoreValue>;
}

interface ListDocumentsResponse {
  documents?: FirestoreDocument[];
  nextPageToken?: string;
}

/** Safety stop for runaway pagination */
const MAX_PAGES = 1000;

export function decodeValue(value: FirestoreValue): unknown {
  if ('nullValue' in value) return null;
  if (value.booleanValue !== undefined) return value.booleanValue;
  if (value.integerValue !== undefined) return Number(value.integerValue);
  if (value.doubleValue !== undefined) return value.doubleValue;
  if (value.timestampValue !== undefined) return value.timestampValue;
  if (value.stringValue !== undefined) return value.stringValue;
  if (value.bytesValue !== undefined) return value.bytesValue;
  if (value.referenceValue !== undefined) return lastSegment(value.referenceValue);
  if (value.geoPointValue !== undefined) return { ...value.geoPointValue };
  if (value.arrayValue !== undefined) return (value.arrayValue.values ?? []).map(decodeValue);
  if (value.mapValue !== undefined) return decodeFields(value.mapValue.fields ?? {});
  return null;
}

export function decodeFields(fields: Record<string, FirestoreValue>): RawDocument {
  const out: RawDocument = {};
  for (const [key, value] of Object.entries(fields)) {
    out[key] = decodeValue(value);
  }
  return out;
}

export function decodeDocument(doc: FirestoreDocument): RawDocument {
  return { [DOC_ID_FIELD]: lastSegment(doc.name), ...decodeFields(doc.fields ?? {}) };
}

function lastSegment(path: string): string {
  const idx = path.lastIndexOf('/');
  return idx === -1 ? path : path.slice(idx + 1);
}

export class FirestoreRestStore implements DocumentStore {
  readonly name = 'firestore';

  constructor(private readonly config: FirestoreStoreConfig) {}

  async listCollection(collection: TableName, signal?: AbortSignal): Promise<RawDocument[]> {
    const docs: RawDocument[] = [];
    let pageToken: string | undefined;

    for (let page = 0; page < MAX_PAGES; page++) {
      const body = await this.fetchPage(collection, pageToken, signal);
      for (const doc of body.documents ?? []) {
        docs.push(decodeDocument(doc));
      }
      pageToken = body.nextPageToken;
      if (!pageToken) {
        log.debug('collection loaded', { collection, documents: docs.length, pages: page + 1 });
        return docs;
      }
    }

    throw new DataUnavailable(`Collection '${collection}' exceeded ${MAX_PAGES} pages`);
  }

  private async fetchPage(
    collection: TableName,
    pageToken: string | undefined,
    signal?: AbortSignal,
  ): Promise<ListDocumentsResponse> {
    const base = this.config.baseUrl.endsWith('/') ? this.config.baseUrl : this.config.baseUrl + '/';
    const url = new URL(
      `projects/${encodeURIComponent(this.config.projectId)}/databases/(default)/documents/${collection}`,
      base,
    );
    url.searchParams.set('pageSize', String(this.config.pageSize));
    if (pageToken) url.searchParams.set('pageToken', pageToken);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      let res: Response;
      try {
        res = await fetch(url.toString(), {
          headers: {
            'Accept': 'application/json',
            'Authorization': `Bearer ${this.config.accessToken}`,
          },
          signal: controller.signal,
        });
      } catch (err) {
        if (signal?.aborted) throw new RequestCancelled('data');
        throw new DataUnavailable(`Firestore: request for '${collection}' failed`, err);
      }

      if (!res.ok) {
        const text = await res.text().catch(() => '');
        if (res.status === 401) throw new DataUnavailable('Firestore: invalid or expired access token');
        if (res.status === 403) throw new DataUnavailable('Firestore: permission denied');
        if (res.status === 404) throw new DataUnavailable(`Firestore: collection '${collection}' not found`);
        if (res.status === 429) throw new DataUnavailable('Firestore: rate limited by server');
        throw new DataUnavailable(`Firestore: HTTP ${res.status} — ${text.slice(0, 200)}`);
      }

      return await res.json() as ListDocumentsResponse;
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
