// Read-only table cache with versioned snapshots
// A refresh builds a complete new snapshot and swaps it in; readers keep the
// snapshot they were handed, so nobody observes a partially-updated table.

import type { DocumentStore } from './document-store.js';
import { loadTables, type Tables } from './tables.js';
import { createLogger } from '../utils/log.js';
import { throwIfAborted } from '../utils/retry.js';

const log = createLogger('TableCache');

export interface TableSnapshot {
  readonly version: number;
  readonly loadedAt: Date;
  readonly tables: Tables;
}

export interface TableCacheOptions {
  /** Snapshot lifetime; 0 reloads on every request */
  refreshMs: number;
  now?: () => number;
  onLoad?: (snapshot: TableSnapshot) => void;
}

export class TableCache {
  private current: TableSnapshot | null = null;
  private inflight: Promise<TableSnapshot> | null = null;
  private version = 0;
  private readonly now: () => number;

  constructor(
    private readonly store: DocumentStore,
    private readonly options: TableCacheOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  /** Current snapshot, loading or refreshing it when missing or stale */
  async get(signal?: AbortSignal): Promise<TableSnapshot> {
    throwIfAborted(signal, 'data');
    const snapshot = this.current;
    if (snapshot && !this.isStale(snapshot)) return snapshot;
    const fresh = await this.refresh();
    throwIfAborted(signal, 'data');
    return fresh;
  }

  /**
   * Force a reload. Concurrent callers share one in-flight load, so one
   * caller abandoning its request does not cancel the load for the others.
   * A failed load leaves the previous snapshot in place.
   */
  refresh(): Promise<TableSnapshot> {
    if (this.inflight) return this.inflight;

    const load = (async () => {
      const tables = await loadTables(this.store);
      const snapshot: TableSnapshot = Object.freeze({
        version: ++this.version,
        loadedAt: new Date(this.now()),
        tables,
      });
      this.current = snapshot;
      log.debug('snapshot swapped', { version: snapshot.version, store: this.store.name });
      this.options.onLoad?.(snapshot);
      return snapshot;
    })();

    this.inflight = load;
    const clear = () => {
      if (this.inflight === load) this.inflight = null;
    };
    load.then(clear, clear);
    return load;
  }

  /** Drop the current snapshot; the next `get` reloads */
  invalidate(): void {
    this.current = null;
  }

  private isStale(snapshot: TableSnapshot): boolean {
    return this.now() - snapshot.loadedAt.getTime() >= this.options.refreshMs;
  }
}
