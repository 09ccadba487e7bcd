import type { SortConfig } from '../frame';
import type { Update, RichUpdate, UnsubscribeFn } from '../types';

export type UpdateCallback<T = unknown> = (
  viewPath: string,
  key: string,
  update: Update<T>
) => void;

export type RichUpdateCallback<T = unknown> = (
  viewPath: string,
  key: string,
  update: RichUpdate<T>
) => void;

export interface ViewSortConfig {
  sort?: SortConfig;
}

/**
 * Storage adapter interface for per-view entity caches.
 * Implement this to back the client with another store (Zustand, IndexedDB, ...).
 *
 * `get` counts as an access for least-recently-used eviction; `entries` and `keys` do not.
 */
export interface StorageAdapter {
  get<T>(viewPath: string, key: string): T | null;
  entries<T>(viewPath: string): Array<[string, T]>;
  keys(viewPath: string): string[];
  size(viewPath: string): number;

  set<T>(viewPath: string, key: string, data: T): void;
  delete(viewPath: string, key: string): void;

  /** Removes the least recently accessed entry and returns its key. */
  evictOldest?(viewPath: string): string | undefined;
  setViewConfig?(viewPath: string, config: ViewSortConfig): void;

  onUpdate(callback: UpdateCallback): UnsubscribeFn;
  onRichUpdate(callback: RichUpdateCallback): UnsubscribeFn;

  notifyUpdate<T>(viewPath: string, key: string, update: Update<T>): void;
  notifyRichUpdate<T>(viewPath: string, key: string, update: RichUpdate<T>): void;
}

/** The read side handed to consumers; only the frame processor writes. */
export type ReadonlyStore = Pick<
  StorageAdapter,
  'get' | 'entries' | 'keys' | 'size' | 'onUpdate' | 'onRichUpdate'
>;
