import type { SortConfig } from '../frame';
import { getNestedValue } from '../query';
import type { StorageAdapter, UpdateCallback, RichUpdateCallback, ViewSortConfig } from './adapter';
import type { Update, RichUpdate, UnsubscribeFn } from '../types';

function compareSortValues(a: unknown, b: unknown): number {
  if (a === b) return 0;
  if (a === undefined || a === null) return -1;
  if (b === undefined || b === null) return 1;

  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a.localeCompare(b);
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return (a ? 1 : 0) - (b ? 1 : 0);
  }

  return String(a).localeCompare(String(b));
}

function compareEntries(
  sortConfig: SortConfig,
  aKey: string,
  aValue: unknown,
  bKey: string,
  bValue: unknown
): number {
  let cmp = compareSortValues(aValue, bValue);
  if (sortConfig.order === 'desc') cmp = -cmp;
  return cmp === 0 ? aKey.localeCompare(bKey) : cmp;
}

/**
 * Keeps list views ordered by the sort config the server sends with its subscription
 * acknowledgement. Views without one keep the inner adapter's insertion order.
 */
export class SortedStorageDecorator implements StorageAdapter {
  private inner: StorageAdapter;
  private sortConfigs: Map<string, SortConfig> = new Map();
  private sortedKeysMap: Map<string, string[]> = new Map();
  private sortValues: Map<string, Map<string, unknown>> = new Map();

  constructor(inner: StorageAdapter) {
    this.inner = inner;
  }

  get<T>(viewPath: string, key: string): T | null {
    return this.inner.get<T>(viewPath, key);
  }

  entries<T>(viewPath: string): Array<[string, T]> {
    const entries = this.inner.entries<T>(viewPath);
    const sortedKeys = this.sortedKeysMap.get(viewPath);
    if (!sortedKeys) return entries;

    const byKey = new Map(entries);
    const sorted: Array<[string, T]> = [];
    for (const key of sortedKeys) {
      const value = byKey.get(key);
      if (value !== undefined) {
        sorted.push([key, value]);
      }
    }
    return sorted;
  }

  keys(viewPath: string): string[] {
    const sortedKeys = this.sortedKeysMap.get(viewPath);
    if (sortedKeys) return [...sortedKeys];
    return this.inner.keys(viewPath);
  }

  size(viewPath: string): number {
    return this.inner.size(viewPath);
  }

  set<T>(viewPath: string, key: string, data: T): void {
    this.inner.set(viewPath, key, data);

    const sortConfig = this.sortConfigs.get(viewPath);
    if (sortConfig) {
      this.updateSortedPosition(viewPath, key, data, sortConfig);
    }
  }

  delete(viewPath: string, key: string): void {
    this.removeSortedKey(viewPath, key);
    this.inner.delete(viewPath, key);
  }

  evictOldest(viewPath: string): string | undefined {
    const evicted = this.inner.evictOldest?.(viewPath);
    if (evicted !== undefined) {
      this.removeSortedKey(viewPath, evicted);
    }
    return evicted;
  }

  setViewConfig(viewPath: string, config: ViewSortConfig): void {
    if (config.sort && !this.sortConfigs.has(viewPath)) {
      this.sortConfigs.set(viewPath, config.sort);
      this.rebuildSortedKeys(viewPath, config.sort);
    }
    this.inner.setViewConfig?.(viewPath, config);
  }

  onUpdate(callback: UpdateCallback): UnsubscribeFn {
    return this.inner.onUpdate(callback);
  }

  onRichUpdate(callback: RichUpdateCallback): UnsubscribeFn {
    return this.inner.onRichUpdate(callback);
  }

  notifyUpdate<T>(viewPath: string, key: string, update: Update<T>): void {
    this.inner.notifyUpdate(viewPath, key, update);
  }

  notifyRichUpdate<T>(viewPath: string, key: string, update: RichUpdate<T>): void {
    this.inner.notifyRichUpdate(viewPath, key, update);
  }

  private removeSortedKey(viewPath: string, key: string): void {
    this.sortValues.get(viewPath)?.delete(key);
    const sortedKeys = this.sortedKeysMap.get(viewPath);
    if (!sortedKeys) return;
    const idx = sortedKeys.indexOf(key);
    if (idx !== -1) {
      sortedKeys.splice(idx, 1);
    }
  }

  private updateSortedPosition(viewPath: string, key: string, data: unknown, sortConfig: SortConfig): void {
    let sortedKeys = this.sortedKeysMap.get(viewPath);
    let values = this.sortValues.get(viewPath);
    if (!sortedKeys || !values) {
      sortedKeys = [];
      values = new Map();
      this.sortedKeysMap.set(viewPath, sortedKeys);
      this.sortValues.set(viewPath, values);
    }

    const existingIdx = sortedKeys.indexOf(key);
    if (existingIdx !== -1) {
      sortedKeys.splice(existingIdx, 1);
    }

    const sortValue = getNestedValue(data, sortConfig.field);
    values.set(key, sortValue);
    const insertIdx = this.binarySearchInsertPosition(sortedKeys, values, sortConfig, key, sortValue);
    sortedKeys.splice(insertIdx, 0, key);
  }

  private binarySearchInsertPosition(
    sortedKeys: string[],
    values: Map<string, unknown>,
    sortConfig: SortConfig,
    newKey: string,
    newSortValue: unknown
  ): number {
    let low = 0;
    let high = sortedKeys.length;

    while (low < high) {
      const mid = Math.floor((low + high) / 2);
      const midKey = sortedKeys[mid] ?? '';
      const cmp = compareEntries(sortConfig, newKey, newSortValue, midKey, values.get(midKey));

      if (cmp < 0) {
        high = mid;
      } else {
        low = mid + 1;
      }
    }

    return low;
  }

  private rebuildSortedKeys(viewPath: string, sortConfig: SortConfig): void {
    const values = new Map<string, unknown>();
    for (const [key, entity] of this.inner.entries<unknown>(viewPath)) {
      values.set(key, getNestedValue(entity, sortConfig.field));
    }

    const keys = Array.from(values.keys());
    keys.sort((a, b) => compareEntries(sortConfig, a, values.get(a), b, values.get(b)));
    this.sortValues.set(viewPath, values);
    this.sortedKeysMap.set(viewPath, keys);
  }
}
