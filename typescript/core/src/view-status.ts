import type { SubscriptionError, UnsubscribeFn } from './types';

type LoadedCallback = (viewPath: string, key: string | undefined) => void;
type ErrorCallback = (error: SubscriptionError) => void;

/**
 * Tracks which views have had a server response and which uncached keys are
 * confirmed absent, so reads can tell "not loaded yet" apart from "absent".
 *
 * Cached keys need no bookkeeping here: readers check the store first. Absence
 * is implied for every uncached key of a complete view. Elsewhere it is
 * remembered only for keys someone is tracking, and dropped when the last
 * tracker lets go.
 */
export class ViewStatus {
  private respondedViews: Set<string> = new Set();
  /** Views whose cache holds every key the server has; cleared by eviction */
  private completeViews: Set<string> = new Set();
  private absentKeys: Map<string, Set<string>> = new Map();
  private trackedKeys: Map<string, Map<string, number>> = new Map();
  private loadedCallbacks: Set<LoadedCallback> = new Set();
  private errorCallbacks: Set<ErrorCallback> = new Set();

  /** Without a key, records a whole-view snapshot; with one, a key that is now cached. */
  markLoaded(viewPath: string, key?: string): void {
    this.respondedViews.add(viewPath);
    if (key === undefined) {
      this.completeViews.add(viewPath);
      this.absentKeys.delete(viewPath);
    } else {
      this.removeAbsent(viewPath, key);
    }
    this.notifyLoaded(viewPath, key);
  }

  markAbsent(viewPath: string, key: string): void {
    this.respondedViews.add(viewPath);
    if (!this.completeViews.has(viewPath) && this.trackedKeys.get(viewPath)?.has(key)) {
      let keys = this.absentKeys.get(viewPath);
      if (!keys) {
        keys = new Set();
        this.absentKeys.set(viewPath, keys);
      }
      keys.add(key);
    }
    this.notifyLoaded(viewPath, key);
  }

  /** An evicted key leaves the view incomplete until the next whole-view snapshot. */
  forget(viewPath: string, key: string): void {
    this.completeViews.delete(viewPath);
    this.removeAbsent(viewPath, key);
  }

  isLoaded(viewPath: string): boolean {
    return this.respondedViews.has(viewPath);
  }

  /** Only meaningful for a key that is not in the cache. */
  isAbsent(viewPath: string, key: string): boolean {
    return this.completeViews.has(viewPath) || (this.absentKeys.get(viewPath)?.has(key) ?? false);
  }

  /** Keeps confirmed absence of `key` remembered until the returned function runs. */
  track(viewPath: string, key: string): UnsubscribeFn {
    let counts = this.trackedKeys.get(viewPath);
    if (!counts) {
      counts = new Map();
      this.trackedKeys.set(viewPath, counts);
    }
    counts.set(key, (counts.get(key) ?? 0) + 1);

    let released = false;
    return () => {
      if (released) return;
      released = true;
      const current = this.trackedKeys.get(viewPath);
      const count = current?.get(key) ?? 0;
      if (count > 1) {
        current?.set(key, count - 1);
        return;
      }
      current?.delete(key);
      if (current?.size === 0) this.trackedKeys.delete(viewPath);
      this.removeAbsent(viewPath, key);
    };
  }

  /** Number of keys remembered as absent for a view. */
  absentKeyCount(viewPath: string): number {
    return this.absentKeys.get(viewPath)?.size ?? 0;
  }

  fail(error: SubscriptionError): void {
    for (const callback of this.errorCallbacks) {
      callback(error);
    }
  }

  onLoaded(callback: LoadedCallback): UnsubscribeFn {
    this.loadedCallbacks.add(callback);
    return () => {
      this.loadedCallbacks.delete(callback);
    };
  }

  onError(callback: ErrorCallback): UnsubscribeFn {
    this.errorCallbacks.add(callback);
    return () => {
      this.errorCallbacks.delete(callback);
    };
  }

  private removeAbsent(viewPath: string, key: string): void {
    const keys = this.absentKeys.get(viewPath);
    if (!keys) return;
    keys.delete(key);
    if (keys.size === 0) this.absentKeys.delete(viewPath);
  }

  private notifyLoaded(viewPath: string, key: string | undefined): void {
    for (const callback of this.loadedCallbacks) {
      callback(viewPath, key);
    }
  }
}
