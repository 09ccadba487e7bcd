import type { StorageAdapter, UpdateCallback, RichUpdateCallback } from './adapter';
import type { Update, RichUpdate, UnsubscribeFn } from '../types';

class ViewData<T = unknown> {
  private entities: Map<string, T> = new Map();
  /** Least recently accessed first */
  private accessOrder: Set<string> = new Set();

  get(key: string): T | undefined {
    const value = this.entities.get(key);
    if (value !== undefined) {
      this.touch(key);
    }
    return value;
  }

  set(key: string, value: T): void {
    this.touch(key);
    this.entities.set(key, value);
  }

  delete(key: string): boolean {
    this.accessOrder.delete(key);
    return this.entities.delete(key);
  }

  entries(): IterableIterator<[string, T]> {
    return this.entities.entries();
  }

  keys(): IterableIterator<string> {
    return this.entities.keys();
  }

  get size(): number {
    return this.entities.size;
  }

  touch(key: string): void {
    this.accessOrder.delete(key);
    this.accessOrder.add(key);
  }

  evictOldest(): string | undefined {
    for (const oldest of this.accessOrder) {
      this.delete(oldest);
      return oldest;
    }
    return undefined;
  }
}

export class MemoryAdapter implements StorageAdapter {
  private views: Map<string, ViewData<unknown>> = new Map();
  private updateCallbacks: Set<UpdateCallback> = new Set();
  private richUpdateCallbacks: Set<RichUpdateCallback> = new Set();

  get<T>(viewPath: string, key: string): T | null {
    const value = this.views.get(viewPath)?.get(key);
    return value !== undefined ? (value as T) : null;
  }

  entries<T>(viewPath: string): Array<[string, T]> {
    const view = this.views.get(viewPath);
    if (!view) return [];
    return Array.from(view.entries()) as Array<[string, T]>;
  }

  keys(viewPath: string): string[] {
    const view = this.views.get(viewPath);
    if (!view) return [];
    return Array.from(view.keys());
  }

  size(viewPath: string): number {
    return this.views.get(viewPath)?.size ?? 0;
  }

  set<T>(viewPath: string, key: string, data: T): void {
    let view = this.views.get(viewPath);
    if (!view) {
      view = new ViewData();
      this.views.set(viewPath, view);
    }
    view.set(key, data);
  }

  delete(viewPath: string, key: string): void {
    this.views.get(viewPath)?.delete(key);
  }

  evictOldest(viewPath: string): string | undefined {
    return this.views.get(viewPath)?.evictOldest();
  }

  onUpdate(callback: UpdateCallback): UnsubscribeFn {
    this.updateCallbacks.add(callback);
    return () => {
      this.updateCallbacks.delete(callback);
    };
  }

  onRichUpdate(callback: RichUpdateCallback): UnsubscribeFn {
    this.richUpdateCallbacks.add(callback);
    return () => {
      this.richUpdateCallbacks.delete(callback);
    };
  }

  notifyUpdate<T>(viewPath: string, key: string, update: Update<T>): void {
    for (const callback of this.updateCallbacks) {
      callback(viewPath, key, update);
    }
  }

  notifyRichUpdate<T>(viewPath: string, key: string, update: RichUpdate<T>): void {
    for (const callback of this.richUpdateCallbacks) {
      callback(viewPath, key, update);
    }
  }
}
