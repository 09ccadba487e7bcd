import type { Subscription, UnsubscribeFn } from './types';
import type { ConnectionManager } from './connection';

interface SubscriptionTracker {
  subscription: Subscription;
  refCount: number;
}

type SubKey = string;

export function subscriptionKey(subscription: Subscription): SubKey {
  const filters = subscription.filters ? JSON.stringify(subscription.filters) : '{}';
  return [
    subscription.view,
    subscription.key ?? '*',
    subscription.partition ?? '',
    filters,
    subscription.take ?? '',
    subscription.skip ?? '',
  ].join(':');
}

/** Reference-counts identical subscriptions so the server sees each one once. */
export class SubscriptionRegistry {
  private subscriptions: Map<SubKey, SubscriptionTracker> = new Map();
  private connection: ConnectionManager;
  /** Bumped by clear(); handles from an older generation release nothing. */
  private generation = 0;
  private clearCallbacks: Set<() => void> = new Set();

  constructor(connection: ConnectionManager) {
    this.connection = connection;
  }

  subscribe(subscription: Subscription): UnsubscribeFn {
    const subKey = subscriptionKey(subscription);
    const existing = this.subscriptions.get(subKey);

    if (existing) {
      existing.refCount++;
    } else {
      this.subscriptions.set(subKey, {
        subscription,
        refCount: 1,
      });
      this.connection.subscribe(subscription);
    }

    const generation = this.generation;
    let released = false;
    return () => {
      if (released || generation !== this.generation) return;
      released = true;
      this.unsubscribe(subscription);
    };
  }

  unsubscribe(subscription: Subscription): void {
    const subKey = subscriptionKey(subscription);
    const existing = this.subscriptions.get(subKey);

    if (existing) {
      existing.refCount--;
      if (existing.refCount <= 0) {
        this.subscriptions.delete(subKey);
        this.connection.unsubscribe(subscription);
      }
    }
  }

  getRefCount(subscription: Subscription): number {
    return this.subscriptions.get(subscriptionKey(subscription))?.refCount ?? 0;
  }

  getActiveSubscriptions(): Subscription[] {
    return Array.from(this.subscriptions.values()).map((t) => t.subscription);
  }

  onClear(callback: () => void): UnsubscribeFn {
    this.clearCallbacks.add(callback);
    return () => {
      this.clearCallbacks.delete(callback);
    };
  }

  clear(): void {
    this.generation++;
    for (const { subscription } of this.subscriptions.values()) {
      this.connection.unsubscribe(subscription);
    }
    this.subscriptions.clear();
    for (const callback of Array.from(this.clearCallbacks)) {
      callback();
    }
  }
}
