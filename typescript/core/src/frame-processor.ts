import type { Frame, SnapshotFrame, EntityFrame, SubscribedFrame, ErrorFrame } from './frame';
import { isSnapshotFrame, isSubscribedFrame, isErrorFrame } from './frame';
import type { MergeContext } from './merge';
import { mergePatch } from './merge';
import type { StorageAdapter } from './storage/adapter';
import type { FieldStrategies, Logger, RichUpdate, Schema } from './types';
import {
  DEFAULT_MAX_ENTRIES_PER_VIEW,
  LOG_PREFIX,
  SubscriptionError,
  ValidationError,
} from './types';
import { ViewStatus } from './view-status';

export interface FrameProcessorConfig {
  maxEntriesPerView?: number | null;
  /**
   * Interval in milliseconds to buffer frames before flushing to storage.
   * Set to 0 for immediate processing (no buffering).
   * Default: 0 (immediate)
   */
  flushIntervalMs?: number;
  /** Check entity data against `schemas` before it reaches the cache. */
  validateFrames?: boolean;
  /** Entity schemas keyed by entity name (the view path up to the first `/`) */
  schemas?: Readonly<Record<string, Schema<unknown>>>;
  /** Field strategies keyed by view path */
  strategies?: Readonly<Record<string, FieldStrategies>>;
  status?: ViewStatus;
  logger?: Logger;
  onDropped?: (error: ValidationError) => void;
}

type AccumulatorState = Map<string, Set<unknown>>;

function getOrCreate<K, V>(map: Map<K, V>, key: K, create: () => V): V {
  let value = map.get(key);
  if (value === undefined) {
    value = create();
    map.set(key, value);
  }
  return value;
}

/**
 * Single writer of the entity cache: applies inbound frames to storage and
 * notifies subscribers with plain and rich updates.
 */
export class FrameProcessor {
  private storage: StorageAdapter;
  private status: ViewStatus;
  private logger: Logger;
  private maxEntriesPerView: number | null;
  private flushIntervalMs: number;
  private validateFrames: boolean;
  private schemas?: Readonly<Record<string, Schema<unknown>>>;
  private strategies: Readonly<Record<string, FieldStrategies>>;
  private onDropped?: (error: ValidationError) => void;
  private pendingFrames: Frame[] = [];
  private flushTimer: ReturnType<typeof setTimeout> | null = null;
  private isProcessing = false;
  /** UniqueCount state per view, then per key */
  private accumulators: Map<string, Map<string, AccumulatorState>> = new Map();
  /** Keys cached before a reconnect that the next full snapshot has not confirmed yet */
  private resyncing: Map<string, Set<string>> = new Map();

  constructor(storage: StorageAdapter, config: FrameProcessorConfig = {}) {
    this.storage = storage;
    this.status = config.status ?? new ViewStatus();
    this.logger = config.logger ?? console;
    this.maxEntriesPerView = config.maxEntriesPerView === undefined
      ? DEFAULT_MAX_ENTRIES_PER_VIEW
      : config.maxEntriesPerView;
    this.flushIntervalMs = config.flushIntervalMs ?? 0;
    this.validateFrames = config.validateFrames ?? false;
    this.schemas = config.schemas;
    this.strategies = config.strategies ?? {};
    this.onDropped = config.onDropped;
  }

  handleFrame(frame: Frame): void {
    if (this.flushIntervalMs === 0) {
      this.processFrame(frame);
      return;
    }

    this.pendingFrames.push(frame);
    this.scheduleFlush();
  }

  /**
   * Immediately flush all pending frames.
   * Useful for ensuring all updates are processed before reading state.
   */
  flush(): void {
    if (this.flushTimer !== null) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
    this.flushPendingFrames();
  }

  /**
   * Marks views for resynchronisation after a reconnect. When the next complete
   * snapshot of a view arrives, keys it no longer contains are deleted.
   */
  beginResync(viewPaths: Iterable<string>): void {
    for (const viewPath of viewPaths) {
      this.resyncing.set(viewPath, new Set(this.storage.keys(viewPath)));
    }
  }

  /**
   * Clean up any pending timers. Call when disposing the processor.
   */
  dispose(): void {
    if (this.flushTimer !== null) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
    this.pendingFrames = [];
  }

  private scheduleFlush(): void {
    if (this.flushTimer !== null) {
      return;
    }

    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      this.flushPendingFrames();
    }, this.flushIntervalMs);
  }

  private flushPendingFrames(): void {
    if (this.isProcessing || this.pendingFrames.length === 0) {
      return;
    }

    this.isProcessing = true;
    try {
      while (this.pendingFrames.length > 0) {
        const batch = this.pendingFrames;
        this.pendingFrames = [];
        for (const frame of batch) {
          this.processFrame(frame);
        }
      }
    } finally {
      this.isProcessing = false;
    }
  }

  private processFrame(frame: Frame): void {
    if (isSubscribedFrame(frame)) {
      this.handleSubscribedFrame(frame);
    } else if (isErrorFrame(frame)) {
      this.handleErrorFrame(frame);
    } else if (isSnapshotFrame(frame)) {
      this.handleSnapshotFrame(frame);
    } else {
      this.handleEntityFrame(frame);
    }
  }

  private handleSubscribedFrame(frame: SubscribedFrame): void {
    if (this.storage.setViewConfig && frame.sort) {
      this.storage.setViewConfig(frame.view, { sort: frame.sort });
    }
  }

  private handleErrorFrame(frame: ErrorFrame): void {
    this.logger.warn(LOG_PREFIX, 'Subscription error:', { view: frame.view, key: frame.key, message: frame.message });
    this.status.fail(new SubscriptionError(frame.message, frame.view, frame.key));
  }

  private handleSnapshotFrame(frame: SnapshotFrame): void {
    const viewPath = frame.entity;
    const stale = this.resyncing.get(viewPath);

    for (const entity of frame.data) {
      stale?.delete(entity.key);
      if (entity.data === undefined || !this.admit(viewPath, entity.key, entity.data)) {
        continue;
      }
      this.applyUpsert(viewPath, entity.key, entity.data);
    }

    if (frame.key !== undefined) {
      const listed = frame.data.some((entity) => entity.key === frame.key);
      if (this.storage.get(viewPath, frame.key) === null) {
        this.status.markAbsent(viewPath, frame.key);
      } else if (!listed) {
        this.applyDelete(viewPath, frame.key);
      }
      return;
    }

    if (stale && frame.complete !== false) {
      this.resyncing.delete(viewPath);
      for (const key of stale) {
        if (this.storage.get(viewPath, key) !== null) {
          this.applyDelete(viewPath, key);
        }
      }
    }
    this.status.markLoaded(viewPath);
  }

  private handleEntityFrame(frame: EntityFrame): void {
    const viewPath = frame.entity;
    this.resyncing.get(viewPath)?.delete(frame.key);

    switch (frame.op) {
      case 'create':
      case 'upsert':
        if (frame.data === undefined || !this.admit(viewPath, frame.key, frame.data)) {
          return;
        }
        this.applyUpsert(viewPath, frame.key, frame.data);
        break;

      case 'patch': {
        if (frame.data === undefined) {
          return;
        }
        const existing = this.storage.get<unknown>(viewPath, frame.key);
        const merged = mergePatch(existing, frame.data, {
          fields: this.strategies[viewPath],
          append: frame.append,
          context: this.mergeContext(viewPath, frame.key),
        });
        if (!this.admit(viewPath, frame.key, merged)) {
          return;
        }
        this.storage.set(viewPath, frame.key, merged);
        this.storage.notifyUpdate(viewPath, frame.key, {
          type: 'patch',
          key: frame.key,
          data: frame.data,
        });
        this.emitRichUpdate(viewPath, frame.key, existing, merged, frame.data);
        this.status.markLoaded(viewPath, frame.key);
        this.enforceMaxEntries(viewPath);
        break;
      }

      case 'delete':
        this.applyDelete(viewPath, frame.key);
        break;
    }
  }

  private applyUpsert(viewPath: string, key: string, data: unknown): void {
    const previousValue = this.storage.get<unknown>(viewPath, key);
    this.storage.set(viewPath, key, data);
    this.accumulators.get(viewPath)?.delete(key);
    this.storage.notifyUpdate(viewPath, key, { type: 'upsert', key, data });
    this.emitRichUpdate(viewPath, key, previousValue, data);
    this.status.markLoaded(viewPath, key);
    this.enforceMaxEntries(viewPath);
  }

  private applyDelete(viewPath: string, key: string): void {
    const previousValue = this.storage.get<unknown>(viewPath, key);
    this.storage.delete(viewPath, key);
    this.accumulators.get(viewPath)?.delete(key);
    this.storage.notifyUpdate(viewPath, key, { type: 'delete', key });
    if (previousValue !== null) {
      this.storage.notifyRichUpdate(viewPath, key, { type: 'deleted', key, lastKnown: previousValue });
    }
    this.status.markAbsent(viewPath, key);
  }

  private emitRichUpdate(
    viewPath: string,
    key: string,
    before: unknown,
    after: unknown,
    patch?: unknown
  ): void {
    let richUpdate: RichUpdate<unknown>;
    if (before === null) {
      richUpdate = { type: 'created', key, data: after };
    } else if (patch === undefined) {
      richUpdate = { type: 'updated', key, before, after };
    } else {
      richUpdate = { type: 'updated', key, before, after, patch };
    }

    this.storage.notifyRichUpdate(viewPath, key, richUpdate);
  }

  private getSchema(viewPath: string): Schema<unknown> | null {
    const entityName = viewPath.split('/')[0];
    if (!this.schemas || !entityName) return null;
    return this.schemas[entityName] ?? null;
  }

  private admit(viewPath: string, key: string, data: unknown): boolean {
    if (!this.validateFrames) return true;
    const schema = this.getSchema(viewPath);
    if (!schema) return true;

    const result = schema.safeParse(data);
    if (result.success) return true;

    const error = new ValidationError(`Entity failed validation for ${viewPath}`, {
      view: viewPath,
      key,
      error: result.error,
    });
    this.logger.warn(LOG_PREFIX, 'Frame validation failed:', { view: viewPath, key });
    this.onDropped?.(error);
    return false;
  }

  private mergeContext(viewPath: string, key: string): MergeContext {
    return {
      seen: (fieldPath) => {
        const byKey = getOrCreate(this.accumulators, viewPath, () => new Map<string, AccumulatorState>());
        const byField = getOrCreate(byKey, key, (): AccumulatorState => new Map());
        return getOrCreate(byField, fieldPath, () => new Set<unknown>());
      },
    };
  }

  private enforceMaxEntries(viewPath: string): void {
    if (this.maxEntriesPerView === null) return;
    if (!this.storage.evictOldest) return;

    while (this.storage.size(viewPath) > this.maxEntriesPerView) {
      const evicted = this.storage.evictOldest(viewPath);
      if (evicted === undefined) break;
      this.accumulators.get(viewPath)?.delete(evicted);
      this.status.forget(viewPath, evicted);
    }
  }
}
