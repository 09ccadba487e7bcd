import type { Update, RichUpdate, Subscription, UnsubscribeFn, Logger, SubscriptionError } from './types';
import { LOG_PREFIX } from './types';
import type { ReadonlyStore } from './storage/adapter';
import type { SubscriptionRegistry } from './subscription';
import type { ViewStatus } from './view-status';
import type { ViewQuery } from './query';
import { isWithinLimit, projectEntity } from './query';

const MAX_QUEUE_SIZE = 1000;

export interface StreamContext {
  store: ReadonlyStore;
  subscriptionRegistry: SubscriptionRegistry;
  status: ViewStatus;
  logger: Logger;
}

export interface StreamRequest {
  subscription: Subscription;
  query: ViewQuery;
  /** Only changes to this key are delivered (state views) */
  keyFilter?: string;
  signal?: AbortSignal;
}

interface StreamSink<TItem> {
  push(item: TItem): void;
  fail(error: SubscriptionError): void;
}

type QueueItem<TItem> = {
  item: TItem;
};

/**
 * An unbounded, cancellable sequence fed by store callbacks. Each iteration starts
 * a fresh, independent sequence; ending iteration releases the server subscription.
 * Clearing the registry (on disconnect) ends the sequence.
 */
function createLiveStream<TItem>(
  ctx: StreamContext,
  request: StreamRequest,
  start: (sink: StreamSink<TItem>) => UnsubscribeFn
): AsyncIterable<TItem> {
  return {
    [Symbol.asyncIterator](): AsyncIterator<TItem> {
      const { signal } = request;
      let queue: QueueItem<TItem>[] = [];
      let waiting: {
        resolve: (value: IteratorResult<TItem>) => void;
        reject: (error: unknown) => void;
      } | null = null;
      let failure: SubscriptionError | null = null;
      let done = false;
      const stops: UnsubscribeFn[] = [];

      const finished = (): IteratorResult<TItem> => ({ value: undefined, done: true });

      const cleanup = () => {
        if (done) return;
        done = true;
        queue = [];
        for (const stop of stops) {
          stop();
        }
        signal?.removeEventListener('abort', onAbort);
        if (waiting) {
          const pending = waiting;
          waiting = null;
          pending.resolve(finished());
        }
      };

      const onAbort = () => cleanup();

      const sink: StreamSink<TItem> = {
        push(item) {
          if (done) return;
          if (waiting) {
            const pending = waiting;
            waiting = null;
            pending.resolve({ value: item, done: false });
            return;
          }
          if (queue.length >= MAX_QUEUE_SIZE) {
            queue.shift();
            ctx.logger.warn(LOG_PREFIX, `Stream queue for ${request.subscription.view} is full; dropping oldest item`);
          }
          queue.push({ item });
        },
        fail(error) {
          if (done) return;
          if (waiting) {
            const pending = waiting;
            waiting = null;
            cleanup();
            pending.reject(error);
            return;
          }
          const pendingItems = queue;
          cleanup();
          queue = pendingItems;
          failure = error;
        },
      };

      if (signal?.aborted) {
        done = true;
      } else {
        signal?.addEventListener('abort', onAbort);
        stops.push(
          ctx.status.onError((error) => {
            if (error.view !== request.subscription.view) return;
            if (error.key !== undefined && request.keyFilter !== undefined && error.key !== request.keyFilter) return;
            sink.fail(error);
          })
        );
        if (request.keyFilter !== undefined) {
          stops.push(ctx.status.track(request.subscription.view, request.keyFilter));
        }
        stops.push(ctx.subscriptionRegistry.onClear(cleanup));
        stops.push(start(sink));
        stops.push(ctx.subscriptionRegistry.subscribe(request.subscription));
      }

      return {
        async next(): Promise<IteratorResult<TItem>> {
          if (signal?.aborted) {
            cleanup();
            queue = [];
            failure = null;
          }

          const queued = queue.shift();
          if (queued) {
            return { value: queued.item, done: false };
          }

          if (failure) {
            const error = failure;
            failure = null;
            throw error;
          }

          if (done) {
            return finished();
          }

          return new Promise((resolve, reject) => {
            waiting = { resolve, reject };
          });
        },

        async return(): Promise<IteratorResult<TItem>> {
          cleanup();
          return finished();
        },

        async throw(error?: unknown): Promise<IteratorResult<TItem>> {
          cleanup();
          throw error;
        },
      };
    },
  };
}

function matchesKey(request: StreamRequest, viewPath: string, key: string): boolean {
  if (viewPath !== request.subscription.view) return false;
  return request.keyFilter === undefined || key === request.keyFilter;
}

function withinLimit(ctx: StreamContext, request: StreamRequest, key: string): boolean {
  if (request.keyFilter !== undefined) return true;
  return isWithinLimit(ctx.store.entries(request.subscription.view), key, request.query);
}

/** Whether a change whose merged value is `value` passes the stream's query. */
function admits(ctx: StreamContext, request: StreamRequest, key: string, value: unknown): boolean {
  return projectEntity(value, request.query).matched && withinLimit(ctx, request, key);
}

/**
 * Merged entities, one per change. The current cache contents that match the query
 * are replayed first.
 */
export function createEntityStream(ctx: StreamContext, request: StreamRequest): AsyncIterable<unknown> {
  const view = request.subscription.view;

  return createLiveStream<unknown>(ctx, request, (sink) => {
    const emit = (key: string, entity: unknown) => {
      const projection = projectEntity(entity, request.query);
      if (projection.matched && withinLimit(ctx, request, key)) {
        sink.push(projection.value);
      }
    };

    const unsubscribe = ctx.store.onUpdate((viewPath, key, update) => {
      if (!matchesKey(request, viewPath, key) || update.type === 'delete') return;
      const entity = ctx.store.get<unknown>(view, key);
      if (entity !== null) {
        emit(key, entity);
      }
    });

    if (request.keyFilter !== undefined) {
      const entity = ctx.store.get<unknown>(view, request.keyFilter);
      if (entity !== null) {
        emit(request.keyFilter, entity);
      }
    } else {
      for (const [key, entity] of ctx.store.entries<unknown>(view)) {
        emit(key, entity);
      }
    }

    return unsubscribe;
  });
}

export function createUpdateStream<T>(ctx: StreamContext, request: StreamRequest): AsyncIterable<Update<T>> {
  const view = request.subscription.view;

  return createLiveStream<Update<T>>(ctx, request, (sink) =>
    ctx.store.onUpdate((viewPath, key, update) => {
      if (!matchesKey(request, viewPath, key)) return;
      if (update.type !== 'delete' && !admits(ctx, request, key, ctx.store.get<unknown>(view, key))) return;
      sink.push(update as Update<T>);
    })
  );
}

export function createRichUpdateStream<T>(ctx: StreamContext, request: StreamRequest): AsyncIterable<RichUpdate<T>> {
  return createLiveStream<RichUpdate<T>>(ctx, request, (sink) =>
    ctx.store.onRichUpdate((viewPath, key, update) => {
      if (!matchesKey(request, viewPath, key)) return;
      if (update.type === 'deleted') {
        if (update.lastKnown !== undefined && !projectEntity(update.lastKnown, request.query).matched) return;
      } else {
        const after = update.type === 'created' ? update.data : update.after;
        if (!admits(ctx, request, key, after)) return;
      }
      sink.push(update as RichUpdate<T>);
    })
  );
}
