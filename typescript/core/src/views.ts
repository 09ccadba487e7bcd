import type {
  Update,
  RichUpdate,
  TypedStateView,
  TypedListView,
  ViewDef,
  ViewMode,
  FieldStrategies,
  StackDefinition,
  TypedViews,
  WatchOptions,
  SchemaWatchOptions,
  Subscription,
  UnsubscribeFn,
} from './types';
import { ConnectionError, SubscriptionError } from './types';
import type { ConnectionManager } from './connection';
import type { ViewQuery } from './query';
import { projectEntity, selectEntries } from './query';
import type { StreamContext, StreamRequest } from './stream';
import { createUpdateStream, createEntityStream, createRichUpdateStream } from './stream';

export interface ViewContext extends StreamContext {
  connection: Pick<ConnectionManager, 'getState' | 'onStateChange'>;
}

export function stateView<T>(view: string, fields?: FieldStrategies): ViewDef<T, 'state'> {
  return { mode: 'state', view, fields };
}

export function listView<T>(view: string, fields?: FieldStrategies): ViewDef<T, 'list'> {
  return { mode: 'list', view, fields };
}

function toSubscription(view: string, key: string | undefined, options?: WatchOptions): Subscription {
  const subscription: Subscription = { view };
  if (key !== undefined) subscription.key = key;
  if (options?.filters) subscription.filters = options.filters;
  if (options?.take !== undefined) subscription.take = options.take;
  if (options?.skip !== undefined) subscription.skip = options.skip;
  return subscription;
}

function toQuery(options?: WatchOptions): ViewQuery {
  return { where: options?.where, schema: options?.schema, limit: options?.limit };
}

function toRequest(view: string, key: string | undefined, options?: WatchOptions): StreamRequest {
  return {
    subscription: toSubscription(view, key, options),
    query: toQuery(options),
    keyFilter: key,
    signal: options?.signal,
  };
}

/**
 * Subscribes until the server has answered for `key` (or the whole view), then
 * releases the subscription again.
 */
function waitForLoad(
  ctx: ViewContext,
  subscription: Subscription,
  signal?: AbortSignal
): Promise<void> {
  const { view, key } = subscription;

  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    if (ctx.connection.getState() === 'error') {
      reject(new ConnectionError(`Connection failed before ${view} loaded`));
      return;
    }

    const stops: UnsubscribeFn[] = [];
    let settled = false;

    const settle = (error?: unknown) => {
      if (settled) return;
      settled = true;
      signal?.removeEventListener('abort', onAbort);
      for (const stop of stops) {
        stop();
      }
      if (error === undefined) {
        resolve();
      } else {
        reject(error);
      }
    };

    const onAbort = () => settle(signal?.reason);
    signal?.addEventListener('abort', onAbort);

    stops.push(
      ctx.status.onLoaded((viewPath) => {
        if (viewPath !== view) return;
        const loaded =
          key === undefined
            ? ctx.status.isLoaded(view)
            : ctx.store.get<unknown>(view, key) !== null || ctx.status.isAbsent(view, key);
        if (loaded) {
          settle();
        }
      })
    );
    if (key !== undefined) {
      stops.push(ctx.status.track(view, key));
    }
    stops.push(
      ctx.status.onError((error: SubscriptionError) => {
        if (error.view !== view) return;
        if (key !== undefined && error.key !== undefined && error.key !== key) return;
        settle(error);
      })
    );
    stops.push(
      ctx.connection.onStateChange((state) => {
        if (state === 'error' || state === 'disconnected') {
          settle(new ConnectionError(`Connection ${state === 'error' ? 'failed' : 'closed'} before ${view} loaded`));
        }
      })
    );
    stops.push(ctx.subscriptionRegistry.subscribe(subscription));
  });
}

export function createTypedStateView<T>(viewDef: ViewDef<T, 'state'>, ctx: ViewContext): TypedStateView<T> {
  const view = viewDef.view;

  /** `null` covers both confirmed absence and a cached entity the query rejects. */
  function readState(key: string, query: ViewQuery): unknown {
    const entity = ctx.store.get<unknown>(view, key);
    if (entity !== null) {
      const projection = projectEntity(entity, query);
      return projection.matched ? projection.value : null;
    }
    return ctx.status.isAbsent(view, key) ? null : undefined;
  }

  function use<S>(key: string, options: SchemaWatchOptions<S>): AsyncIterable<S>;
  function use(key: string, options?: WatchOptions): AsyncIterable<T>;
  function use(key: string, options?: WatchOptions): AsyncIterable<unknown> {
    return createEntityStream(ctx, toRequest(view, key, options));
  }

  function get<S>(key: string, options: SchemaWatchOptions<S>): Promise<S | null>;
  function get(key: string, options?: WatchOptions): Promise<T | null>;
  async function get(key: string, options?: WatchOptions): Promise<unknown> {
    const query = toQuery(options);
    const cached = readState(key, query);
    if (cached !== undefined) {
      return cached;
    }
    await waitForLoad(ctx, toSubscription(view, key, options), options?.signal);
    return readState(key, query) ?? null;
  }

  function getSync<S>(key: string, options: SchemaWatchOptions<S>): S | null | undefined;
  function getSync(key: string, options?: WatchOptions): T | null | undefined;
  function getSync(key: string, options?: WatchOptions): unknown {
    return readState(key, toQuery(options));
  }

  return {
    use,
    get,
    getSync,

    watch(key: string, options?: WatchOptions): AsyncIterable<Update<T>> {
      return createUpdateStream<T>(ctx, toRequest(view, key, options));
    },

    watchRich(key: string, options?: WatchOptions): AsyncIterable<RichUpdate<T>> {
      return createRichUpdateStream<T>(ctx, toRequest(view, key, options));
    },
  };
}

export function createTypedListView<T>(viewDef: ViewDef<T, 'list'>, ctx: ViewContext): TypedListView<T> {
  const view = viewDef.view;

  function readList(query: ViewQuery): unknown[] | undefined {
    if (!ctx.status.isLoaded(view)) {
      return undefined;
    }
    return selectEntries(ctx.store.entries<unknown>(view), query).map(([, value]) => value);
  }

  function use<S>(options: SchemaWatchOptions<S>): AsyncIterable<S>;
  function use(options?: WatchOptions): AsyncIterable<T>;
  function use(options?: WatchOptions): AsyncIterable<unknown> {
    return createEntityStream(ctx, toRequest(view, undefined, options));
  }

  function get<S>(options: SchemaWatchOptions<S>): Promise<S[]>;
  function get(options?: WatchOptions): Promise<T[]>;
  async function get(options?: WatchOptions): Promise<unknown[]> {
    const query = toQuery(options);
    const cached = readList(query);
    if (cached !== undefined) {
      return cached;
    }
    await waitForLoad(ctx, toSubscription(view, undefined, options), options?.signal);
    return readList(query) ?? [];
  }

  function getSync<S>(options: SchemaWatchOptions<S>): S[] | undefined;
  function getSync(options?: WatchOptions): T[] | undefined;
  function getSync(options?: WatchOptions): unknown[] | undefined {
    return readList(toQuery(options));
  }

  return {
    use,
    get,
    getSync,

    watch(options?: WatchOptions): AsyncIterable<Update<T>> {
      return createUpdateStream<T>(ctx, toRequest(view, undefined, options));
    },

    watchRich(options?: WatchOptions): AsyncIterable<RichUpdate<T>> {
      return createRichUpdateStream<T>(ctx, toRequest(view, undefined, options));
    },
  };
}

function isStateView(viewDef: ViewDef<unknown, ViewMode>): viewDef is ViewDef<unknown, 'state'> {
  return viewDef.mode === 'state';
}

function isListView(viewDef: ViewDef<unknown, ViewMode>): viewDef is ViewDef<unknown, 'list'> {
  return viewDef.mode === 'list';
}

export function createTypedViews<TStack extends StackDefinition>(
  stack: TStack,
  ctx: ViewContext
): TypedViews<TStack['views']> {
  const views: Record<string, unknown> = {};

  for (const [viewName, viewGroup] of Object.entries(stack.views)) {
    const typedGroup: Record<string, TypedStateView<unknown> | TypedListView<unknown>> = {};

    for (const [name, viewDef] of Object.entries(viewGroup)) {
      if (!viewDef) continue;
      if (isStateView(viewDef)) {
        typedGroup[name] = createTypedStateView(viewDef, ctx);
      } else if (isListView(viewDef)) {
        typedGroup[name] = createTypedListView(viewDef, ctx);
      }
    }

    views[viewName] = typedGroup;
  }

  return views as TypedViews<TStack['views']>;
}

/** Field strategies of every view in the stack, keyed by view path. */
export function collectStrategies(stack: StackDefinition): Record<string, FieldStrategies> {
  const strategies: Record<string, FieldStrategies> = {};
  for (const viewGroup of Object.values(stack.views)) {
    for (const viewDef of Object.values(viewGroup)) {
      if (viewDef?.fields) {
        strategies[viewDef.view] = viewDef.fields;
      }
    }
  }
  return strategies;
}
