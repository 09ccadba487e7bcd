import type { MergeStrategy } from './merge';
import type { TransportFactory } from './transport';

export type ConnectionState =
  | 'disconnected'
  | 'connecting'
  | 'connected'
  | 'reconnecting'
  | 'error';

export type Update<T> =
  | { type: 'upsert'; key: string; data: T }
  | { type: 'patch'; key: string; data: Partial<T> }
  | { type: 'delete'; key: string };

export type RichUpdate<T> =
  | { type: 'created'; key: string; data: T }
  | { type: 'updated'; key: string; before: T; after: T; patch?: unknown }
  | { type: 'deleted'; key: string; lastKnown?: T };

export type ViewMode = 'state' | 'list';

/** Dotted field path (e.g. `metrics.bid_count`) to the strategy used when patches merge into it. */
export type FieldStrategies = Readonly<Record<string, MergeStrategy>>;

export interface ViewDef<T, TMode extends ViewMode> {
  readonly mode: TMode;
  readonly view: string;
  readonly fields?: FieldStrategies;
  /** Phantom field for type inference - not present at runtime */
  readonly _entity?: T;
}

export interface ViewGroup {
  readonly state?: ViewDef<unknown, 'state'>;
  readonly list?: ViewDef<unknown, 'list'>;
  /** Derived list views (e.g. `latest`) */
  readonly [key: string]: ViewDef<unknown, ViewMode> | undefined;
}

export interface StackDefinition {
  readonly name: string;
  readonly url?: string;
  readonly views: Readonly<Record<string, ViewGroup>>;
  /** Entity schemas keyed by entity name, checked when `validateFrames` is on. */
  readonly schemas?: Readonly<Record<string, Schema<unknown>>>;
}

export interface Subscription {
  view: string;
  key?: string;
  partition?: string;
  filters?: Record<string, string>;
  take?: number;
  skip?: number;
}

export type SchemaResult<T> =
  | { success: true; data: T }
  | { success: false; error: unknown };

/** Anything with a zod-compatible `safeParse`. */
export interface Schema<T> {
  safeParse(data: unknown): SchemaResult<T>;
}

export interface ComparisonOperators {
  gte?: number | string;
  gt?: number | string;
  lte?: number | string;
  lt?: number | string;
}

export type WhereCondition = string | number | boolean | null | ComparisonOperators;

/** Keys are dotted field paths into the merged entity. */
export type WhereClause = Readonly<Record<string, WhereCondition>>;

export interface WatchOptions {
  /** Server-side row cap */
  take?: number;
  /** Server-side offset */
  skip?: number;
  /** Server-side filters */
  filters?: Record<string, string>;
  where?: WhereClause;
  schema?: Schema<unknown>;
  /** Client-side cap on results retained after filtering */
  limit?: number;
  signal?: AbortSignal;
}

export type SchemaWatchOptions<S> = Omit<WatchOptions, 'schema'> & { schema: Schema<S> };

export type Logger = Pick<Console, 'debug' | 'warn' | 'error'>;

export const LOG_PREFIX = '[liveview]';

export const DEFAULT_MAX_ENTRIES_PER_VIEW = 10_000;

export interface ConnectionConfig {
  websocketUrl?: string;
  autoReconnect?: boolean;
  reconnectIntervals?: number[];
  maxReconnectAttempts?: number;
  pingIntervalMs?: number;
  initialSubscriptions?: Subscription[];
  transport?: TransportFactory;
  logger?: Logger;
}

export const DEFAULT_CONFIG = {
  reconnectIntervals: [1000, 2000, 4000, 8000, 16000],
  maxReconnectAttempts: 5,
  maxEntriesPerView: DEFAULT_MAX_ENTRIES_PER_VIEW,
  pingIntervalMs: 15_000,
} as const;

export class LiveViewError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'LiveViewError';
  }
}

export class ConnectionError extends LiveViewError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONNECTION_ERROR', details);
    this.name = 'ConnectionError';
  }
}

export class ValidationError extends LiveViewError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class SubscriptionError extends LiveViewError {
  constructor(
    message: string,
    public view: string,
    public key?: string
  ) {
    super(message, 'SUBSCRIPTION_ERROR', { view, key });
    this.name = 'SubscriptionError';
  }
}

export type TypedViews<TViews extends StackDefinition['views']> = {
  [K in keyof TViews]: TypedViewGroup<TViews[K]>;
};

export type TypedViewGroup<TGroup> = {
  [K in keyof TGroup]: TGroup[K] extends ViewDef<infer T, 'state'>
    ? TypedStateView<T>
    : TGroup[K] extends ViewDef<infer T, 'list'>
      ? TypedListView<T>
      : never;
};

export interface TypedStateView<T> {
  use<S>(key: string, options: SchemaWatchOptions<S>): AsyncIterable<S>;
  use(key: string, options?: WatchOptions): AsyncIterable<T>;
  watch(key: string, options?: WatchOptions): AsyncIterable<Update<T>>;
  watchRich(key: string, options?: WatchOptions): AsyncIterable<RichUpdate<T>>;
  /**
   * Resolves at once when the key is cached, even if the cached entity fails
   * `where` or `schema` (then with `null`).
   */
  get<S>(key: string, options: SchemaWatchOptions<S>): Promise<S | null>;
  get(key: string, options?: WatchOptions): Promise<T | null>;
  /**
   * `undefined` means not loaded yet. `null` means no entity matches: either the
   * server confirmed the key absent, or the cached entity fails `where` or `schema`.
   * Absence of an uncached key is remembered while a `use`, `watch` or `get` holds the key.
   */
  getSync<S>(key: string, options: SchemaWatchOptions<S>): S | null | undefined;
  getSync(key: string, options?: WatchOptions): T | null | undefined;
}

export interface TypedListView<T> {
  use<S>(options: SchemaWatchOptions<S>): AsyncIterable<S>;
  use(options?: WatchOptions): AsyncIterable<T>;
  watch(options?: WatchOptions): AsyncIterable<Update<T>>;
  watchRich(options?: WatchOptions): AsyncIterable<RichUpdate<T>>;
  get<S>(options: SchemaWatchOptions<S>): Promise<S[]>;
  get(options?: WatchOptions): Promise<T[]>;
  getSync<S>(options: SchemaWatchOptions<S>): S[] | undefined;
  getSync(options?: WatchOptions): T[] | undefined;
}

export type UnsubscribeFn = () => void;

export type ConnectionStateCallback = (state: ConnectionState, error?: string) => void;
