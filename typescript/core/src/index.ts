export { LiveViewClient } from './client';
export type { ConnectOptions, ClientStats } from './client';

export { ConnectionManager } from './connection';
export type { FrameHandler, DroppedFrameHandler } from './connection';
export { SubscriptionRegistry, subscriptionKey } from './subscription';
export { ViewStatus } from './view-status';

export { FrameProcessor } from './frame-processor';
export type { FrameProcessorConfig } from './frame-processor';

export type { StorageAdapter, ReadonlyStore, UpdateCallback, RichUpdateCallback, ViewSortConfig } from './storage/adapter';
export { MemoryAdapter } from './storage/memory-adapter';
export { SortedStorageDecorator } from './storage/sorted-decorator';

export { createWebSocketTransport } from './transport';
export type { Transport, TransportFactory, TransportHandlers } from './transport';

export { parseFrame, isValidFrame, isSnapshotFrame, isSubscribedFrame, isErrorFrame, isEntityFrame, FrameSchema } from './frame';
export type { EntityFrame, SnapshotFrame, SnapshotEntity, SubscribedFrame, ErrorFrame, SortConfig, Frame } from './frame';

export { MERGE_STRATEGIES, mergePatch, deepMerge } from './merge';
export type { MergeStrategy, MergeFn, MergeContext } from './merge';

export { matchesWhere, projectEntity, selectEntries } from './query';
export type { ViewQuery } from './query';

export { createUpdateStream, createEntityStream, createRichUpdateStream } from './stream';
export type { StreamContext, StreamRequest } from './stream';
export {
  createTypedStateView,
  createTypedListView,
  createTypedViews,
  stateView,
  listView,
} from './views';
export type { ViewContext } from './views';

export type {
  ConnectionState,
  Update,
  RichUpdate,
  ViewDef,
  ViewMode,
  FieldStrategies,
  StackDefinition,
  ViewGroup,
  Subscription,
  Schema,
  SchemaResult,
  ComparisonOperators,
  WhereCondition,
  WhereClause,
  WatchOptions,
  SchemaWatchOptions,
  ConnectionConfig,
  Logger,
  TypedViews,
  TypedViewGroup,
  TypedStateView,
  TypedListView,
  UnsubscribeFn,
  ConnectionStateCallback,
} from './types';

export {
  DEFAULT_CONFIG,
  DEFAULT_MAX_ENTRIES_PER_VIEW,
  LiveViewError,
  ConnectionError,
  ValidationError,
  SubscriptionError,
} from './types';
