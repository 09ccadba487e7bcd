import type {
  ConnectionState,
  StackDefinition,
  TypedViews,
  ConnectionStateCallback,
  UnsubscribeFn,
  Logger,
} from './types';
import { LiveViewError, LOG_PREFIX } from './types';
import { ConnectionManager } from './connection';
import { FrameProcessor } from './frame-processor';
import { MemoryAdapter } from './storage/memory-adapter';
import type { ReadonlyStore, StorageAdapter } from './storage/adapter';
import { SortedStorageDecorator } from './storage/sorted-decorator';
import { SubscriptionRegistry } from './subscription';
import type { TransportFactory } from './transport';
import { ViewStatus } from './view-status';
import { collectStrategies, createTypedViews } from './views';
import type { Frame } from './frame';

export interface ConnectOptions {
  url?: string;
  storage?: StorageAdapter;
  /** `null` disables the bound */
  maxEntriesPerView?: number | null;
  validateFrames?: boolean;
  /** Open the connection before `connect()` resolves. Default: true */
  autoConnect?: boolean;
  autoReconnect?: boolean;
  reconnectIntervals?: number[];
  maxReconnectAttempts?: number;
  flushIntervalMs?: number;
  transport?: TransportFactory;
  logger?: Logger;
}

export interface ClientStats {
  /** Inbound frames discarded as malformed or failing entity validation */
  droppedFrames: number;
}

export class LiveViewClient<TStack extends StackDefinition> {
  private readonly connection: ConnectionManager;
  private readonly storage: StorageAdapter;
  private readonly processor: FrameProcessor;
  private readonly subscriptionRegistry: SubscriptionRegistry;
  private readonly status: ViewStatus;
  private readonly logger: Logger;
  private readonly _views: TypedViews<TStack['views']>;
  private readonly stack: TStack;
  private readonly _stats: ClientStats = { droppedFrames: 0 };
  private hasConnected = false;

  private constructor(stack: TStack, url: string, options: ConnectOptions) {
    this.stack = stack;
    this.logger = options.logger ?? console;
    this.status = new ViewStatus();
    this.storage = new SortedStorageDecorator(options.storage ?? new MemoryAdapter());
    this.processor = new FrameProcessor(this.storage, {
      maxEntriesPerView: options.maxEntriesPerView,
      flushIntervalMs: options.flushIntervalMs,
      validateFrames: options.validateFrames,
      schemas: stack.schemas,
      strategies: collectStrategies(stack),
      status: this.status,
      logger: this.logger,
      onDropped: () => {
        this._stats.droppedFrames++;
      },
    });
    this.connection = new ConnectionManager({
      websocketUrl: url,
      autoReconnect: options.autoReconnect,
      reconnectIntervals: options.reconnectIntervals,
      maxReconnectAttempts: options.maxReconnectAttempts,
      transport: options.transport,
      logger: this.logger,
    });
    this.subscriptionRegistry = new SubscriptionRegistry(this.connection);

    this.connection.onFrame((frame: Frame) => {
      this.processor.handleFrame(frame);
    });
    this.connection.onDroppedFrame(() => {
      this._stats.droppedFrames++;
    });
    this.connection.onStateChange((state) => {
      if (state === 'connected') {
        this.handleConnected();
      }
    });

    this._views = createTypedViews(this.stack, {
      store: this.storage,
      subscriptionRegistry: this.subscriptionRegistry,
      status: this.status,
      connection: this.connection,
      logger: this.logger,
    });
  }

  static async connect<T extends StackDefinition>(
    stack: T,
    options: ConnectOptions = {}
  ): Promise<LiveViewClient<T>> {
    const url = options.url ?? stack.url;

    if (!url) {
      throw new LiveViewError('URL is required (provide url option or define url in stack)', 'INVALID_CONFIG');
    }

    const client = new LiveViewClient(stack, url, options);

    if (options.autoConnect !== false) {
      await client.connection.connect();
    }

    return client;
  }

  get views(): TypedViews<TStack['views']> {
    return this._views;
  }

  get connectionState(): ConnectionState {
    return this.connection.getState();
  }

  get stackName(): string {
    return this.stack.name;
  }

  get store(): ReadonlyStore {
    return this.storage;
  }

  get stats(): Readonly<ClientStats> {
    return { ...this._stats };
  }

  onConnectionStateChange(callback: ConnectionStateCallback): UnsubscribeFn {
    return this.connection.onStateChange(callback);
  }

  onFrame(callback: (frame: Frame) => void): UnsubscribeFn {
    return this.connection.onFrame(callback);
  }

  async connect(): Promise<void> {
    await this.connection.connect();
  }

  /** Leaves the `error` state with a fresh retry budget. */
  async reconnect(): Promise<void> {
    await this.connection.reconnect();
  }

  disconnect(): void {
    this.processor.dispose();
    this.subscriptionRegistry.clear();
    this.connection.disconnect();
  }

  isConnected(): boolean {
    return this.connection.isConnected();
  }

  /** Applies buffered frames now instead of waiting for `flushIntervalMs`. */
  flush(): void {
    this.processor.flush();
  }

  private handleConnected(): void {
    if (!this.hasConnected) {
      this.hasConnected = true;
      return;
    }

    this.processor.flush();
    const views = new Set<string>();
    for (const subscription of this.subscriptionRegistry.getActiveSubscriptions()) {
      if (subscription.key === undefined) {
        views.add(subscription.view);
      }
    }
    this.logger.debug(LOG_PREFIX, 'Reconnected; resyncing views:', Array.from(views));
    this.processor.beginResync(views);
  }
}
