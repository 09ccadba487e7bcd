import type { Frame } from './frame';
import { frameView, parseFrame } from './frame';
import { subscriptionKey } from './subscription';
import type { Transport, TransportFactory, TransportHandlers } from './transport';
import { createWebSocketTransport } from './transport';
import type {
  ConnectionState,
  Subscription,
  ConnectionConfig,
  ConnectionStateCallback,
  Logger,
  UnsubscribeFn,
} from './types';
import {
  ConnectionError,
  DEFAULT_CONFIG,
  LiveViewError,
  LOG_PREFIX,
  ValidationError,
} from './types';

export type FrameHandler = (frame: Frame) => void;
export type DroppedFrameHandler = (error: ValidationError) => void;

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Policy violation, or an application-defined rejection in the 4xxx range */
function isFatalClose(code: number): boolean {
  return code === 1008 || (code >= 4000 && code < 5000);
}

export class ConnectionManager {
  private transport: Transport | null = null;
  /** Identity of the transport whose callbacks are still honoured */
  private attempt: object | null = null;
  private websocketUrl: string;
  private createTransport: TransportFactory;
  private logger: Logger;
  private autoReconnect: boolean;
  private reconnectIntervals: readonly number[];
  private maxReconnectAttempts: number;
  private pingIntervalMs: number;
  private reconnectAttempts = 0;
  private reconnectTimeout: ReturnType<typeof setTimeout> | null = null;
  private pingInterval: ReturnType<typeof setInterval> | null = null;
  private currentState: ConnectionState = 'disconnected';
  private pendingConnect: Deferred<void> | null = null;
  private subscriptionQueue: Subscription[] = [];
  private activeSubscriptions: Map<string, Subscription> = new Map();

  private frameHandlers: Set<FrameHandler> = new Set();
  private droppedFrameHandlers: Set<DroppedFrameHandler> = new Set();
  private stateHandlers: Set<ConnectionStateCallback> = new Set();

  constructor(config: ConnectionConfig) {
    if (!config.websocketUrl) {
      throw new LiveViewError('websocketUrl is required', 'INVALID_CONFIG');
    }
    this.websocketUrl = config.websocketUrl;
    this.createTransport = config.transport ?? createWebSocketTransport;
    this.logger = config.logger ?? console;
    this.autoReconnect = config.autoReconnect ?? true;
    this.reconnectIntervals = config.reconnectIntervals ?? DEFAULT_CONFIG.reconnectIntervals;
    this.maxReconnectAttempts = config.maxReconnectAttempts ?? DEFAULT_CONFIG.maxReconnectAttempts;
    this.pingIntervalMs = config.pingIntervalMs ?? DEFAULT_CONFIG.pingIntervalMs;

    if (config.initialSubscriptions) {
      this.subscriptionQueue.push(...config.initialSubscriptions);
    }
  }

  getState(): ConnectionState {
    return this.currentState;
  }

  onFrame(handler: FrameHandler): UnsubscribeFn {
    this.frameHandlers.add(handler);
    return () => {
      this.frameHandlers.delete(handler);
    };
  }

  /** Called for every inbound message that could not be decoded into a frame. */
  onDroppedFrame(handler: DroppedFrameHandler): UnsubscribeFn {
    this.droppedFrameHandlers.add(handler);
    return () => {
      this.droppedFrameHandlers.delete(handler);
    };
  }

  onStateChange(handler: ConnectionStateCallback): UnsubscribeFn {
    this.stateHandlers.add(handler);
    return () => {
      this.stateHandlers.delete(handler);
    };
  }

  connect(): Promise<void> {
    if (this.isConnected()) {
      return Promise.resolve();
    }
    if (this.pendingConnect) {
      return this.pendingConnect.promise;
    }

    this.clearReconnectTimeout();
    this.updateState('connecting');
    return this.openTransport();
  }

  /** Starts over with a fresh retry budget; the way out of the `error` state. */
  reconnect(): Promise<void> {
    this.reconnectAttempts = 0;
    return this.connect();
  }

  disconnect(): void {
    this.clearReconnectTimeout();
    this.stopPingInterval();

    const transport = this.transport;
    const pending = this.pendingConnect;
    this.transport = null;
    this.attempt = null;
    this.pendingConnect = null;
    this.reconnectAttempts = 0;

    this.updateState('disconnected');
    transport?.close(1000, 'Client disconnect');
    pending?.reject(new ConnectionError('Disconnected before the connection was established'));
  }

  subscribe(subscription: Subscription): void {
    if (this.isConnected()) {
      this.send({ type: 'subscribe', ...subscription });
      this.activeSubscriptions.set(subscriptionKey(subscription), subscription);
    } else {
      this.subscriptionQueue.push(subscription);
    }
  }

  unsubscribe(subscription: Subscription): void {
    const subKey = subscriptionKey(subscription);
    this.subscriptionQueue = this.subscriptionQueue.filter((queued) => subscriptionKey(queued) !== subKey);

    if (this.activeSubscriptions.delete(subKey) && this.isConnected()) {
      this.send({ type: 'unsubscribe', ...subscription });
    }
  }

  isConnected(): boolean {
    return this.currentState === 'connected' && this.transport !== null;
  }

  private openTransport(): Promise<void> {
    const deferred = createDeferred<void>();
    const attempt = {};
    let opened = false;
    let lastError: Error | undefined;

    this.pendingConnect = deferred;
    this.attempt = attempt;

    const handlers: TransportHandlers = {
      onOpen: () => {
        if (this.attempt !== attempt) return;
        opened = true;
        this.reconnectAttempts = 0;
        this.pendingConnect = null;
        this.updateState('connected');
        this.startPingInterval();
        this.resubscribeActive();
        this.flushSubscriptionQueue();
        deferred.resolve();
      },
      onMessage: (data) => {
        if (this.attempt !== attempt) return;
        this.handleMessage(data);
      },
      onError: (error) => {
        if (this.attempt !== attempt) return;
        lastError = error;
        this.logger.warn(LOG_PREFIX, 'Transport error:', error.message);
      },
      onClose: (code, reason) => {
        if (this.attempt !== attempt) return;
        this.attempt = null;
        this.transport = null;
        this.stopPingInterval();

        if (opened) {
          this.handleTransportLoss(code, reason);
        } else {
          this.handleFailedAttempt(
            deferred,
            new ConnectionError(`Failed to connect to ${this.websocketUrl}`, { code, reason, cause: lastError })
          );
        }
      },
    };

    try {
      this.transport = this.createTransport(this.websocketUrl, handlers);
    } catch (error) {
      this.attempt = null;
      this.handleFailedAttempt(deferred, new ConnectionError('Failed to create WebSocket connection', error));
    }

    return deferred.promise;
  }

  private handleFailedAttempt(deferred: Deferred<void>, error: ConnectionError): void {
    this.pendingConnect = null;

    if (this.currentState === 'reconnecting') {
      deferred.reject(error);
      this.scheduleReconnect();
      return;
    }

    this.updateState('error', error.message);
    deferred.reject(error);
  }

  private handleTransportLoss(code: number, reason: string): void {
    if (this.currentState === 'disconnected') {
      return;
    }

    if (isFatalClose(code)) {
      this.updateState('error', `Connection rejected by server (${code}${reason ? `: ${reason}` : ''})`);
      return;
    }

    if (!this.autoReconnect) {
      this.updateState('error', `Connection lost (${code})`);
      return;
    }

    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.reconnectAttempts >= this.maxReconnectAttempts) {
      this.updateState(
        'error',
        `Max reconnection attempts (${this.reconnectAttempts}) reached`
      );
      return;
    }

    this.updateState('reconnecting');

    const attemptIndex = Math.min(this.reconnectAttempts, this.reconnectIntervals.length - 1);
    const delay = this.reconnectIntervals[attemptIndex] ?? 1000;

    this.reconnectAttempts++;

    this.reconnectTimeout = setTimeout(() => {
      this.reconnectTimeout = null;
      this.openTransport().catch((error: unknown) => {
        this.logger.debug(LOG_PREFIX, 'Reconnect attempt failed:', error instanceof Error ? error.message : error);
      });
    }, delay);
  }

  private handleMessage(data: string | Uint8Array): void {
    let frame: Frame;
    try {
      frame = parseFrame(data);
    } catch (error) {
      const dropped = error instanceof ValidationError
        ? error
        : new ValidationError('Failed to parse frame', error);
      this.logger.warn(LOG_PREFIX, 'Dropping frame:', dropped.message);
      for (const handler of this.droppedFrameHandlers) {
        handler(dropped);
      }
      return;
    }

    this.logger.debug(LOG_PREFIX, 'Frame received:', { op: frame.op, view: frameView(frame) });
    this.notifyFrameHandlers(frame);
  }

  private send(message: object): void {
    if (!this.transport) return;
    try {
      this.transport.send(JSON.stringify(message));
    } catch (error) {
      this.logger.error(LOG_PREFIX, 'Failed to send message:', error);
    }
  }

  private flushSubscriptionQueue(): void {
    const queued = this.subscriptionQueue;
    this.subscriptionQueue = [];
    for (const subscription of queued) {
      this.subscribe(subscription);
    }
  }

  private resubscribeActive(): void {
    for (const subscription of this.activeSubscriptions.values()) {
      this.send({ type: 'subscribe', ...subscription });
    }
  }

  private updateState(state: ConnectionState, error?: string): void {
    if (state === this.currentState) return;
    this.currentState = state;
    for (const handler of this.stateHandlers) {
      try {
        handler(state, error);
      } catch (handlerError) {
        this.logger.error(LOG_PREFIX, 'Connection state handler threw:', handlerError);
      }
    }
  }

  private notifyFrameHandlers(frame: Frame): void {
    for (const handler of this.frameHandlers) {
      try {
        handler(frame);
      } catch (error) {
        this.logger.error(LOG_PREFIX, 'Frame handler threw:', error);
      }
    }
  }

  private clearReconnectTimeout(): void {
    if (this.reconnectTimeout) {
      clearTimeout(this.reconnectTimeout);
      this.reconnectTimeout = null;
    }
  }

  private startPingInterval(): void {
    this.stopPingInterval();
    this.pingInterval = setInterval(() => {
      this.send({ type: 'ping' });
    }, this.pingIntervalMs);
  }

  private stopPingInterval(): void {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
  }
}
