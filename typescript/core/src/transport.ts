import WebSocket from 'ws';

export interface Transport {
  send(message: string): void;
  close(code?: number, reason?: string): void;
}

export interface TransportHandlers {
  onOpen(): void;
  onMessage(data: string | Uint8Array): void;
  onClose(code: number, reason: string): void;
  onError(error: Error): void;
}

/**
 * Opens one transport session. Handlers may only be called after the factory returns.
 */
export type TransportFactory = (url: string, handlers: TransportHandlers) => Transport;

function toUint8Array(data: WebSocket.RawData): Uint8Array {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return data;
}

export const createWebSocketTransport: TransportFactory = (url, handlers) => {
  const ws = new WebSocket(url);

  ws.on('open', () => handlers.onOpen());
  ws.on('message', (data, isBinary) => {
    const bytes = toUint8Array(data);
    handlers.onMessage(isBinary ? bytes : Buffer.from(bytes).toString('utf8'));
  });
  ws.on('close', (code, reason) => handlers.onClose(code, reason.toString('utf8')));
  ws.on('error', (error) => handlers.onError(error));

  return {
    send: (message) => ws.send(message),
    close: (code, reason) => ws.close(code, reason),
  };
};
