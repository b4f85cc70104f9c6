import WebSocket from 'ws';
import { abortError } from '@cascade-voice/core';

export interface SocketHandlers {
  /** A text frame arrived. Binary frames are ignored. */
  onMessage(text: string): void;
  /** The socket closed after it was open */
  onClose(code: number, reason: string): void;
  /** The socket failed after it was open */
  onError(error: Error): void;
}

export interface SocketConnection {
  send(text: string): void;
  close(code?: number, reason?: string): void;
  readonly isOpen: boolean;
}

export interface ConnectOptions {
  headers?: Record<string, string>;
  /** Handshake timeout */
  timeoutMs?: number;
  /** Aborts the handshake */
  signal?: AbortSignal;
}

/**
 * Opens a text WebSocket. Resolves once the handshake completes; rejects if
 * it fails, times out or is aborted.
 *
 * The streaming clients take a connector rather than constructing sockets
 * themselves so tests can substitute an in-process fake.
 */
export type SocketConnector = (
  url: string,
  options: ConnectOptions,
  handlers: SocketHandlers
) => Promise<SocketConnection>;

/**
 * {@link SocketConnector} backed by `ws`.
 */
export const wsConnector: SocketConnector = (url, options, handlers) =>
  new Promise<SocketConnection>((resolve, reject) => {
    const { signal } = options;
    if (signal?.aborted) {
      reject(abortError(signal));
      return;
    }

    const socket = new WebSocket(url, {
      headers: options.headers,
      handshakeTimeout: options.timeoutMs,
    });
    let open = false;

    const onAbort = () => {
      socket.terminate();
      if (signal) reject(abortError(signal));
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    socket.on('open', () => {
      open = true;
      signal?.removeEventListener('abort', onAbort);
      resolve({
        send: (text) => socket.send(text),
        close: (code = 1000, reason) => {
          if (socket.readyState === WebSocket.OPEN || socket.readyState === WebSocket.CONNECTING) {
            socket.close(code, reason);
          }
        },
        get isOpen() {
          return socket.readyState === WebSocket.OPEN;
        },
      });
    });

    socket.on('message', (data, isBinary) => {
      if (!isBinary) handlers.onMessage(rawToString(data));
    });

    socket.on('close', (code, reason) => {
      if (open) {
        handlers.onClose(code, reason.toString('utf8'));
        return;
      }
      signal?.removeEventListener('abort', onAbort);
      reject(new Error(`Connection closed during handshake (code ${code})`));
    });

    socket.on('error', (error) => {
      if (open) {
        handlers.onError(error);
        return;
      }
      signal?.removeEventListener('abort', onAbort);
      reject(error);
    });
  });

function rawToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/**
 * Parse a JSON text frame into an object, or return null for anything else.
 */
export function parseMessage(text: string): Record<string, unknown> | null {
  try {
    const value: unknown = JSON.parse(text);
    if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      return Object.fromEntries(Object.entries(value));
    }
    return null;
  } catch {
    return null;
  }
}

/** Read a string field, or undefined if it is missing or not a string */
export function stringField(message: Record<string, unknown>, key: string): string | undefined {
  const value = message[key];
  return typeof value === 'string' ? value : undefined;
}
