/**
 * @fileoverview Registry transport over a WebSocket.
 *
 * Frames are JSON text validated against the registry protocol schemas.
 * Malformed frames are logged and dropped.
 */

import {
  type ClientMessage,
  parseServerMessage,
  type ServerMessage,
  toNotification,
} from '@global-env/protocol';
import WebSocket from 'ws';
import { TransportError } from '../errors.js';
import { type Logger, logger as rootLogger } from '../utils/logger.js';
import { BaseRegistryTransport, type BindRequest } from './RegistryTransport.js';

/**
 * WebSocket-like interface for connection abstraction.
 * `ws.WebSocket` instances satisfy it; tests pass a mock.
 */
export interface RegistrySocket {
  send(data: string): void;
  close(): void;
  on(event: 'message', listener: (data: unknown) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

interface PendingSync {
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * Decode a frame payload as delivered by `ws` (string, Buffer, ArrayBuffer
 * or fragmented Buffer list).
 */
export function decodeFrame(data: unknown): string | null {
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  if (isBufferList(data)) return Buffer.concat(data).toString('utf8');
  return null;
}

function isBufferList(data: unknown): data is Buffer[] {
  return Array.isArray(data) && data.every((part: unknown) => Buffer.isBuffer(part));
}

export class WebSocketRegistryTransport extends BaseRegistryTransport {
  private readonly syncs = new Map<number, PendingSync>();
  private nextSerial = 0;
  private readonly log: Logger;

  constructor(
    private readonly socket: RegistrySocket,
    log: Logger = rootLogger
  ) {
    super();
    this.log = log.child('ws-transport');

    socket.on('message', (data) => {
      this.handleFrame(data);
    });

    socket.on('close', () => {
      this.markClosed();
      this.failSyncs(new TransportError('connection closed'));
    });

    socket.on('error', (error) => {
      this.log.error('Socket error', { error: error.message });
      this.failSyncs(new TransportError(error.message));
    });
  }

  protected roundtrip(): Promise<void> {
    const serial = this.nextSerial++;
    return new Promise<void>((resolve, reject) => {
      this.send({ type: 'sync', serial });
      this.syncs.set(serial, { resolve, reject });
    });
  }

  protected sendBind(request: BindRequest): void {
    this.send({ type: 'bind', ...request });
  }

  protected onClose(): void {
    this.failSyncs(new TransportError('transport closed'));
    this.socket.close();
  }

  private send(message: ClientMessage): void {
    this.socket.send(JSON.stringify(message));
  }

  private handleFrame(data: unknown): void {
    const text = decodeFrame(data);
    let message: ServerMessage | null = null;
    if (text !== null) {
      try {
        message = parseServerMessage(JSON.parse(text));
      } catch {
        message = null;
      }
    }

    if (!message) {
      this.log.warn('Dropping malformed server frame');
      return;
    }

    switch (message.type) {
      case 'sync_done':
        this.completeSync(message.serial);
        break;

      case 'error':
        this.log.error('Server reported an error', { message: message.message });
        this.failSyncs(new TransportError(message.message));
        break;

      default: {
        const notification = toNotification(message);
        if (notification) {
          this.enqueue(notification);
        }
      }
    }
  }

  private completeSync(serial: number): void {
    const sync = this.syncs.get(serial);
    if (!sync) {
      this.log.warn('Acknowledgement for unknown sync', { serial });
      return;
    }
    this.syncs.delete(serial);
    sync.resolve();
  }

  private failSyncs(error: Error): void {
    const syncs = [...this.syncs.values()];
    this.syncs.clear();
    for (const sync of syncs) {
      sync.reject(error);
    }
  }
}

/**
 * Open a WebSocket to a registry server.
 * Resolves once the socket is open.
 */
export function connectWebSocketTransport(
  url: string,
  log: Logger = rootLogger
): Promise<WebSocketRegistryTransport> {
  log.info('Connecting to registry', { url });

  return new Promise((resolve, reject) => {
    const ws = new WebSocket(url);

    const onError = (error: Error) => {
      reject(new TransportError(`cannot connect to ${url}: ${error.message}`));
    };

    ws.once('error', onError);
    ws.once('open', () => {
      ws.off('error', onError);
      log.info('Connected to registry', { url });
      resolve(new WebSocketRegistryTransport(ws, log));
    });
  });
}
