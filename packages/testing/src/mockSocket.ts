/**
 * @fileoverview Mock WebSocket for testing the WebSocket registry transport.
 */

import { EventEmitter } from 'node:events';
import type { RegistrySocket } from '@global-env/client';

export interface MockSocketOptions {
  /**
   * Called after each frame the client sends, with the decoded frame.
   * Use it to script server replies.
   */
  onSend?: (message: unknown, socket: MockSocket) => void;
}

/**
 * Mock socket that records sent frames and lets the test play the server.
 *
 * The mock socket:
 * - Starts open
 * - Stores all sent frames in `sentMessages`
 * - Emits 'close' once when either side closes it
 * - Ignores sends after close
 */
export class MockSocket extends EventEmitter implements RegistrySocket {
  private readonly sent: string[] = [];
  private closed = false;

  constructor(private readonly options: MockSocketOptions = {}) {
    super();
  }

  send(data: string): void {
    if (this.closed) return;
    this.sent.push(data);
    this.options.onSend?.(JSON.parse(data) as unknown, this);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.emit('close');
  }

  /** Frames that have been sent through this socket */
  get sentMessages(): string[] {
    return this.sent;
  }

  /** Whether the socket has been closed */
  get isClosed(): boolean {
    return this.closed;
  }

  /** Deliver a frame to the client (objects are JSON-encoded) */
  serverSend(message: object | string | Buffer): void {
    const data =
      typeof message === 'string' || Buffer.isBuffer(message) ? message : JSON.stringify(message);
    this.emit('message', data);
  }

  /** Simulate the server closing the connection */
  serverClose(): void {
    this.close();
  }

  /** Simulate a socket error */
  serverError(error: Error): void {
    this.emit('error', error);
  }

  /** Parse all sent frames as JSON */
  getSentMessagesAsJson<T = unknown>(): T[] {
    return this.sent.map((msg) => JSON.parse(msg) as T);
  }

  /** Get the last sent frame as JSON */
  getLastMessageAsJson<T = unknown>(): T | undefined {
    const last = this.sent[this.sent.length - 1];
    return last ? (JSON.parse(last) as T) : undefined;
  }

  /** Clear the sent frames array */
  clearSentMessages(): void {
    this.sent.length = 0;
  }
}

/**
 * Create a mock socket.
 *
 * @example
 * ```typescript
 * const socket = createMockSocket({ onSend: acknowledgeSyncs });
 * const transport = new WebSocketRegistryTransport(socket);
 * socket.serverSend({ type: 'global_added', id: 1, interface: 'wl_shm', version: 1 });
 * await transport.synchronize();
 * ```
 */
export function createMockSocket(options: MockSocketOptions = {}): MockSocket {
  return new MockSocket(options);
}

/**
 * `onSend` script answering every `sync` request with its `sync_done`.
 * The reply is delivered on a later microtask, like a network reply.
 */
export function acknowledgeSyncs(message: unknown, socket: MockSocket): void {
  if (typeof message !== 'object' || message === null) return;
  if (!('type' in message) || message.type !== 'sync') return;
  if (!('serial' in message)) return;

  const serial = message.serial;
  queueMicrotask(() => {
    socket.serverSend({ type: 'sync_done', serial });
  });
}
