/**
 * @fileoverview Transport contract consumed by the environment.
 *
 * A transport carries the registry conversation with the server. It:
 * - streams registry notifications to subscribers
 * - binds advertised globals to local objects
 * - runs synchronization round trips
 *
 * Notifications are queued as they arrive and only reach subscribers from
 * inside `synchronize()` or `dispatchPending()`, so handlers never run
 * concurrently with application code.
 */

import type { BindMessage, Proxy, RegistryNotification } from '@global-env/protocol';
import { BindError, TransportError } from '../errors.js';

export type NotificationListener = (notification: RegistryNotification) => void;

/**
 * Bind request as handed to a concrete transport.
 */
export type BindRequest = Omit<BindMessage, 'type'>;

export interface RegistryTransport {
  /**
   * Register a notification listener.
   * @returns A function removing the listener
   */
  subscribe(listener: NotificationListener): () => void;

  /**
   * Bind global `id` at `version`.
   * @throws {BindError} if the id is not advertised, the name does not match
   *   or the version exceeds the advertised one
   * @throws {TransportError} if the transport is closed
   */
  bind(interfaceName: string, id: number, version: number): Proxy;

  /**
   * Round trip to the server, then deliver every queued notification.
   * Rejects with a TransportError if the round trip fails.
   */
  synchronize(): Promise<void>;

  /** Deliver queued notifications without a round trip */
  dispatchPending(): void;

  /** Close the underlying connection */
  close(): void;

  /** Whether the transport was closed */
  readonly isClosed: boolean;
}

interface AdvertisedGlobal {
  readonly interface: string;
  readonly version: number;
}

/**
 * Shared machinery for transports: queueing, listener fan-out and
 * bookkeeping of advertised versions for bind validation.
 */
export abstract class BaseRegistryTransport implements RegistryTransport {
  private readonly listeners = new Set<NotificationListener>();
  private readonly pending: RegistryNotification[] = [];
  private readonly advertised = new Map<number, AdvertisedGlobal>();
  private nextObjectId = 1;
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  subscribe(listener: NotificationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  bind(interfaceName: string, id: number, version: number): Proxy {
    if (this.closed) {
      throw new TransportError('transport is closed');
    }

    const global = this.advertised.get(id);
    if (!global) {
      throw new BindError(`global ${id} is not advertised`);
    }
    if (global.interface !== interfaceName) {
      throw new BindError(`global ${id} is ${global.interface}, not ${interfaceName}`);
    }
    if (!Number.isInteger(version) || version < 1 || version > global.version) {
      throw new BindError(
        `${interfaceName} version ${version} is outside the advertised range 1..${global.version}`
      );
    }

    const objectId = this.nextObjectId++;
    this.sendBind({ id, interface: interfaceName, version, objectId });
    return { interface: interfaceName, id, objectId, version };
  }

  async synchronize(): Promise<void> {
    if (this.closed) {
      throw new TransportError('transport is closed');
    }
    await this.roundtrip();
    this.dispatchPending();
  }

  /**
   * Deliver queued notifications in order. A notification leaves the queue
   * only once every listener accepted it; if a listener throws, it stays at
   * the head and is delivered again on the next call.
   */
  dispatchPending(): void {
    let next = this.pending[0];
    while (next !== undefined) {
      this.deliver(next);
      this.pending.shift();
      next = this.pending[0];
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.onClose();
  }

  /**
   * Number of notifications waiting for delivery.
   */
  get pendingCount(): number {
    return this.pending.length;
  }

  /**
   * Queue a notification received from the server.
   */
  protected enqueue(notification: RegistryNotification): void {
    this.pending.push(notification);
  }

  /**
   * Mark the transport closed from the connection side.
   */
  protected markClosed(): void {
    this.closed = true;
  }

  private deliver(notification: RegistryNotification): void {
    // Handlers bind from inside the listener, so an addition is visible to
    // bind() while listeners run and rolled back if one of them throws.
    const previous = this.advertised.get(notification.id);
    if (notification.kind === 'added') {
      this.advertised.set(notification.id, {
        interface: notification.interface,
        version: notification.version,
      });
    }

    try {
      for (const listener of [...this.listeners]) {
        listener(notification);
      }
    } catch (error) {
      if (previous) {
        this.advertised.set(notification.id, previous);
      } else {
        this.advertised.delete(notification.id);
      }
      throw error;
    }

    if (notification.kind === 'removed') {
      this.advertised.delete(notification.id);
    }
  }

  /** Ask the server for a synchronization and wait for its acknowledgement */
  protected abstract roundtrip(): Promise<void>;

  /** Forward a bind request to the server */
  protected abstract sendBind(request: BindRequest): void;

  /** Release the underlying connection */
  protected abstract onClose(): void;
}
