/**
 * @fileoverview In-process registry server for tests and local runs.
 *
 * The server keeps a list of globals and the transports connected to it.
 * Like a real registry it announces every existing global to a new
 * connection, then every later advertisement and retraction. Bind requests
 * are queued and only processed at the next round trip, so work a handler
 * triggers while binding becomes visible one synchronization later.
 */

import { BaseRegistryTransport, type BindRequest, TransportError } from '@global-env/client';
import type { RegistryNotification } from '@global-env/protocol';

/**
 * A global currently offered by the server.
 */
export interface ServerGlobal {
  readonly id: number;
  readonly interface: string;
  readonly version: number;
}

/**
 * A bind request the server has processed.
 */
export interface RecordedBind extends BindRequest {
  /** Connection the request came from */
  readonly connection: number;
}

/**
 * Called when the server processes a bind of the given interface.
 */
export type BindHook = (bind: RecordedBind, server: InMemoryRegistryServer) => void;

export class InMemoryRegistryServer {
  private readonly globals = new Map<number, ServerGlobal>();
  private readonly connections = new Map<number, InMemoryRegistryTransport>();
  private readonly bindHooks = new Map<string, BindHook>();
  private readonly processed: RecordedBind[] = [];
  private nextGlobalId = 1;
  private nextConnectionId = 1;
  private readonly syncFailures: string[] = [];
  private readonly scheduledFailures = new Map<number, string>();
  private roundtripsServed = 0;

  /**
   * Offer a new global.
   * @returns The id allocated to it
   */
  advertise(interfaceName: string, version: number): number {
    const id = this.nextGlobalId++;
    return this.advertiseWithId(id, interfaceName, version);
  }

  /**
   * Offer a global under an explicit id, replacing a live one with that id.
   */
  advertiseWithId(id: number, interfaceName: string, version: number): number {
    const global = { id, interface: interfaceName, version };
    this.globals.set(id, global);
    this.nextGlobalId = Math.max(this.nextGlobalId, id + 1);
    this.broadcast({ kind: 'added', ...global });
    return id;
  }

  /**
   * Withdraw a global.
   * @param options.bareId - Send the removal without the interface name
   */
  retract(id: number, options: { bareId?: boolean } = {}): void {
    const global = this.globals.get(id);
    if (!global) return;

    this.globals.delete(id);
    this.broadcast({
      kind: 'removed',
      id,
      interface: options.bareId ? undefined : global.interface,
    });
  }

  /**
   * Send a raw notification to every connection, bypassing bookkeeping.
   */
  announce(notification: RegistryNotification): void {
    this.broadcast(notification);
  }

  /**
   * Run `hook` whenever a bind of `interfaceName` is processed.
   */
  onBind(interfaceName: string, hook: BindHook): void {
    this.bindHooks.set(interfaceName, hook);
  }

  /**
   * Make the next round trip of any connection fail with `message`.
   * Calls stack: two calls fail the next two round trips.
   */
  failNextSync(message: string): void {
    this.syncFailures.push(message);
  }

  /**
   * Make the `n`-th round trip served by this server (counting from 1,
   * across all connections) fail with `message`.
   */
  failRoundtrip(n: number, message: string): void {
    this.scheduledFailures.set(n, message);
  }

  /**
   * Open a connection. The transport immediately queues one `added`
   * notification per live global.
   */
  createTransport(): InMemoryRegistryTransport {
    const connection = this.nextConnectionId++;
    const transport = new InMemoryRegistryTransport(this, connection);
    this.connections.set(connection, transport);

    for (const global of this.globals.values()) {
      transport.receive({ kind: 'added', ...global });
    }
    return transport;
  }

  /**
   * Globals currently offered, in advertisement order.
   */
  list(): ServerGlobal[] {
    return [...this.globals.values()];
  }

  /**
   * Every bind processed so far.
   */
  get binds(): readonly RecordedBind[] {
    return this.processed;
  }

  /** @internal */
  roundtrip(connection: number, requests: BindRequest[]): void {
    this.roundtripsServed++;
    const failure = this.syncFailures.shift() ?? this.scheduledFailures.get(this.roundtripsServed);
    if (failure !== undefined) {
      throw new TransportError(failure);
    }

    for (const request of requests) {
      const bind = { ...request, connection };
      this.processed.push(bind);
      this.bindHooks.get(request.interface)?.(bind, this);
    }
  }

  /** @internal */
  disconnect(connection: number): void {
    this.connections.delete(connection);
  }

  private broadcast(notification: RegistryNotification): void {
    for (const transport of this.connections.values()) {
      transport.receive(notification);
    }
  }
}

/**
 * Transport connected to an InMemoryRegistryServer.
 */
export class InMemoryRegistryTransport extends BaseRegistryTransport {
  private requests: BindRequest[] = [];
  private roundtrips = 0;

  constructor(
    private readonly server: InMemoryRegistryServer,
    readonly connection: number
  ) {
    super();
  }

  /**
   * Number of round trips completed.
   */
  get roundtripCount(): number {
    return this.roundtrips;
  }

  /** @internal Called by the server. */
  receive(notification: RegistryNotification): void {
    this.enqueue(notification);
  }

  protected async roundtrip(): Promise<void> {
    await Promise.resolve();
    const requests = this.requests;
    this.requests = [];
    this.server.roundtrip(this.connection, requests);
    this.roundtrips++;
  }

  protected sendBind(request: BindRequest): void {
    this.requests.push(request);
  }

  protected onClose(): void {
    this.server.disconnect(this.connection);
  }
}
