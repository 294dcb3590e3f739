/**
 * @fileoverview The global environment.
 *
 * Central point for reaching the globals an application declared. Globals
 * come in through the dispatcher as the registry announces them; the
 * application reads them back through typed accessors:
 *
 * - `getGlobal` / `requireGlobal` for "single" globals
 * - `getAllGlobals` for "multi" globals
 * - `withExtras` for application state stored alongside the handlers
 *
 * An environment is a handle: `clone()` returns another handle on the same
 * state.
 */

import { type BoundGlobal, tagProxy } from '@global-env/protocol';
import { Dispatcher, type EnvironmentState } from './Dispatcher.js';
import { InitializationError, MissingGlobalError } from './errors.js';
import { GlobalManager } from './GlobalManager.js';
import type { MultiGlobalHandler, SingleGlobalHandler } from './handlers.js';
import { SharedCell } from './SharedCell.js';
import { SlotTable } from './SlotTable.js';
import type { RegistryTransport } from './transports/RegistryTransport.js';
import { TransportBinder } from './TransportBinder.js';
import { type Logger, logger as rootLogger } from './utils/logger.js';

export type SingleHandlers = Record<string, SingleGlobalHandler>;
export type MultiHandlers = Record<string, MultiGlobalHandler>;
export type NoHandlers = Record<never, never>;

/**
 * Interfaces handled by the declared "single" slots.
 */
export type SingleInterfaceOf<TSingles extends SingleHandlers> =
  TSingles[keyof TSingles]['interface'];

/**
 * Interfaces handled by the declared "multi" slots.
 */
export type MultiInterfaceOf<TMultis extends MultiHandlers> = TMultis[keyof TMultis]['interface'];

/**
 * The globals an application wants, and the extra state it keeps next to
 * them.
 *
 * @example
 * ```typescript
 * const declaration = {
 *   singles: {
 *     compositor: new SimpleGlobal(Compositor),
 *     shm: new SimpleGlobal(Shm),
 *   },
 *   multis: {
 *     outputs: new MultiGlobal(Output),
 *   },
 *   extras: { frames: 0 },
 * };
 * ```
 */
export interface EnvironmentDeclaration<
  TSingles extends SingleHandlers,
  TMultis extends MultiHandlers,
  TExtras extends object,
> {
  readonly singles?: TSingles;
  readonly multis?: TMultis;
  readonly extras: TExtras;
}

export interface EnvironmentOptions {
  /** Highest version to bind, per interface name */
  readonly versionCaps?: Readonly<Record<string, number>>;

  /** Logger for dispatch and initialization */
  readonly logger?: Logger;
}

export class Environment<
  TSingles extends SingleHandlers = NoHandlers,
  TMultis extends MultiHandlers = NoHandlers,
  TExtras extends object = NoHandlers,
> {
  private constructor(
    private readonly cell: SharedCell<EnvironmentState<TExtras>>,
    /** Every live global, including undeclared ones */
    readonly manager: GlobalManager,
    /** The transport, for manual interaction with the server */
    readonly transport: RegistryTransport
  ) {}

  /** @internal */
  static wrap<
    TSingles extends SingleHandlers,
    TMultis extends MultiHandlers,
    TExtras extends object,
  >(
    cell: SharedCell<EnvironmentState<TExtras>>,
    manager: GlobalManager,
    transport: RegistryTransport
  ): Environment<TSingles, TMultis, TExtras> {
    return new Environment<TSingles, TMultis, TExtras>(cell, manager, transport);
  }

  /**
   * Access a "single" global.
   *
   * Returns undefined if the global has not (yet) been advertised by the
   * registry.
   */
  getGlobal<I extends SingleInterfaceOf<TSingles>>(iface: I): BoundGlobal<I> | undefined {
    return this.cell.read('getGlobal', (state) => {
      const slot = state.slots.lookup(iface.name);
      if (slot?.kind !== 'single') return undefined;
      const global = slot.handler.get();
      return global ? tagProxy(iface, global) : undefined;
    });
  }

  /**
   * Access a "single" global the application cannot run without.
   * @throws {MissingGlobalError} naming the interface if it was not advertised
   */
  requireGlobal<I extends SingleInterfaceOf<TSingles>>(iface: I): BoundGlobal<I> {
    const global = this.getGlobal(iface);
    if (!global) {
      throw new MissingGlobalError(iface.name);
    }
    return global;
  }

  /**
   * All live instances of a "multi" global, in creation order.
   */
  getAllGlobals<I extends MultiInterfaceOf<TMultis>>(iface: I): BoundGlobal<I>[] {
    return this.cell.read('getAllGlobals', (state) => {
      const slot = state.slots.lookup(iface.name);
      if (slot?.kind !== 'multi') return [];
      return slot.handler.getAll().map((global) => tagProxy(iface, global));
    });
  }

  /**
   * Exclusive access to the extra values stored in the environment.
   *
   * Returns what `fn` returns. The window closes when `fn` returns or
   * throws. Touching the environment again from inside `fn` (accessors,
   * `withExtras`, `dispatchPending`) throws an AccessViolationError.
   */
  withExtras<T>(fn: (extras: TExtras) => T): T {
    return this.cell.write('withExtras', (state) => fn(state.extras));
  }

  /**
   * Deliver notifications the transport received since the last round trip.
   */
  dispatchPending(): void {
    this.transport.dispatchPending();
  }

  /**
   * Round trip to the server and apply everything it sent meanwhile.
   */
  synchronize(): Promise<void> {
    return this.transport.synchronize();
  }

  /**
   * Another handle on the same environment.
   */
  clone(): Environment<TSingles, TMultis, TExtras> {
    return new Environment<TSingles, TMultis, TExtras>(this.cell, this.manager, this.transport);
  }
}

/**
 * Build an environment over a connected transport.
 *
 * Runs two synchronization rounds before resolving: the first receives the
 * list of globals and lets the handlers bind them, the second services the
 * requests those handlers made. Resolves only once both succeeded.
 *
 * @throws {InitializationError} if either round fails; the dispatcher is
 *   detached and no environment is produced
 */
export async function initEnvironment<
  TSingles extends SingleHandlers = NoHandlers,
  TMultis extends MultiHandlers = NoHandlers,
  TExtras extends object = NoHandlers,
>(
  transport: RegistryTransport,
  declaration: EnvironmentDeclaration<TSingles, TMultis, TExtras>,
  options: EnvironmentOptions = {}
): Promise<Environment<TSingles, TMultis, TExtras>> {
  const log = (options.logger ?? rootLogger).child('environment');

  const slots = SlotTable.fromDeclaration(declaration.singles ?? {}, declaration.multis ?? {});
  const cell = new SharedCell<EnvironmentState<TExtras>>({ slots, extras: declaration.extras });
  const manager = new GlobalManager();
  const binder = new TransportBinder(transport, options.versionCaps);
  const dispatcher = new Dispatcher(cell, manager, binder, log);

  const unsubscribe = transport.subscribe((notification) => {
    dispatcher.dispatch(notification);
  });

  for (const round of [1, 2] as const) {
    try {
      await transport.synchronize();
    } catch (error) {
      unsubscribe();
      log.error('Initial roundtrip failed', {
        round,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new InitializationError(round, error);
    }
  }

  log.info('Environment ready', {
    declared: slots.interfaces,
    advertised: manager.list().length,
  });

  return Environment.wrap<TSingles, TMultis, TExtras>(cell, manager, transport);
}
