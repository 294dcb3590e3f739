/**
 * @fileoverview Global handler contracts.
 *
 * Globals come in two kinds:
 * - "single" globals are capabilities of the server (`wl_compositor`,
 *   `wl_shm`). They are advertised once, from the start, and are not
 *   expected to go away.
 * - "multi" globals are resources (`wl_output`, `wl_seat`). Several may be
 *   live at once and each may be created or removed at any time.
 *
 * A handler binds the globals of its kind as the registry announces them
 * and hands out the resulting objects.
 */

import type { BoundGlobal, GlobalInterface } from '@global-env/protocol';

/**
 * Bind access given to handlers while a notification is dispatched.
 */
export interface RegistryBinder {
  /**
   * Bind global `id` as `iface`. The requested version is clamped to the
   * interface's own version and to any configured cap.
   */
  bind<I extends GlobalInterface>(iface: I, id: number, version: number): BoundGlobal<I>;
}

/**
 * Handler for a "single" global.
 */
export interface SingleGlobalHandler<I extends GlobalInterface = GlobalInterface> {
  /** Interface this handler is responsible for */
  readonly interface: I;

  /** The global was advertised with the given id and version */
  created(registry: RegistryBinder, id: number, version: number): void;

  /** The most recent binding, if the global was advertised */
  get(): BoundGlobal<I> | undefined;
}

/**
 * Handler for a "multi" global.
 */
export interface MultiGlobalHandler<I extends GlobalInterface = GlobalInterface> {
  /** Interface this handler is responsible for */
  readonly interface: I;

  /** A new instance was advertised with the given id and version */
  created(registry: RegistryBinder, id: number, version: number): void;

  /** The instance with the given id was removed */
  removed(id: number): void;

  /** All live instances, in the order they were created */
  getAll(): BoundGlobal<I>[];
}
