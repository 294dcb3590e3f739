/**
 * @fileoverview Interface markers and bound-object handles.
 *
 * An interface marker names a global's interface and the highest version
 * this client implements. Markers are the type parameter of every typed
 * accessor: the literal name they carry ties a declared slot to the
 * handles it yields.
 */

/**
 * Marker for a registry interface.
 */
export interface GlobalInterface<TName extends string = string> {
  /** Interface name as advertised by the server (e.g., 'wl_compositor') */
  readonly name: TName;

  /** Highest version this client knows how to speak */
  readonly version: number;
}

/**
 * Local handle produced by binding an advertised global.
 */
export interface BoundGlobal<I extends GlobalInterface = GlobalInterface> {
  /** Interface name of the bound global */
  readonly interface: I['name'];

  /** Registry id of the global that was bound */
  readonly id: number;

  /** Client-side object id allocated for this binding */
  readonly objectId: number;

  /** Version the object was bound at */
  readonly version: number;
}

/**
 * Untyped handle, as returned by a transport.
 */
export type Proxy = BoundGlobal<GlobalInterface>;

/**
 * Error thrown when an interface marker is malformed.
 */
export class InvalidInterfaceError extends Error {
  constructor(message: string) {
    super(`Invalid interface: ${message}`);
    this.name = 'InvalidInterfaceError';
  }
}

/**
 * Define an interface marker.
 *
 * @example
 * ```typescript
 * const Compositor = defineInterface('wl_compositor', 4);
 * const Output = defineInterface('wl_output', 3);
 * ```
 * @throws {InvalidInterfaceError} if the name is empty or the version is not a positive integer
 */
export function defineInterface<TName extends string>(
  name: TName,
  version: number
): GlobalInterface<TName> {
  if (name.length === 0) {
    throw new InvalidInterfaceError('name must be a non-empty string');
  }
  if (!Number.isInteger(version) || version < 1) {
    throw new InvalidInterfaceError(`version of ${name} must be a positive integer`);
  }
  return Object.freeze({ name, version });
}

/**
 * Re-tag an untyped proxy with the interface it was bound for.
 */
export function tagProxy<I extends GlobalInterface>(iface: I, proxy: Proxy): BoundGlobal<I> {
  if (proxy.interface !== iface.name) {
    throw new InvalidInterfaceError(
      `proxy for ${proxy.interface} cannot be tagged as ${iface.name}`
    );
  }
  return {
    interface: iface.name,
    id: proxy.id,
    objectId: proxy.objectId,
    version: proxy.version,
  };
}
