import { type BoundGlobal, type GlobalInterface, tagProxy } from '@global-env/protocol';
import type { RegistryBinder } from './handlers.js';
import type { RegistryTransport } from './transports/RegistryTransport.js';

/**
 * Binder handed to handlers. Clamps each request to the interface's own
 * version and to the configured cap before asking the transport.
 */
export class TransportBinder implements RegistryBinder {
  private readonly caps: ReadonlyMap<string, number>;

  constructor(
    private readonly transport: RegistryTransport,
    versionCaps: Readonly<Record<string, number>> = {}
  ) {
    this.caps = new Map(Object.entries(versionCaps));
  }

  bind<I extends GlobalInterface>(iface: I, id: number, version: number): BoundGlobal<I> {
    const proxy = this.transport.bind(iface.name, id, this.versionFor(iface, version));
    return tagProxy(iface, proxy);
  }

  /**
   * Version a bind of `iface` advertised at `advertised` will use.
   */
  versionFor(iface: GlobalInterface, advertised: number): number {
    return Math.min(advertised, iface.version, this.caps.get(iface.name) ?? iface.version);
  }
}
