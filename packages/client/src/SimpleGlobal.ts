import type { BoundGlobal, GlobalInterface } from '@global-env/protocol';
import type { RegistryBinder, SingleGlobalHandler } from './handlers.js';

/**
 * Minimal handler for "single" globals.
 *
 * Binds the global as soon as the registry signals it and does nothing
 * more. Suited to globals that never emit events of their own, such as
 * `wl_compositor` or `wl_data_device_manager`.
 */
export class SimpleGlobal<I extends GlobalInterface> implements SingleGlobalHandler<I> {
  readonly interface: I;
  private global: BoundGlobal<I> | undefined;

  constructor(iface: I) {
    this.interface = iface;
  }

  created(registry: RegistryBinder, id: number, version: number): void {
    this.global = registry.bind(this.interface, id, version);
  }

  get(): BoundGlobal<I> | undefined {
    return this.global;
  }
}
