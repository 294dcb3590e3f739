import type { BoundGlobal, GlobalInterface } from '@global-env/protocol';
import type { MultiGlobalHandler, RegistryBinder } from './handlers.js';

/**
 * Optional callbacks for a MultiGlobal.
 */
export interface MultiGlobalHooks<I extends GlobalInterface> {
  /** Called after an instance was bound and stored */
  onCreated?: (global: BoundGlobal<I>, registry: RegistryBinder) => void;

  /** Called after an instance was dropped or replaced by a re-advertisement */
  onRemoved?: (global: BoundGlobal<I>) => void;
}

/**
 * Generic handler for "multi" globals.
 *
 * Keeps one binding per live id. A repeated advertisement of an id that is
 * already live replaces its binding in place, so duplicates never appear.
 */
export class MultiGlobal<I extends GlobalInterface> implements MultiGlobalHandler<I> {
  readonly interface: I;
  private readonly instances = new Map<number, BoundGlobal<I>>();

  constructor(
    iface: I,
    private readonly hooks: MultiGlobalHooks<I> = {}
  ) {
    this.interface = iface;
  }

  created(registry: RegistryBinder, id: number, version: number): void {
    const global = registry.bind(this.interface, id, version);
    const replaced = this.instances.get(id);
    if (replaced) {
      this.hooks.onRemoved?.(replaced);
    }
    this.instances.set(id, global);
    this.hooks.onCreated?.(global, registry);
  }

  removed(id: number): void {
    const global = this.instances.get(id);
    if (!global) return;

    this.instances.delete(id);
    this.hooks.onRemoved?.(global);
  }

  getAll(): BoundGlobal<I>[] {
    return [...this.instances.values()];
  }

  /**
   * Number of live instances.
   */
  get size(): number {
    return this.instances.size;
  }
}
