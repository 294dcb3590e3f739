/**
 * @fileoverview Raw list of every live global, declared or not.
 *
 * Lets applications inspect what the server offers beyond the declared
 * slots, and resolves the interface of a removal that arrives with a bare
 * id.
 */

/**
 * A live advertisement as seen by the registry.
 */
export interface GlobalRecord {
  readonly id: number;
  readonly interface: string;
  readonly version: number;
}

export class GlobalManager {
  private readonly globals = new Map<number, GlobalRecord>();

  /**
   * Record an advertisement. A re-advertised id replaces its record.
   */
  record(global: GlobalRecord): void {
    this.globals.set(global.id, { id: global.id, interface: global.interface, version: global.version });
  }

  /**
   * Forget a retracted global.
   * @returns The record that was dropped, or undefined if the id was not live
   */
  forget(id: number): GlobalRecord | undefined {
    const global = this.globals.get(id);
    if (global) {
      this.globals.delete(id);
    }
    return global;
  }

  /**
   * Every live global, in advertisement order.
   */
  list(): GlobalRecord[] {
    return [...this.globals.values()];
  }

  has(id: number): boolean {
    return this.globals.has(id);
  }

  interfaceOf(id: number): string | undefined {
    return this.globals.get(id)?.interface;
  }
}
