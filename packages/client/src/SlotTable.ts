/**
 * @fileoverview Slot table: the fixed mapping from interface name to the
 * handler responsible for it.
 *
 * Built once from the environment declaration and frozen afterwards. An
 * interface name maps to at most one slot.
 */

import { DeclarationError } from './errors.js';
import type { MultiGlobalHandler, SingleGlobalHandler } from './handlers.js';

export type SingleSlot = {
  readonly kind: 'single';
  readonly key: string;
  readonly handler: SingleGlobalHandler;
};

export type MultiSlot = {
  readonly kind: 'multi';
  readonly key: string;
  readonly handler: MultiGlobalHandler;
};

export type Slot = SingleSlot | MultiSlot;

export class SlotTable {
  private readonly slots: ReadonlyMap<string, Slot>;

  private constructor(slots: Map<string, Slot>) {
    this.slots = slots;
    Object.freeze(this);
  }

  /**
   * Build the table from declared handlers, keyed by their field name.
   * @throws {DeclarationError} if two slots claim the same interface
   */
  static fromDeclaration(
    singles: Readonly<Record<string, SingleGlobalHandler>>,
    multis: Readonly<Record<string, MultiGlobalHandler>>
  ): SlotTable {
    const slots = new Map<string, Slot>();

    const add = (slot: Slot) => {
      const name = slot.handler.interface.name;
      const existing = slots.get(name);
      if (existing) {
        throw new DeclarationError(
          `${name} is declared by both '${existing.key}' and '${slot.key}'`
        );
      }
      slots.set(name, slot);
    };

    for (const [key, handler] of Object.entries(singles)) {
      add({ kind: 'single', key, handler });
    }
    for (const [key, handler] of Object.entries(multis)) {
      add({ kind: 'multi', key, handler });
    }

    return new SlotTable(slots);
  }

  /**
   * Slot owning the interface, or undefined for an undeclared interface.
   */
  lookup(interfaceName: string): Slot | undefined {
    return this.slots.get(interfaceName);
  }

  /**
   * Declared interface names, singles first, in declaration order.
   */
  get interfaces(): string[] {
    return [...this.slots.keys()];
  }

  get size(): number {
    return this.slots.size;
  }
}
