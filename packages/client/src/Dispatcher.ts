/**
 * @fileoverview Routes registry notifications to the handler owning the
 * interface.
 *
 * Dispatch is a table lookup plus one handler call, applied in delivery
 * order. The exclusive window on the shared state covers only the lookup:
 * it is released before the handler runs, so a handler may read the
 * environment (or an application may inspect it from a hook) without an
 * access violation. The lookup comes first: when it fails, nothing has been
 * recorded and the notification can be delivered again.
 */

import type { RegistryNotification } from '@global-env/protocol';
import type { GlobalManager } from './GlobalManager.js';
import type { RegistryBinder } from './handlers.js';
import type { SharedCell } from './SharedCell.js';
import type { Slot, SlotTable } from './SlotTable.js';
import type { Logger } from './utils/logger.js';

/**
 * State shared by every handle of one environment.
 */
export interface EnvironmentState<TExtras extends object> {
  readonly slots: SlotTable;
  readonly extras: TExtras;
}

export class Dispatcher<TExtras extends object> {
  constructor(
    private readonly cell: SharedCell<EnvironmentState<TExtras>>,
    private readonly manager: GlobalManager,
    private readonly registry: RegistryBinder,
    private readonly log: Logger
  ) {}

  dispatch(notification: RegistryNotification): void {
    if (notification.kind === 'added') {
      this.added(notification.id, notification.interface, notification.version);
    } else {
      this.removed(notification.id, notification.interface);
    }
  }

  private added(id: number, interfaceName: string, version: number): void {
    const slot = this.lookup(interfaceName);
    this.manager.record({ id, interface: interfaceName, version });
    if (!slot) {
      this.log.debug('Ignoring undeclared global', { id, interface: interfaceName, version });
      return;
    }

    this.log.debug('Global created', { id, interface: interfaceName, version, slot: slot.key });
    slot.handler.created(this.registry, id, version);
  }

  private removed(id: number, announced: string | undefined): void {
    const interfaceName = announced ?? this.manager.interfaceOf(id);
    if (interfaceName === undefined) {
      this.log.debug('Ignoring removal of unknown global', { id });
      return;
    }

    const slot = this.lookup(interfaceName);
    this.manager.forget(id);
    if (!slot) {
      return;
    }

    if (slot.kind === 'single') {
      this.log.warn('Single global removed by the server; keeping its binding', {
        id,
        interface: interfaceName,
      });
      return;
    }

    this.log.debug('Global removed', { id, interface: interfaceName, slot: slot.key });
    slot.handler.removed(id);
  }

  private lookup(interfaceName: string): Slot | undefined {
    return this.cell.write('dispatch', (state) => state.slots.lookup(interfaceName));
  }
}
