/**
 * @fileoverview Registry protocol definitions.
 *
 * This package defines the messages exchanged with a server that advertises
 * its globals through a registry, and the interface markers clients use to
 * declare which globals they want.
 */

export {
  type BoundGlobal,
  defineInterface,
  type GlobalInterface,
  InvalidInterfaceError,
  type Proxy,
  tagProxy,
} from './interfaces.js';

export {
  BindMessage,
  ClientMessage,
  GlobalAddedMessage,
  GlobalIdSchema,
  GlobalRemovedMessage,
  InterfaceNameSchema,
  parseClientMessage,
  parseServerMessage,
  type RegistryNotification,
  ServerErrorMessage,
  ServerMessage,
  SyncDoneMessage,
  SyncMessage,
  toNotification,
  VersionSchema,
} from './messages.js';

/**
 * Registry protocol version.
 */
export const REGISTRY_PROTOCOL_VERSION = '1.0.0';
