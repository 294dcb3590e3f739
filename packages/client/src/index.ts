/**
 * @fileoverview Global environment client.
 *
 * This package binds the globals a server advertises through its registry
 * and exposes them to application code. It handles:
 * - Classification of globals into "single" and "multi" slots
 * - Dispatch of registry notifications to their handlers
 * - Typed access to bound globals and extra application state
 * - Two-round initialization against a transport
 */

import type { BoundGlobal, GlobalInterface, Proxy } from '@global-env/protocol';

// Re-export protocol types for convenience
export type { BoundGlobal, GlobalInterface, Proxy };
export { defineInterface } from '@global-env/protocol';

export {
  type ClientConfig,
  clearConfigCache,
  loadClientConfig,
  parseClientConfig,
  versionCapsOf,
} from './config/clientConfig.js';
export { connectEnvironment } from './connect.js';
export { Dispatcher, type EnvironmentState } from './Dispatcher.js';
export {
  Environment,
  type EnvironmentDeclaration,
  type EnvironmentOptions,
  initEnvironment,
  type MultiHandlers,
  type MultiInterfaceOf,
  type NoHandlers,
  type SingleHandlers,
  type SingleInterfaceOf,
} from './Environment.js';
export {
  AccessViolationError,
  BindError,
  ConfigError,
  DeclarationError,
  InitializationError,
  MissingGlobalError,
  TransportError,
} from './errors.js';
export { GlobalManager, type GlobalRecord } from './GlobalManager.js';
export type { MultiGlobalHandler, RegistryBinder, SingleGlobalHandler } from './handlers.js';
export { MultiGlobal, type MultiGlobalHooks } from './MultiGlobal.js';
export { type BorrowState, SharedCell } from './SharedCell.js';
export { SimpleGlobal } from './SimpleGlobal.js';
export { type Slot, SlotTable } from './SlotTable.js';
export { TransportBinder } from './TransportBinder.js';
export {
  BaseRegistryTransport,
  type BindRequest,
  type NotificationListener,
  type RegistryTransport,
} from './transports/RegistryTransport.js';
export {
  connectWebSocketTransport,
  decodeFrame,
  type RegistrySocket,
  WebSocketRegistryTransport,
} from './transports/WebSocketTransport.js';
export { getLogLevel, type Logger, type LogLevel, logger, setLogLevel } from './utils/logger.js';

/**
 * Global environment client version.
 */
export const GLOBAL_ENV_CLIENT_VERSION = '1.0.0';
