/**
 * @fileoverview Registry protocol message definitions.
 * Uses Zod for runtime validation of frames crossing the wire.
 */

import { z } from 'zod';

// ============ Shared Schemas ============

/**
 * Schema for a global id (u32 issued by the server).
 */
export const GlobalIdSchema = z.number().int().min(0).max(0xffffffff);

/**
 * Schema for a protocol version (u32, at least 1).
 */
export const VersionSchema = z.number().int().min(1).max(0xffffffff);

/**
 * Schema for an interface name.
 */
export const InterfaceNameSchema = z.string().min(1);

// ============ Server -> Client Messages ============

/**
 * A global was advertised by the server's registry.
 */
export const GlobalAddedMessage = z.object({
  type: z.literal('global_added'),
  id: GlobalIdSchema,
  interface: InterfaceNameSchema,
  version: VersionSchema,
});

/**
 * A global was retracted. Some servers only send the id.
 */
export const GlobalRemovedMessage = z.object({
  type: z.literal('global_removed'),
  id: GlobalIdSchema,
  interface: InterfaceNameSchema.optional(),
});

/**
 * Acknowledgement of a `sync` request.
 */
export const SyncDoneMessage = z.object({
  type: z.literal('sync_done'),
  serial: z.number().int().min(0),
});

/**
 * Protocol-level error reported by the server.
 */
export const ServerErrorMessage = z.object({
  type: z.literal('error'),
  message: z.string(),
});

/**
 * Union of all valid server-to-client messages.
 */
export const ServerMessage = z.discriminatedUnion('type', [
  GlobalAddedMessage,
  GlobalRemovedMessage,
  SyncDoneMessage,
  ServerErrorMessage,
]);

export type ServerMessage = z.infer<typeof ServerMessage>;
export type GlobalAddedMessage = z.infer<typeof GlobalAddedMessage>;
export type GlobalRemovedMessage = z.infer<typeof GlobalRemovedMessage>;
export type SyncDoneMessage = z.infer<typeof SyncDoneMessage>;

// ============ Client -> Server Messages ============

/**
 * Client request to bind a global to a new local object.
 */
export const BindMessage = z.object({
  type: z.literal('bind'),
  id: GlobalIdSchema,
  interface: InterfaceNameSchema,
  version: VersionSchema,
  objectId: z.number().int().min(1),
});

/**
 * Client request for a synchronization round.
 */
export const SyncMessage = z.object({
  type: z.literal('sync'),
  serial: z.number().int().min(0),
});

/**
 * Union of all valid client-to-server messages.
 */
export const ClientMessage = z.discriminatedUnion('type', [BindMessage, SyncMessage]);

export type ClientMessage = z.infer<typeof ClientMessage>;
export type BindMessage = z.infer<typeof BindMessage>;
export type SyncMessage = z.infer<typeof SyncMessage>;

// ============ Notifications ============

/**
 * Registry notification as handed to the dispatcher.
 * `interface` on a removal is absent when the transport only knows the id.
 */
export type RegistryNotification =
  | { readonly kind: 'added'; readonly id: number; readonly interface: string; readonly version: number }
  | { readonly kind: 'removed'; readonly id: number; readonly interface?: string | undefined };

/**
 * Parse a raw server message.
 * @returns The validated message, or null when it does not match the protocol
 */
export function parseServerMessage(data: unknown): ServerMessage | null {
  const result = ServerMessage.safeParse(data);
  return result.success ? result.data : null;
}

/**
 * Parse a raw client message.
 * @returns The validated message, or null when it does not match the protocol
 */
export function parseClientMessage(data: unknown): ClientMessage | null {
  const result = ClientMessage.safeParse(data);
  return result.success ? result.data : null;
}

/**
 * Convert a registry frame into a dispatcher notification.
 * Returns null for frames that carry no registry event.
 */
export function toNotification(message: ServerMessage): RegistryNotification | null {
  switch (message.type) {
    case 'global_added':
      return { kind: 'added', id: message.id, interface: message.interface, version: message.version };
    case 'global_removed':
      return { kind: 'removed', id: message.id, interface: message.interface };
    default:
      return null;
  }
}
