/**
 * Session types shared by the registry, broadcaster and transports.
 */

import type { ServerEvent } from '@scanlink/shared';

export type ConnectionId = string;

/** Login string identifying one operator across all of their devices. */
export type IdentityKey = string;

/**
 * Transport-neutral connection handle.
 * `send` rejects when the frame could not be written.
 */
export interface ClientConnection {
  readonly id: ConnectionId;
  send(event: ServerEvent): Promise<void>;
  close(code?: number, reason?: string): void;
}

/** What the identity resolver knows about a login. */
export interface IdentityMetadata {
  login: IdentityKey;
  id?: number;
  fullName?: string;
}

/** Result of one delivery attempt. */
export interface DeliveryOutcome {
  connectionId: ConnectionId;
  delivered: boolean;
  error?: string;
}

/** Generate a unique connection ID. */
export function generateConnectionId(): ConnectionId {
  return `conn-${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;
}
