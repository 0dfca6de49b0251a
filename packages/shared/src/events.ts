/**
 * WebSocket event types for scanner/dashboard ↔ server communication.
 */

import type { RoleName } from './roles.js';

// ============ Event Type Constants ============

/** Server → Client event type discriminants. */
export const ServerEventType = {
  SESSION_SNAPSHOT: 'session_snapshot',
  PRODUCER_CONNECTED: 'producer_connected',
  PRODUCER_DISCONNECTED: 'producer_disconnected',
  PLATFORM_CHANGED: 'platform_changed',
  NEW_PAIRING: 'new_pairing',
  PRODUCT_MOVED: 'product_moved',
} as const;

/** Client → Server event type discriminants. */
export const ClientEventType = {
  REGISTER: 'register',
  NEW_PAIRING: 'new_pairing',
} as const;

/** Close code sent when the first message is not a valid registration. */
export const POLICY_VIOLATION_CLOSE_CODE = 1008;

// ============ Client → Server Events ============

export interface RegisterEvent {
  type: typeof ClientEventType.REGISTER;
  /** Signed bearer token carrying a `login` claim. Takes precedence over `login`. */
  token?: string;
  login?: string;
  role?: RoleName | number;
  /** Older scanners send this flag instead of a role. */
  is_input?: boolean;
}

export interface NewPairingRequestEvent {
  type: typeof ClientEventType.NEW_PAIRING;
  platform: number | string;
  product?: number | string | null;
}

export type ClientEvent = RegisterEvent | NewPairingRequestEvent;

// ============ Server → Client Events ============

/** Public view of one identity's session state. */
export interface IdentitySnapshot {
  login: string;
  id: number | null;
  fullName: string | null;
  inputCount: number;
  outputCount: number;
  currentPlatform: number | null;
  inputIds: string[];
  outputIds: string[];
}

export interface SessionSnapshotEvent {
  type: typeof ServerEventType.SESSION_SNAPSHOT;
  context: IdentitySnapshot;
}

export interface ProducerConnectedEvent {
  type: typeof ServerEventType.PRODUCER_CONNECTED;
}

export interface ProducerDisconnectedEvent {
  type: typeof ServerEventType.PRODUCER_DISCONNECTED;
}

export interface PlatformChangedEvent {
  type: typeof ServerEventType.PLATFORM_CHANGED;
  platform: number;
}

export interface NewPairingEvent {
  type: typeof ServerEventType.NEW_PAIRING;
  platform: number;
  product: number;
  recordId: number;
  /** True when the product was already held by an earlier record. */
  overwrite: boolean;
}

export interface ProductMovedEvent {
  type: typeof ServerEventType.PRODUCT_MOVED;
  product: number;
  from: number;
  to: number;
}

export type ServerEvent =
  | SessionSnapshotEvent
  | ProducerConnectedEvent
  | ProducerDisconnectedEvent
  | PlatformChangedEvent
  | NewPairingEvent
  | ProductMovedEvent;
