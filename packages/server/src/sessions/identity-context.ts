/**
 * IdentityContext - per-login session state.
 *
 * Holds the login's producer (input) and consumer (output) connections and
 * the platform it is currently bound to. Only the SessionRegistry mutates
 * the connection lists.
 */

import type { IdentitySnapshot } from '@scanlink/shared';
import type { ClientConnection, IdentityKey, IdentityMetadata } from './types.js';

export class IdentityContext {
  readonly login: IdentityKey;
  id: number | null;
  fullName: string | null;
  currentPlatform: number | null;
  readonly inputConnections: ClientConnection[] = [];
  readonly outputConnections: ClientConnection[] = [];

  constructor(metadata: IdentityMetadata, currentPlatform: number | null = null) {
    this.login = metadata.login;
    this.id = metadata.id ?? null;
    this.fullName = metadata.fullName ?? null;
    this.currentPlatform = currentPlatform;
  }

  hasInputs(): boolean {
    return this.inputConnections.length > 0;
  }

  isEmpty(): boolean {
    return this.inputConnections.length === 0 && this.outputConnections.length === 0;
  }

  snapshot(): IdentitySnapshot {
    return {
      login: this.login,
      id: this.id,
      fullName: this.fullName,
      inputCount: this.inputConnections.length,
      outputCount: this.outputConnections.length,
      currentPlatform: this.currentPlatform,
      inputIds: this.inputConnections.map((c) => c.id),
      outputIds: this.outputConnections.map((c) => c.id),
    };
  }
}

/** Remove `connection` from `list` in place. Returns true if it was present. */
export function removeConnection(list: ClientConnection[], connection: ClientConnection): boolean {
  const index = list.indexOf(connection);
  if (index === -1) return false;
  list.splice(index, 1);
  return true;
}
