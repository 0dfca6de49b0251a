/**
 * Broadcaster - delivers server events to identity contexts.
 *
 * Every recipient is attempted independently. A failed send is logged and
 * reported in the returned outcome list; it never aborts the remaining
 * deliveries, never reaches the caller as an exception and never
 * unregisters the connection (that only happens on disconnect).
 */

import type { ServerEvent } from '@scanlink/shared';
import type { IdentityContext } from './identity-context.js';
import type { ClientConnection, DeliveryOutcome } from './types.js';

/** Anything that can enumerate the contexts bound to a platform. */
export interface PlatformDirectory {
  contextsOnPlatform(platform: number): IdentityContext[];
}

export class Broadcaster {
  /**
   * Publish an event directly to a single connection.
   */
  async sendToConnection(connection: ClientConnection, event: ServerEvent): Promise<DeliveryOutcome> {
    try {
      await connection.send(event);
      return { connectionId: connection.id, delivered: true };
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      console.error(`[Broadcaster] Failed to send ${event.type} to ${connection.id}: ${error}`);
      return { connectionId: connection.id, delivered: false, error };
    }
  }

  /**
   * Publish an event to every output connection of a context.
   */
  async sendTo(context: IdentityContext, event: ServerEvent): Promise<DeliveryOutcome[]> {
    const outcomes: DeliveryOutcome[] = [];
    // Copy: the list may change while a send is suspended.
    for (const connection of [...context.outputConnections]) {
      outcomes.push(await this.sendToConnection(connection, event));
    }
    return outcomes;
  }

  /**
   * Publish an event to every context currently bound to `platform`.
   * Zero matching contexts is not an error.
   */
  async sendToPlatform(
    directory: PlatformDirectory,
    platform: number,
    event: ServerEvent,
  ): Promise<DeliveryOutcome[]> {
    const outcomes: DeliveryOutcome[] = [];
    for (const context of directory.contextsOnPlatform(platform)) {
      outcomes.push(...(await this.sendTo(context, event)));
    }
    return outcomes;
  }
}
