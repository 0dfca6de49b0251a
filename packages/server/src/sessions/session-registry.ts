/**
 * SessionRegistry - owns the login → IdentityContext mapping.
 *
 * A context exists exactly while it holds at least one connection. It is
 * created on the first registration for a login, seeded with the platform
 * of that login's most recent pairing, and dropped when its last
 * connection leaves.
 *
 * List mutations never straddle an await, so concurrent handlers on the
 * single event loop cannot observe a half-updated context.
 */

import { ServerEventType, canRead, canWrite, roleName, type ConnectionRole } from '@scanlink/shared';
import { IdentityContext, removeConnection } from './identity-context.js';
import type { Broadcaster, PlatformDirectory } from './broadcaster.js';
import type { ClientConnection, IdentityKey, IdentityMetadata } from './types.js';

/** Source of the initial platform binding for a fresh context. */
export interface PlatformHintSource {
  findLatestPlatformForLogin(login: IdentityKey): Promise<number | null>;
}

export class SessionRegistry implements PlatformDirectory {
  private contexts = new Map<IdentityKey, IdentityContext>();

  constructor(
    private readonly broadcaster: Broadcaster,
    private readonly hints?: PlatformHintSource,
  ) {}

  /**
   * Attach a connection to its login's context, creating the context if needed.
   *
   * Writers announce `producer_connected` to every output connection.
   * Readers joining while a producer is already present get a single
   * `producer_connected` of their own.
   */
  async register(
    connection: ClientConnection,
    login: IdentityKey,
    role: ConnectionRole,
    metadata: IdentityMetadata,
  ): Promise<IdentityContext> {
    let context = this.contexts.get(login);
    if (!context) {
      const platform = await this.loadPlatformHint(login);
      // Another registration may have created it while the hint loaded.
      context = this.contexts.get(login);
      if (!context) {
        context = new IdentityContext(metadata, platform);
        this.contexts.set(login, context);
        console.log(`[SessionRegistry] Context created: ${login} (platform: ${platform ?? 'none'})`);
      }
    }

    if (canWrite(role)) {
      context.inputConnections.push(connection);
    }
    if (canRead(role)) {
      context.outputConnections.push(connection);
    }
    if (context.isEmpty()) {
      // Role None: nothing to hold on to.
      this.contexts.delete(login);
    }

    console.log(
      `[SessionRegistry] Connection registered: ${connection.id} → ${login} (${roleName(role)})`,
    );
    this.logState();

    if (canWrite(role)) {
      await this.broadcaster.sendTo(context, { type: ServerEventType.PRODUCER_CONNECTED });
    }
    // A read-writer already got the broadcast above.
    if (canRead(role) && context.hasInputs() && !canWrite(role)) {
      await this.broadcaster.sendToConnection(connection, { type: ServerEventType.PRODUCER_CONNECTED });
    }

    return context;
  }

  /**
   * Detach a connection. Announces `producer_disconnected` when the last
   * writer leaves and drops the context once it is empty.
   */
  async unregister(connection: ClientConnection, login: IdentityKey, role: ConnectionRole): Promise<void> {
    const context = this.contexts.get(login);
    if (!context) return;

    let removedLastInput = false;
    if (canWrite(role) && removeConnection(context.inputConnections, connection)) {
      removedLastInput = !context.hasInputs();
    }
    if (canRead(role)) {
      removeConnection(context.outputConnections, connection);
    }
    if (context.isEmpty()) {
      this.contexts.delete(login);
      console.log(`[SessionRegistry] Context destroyed: ${login}`);
    }

    console.log(`[SessionRegistry] Connection unregistered: ${connection.id} ← ${login}`);

    if (removedLastInput) {
      await this.broadcaster.sendTo(context, { type: ServerEventType.PRODUCER_DISCONNECTED });
    }
  }

  lookup(login: IdentityKey): IdentityContext | undefined {
    return this.contexts.get(login);
  }

  contextsOnPlatform(platform: number): IdentityContext[] {
    const result: IdentityContext[] = [];
    for (const context of this.contexts.values()) {
      if (context.currentPlatform === platform) {
        result.push(context);
      }
    }
    return result;
  }

  /**
   * Get stats for monitoring.
   */
  getStats(): { identityCount: number; connectionCount: number } {
    const connections = new Set<ClientConnection>();
    for (const context of this.contexts.values()) {
      for (const c of context.inputConnections) connections.add(c);
      for (const c of context.outputConnections) connections.add(c);
    }
    return { identityCount: this.contexts.size, connectionCount: connections.size };
  }

  /**
   * Clear all contexts (for testing/shutdown).
   */
  clear(): void {
    this.contexts.clear();
  }

  private async loadPlatformHint(login: IdentityKey): Promise<number | null> {
    if (!this.hints) return null;
    try {
      return await this.hints.findLatestPlatformForLogin(login);
    } catch (err) {
      console.warn(
        `[SessionRegistry] Could not restore platform for ${login}:`,
        err instanceof Error ? err.message : err,
      );
      return null;
    }
  }

  private logState(): void {
    const state = [...this.contexts.values()].map((c) => c.snapshot());
    console.log(`[SessionRegistry] State: ${JSON.stringify(state)}`);
  }
}
