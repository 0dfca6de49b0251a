/**
 * ConnectionSession - protocol state for one client connection.
 *
 * The first frame must register the connection. Anything else, or a
 * registration whose identity cannot be resolved, closes the connection
 * with the policy-violation code before any state is touched. Once
 * registered, writer-capable connections drive the pairing coordinator.
 *
 * Frames and the close are processed strictly one after another, so a
 * pairing sent right behind the registration waits for it, and the
 * unregister on close never races the register.
 */

import {
  ClientEventType,
  ConnectionRole,
  POLICY_VIOLATION_CLOSE_CODE,
  ServerEventType,
  canWrite,
} from '@scanlink/shared';
import type { IdentityResolver } from '../identity/identity-resolver.js';
import type { PairingCoordinator } from '../pairing/pairing-coordinator.js';
import type { Broadcaster } from '../sessions/broadcaster.js';
import type { SessionRegistry } from '../sessions/session-registry.js';
import type { ClientConnection, IdentityKey, IdentityMetadata } from '../sessions/types.js';
import { decodeFrame, frameType, parsePairingRequest, parseRegistration } from './protocol.js';

export interface ConnectionSessionDeps {
  registry: Pick<SessionRegistry, 'register' | 'unregister'>;
  broadcaster: Broadcaster;
  coordinator: Pick<PairingCoordinator, 'handleNewPairing'>;
  resolver: IdentityResolver;
}

type SessionState = 'awaiting_register' | 'active' | 'closed';

export class ConnectionSession {
  private state: SessionState = 'awaiting_register';
  private login: IdentityKey | null = null;
  private role: ConnectionRole = ConnectionRole.None;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly connection: ClientConnection,
    private readonly deps: ConnectionSessionDeps,
  ) {}

  get identity(): IdentityKey | null {
    return this.login;
  }

  get isActive(): boolean {
    return this.state === 'active';
  }

  /**
   * Queue a text frame for processing. Never rejects.
   */
  handleMessage(raw: string): Promise<void> {
    return this.enqueue(() => this.processFrame(raw));
  }

  /**
   * Queue the disconnect. Never rejects.
   */
  handleClose(): Promise<void> {
    return this.enqueue(() => this.processClose());
  }

  private enqueue(step: () => Promise<void>): Promise<void> {
    this.queue = this.queue.then(step).catch((err) => {
      console.error(`[ConnectionSession ${this.connection.id}] Failed to process message:`, err);
    });
    return this.queue;
  }

  private async processFrame(raw: string): Promise<void> {
    if (this.state === 'closed') return;
    const payload = decodeFrame(raw);

    if (this.state === 'awaiting_register') {
      await this.processRegistration(payload);
      return;
    }

    const type = frameType(payload);
    if (type !== ClientEventType.NEW_PAIRING) {
      console.log(`[ConnectionSession ${this.connection.id}] Ignoring frame of type ${type ?? 'unknown'}`);
      return;
    }
    if (!canWrite(this.role)) {
      console.warn(`[ConnectionSession ${this.connection.id}] Pairing from a read-only connection ignored`);
      return;
    }
    const request = parsePairingRequest(payload);
    if (!request || this.login === null) {
      console.warn(`[ConnectionSession ${this.connection.id}] Malformed pairing ignored: ${raw}`);
      return;
    }
    await this.deps.coordinator.handleNewPairing(this.login, request.platform, request.product);
  }

  private async processRegistration(payload: unknown): Promise<void> {
    const registration = parseRegistration(payload);
    if (!registration) {
      this.reject('Expected a register message');
      return;
    }

    let metadata: IdentityMetadata | null;
    try {
      metadata = await this.deps.resolver.resolve(registration.credentials);
    } catch (err) {
      console.error(`[ConnectionSession ${this.connection.id}] Identity lookup failed:`, err);
      metadata = null;
    }
    if (!metadata) {
      this.reject('Unknown identity');
      return;
    }

    this.login = metadata.login;
    this.role = registration.role;
    this.state = 'active';
    const context = await this.deps.registry.register(this.connection, metadata.login, registration.role, metadata);

    await this.deps.broadcaster.sendToConnection(this.connection, {
      type: ServerEventType.SESSION_SNAPSHOT,
      context: context.snapshot(),
    });
  }

  private async processClose(): Promise<void> {
    const wasActive = this.state === 'active';
    this.state = 'closed';
    if (wasActive && this.login !== null) {
      console.log(`[ConnectionSession ${this.connection.id}] Disconnect: ${this.login}`);
      await this.deps.registry.unregister(this.connection, this.login, this.role);
    }
  }

  private reject(reason: string): void {
    console.warn(`[ConnectionSession ${this.connection.id}] Rejected: ${reason}`);
    this.state = 'closed';
    this.connection.close(POLICY_VIOLATION_CLOSE_CODE, reason);
  }
}
