/**
 * PairingCoordinator - the pairing commit protocol.
 *
 * A producer reports "platform P now holds product X". The coordinator
 * rebinds the producer's identity to P, commits the pairing, tells every
 * dashboard on P about it, tells dashboards on the product's previous
 * platform that it moved away, and hands the record to reconciliation.
 *
 * Calls are serialized per login, and commits per product, so a rebind and
 * the commit that follows it are never interleaved with another call for
 * the same operator, and two commits for one product can never both see
 * "no previous holder".
 */

import { ServerEventType, type NewPairingEvent, type ProductMovedEvent } from '@scanlink/shared';
import { KeyedQueue } from '../lib/keyed-queue.js';
import type { Broadcaster } from '../sessions/broadcaster.js';
import type { SessionRegistry } from '../sessions/session-registry.js';
import type { IdentityKey } from '../sessions/types.js';
import type { PairingStore, PreviousHolder } from '../storage/types.js';
import type { ReconciliationSupervisor } from '../reconciliation/supervisor.js';

export type PairingOutcome =
  | { status: 'ignored' }
  | { status: 'rebound'; platformChanged: boolean }
  | {
      status: 'committed';
      platformChanged: boolean;
      recordId: number;
      previous: PreviousHolder | null;
      moved: boolean;
    };

export interface PairingCoordinatorDeps {
  registry: Pick<SessionRegistry, 'lookup' | 'contextsOnPlatform'>;
  broadcaster: Broadcaster;
  store: Pick<PairingStore, 'commitPairing'>;
  reconciliation: Pick<ReconciliationSupervisor, 'spawn'>;
}

export class PairingCoordinator {
  private identityQueue = new KeyedQueue<IdentityKey>();
  private productQueue = new KeyedQueue<number>();

  constructor(private readonly deps: PairingCoordinatorDeps) {}

  /**
   * Handle a pairing report from a producer.
   * Unknown logins are ignored: there is no context to attribute the pairing to.
   */
  handleNewPairing(login: IdentityKey, platform: number, product: number | null): Promise<PairingOutcome> {
    return this.identityQueue.run(login, () => this.process(login, platform, product));
  }

  private async process(login: IdentityKey, platform: number, product: number | null): Promise<PairingOutcome> {
    const { registry, broadcaster, store, reconciliation } = this.deps;

    const context = registry.lookup(login);
    if (!context) {
      console.warn(`[PairingCoordinator] Ignoring pairing from unregistered login: ${login}`);
      return { status: 'ignored' };
    }

    let platformChanged = false;
    if (context.currentPlatform !== platform) {
      context.currentPlatform = platform;
      platformChanged = true;
      console.log(`[PairingCoordinator] ${login} moved to platform ${platform}`);
      await broadcaster.sendTo(context, { type: ServerEventType.PLATFORM_CHANGED, platform });
    }

    if (product === null) {
      return { status: 'rebound', platformChanged };
    }

    const draft = { login, platform, product };
    const { recordId, previous } = await this.productQueue.run(product, () => store.commitPairing(draft));
    console.log(
      `[PairingCoordinator] Committed #${recordId}: product ${product} → platform ${platform}` +
        (previous ? ` (was #${previous.id} on platform ${previous.platform})` : ''),
    );

    reconciliation.spawn({ recordId, platform, product });

    const pairingEvent: NewPairingEvent = {
      type: ServerEventType.NEW_PAIRING,
      platform,
      product,
      recordId,
      overwrite: previous !== null,
    };
    await broadcaster.sendToPlatform(registry, platform, pairingEvent);

    // Re-scanning onto the platform that already holds it is not a move.
    const moved = previous !== null && previous.platform !== platform;
    if (moved) {
      const movedEvent: ProductMovedEvent = {
        type: ServerEventType.PRODUCT_MOVED,
        product,
        from: previous.platform,
        to: platform,
      };
      await broadcaster.sendToPlatform(registry, previous.platform, movedEvent);
    }

    return { status: 'committed', platformChanged, recordId, previous, moved };
  }
}
