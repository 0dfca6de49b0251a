/**
 * ReconciliationSupervisor - fire-and-forget propagation of committed
 * pairings to the legacy system.
 *
 * One task per committed record. The caller never waits on it. Each task
 * settles its record exactly once: success when the legacy save is
 * accepted, failure (with a diagnostic) when it is rejected or throws.
 * There is no retry and no timeout. Tasks still running at shutdown are
 * abandoned and their records stay pending.
 */

import type { LegacySink } from '../legacy/types.js';
import type { PairingStore } from '../storage/types.js';

export interface ReconciliationJob {
  recordId: number;
  platform: number;
  product: number;
}

export const LEGACY_REJECTED_MESSAGE = 'Legacy system rejected the pairing';

export class ReconciliationSupervisor {
  private inFlight = new Set<Promise<void>>();
  private succeeded = 0;
  private failed = 0;
  private abandoned = false;

  constructor(
    private readonly store: Pick<PairingStore, 'updateStatus'>,
    private readonly sink: LegacySink,
  ) {}

  /**
   * Start reconciling a record and return immediately.
   */
  spawn(job: ReconciliationJob): void {
    if (this.abandoned) {
      console.warn(`[Reconciliation] Supervisor stopped; record #${job.recordId} stays pending`);
      return;
    }
    const task = this.reconcile(job);
    this.inFlight.add(task);
    void task.finally(() => {
      this.inFlight.delete(task);
    });
  }

  /**
   * Wait for every task started so far (and any they leave behind) to settle.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  /**
   * Stop accepting work and forget running tasks.
   */
  abandon(): number {
    const count = this.inFlight.size;
    this.abandoned = true;
    this.inFlight.clear();
    if (count > 0) {
      console.warn(`[Reconciliation] Abandoning ${count} in-flight task(s); their records stay pending`);
    }
    return count;
  }

  /**
   * Get stats for monitoring.
   */
  getStats(): { inFlight: number; succeeded: number; failed: number } {
    return { inFlight: this.inFlight.size, succeeded: this.succeeded, failed: this.failed };
  }

  private async reconcile(job: ReconciliationJob): Promise<void> {
    let saved = false;
    let diagnostic: string | null = null;
    try {
      saved = await this.sink.attemptSave(job.platform, job.product);
      if (!saved) diagnostic = LEGACY_REJECTED_MESSAGE;
    } catch (err) {
      diagnostic = err instanceof Error ? err.message : String(err);
    }

    if (saved) {
      this.succeeded++;
    } else {
      this.failed++;
      console.error(`[Reconciliation] Record #${job.recordId} failed: ${diagnostic}`);
    }

    try {
      await this.store.updateStatus(job.recordId, saved ? 'success' : 'failure', diagnostic);
    } catch (err) {
      console.error(`[Reconciliation] Could not store status for record #${job.recordId}:`, err);
    }
  }
}
