/**
 * Pairing store contract.
 */

import type { PairingRecord } from '@scanlink/shared';
import type { PlatformHintSource } from '../sessions/session-registry.js';

export interface PairingDraft {
  login: string;
  platform: number;
  product: number;
  /** Defaults to now. */
  scannedAt?: Date;
}

/** The record that held a product before a new commit took it over. */
export interface PreviousHolder {
  id: number;
  platform: number;
}

export interface CommitResult {
  recordId: number;
  previous: PreviousHolder | null;
}

export type TerminalSyncStatus = 'success' | 'failure';

/**
 * Persistence for pairing records. The store is the single arbiter of which
 * record currently holds a product.
 */
export interface PairingStore extends PlatformHintSource {
  /**
   * Mark the most recent record for `product` as overwritten and return it,
   * or null when the product has never been paired.
   */
  findAndMarkOverwritten(product: number): Promise<PreviousHolder | null>;

  /** Insert a fresh record (overwrite = false, pending) and return its id. */
  insert(draft: PairingDraft): Promise<number>;

  /**
   * `findAndMarkOverwritten` followed by `insert` as one transaction.
   * Either both take effect or neither does.
   */
  commitPairing(draft: PairingDraft): Promise<CommitResult>;

  /**
   * Move a pending record to a terminal status.
   * Returns false when the record is missing or no longer pending.
   */
  updateStatus(id: number, status: TerminalSyncStatus, error?: string | null): Promise<boolean>;

  getRecord(id: number): Promise<PairingRecord | null>;

  ping(): Promise<boolean>;

  close(): Promise<void>;
}
