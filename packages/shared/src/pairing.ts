/**
 * Pairing record types shared with dashboards.
 */

export const SyncStatus = {
  PENDING: 'pending',
  SUCCESS: 'success',
  FAILURE: 'failure',
} as const;

export type SyncStatus = (typeof SyncStatus)[keyof typeof SyncStatus];

/** A committed (platform, product) association. */
export interface PairingRecord {
  id: number;
  login: string;
  platform: number;
  product: number;
  /** ISO-8601 commit time. */
  scannedAt: string;
  /** Set once a later record claims the same product. */
  overwritten: boolean;
  syncStatus: SyncStatus;
  syncError: string | null;
}

export function isTerminalStatus(status: SyncStatus): boolean {
  return status !== SyncStatus.PENDING;
}
