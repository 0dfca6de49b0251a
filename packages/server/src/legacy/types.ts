/**
 * Contracts of the legacy system of record.
 */

export interface LegacyUser {
  id: number;
  login: string;
  fullName: string;
}

/** User directory kept by the legacy system. */
export interface LegacyDirectory {
  findUser(login: string): Promise<LegacyUser | null>;
}

/**
 * Destination for committed pairings.
 * Latency is unbounded; a rejected save resolves to false, a broken
 * transport rejects.
 */
export interface LegacySink {
  attemptSave(platform: number, product: number): Promise<boolean>;
}
