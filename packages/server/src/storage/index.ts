export type {
  PairingStore,
  PairingDraft,
  PreviousHolder,
  CommitResult,
  TerminalSyncStatus,
} from './types.js';
export { SqlitePairingStore } from './sqlite-pairing-store.js';
