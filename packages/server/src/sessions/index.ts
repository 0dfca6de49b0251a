/**
 * Sessions module: per-login connection bookkeeping and fan-out.
 */

export {
  type ConnectionId,
  type IdentityKey,
  type ClientConnection,
  type IdentityMetadata,
  type DeliveryOutcome,
  generateConnectionId,
} from './types.js';
export { IdentityContext } from './identity-context.js';
export { Broadcaster, type PlatformDirectory } from './broadcaster.js';
export { SessionRegistry, type PlatformHintSource } from './session-registry.js';
