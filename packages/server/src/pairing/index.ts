export {
  PairingCoordinator,
  type PairingCoordinatorDeps,
  type PairingOutcome,
} from './pairing-coordinator.js';
