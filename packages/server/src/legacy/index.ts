export type { LegacyUser, LegacyDirectory, LegacySink } from './types.js';
export { SimulatedLegacySystem, type SimulatedLegacySystemOptions } from './simulated-legacy-system.js';
