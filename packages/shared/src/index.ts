export * from './events.js';
export * from './roles.js';
export * from './pairing.js';
