// Types
export type * from './types/telemetry.js';
export type * from './types/flight.js';
export type * from './types/protocol.js';

// Utilities
export * from './utils/geo.js';
export * from './utils/units.js';
export * from './utils/aviation.js';
export * from './utils/session.js';
