export * from './enums.js';
export * from './encounter.js';
export * from './narrative.js';
export * from './consequence.js';
export * from './standing.js';
export * from './session-state.js';
