// Re-export all protocol types

export * from './common.js';
export * from './tables.js';
export * from './overrides.js';
export * from './diagnostics.js';
