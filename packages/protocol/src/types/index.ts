// Re-export all protocol types

export * from './common.js';
export * from './handlers.js';
export * from './owners.js';
export * from './config.js';
