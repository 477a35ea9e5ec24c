// Re-export all protocol types

export * from './common.js';
export * from './versions.js';
export * from './models.js';
export * from './changesets.js';
