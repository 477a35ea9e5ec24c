// Re-export all schema tables
export * from './versions.js';
