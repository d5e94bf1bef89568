// Export all modular search components
export { SearchEngine } from './search-engine.js';
export type { SearchEngineComponents } from './search-engine.js';
export * from './expansion.js';
export * from './expansion-control.js';
export * from './pruning.js';
export * from './scoring.js';
export * from './search-config.js';
