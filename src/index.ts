/*
 * Main entry point for the transposition-search package
 * Re-exports all public APIs
 */

export * from './errors.js';
export * from './search-types.js';
export { SearchNode } from './search-node.js';
export * from './transposition-table.js';
export { SearchTree } from './search-tree.js';
export * from './strategies/index.js';
export * from './modular/index.js';
export * from './adapters/tictactoe/index.js';
export * from './utils/tree-debug.js';
