/**
 * Solver module exports
 */

export * from './search-node.js';
export * from './frontier.js';
export * from './heuristics.js';
export * from './graph-search.js';
export * from './maze-distance.js';
export * from './closest-dot.js';
export * from './replay.js';
export * from './solver.js';
