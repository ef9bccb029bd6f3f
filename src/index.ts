/**
 * Grid Search Solver
 *
 * Graph search over maze layouts: single-goal navigation, corner
 * coverage and full food coverage under DFS, BFS, uniform-cost and A*.
 */

// Domain exports
export * from './domain/types.js';
export * from './domain/constants.js';
export * from './domain/directions.js';
export * from './domain/errors.js';

// Layout exports
export * from './layout/layout.js';

// State exports
export * from './state/corner-state.js';
export * from './state/food-state.js';

// Problem exports
export * from './problems/action-cost.js';
export * from './problems/position-problem.js';
export * from './problems/corners-problem.js';
export * from './problems/food-problem.js';

// Solver exports
export * from './solver/index.js';

// I/O exports
export * from './io/layout-parser.js';
export * from './io/solution-formatter.js';
