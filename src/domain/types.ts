/**
 * Core type definitions for the grid search solver
 */

// Movement actions available to the agent
export type Direction = 'NORTH' | 'SOUTH' | 'EAST' | 'WEST';

// Coordinate on the layout (x grows east, y grows north, (0, 0) bottom-left)
export interface Coord {
  x: number;
  y: number;
}

// One legal transition out of a state
export interface Successor<S> {
  state: S;
  action: Direction;
  cost: number;
}

/**
 * Contract every state space exposes to the search strategies.
 * Implementations are read-only after construction.
 */
export interface SearchProblem<S> {
  getStartState(): S;
  isGoalState(state: S): boolean;
  getSuccessors(state: S): Successor<S>[];
  getCostOfActions(actions: readonly Direction[]): number;
  /** Value key for a state; two states are equal iff their keys are. */
  hashState(state: S): string;
}

// Lower-bound estimate of remaining cost from a state
export type Heuristic<S, P extends SearchProblem<S> = SearchProblem<S>> = (
  state: S,
  problem: P
) => number;

// Expansion order of the frontier
export type SearchStrategy = 'dfs' | 'bfs' | 'ucs' | 'astar';

// Which problem a layout is turned into
export type ProblemKind = 'position' | 'corners' | 'food';

// Step cost as a function of the destination position
export type CostFunction = (position: Coord) => number;

// Result of a single graph search run
export interface SearchResult {
  found: boolean;
  actions: Direction[];
  cost: number;
  nodesExpanded: number;
}

// Search statistics
export interface SearchStats {
  nodesExpanded: number;
  timeTaken: number;
  optimalityGuarantee: boolean;
}

// Solver options
export interface SolverOptions {
  strategy: SearchStrategy;
  maxExpansions: number;
}

// Complete solution
export interface Solution<S = unknown> {
  found: boolean;
  strategy: SearchStrategy | 'closest-dot';
  actions: Direction[];
  cost: number;
  finalState: S;
  stats: SearchStats;
  summary: string;
}

// Helper type for coordinate key
export function coordKey(c: Coord): string {
  return `${c.x},${c.y}`;
}

export function coordsEqual(a: Coord, b: Coord): boolean {
  return a.x === b.x && a.y === b.y;
}

export function manhattanDistance(a: Coord, b: Coord): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function euclideanDistance(a: Coord, b: Coord): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}
