/**
 * Constants for the grid search solver
 */

import { Coord, Direction } from './types.js';

// Successors are always generated in this order
export const DIRECTIONS: readonly Direction[] = ['NORTH', 'SOUTH', 'EAST', 'WEST'];

export const DIRECTION_VECTORS: Record<Direction, Coord> = {
  NORTH: { x: 0, y: 1 },
  SOUTH: { x: 0, y: -1 },
  EAST: { x: 1, y: 0 },
  WEST: { x: -1, y: 0 },
};

// Layout text symbols
export const LAYOUT_SYMBOLS = {
  WALL: '%',
  FOOD: '.',
  CAPSULE: 'o',
  START: 'P',
  GHOST: 'G',
  EMPTY: ' ',
} as const;

// Default goal of a position search
export const DEFAULT_POSITION_GOAL: Coord = { x: 1, y: 1 };

// Default solver options
export const DEFAULT_SOLVER_OPTIONS = {
  strategy: 'bfs' as const,
  maxExpansions: Infinity,
};

// Where bundled layouts live, relative to the package root
export const LAYOUTS_DIRECTORY = 'layouts';
export const LAYOUT_EXTENSION = '.lay';
