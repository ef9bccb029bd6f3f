/**
 * Heuristic functions for A* search.
 * Each returns a non-negative lower bound on the remaining cost.
 */

import { Coord, euclideanDistance, manhattanDistance } from '../domain/types.js';
import { PositionSearchProblem } from '../problems/position-problem.js';
import { CornersProblem } from '../problems/corners-problem.js';
import { FoodSearchProblem } from '../problems/food-problem.js';
import { CornerState, unvisitedCorners } from '../state/corner-state.js';
import { FoodState } from '../state/food-state.js';

/**
 * Trivial heuristic; turns A* into uniform-cost search
 */
export function nullHeuristic(): number {
  return 0;
}

export function manhattanHeuristic(position: Coord, problem: PositionSearchProblem): number {
  return manhattanDistance(position, problem.goal);
}

export function euclideanHeuristic(position: Coord, problem: PositionSearchProblem): number {
  return euclideanDistance(position, problem.goal);
}

/**
 * Manhattan distance to the nearest unvisited corner.
 *
 * Walls can only lengthen the real route to that corner, and every
 * remaining corner still has to be reached, so this never overestimates.
 * One step moves the position by 1, so the value drops by at most 1.
 */
export function cornersHeuristic(state: CornerState, problem: CornersProblem): number {
  const remaining = unvisitedCorners(state, problem.corners);
  if (remaining.length === 0) return 0;

  return Math.min(...remaining.map(corner => manhattanDistance(state.position, corner)));
}

/**
 * Manhattan distance to the farthest remaining food.
 *
 * Admissible, since that food must still be reached, but it pulls the
 * search toward distant food and leaves nearby items for late
 * backtracking. Expansion counts grow quickly on food-dense layouts.
 */
export function foodHeuristic(state: FoodState, problem: FoodSearchProblem): number {
  return farthestFoodDistance(state, problem, manhattanDistance);
}

/**
 * Largest `distance` from the current position to any remaining food
 */
export function farthestFoodDistance(
  state: FoodState,
  problem: FoodSearchProblem,
  distance: (a: Coord, b: Coord) => number
): number {
  let farthest = 0;
  for (const food of problem.remainingFood(state)) {
    farthest = Math.max(farthest, distance(state.position, food));
  }
  return farthest;
}
