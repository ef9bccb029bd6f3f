/**
 * True walking distances through the maze
 */

import { Coord, Heuristic, coordKey } from '../domain/types.js';
import { Layout, isWall } from '../layout/layout.js';
import { PositionSearchProblem } from '../problems/position-problem.js';
import { FoodSearchProblem } from '../problems/food-problem.js';
import { FoodState } from '../state/food-state.js';
import { breadthFirstSearch } from './graph-search.js';
import { farthestFoodDistance } from './heuristics.js';

/**
 * Length of the shortest walk between two open cells, or Infinity when
 * they are not connected
 */
export function mazeDistance(layout: Layout, from: Coord, to: Coord): number {
  if (isWall(layout, from)) {
    throw new Error(`Point (${from.x}, ${from.y}) is a wall`);
  }
  if (isWall(layout, to)) {
    throw new Error(`Point (${to.x}, ${to.y}) is a wall`);
  }

  const result = breadthFirstSearch(new PositionSearchProblem(layout, { start: from, goal: to }));
  return result.found ? result.actions.length : Infinity;
}

/**
 * Maze distance to the farthest remaining food.
 * Distances are memoised inside the returned function, so create one
 * per layout.
 */
export function createMazeFoodHeuristic(): Heuristic<FoodState, FoodSearchProblem> {
  const cache = new Map<string, number>();

  return (state, problem) =>
    farthestFoodDistance(state, problem, (from, to) => {
      const key = `${coordKey(from)}>${coordKey(to)}`;
      let distance = cache.get(key);
      if (distance === undefined) {
        distance = mazeDistance(problem.layout, from, to);
        cache.set(key, distance);
      }
      return distance;
    });
}
