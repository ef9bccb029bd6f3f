/**
 * Greedy full coverage: repeatedly walk to the nearest food
 */

import { Coord, Direction, coordKey } from '../domain/types.js';
import { step } from '../domain/directions.js';
import { Layout } from '../layout/layout.js';
import { AnyFoodSearchProblem } from '../problems/food-problem.js';
import { createFrontier, graphSearch } from './graph-search.js';

// Observes expansions across every leg; the count is cumulative
export type ExpansionObserver = (position: Coord, expanded: number) => void;

export interface ClosestDotResult {
  found: boolean;
  actions: Direction[];
  nodesExpanded: number;
  remaining: Coord[];
}

/**
 * Shortest path from `position` to the nearest cell in `food`
 */
export function findPathToClosestDot(
  layout: Layout,
  position: Coord,
  food: readonly Coord[],
  onExpand?: ExpansionObserver
): { found: boolean; actions: Direction[]; nodesExpanded: number } {
  const problem = new AnyFoodSearchProblem(layout, position, food);
  const result = graphSearch(problem, createFrontier<Coord>('bfs'), { onExpand });
  return { found: result.found, actions: result.actions, nodesExpanded: result.nodesExpanded };
}

/**
 * Eat every reachable food item, nearest first. Not optimal.
 * Stops with `found: false` when some food cannot be reached.
 */
export function closestDotSearch(layout: Layout, onExpand?: ExpansionObserver): ClosestDotResult {
  let remaining = layout.food.filter(f => coordKey(f) !== coordKey(layout.start));
  let position = layout.start;
  const actions: Direction[] = [];
  let nodesExpanded = 0;

  while (remaining.length > 0) {
    const before = nodesExpanded;
    const leg = findPathToClosestDot(
      layout,
      position,
      remaining,
      onExpand && ((state: Coord, expanded: number) => onExpand(state, before + expanded))
    );
    nodesExpanded += leg.nodesExpanded;

    if (!leg.found) {
      return { found: false, actions, nodesExpanded, remaining };
    }

    // Every cell walked over is eaten, not just the leg's target
    for (const action of leg.actions) {
      position = step(position, action);
      const here = coordKey(position);
      remaining = remaining.filter(f => coordKey(f) !== here);
    }
    actions.push(...leg.actions);
  }

  return { found: true, actions, nodesExpanded, remaining };
}
