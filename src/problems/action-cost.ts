/**
 * Replay cost of an action sequence on a layout
 */

import { Coord, CostFunction, Direction } from '../domain/types.js';
import { step } from '../domain/directions.js';
import { Layout, isWall } from '../layout/layout.js';

export const uniformCost: CostFunction = () => 1;

/**
 * Sum step costs from `start`; Infinity if any move hits a wall
 */
export function costOfActions(
  layout: Layout,
  start: Coord,
  actions: readonly Direction[],
  costFn: CostFunction = uniformCost
): number {
  let position = start;
  let cost = 0;

  for (const action of actions) {
    position = step(position, action);
    if (isWall(layout, position)) return Infinity;
    cost += costFn(position);
  }

  return cost;
}
