/**
 * Single-goal navigation problem
 */

import {
  Coord,
  CostFunction,
  Direction,
  SearchProblem,
  Successor,
  coordKey,
  coordsEqual,
} from '../domain/types.js';
import { DEFAULT_POSITION_GOAL } from '../domain/constants.js';
import { Layout, getLegalMoves } from '../layout/layout.js';
import { costOfActions, uniformCost } from './action-cost.js';

export interface PositionProblemConfig {
  goal?: Coord;
  start?: Coord;
  costFn?: CostFunction;
}

/**
 * Cost function that makes eastern cells cheap
 */
export const stayEastCost: CostFunction = position => 0.5 ** position.x;

/**
 * Cost function that makes western cells cheap
 */
export const stayWestCost: CostFunction = position => 2 ** position.x;

export class PositionSearchProblem implements SearchProblem<Coord> {
  readonly goal: Coord;
  readonly start: Coord;
  protected readonly costFn: CostFunction;

  constructor(readonly layout: Layout, config: PositionProblemConfig = {}) {
    this.goal = config.goal ?? DEFAULT_POSITION_GOAL;
    this.start = config.start ?? layout.start;
    this.costFn = config.costFn ?? uniformCost;
  }

  getStartState(): Coord {
    return this.start;
  }

  isGoalState(state: Coord): boolean {
    return coordsEqual(state, this.goal);
  }

  getSuccessors(state: Coord): Successor<Coord>[] {
    return getLegalMoves(this.layout, state).map(move => ({
      state: move.position,
      action: move.direction,
      cost: this.costFn(move.position),
    }));
  }

  getCostOfActions(actions: readonly Direction[]): number {
    return costOfActions(this.layout, this.start, actions, this.costFn);
  }

  hashState(state: Coord): string {
    return coordKey(state);
  }
}
