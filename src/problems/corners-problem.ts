/**
 * Corner-coverage problem: reach all four inner corners of the layout
 */

import { Coord, Direction, SearchProblem, Successor } from '../domain/types.js';
import { Layout, getCorners, getLegalMoves } from '../layout/layout.js';
import {
  CornerState,
  allCornersVisited,
  createCornerState,
  hashCornerState,
  markCorner,
} from '../state/corner-state.js';
import { costOfActions } from './action-cost.js';

export class CornersProblem implements SearchProblem<CornerState> {
  readonly corners: readonly Coord[];

  constructor(readonly layout: Layout, corners: readonly Coord[] = getCorners(layout)) {
    if (corners.length !== 4) {
      throw new Error(`Expected 4 corners, got ${corners.length}`);
    }
    this.corners = corners;
  }

  getStartState(): CornerState {
    return createCornerState(this.layout.start, this.corners);
  }

  isGoalState(state: CornerState): boolean {
    return allCornersVisited(state);
  }

  getSuccessors(state: CornerState): Successor<CornerState>[] {
    return getLegalMoves(this.layout, state.position).map(move => ({
      state: {
        position: move.position,
        visited: markCorner(state.visited, move.position, this.corners),
      },
      action: move.direction,
      cost: 1,
    }));
  }

  getCostOfActions(actions: readonly Direction[]): number {
    return costOfActions(this.layout, this.layout.start, actions);
  }

  hashState(state: CornerState): string {
    return hashCornerState(state);
  }
}
