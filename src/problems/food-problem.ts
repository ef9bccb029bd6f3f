/**
 * Full-coverage problem: eat every food item on the layout
 */

import { Coord, Direction, SearchProblem, Successor, coordKey } from '../domain/types.js';
import { Layout, getLegalMoves } from '../layout/layout.js';
import { FoodIndex, FoodState, createFoodState, hashFoodState } from '../state/food-state.js';
import { costOfActions } from './action-cost.js';
import { PositionSearchProblem } from './position-problem.js';

export class FoodSearchProblem implements SearchProblem<FoodState> {
  readonly food: FoodIndex;

  constructor(readonly layout: Layout) {
    this.food = new FoodIndex(layout.food);
  }

  getStartState(): FoodState {
    return createFoodState(this.layout.start, this.food);
  }

  isGoalState(state: FoodState): boolean {
    return state.remaining === 0n;
  }

  getSuccessors(state: FoodState): Successor<FoodState>[] {
    return getLegalMoves(this.layout, state.position).map(move => ({
      state: {
        position: move.position,
        remaining: this.food.eat(state.remaining, move.position),
      },
      action: move.direction,
      cost: 1,
    }));
  }

  getCostOfActions(actions: readonly Direction[]): number {
    return costOfActions(this.layout, this.layout.start, actions);
  }

  hashState(state: FoodState): string {
    return hashFoodState(state);
  }

  remainingFood(state: FoodState): Coord[] {
    return this.food.toCoords(state.remaining);
  }
}

/**
 * Position search whose goal is any cell still holding food
 */
export class AnyFoodSearchProblem extends PositionSearchProblem {
  private readonly foodKeys: Set<string>;

  constructor(layout: Layout, start: Coord = layout.start, food: readonly Coord[] = layout.food) {
    super(layout, { start });
    this.foodKeys = new Set(food.map(coordKey));
  }

  override isGoalState(state: Coord): boolean {
    return this.foodKeys.has(coordKey(state));
  }
}
