/**
 * Search state for the full-coverage problem.
 *
 * Remaining food is a bitmask over the layout's food list: bit i is set
 * while layout.food[i] is uneaten.
 */

import { Coord, coordKey } from '../domain/types.js';

export interface FoodState {
  readonly position: Coord;
  readonly remaining: bigint;
}

/**
 * Maps food coordinates to bit indices
 */
export class FoodIndex {
  private readonly indexByKey = new Map<string, number>();

  constructor(readonly items: readonly Coord[]) {
    items.forEach((item, i) => this.indexByKey.set(coordKey(item), i));
  }

  indexOf(coord: Coord): number | undefined {
    return this.indexByKey.get(coordKey(coord));
  }

  fullMask(): bigint {
    return (1n << BigInt(this.items.length)) - 1n;
  }

  /**
   * Clear the bit for `coord`, if it is a food cell
   */
  eat(remaining: bigint, coord: Coord): bigint {
    const index = this.indexOf(coord);
    if (index === undefined) return remaining;
    return remaining & ~(1n << BigInt(index));
  }

  has(remaining: bigint, coord: Coord): boolean {
    const index = this.indexOf(coord);
    return index !== undefined && (remaining & (1n << BigInt(index))) !== 0n;
  }

  toCoords(remaining: bigint): Coord[] {
    return this.items.filter((_, i) => (remaining & (1n << BigInt(i))) !== 0n);
  }
}

export function createFoodState(position: Coord, index: FoodIndex): FoodState {
  return { position, remaining: index.eat(index.fullMask(), position) };
}

export function countRemaining(remaining: bigint): number {
  let count = 0;
  let mask = remaining;
  while (mask !== 0n) {
    mask &= mask - 1n;
    count++;
  }
  return count;
}

export function hashFoodState(state: FoodState): string {
  return `${coordKey(state.position)}|${state.remaining.toString(16)}`;
}
