/**
 * Search state for the corner-coverage problem
 */

import { Coord, coordKey, coordsEqual } from '../domain/types.js';

export const ALL_CORNERS_MASK = 0b1111;

export interface CornerState {
  readonly position: Coord;
  readonly visited: number; // bit i set when corners[i] has been reached
}

export function createCornerState(position: Coord, corners: readonly Coord[]): CornerState {
  return { position, visited: markCorner(0, position, corners) };
}

/**
 * Return the visited mask after standing on `position`.
 * Bits are only ever added.
 */
export function markCorner(visited: number, position: Coord, corners: readonly Coord[]): number {
  let mask = visited;
  corners.forEach((corner, i) => {
    if (coordsEqual(corner, position)) {
      mask |= 1 << i;
    }
  });
  return mask;
}

export function isCornerVisited(state: CornerState, index: number): boolean {
  return (state.visited & (1 << index)) !== 0;
}

export function unvisitedCorners(state: CornerState, corners: readonly Coord[]): Coord[] {
  return corners.filter((_, i) => !isCornerVisited(state, i));
}

export function allCornersVisited(state: CornerState): boolean {
  return state.visited === ALL_CORNERS_MASK;
}

export function hashCornerState(state: CornerState): string {
  return `${coordKey(state.position)}|${state.visited}`;
}
