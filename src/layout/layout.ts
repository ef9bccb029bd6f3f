/**
 * Maze layout representation
 */

import { Coord, Direction, coordKey } from '../domain/types.js';
import { DIRECTIONS } from '../domain/constants.js';
import { step } from '../domain/directions.js';

export interface Layout {
  width: number;
  height: number;
  walls: boolean[][]; // walls[y][x]
  food: Coord[];      // sorted by x, then y
  capsules: Coord[];
  ghosts: Coord[];
  start: Coord;
}

export interface LegalMove {
  direction: Direction;
  position: Coord;
}

/**
 * Build a layout from a wall grid and item positions.
 * Food is de-duplicated and re-sorted so its index order never depends
 * on input order.
 */
export function createLayout(
  walls: boolean[][],
  start: Coord,
  items: { food?: Coord[]; capsules?: Coord[]; ghosts?: Coord[] } = {}
): Layout {
  const height = walls.length;
  const width = height > 0 ? walls[0].length : 0;
  const food = new Map((items.food ?? []).map((f): [string, Coord] => [coordKey(f), f]));

  return {
    width,
    height,
    walls,
    food: [...food.values()].sort((a, b) => a.x - b.x || a.y - b.y),
    capsules: items.capsules ?? [],
    ghosts: items.ghosts ?? [],
    start,
  };
}

export function isInside(layout: Layout, coord: Coord): boolean {
  return coord.x >= 0 && coord.x < layout.width && coord.y >= 0 && coord.y < layout.height;
}

/**
 * Cells outside the layout count as walls
 */
export function isWall(layout: Layout, coord: Coord): boolean {
  if (!isInside(layout, coord)) return true;
  return layout.walls[coord.y][coord.x];
}

/**
 * Moves that do not run into a wall, in NORTH, SOUTH, EAST, WEST order
 */
export function getLegalMoves(layout: Layout, from: Coord): LegalMove[] {
  const moves: LegalMove[] = [];

  for (const direction of DIRECTIONS) {
    const position = step(from, direction);
    if (!isWall(layout, position)) {
      moves.push({ direction, position });
    }
  }

  return moves;
}

/**
 * The four inner corners, just inside the outer wall
 */
export function getCorners(layout: Layout): [Coord, Coord, Coord, Coord] {
  const top = layout.height - 2;
  const right = layout.width - 2;
  return [
    { x: 1, y: 1 },
    { x: 1, y: top },
    { x: right, y: 1 },
    { x: right, y: top },
  ];
}

/**
 * Count open (non-wall) cells
 */
export function countOpenCells(layout: Layout): number {
  let count = 0;
  for (const row of layout.walls) {
    for (const wall of row) {
      if (!wall) count++;
    }
  }
  return count;
}

/**
 * Open cells not reachable from the start
 */
export function findUnreachableCells(layout: Layout): Coord[] {
  const seen = new Set<string>([coordKey(layout.start)]);
  const queue: Coord[] = [layout.start];

  for (let head = 0; head < queue.length; head++) {
    for (const move of getLegalMoves(layout, queue[head])) {
      const key = coordKey(move.position);
      if (!seen.has(key)) {
        seen.add(key);
        queue.push(move.position);
      }
    }
  }

  const unreachable: Coord[] = [];
  for (let y = 0; y < layout.height; y++) {
    for (let x = 0; x < layout.width; x++) {
      if (!layout.walls[y][x] && !seen.has(coordKey({ x, y }))) {
        unreachable.push({ x, y });
      }
    }
  }
  return unreachable;
}
