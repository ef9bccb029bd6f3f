/**
 * Direction helpers
 */

import { Coord, Direction } from './types.js';
import { DIRECTION_VECTORS } from './constants.js';

/**
 * Move one step from a coordinate
 */
export function step(from: Coord, direction: Direction): Coord {
  const vector = DIRECTION_VECTORS[direction];
  return { x: from.x + vector.x, y: from.y + vector.y };
}

/**
 * Parse a direction name, accepting any case and single-letter forms
 */
export function parseDirection(text: string): Direction | null {
  switch (text.trim().toUpperCase()) {
    case 'N':
    case 'NORTH':
      return 'NORTH';
    case 'S':
    case 'SOUTH':
      return 'SOUTH';
    case 'E':
    case 'EAST':
      return 'EAST';
    case 'W':
    case 'WEST':
      return 'WEST';
    default:
      return null;
  }
}

/**
 * Parse a comma- or space-separated action list such as "N,N,east"
 */
export function parseDirections(text: string): Direction[] {
  const tokens = text.split(/[\s,]+/).filter(token => token !== '');

  return tokens.map(token => {
    const direction = parseDirection(token);
    if (direction === null) {
      throw new Error(`Unknown action '${token}'`);
    }
    return direction;
  });
}
