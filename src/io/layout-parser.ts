/**
 * Parse maze layouts from their text format
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

import { Coord } from '../domain/types.js';
import { LAYOUT_EXTENSION, LAYOUTS_DIRECTORY, LAYOUT_SYMBOLS } from '../domain/constants.js';
import { LayoutParseError } from '../domain/errors.js';
import { Layout, createLayout } from '../layout/layout.js';

/**
 * Parse a text layout.
 * Format:
 * ```
 * %%%%%%%
 * %P   .%
 * % %%% %
 * %.   o%
 * %%%%%%%
 * ```
 * Where:
 * - % = Wall
 * - . = Food
 * - o = Capsule
 * - P = Start position (exactly one)
 * - G = Ghost
 * - space = Open
 *
 * The first line is the northmost row.
 */
export function parseLayout(text: string): Layout {
  const lines = text.split('\n').map(line => line.replace(/\r$/, ''));

  // Blank lines around the grid are ignored
  let first = 0;
  let last = lines.length - 1;
  while (first <= last && lines[first].trim() === '') first++;
  while (last >= first && lines[last].trim() === '') last--;

  const rows = lines.slice(first, last + 1);
  if (rows.length === 0) {
    throw new LayoutParseError('Layout is empty');
  }

  const width = rows[0].length;
  const height = rows.length;
  const walls: boolean[][] = Array.from({ length: height }, () => new Array<boolean>(width).fill(false));
  const food: Coord[] = [];
  const capsules: Coord[] = [];
  const ghosts: Coord[] = [];
  let start: Coord | null = null;

  for (let r = 0; r < height; r++) {
    const row = rows[r];
    const lineNumber = first + r + 1;
    if (row.length !== width) {
      throw new LayoutParseError(`Expected ${width} columns, found ${row.length}`, lineNumber);
    }

    const y = height - 1 - r;
    for (let x = 0; x < width; x++) {
      const position = { x, y };

      switch (row[x]) {
        case LAYOUT_SYMBOLS.WALL:
          walls[y][x] = true;
          break;
        case LAYOUT_SYMBOLS.FOOD:
          food.push(position);
          break;
        case LAYOUT_SYMBOLS.CAPSULE:
          capsules.push(position);
          break;
        case LAYOUT_SYMBOLS.GHOST:
          ghosts.push(position);
          break;
        case LAYOUT_SYMBOLS.START:
          if (start !== null) {
            throw new LayoutParseError('Layout has more than one start position', lineNumber);
          }
          start = position;
          break;
        case LAYOUT_SYMBOLS.EMPTY:
          break;
        default:
          throw new LayoutParseError(`Unknown layout symbol '${row[x]}' at column ${x + 1}`, lineNumber);
      }
    }
  }

  if (start === null) {
    throw new LayoutParseError(`Layout has no start position '${LAYOUT_SYMBOLS.START}'`);
  }

  return createLayout(walls, start, { food, capsules, ghosts });
}

/**
 * Directory holding the bundled layouts
 */
export function bundledLayoutsDirectory(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, '..', '..', LAYOUTS_DIRECTORY);
}

/**
 * Load a layout from a file path, or by name from the bundled layouts
 */
export function loadLayout(nameOrPath: string, directory: string = bundledLayoutsDirectory()): Layout {
  const candidates = [
    nameOrPath,
    path.join(directory, nameOrPath),
    path.join(directory, nameOrPath + LAYOUT_EXTENSION),
  ];

  const file = candidates.find(candidate => fs.existsSync(candidate) && fs.statSync(candidate).isFile());
  if (file === undefined) {
    throw new Error(`Layout '${nameOrPath}' not found`);
  }

  return parseLayout(fs.readFileSync(file, 'utf-8'));
}

/**
 * Names of the bundled layouts, sorted
 */
export function listBundledLayouts(directory: string = bundledLayoutsDirectory()): string[] {
  return fs.readdirSync(directory)
    .filter(file => file.endsWith(LAYOUT_EXTENSION))
    .map(file => file.slice(0, -LAYOUT_EXTENSION.length))
    .sort();
}
