/**
 * Format solutions for human-readable output
 */

import { Coord, Direction, Solution, coordKey } from '../domain/types.js';
import { LAYOUT_SYMBOLS } from '../domain/constants.js';
import { step } from '../domain/directions.js';
import { Layout } from '../layout/layout.js';

const PATH_SYMBOL = '*';

/**
 * Format a complete solution for console output
 */
export function formatSolution(solution: Solution): string {
  const lines: string[] = [];

  lines.push(solution.summary);
  lines.push('');

  if (solution.found) {
    lines.push('=== ACTIONS ===');
    lines.push(solution.actions.length === 0 ? '(already at goal)' : formatActions(solution.actions));
    lines.push('');
  }

  // Search stats
  lines.push('=== SEARCH STATISTICS ===');
  lines.push(`Nodes Expanded: ${solution.stats.nodesExpanded.toLocaleString()}`);
  lines.push(`Time Taken: ${solution.stats.timeTaken}ms`);
  lines.push(`Optimality Guarantee: ${solution.stats.optimalityGuarantee ? 'Yes' : 'No'}`);

  return lines.join('\n');
}

/**
 * Run-length encode an action list, e.g. "NORTH x3, EAST"
 */
export function formatActions(actions: readonly Direction[]): string {
  const parts: string[] = [];
  let i = 0;

  while (i < actions.length) {
    let run = 1;
    while (i + run < actions.length && actions[i + run] === actions[i]) run++;
    parts.push(run === 1 ? actions[i] : `${actions[i]} x${run}`);
    i += run;
  }

  return parts.join(', ');
}

/**
 * Cells visited when walking `actions` from `start`, start included
 */
export function tracePath(start: Coord, actions: readonly Direction[]): Coord[] {
  const cells: Coord[] = [start];
  let position = start;
  for (const action of actions) {
    position = step(position, action);
    cells.push(position);
  }
  return cells;
}

/**
 * Format a layout as ASCII, optionally overlaying a walked path.
 * Food on the path counts as eaten.
 */
export function formatGrid(layout: Layout, actions: readonly Direction[] = []): string {
  const onPath = new Set(tracePath(layout.start, actions).map(coordKey));
  const food = new Set(layout.food.map(coordKey));
  const capsules = new Set(layout.capsules.map(coordKey));
  const ghosts = new Set(layout.ghosts.map(coordKey));
  const startKey = coordKey(layout.start);

  const lines: string[] = [];

  // Northmost row first, matching the layout text
  for (let y = layout.height - 1; y >= 0; y--) {
    let row = '';

    for (let x = 0; x < layout.width; x++) {
      const key = coordKey({ x, y });

      if (layout.walls[y][x]) {
        row += LAYOUT_SYMBOLS.WALL;
      } else if (key === startKey) {
        row += LAYOUT_SYMBOLS.START;
      } else if (onPath.has(key)) {
        row += PATH_SYMBOL;
      } else if (ghosts.has(key)) {
        row += LAYOUT_SYMBOLS.GHOST;
      } else if (food.has(key)) {
        row += LAYOUT_SYMBOLS.FOOD;
      } else if (capsules.has(key)) {
        row += LAYOUT_SYMBOLS.CAPSULE;
      } else {
        row += LAYOUT_SYMBOLS.EMPTY;
      }
    }

    lines.push(row);
  }

  return lines.join('\n');
}

/**
 * Format a compact solution summary
 */
export function formatCompactSummary(solution: Solution): string {
  const status = solution.found ? '✓ SOLVED' : '✗ NO PATH';
  return `${status} | ${solution.strategy} | ${solution.actions.length} actions | cost ${solution.cost} | ${solution.stats.nodesExpanded} expanded`;
}

/**
 * Format solution as JSON
 */
export function formatSolutionJSON(solution: Solution): string {
  return JSON.stringify({
    found: solution.found,
    strategy: solution.strategy,
    cost: solution.cost,
    stepsCount: solution.actions.length,
    actions: solution.actions,
    stats: solution.stats,
  }, null, 2);
}
