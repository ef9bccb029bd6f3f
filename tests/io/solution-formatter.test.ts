/**
 * Tests for solution output
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  formatActions,
  formatCompactSummary,
  formatGrid,
  formatSolution,
  formatSolutionJSON,
  tracePath,
} from '../../src/io/solution-formatter.js';
import { Direction, Solution } from '../../src/domain/types.js';
import { fixture } from '../helpers.js';

const RING_WALK: Direction[] = ['NORTH', 'NORTH', 'EAST', 'EAST', 'EAST', 'EAST', 'SOUTH', 'SOUTH'];

function makeSolution(overrides: Partial<Solution> = {}): Solution {
  return {
    found: true,
    strategy: 'bfs',
    actions: RING_WALK,
    cost: 8,
    finalState: null,
    stats: { nodesExpanded: 12, timeTaken: 5, optimalityGuarantee: false },
    summary: '=== PATH FOUND ===',
    ...overrides,
  };
}

describe('Action Formatting', () => {
  it('should collapse repeated actions', () => {
    assert.strictEqual(formatActions(RING_WALK), 'NORTH x2, EAST x4, SOUTH x2');
    assert.strictEqual(formatActions(['WEST', 'EAST', 'EAST']), 'WEST, EAST x2');
    assert.strictEqual(formatActions([]), '');
  });

  it('should trace every visited cell', () => {
    assert.deepStrictEqual(tracePath({ x: 1, y: 1 }, ['NORTH', 'EAST']), [
      { x: 1, y: 1 },
      { x: 1, y: 2 },
      { x: 2, y: 2 },
    ]);
  });
});

describe('Grid Formatting', () => {
  it('should reproduce the layout text without a path', () => {
    assert.strictEqual(formatGrid(fixture('tiny-search')), [
      '%%%%%%%',
      '%.   .%',
      '% %%% %',
      '%P   .%',
      '%%%%%%%',
    ].join('\n'));
  });

  it('should draw the walked path over eaten food', () => {
    assert.strictEqual(formatGrid(fixture('tiny-search'), RING_WALK), [
      '%%%%%%%',
      '%*****%',
      '%*%%%*%',
      '%P   *%',
      '%%%%%%%',
    ].join('\n'));
  });
});

describe('Solution Formatting', () => {
  it('should list actions and statistics', () => {
    assert.strictEqual(formatSolution(makeSolution()), [
      '=== PATH FOUND ===',
      '',
      '=== ACTIONS ===',
      'NORTH x2, EAST x4, SOUTH x2',
      '',
      '=== SEARCH STATISTICS ===',
      'Nodes Expanded: 12',
      'Time Taken: 5ms',
      'Optimality Guarantee: No',
    ].join('\n'));
  });

  it('should note an empty plan', () => {
    const text = formatSolution(makeSolution({ actions: [], cost: 0 }));

    assert.strictEqual(text.split('\n')[3], '(already at goal)');
  });

  it('should skip the actions block for failed searches', () => {
    const text = formatSolution(makeSolution({ found: false, actions: [], summary: '=== NO PATH EXISTS ===' }));

    assert.deepStrictEqual(text.split('\n').slice(0, 3), [
      '=== NO PATH EXISTS ===',
      '',
      '=== SEARCH STATISTICS ===',
    ]);
  });

  it('should fit a summary on one line', () => {
    assert.strictEqual(formatCompactSummary(makeSolution()), '✓ SOLVED | bfs | 8 actions | cost 8 | 12 expanded');
    assert.strictEqual(
      formatCompactSummary(makeSolution({ found: false, strategy: 'ucs', actions: [], cost: 0 })),
      '✗ NO PATH | ucs | 0 actions | cost 0 | 12 expanded'
    );
  });

  it('should serialize to JSON', () => {
    assert.deepStrictEqual(JSON.parse(formatSolutionJSON(makeSolution())), {
      found: true,
      strategy: 'bfs',
      cost: 8,
      stepsCount: 8,
      actions: RING_WALK,
      stats: { nodesExpanded: 12, timeTaken: 5, optimalityGuarantee: false },
    });
  });
});
