/**
 * Tests for the layout model
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  countOpenCells,
  createLayout,
  findUnreachableCells,
  getCorners,
  getLegalMoves,
  isWall,
} from '../../src/layout/layout.js';
import { fixture, grid } from '../helpers.js';

describe('Layout Queries', () => {
  it('should treat cells outside the grid as walls', () => {
    const layout = fixture('tiny-corners');

    assert.strictEqual(isWall(layout, { x: -1, y: 3 }), true);
    assert.strictEqual(isWall(layout, { x: 3, y: 8 }), true);
    assert.strictEqual(isWall(layout, { x: 0, y: 0 }), true);
    assert.strictEqual(isWall(layout, { x: 1, y: 1 }), false);
  });

  it('should list legal moves in NORTH, SOUTH, EAST, WEST order', () => {
    const layout = fixture('tiny-corners');
    const moves = getLegalMoves(layout, layout.start);

    assert.deepStrictEqual(moves, [
      { direction: 'NORTH', position: { x: 3, y: 6 } },
      { direction: 'EAST', position: { x: 4, y: 5 } },
      { direction: 'WEST', position: { x: 2, y: 5 } },
    ]);
  });

  it('should place corners just inside the outer wall', () => {
    const layout = fixture('tiny-corners');

    assert.deepStrictEqual(getCorners(layout), [
      { x: 1, y: 1 },
      { x: 1, y: 6 },
      { x: 6, y: 1 },
      { x: 6, y: 6 },
    ]);
  });

  it('should keep one food item per cell', () => {
    const walls = [
      [true, true, true, true],
      [true, false, false, true],
      [true, true, true, true],
    ];
    const layout = createLayout(walls, { x: 1, y: 1 }, {
      food: [{ x: 2, y: 1 }, { x: 1, y: 1 }, { x: 2, y: 1 }],
    });

    assert.deepStrictEqual(layout.food, [{ x: 1, y: 1 }, { x: 2, y: 1 }]);
  });

  it('should count open cells', () => {
    assert.strictEqual(countOpenCells(fixture('tiny-search')), 12);
    assert.strictEqual(countOpenCells(fixture('no-food')), 3);
  });

  it('should report cells cut off from the start', () => {
    const layout = grid(
      '%%%%%%',
      '%P %.%',
      '%%%%%%',
    );

    assert.deepStrictEqual(findUnreachableCells(layout), [{ x: 4, y: 1 }]);
    assert.deepStrictEqual(findUnreachableCells(fixture('tiny-maze')), []);
  });
});
