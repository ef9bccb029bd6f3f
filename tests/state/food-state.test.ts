/**
 * Tests for food-coverage states
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { FoodIndex, countRemaining, createFoodState, hashFoodState } from '../../src/state/food-state.js';

const food = [
  { x: 1, y: 3 },
  { x: 5, y: 1 },
  { x: 5, y: 3 },
];

describe('Food Index', () => {
  it('should cover every item with the full mask', () => {
    const index = new FoodIndex(food);

    assert.strictEqual(index.fullMask(), 0b111n);
    assert.deepStrictEqual(index.toCoords(index.fullMask()), food);
  });

  it('should clear only the eaten item', () => {
    const index = new FoodIndex(food);
    const remaining = index.eat(index.fullMask(), { x: 5, y: 1 });

    assert.strictEqual(remaining, 0b101n);
    assert.strictEqual(index.has(remaining, { x: 5, y: 1 }), false);
    assert.strictEqual(index.has(remaining, { x: 1, y: 3 }), true);
    assert.deepStrictEqual(index.toCoords(remaining), [{ x: 1, y: 3 }, { x: 5, y: 3 }]);
  });

  it('should leave the mask alone off food', () => {
    const index = new FoodIndex(food);

    assert.strictEqual(index.eat(0b011n, { x: 2, y: 2 }), 0b011n);
  });

  it('should count remaining bits', () => {
    assert.strictEqual(countRemaining(0n), 0);
    assert.strictEqual(countRemaining(0b1011n), 3);
  });
});

describe('Food State', () => {
  it('should eat food under the start position', () => {
    const index = new FoodIndex(food);
    const state = createFoodState({ x: 1, y: 3 }, index);

    assert.strictEqual(state.remaining, 0b110n);
  });

  it('should hash position and remaining food together', () => {
    assert.strictEqual(hashFoodState({ position: { x: 2, y: 1 }, remaining: 0b110n }), '2,1|6');
  });
});
