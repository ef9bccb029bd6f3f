/**
 * Tests for search tree nodes
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createChildNode, createRootNode, extractActionPath } from '../../src/solver/search-node.js';

describe('Search Nodes', () => {
  it('should start the tree at depth 0 with no action', () => {
    const root = createRootNode('a', 4);

    assert.strictEqual(root.parent, null);
    assert.strictEqual(root.action, null);
    assert.strictEqual(root.depth, 0);
    assert.strictEqual(root.cost, 0);
    assert.strictEqual(root.priority, 4);
    assert.deepStrictEqual(extractActionPath(root), []);
  });

  it('should accumulate cost and depth along a branch', () => {
    const root = createRootNode('a', 0);
    const b = createChildNode(root, { state: 'b', action: 'NORTH', cost: 2 }, 3);
    const c = createChildNode(b, { state: 'c', action: 'EAST', cost: 0.5 }, 1);

    assert.strictEqual(c.depth, 2);
    assert.strictEqual(c.cost, 2.5);
    assert.strictEqual(c.heuristic, 1);
    assert.strictEqual(c.priority, 3.5);
    assert.strictEqual(c.parent, b);
  });

  it('should rebuild the path from the root in order', () => {
    let node = createRootNode(0, 0);
    const actions = ['EAST', 'EAST', 'SOUTH', 'WEST'] as const;
    actions.forEach((action, i) => {
      node = createChildNode(node, { state: i + 1, action, cost: 1 }, 0);
    });

    assert.strictEqual(node.depth, 4);
    assert.deepStrictEqual(extractActionPath(node), ['EAST', 'EAST', 'SOUTH', 'WEST']);
  });
});
