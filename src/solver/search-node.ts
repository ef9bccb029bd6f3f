/**
 * Nodes of the search tree built by graph search
 */

import { Direction, Successor } from '../domain/types.js';

export interface SearchNode<S> {
  state: S;
  parent: SearchNode<S> | null;
  action: Direction | null;
  depth: number;     // actions taken from the root
  cost: number;      // g(n)
  heuristic: number; // h(n)
  priority: number;  // f(n) = g(n) + h(n)
}

export function createRootNode<S>(state: S, heuristic: number): SearchNode<S> {
  return { state, parent: null, action: null, depth: 0, cost: 0, heuristic, priority: heuristic };
}

/**
 * Node reached from `parent` through one successor
 */
export function createChildNode<S>(
  parent: SearchNode<S>,
  successor: Successor<S>,
  heuristic: number
): SearchNode<S> {
  const cost = parent.cost + successor.cost;
  return {
    state: successor.state,
    parent,
    action: successor.action,
    depth: parent.depth + 1,
    cost,
    heuristic,
    priority: cost + heuristic,
  };
}

/**
 * Actions leading from the root to `node`, filled in by depth
 */
export function extractActionPath<S>(node: SearchNode<S>): Direction[] {
  const actions = new Array<Direction>(node.depth);
  let current = node;

  while (current.parent !== null && current.action !== null) {
    actions[current.depth - 1] = current.action;
    current = current.parent;
  }

  return actions;
}
