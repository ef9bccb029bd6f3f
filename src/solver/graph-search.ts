/**
 * Graph search over any SearchProblem, parameterized by frontier order
 */

import { Heuristic, SearchProblem, SearchResult, SearchStrategy } from '../domain/types.js';
import { Frontier, PriorityQueue, Queue, Stack } from './frontier.js';
import { SearchNode, createChildNode, createRootNode, extractActionPath } from './search-node.js';
import { nullHeuristic } from './heuristics.js';

export interface GraphSearchOptions<S, P extends SearchProblem<S>> {
  heuristic?: Heuristic<S, P>;
  /** Observes each expansion; must not mutate the state. */
  onExpand?: (state: S, expanded: number) => void;
}

/**
 * Frontier matching a strategy's expansion order
 */
export function createFrontier<S>(strategy: SearchStrategy): Frontier<SearchNode<S>> {
  switch (strategy) {
    case 'dfs':
      return new Stack<SearchNode<S>>();
    case 'bfs':
      return new Queue<SearchNode<S>>();
    case 'ucs':
      return new PriorityQueue<SearchNode<S>>(node => node.cost);
    case 'astar':
      return new PriorityQueue<SearchNode<S>>(node => node.priority);
  }
}

/**
 * Expand states in the order the frontier hands them out.
 *
 * The goal test runs when a node is popped, and a state is expanded at
 * most once: later nodes for an already expanded state are dropped.
 */
export function graphSearch<S, P extends SearchProblem<S>>(
  problem: P,
  frontier: Frontier<SearchNode<S>>,
  options: GraphSearchOptions<S, P> = {}
): SearchResult {
  const heuristic = options.heuristic ?? nullHeuristic;
  const expanded = new Set<string>();

  const start = problem.getStartState();
  frontier.push(createRootNode(start, heuristic(start, problem)));

  let nodesExpanded = 0;

  while (!frontier.isEmpty()) {
    const current = frontier.pop();
    if (current === undefined) break;

    const key = problem.hashState(current.state);
    if (expanded.has(key)) continue;
    expanded.add(key);

    if (problem.isGoalState(current.state)) {
      return {
        found: true,
        actions: extractActionPath(current),
        cost: current.cost,
        nodesExpanded,
      };
    }

    nodesExpanded++;
    options.onExpand?.(current.state, nodesExpanded);

    for (const successor of problem.getSuccessors(current.state)) {
      if (expanded.has(problem.hashState(successor.state))) continue;

      frontier.push(createChildNode(current, successor, heuristic(successor.state, problem)));
    }
  }

  // Frontier exhausted: no path exists
  return { found: false, actions: [], cost: 0, nodesExpanded };
}

/**
 * Run one of the four strategies on a problem
 */
export function search<S, P extends SearchProblem<S>>(
  problem: P,
  strategy: SearchStrategy,
  options: GraphSearchOptions<S, P> = {}
): SearchResult {
  const heuristic = strategy === 'astar' ? options.heuristic : undefined;
  return graphSearch(problem, createFrontier<S>(strategy), { ...options, heuristic });
}

export function depthFirstSearch<S>(problem: SearchProblem<S>): SearchResult {
  return graphSearch(problem, createFrontier<S>('dfs'));
}

export function breadthFirstSearch<S>(problem: SearchProblem<S>): SearchResult {
  return graphSearch(problem, createFrontier<S>('bfs'));
}

export function uniformCostSearch<S>(problem: SearchProblem<S>): SearchResult {
  return graphSearch(problem, createFrontier<S>('ucs'));
}

export function aStarSearch<S, P extends SearchProblem<S>>(
  problem: P,
  heuristic: Heuristic<S, P> = nullHeuristic
): SearchResult {
  return graphSearch(problem, createFrontier<S>('astar'), { heuristic });
}
