/**
 * Main Solver Interface
 */

import {
  Coord,
  CostFunction,
  Direction,
  Heuristic,
  ProblemKind,
  SearchProblem,
  SearchResult,
  SearchStrategy,
  Solution,
  SolverOptions,
} from '../domain/types.js';
import { DEFAULT_SOLVER_OPTIONS } from '../domain/constants.js';
import { SearchLimitError } from '../domain/errors.js';
import { Layout, countOpenCells } from '../layout/layout.js';
import {
  PositionProblemConfig,
  PositionSearchProblem,
  stayEastCost,
  stayWestCost,
} from '../problems/position-problem.js';
import { CornersProblem } from '../problems/corners-problem.js';
import { FoodSearchProblem } from '../problems/food-problem.js';
import { uniformCost } from '../problems/action-cost.js';
import { FoodState, countRemaining } from '../state/food-state.js';
import { search } from './graph-search.js';
import {
  cornersHeuristic,
  euclideanHeuristic,
  foodHeuristic,
  manhattanHeuristic,
  nullHeuristic,
} from './heuristics.js';
import { createMazeFoodHeuristic } from './maze-distance.js';
import { closestDotSearch } from './closest-dot.js';
import { reachesGoal, replayActions } from './replay.js';

export type SolvableProblem = PositionSearchProblem | CornersProblem | FoodSearchProblem;

export type HeuristicName = 'null' | 'manhattan' | 'euclidean' | 'corners' | 'food' | 'food-maze';

export type CostName = 'uniform' | 'east' | 'west';

export interface SolveOptions<S, P extends SearchProblem<S>> extends Partial<SolverOptions> {
  heuristic?: Heuristic<S, P>;
  onExpand?: (state: S, expanded: number) => void;
}

// What the CLI asks for
export interface SolveRequest {
  problem: ProblemKind | 'closest-dot';
  strategy?: SearchStrategy;
  heuristic?: HeuristicName;
  goal?: Coord;
  cost?: CostName;
  maxExpansions?: number;
}

const COST_FUNCTIONS: Record<CostName, CostFunction> = {
  uniform: uniformCost,
  east: stayEastCost,
  west: stayWestCost,
};

const HEURISTICS_BY_PROBLEM: Record<ProblemKind, HeuristicName[]> = {
  position: ['null', 'manhattan', 'euclidean'],
  corners: ['null', 'corners'],
  food: ['null', 'food', 'food-maze'],
};

/**
 * Build a search problem from a layout
 */
export function createProblem(layout: Layout, kind: 'position', config?: PositionProblemConfig): PositionSearchProblem;
export function createProblem(layout: Layout, kind: 'corners'): CornersProblem;
export function createProblem(layout: Layout, kind: 'food'): FoodSearchProblem;
export function createProblem(layout: Layout, kind: ProblemKind, config?: PositionProblemConfig): SolvableProblem;
export function createProblem(
  layout: Layout,
  kind: ProblemKind,
  config: PositionProblemConfig = {}
): SolvableProblem {
  switch (kind) {
    case 'position':
      return new PositionSearchProblem(layout, config);
    case 'corners':
      return new CornersProblem(layout);
    case 'food':
      return new FoodSearchProblem(layout);
  }
}

/**
 * Main path solver class
 */
export class PathSolver {
  /**
   * Search a problem with one strategy and wrap the result
   */
  solve<S, P extends SearchProblem<S>>(problem: P, options: SolveOptions<S, P> = {}): Solution<S> {
    const opts: SolverOptions = {
      strategy: options.strategy ?? DEFAULT_SOLVER_OPTIONS.strategy,
      maxExpansions: options.maxExpansions ?? DEFAULT_SOLVER_OPTIONS.maxExpansions,
    };
    const startTime = Date.now();

    const result = search(problem, opts.strategy, {
      heuristic: options.heuristic,
      onExpand: limitExpansions<S>(opts.maxExpansions, options.onExpand),
    });

    const finalState = replayActions<S>(problem, result.actions);
    return buildSolution(opts.strategy, result, finalState, Date.now() - startTime);
  }

  /**
   * Greedy nearest-food coverage of a layout
   */
  solveClosestDot(
    layout: Layout,
    options: Pick<SolveOptions<Coord, PositionSearchProblem>, 'maxExpansions' | 'onExpand'> = {}
  ): Solution<FoodState> {
    const maxExpansions = options.maxExpansions ?? DEFAULT_SOLVER_OPTIONS.maxExpansions;
    const startTime = Date.now();
    const result = closestDotSearch(layout, limitExpansions<Coord>(maxExpansions, options.onExpand));
    const problem = new FoodSearchProblem(layout);
    const finalState = replayActions(problem, result.actions);

    return {
      found: result.found,
      strategy: 'closest-dot',
      actions: result.actions,
      cost: result.actions.length,
      finalState,
      stats: {
        nodesExpanded: result.nodesExpanded,
        timeTaken: Date.now() - startTime,
        optimalityGuarantee: false,
      },
      summary: result.found
        ? generateSuccessSummary('closest-dot', result.actions.length, result.actions.length, result.nodesExpanded)
        : `=== NO COMPLETE PATH ===\n\n${countRemaining(finalState.remaining)} food item(s) unreachable.`,
    };
  }
}

/**
 * Solve a layout as described by a CLI-style request
 */
export function solveLayout(layout: Layout, request: SolveRequest): Solution {
  const solver = new PathSolver();
  const strategy = request.strategy ?? DEFAULT_SOLVER_OPTIONS.strategy;
  const base = { strategy, maxExpansions: request.maxExpansions };

  const heuristicName = request.heuristic ?? 'null';

  if (request.problem === 'closest-dot') {
    if (heuristicName !== 'null') {
      throw new Error(`Heuristic '${heuristicName}' does not apply to closest-dot search`);
    }
    return solver.solveClosestDot(layout, { maxExpansions: request.maxExpansions });
  }

  if (!HEURISTICS_BY_PROBLEM[request.problem].includes(heuristicName)) {
    throw new Error(`Heuristic '${heuristicName}' does not apply to ${request.problem} problems`);
  }
  if (heuristicName !== 'null' && strategy !== 'astar') {
    throw new Error(`Heuristic '${heuristicName}' needs the astar strategy, not ${strategy}`);
  }

  switch (request.problem) {
    case 'position': {
      const problem = createProblem(layout, 'position', {
        goal: request.goal,
        costFn: COST_FUNCTIONS[request.cost ?? 'uniform'],
      });
      const heuristic = heuristicName === 'manhattan'
        ? manhattanHeuristic
        : heuristicName === 'euclidean' ? euclideanHeuristic : nullHeuristic;
      return solver.solve(problem, { ...base, heuristic });
    }

    case 'corners': {
      const problem = createProblem(layout, 'corners');
      const heuristic = heuristicName === 'corners' ? cornersHeuristic : nullHeuristic;
      return solver.solve(problem, { ...base, heuristic });
    }

    case 'food': {
      const problem = createProblem(layout, 'food');
      const heuristic = heuristicName === 'food'
        ? foodHeuristic
        : heuristicName === 'food-maze' ? createMazeFoodHeuristic() : nullHeuristic;
      return solver.solve(problem, { ...base, heuristic });
    }
  }
}

export interface PlanCheck {
  legal: boolean;
  reachesGoal: boolean;
  cost: number;
}

/**
 * Check a hand-written action list against the problem a request describes
 */
export function checkPlan(layout: Layout, request: SolveRequest, actions: readonly Direction[]): PlanCheck {
  if (request.problem === 'closest-dot') {
    throw new Error('Plans are checked against position, corners or food problems');
  }

  switch (request.problem) {
    case 'position':
      return checkActions(createProblem(layout, 'position', {
        goal: request.goal,
        costFn: COST_FUNCTIONS[request.cost ?? 'uniform'],
      }), actions);
    case 'corners':
      return checkActions(createProblem(layout, 'corners'), actions);
    case 'food':
      return checkActions(createProblem(layout, 'food'), actions);
  }
}

function checkActions<S>(problem: SearchProblem<S>, actions: readonly Direction[]): PlanCheck {
  const cost = problem.getCostOfActions(actions);
  return {
    legal: cost !== Infinity,
    reachesGoal: reachesGoal(problem, actions),
    cost,
  };
}

/**
 * Summarize a layout without searching it
 */
export function analyzeLayout(layout: Layout): {
  width: number;
  height: number;
  openCells: number;
  food: number;
  capsules: number;
  ghosts: number;
  start: Coord;
} {
  return {
    width: layout.width,
    height: layout.height,
    openCells: countOpenCells(layout),
    food: layout.food.length,
    capsules: layout.capsules.length,
    ghosts: layout.ghosts.length,
    start: layout.start,
  };
}

/**
 * Wrap an expansion observer with a budget check
 */
function limitExpansions<S>(
  maxExpansions: number,
  observer?: (state: S, expanded: number) => void
): (state: S, expanded: number) => void {
  return (state, expanded) => {
    if (expanded > maxExpansions) {
      throw new SearchLimitError(maxExpansions);
    }
    observer?.(state, expanded);
  };
}

/**
 * Build a Solution object from a search result
 */
function buildSolution<S>(
  strategy: SearchStrategy,
  result: SearchResult,
  finalState: S,
  timeTaken: number
): Solution<S> {
  const optimal = result.found && (strategy === 'ucs' || strategy === 'astar');

  return {
    found: result.found,
    strategy,
    actions: result.actions,
    cost: result.cost,
    finalState,
    stats: {
      nodesExpanded: result.nodesExpanded,
      timeTaken,
      optimalityGuarantee: optimal,
    },
    summary: result.found
      ? generateSuccessSummary(strategy, result.actions.length, result.cost, result.nodesExpanded)
      : generateFailureSummary(strategy, result.nodesExpanded),
  };
}

/**
 * Generate success summary
 */
function generateSuccessSummary(
  strategy: Solution['strategy'],
  steps: number,
  cost: number,
  nodesExpanded: number
): string {
  return `=== PATH FOUND ===

Strategy: ${strategy}
Actions: ${steps}
Total Cost: ${cost}
Nodes Expanded: ${nodesExpanded}`;
}

/**
 * Generate failure summary
 */
function generateFailureSummary(strategy: SearchStrategy, nodesExpanded: number): string {
  return `=== NO PATH EXISTS ===

Strategy: ${strategy}
Frontier exhausted after expanding ${nodesExpanded} nodes.`;
}
