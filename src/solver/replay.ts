/**
 * Replay an action sequence through a problem's successor function
 */

import { Direction, SearchProblem } from '../domain/types.js';
import { IllegalActionError } from '../domain/errors.js';

/**
 * Apply `actions` from the start state and return the state reached
 */
export function replayActions<S>(problem: SearchProblem<S>, actions: readonly Direction[]): S {
  let state = problem.getStartState();

  actions.forEach((action, index) => {
    const next = problem.getSuccessors(state).find(s => s.action === action);
    if (next === undefined) {
      throw new IllegalActionError(action, index, problem.hashState(state));
    }
    state = next.state;
  });

  return state;
}

/**
 * Whether `actions` is legal and ends in a goal state
 */
export function reachesGoal<S>(problem: SearchProblem<S>, actions: readonly Direction[]): boolean {
  try {
    return problem.isGoalState(replayActions(problem, actions));
  } catch (err) {
    if (err instanceof IllegalActionError) return false;
    throw err;
  }
}
