/**
 * Error classes raised by the solver
 */

import { Direction } from './types.js';

/**
 * Layout text could not be turned into a layout
 */
export class LayoutParseError extends Error {
  constructor(message: string, readonly line?: number) {
    super(line === undefined ? message : `Line ${line}: ${message}`);
    this.name = 'LayoutParseError';
  }
}

/**
 * An action sequence walked into a wall or off the layout
 */
export class IllegalActionError extends Error {
  constructor(readonly action: Direction, readonly index: number, readonly stateKey: string) {
    super(`Illegal action ${action} at step ${index + 1} from state ${stateKey}`);
    this.name = 'IllegalActionError';
  }
}

/**
 * Raised by the driver when a search exceeds its expansion budget
 */
export class SearchLimitError extends Error {
  constructor(readonly limit: number) {
    super(`Search stopped after expanding ${limit} nodes`);
    this.name = 'SearchLimitError';
  }
}
