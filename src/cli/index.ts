#!/usr/bin/env node
/**
 * Grid search solver - CLI Interface
 */

import { Coord, Direction, ProblemKind, SearchStrategy } from '../domain/types.js';
import { SearchLimitError } from '../domain/errors.js';
import { parseDirections } from '../domain/directions.js';
import { findUnreachableCells } from '../layout/layout.js';
import { CostName, HeuristicName, analyzeLayout, checkPlan, solveLayout } from '../solver/solver.js';
import { listBundledLayouts, loadLayout } from '../io/layout-parser.js';
import {
  formatActions,
  formatCompactSummary,
  formatGrid,
  formatSolution,
  formatSolutionJSON,
} from '../io/solution-formatter.js';

// Parse command line arguments
const args = process.argv.slice(2);

interface CLIOptions {
  command: 'solve' | 'analyze' | 'replay' | 'list' | 'help';
  layout?: string;
  problem: ProblemKind | 'closest-dot';
  strategy: SearchStrategy;
  heuristic?: HeuristicName;
  goal?: Coord;
  cost: CostName;
  outputFormat: 'text' | 'json' | 'compact';
  maxExpansions?: number;
  actions?: Direction[];
  showPath: boolean;
}

const PROBLEMS: readonly CLIOptions['problem'][] = ['position', 'corners', 'food', 'closest-dot'];
const STRATEGIES: readonly SearchStrategy[] = ['dfs', 'bfs', 'ucs', 'astar'];
const HEURISTICS: readonly HeuristicName[] = ['null', 'manhattan', 'euclidean', 'corners', 'food', 'food-maze'];
const COSTS: readonly CostName[] = ['uniform', 'east', 'west'];
const FORMATS: readonly CLIOptions['outputFormat'][] = ['text', 'json', 'compact'];

function pick<T extends string>(flag: string, value: string | undefined, allowed: readonly T[]): T {
  const match = allowed.find(a => a === value?.toLowerCase());
  if (match === undefined) {
    throw new Error(`${flag} expects one of: ${allowed.join(', ')}`);
  }
  return match;
}

function parseCoord(flag: string, value: string | undefined): Coord {
  const [x, y] = (value ?? '').split(',').map(Number);
  if (!Number.isInteger(x) || !Number.isInteger(y)) {
    throw new Error(`${flag} expects x,y`);
  }
  return { x, y };
}

function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    command: 'help',
    problem: 'position',
    strategy: 'bfs',
    cost: 'uniform',
    outputFormat: 'text',
    showPath: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case 'solve':
      case 'analyze':
      case 'replay':
      case 'list':
        options.command = arg;
        break;

      case '-l':
      case '--layout':
        options.layout = args[++i];
        break;

      case '-p':
      case '--problem':
        options.problem = pick(arg, args[++i], PROBLEMS);
        break;

      case '-s':
      case '--strategy':
        options.strategy = pick(arg, args[++i], STRATEGIES);
        break;

      case '-H':
      case '--heuristic':
        options.heuristic = pick(arg, args[++i], HEURISTICS);
        break;

      case '-g':
      case '--goal':
        options.goal = parseCoord(arg, args[++i]);
        break;

      case '-c':
      case '--cost':
        options.cost = pick(arg, args[++i], COSTS);
        break;

      case '-f':
      case '--format':
        options.outputFormat = pick(arg, args[++i], FORMATS);
        break;

      case '-m':
      case '--max-expansions': {
        const limit = parseInt(args[++i], 10);
        if (!(limit > 0)) {
          throw new Error(`${arg} expects a positive number`);
        }
        options.maxExpansions = limit;
        break;
      }

      case '-a':
      case '--actions':
        options.actions = parseDirections(args[++i] ?? '');
        break;

      case '--show-path':
        options.showPath = true;
        break;

      case '-h':
      case '--help':
        options.command = 'help';
        break;

      default:
        throw new Error(`Unknown argument '${arg}'`);
    }
  }

  return options;
}

function printHelp(): void {
  console.log(`
Grid Search Solver
==================

Plans action sequences through maze layouts with DFS, BFS, uniform-cost
and A* graph search.

USAGE:
  grid-search <command> [options]

COMMANDS:
  solve       Search a layout and print the action sequence
  analyze     Describe a layout without searching
  replay      Check a hand-written action list against a problem
  list        List the bundled layouts
  help        Show this help message

OPTIONS:
  -l, --layout <name|file>  Bundled layout name or path to a .lay file
  -p, --problem <kind>      position (default), corners, food, closest-dot
  -s, --strategy <name>     dfs, bfs (default), ucs, astar
  -H, --heuristic <name>    null, manhattan, euclidean, corners, food, food-maze
  -g, --goal <x,y>          Goal cell for position problems (default 1,1)
  -c, --cost <name>         Step cost for position problems: uniform, east, west
  -f, --format <type>       Output format: text (default), json or compact
  -m, --max-expansions <n>  Abort after expanding n nodes
  -a, --actions <list>      Actions to replay, e.g. N,N,E or "north east"
  --show-path               Draw the path over the layout
  -h, --help                Show help

EXAMPLES:
  grid-search solve -l tiny-corners -p corners -s astar -H corners
  grid-search solve -l tiny-search -p food -s astar -H food --show-path
  grid-search solve -l open-room -s ucs -c east
  grid-search analyze -l tiny-corners
  grid-search replay -l tiny-search -p food -a N,N,E,E,E,E,S,S
`);
}

function runSolve(options: CLIOptions): void {
  if (!options.layout) {
    throw new Error('Must provide --layout');
  }

  const layout = loadLayout(options.layout);

  const solution = solveLayout(layout, {
    problem: options.problem,
    strategy: options.strategy,
    heuristic: options.heuristic,
    goal: options.goal,
    cost: options.cost,
    maxExpansions: options.maxExpansions,
  });

  switch (options.outputFormat) {
    case 'json':
      console.log(formatSolutionJSON(solution));
      break;
    case 'compact':
      console.log(formatCompactSummary(solution));
      break;
    case 'text':
      console.log(formatSolution(solution));
      break;
  }

  if (options.showPath) {
    console.log('');
    console.log(formatGrid(layout, solution.actions));
  }

  if (!solution.found) {
    process.exitCode = 2;
  }
}

function runAnalyze(options: CLIOptions): void {
  if (!options.layout) {
    throw new Error('Must provide --layout');
  }

  const layout = loadLayout(options.layout);
  const analysis = analyzeLayout(layout);
  const unreachable = findUnreachableCells(layout);

  console.log('=== LAYOUT ANALYSIS ===');
  console.log('');
  console.log(formatGrid(layout));
  console.log('');
  console.log(`Size: ${analysis.width} x ${analysis.height}`);
  console.log(`Open Cells: ${analysis.openCells}`);
  console.log(`Start: (${analysis.start.x}, ${analysis.start.y})`);
  console.log(`Food: ${analysis.food}`);
  console.log(`Capsules: ${analysis.capsules}`);
  console.log(`Ghosts: ${analysis.ghosts}`);

  if (unreachable.length > 0) {
    console.log('');
    console.log(`Unreachable Cells: ${unreachable.map(c => `(${c.x}, ${c.y})`).join(' ')}`);
  }
}

function runReplay(options: CLIOptions): void {
  if (!options.layout) {
    throw new Error('Must provide --layout');
  }
  if (!options.actions) {
    throw new Error('Must provide --actions');
  }

  const layout = loadLayout(options.layout);
  const check = checkPlan(layout, {
    problem: options.problem,
    goal: options.goal,
    cost: options.cost,
  }, options.actions);

  console.log('=== PLAN CHECK ===');
  console.log('');
  console.log(`Actions: ${options.actions.length === 0 ? '(none)' : formatActions(options.actions)}`);
  console.log(`Legal: ${check.legal ? 'Yes' : 'No'}`);
  console.log(`Total Cost: ${check.legal ? check.cost : '-'}`);
  console.log(`Reaches Goal: ${check.reachesGoal ? 'Yes' : 'No'}`);

  if (options.showPath && check.legal) {
    console.log('');
    console.log(formatGrid(layout, options.actions));
  }

  if (!check.reachesGoal) {
    process.exitCode = 2;
  }
}

function runList(): void {
  for (const name of listBundledLayouts()) {
    console.log(name);
  }
}

// Main entry point
function main(): void {
  const options = parseArgs(args);

  switch (options.command) {
    case 'solve':
      runSolve(options);
      break;

    case 'analyze':
      runAnalyze(options);
      break;

    case 'replay':
      runReplay(options);
      break;

    case 'list':
      runList();
      break;

    case 'help':
    default:
      printHelp();
      break;
  }
}

try {
  main();
} catch (err) {
  if (err instanceof SearchLimitError) {
    console.error(`Error: ${err.message}`);
    process.exitCode = 3;
  } else {
    console.error('Error:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  }
}
