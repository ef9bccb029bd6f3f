/**
 * Shared test fixtures
 */

import * as path from 'path';
import { fileURLToPath } from 'url';

import { Layout } from '../src/layout/layout.js';
import { loadLayout, parseLayout } from '../src/io/layout-parser.js';

const here = path.dirname(fileURLToPath(import.meta.url));

export const LAYOUTS_DIR = path.resolve(here, '..', 'layouts');

export function fixture(name: string): Layout {
  return loadLayout(name, LAYOUTS_DIR);
}

export function grid(...rows: string[]): Layout {
  return parseLayout(rows.join('\n'));
}
