/**
 * Tests for layout parsing and loading
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import * as path from 'path';
import { listBundledLayouts, loadLayout, parseLayout } from '../../src/io/layout-parser.js';
import { LayoutParseError } from '../../src/domain/errors.js';
import { isWall } from '../../src/layout/layout.js';
import { LAYOUTS_DIR, grid } from '../helpers.js';

describe('Layout Parser', () => {
  it('should put the first line at the top', () => {
    const layout = grid(
      '%%%%%',
      '%. P%',
      '% %o%',
      '%G  %',
      '%%%%%'
    );

    assert.strictEqual(layout.width, 5);
    assert.strictEqual(layout.height, 5);
    assert.deepStrictEqual(layout.start, { x: 3, y: 3 });
    assert.deepStrictEqual(layout.food, [{ x: 1, y: 3 }]);
    assert.deepStrictEqual(layout.capsules, [{ x: 3, y: 2 }]);
    assert.deepStrictEqual(layout.ghosts, [{ x: 1, y: 1 }]);
    assert.strictEqual(isWall(layout, { x: 2, y: 2 }), true);
    assert.strictEqual(isWall(layout, { x: 2, y: 1 }), false);
  });

  it('should sort food by column, then row', () => {
    const layout = grid(
      '%%%%%',
      '%..P%',
      '%. .%',
      '%%%%%'
    );

    assert.deepStrictEqual(layout.food, [
      { x: 1, y: 1 },
      { x: 1, y: 2 },
      { x: 2, y: 2 },
      { x: 3, y: 1 },
    ]);
  });

  it('should ignore blank lines and carriage returns', () => {
    const layout = parseLayout('\n\n%%%%\r\n%P.%\r\n%%%%\r\n\n');

    assert.strictEqual(layout.height, 3);
    assert.strictEqual(layout.width, 4);
    assert.deepStrictEqual(layout.food, [{ x: 2, y: 1 }]);
  });

  it('should reject ragged rows', () => {
    assert.throws(
      () => grid('%%%%', '%P%', '%%%%'),
      (err: unknown) => err instanceof LayoutParseError
        && err.line === 2
        && err.message === 'Line 2: Expected 4 columns, found 3'
    );
  });

  it('should count skipped blank lines in error positions', () => {
    assert.throws(
      () => parseLayout('\n%%%%\n%P%\n%%%%'),
      { message: 'Line 3: Expected 4 columns, found 3' }
    );
  });

  it('should reject unknown symbols', () => {
    assert.throws(
      () => grid('%%%%', '%PX%', '%%%%'),
      { message: "Line 2: Unknown layout symbol 'X' at column 3" }
    );
  });

  it('should require exactly one start', () => {
    assert.throws(
      () => grid('%%%%', '%  %', '%%%%'),
      { message: "Layout has no start position 'P'" }
    );
    assert.throws(
      () => grid('%%%%', '%PP%', '%%%%'),
      { message: 'Line 2: Layout has more than one start position' }
    );
  });

  it('should reject empty text', () => {
    assert.throws(() => parseLayout('\n  \n'), { message: 'Layout is empty' });
  });
});

describe('Layout Loading', () => {
  it('should load a layout by name', () => {
    const layout = loadLayout('tiny-search', LAYOUTS_DIR);

    assert.deepStrictEqual(layout.start, { x: 1, y: 1 });
    assert.strictEqual(layout.food.length, 3);
  });

  it('should load a layout by path', () => {
    const layout = loadLayout(path.join(LAYOUTS_DIR, 'no-food.lay'));

    assert.deepStrictEqual(layout.food, []);
  });

  it('should load from the bundled directory by default', () => {
    assert.strictEqual(loadLayout('tiny-maze').width, 8);
  });

  it('should report missing layouts', () => {
    assert.throws(() => loadLayout('no-such-layout', LAYOUTS_DIR), { message: "Layout 'no-such-layout' not found" });
  });

  it('should list bundled layouts by name', () => {
    assert.deepStrictEqual(listBundledLayouts(LAYOUTS_DIR), [
      'corridor-ahead',
      'corridor-behind',
      'medium-corners',
      'no-food',
      'open-room',
      'tiny-corners',
      'tiny-maze',
      'tiny-search',
      'walled-off',
    ]);
  });
});
