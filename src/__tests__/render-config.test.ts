import assert from 'node:assert/strict';
import test from 'node:test';
import { InvalidRenderOptionError } from '../errors';
import { DEFAULT_RENDER_OPTIONS, quietZoneWidth, resolveRenderOptions } from '../render-config';

test('resolveRenderOptions returns the defaults when nothing is overridden', () => {
  assert.deepEqual(resolveRenderOptions(), {
    barWidth: 5,
    quietZoneModules: 2,
    rowHeight: 4,
    black: 0,
    white: 255
  });
});

test('resolveRenderOptions overlays defined keys and ignores undefined ones', () => {
  const options = resolveRenderOptions({ barWidth: 3, rowHeight: undefined, white: 200 });
  assert.equal(options.barWidth, 3);
  assert.equal(options.rowHeight, 4);
  assert.equal(options.white, 200);
  assert.equal(options.black, 0);
});

test('resolveRenderOptions does not mutate the defaults', () => {
  resolveRenderOptions({ barWidth: 9 });
  assert.equal(DEFAULT_RENDER_OPTIONS.barWidth, 5);
});

test('quiet zone is two modules wide with the defaults', () => {
  assert.equal(quietZoneWidth(resolveRenderOptions()), 10);
  assert.equal(quietZoneWidth(resolveRenderOptions({ barWidth: 2 })), 4);
  assert.equal(quietZoneWidth(resolveRenderOptions({ quietZoneModules: 0 })), 0);
});

test('resolveRenderOptions rejects out-of-range values', () => {
  assert.throws(() => resolveRenderOptions({ barWidth: 0 }), InvalidRenderOptionError);
  assert.throws(() => resolveRenderOptions({ rowHeight: 1.5 }), InvalidRenderOptionError);
  assert.throws(() => resolveRenderOptions({ quietZoneModules: -1 }), InvalidRenderOptionError);
  assert.throws(() => resolveRenderOptions({ black: 256 }), InvalidRenderOptionError);
  assert.throws(() => resolveRenderOptions({ white: -1 }), /white must be an integer between 0 and 255, got -1\./);
});
