import assert from 'node:assert/strict';
import test from 'node:test';
import { PNG } from 'pngjs';
import { SinkError } from '../errors';
import { FORMAT_CONFIGS, isImageFormat, mergeSinkOptions } from '../sink/config';
import { createSink } from '../sink/factory';
import { PgmSink } from '../sink/pgm';
import { PngSink } from '../sink/png';
import { GRAYSCALE_8, SinkOptions } from '../sink/types';

const size = (width: number, height: number): SinkOptions => ({ width, height, mode: GRAYSCALE_8 });

test('createSink picks the sink for each format', () => {
  assert.ok(createSink('png', size(2, 2)) instanceof PngSink);
  assert.ok(createSink('pgm', size(2, 2)) instanceof PgmSink);
});

test('format helpers know png and pgm only', () => {
  assert.equal(FORMAT_CONFIGS.png.extension, 'png');
  assert.equal(FORMAT_CONFIGS.pgm.mimeType, 'image/x-portable-graymap');
  assert.equal(isImageFormat('pgm'), true);
  assert.equal(isImageFormat('jpeg'), false);
});

test('mergeSinkOptions lets defined overrides win', () => {
  const onRow = () => undefined;
  const merged = mergeSinkOptions(size(10, 20), { height: 5, width: undefined, onRow });
  assert.equal(merged.width, 10);
  assert.equal(merged.height, 5);
  assert.equal(merged.mode, GRAYSCALE_8);
  assert.equal(merged.onRow, onRow);
});

test('pgm sink writes a P5 header followed by the rows', () => {
  const sink = createSink('pgm', size(3, 2));
  sink.append(Uint8Array.from([0, 255, 0]));
  sink.append(Uint8Array.from([255, 0, 255]));
  const output = sink.close();
  assert.equal(output.subarray(0, 11).toString('ascii'), 'P5\n3 2\n255\n');
  assert.deepEqual([...output.subarray(11)], [0, 255, 0, 255, 0, 255]);
});

test('png sink writes an 8-bit grayscale image', () => {
  const sink = createSink('png', size(2, 2));
  sink.append(Uint8Array.from([0, 255]));
  sink.append(Uint8Array.from([255, 0]));
  const output = sink.close();

  assert.equal(output[24], 8);
  assert.equal(output[25], 0);
  const decoded = PNG.sync.read(output);
  assert.equal(decoded.width, 2);
  assert.equal(decoded.height, 2);
  const gray = [0, 1, 2, 3].map((pixel) => decoded.data[pixel * 4]);
  assert.deepEqual(gray, [0, 255, 255, 0]);
});

test('sink calls onRow with every row in order', () => {
  const seen: Array<[number, number[]]> = [];
  const sink = createSink('pgm', { ...size(2, 2), onRow: (row, index) => seen.push([index, [...row]]) });
  sink.append(Uint8Array.from([1, 2]));
  sink.append(Uint8Array.from([3, 4]));
  sink.close();
  assert.deepEqual(seen, [[0, [1, 2]], [1, [3, 4]]]);
});

test('sink rejects rows of the wrong length and rows past the height', () => {
  const sink = createSink('pgm', size(2, 1));
  assert.throws(() => sink.append(Uint8Array.from([1])), /Row 0 has 1 samples, expected 2\./);
  sink.append(Uint8Array.from([1, 2]));
  assert.throws(() => sink.append(Uint8Array.from([1, 2])), SinkError);
});

test('closing an incomplete image fails and the sink stays closed', () => {
  const sink = createSink('png', size(2, 2));
  sink.append(Uint8Array.from([1, 2]));
  assert.throws(() => sink.close(), /Image is incomplete: 1 of 2 rows written\./);
  assert.throws(() => sink.close(), /already closed/);
  assert.throws(() => sink.append(Uint8Array.from([1, 2])), /closed sink/);
});

test('released sinks refuse further rows', () => {
  const sink = createSink('pgm', size(1, 1));
  sink.release();
  sink.release();
  assert.throws(() => sink.append(Uint8Array.from([0])), SinkError);
});

test('sink rejects an invalid size', () => {
  assert.throws(() => createSink('png', size(0, 4)), /Invalid image size 0x4\./);
});
