import { codewordBitWidth, expandCodeword } from './bits';
import { Geometry } from './geometry';
import { RenderOptions } from './render-config';
import { GridLine } from './types';

export const buildMarginRow = (geometry: Geometry, options: RenderOptions): Buffer =>
  Buffer.alloc(geometry.width, options.white);

/**
 * Lays the bits of every codeword of a line, left to right, between the two quiet zones.
 * The row starts all white and is exactly `geometry.width` samples long, so a line whose
 * stop pattern is absent (17 bits instead of 18) leaves its last module white.
 */
export const buildDataRow = (
  line: GridLine,
  geometry: Geometry,
  options: RenderOptions,
  lineIndex?: number
): Buffer => {
  const row = buildMarginRow(geometry, options);
  let offset = geometry.quietZone;

  // Index loop: an empty slot is an absent codeword and still takes its 17 bits.
  for (let column = 0; column < line.length; column++) {
    const targetWidth = codewordBitWidth(column, line.length);
    const bits = expandCodeword(line[column], targetWidth, { line: lineIndex, column });
    for (const bit of bits) {
      if (bit === 1) row.fill(options.black, offset, offset + options.barWidth);
      offset += options.barWidth;
    }
  }

  return row;
};
