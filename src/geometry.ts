import { IrregularGridError } from './errors';
import { RenderOptions, quietZoneWidth } from './render-config';
import { Grid, GridLine } from './types';

export const CODEWORD_BITS = 17;
export const STOP_PATTERN_BITS = 18;
export const MIN_COLUMNS = 2;

export interface Geometry {
  columns: number;
  lines: number;
  bitsPerRow: number;
  width: number;
  height: number;
  quietZone: number;
  /** Consecutive pixel rows occupied by one grid line. */
  rowRepeat: number;
}

export const assertRegularGrid = (grid: Grid): number => {
  if (grid.length === 0) {
    throw new IrregularGridError('Irregular grid: no lines.');
  }
  let columns = 0;
  for (let index = 0; index < grid.length; index++) {
    const line: GridLine | undefined = grid[index];
    if (!line) {
      throw new IrregularGridError(`Irregular grid: line ${index} is missing.`);
    }
    if (index === 0) {
      columns = line.length;
      if (columns < MIN_COLUMNS) {
        throw new IrregularGridError(`Irregular grid: lines need at least ${MIN_COLUMNS} codewords, got ${columns}.`);
      }
    } else if (line.length !== columns) {
      throw new IrregularGridError(
        `Irregular grid: line ${index} has ${line.length} codewords, expected ${columns}.`
      );
    }
  }
  return columns;
};

// Every codeword but the stop pattern is 17 bits wide.
export const rowBitCount = (columns: number): number =>
  (columns - 2) * CODEWORD_BITS + CODEWORD_BITS + STOP_PATTERN_BITS;

export const imageWidth = (columns: number, options: RenderOptions): number =>
  rowBitCount(columns) * options.barWidth + 2 * quietZoneWidth(options);

export const imageHeight = (lines: number, options: RenderOptions): number =>
  lines * options.rowHeight * options.barWidth + 2 * quietZoneWidth(options);

export const computeGeometry = (grid: Grid, options: RenderOptions): Geometry => {
  const columns = assertRegularGrid(grid);
  return {
    columns,
    lines: grid.length,
    bitsPerRow: rowBitCount(columns),
    width: imageWidth(columns, options),
    height: imageHeight(grid.length, options),
    quietZone: quietZoneWidth(options),
    rowRepeat: options.rowHeight * options.barWidth
  };
};
