import { computeGeometry } from './geometry';
import { RenderOptions, resolveRenderOptions } from './render-config';
import { buildDataRow, buildMarginRow } from './row';
import { mergeSinkOptions } from './sink/config';
import { createSink } from './sink/factory';
import { GRAYSCALE_8, ImageFormat, ImageSink, SinkOptions } from './sink/types';
import { Grid } from './types';

export interface EncodeOptions extends Partial<RenderOptions> {
  format?: ImageFormat;
  sink?: Partial<SinkOptions>;
}

const appendRepeated = (sink: ImageSink, row: Buffer, times: number): void => {
  for (let i = 0; i < times; i++) {
    sink.append(row);
  }
};

/**
 * Renders a codeword grid top to bottom: quiet-zone rows, each line stretched to
 * `rowHeight` modules, quiet-zone rows. Returns the finished image file.
 */
export const encodeGrid = (grid: Grid, options: EncodeOptions = {}): Buffer => {
  const { format = 'png', sink: sinkOverrides, ...renderOverrides } = options;
  const render = resolveRenderOptions(renderOverrides);
  const geometry = computeGeometry(grid, render);

  const sinkOptions = mergeSinkOptions(
    { width: geometry.width, height: geometry.height, mode: GRAYSCALE_8 },
    sinkOverrides
  );
  const sink = createSink(format, sinkOptions);

  try {
    const margin = buildMarginRow(geometry, render);
    appendRepeated(sink, margin, geometry.quietZone);

    for (let index = 0; index < grid.length; index++) {
      appendRepeated(sink, buildDataRow(grid[index], geometry, render, index), geometry.rowRepeat);
    }

    appendRepeated(sink, margin, geometry.quietZone);
    return sink.close();
  } finally {
    sink.release();
  }
};
