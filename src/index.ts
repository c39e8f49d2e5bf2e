export { encodeGrid } from './encoder';
export type { EncodeOptions } from './encoder';
export {
  CODEWORD_BITS,
  STOP_PATTERN_BITS,
  assertRegularGrid,
  computeGeometry,
  imageHeight,
  imageWidth,
  rowBitCount
} from './geometry';
export type { Geometry } from './geometry';
export { codewordBitWidth, expandCodeword, readBits } from './bits';
export { buildDataRow, buildMarginRow } from './row';
export { DEFAULT_RENDER_OPTIONS, quietZoneWidth, resolveRenderOptions } from './render-config';
export type { RenderOptions } from './render-config';
export { FORMAT_CONFIGS, getFormatConfig, isImageFormat, mergeSinkOptions } from './sink/config';
export { createSink } from './sink/factory';
export { GRAYSCALE_8 } from './sink/types';
export type { ImageFormat, ImageSink, PixelFormat, RowListener, SinkOptions } from './sink/types';
export { parseGrid, readGridFile } from './grid-file';
export {
  GridFileError,
  InvalidRenderOptionError,
  IrregularGridError,
  MalformedCodewordError,
  SinkError
} from './errors';
export type { Bit, Codeword, Grid, GridLine } from './types';
