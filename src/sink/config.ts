import { ImageFormat, SinkOptions } from './types';

export interface FormatConfig {
  extension: string;
  mimeType: string;
}

export const FORMAT_CONFIGS: Record<ImageFormat, FormatConfig> = {
  png: { extension: 'png', mimeType: 'image/png' },
  pgm: { extension: 'pgm', mimeType: 'image/x-portable-graymap' }
};

export const IMAGE_FORMATS: readonly ImageFormat[] = ['png', 'pgm'];

export const getFormatConfig = (format: ImageFormat): FormatConfig => FORMAT_CONFIGS[format];

export const isImageFormat = (value: string): value is ImageFormat =>
  IMAGE_FORMATS.some((format) => format === value);

/** Overlays caller-supplied sink options on the computed defaults. Undefined values do not override. */
export const mergeSinkOptions = (defaults: SinkOptions, overrides: Partial<SinkOptions> = {}): SinkOptions => ({
  width: overrides.width ?? defaults.width,
  height: overrides.height ?? defaults.height,
  mode: overrides.mode ?? defaults.mode,
  onRow: overrides.onRow ?? defaults.onRow
});
