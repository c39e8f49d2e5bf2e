export type ImageFormat = 'png' | 'pgm';

export interface PixelFormat {
  colorType: 'grayscale';
  bitDepth: 8;
}

export const GRAYSCALE_8: PixelFormat = { colorType: 'grayscale', bitDepth: 8 };

export type RowListener = (row: Uint8Array, index: number) => void;

export interface SinkOptions {
  width: number;
  height: number;
  mode: PixelFormat;
  onRow?: RowListener;
}

export interface ImageSink {
  append(row: Uint8Array): void;
  close(): Buffer;
  release(): void;
}
