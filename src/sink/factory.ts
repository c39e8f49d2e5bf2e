import { ImageFormat, ImageSink, SinkOptions } from './types';
import { PngSink } from './png';
import { PgmSink } from './pgm';

export const createSink = (format: ImageFormat, options: SinkOptions): ImageSink => {
  switch (format) {
    case 'png':
      return new PngSink(options);
    case 'pgm':
      return new PgmSink(options);
  }
};
