import { PNG } from 'pngjs';
import { BufferedSink } from './buffered';

const PNG_GRAYSCALE = 0;

export class PngSink extends BufferedSink {
  protected encode(pixels: Buffer): Buffer {
    const png = new PNG({ width: this.options.width, height: this.options.height });
    png.data = pixels;
    return PNG.sync.write(png, {
      colorType: PNG_GRAYSCALE,
      inputColorType: PNG_GRAYSCALE,
      inputHasAlpha: false,
      bitDepth: this.options.mode.bitDepth
    });
  }
}
