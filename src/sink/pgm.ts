import { BufferedSink } from './buffered';

const MAX_SAMPLE = 255;

// Binary Netpbm graymap: "P5", size, max value, then raw 8-bit samples.
export class PgmSink extends BufferedSink {
  protected encode(pixels: Buffer): Buffer {
    const header = Buffer.from(`P5\n${this.options.width} ${this.options.height}\n${MAX_SAMPLE}\n`, 'ascii');
    return Buffer.concat([header, pixels]);
  }
}
