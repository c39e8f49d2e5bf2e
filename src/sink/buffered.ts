import { SinkError } from '../errors';
import { ImageSink, SinkOptions } from './types';

/**
 * Collects rows into one `width * height` sample buffer; subclasses turn the
 * finished buffer into file bytes.
 */
export abstract class BufferedSink implements ImageSink {
  protected readonly options: SinkOptions;
  private pixels: Buffer | null;
  private rows = 0;
  private closed = false;

  constructor(options: SinkOptions) {
    if (!Number.isInteger(options.width) || options.width <= 0 || !Number.isInteger(options.height) || options.height <= 0) {
      throw new SinkError(`Invalid image size ${options.width}x${options.height}.`);
    }
    this.options = options;
    this.pixels = Buffer.alloc(options.width * options.height);
  }

  append(row: Uint8Array): void {
    if (this.closed || !this.pixels) {
      throw new SinkError('Cannot append to a closed sink.');
    }
    if (row.length !== this.options.width) {
      throw new SinkError(`Row ${this.rows} has ${row.length} samples, expected ${this.options.width}.`);
    }
    if (this.rows >= this.options.height) {
      throw new SinkError(`Image already has all ${this.options.height} rows.`);
    }
    this.pixels.set(row, this.rows * this.options.width);
    this.options.onRow?.(Uint8Array.from(row), this.rows);
    this.rows += 1;
  }

  close(): Buffer {
    if (this.closed || !this.pixels) {
      throw new SinkError('Sink is already closed.');
    }
    this.closed = true;
    if (this.rows !== this.options.height) {
      throw new SinkError(`Image is incomplete: ${this.rows} of ${this.options.height} rows written.`);
    }
    return this.encode(this.pixels);
  }

  release(): void {
    this.closed = true;
    this.pixels = null;
  }

  protected abstract encode(pixels: Buffer): Buffer;
}
