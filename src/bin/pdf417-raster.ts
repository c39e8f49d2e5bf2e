#!/usr/bin/env node

import fs from 'fs';
import path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { encodeGrid } from '../encoder';
import { computeGeometry } from '../geometry';
import { readGridFile } from '../grid-file';
import { logError, logInfo, logSuccess, logWarn, styleKV, styleSize } from '../logger';
import { resolveRenderOptions } from '../render-config';
import { getFormatConfig, IMAGE_FORMATS, isImageFormat } from '../sink/config';
import { ImageFormat } from '../sink/types';
import { getErrorMessage, resolveOutputPath } from '../utils';
import pkg from '../../package.json';

interface CliOptions {
  output?: string;
  format: ImageFormat;
  barWidth?: number;
  rowHeight?: number;
  quietZone?: number;
}

const parseCount = (min: number) => (value: string): number => {
  const numeric = Number(value);
  if (!Number.isInteger(numeric) || numeric < min) {
    throw new InvalidArgumentError(`Must be an integer of at least ${min}.`);
  }
  return numeric;
};

const parseFormat = (value: string): ImageFormat => {
  const format = value.toLowerCase();
  if (!isImageFormat(format)) {
    throw new InvalidArgumentError(`Format must be one of: ${IMAGE_FORMATS.join(', ')}`);
  }
  return format;
};

const renderGridFile = async (inputPath: string, opts: CliOptions): Promise<void> => {
  const grid = await readGridFile(inputPath);
  const render = resolveRenderOptions({
    barWidth: opts.barWidth,
    rowHeight: opts.rowHeight,
    quietZoneModules: opts.quietZone
  });
  const geometry = computeGeometry(grid, render);
  const { extension, mimeType } = getFormatConfig(opts.format);
  const outputPath = resolveOutputPath(inputPath, opts.output ? path.resolve(opts.output) : null, extension);

  if (fs.existsSync(outputPath)) {
    logWarn('Output image exists and will be overwritten.');
  }

  logInfo(styleKV('Input grid', inputPath));
  logInfo(`${styleKV('Output image', outputPath)} (${mimeType})`);
  logInfo(`${styleSize(geometry.width, geometry.height)}, ${styleKV('Lines', geometry.lines)}, ${styleKV('Columns', geometry.columns)}`);

  const image = encodeGrid(grid, { ...render, format: opts.format });
  await fs.promises.writeFile(outputPath, image);
  logSuccess('Barcode image written.');
};

new Command()
  .name('pdf417-raster')
  .description('Render a PDF417 codeword grid (JSON) into a grayscale image.')
  .version(pkg.version, '-v, --version', 'Show version')
  .argument('<grid_json>', 'JSON file holding an array of codeword lines')
  .option('-o, --output <path>', 'Output image path (optional, defaults to the input name)')
  .option('-f, --format <format>', `Image format: ${IMAGE_FORMATS.join(', ')} (default: png)`, parseFormat, 'png')
  .option('-b, --bar-width <pixels>', 'Module width in pixels (default: 5)', parseCount(1))
  .option('-r, --row-height <modules>', 'Line height in modules (default: 4)', parseCount(1))
  .option('-q, --quiet-zone <modules>', 'Quiet zone in modules (default: 2)', parseCount(0))
  .helpOption('-h, --help', 'Show help')
  .action(async (gridFile: string, opts: CliOptions) => {
    try {
      await renderGridFile(path.resolve(gridFile), opts);
    } catch (err) {
      logError(getErrorMessage(err));
      process.exit(1);
    }
  })
  .parse();
