import { InvalidRenderOptionError } from './errors';

export interface RenderOptions {
  barWidth: number;
  quietZoneModules: number;
  rowHeight: number;
  black: number;
  white: number;
}

export const DEFAULT_RENDER_OPTIONS: Readonly<RenderOptions> = {
  barWidth: 5,
  quietZoneModules: 2,
  rowHeight: 4,
  black: 0,
  white: 255
};

const RENDER_OPTION_KEYS: readonly (keyof RenderOptions)[] = ['barWidth', 'quietZoneModules', 'rowHeight', 'black', 'white'];

const requireInteger = (key: keyof RenderOptions, value: number, min: number, max = Number.MAX_SAFE_INTEGER): void => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new InvalidRenderOptionError(`${key} must be an integer between ${min} and ${max}, got ${value}.`);
  }
};

export const validateRenderOptions = (options: RenderOptions): RenderOptions => {
  requireInteger('barWidth', options.barWidth, 1);
  requireInteger('rowHeight', options.rowHeight, 1);
  requireInteger('quietZoneModules', options.quietZoneModules, 0);
  requireInteger('black', options.black, 0, 255);
  requireInteger('white', options.white, 0, 255);
  return options;
};

export const resolveRenderOptions = (overrides: Partial<RenderOptions> = {}): RenderOptions => {
  const resolved: RenderOptions = { ...DEFAULT_RENDER_OPTIONS };
  for (const key of RENDER_OPTION_KEYS) {
    const value = overrides[key];
    if (value !== undefined) resolved[key] = value;
  }
  return validateRenderOptions(resolved);
};

export const quietZoneWidth = (options: RenderOptions): number => options.quietZoneModules * options.barWidth;
