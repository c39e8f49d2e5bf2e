export class IrregularGridError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IrregularGridError';
  }
}

export interface CodewordLocation {
  line?: number;
  column?: number;
}

export class MalformedCodewordError extends Error {
  readonly value: unknown;
  readonly targetWidth: number;
  readonly line?: number;
  readonly column?: number;

  constructor(message: string, value: unknown, targetWidth: number, location: CodewordLocation = {}) {
    const where = location.line !== undefined && location.column !== undefined
      ? ` (line ${location.line}, column ${location.column})`
      : '';
    super(`${message}${where}`);
    this.name = 'MalformedCodewordError';
    this.value = value;
    this.targetWidth = targetWidth;
    this.line = location.line;
    this.column = location.column;
  }
}

export class InvalidRenderOptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRenderOptionError';
  }
}

export class SinkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SinkError';
  }
}

export class GridFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GridFileError';
  }
}
