import fs from 'fs';
import { GridFileError } from './errors';
import { Codeword, Grid } from './types';

const parseCodeword = (value: unknown, line: number, column: number): Codeword => {
  if (value === null) return null;
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  throw new GridFileError(
    `Codeword at line ${line}, column ${column} must be an integer or null, got ${JSON.stringify(value)}.`
  );
};

export const parseGrid = (text: string): Grid => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new GridFileError('Grid file is not valid JSON.');
  }

  if (!Array.isArray(parsed)) {
    throw new GridFileError('Grid must be a JSON array of lines.');
  }

  return parsed.map((line: unknown, lineIndex) => {
    if (!Array.isArray(line)) {
      throw new GridFileError(`Line ${lineIndex} must be an array of codewords.`);
    }
    return line.map((value: unknown, column) => parseCodeword(value, lineIndex, column));
  });
};

export const readGridFile = async (filePath: string): Promise<Grid> => {
  const stats = await fs.promises.stat(filePath).catch(() => null);
  if (!stats || !stats.isFile()) {
    throw new GridFileError('Input grid file not found.');
  }
  return parseGrid(await fs.promises.readFile(filePath, 'utf8'));
};
