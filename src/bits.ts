import { MalformedCodewordError, CodewordLocation } from './errors';
import { CODEWORD_BITS, STOP_PATTERN_BITS } from './geometry';
import { Bit, Codeword } from './types';

export const codewordBitWidth = (column: number, columns: number): number =>
  column === columns - 1 ? STOP_PATTERN_BITS : CODEWORD_BITS;

/**
 * Expands a codeword into MSB-first bits, zero-padded on the left to `targetWidth`.
 *
 * An absent codeword always expands to {@link CODEWORD_BITS} zeros, including in the
 * stop pattern column.
 */
export const expandCodeword = (
  codeword: Codeword,
  targetWidth: number,
  location?: CodewordLocation
): Bit[] => {
  if (codeword === null || codeword === undefined) {
    return new Array<Bit>(CODEWORD_BITS).fill(0);
  }

  if (!Number.isSafeInteger(codeword) || codeword < 0) {
    throw new MalformedCodewordError(
      `Codeword must be a non-negative integer, got ${codeword}.`,
      codeword,
      targetWidth,
      location
    );
  }

  const digits = codeword.toString(2);
  if (digits.length > targetWidth) {
    throw new MalformedCodewordError(
      `Codeword ${codeword} needs ${digits.length} bits but only ${targetWidth} are available.`,
      codeword,
      targetWidth,
      location
    );
  }

  const bits = new Array<Bit>(targetWidth).fill(0);
  const padding = targetWidth - digits.length;
  for (let i = 0; i < digits.length; i++) {
    if (digits[i] === '1') bits[padding + i] = 1;
  }
  return bits;
};

export const readBits = (bits: readonly Bit[]): number =>
  bits.reduce<number>((value, bit) => value * 2 + bit, 0);
