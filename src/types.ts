/** A codeword value, or an absent slot. */
export type Codeword = number | null | undefined;

export type GridLine = readonly Codeword[];

/** Lines of codewords, top to bottom. The last codeword of each line is its stop pattern. */
export type Grid = readonly GridLine[];

export type Bit = 0 | 1;
