import { InvalidByteError, InvalidLengthError } from '../errors/index.js';

/**
 * A 16-byte cipher state viewed as a 4×4 matrix in row-major order:
 * byte `i` sits at row `i >> 2`, column `i & 3`.
 */
export type Block = Uint8Array;

export const BLOCK_SIZE = 16;
export const ROWS = 4;
export const COLS = 4;

export function assertBlock(b: ArrayLike<number>, what = 'Block'): void {
  if (b.length !== BLOCK_SIZE) {
    throw new InvalidLengthError(`${what} must be ${BLOCK_SIZE} bytes, got ${b.length}`);
  }
}

/** Throws {@link InvalidByteError} on the first entry outside 0..255 or not an integer. */
export function assertBytes(b: ArrayLike<number>, what = 'Block'): void {
  for (let i = 0; i < b.length; i++) {
    const v = b[i];
    if (!Number.isInteger(v) || v < 0 || v > 0xff) {
      throw new InvalidByteError(`${what} entry ${i} is not a byte: ${v}`);
    }
  }
}

/** Row `r` as a fresh 4-byte array. */
export function getRow(grid: Block, r: number): Uint8Array {
  return grid.slice(r * COLS, r * COLS + COLS);
}

/** Column `c` (bytes c, c+4, c+8, c+12) as a fresh 4-byte array. */
export function getColumn(grid: Block, c: number): Uint8Array {
  return Uint8Array.of(grid[c], grid[c + 4], grid[c + 8], grid[c + 12]);
}

/**
 * Swap rows and columns. Converts between the AES input byte order, which
 * fills the state column by column, and the row-major grid; it is its own
 * inverse.
 */
export function transpose(b: Uint8Array): Block {
  assertBlock(b);
  const out = new Uint8Array(BLOCK_SIZE);
  for (let r = 0; r < ROWS; r++) {
    for (let c = 0; c < COLS; c++) out[r * COLS + c] = b[c * ROWS + r];
  }
  return out;
}
