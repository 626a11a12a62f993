/**
 * The four AES round transformations and their inverses.
 *
 * Every function works on the row-major state grid (see `block/grid.ts`),
 * validates its operands and returns a new array; inputs are left untouched.
 */
import { assertBlock, getColumn, getRow, BLOCK_SIZE, COLS, ROWS, type Block } from '../block/grid.js';
import { mul2, mul3, mul9, mul11, mul13, mul14 } from '../math/gf256.js';
import { SBOX, INV_SBOX, assertTable, type ByteTable } from '../tables/sbox.js';

/* ------------------------------------------------------------------ */
/*  AddRoundKey                                                        */
/* ------------------------------------------------------------------ */

/** Position-wise XOR of the state with a round key. Self-inverse. */
export function addRoundKey(grid: Block, roundKey: Uint8Array): Block {
  assertBlock(grid);
  assertBlock(roundKey, 'Round key');
  const out = new Uint8Array(BLOCK_SIZE);
  for (let i = 0; i < BLOCK_SIZE; i++) out[i] = grid[i] ^ roundKey[i];
  return out;
}

/* ------------------------------------------------------------------ */
/*  SubBytes / InvSubBytes                                             */
/* ------------------------------------------------------------------ */

function substitute(grid: Block, table: ByteTable): Block {
  assertBlock(grid);
  assertTable(table);
  const out = new Uint8Array(BLOCK_SIZE);
  for (let i = 0; i < BLOCK_SIZE; i++) out[i] = table[grid[i]];
  return out;
}

export function subBytes(grid: Block, sbox: ByteTable = SBOX): Block {
  return substitute(grid, sbox);
}

export function invSubBytes(grid: Block, invSbox: ByteTable = INV_SBOX): Block {
  return substitute(grid, invSbox);
}

/* ------------------------------------------------------------------ */
/*  ShiftRows / InvShiftRows                                           */
/* ------------------------------------------------------------------ */

/** Rotate a row left by `shift` positions (any integer, taken modulo the row length). */
export function shiftRow(row: Uint8Array, shift: number): Uint8Array {
  const n   = row.length;
  const out = new Uint8Array(n);
  if (n === 0) return out;
  const s = ((shift % n) + n) % n;
  for (let i = 0; i < n; i++) out[i] = row[(i + s) % n];
  return out;
}

function shiftEachRow(grid: Block, direction: 1 | -1): Block {
  assertBlock(grid);
  const out = new Uint8Array(BLOCK_SIZE);
  for (let r = 0; r < ROWS; r++) {
    out.set(shiftRow(getRow(grid, r), direction * r), r * COLS);
  }
  return out;
}

/** Row `r` rotated left by `r`. */
export function shiftRows(grid: Block): Block {
  return shiftEachRow(grid, 1);
}

/** Row `r` rotated right by `r`. */
export function invShiftRows(grid: Block): Block {
  return shiftEachRow(grid, -1);
}

/* ------------------------------------------------------------------ */
/*  MixColumns / InvMixColumns                                         */
/* ------------------------------------------------------------------ */

/** One column times the MDS matrix [[2,3,1,1],[1,2,3,1],[1,1,2,3],[3,1,1,2]]. */
export function mixColumn(col: ArrayLike<number>): Uint8Array {
  const [a0, a1, a2, a3] = [col[0], col[1], col[2], col[3]];
  return Uint8Array.of(
    mul2(a0) ^ mul3(a1) ^ a2       ^ a3,
    a0       ^ mul2(a1) ^ mul3(a2) ^ a3,
    a0       ^ a1       ^ mul2(a2) ^ mul3(a3),
    mul3(a0) ^ a1       ^ a2       ^ mul2(a3),
  );
}

/** One column times the inverse matrix (coefficients 14, 11, 13, 9). */
export function invMixColumn(col: ArrayLike<number>): Uint8Array {
  const [a0, a1, a2, a3] = [col[0], col[1], col[2], col[3]];
  return Uint8Array.of(
    mul14(a0) ^ mul11(a1) ^ mul13(a2) ^ mul9(a3),
    mul9(a0)  ^ mul14(a1) ^ mul11(a2) ^ mul13(a3),
    mul13(a0) ^ mul9(a1)  ^ mul14(a2) ^ mul11(a3),
    mul11(a0) ^ mul13(a1) ^ mul9(a2)  ^ mul14(a3),
  );
}

function mapColumns(grid: Block, fn: (col: Uint8Array) => Uint8Array): Block {
  assertBlock(grid);
  const out = new Uint8Array(BLOCK_SIZE);
  for (let c = 0; c < COLS; c++) {
    const mixed = fn(getColumn(grid, c));
    for (let r = 0; r < ROWS; r++) out[r * COLS + c] = mixed[r];
  }
  return out;
}

export function mixColumns(grid: Block): Block {
  return mapColumns(grid, mixColumn);
}

export function invMixColumns(grid: Block): Block {
  return mapColumns(grid, invMixColumn);
}
