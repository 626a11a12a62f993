import { xtime } from '../math/gf256.js';
import { InvalidTableError } from '../errors/index.js';

/**
 * A 256-entry byte substitution table. Entries are read, never written.
 */
export type ByteTable = ArrayLike<number>;

export const TABLE_SIZE = 256;

/** Affine-transform constant of the AES S-box. */
const AFFINE_CONSTANT = 0x63;

const rotl8 = (x: number, n: number): number => ((x << n) | (x >>> (8 - n))) & 0xff;

/*
 * Exponent / logarithm tables over the generator 0x03 give the
 * multiplicative inverse: inv(x) = 3^(255 - log3(x)), with inv(0) = 0.
 */
function buildSBox(): number[] {
  const exp = new Array<number>(255);
  const log = new Array<number>(TABLE_SIZE).fill(0);
  let p = 1;
  for (let i = 0; i < 255; i++) {
    exp[i] = p;
    log[p] = i;
    p ^= xtime(p);            // p · 3
  }

  const out = new Array<number>(TABLE_SIZE);
  for (let x = 0; x < TABLE_SIZE; x++) {
    const inv = x === 0 ? 0 : exp[(255 - log[x]) % 255];
    out[x] = inv
      ^ rotl8(inv, 1) ^ rotl8(inv, 2) ^ rotl8(inv, 3) ^ rotl8(inv, 4)
      ^ AFFINE_CONSTANT;
  }
  return out;
}

export interface TableCheckOptions {
  /** Also require every byte value to appear exactly once. */
  bijective?: boolean;
}

/**
 * Throws {@link InvalidTableError} unless `table` holds exactly 256 byte
 * values (and, with `bijective`, is a permutation of 0..255).
 */
export function assertTable(table: ByteTable, opts: TableCheckOptions = {}): void {
  if (table.length !== TABLE_SIZE) {
    throw new InvalidTableError(
      `Substitution table must have ${TABLE_SIZE} entries, got ${table.length}`,
    );
  }
  const seen = new Uint8Array(TABLE_SIZE);
  for (let i = 0; i < TABLE_SIZE; i++) {
    const v = table[i];
    if (!Number.isInteger(v) || v < 0 || v > 0xff) {
      throw new InvalidTableError(`Entry ${i} is not a byte: ${v}`);
    }
    if (opts.bijective) {
      if (seen[v]) throw new InvalidTableError(`Table is not a permutation: ${v} repeats`);
      seen[v] = 1;
    }
  }
}

/** Inverse permutation of a bijective table. */
export function invertTable(table: ByteTable): readonly number[] {
  assertTable(table, { bijective: true });
  const inv = new Array<number>(TABLE_SIZE);
  for (let x = 0; x < TABLE_SIZE; x++) inv[table[x]] = x;
  return Object.freeze(inv);
}

/** Forward AES S-box, generated once on load. */
export const SBOX: readonly number[] = Object.freeze(buildSBox());

/** Inverse AES S-box. */
export const INV_SBOX: readonly number[] = invertTable(SBOX);
