import { assertBlock, assertBytes } from './grid.js';
import { hexDecode, hexEncode } from '../util/bytes.js';

export type Phase = 'plain' | 'cipher';

/**
 * A 16-byte block tagged with the phase it is in. The bytes are copied on
 * the way in and on the way out, so no caller ever shares the backing store.
 *
 * Bytes are kept in AES input order (column by column); the round driver
 * transposes them onto the row-major state grid.
 */
export abstract class TaggedBlock<P extends Phase> {
  abstract readonly phase: P;
  private readonly data: Uint8Array;

  protected constructor(bytes: ArrayLike<number>) {
    assertBlock(bytes);
    assertBytes(bytes);
    this.data = Uint8Array.from(bytes);
  }

  /** Copy of the block bytes. */
  get bytes(): Uint8Array { return this.data.slice(); }

  get hex(): string { return hexEncode(this.data); }

  toString(): string { return this.hex; }
}

/** A block that may only be encrypted. */
export class PlainBlock extends TaggedBlock<'plain'> {
  readonly phase = 'plain' as const;

  static from(bytes: ArrayLike<number>): PlainBlock { return new PlainBlock(bytes); }
  static fromHex(hex: string): PlainBlock { return new PlainBlock(hexDecode(hex)); }

  private constructor(bytes: ArrayLike<number>) { super(bytes); }
}

/** A block that may only be decrypted. */
export class CipherBlock extends TaggedBlock<'cipher'> {
  readonly phase = 'cipher' as const;

  static from(bytes: ArrayLike<number>): CipherBlock { return new CipherBlock(bytes); }
  static fromHex(hex: string): CipherBlock { return new CipherBlock(hexDecode(hex)); }

  private constructor(bytes: ArrayLike<number>) { super(bytes); }
}

export type CipherState = PlainBlock | CipherBlock;

/** @throws {InvalidLengthError} unless `bytes` is exactly 16 long */
export function newPlain(bytes: ArrayLike<number>): PlainBlock {
  return PlainBlock.from(bytes);
}

/** @throws {InvalidLengthError} unless `bytes` is exactly 16 long */
export function newCipher(bytes: ArrayLike<number>): CipherBlock {
  return CipherBlock.from(bytes);
}
