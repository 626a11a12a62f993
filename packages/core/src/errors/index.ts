const DISABLE_STACKTRACE : boolean = true;

export class BlockCipherError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name  = new.target.name;
    if (DISABLE_STACKTRACE) this.stack = undefined;
  }
}

/** A block or round key is not exactly 16 bytes. */
export class InvalidLengthError      extends BlockCipherError {}
/** A block entry is not an integer in 0..255. */
export class InvalidByteError        extends BlockCipherError {}
/** Round-key count matches no supported key size. */
export class InvalidKeyScheduleError extends BlockCipherError {}
/** Substitution table is not 256 bytes, or not a permutation when checked. */
export class InvalidTableError       extends BlockCipherError {}
export class VariantError            extends BlockCipherError {}
export class DecodingError           extends BlockCipherError {}
