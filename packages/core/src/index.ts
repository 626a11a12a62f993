// packages/core/src/index.ts

import { DEFAULT_VERBOSITY }        from './config/defaults.js';
import { VariantRegistry }          from './config/VariantRegistry.js';
import { RoundDriver }              from './cipher/RoundDriver.js';
import { PlainBlock, CipherBlock }  from './block/CipherState.js';
import { SBOX, INV_SBOX, type ByteTable } from './tables/sbox.js';
import { createLogger, type Logger } from './util/logger.js';
import type {
  BlockCipherOptions,
  KeySchedule,
  VariantDescriptor,
} from './types/index.js';

// ────────────────────────────────────────────────────────────────────────────
//  Stateless helpers
// ────────────────────────────────────────────────────────────────────────────

const defaultDriver = new RoundDriver();

/**
 * Encrypt one plaintext block with a precomputed key schedule.
 *
 * @param plain    - Block in the plain phase
 * @param schedule - 11, 13 or 15 round keys of 16 bytes
 * @param sbox     - Substitution table; the AES S-box unless overridden
 * @throws {InvalidKeyScheduleError | InvalidLengthError | InvalidTableError}
 */
export function encrypt(
  plain   : PlainBlock,
  schedule: KeySchedule,
  sbox    : ByteTable = SBOX,
): CipherBlock {
  return defaultDriver.encrypt(plain, schedule, sbox);
}

/**
 * Decrypt one ciphertext block. Mirrors {@link encrypt}; `invSbox` must be
 * the inverse of the table used to encrypt.
 */
export function decrypt(
  cipher  : CipherBlock,
  schedule: KeySchedule,
  invSbox : ByteTable = INV_SBOX,
): PlainBlock {
  return defaultDriver.decrypt(cipher, schedule, invSbox);
}

// ────────────────────────────────────────────────────────────────────────────
//  Configured facade
// ────────────────────────────────────────────────────────────────────────────

/**
 * Block cipher core with logging and table validation settings applied to
 * every call. Holds no per-call state.
 */
export class BlockCipherCore {
  private readonly driver : RoundDriver;

  // — diagnostics ------------------------------------------------------------
  private readonly log : Logger;

  constructor(opt: BlockCipherOptions = {}) {
    this.log    = createLogger(opt.verbose ?? DEFAULT_VERBOSITY, opt.logger);
    this.driver = new RoundDriver({
      logger        : this.log,
      validateTables: opt.validateTables ?? false,
    });
  }

  encrypt(plain: PlainBlock, schedule: KeySchedule, sbox: ByteTable = SBOX): CipherBlock {
    return this.driver.encrypt(plain, schedule, sbox);
  }

  decrypt(cipher: CipherBlock, schedule: KeySchedule, invSbox: ByteTable = INV_SBOX): PlainBlock {
    return this.driver.decrypt(cipher, schedule, invSbox);
  }

  /** Key size a schedule belongs to, judged by its length. */
  variantOf(schedule: KeySchedule): VariantDescriptor {
    return VariantRegistry.forSchedule(schedule.length);
  }

  /** Registered key sizes, smallest first. */
  static variants(): VariantDescriptor[] {
    return VariantRegistry.list();
  }
}

// ────────────────────────────────────────────────────────────────────────────
//  Re-exports
// ────────────────────────────────────────────────────────────────────────────

export { RoundDriver, type RoundDriverOptions } from './cipher/RoundDriver.js';
export {
  PlainBlock,
  CipherBlock,
  newPlain,
  newCipher,
  type CipherState,
  type Phase,
} from './block/CipherState.js';
export { BLOCK_SIZE, transpose, assertBytes, type Block } from './block/grid.js';
export {
  addRoundKey,
  subBytes,
  invSubBytes,
  shiftRow,
  shiftRows,
  invShiftRows,
  mixColumn,
  invMixColumn,
  mixColumns,
  invMixColumns,
} from './cipher/transformations.js';
export { assertKeySchedule } from './cipher/KeySchedule.js';
export { xtime, gfMul } from './math/gf256.js';
export { SBOX, INV_SBOX, invertTable, assertTable, type ByteTable } from './tables/sbox.js';
export { VariantRegistry, SCHEDULE_LENGTHS } from './config/VariantRegistry.js';
export { createLogger, type Logger, type Verbosity } from './util/logger.js';
export { hexEncode, hexDecode } from './util/bytes.js';
export type { BlockCipherOptions, KeySchedule, VariantDescriptor } from './types/index.js';
export {
  BlockCipherError,
  InvalidLengthError,
  InvalidKeyScheduleError,
  InvalidTableError,
  InvalidByteError,
  VariantError,
  DecodingError,
} from './errors/index.js';
