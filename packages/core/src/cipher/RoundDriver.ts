import { PlainBlock, CipherBlock } from '../block/CipherState.js';
import { transpose, type Block } from '../block/grid.js';
import { SBOX, INV_SBOX, assertTable, type ByteTable } from '../tables/sbox.js';
import { assertKeySchedule, loadRoundKeys } from './KeySchedule.js';
import {
  addRoundKey,
  subBytes,
  invSubBytes,
  shiftRows,
  invShiftRows,
  mixColumns,
  invMixColumns,
} from './transformations.js';
import { silentLogger, type Logger } from '../util/logger.js';
import { hexEncode } from '../util/bytes.js';
import type { KeySchedule } from '../types/index.js';

export interface RoundDriverOptions {
  logger?         : Logger;
  /** Require caller tables to be permutations, not just 256 bytes. */
  validateTables? : boolean;
}

/**
 * Runs the AES round sequence over one block.
 *
 * All argument checks happen before the first round, so a call either
 * returns a complete result or throws without producing anything.
 * The driver keeps no state between calls and may be shared freely.
 */
export class RoundDriver {
  private readonly logger: Logger;
  private readonly validateTables: boolean;

  constructor(opts: RoundDriverOptions = {}) {
    this.logger         = opts.logger ?? silentLogger;
    this.validateTables = opts.validateTables ?? false;
  }

  /**
   * Forward cipher: initial AddRoundKey, then SubBytes, ShiftRows,
   * MixColumns and AddRoundKey per round, without MixColumns in the last.
   *
   * @throws {InvalidKeyScheduleError} schedule length not 11, 13 or 15
   * @throws {InvalidLengthError} a round key is not 16 bytes
   * @throws {InvalidTableError} `sbox` is not a 256-byte table
   */
  encrypt(plain: PlainBlock, schedule: KeySchedule, sbox: ByteTable = SBOX): CipherBlock {
    const keys = this.prepare('encrypt', schedule, sbox);
    const last = keys.length - 1;

    let state = addRoundKey(transpose(plain.bytes), keys[0]);
    this.trace(0, state);

    for (let i = 1; i <= last; i++) {
      state = shiftRows(subBytes(state, sbox));
      if (i !== last) state = mixColumns(state);
      state = addRoundKey(state, keys[i]);
      this.trace(i, state);
    }

    const out = CipherBlock.from(transpose(state));
    this.logger.log(3, `encrypt: done → ${out.hex}`);
    return out;
  }

  /**
   * Inverse cipher: the forward rounds undone from the last round key
   * down to the first.
   *
   * @throws {InvalidKeyScheduleError} schedule length not 11, 13 or 15
   * @throws {InvalidLengthError} a round key is not 16 bytes
   * @throws {InvalidTableError} `invSbox` is not a 256-byte table
   */
  decrypt(cipher: CipherBlock, schedule: KeySchedule, invSbox: ByteTable = INV_SBOX): PlainBlock {
    const keys = this.prepare('decrypt', schedule, invSbox);
    const last = keys.length - 1;

    let state = addRoundKey(transpose(cipher.bytes), keys[last]);
    this.trace(last, state);

    for (let i = last - 1; i >= 0; i--) {
      state = invSubBytes(invShiftRows(state), invSbox);
      state = addRoundKey(state, keys[i]);
      if (i !== 0) state = invMixColumns(state);
      this.trace(i, state);
    }

    const out = PlainBlock.from(transpose(state));
    this.logger.log(3, `decrypt: done → ${out.hex}`);
    return out;
  }

  private prepare(op: 'encrypt' | 'decrypt', schedule: KeySchedule, table: ByteTable): Block[] {
    const variant = assertKeySchedule(schedule);
    assertTable(table, { bijective: this.validateTables });
    this.logger.log(2, `${op}: ${variant.name}, ${variant.rounds} rounds`);
    return loadRoundKeys(schedule);
  }

  private trace(round: number, state: Block): void {
    if (this.logger.level >= 4) {
      this.logger.log(4, `round ${round}: ${hexEncode(transpose(state))}`);
    }
  }
}
