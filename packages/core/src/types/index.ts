import type { Verbosity } from '../util/logger.js';

/* ------------------------- Key sizes --------------------------------- */

/**
 * One supported AES key size. `id` is the key length in bits, and the
 * schedule length is always `rounds + 1`.
 */
export interface VariantDescriptor {
  readonly id: number;
  readonly name: string;
  readonly rounds: number;
  readonly scheduleLength: number;
}

/* ------------------------- Round keys -------------------------------- */

/**
 * Ordered round keys, 16 bytes each, produced by an external key expansion.
 * Bytes follow the AES input order, like the blocks they are added to.
 */
export type KeySchedule = readonly Uint8Array[];

/* ------------------------- Facade options ---------------------------- */

export interface BlockCipherOptions {
  /** Verbosity 0-4 (0 = errors only, 4 = state after every round) */
  verbose?        : Verbosity;
  /** Optional custom log sink (receives formatted messages) */
  logger?         : (msg: string) => void;
  /** Check that caller tables are permutations before every call */
  validateTables? : boolean;
}

