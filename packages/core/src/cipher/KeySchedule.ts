import '../config/defaults.js';
import { VariantRegistry } from '../config/VariantRegistry.js';
import { assertBlock, transpose, type Block } from '../block/grid.js';
import type { KeySchedule, VariantDescriptor } from '../types/index.js';

/**
 * Check a schedule's shape and resolve its key size.
 *
 * @throws {InvalidKeyScheduleError} when the round-key count is not 11, 13 or 15
 * @throws {InvalidLengthError} when any round key is not 16 bytes
 */
export function assertKeySchedule(schedule: KeySchedule): VariantDescriptor {
  const variant = VariantRegistry.forSchedule(schedule.length);
  schedule.forEach((rk, i) => assertBlock(rk, `Round key ${i}`));
  return variant;
}

/** Round keys laid out on the state grid, in schedule order. */
export function loadRoundKeys(schedule: KeySchedule): Block[] {
  return schedule.map(transpose);
}
