import '../src/config/defaults.js';
import { VariantRegistry } from '../src/config/VariantRegistry.js';
import { BlockCipherCore, encrypt, newPlain } from '../src/index.js';
import { VariantError, InvalidKeyScheduleError } from '../src/errors/index.js';
import { expandKey, makeBytes } from './_helper.js';

describe('VariantRegistry', () => {
  it('returns current (AES-128) descriptor', () => {
    expect(VariantRegistry.current.id).toBe(128);
    expect(VariantRegistry.current.rounds).toBe(10);
  });

  it('lists the three key sizes', () => {
    expect(VariantRegistry.list().map(v => [v.name, v.scheduleLength])).toEqual([
      ['AES-128', 11],
      ['AES-192', 13],
      ['AES-256', 15],
    ]);
  });

  it('resolves a schedule length', () => {
    expect(VariantRegistry.forSchedule(13).name).toBe('AES-192');
    expect(() => VariantRegistry.forSchedule(14)).toThrow(InvalidKeyScheduleError);
  });

  it('throws on unknown variant', () => {
    expect(() => VariantRegistry.get(64)).toThrow(VariantError);
  });

  it('prevents duplicate registration', () => {
    const dup = VariantRegistry.current;
    expect(() => VariantRegistry.register(dup)).toThrow(VariantError);
  });

  it('is sealed once the defaults have loaded', () => {
    expect(VariantRegistry.isSealed).toBe(true);
    expect(() => VariantRegistry.register({ id: 64, name: 'AES-64', rounds: 3, scheduleLength: 4 }))
      .toThrow('Registry is sealed; cannot add variant 64');
  });

  it('keeps rejecting a short schedule after a refused registration', () => {
    expect(() => VariantRegistry.register({ id: 64, name: 'AES-64', rounds: 3, scheduleLength: 4 }))
      .toThrow(VariantError);
    const fourKeys = Array.from({ length: 4 }, () => new Uint8Array(16));
    expect(() => encrypt(newPlain(new Uint8Array(16)), fourKeys)).toThrow(InvalidKeyScheduleError);
    expect(() => VariantRegistry.forSchedule(4))
      .toThrow('Key schedule must hold one of {11, 13, 15} round keys, got 4');
  });

  it('is reachable from the facade', () => {
    const core = new BlockCipherCore();
    expect(core.variantOf(expandKey(makeBytes(32))).name).toBe('AES-256');
    expect(BlockCipherCore.variants()).toHaveLength(3);
  });
});
