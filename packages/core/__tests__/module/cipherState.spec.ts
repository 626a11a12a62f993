import { expectTypeOf } from 'vitest';
import {
  PlainBlock,
  CipherBlock,
  newPlain,
  newCipher,
  encrypt,
  decrypt,
} from '../../src/index.js';
import { InvalidLengthError, InvalidByteError, DecodingError } from '../../src/errors/index.js';
import { expandKey, makeBytes } from '../_helper.js';

const seq = (n: number) => Uint8Array.from({ length: n }, (_, i) => i);

describe('tagged blocks', () => {
  it('accept exactly 16 bytes', () => {
    expect(newPlain(seq(16)).phase).toBe('plain');
    expect(newCipher(seq(16)).phase).toBe('cipher');
    expect(() => newPlain(seq(15))).toThrow(InvalidLengthError);
    expect(() => newCipher(seq(17))).toThrow('Block must be 16 bytes, got 17');
    expect(() => newPlain([])).toThrow(InvalidLengthError);
  });

  it('reject entries that are not bytes', () => {
    const withOverflow = Array.from({ length: 16 }, () => 0);
    withOverflow[0] = 256;
    expect(() => newPlain(withOverflow)).toThrow('Block entry 0 is not a byte: 256');

    const withNegative = Array.from({ length: 16 }, () => 0);
    withNegative[5] = -1;
    expect(() => newCipher(withNegative)).toThrow(InvalidByteError);

    const withFraction = Array.from({ length: 16 }, () => 0);
    withFraction[15] = 1.7;
    expect(() => newPlain(withFraction)).toThrow('Block entry 15 is not a byte: 1.7');
  });

  it('copy the caller bytes on the way in', () => {
    const src = seq(16);
    const p   = newPlain(src);
    src[0] = 0xff;
    expect(p.bytes[0]).toBe(0);
  });

  it('hand out copies on the way out', () => {
    const p = newPlain(seq(16));
    const out = p.bytes;
    out[1] = 0xff;
    expect(p.bytes[1]).toBe(1);
  });

  it('round-trip through hex', () => {
    const hex = '00112233445566778899aabbccddeeff';
    expect(PlainBlock.fromHex(hex).hex).toBe(hex);
    expect(String(CipherBlock.fromHex(hex))).toBe(hex);
  });

  it('reject malformed hex', () => {
    expect(() => PlainBlock.fromHex('zz112233445566778899aabbccddeeff')).toThrow(DecodingError);
    expect(() => PlainBlock.fromHex('0011')).toThrow(InvalidLengthError);
  });

  it('keep the two phases apart at compile time', () => {
    expectTypeOf(newPlain(seq(16)).phase).toEqualTypeOf<'plain'>();
    expectTypeOf(newCipher(seq(16)).phase).toEqualTypeOf<'cipher'>();
    expectTypeOf<PlainBlock>().not.toEqualTypeOf<CipherBlock>();
    expectTypeOf(encrypt).parameter(0).toEqualTypeOf<PlainBlock>();
    expectTypeOf(encrypt).returns.toEqualTypeOf<CipherBlock>();
    expectTypeOf(decrypt).parameter(0).toEqualTypeOf<CipherBlock>();
    expectTypeOf(decrypt).returns.toEqualTypeOf<PlainBlock>();
  });

  it('refuse to compile encryption of ciphertext or decryption of plaintext', () => {
    const schedule = expandKey(makeBytes(16));
    const misuse = () => {
      // @ts-expect-error a CipherBlock cannot be encrypted
      encrypt(newCipher(seq(16)), schedule);
      // @ts-expect-error a PlainBlock cannot be decrypted
      decrypt(newPlain(seq(16)), schedule);
      // @ts-expect-error encryption never yields a PlainBlock
      const p: PlainBlock = encrypt(newPlain(seq(16)), schedule);
      return p;
    };
    expect(typeof misuse).toBe('function');
  });
});
