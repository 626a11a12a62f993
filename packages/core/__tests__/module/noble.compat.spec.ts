import { ecb } from '@noble/ciphers/aes.js';
import { encrypt, decrypt, newPlain, newCipher } from '../../src/index.js';
import { expandKey, makeBytes } from '../_helper.js';

// Independent AES implementation as an oracle
describe('agreement with @noble/ciphers AES-ECB', () => {
  for (const keyLen of [16, 24, 32]) {
    it(`matches for ${keyLen * 8}-bit keys`, () => {
      for (let s = 0; s < 8; s++) {
        const key   = makeBytes(keyLen, s);
        const block = makeBytes(16, s + 40);
        const ref   = ecb(key, { disablePadding: true });
        const schedule = expandKey(key);

        const ours = encrypt(newPlain(block), schedule);
        expect(ours.bytes).toEqual(ref.encrypt(block));
        expect(decrypt(newCipher(ref.encrypt(block)), schedule).bytes).toEqual(block);
      }
    });
  }
});
