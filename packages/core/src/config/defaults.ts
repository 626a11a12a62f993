import { VariantRegistry } from './VariantRegistry.js';
import type { VariantDescriptor } from '../types/index.js';

const aes128: VariantDescriptor = {
  id: 128,
  name: 'AES-128',
  rounds: 10,
  scheduleLength: 11,
};

VariantRegistry.register(aes128);

const aes192: VariantDescriptor = {
  id: 192,
  name: 'AES-192',
  rounds: 12,
  scheduleLength: 13,
};

VariantRegistry.register(aes192);

const aes256: VariantDescriptor = {
  id: 256,
  name: 'AES-256',
  rounds: 14,
  scheduleLength: 15,
};

VariantRegistry.register(aes256);

VariantRegistry.seal();

export const DEFAULT_VERBOSITY = 0 as const;
