import { DecodingError } from "../errors/index.js";

/* ----------  Hex encode  ------------------------------------------ */
export function hexEncode(u8: Uint8Array): string {
  let s = '';
  for (let i = 0; i < u8.length; i++) {
    s += u8[i].toString(16).padStart(2, '0');
  }
  return s;
}

/* ----------  Hex decode  ------------------------------------------ */
export function hexDecode(hex: string): Uint8Array {
  if (!/^(?:[0-9a-fA-F]{2})*$/.test(hex)) {
    throw new DecodingError(
      `Invalid hex: length=${hex.length}, content='${hex.slice(0, 12)}…'`,
    );
  }
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}
