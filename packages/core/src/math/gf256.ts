/**
 * Arithmetic in GF(2^8) with the AES reduction polynomial
 * x^8 + x^4 + x^3 + x + 1 (0x11B).
 */

/** Low byte of the reduction polynomial, folded in when bit 7 overflows. */
export const REDUCTION = 0x1b;

/** Multiply `b` by `x`: shift left, reduce if the dropped bit was set. */
export function xtime(b: number): number {
  const shifted = (b << 1) & 0xff;
  return (b & 0x80) ? shifted ^ REDUCTION : shifted;
}

/**
 * General field multiplication by shift-and-add over {@link xtime}.
 * Both operands are taken modulo 256.
 */
export function gfMul(a: number, b: number): number {
  let p = 0;
  let x = a & 0xff;
  for (let y = b & 0xff; y !== 0; y >>>= 1) {
    if (y & 1) p ^= x;
    x = xtime(x);
  }
  return p;
}

/* ----------  fixed multipliers used by (Inv)MixColumns  ----------- */

export const mul2  = (x: number): number => xtime(x);
export const mul3  = (x: number): number => xtime(x) ^ x;

export function mul9(x: number): number {
  return xtime(xtime(xtime(x))) ^ x;
}

export function mul11(x: number): number {
  const x2 = xtime(x);
  return xtime(xtime(x2)) ^ x2 ^ x;
}

export function mul13(x: number): number {
  const x4 = xtime(xtime(x));
  return xtime(x4) ^ x4 ^ x;
}

export function mul14(x: number): number {
  const x2 = xtime(x);
  const x4 = xtime(x2);
  return xtime(x4) ^ x4 ^ x2;
}
