export const WORD_MASK = 0xffff;

export function toUint16(value: number): number {
  return value & WORD_MASK;
}

/**
 * Widens the low `bitCount` bits of `x` to 16 bits, copying the field's top
 * bit into every bit above it.
 */
export function signExtend(x: number, bitCount: number): number {
  const field = x & ((1 << bitCount) - 1);
  if ((field >> (bitCount - 1)) & 1) {
    return (field | (WORD_MASK << bitCount)) & WORD_MASK;
  }
  return field;
}
