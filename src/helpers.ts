import { BitBuffer } from './BitBuffer';

/**
 * Number of bits in the natural binary representation of a non-negative integer.
 * Zero has no significant bits, so it returns 0.
 */
export function codeBitLength(code: number): number {
  return code === 0 ? 0 : code.toString(2).length;
}

/** Whether `code` fits in `width` bits, i.e. `code <= 2^width - 1`. */
export function fitsWidth(code: number, width: number): boolean {
  return codeBitLength(code) <= width;
}

/**
 * Number of bits a code occupies when written at `width`.
 * Codes wider than `width` keep their full representation.
 */
export function encodedCodeLength(code: number, width: number): number {
  return Math.max(width, codeBitLength(code));
}

/**
 * Binary text for a code at `width`: zero-extended on the left, never truncated.
 * `formatCode(255, 9)` is `'011111111'`; `formatCode(1024, 9)` is `'10000000000'`.
 */
export function formatCode(code: number, width: number): string {
  return code.toString(2).padStart(width, '0');
}

/**
 * Write a code MSB first using `encodedCodeLength(code, width)` bits.
 * Callers validate the code and width beforehand.
 */
export function writeCode(buf: BitBuffer, code: number, width: number): void {
  const length = encodedCodeLength(code, width);
  if (length <= 32) {
    buf.writeBits(code, length);
  } else {
    buf.writeBigBits(BigInt(code), length);
  }
}

/** Zero bits needed after `bitLength` bits under the given padding policy. */
export function paddingBits(bitLength: number, policy: PaddingPolicy): number {
  const misalignment = bitLength % 8;
  if (policy === 'always') {
    return 8 - misalignment;
  }
  return misalignment === 0 ? 0 : 8 - misalignment;
}

/**
 * `when-misaligned` pads only a partial last byte.
 * `always` reproduces the historical generator, which appends a full zero
 * byte when the stream already ends on a byte boundary.
 */
export type PaddingPolicy = 'when-misaligned' | 'always';
