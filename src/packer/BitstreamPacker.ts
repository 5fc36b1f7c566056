import { BitBuffer, parseBitPattern } from '../BitBuffer';
import { CodeWidthOverflowError, SegmentError } from '../errors';
import {
  encodedCodeLength,
  fitsWidth,
  paddingBits,
  writeCode,
  type PaddingPolicy,
} from '../helpers';
import { MAX_CODE_WIDTH, type Segment } from '../segments';

/**
 * `passthrough` writes an oversized code with its full binary representation,
 * silently growing the stream. `strict` throws CodeWidthOverflowError instead.
 */
export type OverflowMode = 'passthrough' | 'strict';

export interface PackerOptions {
  overflow?: OverflowMode;
  padding?: PaddingPolicy;
}

export interface PackedSize {
  /** Bits contributed by the segments, before padding. */
  bitLength: number;
  paddingBits: number;
  byteLength: number;
}

/**
 * Packs ordered code segments into a byte-aligned, MSB-first stream of the
 * kind LZW decoders consume.
 */
export class BitstreamPacker {
  readonly overflow: OverflowMode;
  readonly padding: PaddingPolicy;

  constructor(options?: PackerOptions) {
    this.overflow = options?.overflow ?? 'passthrough';
    this.padding = options?.padding ?? 'when-misaligned';
  }

  /** Pack segments into bytes. */
  pack(segments: readonly Segment[]): Uint8Array {
    return this.packToBitBuffer(segments).toUint8Array();
  }

  /**
   * Pack segments into a bit buffer, padding included.
   * The returned buffer's cursor sits at the end of the data.
   */
  packToBitBuffer(segments: readonly Segment[]): BitBuffer {
    const size = this.measure(segments);
    const buf = BitBuffer.alloc(size.byteLength);
    for (const segment of segments) {
      if (segment.kind === 'pattern') {
        buf.writePattern(parseBitPattern(segment.pattern), segment.repeat);
        continue;
      }
      for (const code of segment.codes) {
        writeCode(buf, code, segment.width);
      }
    }
    buf.writeZeros(size.paddingBits);
    return buf;
  }

  /**
   * Compute the stream size without building it.
   * Validates every segment, so it throws exactly where `pack` would.
   */
  measure(segments: readonly Segment[]): PackedSize {
    let bitLength = 0;
    segments.forEach((segment, segmentIndex) => {
      bitLength += this.segmentBitLength(segment, segmentIndex);
    });
    const pad = paddingBits(bitLength, this.padding);
    return {
      bitLength,
      paddingBits: pad,
      byteLength: (bitLength + pad) / 8,
    };
  }

  private segmentBitLength(segment: Segment, segmentIndex: number): number {
    if (segment.kind === 'pattern') {
      if (segment.pattern.length === 0 || !/^[01]+$/.test(segment.pattern)) {
        throw new SegmentError(segmentIndex, `pattern must be a non-empty string of 0/1, got '${segment.pattern}'`);
      }
      if (!Number.isSafeInteger(segment.repeat) || segment.repeat < 0) {
        throw new SegmentError(segmentIndex, `repeat must be a non-negative integer, got ${segment.repeat}`);
      }
      return segment.pattern.length * segment.repeat;
    }

    const { width, codes } = segment;
    if (!Number.isInteger(width) || width < 1 || width > MAX_CODE_WIDTH) {
      throw new SegmentError(segmentIndex, `width must be an integer in 1..${MAX_CODE_WIDTH}, got ${width}`);
    }
    let bits = 0;
    codes.forEach((code, codeIndex) => {
      if (!Number.isSafeInteger(code) || code < 0) {
        throw new SegmentError(segmentIndex, `code at index ${codeIndex} must be a non-negative integer, got ${code}`);
      }
      if (this.overflow === 'strict' && !fitsWidth(code, width)) {
        throw new CodeWidthOverflowError(code, width, segmentIndex, codeIndex);
      }
      bits += encodedCodeLength(code, width);
    });
    return bits;
  }
}

/** Pack with a one-off packer. */
export function pack(segments: readonly Segment[], options?: PackerOptions): Uint8Array {
  return new BitstreamPacker(options).pack(segments);
}
