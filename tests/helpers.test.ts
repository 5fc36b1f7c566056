import { BitBuffer } from '../src/BitBuffer';
import {
  codeBitLength,
  encodedCodeLength,
  fitsWidth,
  formatCode,
  paddingBits,
  writeCode,
} from '../src/helpers';

describe('helpers', () => {
  describe('codeBitLength', () => {
    it('counts significant bits', () => {
      expect(codeBitLength(0)).toBe(0);
      expect(codeBitLength(1)).toBe(1);
      expect(codeBitLength(255)).toBe(8);
      expect(codeBitLength(256)).toBe(9);
      expect(codeBitLength(4095)).toBe(12);
    });
  });

  describe('fitsWidth', () => {
    it('accepts codes up to 2^width - 1', () => {
      expect(fitsWidth(511, 9)).toBe(true);
      expect(fitsWidth(0, 1)).toBe(true);
    });

    it('rejects wider codes', () => {
      expect(fitsWidth(512, 9)).toBe(false);
    });
  });

  describe('encodedCodeLength', () => {
    it('uses the width for fitting codes', () => {
      expect(encodedCodeLength(255, 9)).toBe(9);
    });

    it('keeps the full length of oversized codes', () => {
      expect(encodedCodeLength(31, 4)).toBe(5);
    });
  });

  describe('formatCode', () => {
    it('zero-extends on the left', () => {
      expect(formatCode(255, 9)).toBe('011111111');
      expect(formatCode(0, 3)).toBe('000');
    });

    it('does not truncate oversized codes', () => {
      expect(formatCode(1024, 9)).toBe('10000000000');
    });
  });

  describe('writeCode', () => {
    it('writes the same bits formatCode describes', () => {
      const buf = BitBuffer.alloc();
      writeCode(buf, 255, 9);
      writeCode(buf, 1024, 9);
      expect(buf.toBinaryString()).toBe('011111111' + '10000000000');
    });

    it('writes codes longer than 32 bits', () => {
      const buf = BitBuffer.alloc();
      writeCode(buf, 2 ** 33, 9);
      expect(buf.bitLength).toBe(34);
      expect(buf.toBinaryString()).toBe('1' + '0'.repeat(33));
    });
  });

  describe('paddingBits', () => {
    it('pads a partial byte under both policies', () => {
      expect(paddingBits(9, 'when-misaligned')).toBe(7);
      expect(paddingBits(9, 'always')).toBe(7);
    });

    it('adds nothing to an aligned stream when misaligned-only', () => {
      expect(paddingBits(16, 'when-misaligned')).toBe(0);
      expect(paddingBits(0, 'when-misaligned')).toBe(0);
    });

    it('adds a full byte to an aligned stream when always', () => {
      expect(paddingBits(16, 'always')).toBe(8);
      expect(paddingBits(0, 'always')).toBe(8);
    });
  });
});
