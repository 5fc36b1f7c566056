import { BitBuffer, parseBitPattern } from '../src/BitBuffer';

describe('BitBuffer', () => {
  describe('alloc and basic properties', () => {
    it('starts with zero bitLength and offset', () => {
      const buf = BitBuffer.alloc();
      expect(buf.bitLength).toBe(0);
      expect(buf.offset).toBe(0);
      expect(buf.remaining).toBe(0);
    });
  });

  describe('writeBit / readBit', () => {
    it('stores bits MSB-first', () => {
      const buf = BitBuffer.alloc();
      buf.writeBit(1);
      buf.writeBit(0);
      buf.writeBit(1);
      expect(buf.toUint8Array()).toEqual(new Uint8Array([0b10100000]));

      buf.reset();
      expect(buf.readBit()).toBe(1);
      expect(buf.readBit()).toBe(0);
      expect(buf.readBit()).toBe(1);
    });

    it('throws when reading past end', () => {
      const buf = BitBuffer.alloc();
      buf.writeBit(1);
      buf.reset();
      buf.readBit();
      expect(() => buf.readBit()).toThrow('read past end');
    });
  });

  describe('writeBits / readBits', () => {
    it('writes a 9-bit code across a byte boundary', () => {
      const buf = BitBuffer.alloc();
      buf.writeBits(256, 9);
      expect(buf.bitLength).toBe(9);
      expect(buf.toUint8Array()).toEqual(new Uint8Array([0x80, 0x00]));
    });

    it('reads back consecutive codes of growing width', () => {
      const buf = BitBuffer.alloc();
      buf.writeBits(300, 9);
      buf.writeBits(700, 10);
      buf.writeBits(2000, 11);
      buf.writeBits(4000, 12);

      buf.reset();
      expect(buf.readBits(9)).toBe(300);
      expect(buf.readBits(10)).toBe(700);
      expect(buf.readBits(11)).toBe(2000);
      expect(buf.readBits(12)).toBe(4000);
      expect(buf.remaining).toBe(0);
    });

    it('handles 0 bits', () => {
      const buf = BitBuffer.alloc();
      buf.writeBits(0, 0);
      expect(buf.bitLength).toBe(0);
      expect(buf.readBits(0)).toBe(0);
    });

    it('handles 32-bit values', () => {
      const buf = BitBuffer.alloc();
      buf.writeBits(0xdeadbeef, 32);
      buf.reset();
      expect(buf.readBits(32)).toBe(0xdeadbeef);
    });

    it('throws for count > 32', () => {
      const buf = BitBuffer.alloc();
      expect(() => buf.writeBits(0, 33)).toThrow('count must be 0..32');
      expect(() => buf.readBits(33)).toThrow('count must be 0..32');
    });
  });

  describe('writeBigBits / readBigBits', () => {
    it('handles widths beyond 32 bits', () => {
      const buf = BitBuffer.alloc();
      buf.writeBigBits(0xdeadbeefcafen, 48);
      buf.reset();
      expect(buf.readBigBits(48)).toBe(0xdeadbeefcafen);
    });
  });

  describe('writeZeros', () => {
    it('appends zero bits', () => {
      const buf = BitBuffer.alloc();
      buf.writeBits(0b111, 3);
      buf.writeZeros(5);
      expect(buf.bitLength).toBe(8);
      expect(buf.toHex()).toBe('e0');
    });
  });

  describe('writePattern', () => {
    it('repeats a bit pattern', () => {
      const buf = BitBuffer.alloc();
      buf.writePattern(parseBitPattern('101'), 3);
      expect(buf.toBinaryString()).toBe('101101101');
    });

    it('writes nothing for zero repeats', () => {
      const buf = BitBuffer.alloc();
      buf.writePattern(parseBitPattern('1'), 0);
      expect(buf.bitLength).toBe(0);
    });
  });

  describe('from', () => {
    it('wraps existing bytes', () => {
      const buf = BitBuffer.from(new Uint8Array([0b10110000]), 5);
      expect(buf.bitLength).toBe(5);
      expect(buf.readBits(5)).toBe(0b10110);
    });

    it('defaults bitLength to data.length * 8', () => {
      expect(BitBuffer.from(new Uint8Array([0xab, 0xcd])).bitLength).toBe(16);
    });

    it('rejects a bitLength beyond the data', () => {
      expect(() => BitBuffer.from(new Uint8Array([0xab]), 9)).toThrow('out of range');
    });

    it('copies its input', () => {
      const data = new Uint8Array([0xff]);
      const buf = BitBuffer.from(data);
      data[0] = 0;
      expect(buf.readBits(8)).toBe(0xff);
    });
  });

  describe('fromBinaryString', () => {
    it('parses binary string', () => {
      const buf = BitBuffer.fromBinaryString('10110');
      expect(buf.bitLength).toBe(5);
      expect(buf.readBits(5)).toBe(0b10110);
    });

    it('throws for invalid characters', () => {
      expect(() => BitBuffer.fromBinaryString('102')).toThrow("Invalid binary character: '2'");
    });
  });

  describe('toBinaryString', () => {
    it('returns a bit range', () => {
      const buf = BitBuffer.fromBinaryString('100000000011111111');
      expect(buf.toBinaryString(9)).toBe('011111111');
      expect(buf.toBinaryString(0, 9)).toBe('100000000');
    });

    it('leaves the cursor alone', () => {
      const buf = BitBuffer.fromBinaryString('1011');
      buf.seek(2);
      buf.toBinaryString();
      expect(buf.offset).toBe(2);
    });
  });

  describe('seek', () => {
    it('throws for out-of-range offset', () => {
      const buf = BitBuffer.alloc();
      buf.writeBit(1);
      expect(() => buf.seek(-1)).toThrow();
      expect(() => buf.seek(2)).toThrow();
    });
  });

  describe('auto-grow', () => {
    it('grows buffer when writing past initial capacity', () => {
      const buf = BitBuffer.alloc(1);
      for (let i = 0; i < 100; i++) {
        buf.writeBits(i, 12);
      }
      expect(buf.bitLength).toBe(1200);
      buf.reset();
      for (let i = 0; i < 100; i++) {
        expect(buf.readBits(12)).toBe(i);
      }
    });
  });
});
