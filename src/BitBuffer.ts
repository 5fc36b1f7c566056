/**
 * Growable bit buffer used to assemble packed code streams.
 * Bits are stored MSB-first within each byte; unused trailing bits of the
 * last byte are always zero, so `toUint8Array()` is already zero-padded.
 */
export class BitBuffer {
  private _data: Uint8Array;
  private _bitLength: number;
  private _offset: number;

  private constructor(data: Uint8Array, bitLength: number, offset: number) {
    this._data = data;
    this._bitLength = bitLength;
    this._offset = offset;
  }

  /** Allocate a writable buffer with optional initial byte capacity. */
  static alloc(initialByteCapacity = 256): BitBuffer {
    return new BitBuffer(new Uint8Array(Math.max(1, initialByteCapacity)), 0, 0);
  }

  /** Wrap packed bytes for reading. */
  static from(data: Uint8Array, bitLength?: number): BitBuffer {
    const bl = bitLength ?? data.length * 8;
    if (bl < 0 || bl > data.length * 8) {
      throw new Error(`BitBuffer.from: bitLength ${bl} out of range [0, ${data.length * 8}]`);
    }
    return new BitBuffer(new Uint8Array(data), bl, 0);
  }

  /** Parse a binary string ('0' and '1' characters) into a buffer. */
  static fromBinaryString(bits: string): BitBuffer {
    const buf = BitBuffer.alloc(Math.ceil(bits.length / 8));
    buf.writePattern(parseBitPattern(bits), 1);
    buf.reset();
    return buf;
  }

  /** Total number of valid bits. */
  get bitLength(): number {
    return this._bitLength;
  }

  /** Current cursor position in bits. */
  get offset(): number {
    return this._offset;
  }

  /** Bits remaining from cursor to end. */
  get remaining(): number {
    return this._bitLength - this._offset;
  }

  writeBit(bit: 0 | 1): void {
    this.ensureCapacity(this._offset + 1);
    const byteIndex = this._offset >> 3;
    const mask = 0x80 >> (this._offset & 7);
    if (bit) {
      this._data[byteIndex] |= mask;
    } else {
      this._data[byteIndex] &= ~mask;
    }
    this._offset++;
    if (this._offset > this._bitLength) {
      this._bitLength = this._offset;
    }
  }

  readBit(): 0 | 1 {
    if (this._offset >= this._bitLength) {
      throw new Error('BitBuffer: read past end of buffer');
    }
    const byteIndex = this._offset >> 3;
    const shift = 7 - (this._offset & 7);
    this._offset++;
    return ((this._data[byteIndex] >> shift) & 1) === 1 ? 1 : 0;
  }

  /**
   * Write the lowest `count` bits of `value`, MSB first.
   * @param value  unsigned integer (0..2^32-1)
   * @param count  number of bits to write (0..32)
   */
  writeBits(value: number, count: number): void {
    if (count === 0) return;
    if (count < 0 || count > 32) {
      throw new Error(`writeBits: count must be 0..32, got ${count}`);
    }
    for (let i = count - 1; i >= 0; i--) {
      this.writeBit(((value >>> i) & 1) === 1 ? 1 : 0);
    }
  }

  /**
   * Read `count` bits as an unsigned integer.
   * @param count  number of bits to read (0..32)
   */
  readBits(count: number): number {
    if (count === 0) return 0;
    if (count < 0 || count > 32) {
      throw new Error(`readBits: count must be 0..32, got ${count}`);
    }
    let result = 0;
    for (let i = 0; i < count; i++) {
      result = (result << 1) | this.readBit();
    }
    return result >>> 0;
  }

  /** Write arbitrary-width bits from a bigint value (MSB first). */
  writeBigBits(value: bigint, count: number): void {
    for (let i = count - 1; i >= 0; i--) {
      this.writeBit(((value >> BigInt(i)) & 1n) === 1n ? 1 : 0);
    }
  }

  /** Read arbitrary-width bits into a bigint. */
  readBigBits(count: number): bigint {
    let result = 0n;
    for (let i = 0; i < count; i++) {
      result = (result << 1n) | BigInt(this.readBit());
    }
    return result;
  }

  /** Append `count` zero bits. */
  writeZeros(count: number): void {
    for (let i = 0; i < count; i++) {
      this.writeBit(0);
    }
  }

  /** Append a pre-parsed bit pattern `repeat` times. */
  writePattern(bits: readonly (0 | 1)[], repeat: number): void {
    this.ensureCapacity(this._offset + bits.length * repeat);
    for (let r = 0; r < repeat; r++) {
      for (const bit of bits) {
        this.writeBit(bit);
      }
    }
  }

  /** Return a compact copy of the written bytes, trailing bits zero. */
  toUint8Array(): Uint8Array {
    return this._data.slice(0, Math.ceil(this._bitLength / 8));
  }

  /** Binary string of bits in `[start, end)`, the whole buffer by default. */
  toBinaryString(start = 0, end = this._bitLength): string {
    const from = Math.max(0, start);
    const to = Math.min(end, this._bitLength);
    let result = '';
    for (let i = from; i < to; i++) {
      result += (this._data[i >> 3] >> (7 - (i & 7))) & 1 ? '1' : '0';
    }
    return result;
  }

  toHex(): string {
    return Array.from(this.toUint8Array())
      .map(b => b.toString(16).padStart(2, '0'))
      .join('');
  }

  /** Reset cursor to 0. */
  reset(): void {
    this._offset = 0;
  }

  /** Seek to absolute bit offset. */
  seek(bitOffset: number): void {
    if (bitOffset < 0 || bitOffset > this._bitLength) {
      throw new Error(`seek: offset ${bitOffset} out of range [0, ${this._bitLength}]`);
    }
    this._offset = bitOffset;
  }

  private ensureCapacity(bitsNeeded: number): void {
    const bytesNeeded = Math.ceil(bitsNeeded / 8);
    if (bytesNeeded <= this._data.length) return;
    let newSize = this._data.length;
    while (newSize < bytesNeeded) {
      newSize *= 2;
    }
    const newData = new Uint8Array(newSize);
    newData.set(this._data);
    this._data = newData;
  }
}

/** Split a string of '0'/'1' characters into bits. */
export function parseBitPattern(bits: string): (0 | 1)[] {
  const result: (0 | 1)[] = [];
  for (const ch of bits) {
    if (ch !== '0' && ch !== '1') {
      throw new Error(`Invalid binary character: '${ch}'`);
    }
    result.push(ch === '1' ? 1 : 0);
  }
  return result;
}
