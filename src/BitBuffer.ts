/**
 * Growable bit sink and bit source for the compressed stream.
 * Bits are packed MSB-first within each byte; the final partial byte is
 * zero-padded when the buffer is turned back into bytes.
 *
 * The same cursor is used for writing and reading, so a buffer that has
 * just been written is usually `reset()` before decoding it.
 */
export class BitBuffer {
  private _bytes: Uint8Array;
  private _bitLength: number;
  private _cursor: number;

  private constructor(bytes: Uint8Array, bitLength: number) {
    this._bytes = bytes;
    this._bitLength = bitLength;
    this._cursor = 0;
  }

  /** Empty writable buffer. */
  static alloc(initialByteCapacity = 1024): BitBuffer {
    return new BitBuffer(new Uint8Array(Math.max(1, initialByteCapacity)), 0);
  }

  /** Readable buffer over a copy of `data`. */
  static from(data: Uint8Array): BitBuffer {
    return new BitBuffer(new Uint8Array(data), data.length * 8);
  }

  /** Buffer holding the bits of a `'0'`/`'1'` string, cursor at 0. */
  static fromBinaryString(bits: string): BitBuffer {
    const buf = BitBuffer.alloc(Math.ceil(bits.length / 8));
    for (const ch of bits) {
      if (ch !== '0' && ch !== '1') {
        throw new Error(`Invalid binary character: '${ch}'`);
      }
      buf.writeBit(ch === '1' ? 1 : 0);
    }
    buf.reset();
    return buf;
  }

  /** Number of valid bits. */
  get bitLength(): number {
    return this._bitLength;
  }

  /** Cursor position in bits. */
  get offset(): number {
    return this._cursor;
  }

  /** Bits between the cursor and the end. */
  get remaining(): number {
    return this._bitLength - this._cursor;
  }

  /** Whether the cursor sits on a byte boundary. */
  get isByteAligned(): boolean {
    return (this._cursor & 7) === 0;
  }

  writeBit(bit: 0 | 1): void {
    this.ensureCapacity(this._cursor + 1);
    const mask = 0x80 >> (this._cursor & 7);
    const index = this._cursor >> 3;
    if (bit) {
      this._bytes[index] |= mask;
    } else {
      this._bytes[index] &= ~mask;
    }
    this._cursor++;
    if (this._cursor > this._bitLength) {
      this._bitLength = this._cursor;
    }
  }

  /** Read one bit. Throws once the buffer is exhausted. */
  readBit(): 0 | 1 {
    if (this._cursor >= this._bitLength) {
      throw new Error('BitBuffer: read past end of buffer');
    }
    const mask = 0x80 >> (this._cursor & 7);
    const byte = this._bytes[this._cursor >> 3];
    this._cursor++;
    return (byte & mask) === 0 ? 0 : 1;
  }

  /**
   * Write the lowest `count` bits of `value`, most significant first.
   * @param count  0..32
   */
  writeBits(value: number, count: number): void {
    if (count < 0 || count > 32) {
      throw new Error(`writeBits: count must be 0..32, got ${count}`);
    }
    for (let i = count - 1; i >= 0; i--) {
      this.writeBit((value >>> i) & 1 ? 1 : 0);
    }
  }

  /**
   * Read `count` bits as an unsigned integer.
   * @param count  0..32
   */
  readBits(count: number): number {
    if (count < 0 || count > 32) {
      throw new Error(`readBits: count must be 0..32, got ${count}`);
    }
    let result = 0;
    for (let i = 0; i < count; i++) {
      result = (result << 1) | this.readBit();
    }
    return result >>> 0;
  }

  /** Write a codeword given as a `'0'`/`'1'` string. */
  writeCode(code: string): void {
    for (let i = 0; i < code.length; i++) {
      this.writeBit(code.charCodeAt(i) === 0x31 ? 1 : 0);
    }
  }

  /** Write whole bytes. Uses a block copy when the cursor is byte-aligned. */
  writeOctets(data: Uint8Array): void {
    if (this.isByteAligned) {
      this.ensureCapacity(this._cursor + data.length * 8);
      this._bytes.set(data, this._cursor >> 3);
      this._cursor += data.length * 8;
      if (this._cursor > this._bitLength) {
        this._bitLength = this._cursor;
      }
      return;
    }
    for (let i = 0; i < data.length; i++) {
      this.writeBits(data[i], 8);
    }
  }

  /** Read `byteCount` whole bytes. */
  readOctets(byteCount: number): Uint8Array {
    const result = new Uint8Array(byteCount);
    for (let i = 0; i < byteCount; i++) {
      result[i] = this.readBits(8);
    }
    return result;
  }

  /**
   * Up to `maxBytes` complete bytes from the cursor onwards, without
   * moving the cursor. The cursor must be byte-aligned.
   */
  peekOctets(maxBytes: number): Uint8Array {
    if (!this.isByteAligned) {
      throw new Error(`peekOctets: cursor ${this._cursor} is not byte-aligned`);
    }
    const start = this._cursor >> 3;
    const available = Math.floor(this.remaining / 8);
    return this._bytes.slice(start, start + Math.min(maxBytes, available));
  }

  /** Advance the cursor by whole bytes. */
  skipOctets(byteCount: number): void {
    this.seek(this._cursor + byteCount * 8);
  }

  /** Bytes written so far, trailing bits zero-padded. */
  toUint8Array(): Uint8Array {
    const bytes = this._bytes.slice(0, Math.ceil(this._bitLength / 8));
    const tail = this._bitLength & 7;
    if (tail !== 0) {
      bytes[bytes.length - 1] &= (0xff << (8 - tail)) & 0xff;
    }
    return bytes;
  }

  /** All valid bits as a `'0'`/`'1'` string. Leaves the cursor untouched. */
  toBinaryString(): string {
    const saved = this._cursor;
    this._cursor = 0;
    let result = '';
    while (this._cursor < this._bitLength) {
      result += this.readBit() === 1 ? '1' : '0';
    }
    this._cursor = saved;
    return result;
  }

  /** Move the cursor back to bit 0. */
  reset(): void {
    this._cursor = 0;
  }

  /** Move the cursor to an absolute bit offset. */
  seek(bitOffset: number): void {
    if (bitOffset < 0 || bitOffset > this._bitLength) {
      throw new Error(`seek: offset ${bitOffset} out of range [0, ${this._bitLength}]`);
    }
    this._cursor = bitOffset;
  }

  private ensureCapacity(bitsNeeded: number): void {
    const bytesNeeded = Math.ceil(bitsNeeded / 8);
    if (bytesNeeded <= this._bytes.length) return;
    let size = this._bytes.length;
    while (size < bytesNeeded) {
      size *= 2;
    }
    const grown = new Uint8Array(size);
    grown.set(this._bytes);
    this._bytes = grown;
  }
}
