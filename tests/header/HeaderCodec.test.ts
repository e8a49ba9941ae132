import { BitBuffer } from '../../src/BitBuffer';
import { HeaderFormatError, HuffmanError } from '../../src/errors';
import { countBytes } from '../../src/frequency/FrequencyCounter';
import {
  HeaderCodec,
  MAX_HEADER_BYTES,
  readFileHeader,
  writeFileHeader,
} from '../../src/header/HeaderCodec';
import { FrequencyTable, PSEUDO_EOF } from '../../src/symbols';

const ascii = (text: string) => new TextEncoder().encode(text);
const latin1 = (bytes: Uint8Array) => Buffer.from(bytes).toString('latin1');

function headerBytes(table: FrequencyTable): Uint8Array {
  const buf = BitBuffer.alloc();
  writeFileHeader(buf, table);
  return buf.toUint8Array();
}

describe('HeaderCodec', () => {
  const codec = new HeaderCodec();

  describe('encode', () => {
    it('writes the count, then symbol/frequency pairs', () => {
      expect(latin1(headerBytes(countBytes(ascii('aaab'))))).toBe('2 a3 b1 ');
    });

    it('writes only the count for a sentinel-only table', () => {
      expect(latin1(headerBytes(countBytes(new Uint8Array(0))))).toBe('0 ');
    });

    it('writes whitespace and digit symbols as raw bytes', () => {
      const table: FrequencyTable = new Map([[0x20, 2], [0x37, 12], [0x0a, 1], [PSEUDO_EOF, 1]]);
      expect(latin1(headerBytes(table))).toBe('3  2 712 \n1 ');
    });

    it('throws when the table has no sentinel', () => {
      expect(() => headerBytes(new Map([[0x61, 1]]))).toThrow('no PSEUDO_EOF');
    });

    it('throws for symbols outside the byte range', () => {
      expect(() => headerBytes(new Map([[300, 1], [PSEUDO_EOF, 1]]))).toThrow(HuffmanError);
    });

    it('reports the encoded length', () => {
      const table = countBytes(ascii('hello, header'));
      expect(codec.byteLength(table)).toBe(headerBytes(table).length);
    });
  });

  describe('decode', () => {
    it('reads the table and leaves the cursor on the payload', () => {
      const buf = BitBuffer.from(ascii('2 a3 b1 Z'));
      const table = readFileHeader(buf);
      expect([...table.entries()]).toEqual([[0x61, 3], [0x62, 1], [PSEUDO_EOF, 1]]);
      expect(buf.offset).toBe(64);
      expect(buf.readBits(8)).toBe(0x5a);
    });

    it('reads whitespace and digit symbols', () => {
      const table = readFileHeader(BitBuffer.from(ascii('3  2 712 \n1 ')));
      expect([...table.entries()]).toEqual([[0x20, 2], [0x37, 12], [0x0a, 1], [PSEUDO_EOF, 1]]);
    });

    it('reads a count of zero', () => {
      const buf = BitBuffer.from(ascii('0 '));
      expect([...readFileHeader(buf).entries()]).toEqual([[PSEUDO_EOF, 1]]);
      expect(buf.remaining).toBe(0);
    });

    it('accepts any whitespace byte as separator', () => {
      const table = readFileHeader(BitBuffer.from(ascii('1\tq5\n')));
      expect(table.get(0x71)).toBe(5);
    });

    it('throws when fewer pairs are present than declared', () => {
      expect(() => readFileHeader(BitBuffer.from(ascii('2 a3 ')))).toThrow(
        'header declares 2 symbols but only 1 could be read'
      );
    });

    it('throws when the data does not start with a count', () => {
      expect(() => readFileHeader(BitBuffer.from(ascii('x1 ')))).toThrow(HeaderFormatError);
      expect(() => readFileHeader(BitBuffer.from(new Uint8Array(0)))).toThrow(HeaderFormatError);
    });

    it('throws for a zero frequency', () => {
      expect(() => readFileHeader(BitBuffer.from(ascii('1 a0 ')))).toThrow('Invalid frequency 0');
    });

    it('throws for a repeated symbol', () => {
      expect(() => readFileHeader(BitBuffer.from(ascii('2 a1 a2 ')))).toThrow("'a' appears twice");
    });

    it('throws when the cursor is not on a byte boundary', () => {
      const buf = BitBuffer.from(ascii('0 '));
      buf.readBit();
      expect(() => codec.decode(buf)).toThrow(HeaderFormatError);
    });
  });

  describe('round-trip', () => {
    it('restores a table read back from its own header', () => {
      const table = countBytes(ascii('mississippi river'));
      const buf = BitBuffer.alloc();
      codec.encode(buf, table);
      buf.reset();
      expect(codec.decode(buf)).toEqual(table);
    });

    it('fits the largest header within MAX_HEADER_BYTES', () => {
      const table: FrequencyTable = new Map();
      for (let b = 0; b < 256; b++) table.set(b, 1_000_000_000_000_000 + b);
      table.set(PSEUDO_EOF, 1);

      const bytes = headerBytes(table);
      expect(bytes.length).toBe(MAX_HEADER_BYTES);
      expect(readFileHeader(BitBuffer.from(bytes))).toEqual(table);
    });
  });
});
