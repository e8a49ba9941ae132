import { generate } from 'peggy';
import type { Parser } from 'peggy';
import { BitBuffer } from '../BitBuffer';
import { Codec } from '../codecs/Codec';
import { HeaderFormatError, HuffmanError } from '../errors';
import { ExtSymbol, FrequencyTable, PSEUDO_EOF, isByteSymbol, symbolLabel } from '../symbols';
import { HEADER_GRAMMAR } from './grammar';

/** Shape returned by the header grammar. */
interface ParsedHeader {
  entries: { symbol: ExtSymbol; frequency: number }[];
  /** Header length in bytes, up to the first payload byte. */
  length: number;
}

/**
 * Longest header this codec will look at: a three-digit count and a
 * separator, then 256 × (symbol byte, 16-digit frequency, separator).
 */
export const MAX_HEADER_BYTES = 3 + 1 + 256 * (1 + 16 + 1);

let cachedParser: Parser | null = null;

function getParser(): Parser {
  if (!cachedParser) {
    cachedParser = generate(HEADER_GRAMMAR);
  }
  return cachedParser;
}

function writeAscii(buffer: BitBuffer, text: string): void {
  for (let i = 0; i < text.length; i++) {
    buffer.writeBits(text.charCodeAt(i), 8);
  }
}

/**
 * Frequency header at the front of a compressed stream.
 *
 * Layout, all byte-oriented:
 *
 *     <N> ' '  ( <symbol byte> <frequency> ' ' ) × N
 *
 * where N and every frequency are ASCII decimal. N counts the
 * non-sentinel symbols; the sentinel is implied with a count of 1.
 * Pairs are written in the table's iteration order.
 */
export class HeaderCodec implements Codec<FrequencyTable> {
  /**
   * @throws HuffmanError if the table has no sentinel or holds a symbol
   *   outside the byte range.
   */
  encode(buffer: BitBuffer, value: FrequencyTable): void {
    if (!value.has(PSEUDO_EOF)) {
      throw new HuffmanError('Frequency table has no PSEUDO_EOF entry');
    }
    writeAscii(buffer, `${value.size - 1} `);
    for (const [symbol, frequency] of value) {
      if (symbol === PSEUDO_EOF) continue;
      if (!isByteSymbol(symbol)) {
        throw new HuffmanError(`Symbol ${symbol} cannot be written to a header`);
      }
      buffer.writeBits(symbol, 8);
      writeAscii(buffer, `${frequency} `);
    }
  }

  /**
   * Read a header at the buffer's cursor, which must be byte-aligned, and
   * leave the cursor on the first payload bit.
   *
   * @throws HeaderFormatError if the header is malformed or truncated.
   */
  decode(buffer: BitBuffer): FrequencyTable {
    if (!buffer.isByteAligned) {
      throw new HeaderFormatError(`Header must start on a byte boundary (bit offset ${buffer.offset})`);
    }
    const bytes = buffer.peekOctets(MAX_HEADER_BYTES);
    const text = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');

    let parsed: ParsedHeader;
    try {
      parsed = getParser().parse(text);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new HeaderFormatError(`Malformed header: ${reason}`);
    }

    const table: FrequencyTable = new Map();
    for (const { symbol, frequency } of parsed.entries) {
      if (table.has(symbol)) {
        throw new HeaderFormatError(`Symbol ${symbolLabel(symbol)} appears twice in header`);
      }
      if (!Number.isSafeInteger(frequency) || frequency < 1) {
        throw new HeaderFormatError(`Invalid frequency ${frequency} for symbol ${symbolLabel(symbol)}`);
      }
      table.set(symbol, frequency);
    }
    table.set(PSEUDO_EOF, 1);

    buffer.skipOctets(parsed.length);
    return table;
  }

  /** Number of bytes `encode` would write for `table`. */
  byteLength(table: FrequencyTable): number {
    let length = `${Math.max(0, table.size - 1)} `.length;
    for (const [symbol, frequency] of table) {
      if (symbol === PSEUDO_EOF) continue;
      length += 1 + `${frequency} `.length;
    }
    return length;
  }
}

const headerCodec = new HeaderCodec();

/** Write the frequency header for `frequencies` at the buffer's cursor. */
export function writeFileHeader(buffer: BitBuffer, frequencies: FrequencyTable): void {
  headerCodec.encode(buffer, frequencies);
}

/** Read a frequency header at the buffer's cursor. */
export function readFileHeader(buffer: BitBuffer): FrequencyTable {
  return headerCodec.decode(buffer);
}
