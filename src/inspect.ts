import { HeaderCodec } from './header/HeaderCodec';
import { ExtSymbol, FrequencyTable, isByteSymbol, symbolLabel } from './symbols';
import { getEncodingMap } from './tree/CodeTable';
import { buildEncodingTree } from './tree/EncodingTree';

export interface CodeEntry {
  symbol: ExtSymbol;
  /** Printable form of the symbol (see {@link symbolLabel}). */
  label: string;
  weight: number;
  code: string;
}

export interface EncodingSummary {
  /** Bytes in the uncompressed input (the sentinel is not counted). */
  inputBytes: number;
  /** Distinct byte values, sentinel excluded. */
  distinctSymbols: number;
  headerBytes: number;
  /** Payload length in bits, sentinel codeword included. */
  payloadBits: number;
  payloadBytes: number;
  totalBytes: number;
  /** totalBytes / inputBytes, or 0 for empty input. */
  ratio: number;
}

/**
 * Code table for `frequencies`, shortest codewords first
 * (ties broken by symbol value).
 */
export function describeCodes(frequencies: FrequencyTable): CodeEntry[] {
  const codes = getEncodingMap(buildEncodingTree(frequencies));
  const entries: CodeEntry[] = [];
  for (const [symbol, code] of codes) {
    entries.push({
      symbol,
      label: symbolLabel(symbol),
      weight: frequencies.get(symbol) ?? 0,
      code,
    });
  }
  return entries.sort((a, b) => a.code.length - b.code.length || a.symbol - b.symbol);
}

/** Size of the compressed output for `frequencies`, computed without encoding. */
export function summarize(frequencies: FrequencyTable): EncodingSummary {
  let inputBytes = 0;
  let distinctSymbols = 0;
  let payloadBits = 0;
  for (const entry of describeCodes(frequencies)) {
    payloadBits += entry.weight * entry.code.length;
    if (isByteSymbol(entry.symbol)) {
      inputBytes += entry.weight;
      distinctSymbols++;
    }
  }

  const headerBytes = new HeaderCodec().byteLength(frequencies);
  const payloadBytes = Math.ceil(payloadBits / 8);
  const totalBytes = headerBytes + payloadBytes;
  return {
    inputBytes,
    distinctSymbols,
    headerBytes,
    payloadBits,
    payloadBytes,
    totalBytes,
    ratio: inputBytes === 0 ? 0 : totalBytes / inputBytes,
  };
}
