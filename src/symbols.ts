/**
 * Extended alphabet used by the encoding tree.
 * Values 0..255 are byte values; the two reserved values sit just past
 * the byte range so they can never collide with input data.
 */
export type ExtSymbol = number;

/** End-of-stream sentinel. Its codeword terminates every payload. */
export const PSEUDO_EOF: ExtSymbol = 256;

/** Symbol carried by internal tree nodes. */
export const NOT_A_SYMBOL: ExtSymbol = 257;

/** Symbol → occurrence count. Always holds PSEUDO_EOF with count 1. */
export type FrequencyTable = Map<ExtSymbol, number>;

/** True for symbols that stand for a real input byte. */
export function isByteSymbol(symbol: ExtSymbol): boolean {
  return Number.isInteger(symbol) && symbol >= 0 && symbol <= 0xff;
}

/** Human-readable label for a symbol, e.g. `'a'`, `0x0a`, `EOF`. */
export function symbolLabel(symbol: ExtSymbol): string {
  if (symbol === PSEUDO_EOF) return 'EOF';
  if (symbol === NOT_A_SYMBOL) return '<internal>';
  if (symbol >= 0x21 && symbol <= 0x7e) {
    return `'${String.fromCharCode(symbol)}'`;
  }
  return `0x${symbol.toString(16).padStart(2, '0')}`;
}
