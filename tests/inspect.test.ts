import { compressBytes } from '../src/compressor';
import { countBytes } from '../src/frequency/FrequencyCounter';
import { describeCodes, summarize } from '../src/inspect';
import { PSEUDO_EOF } from '../src/symbols';

const ascii = (text: string) => new TextEncoder().encode(text);

describe('describeCodes', () => {
  it('lists codes shortest first', () => {
    expect(describeCodes(countBytes(ascii('aaab')))).toEqual([
      { symbol: 0x61, label: "'a'", weight: 3, code: '1' },
      { symbol: 0x62, label: "'b'", weight: 1, code: '00' },
      { symbol: PSEUDO_EOF, label: 'EOF', weight: 1, code: '01' },
    ]);
  });

  it('gives the lone sentinel an empty code', () => {
    expect(describeCodes(countBytes(new Uint8Array(0)))).toEqual([
      { symbol: PSEUDO_EOF, label: 'EOF', weight: 1, code: '' },
    ]);
  });
});

describe('summarize', () => {
  it('computes sizes for "aaab"', () => {
    expect(summarize(countBytes(ascii('aaab')))).toEqual({
      inputBytes: 4,
      distinctSymbols: 2,
      headerBytes: 8,
      payloadBits: 7,
      payloadBytes: 1,
      totalBytes: 9,
      ratio: 2.25,
    });
  });

  it('reports a zero ratio for empty input', () => {
    const summary = summarize(countBytes(new Uint8Array(0)));
    expect(summary.totalBytes).toBe(2);
    expect(summary.payloadBits).toBe(0);
    expect(summary.ratio).toBe(0);
  });

  it('matches the size of the actual compressed output', () => {
    const input = ascii('she sells sea shells by the sea shore, '.repeat(20));
    expect(summarize(countBytes(input)).totalBytes).toBe(compressBytes(input).length);
  });
});
