import { ByteReader } from '../ByteReader';
import { FrequencyTable, PSEUDO_EOF } from '../symbols';

/**
 * Count how often each byte value occurs in `source`, reading it to the end.
 *
 * Bytes are inserted in order of first appearance. The sentinel is added
 * last with a count of exactly 1, so every tree built from the result has
 * a codeword for it. An empty source yields `{ PSEUDO_EOF: 1 }`.
 */
export function getFrequencyTable(source: ByteReader): FrequencyTable {
  const counts: FrequencyTable = new Map();
  for (let byte = source.read(); byte !== null; byte = source.read()) {
    counts.set(byte, (counts.get(byte) ?? 0) + 1);
  }
  counts.set(PSEUDO_EOF, 1);
  return counts;
}

/** Frequency table of an in-memory buffer. */
export function countBytes(data: Uint8Array): FrequencyTable {
  return getFrequencyTable(new ByteReader(data));
}
