/**
 * Seed corpus for mutation-based fuzzing. Each seed is compressed first
 * and the compressed bytes are then mutated.
 */

const encoder = new TextEncoder();

/** Empty input: header only, no payload bits. */
export const SEED_EMPTY = new Uint8Array(0);

/** One distinct byte: a two-leaf tree. */
export const SEED_SINGLE_SYMBOL = encoder.encode('zzzzzzzzzzzzzzzz');

/** Digits and spaces as symbols, which share characters with the header text. */
export const SEED_HEADER_LOOKALIKE = encoder.encode('1 22 333 4444 55555 0 0 0');

/** Plain prose. */
export const SEED_TEXT = encoder.encode(
  'the quick brown fox jumps over the lazy dog\nand then it sleeps for a while\n'
);

/** Every byte value once. */
export const SEED_ALL_BYTES = Uint8Array.from({ length: 256 }, (_, i) => i);

export const ALL_SEEDS: Uint8Array[] = [
  SEED_EMPTY,
  SEED_SINGLE_SYMBOL,
  SEED_HEADER_LOOKALIKE,
  SEED_TEXT,
  SEED_ALL_BYTES,
];
