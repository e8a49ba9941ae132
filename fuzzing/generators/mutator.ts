/**
 * Mutation strategies for compressed streams.
 *
 * Takes the output of the compressor and damages it, to check that the
 * decompressor either decodes something or throws an Error, and never
 * hangs.
 */

import { Rng } from './byte-generator';

/** A mutation function that transforms a byte array. */
export type Mutator = (input: Uint8Array, rng: Rng) => Uint8Array;

/** Flip a random bit in a random byte. */
export function bitFlip(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  const out = new Uint8Array(input);
  out[rng.int(0, out.length - 1)] ^= 1 << rng.int(0, 7);
  return out;
}

/** Insert a random byte at a random position. */
export function byteInsert(input: Uint8Array, rng: Rng): Uint8Array {
  const pos = rng.int(0, input.length);
  const out = new Uint8Array(input.length + 1);
  out.set(input.subarray(0, pos), 0);
  out[pos] = rng.int(0, 255);
  out.set(input.subarray(pos), pos + 1);
  return out;
}

/** Delete a random byte. */
export function byteDelete(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  const pos = rng.int(0, input.length - 1);
  const out = new Uint8Array(input.length - 1);
  out.set(input.subarray(0, pos), 0);
  out.set(input.subarray(pos + 1), pos);
  return out;
}

/** Replace a random byte with a digit or a space, to disturb the header text. */
export function headerNoise(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  const out = new Uint8Array(input);
  const pos = rng.int(0, Math.min(out.length, 32) - 1);
  out[pos] = rng.chance(0.5) ? 0x20 : 0x30 + rng.int(0, 9);
  return out;
}

/** Cut the stream short. */
export function truncate(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  return input.slice(0, rng.int(0, input.length - 1));
}

export const MUTATORS: Mutator[] = [bitFlip, byteInsert, byteDelete, headerNoise, truncate];

/** Apply `count` random mutations (default 1..3). */
export function mutate(input: Uint8Array, rng: Rng, count?: number): Uint8Array {
  const n = count ?? rng.int(1, 3);
  let result = input;
  for (let i = 0; i < n; i++) {
    const mutator = rng.pick(MUTATORS);
    result = mutator(result, rng);
  }
  return result;
}
