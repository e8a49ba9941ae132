/**
 * Random byte-input generators for round-trip fuzzing.
 *
 * Each shape stresses a different part of the tree builder: empty and
 * single-symbol inputs hit the degenerate trees, skewed inputs produce
 * deep trees, uniform inputs fill the whole byte alphabet.
 */

/** Seeded PRNG (xorshift32), so every failure can be replayed from its seed. */
export class Rng {
  private state: number;

  constructor(seed: number) {
    // xorshift never leaves the all-zero state
    this.state = seed | 0 || 0x9e3779b9;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    this.state ^= this.state << 13;
    this.state ^= this.state >> 17;
    this.state ^= this.state << 5;
    return (this.state >>> 0) / 0x100000000;
  }

  /** Returns an integer in [min, max] inclusive. */
  int(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** Returns a random element from an array. */
  pick<T>(arr: readonly T[]): T {
    return arr[this.int(0, arr.length - 1)];
  }

  /** Returns true with the given probability. */
  chance(p: number): boolean {
    return this.next() < p;
  }
}

export type InputShape = 'empty' | 'single' | 'run' | 'skewed' | 'uniform' | 'text';

export const INPUT_SHAPES: readonly InputShape[] = ['empty', 'single', 'run', 'skewed', 'uniform', 'text'];

export interface GeneratorOptions {
  /** Maximum generated length in bytes (default: 4096). */
  maxLength?: number;
}

const TEXT_ALPHABET = 'etaoin shrdlu\ncmfwyp,.0123456789 ';

/** Generate one input of the given shape. */
export function generateBytes(rng: Rng, shape: InputShape, options: GeneratorOptions = {}): Uint8Array {
  const maxLength = options.maxLength ?? 4096;
  const length = rng.int(1, Math.max(1, maxLength));
  const out = new Uint8Array(shape === 'empty' ? 0 : shape === 'single' ? 1 : length);

  switch (shape) {
    case 'empty':
      break;
    case 'single':
      out[0] = rng.int(0, 255);
      break;
    case 'run':
      out.fill(rng.int(0, 255));
      break;
    case 'skewed': {
      // Geometric-ish distribution over a small alphabet
      const alphabet = Array.from({ length: rng.int(2, 24) }, () => rng.int(0, 255));
      for (let i = 0; i < out.length; i++) {
        let k = 0;
        while (k < alphabet.length - 1 && rng.chance(0.5)) k++;
        out[i] = alphabet[k];
      }
      break;
    }
    case 'uniform':
      for (let i = 0; i < out.length; i++) out[i] = rng.int(0, 255);
      break;
    case 'text':
      for (let i = 0; i < out.length; i++) {
        out[i] = TEXT_ALPHABET.charCodeAt(rng.int(0, TEXT_ALPHABET.length - 1));
      }
      break;
  }
  return out;
}

/** Generate an input with a shape chosen from the seed. */
export function generateInput(seed: number, options?: GeneratorOptions): Uint8Array {
  const rng = new Rng(seed);
  return generateBytes(rng, rng.pick(INPUT_SHAPES), options);
}
