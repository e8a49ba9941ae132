/**
 * Standalone continuous fuzzer for the compressor.
 *
 * Alternates between round-trip checks on generated inputs and
 * decompression of mutated compressed streams, reporting any input that
 * fails to round-trip, throws a non-Error, or takes too long.
 *
 * Usage:
 *   npx tsx fuzzing/run.ts [--iterations N] [--max-length N]
 */

import { compressBytes, decompressBytes } from '../src/compressor';
import { generateInput, Rng } from './generators/byte-generator';
import { mutate } from './generators/mutator';
import { ALL_SEEDS } from './seeds';

const TIMEOUT_MS = 2000;

interface FuzzResult {
  seed: number;
  strategy: 'roundtrip' | 'mutation';
  input: Uint8Array;
  problem?: string;
  timedOut: boolean;
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

function fuzzRoundTrip(input: Uint8Array, seed: number): FuzzResult {
  const result: FuzzResult = { seed, strategy: 'roundtrip', input, timedOut: false };
  const start = Date.now();
  try {
    const restored = decompressBytes(compressBytes(input));
    if (!sameBytes(restored, input)) {
      result.problem = `round-trip mismatch (${input.length} in, ${restored.length} out)`;
    }
  } catch (e) {
    result.problem = `round-trip threw: ${e instanceof Error ? e.message : String(e)}`;
  }
  result.timedOut = Date.now() - start > TIMEOUT_MS;
  return result;
}

function fuzzMutation(input: Uint8Array, seed: number): FuzzResult {
  const result: FuzzResult = { seed, strategy: 'mutation', input, timedOut: false };
  const start = Date.now();
  try {
    decompressBytes(input);
  } catch (e) {
    // Rejecting damaged input is fine, as long as it is a proper Error
    if (!(e instanceof Error)) {
      result.problem = `threw a non-Error value: ${String(e)}`;
    }
  }
  result.timedOut = Date.now() - start > TIMEOUT_MS;
  return result;
}

function main() {
  const args = process.argv.slice(2);
  let maxIterations = Infinity;
  let maxLength = 4096;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--iterations' && args[i + 1]) {
      maxIterations = parseInt(args[i + 1], 10);
      i++;
    } else if (args[i] === '--max-length' && args[i + 1]) {
      maxLength = parseInt(args[i + 1], 10);
      i++;
    }
  }

  console.log('Huffman Round-Trip Fuzzer');
  console.log(`Max iterations: ${maxIterations === Infinity ? 'unlimited' : maxIterations}`);
  console.log('');

  let iteration = 0;
  let roundTrips = 0;
  let mutations = 0;
  const failures: FuzzResult[] = [];
  const startTime = Date.now();

  while (iteration < maxIterations) {
    let result: FuzzResult;

    if (iteration % 2 === 0) {
      result = fuzzRoundTrip(generateInput(iteration, { maxLength }), iteration);
      roundTrips++;
    } else {
      const seed = ALL_SEEDS[iteration % ALL_SEEDS.length];
      const rng = new Rng(iteration);
      result = fuzzMutation(mutate(compressBytes(seed), rng, rng.int(1, 5)), iteration);
      mutations++;
    }

    if (result.problem !== undefined || result.timedOut) {
      failures.push(result);
      console.error(`\n[!] ${result.timedOut ? 'TIMEOUT' : 'FAILURE'} at iteration ${iteration} (${result.strategy}):`);
      if (result.problem !== undefined) console.error(`    ${result.problem}`);
    }

    iteration++;

    if (iteration % 1000 === 0) {
      const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
      const rate = (iteration / ((Date.now() - startTime) / 1000)).toFixed(0);
      console.log(
        `[${elapsed}s] iteration=${iteration} rate=${rate}/s ` +
        `roundTrips=${roundTrips} mutations=${mutations} failures=${failures.length}`
      );
    }
  }

  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log('');
  console.log('=== Final Report ===');
  console.log(`Total iterations: ${iteration}`);
  console.log(`Elapsed: ${elapsed}s`);
  console.log(`Round-trips: ${roundTrips}`);
  console.log(`Mutations: ${mutations}`);

  if (failures.length > 0) {
    console.log('');
    console.log(`=== ${failures.length} issue(s) found ===`);
    for (const failure of failures) {
      console.log(`  Seed: ${failure.seed}, Strategy: ${failure.strategy}, Input bytes: ${failure.input.length}`);
      console.log(`  ${failure.problem ?? 'timed out'}`);
      console.log('');
    }
    process.exit(1);
  } else {
    console.log('\nNo issues found.');
    process.exit(0);
  }
}

main();
