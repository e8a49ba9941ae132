#!/usr/bin/env npx tsx
/**
 * Command-line front end for the Huffman compressor.
 *
 * Usage:
 *   npx tsx cli/huff.ts compress <input> [output]
 *   npx tsx cli/huff.ts decompress <input> [output]
 *   npx tsx cli/huff.ts inspect <input>
 *
 * `compress` writes <input>.huf by default. `decompress` strips a .huf
 * suffix, or appends .out when there is none. `inspect` prints the code
 * table: from the header for a .huf file, from a frequency count otherwise.
 */

import * as fs from 'fs';
import * as path from 'path';
import { BitBuffer } from '../src/BitBuffer';
import { compressBytes, decompressBytes } from '../src/compressor';
import { countBytes } from '../src/frequency/FrequencyCounter';
import { readFileHeader } from '../src/header/HeaderCodec';
import { describeCodes, summarize } from '../src/inspect';
import type { FrequencyTable } from '../src/symbols';

export const COMPRESSED_EXTENSION = '.huf';

const USAGE = 'Usage: npx tsx cli/huff.ts <compress|decompress|inspect> <input> [output]';

type Command = 'compress' | 'decompress' | 'inspect';

/** Where the CLI sends its messages. */
export interface CliIO {
  log(message: string): void;
  error(message: string): void;
}

function isCommand(value: string): value is Command {
  return value === 'compress' || value === 'decompress' || value === 'inspect';
}

/** Output path used when none is given on the command line. */
export function defaultOutputPath(command: 'compress' | 'decompress', inputPath: string): string {
  if (command === 'compress') return inputPath + COMPRESSED_EXTENSION;
  if (inputPath.endsWith(COMPRESSED_EXTENSION)) {
    return inputPath.slice(0, -COMPRESSED_EXTENSION.length);
  }
  return inputPath + '.out';
}

function writeOutput(outputPath: string, data: Uint8Array): void {
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, data);
}

function inspectTable(frequencies: FrequencyTable, io: CliIO): void {
  const summary = summarize(frequencies);
  io.log(`Input bytes:      ${summary.inputBytes}`);
  io.log(`Distinct symbols: ${summary.distinctSymbols}`);
  io.log(`Header bytes:     ${summary.headerBytes}`);
  io.log(`Payload bits:     ${summary.payloadBits}`);
  io.log(`Compressed bytes: ${summary.totalBytes}`);
  io.log(`Ratio:            ${summary.ratio.toFixed(3)}`);
  io.log('');
  io.log('Symbol  Weight    Code');
  for (const entry of describeCodes(frequencies)) {
    io.log(`${entry.label.padEnd(8)}${String(entry.weight).padEnd(10)}${entry.code || '(empty)'}`);
  }
}

/**
 * Run the CLI with the given arguments (without the node/script prefix).
 * @returns process exit code
 */
export function runCli(args: string[], io: CliIO = console): number {
  const [command, input, output] = args;
  if (command === undefined || input === undefined || !isCommand(command)) {
    io.error(USAGE);
    return 1;
  }

  const inputPath = path.resolve(input);
  if (!fs.existsSync(inputPath)) {
    io.error(`Error: input file not found: ${inputPath}`);
    return 1;
  }

  try {
    const data = fs.readFileSync(inputPath);

    if (command === 'inspect') {
      const frequencies = inputPath.endsWith(COMPRESSED_EXTENSION)
        ? readFileHeader(BitBuffer.from(data))
        : countBytes(data);
      inspectTable(frequencies, io);
      return 0;
    }

    const outputPath = output ? path.resolve(output) : defaultOutputPath(command, inputPath);
    const result = command === 'compress' ? compressBytes(data) : decompressBytes(data);
    writeOutput(outputPath, result);
    const verb = command === 'compress' ? 'Compressed' : 'Decompressed';
    io.log(`${verb} ${inputPath} (${data.length} bytes) to ${outputPath} (${result.length} bytes)`);
    return 0;
  } catch (e) {
    io.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }
}

if (require.main === module) {
  process.exit(runCli(process.argv.slice(2)));
}
