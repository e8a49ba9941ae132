import { BitBuffer } from './BitBuffer';
import { ByteReader } from './ByteReader';
import { HuffmanStreamCodec } from './codecs/HuffmanStreamCodec';
import { getFrequencyTable } from './frequency/FrequencyCounter';
import { readFileHeader, writeFileHeader } from './header/HeaderCodec';
import { buildEncodingTree } from './tree/EncodingTree';

/**
 * Compress `input` into `output`: header, then the Huffman payload.
 * Reads the input twice, rewinding it between the counting and encoding passes.
 */
export function compress(input: ByteReader, output: BitBuffer): void {
  const frequencies = getFrequencyTable(input);
  const tree = buildEncodingTree(frequencies);
  writeFileHeader(output, frequencies);
  input.rewind();
  new HuffmanStreamCodec(tree).encodeStream(output, input);
}

/** Decompress a stream produced by {@link compress}, writing bytes to `output`. */
export function decompress(input: BitBuffer, output: BitBuffer): void {
  const frequencies = readFileHeader(input);
  const tree = buildEncodingTree(frequencies);
  new HuffmanStreamCodec(tree).decodeTo(input, output);
}

export function compressBytes(data: Uint8Array): Uint8Array {
  const output = BitBuffer.alloc();
  compress(new ByteReader(data), output);
  return output.toUint8Array();
}

export function decompressBytes(data: Uint8Array): Uint8Array {
  const output = BitBuffer.alloc();
  decompress(BitBuffer.from(data), output);
  return output.toUint8Array();
}
