export { BitBuffer } from './BitBuffer';
export { ByteReader } from './ByteReader';
export { HuffmanError, HeaderFormatError } from './errors';
export { PSEUDO_EOF, NOT_A_SYMBOL, isByteSymbol, symbolLabel } from './symbols';
export type { ExtSymbol, FrequencyTable } from './symbols';
export type { Codec } from './codecs/Codec';
export { HuffmanStreamCodec } from './codecs/HuffmanStreamCodec';
export { HeaderCodec, readFileHeader, writeFileHeader, MAX_HEADER_BYTES } from './header/HeaderCodec';
export { getFrequencyTable, countBytes } from './frequency/FrequencyCounter';
export { PriorityQueue } from './tree/PriorityQueue';
export { buildEncodingTree, isLeaf, countLeaves, treeDepth } from './tree/EncodingTree';
export type { TreeNode, LeafNode, InternalNode } from './tree/EncodingTree';
export { getEncodingMap, getDecodingMap } from './tree/CodeTable';
export { compress, decompress, compressBytes, decompressBytes } from './compressor';
export { describeCodes, summarize } from './inspect';
export type { CodeEntry, EncodingSummary } from './inspect';
