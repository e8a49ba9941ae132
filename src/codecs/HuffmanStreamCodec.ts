import { BitBuffer } from '../BitBuffer';
import { ByteReader } from '../ByteReader';
import { HuffmanError } from '../errors';
import { ExtSymbol, PSEUDO_EOF, symbolLabel } from '../symbols';
import { getEncodingMap } from '../tree/CodeTable';
import { InternalNode, TreeNode } from '../tree/EncodingTree';
import { Codec } from './Codec';

/**
 * Huffman payload codec for a fixed encoding tree.
 *
 * Encoding writes one codeword per input byte followed by the sentinel's
 * codeword. Decoding walks the tree bit by bit and stops at the sentinel;
 * whatever follows it (byte padding, trailing data) is left unread.
 */
export class HuffmanStreamCodec implements Codec<Uint8Array> {
  private readonly root: TreeNode;
  private readonly codes: Map<ExtSymbol, string>;

  constructor(root: TreeNode) {
    this.root = root;
    this.codes = getEncodingMap(root);
  }

  /** Codeword assigned to `symbol`. */
  codeFor(symbol: ExtSymbol): string {
    const code = this.codes.get(symbol);
    if (code === undefined) {
      throw new HuffmanError(`Symbol ${symbolLabel(symbol)} is not in the encoding tree`);
    }
    return code;
  }

  encode(buffer: BitBuffer, value: Uint8Array): void {
    this.encodeStream(buffer, new ByteReader(value));
  }

  /** Encode `source` from its current position to the end. */
  encodeStream(buffer: BitBuffer, source: ByteReader): void {
    for (let byte = source.read(); byte !== null; byte = source.read()) {
      buffer.writeCode(this.codeFor(byte));
    }
    buffer.writeCode(this.codeFor(PSEUDO_EOF));
  }

  decode(buffer: BitBuffer): Uint8Array {
    const sink = BitBuffer.alloc();
    this.decodeTo(buffer, sink);
    return sink.toUint8Array();
  }

  /**
   * Decode symbols from `buffer` into `sink` until the sentinel is reached.
   * A tree made of the sentinel alone consumes no bits at all.
   * Throws if the bits run out first.
   */
  decodeTo(buffer: BitBuffer, sink: BitBuffer): void {
    const root = this.root;
    if (root.kind === 'leaf') {
      if (root.symbol === PSEUDO_EOF) return;
      throw new HuffmanError(
        `Encoding tree is a single ${symbolLabel(root.symbol)} leaf with no end-of-stream marker`
      );
    }

    let node: InternalNode = root;
    for (;;) {
      const next = buffer.readBit() === 0 ? node.zero : node.one;
      if (next.kind === 'internal') {
        node = next;
        continue;
      }
      if (next.symbol === PSEUDO_EOF) return;
      sink.writeBits(next.symbol, 8);
      node = root;
    }
  }
}
