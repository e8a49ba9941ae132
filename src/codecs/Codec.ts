import { BitBuffer } from '../BitBuffer';

/**
 * Something that can be written to and read back from a bit buffer.
 * @template T The value type this codec encodes/decodes.
 */
export interface Codec<T> {
  /** Append the encoding of `value` at the buffer's cursor. */
  encode(buffer: BitBuffer, value: T): void;

  /** Decode a value starting at the buffer's cursor, advancing past it. */
  decode(buffer: BitBuffer): T;
}
