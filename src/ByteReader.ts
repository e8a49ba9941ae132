/**
 * Sequential reader over an in-memory byte array.
 * Signals exhaustion with `null` and can be rewound to the start,
 * which the compressor needs between its counting and encoding passes.
 */
export class ByteReader {
  readonly data: Uint8Array;
  private _position: number;

  constructor(data: Uint8Array) {
    this.data = data;
    this._position = 0;
  }

  /** Total number of bytes. */
  get length(): number {
    return this.data.length;
  }

  /** Index of the next byte to be read. */
  get position(): number {
    return this._position;
  }

  /** Read the next byte, or `null` once the data is exhausted. */
  read(): number | null {
    if (this._position >= this.data.length) return null;
    return this.data[this._position++];
  }

  /** Move the cursor back to the first byte. */
  rewind(): void {
    this._position = 0;
  }
}
