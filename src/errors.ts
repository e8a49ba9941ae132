/** Fatal contract violation in the compressor (bad table, unknown symbol). */
export class HuffmanError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HuffmanError';
  }
}

/** The frequency header at the front of a compressed stream is malformed. */
export class HeaderFormatError extends HuffmanError {
  constructor(message: string) {
    super(message);
    this.name = 'HeaderFormatError';
  }
}
