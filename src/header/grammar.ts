/**
 * PEG grammar for the frequency header, compiled by peggy at runtime.
 *
 * The input is the Latin-1 view of the first bytes of a compressed
 * stream, so one character is one byte. Symbols are matched with `.`
 * and never tokenized, which keeps digit and whitespace symbols intact.
 * The grammar stops caring after the last pair: `Trailer` swallows the
 * payload bytes and `End` reports where the header finished.
 */
export const HEADER_GRAMMAR = `
{
  let declared = 0;
  let seen = 0;
}

Header
  = count:Count Separator entries:Entry* end:End Trailer {
      if (entries.length !== count) {
        error('header declares ' + count + ' symbols but only ' + entries.length + ' could be read');
      }
      return { entries: entries, length: end };
    }

Count
  = digits:$[0-9]+ {
      declared = parseInt(digits, 10);
      return declared;
    }

Entry
  = &{ return seen < declared; } symbol:. frequency:Frequency Separator {
      seen++;
      return { symbol: symbol.charCodeAt(0), frequency: frequency };
    }

Frequency
  = digits:$[0-9]+ { return Number(digits); }

Separator "whitespace"
  = [ \\t\\n\\r\\v\\f]

End
  = "" { return location().start.offset; }

Trailer
  = .*
`;
