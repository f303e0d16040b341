/**
 * Character code constants and classification functions
 * Following TypeScript's character code pattern for consistent character handling
 */

export const enum CharacterCodes {
  nullCharacter = 0,
  maxAsciiCharacter = 0x7F,

  lineFeed = 0x0A,              // \n
  carriageReturn = 0x0D,        // \r

  // Control characters
  tab = 0x09,

  // ASCII printable characters
  space = 0x20,
  exclamation = 0x21,           // !
  doubleQuote = 0x22,           // "
  hash = 0x23,                  // #
  singleQuote = 0x27,           // '
  slash = 0x2F,                 // /
  colon = 0x3A,                 // :
  lessThan = 0x3C,              // <
  equals = 0x3D,                // =
  greaterThan = 0x3E,           // >
  question = 0x3F,              // ?

  // Surrogate ranges for code point decoding
  highSurrogateStart = 0xD800,
  highSurrogateEnd = 0xDBFF,
  lowSurrogateStart = 0xDC00,
  lowSurrogateEnd = 0xDFFF,
}

/**
 * Check if character is a line break
 */
export function isLineBreak(ch: number): boolean {
  return ch === CharacterCodes.lineFeed ||
         ch === CharacterCodes.carriageReturn;
}

/**
 * Whitespace between tokens: space, tab, CR and LF.
 */
export function isWhiteSpace(ch: number): boolean {
  return ch === CharacterCodes.space ||
         ch === CharacterCodes.tab ||
         isLineBreak(ch);
}

export function isHighSurrogate(ch: number): boolean {
  return ch >= CharacterCodes.highSurrogateStart && ch <= CharacterCodes.highSurrogateEnd;
}

export function isLowSurrogate(ch: number): boolean {
  return ch >= CharacterCodes.lowSurrogateStart && ch <= CharacterCodes.lowSurrogateEnd;
}

/**
 * Check if character is a quote that may open an attribute value
 */
export function isQuote(ch: number): boolean {
  return ch === CharacterCodes.doubleQuote || ch === CharacterCodes.singleQuote;
}
