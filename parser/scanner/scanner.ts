import {
  CharacterCodes,
  isHighSurrogate,
  isLowSurrogate,
  isWhiteSpace
} from './character-codes.js';
import type { CharSource } from './char-source.js';
import { type DelimiterSet, hasDelimiter } from './delimiter-set.js';
import { RdfXmlError } from '../errors.js';
import { RdfXmlErrorCode, type SourcePosition } from '../parser-interfaces.js';

/**
 * Buffered cursor over a character stream. Knows nothing about XML.
 * Every operation works on code points: a surrogate pair counts as one character.
 */
export interface Scanner {
  /** Consumes and returns the next character. */
  readOneChar(): string;

  /** Returns the next character without consuming it. */
  peekOneChar(): string;

  /** Consumes and returns the next `n` characters. */
  readNChars(n: number): string;

  /** Returns the next `n` characters without consuming them. */
  peekNChars(n: number): string;

  /**
   * Consumes everything up to, not including, the first character in `delimiters`.
   * Throws UNEXPECTED_END_OF_INPUT carrying the consumed text if no delimiter turns up.
   */
  readUntil(delimiters: DelimiterSet): string;

  /** Consumes whitespace; returns the number of characters skipped. Never throws. */
  skipWhitespace(): number;

  /** True once every character has been consumed. */
  isAtEnd(): boolean;

  /** Current 1-based line and column. */
  getPosition(): SourcePosition;
}

export function createScanner(source: CharSource): Scanner {
  // Scanner state - encapsulated within closure
  let buffer = '';
  let pos = 0;
  let exhausted = false;
  let line = 1;
  let column = 1;
  let afterCarriageReturn = false;

  /**
   * Makes at least `count` code units available past `pos`, unless the source runs dry.
   */
  function fill(count: number): boolean {
    while (buffer.length - pos < count && !exhausted) {
      const chunk = source.read();
      if (chunk === undefined) {
        exhausted = true;
        break;
      }
      buffer = pos < buffer.length ? buffer.slice(pos) + chunk : chunk;
      pos = 0;
    }
    return buffer.length - pos >= count;
  }

  /** Width in code units of the code point starting at `offset`, reading more input if a pair is split. */
  function widthAt(offset: number): number {
    if (!isHighSurrogate(buffer.charCodeAt(offset))) return 1;
    if (offset + 1 >= buffer.length) {
      const relative = offset - pos;
      fill(relative + 2);
      offset = pos + relative;
    }
    return offset + 1 < buffer.length && isLowSurrogate(buffer.charCodeAt(offset + 1)) ? 2 : 1;
  }

  function updatePosition(ch: number): void {
    if (ch === CharacterCodes.lineFeed) {
      if (!afterCarriageReturn) line++;
      column = 1;
      afterCarriageReturn = false;
    } else if (ch === CharacterCodes.carriageReturn) {
      line++;
      column = 1;
      afterCarriageReturn = true;
    } else {
      column++;
      afterCarriageReturn = false;
    }
  }

  function endOfInput(consumed: string): RdfXmlError {
    return new RdfXmlError(
      RdfXmlErrorCode.UNEXPECTED_END_OF_INPUT,
      'unexpected end of input',
      getPosition(),
      consumed
    );
  }

  function readOneChar(): string {
    if (!fill(1)) throw endOfInput('');
    const width = widthAt(pos);
    const text = buffer.slice(pos, pos + width);
    updatePosition(buffer.charCodeAt(pos));
    pos += width;
    return text;
  }

  function peekOneChar(): string {
    if (!fill(1)) throw endOfInput('');
    return buffer.slice(pos, pos + widthAt(pos));
  }

  /** Code unit length of the next `n` code points, or -1 if the input ends first. */
  function measure(n: number): number {
    let units = 0;
    for (let i = 0; i < n; i++) {
      if (!fill(units + 1)) return -1;
      units += widthAt(pos + units);
    }
    return units;
  }

  function readNChars(n: number): string {
    const units = measure(n);
    if (units < 0) throw endOfInput('');
    const text = buffer.slice(pos, pos + units);
    for (let i = 0; i < units; i++) {
      const ch = buffer.charCodeAt(pos + i);
      if (!isLowSurrogate(ch)) updatePosition(ch);
    }
    pos += units;
    return text;
  }

  function peekNChars(n: number): string {
    const units = measure(n);
    if (units < 0) throw endOfInput('');
    return buffer.slice(pos, pos + units);
  }

  function readUntil(delimiters: DelimiterSet): string {
    const parts: string[] = [];
    while (true) {
      if (!fill(1)) throw endOfInput(parts.join(''));
      const start = pos;
      while (pos < buffer.length) {
        const ch = buffer.charCodeAt(pos);
        // delimiters are all ASCII, so a surrogate never matches
        if (hasDelimiter(delimiters, ch)) {
          parts.push(buffer.slice(start, pos));
          return parts.join('');
        }
        if (!isLowSurrogate(ch)) updatePosition(ch);
        pos++;
      }
      parts.push(buffer.slice(start, pos));
    }
  }

  function skipWhitespace(): number {
    let skipped = 0;
    while (fill(1) && isWhiteSpace(buffer.charCodeAt(pos))) {
      updatePosition(buffer.charCodeAt(pos));
      pos++;
      skipped++;
    }
    return skipped;
  }

  function isAtEnd(): boolean {
    return !fill(1);
  }

  function getPosition(): SourcePosition {
    return { line, column };
  }

  return {
    readOneChar,
    peekOneChar,
    readNChars,
    peekNChars,
    readUntil,
    skipWhitespace,
    isAtEnd,
    getPosition
  };
}
