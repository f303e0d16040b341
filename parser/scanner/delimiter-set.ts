/**
 * Delimiter sets for readUntil().
 *
 * A set is a 64-bit mask split over two 32-bit words: bit k of `low` marks code
 * point k, bit k of `high` marks code point 32 + k. Only code points below
 * DELIMITER_SET_WIDTH can be members; every delimiter the reader stops on
 * (whitespace, `<`, `>`, `/`, `=`, `:` and the quotes) is in that range.
 */

import { CharacterCodes } from './character-codes.js';

export interface DelimiterSet {
  readonly low: number;
  readonly high: number;
}

export const DELIMITER_SET_WIDTH = 64;

export const EMPTY_DELIMITERS: DelimiterSet = { low: 0, high: 0 };

export function delimiterSetOf(...chars: number[]): DelimiterSet {
  let low = 0;
  let high = 0;
  for (const ch of chars) {
    if (ch < 0 || ch >= DELIMITER_SET_WIDTH)
      throw new RangeError(`DelimiterSet: code point ${ch} does not fit in a ${DELIMITER_SET_WIDTH}-bit mask`);
    if (ch < 32) low |= 1 << ch;
    else high |= 1 << (ch - 32);
  }
  return { low: low >>> 0, high: high >>> 0 };
}

export function unionDelimiters(...sets: DelimiterSet[]): DelimiterSet {
  let low = 0;
  let high = 0;
  for (const set of sets) {
    low |= set.low;
    high |= set.high;
  }
  return { low: low >>> 0, high: high >>> 0 };
}

export function hasDelimiter(set: DelimiterSet, ch: number): boolean {
  if (ch < 32) return ch >= 0 && (set.low & (1 << ch)) !== 0;
  if (ch < DELIMITER_SET_WIDTH) return (set.high & (1 << (ch - 32))) !== 0;
  return false;
}

export const WHITESPACE = delimiterSetOf(
  CharacterCodes.space,
  CharacterCodes.tab,
  CharacterCodes.carriageReturn,
  CharacterCodes.lineFeed
);
