import { CharacterCodes, isQuote } from '../scanner/character-codes.js';
import {
  type DelimiterSet,
  delimiterSetOf,
  unionDelimiters,
  WHITESPACE
} from '../scanner/delimiter-set.js';
import type { Scanner } from '../scanner/scanner.js';
import { RdfXmlError } from '../errors.js';
import { RdfXmlErrorCode } from '../parser-interfaces.js';
import type { Attribute, QualifiedName } from './block-types.js';

const ATTRIBUTE_NAME_END = unionDelimiters(WHITESPACE, delimiterSetOf(CharacterCodes.equals));

/**
 * Attribute and qualified-name grammar on top of the scanner.
 */
export interface Tokenizer {
  readonly scanner: Scanner;

  /** Reads a word up to `delimiters` and splits it at the first colon. */
  readColonPair(delimiters: DelimiterSet): QualifiedName;

  /** Reads `[prefix:]name = "value"` with the cursor on the first name character. */
  readAttribute(): Attribute;

  /** Builds an error stamped with the current cursor position. */
  fail(code: RdfXmlErrorCode, message: string): RdfXmlError;
}

export function createTokenizer(scanner: Scanner): Tokenizer {

  function fail(code: RdfXmlErrorCode, message: string): RdfXmlError {
    return new RdfXmlError(code, message, scanner.getPosition());
  }

  function readColonPair(delimiters: DelimiterSet): QualifiedName {
    const word = scanner.readUntil(delimiters);
    if (!word.length)
      throw fail(RdfXmlErrorCode.EMPTY_LOCAL_NAME, 'expected a name');

    const colon = word.indexOf(':');
    if (colon < 0)
      return { prefix: '', name: word, colonFound: false };

    const name = word.slice(colon + 1);
    if (!name.length)
      throw fail(RdfXmlErrorCode.EMPTY_LOCAL_NAME, `expected a word after colon in "${word}"`);
    return { prefix: word.slice(0, colon), name, colonFound: true };
  }

  function readAttribute(): Attribute {
    const { prefix, name } = readColonPair(ATTRIBUTE_NAME_END);
    scanner.skipWhitespace();

    if (scanner.readOneChar() !== '=')
      throw fail(RdfXmlErrorCode.MISSING_EQUALS, `expected an assignment sign (=) after attribute ${name}`);

    const openingQuote = scanner.readOneChar();
    if (!isQuote(openingQuote.charCodeAt(0)))
      throw fail(RdfXmlErrorCode.MISSING_QUOTE, `value of attribute ${name} must be enclosed within quotes`);

    // values stop at whitespace as well as at the matching quote
    const value = scanner.readUntil(unionDelimiters(WHITESPACE, delimiterSetOf(openingQuote.charCodeAt(0))));
    const closingQuote = scanner.readOneChar();
    if (closingQuote !== openingQuote)
      throw fail(RdfXmlErrorCode.MISMATCHED_QUOTE, `unexpected blank character in attribute ${name}, expected a closing ${openingQuote}`);

    return { schemaName: prefix, name, value };
  }

  return { scanner, readColonPair, readAttribute, fail };
}
