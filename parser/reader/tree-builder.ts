/**
 * Recursive-descent construction of the Block tree.
 *
 * Grammar, roughly:
 *   block       := prolog* openingTag ( '/>' | '>' ( text | block* ) closingTag )
 *   openingTag  := '<' [prefix ':'] name attribute* ( '>' | '/>' )
 *   closingTag  := '</' [prefix ':'] name '>'
 *   prolog      := '<?' ... '?' '>'
 */

import { CharacterCodes } from '../scanner/character-codes.js';
import { type CharSource, openFileSource } from '../scanner/char-source.js';
import {
  delimiterSetOf,
  unionDelimiters,
  WHITESPACE
} from '../scanner/delimiter-set.js';
import { createScanner } from '../scanner/scanner.js';
import { isRdfXmlError } from '../errors.js';
import { RdfXmlErrorCode } from '../parser-interfaces.js';
import {
  type Block,
  createBlock,
  formatTagName,
  type OpeningTagResult,
  type Tag
} from './block-types.js';
import { createTokenizer, type Tokenizer } from './tokenizer.js';

const TAG_START = delimiterSetOf(CharacterCodes.lessThan);
const QUESTION_MARK = delimiterSetOf(CharacterCodes.question);
const OPENING_NAME_END = unionDelimiters(WHITESPACE, delimiterSetOf(CharacterCodes.greaterThan, CharacterCodes.slash));
const CLOSING_NAME_END = unionDelimiters(WHITESPACE, delimiterSetOf(CharacterCodes.greaterThan));

export interface XmlReader {
  /** Reads the root block. Closes the source if the reader opened it. */
  read(): Block;

  /** Closes a source the reader opened itself; a no-op for caller-supplied sources. */
  closeSource(): void;
}

export interface TreeBuilder {
  readOpeningTag(): OpeningTagResult;
  readClosingTag(): Tag;
  readBlock(): Block;
}

export function createTreeBuilder(tokenizer: Tokenizer): TreeBuilder {
  const { scanner, fail } = tokenizer;

  /** Consumes `/>`'s closing bracket after the slash has been read. */
  function expectSelfClosingEnd(): void {
    if (scanner.readOneChar() !== '>')
      throw fail(RdfXmlErrorCode.EXPECTED_GREATER_THAN, 'expected closing angular bracket after /');
  }

  function skipProlog(): void {
    scanner.readOneChar(); // '?'
    scanner.readUntil(QUESTION_MARK);
    scanner.readOneChar(); // '?'
    scanner.skipWhitespace();
    const next = scanner.peekOneChar();
    if (next !== '>')
      throw fail(RdfXmlErrorCode.MALFORMED_PROLOG, `expected a > char after ?, found ${JSON.stringify(next)}`);
    scanner.readOneChar();
  }

  function readOpeningTag(): OpeningTagResult {
    scanner.skipWhitespace();

    let stray: string;
    try {
      stray = scanner.readUntil(TAG_START);
    } catch (error) {
      if (isRdfXmlError(error) && error.code === RdfXmlErrorCode.UNEXPECTED_END_OF_INPUT) {
        if (error.consumed)
          throw fail(RdfXmlErrorCode.STRAY_CHARACTERS, 'found stray characters at end of input');
        return { kind: 'end' };
      }
      throw error;
    }
    if (stray.length)
      throw fail(RdfXmlErrorCode.STRAY_CHARACTERS, `found extra characters before tag start: ${JSON.stringify(stray)}`);

    scanner.readOneChar(); // '<'
    scanner.skipWhitespace();

    const next = scanner.peekOneChar();
    if (next === '/')
      throw fail(RdfXmlErrorCode.UNEXPECTED_CLOSING_TAG, 'unexpected closing tag');
    if (next === '?') {
      skipProlog();
      return { kind: 'prolog' };
    }

    const { prefix, name } = tokenizer.readColonPair(OPENING_NAME_END);
    const tag: Tag = { schemaName: prefix, name, attrs: [] };

    scanner.skipWhitespace();
    let delimiter = scanner.peekOneChar();
    while (delimiter !== '>' && delimiter !== '/') {
      tag.attrs.push(tokenizer.readAttribute());
      scanner.skipWhitespace();
      delimiter = scanner.peekOneChar();
    }

    scanner.readOneChar();
    if (delimiter === '/') {
      expectSelfClosingEnd();
      return { kind: 'tag', tag, selfClosing: true };
    }
    return { kind: 'tag', tag, selfClosing: false };
  }

  function readClosingTag(): Tag {
    if (scanner.readNChars(2) !== '</')
      throw fail(RdfXmlErrorCode.EXPECTED_CLOSING_TAG, 'expected a closing tag');

    const { prefix, name } = tokenizer.readColonPair(CLOSING_NAME_END);
    scanner.skipWhitespace();
    if (scanner.readOneChar() !== '>')
      throw fail(RdfXmlErrorCode.EXPECTED_GREATER_THAN, 'expected a > char');

    return { schemaName: prefix, name, attrs: [] };
  }

  function readBlock(): Block {
    let opening = readOpeningTag();
    while (opening.kind === 'prolog')
      opening = readOpeningTag();

    if (opening.kind === 'end')
      throw fail(RdfXmlErrorCode.END_OF_INPUT, 'no more tags in input');

    const block = createBlock(opening.tag);
    if (opening.selfClosing) return block;

    scanner.skipWhitespace();
    if (scanner.peekOneChar() !== '<') {
      block.value = scanner.readUntil(TAG_START);
    } else {
      while (scanner.peekNChars(2) !== '</') {
        block.children.push(readBlock());
        scanner.skipWhitespace();
      }
    }

    const closingTag = readClosingTag();
    if (closingTag.name !== opening.tag.name || closingTag.schemaName !== opening.tag.schemaName) {
      throw fail(
        RdfXmlErrorCode.TAG_MISMATCH,
        `opening and closing tags don't match: opening tag ${formatTagName(opening.tag)}, closing tag ${formatTagName(closingTag)}`
      );
    }
    return block;
  }

  return { readOpeningTag, readClosingTag, readBlock };
}

export interface XmlReaderOptions {
  /** Close the source once read() finishes, whatever the outcome. */
  ownsSource?: boolean;
}

/**
 * Reader over a source the caller already holds. Unless `ownsSource` is set,
 * the caller stays responsible for closing it.
 */
export function createXmlReaderFromSource(source: CharSource, options?: XmlReaderOptions): XmlReader {
  const ownsSource = options?.ownsSource ?? false;
  const builder = createTreeBuilder(createTokenizer(createScanner(source)));

  function closeSource(): void {
    if (ownsSource) source.close();
  }

  function read(): Block {
    try {
      return builder.readBlock();
    } finally {
      closeSource();
    }
  }

  return { read, closeSource };
}

/**
 * Opens `filePath`; the reader closes the file once read() finishes, whatever the outcome.
 */
export function createXmlReaderFromPath(filePath: string, chunkSize?: number): XmlReader {
  return createXmlReaderFromSource(openFileSource(filePath, chunkSize), { ownsSource: true });
}
