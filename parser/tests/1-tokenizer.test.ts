import { describe, expect, test } from 'vitest';
import { createStringSource } from '../scanner/char-source.js';
import { WHITESPACE } from '../scanner/delimiter-set.js';
import { createScanner } from '../scanner/scanner.js';
import { createTokenizer } from '../reader/tokenizer.js';
import { RdfXmlError } from '../errors.js';
import { ErrorCategory, RdfXmlErrorCode } from '../parser-interfaces.js';

function tokenizerFor(text: string) {
  return createTokenizer(createScanner(createStringSource(text)));
}

function errorCode(fn: () => unknown): RdfXmlErrorCode {
  try {
    fn();
  } catch (error) {
    if (error instanceof RdfXmlError) return error.code;
    throw error;
  }
  throw new Error('expected an RdfXmlError');
}

describe('readColonPair', () => {
  test('splits a qualified name at the colon', () => {
    expect(tokenizerFor('rdf:about ').readColonPair(WHITESPACE))
      .toEqual({ prefix: 'rdf', name: 'about', colonFound: true });
  });

  test('an unqualified name comes back whole', () => {
    expect(tokenizerFor('about ').readColonPair(WHITESPACE))
      .toEqual({ prefix: '', name: 'about', colonFound: false });
  });

  test('only the first colon splits', () => {
    expect(tokenizerFor('a:b:c ').readColonPair(WHITESPACE))
      .toEqual({ prefix: 'a', name: 'b:c', colonFound: true });
  });

  test('a colon with nothing after it fails', () => {
    const tokenizer = tokenizerFor('rdf: ');
    let caught: unknown;
    try {
      tokenizer.readColonPair(WHITESPACE);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(RdfXmlError);
    expect(caught).toMatchObject({
      code: RdfXmlErrorCode.EMPTY_LOCAL_NAME,
      category: ErrorCategory.Semantic
    });
  });

  test('an empty word fails', () => {
    expect(errorCode(() => tokenizerFor(' x').readColonPair(WHITESPACE)))
      .toBe(RdfXmlErrorCode.EMPTY_LOCAL_NAME);
  });
});

describe('readAttribute', () => {
  test('reads a prefixed attribute and leaves the cursor after the quote', () => {
    const tokenizer = tokenizerFor('rdf:about="http://ex.org/1">');
    expect(tokenizer.readAttribute()).toEqual({
      schemaName: 'rdf',
      name: 'about',
      value: 'http://ex.org/1'
    });
    expect(tokenizer.scanner.peekOneChar()).toBe('>');
  });

  test('accepts single quotes and whitespace before the equals sign', () => {
    expect(tokenizerFor("x ='1'>").readAttribute())
      .toEqual({ schemaName: '', name: 'x', value: '1' });
  });

  test('the other quote character is part of the value', () => {
    expect(tokenizerFor(`x='it"s'`).readAttribute().value).toBe('it"s');
  });

  test('missing equals sign', () => {
    expect(errorCode(() => tokenizerFor('x "1"').readAttribute()))
      .toBe(RdfXmlErrorCode.MISSING_EQUALS);
  });

  test('the quote must follow the equals sign directly', () => {
    expect(errorCode(() => tokenizerFor("x= '1'").readAttribute()))
      .toBe(RdfXmlErrorCode.MISSING_QUOTE);
  });

  test('whitespace inside a value is a quote mismatch', () => {
    expect(errorCode(() => tokenizerFor('x="a b"').readAttribute()))
      .toBe(RdfXmlErrorCode.MISMATCHED_QUOTE);
  });

  test('an unterminated value runs into the end of input', () => {
    expect(errorCode(() => tokenizerFor(`x="1'>`).readAttribute()))
      .toBe(RdfXmlErrorCode.UNEXPECTED_END_OF_INPUT);
  });
});
