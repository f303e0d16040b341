/**
 * Parser Interfaces and Types
 *
 * Options, results and error codes shared by the reader and the triple extractor.
 */

import type { Triple } from './rdf/node.js';

/**
 * Error categories for structured error reporting
 */
export enum ErrorCategory {
  /** End of input reached, expectedly or not */
  Stream = 'stream',
  /** Tag or attribute grammar violated */
  Grammar = 'grammar',
  /** Opening and closing tags disagree */
  Structural = 'structural',
  /** Namespaces and URIs */
  Semantic = 'semantic'
}

/**
 * Error codes for machine-readable diagnostics
 */
export enum RdfXmlErrorCode {
  UNEXPECTED_END_OF_INPUT = 'unexpected-end-of-input',
  END_OF_INPUT = 'end-of-input',
  STRAY_CHARACTERS = 'stray-characters',
  UNEXPECTED_CLOSING_TAG = 'unexpected-closing-tag',
  MALFORMED_PROLOG = 'malformed-prolog',
  MISSING_EQUALS = 'missing-equals',
  MISSING_QUOTE = 'missing-quote',
  MISMATCHED_QUOTE = 'mismatched-quote',
  EXPECTED_CLOSING_TAG = 'expected-closing-tag',
  EXPECTED_GREATER_THAN = 'expected-greater-than',
  TAG_MISMATCH = 'tag-mismatch',
  EMPTY_LOCAL_NAME = 'empty-local-name',
  UNDEFINED_NAMESPACE = 'undefined-namespace',
  INVALID_URI = 'invalid-uri'
}

export const ERROR_CATEGORIES: Readonly<Record<RdfXmlErrorCode, ErrorCategory>> = {
  [RdfXmlErrorCode.UNEXPECTED_END_OF_INPUT]: ErrorCategory.Stream,
  [RdfXmlErrorCode.END_OF_INPUT]: ErrorCategory.Stream,
  [RdfXmlErrorCode.STRAY_CHARACTERS]: ErrorCategory.Grammar,
  [RdfXmlErrorCode.UNEXPECTED_CLOSING_TAG]: ErrorCategory.Grammar,
  [RdfXmlErrorCode.MALFORMED_PROLOG]: ErrorCategory.Grammar,
  [RdfXmlErrorCode.MISSING_EQUALS]: ErrorCategory.Grammar,
  [RdfXmlErrorCode.MISSING_QUOTE]: ErrorCategory.Grammar,
  [RdfXmlErrorCode.MISMATCHED_QUOTE]: ErrorCategory.Grammar,
  [RdfXmlErrorCode.EXPECTED_CLOSING_TAG]: ErrorCategory.Grammar,
  [RdfXmlErrorCode.EXPECTED_GREATER_THAN]: ErrorCategory.Grammar,
  [RdfXmlErrorCode.TAG_MISMATCH]: ErrorCategory.Structural,
  [RdfXmlErrorCode.EMPTY_LOCAL_NAME]: ErrorCategory.Semantic,
  [RdfXmlErrorCode.UNDEFINED_NAMESPACE]: ErrorCategory.Semantic,
  [RdfXmlErrorCode.INVALID_URI]: ErrorCategory.Semantic
};

/**
 * 1-based location of the scanner cursor
 */
export interface SourcePosition {
  line: number;
  column: number;
}

/**
 * Minimal logging surface; `console` satisfies it.
 */
export interface ParseLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

/**
 * Parser configuration options
 */
export interface ParserOptions {
  /** Extraction units allowed to run at once (default: 8) */
  maxConcurrency?: number;

  /** Prefix of minted blank node ids (default: 'N') */
  blankNodePrefix?: string;

  /** Receives progress messages (default: silent) */
  logger?: ParseLogger;

  /** Characters requested per read from a file source (default: 64 KiB) */
  chunkSize?: number;
}

/**
 * Result of a parse operation
 */
export interface ParseResult {
  /** Triples keyed by their canonical "{S; P; O}" form */
  triples: ReadonlyMap<string, Triple>;

  /** Namespace table read from the root element, prefix -> base URI */
  namespaces: ReadonlyMap<string, string>;

  /** Parse time in milliseconds */
  parseTime: number;
}
