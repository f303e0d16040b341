import {
  ERROR_CATEGORIES,
  ErrorCategory,
  RdfXmlErrorCode,
  type SourcePosition
} from './parser-interfaces.js';

export class RdfXmlError extends Error {
  readonly code: RdfXmlErrorCode;
  readonly category: ErrorCategory;
  readonly line?: number;
  readonly column?: number;
  /** Text consumed before the reader ran out of input, when it did */
  readonly consumed?: string;

  constructor(
    code: RdfXmlErrorCode,
    message: string,
    position?: SourcePosition,
    consumed?: string
  ) {
    super(position ? `${message} (line ${position.line}, column ${position.column})` : message);
    this.name = 'RdfXmlError';
    this.code = code;
    this.category = ERROR_CATEGORIES[code];
    this.line = position?.line;
    this.column = position?.column;
    this.consumed = consumed;
  }
}

export function isRdfXmlError(value: unknown): value is RdfXmlError {
  return value instanceof RdfXmlError;
}

/**
 * True for the clean end-of-input signal raised when no further tag exists.
 */
export function isEndOfInput(error: unknown): boolean {
  return isRdfXmlError(error) && error.code === RdfXmlErrorCode.END_OF_INPUT;
}
