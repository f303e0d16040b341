import { RdfXmlError } from '../errors.js';
import { RdfXmlErrorCode } from '../parser-interfaces.js';

/**
 * Immutable URI reference value.
 */
export interface UriRef {
  readonly text: string;

  /**
   * Appends `name` as a fragment: directly after a trailing `#` or `/`,
   * after a new `#` otherwise. The empty URI yields `name` itself.
   */
  withFragment(name: string): UriRef;

  toString(): string;
}

function makeUriRef(text: string): UriRef {
  return {
    text,
    withFragment(name: string): UriRef {
      if (!text.length) return makeUriRef(name);
      if (text.endsWith('#') || text.endsWith('/')) return makeUriRef(text + name);
      return makeUriRef(`${text}#${name}`);
    },
    toString(): string {
      return text;
    }
  };
}

/** Zero value, bound to the empty prefix until a default namespace is declared. */
export const EMPTY_URI: UriRef = makeUriRef('');

/**
 * Parses `text` as an absolute URI; throws INVALID_URI when it is malformed.
 */
export function createUriRef(text: string): UriRef {
  if (!URL.canParse(text))
    throw new RdfXmlError(RdfXmlErrorCode.INVALID_URI, `schema URI ${JSON.stringify(text)} doesn't conform to URL rules`);
  return makeUriRef(text);
}
