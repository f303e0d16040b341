import type { Block, Tag } from '../reader/block-types.js';
import { RdfXmlError } from '../errors.js';
import { RdfXmlErrorCode } from '../parser-interfaces.js';
import { createUriRef, EMPTY_URI, type UriRef } from './uri.js';

export const RDF_NS = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';

const XMLNS = 'xmlns';

/** Prefix -> base URI. Written once from the root element, read-only afterwards. */
export type NamespaceTable = ReadonlyMap<string, UriRef>;

/**
 * Collects the `xmlns:prefix="uri"` declarations of the root element.
 * A bare `xmlns="uri"` binds the empty prefix, which is otherwise bound to the empty URI.
 */
export function parseNamespaces(root: Block): NamespaceTable {
  const namespaces = new Map<string, UriRef>([['', EMPTY_URI]]);
  for (const attr of root.openingTag.attrs) {
    if (attr.schemaName === XMLNS)
      namespaces.set(attr.name, createUriRef(attr.value));
    else if (!attr.schemaName && attr.name === XMLNS)
      namespaces.set('', createUriRef(attr.value));
  }
  return namespaces;
}

export interface NamespaceResolver {
  readonly namespaces: NamespaceTable;

  /** `prefix:name` to a full URI. Throws UNDEFINED_NAMESPACE for an undeclared prefix. */
  resolve(prefix: string, name: string): UriRef;

  /**
   * Index of the first attribute of `tag` that resolves to `rdf:<localName>`, or -1.
   * The search stops with -1 at the first attribute whose prefix is undeclared.
   */
  findRdfAttribute(tag: Tag, localName: string): number;
}

export function createNamespaceResolver(namespaces: NamespaceTable): NamespaceResolver {
  const rdfNs = createUriRef(RDF_NS);

  function resolve(prefix: string, name: string): UriRef {
    const base = namespaces.get(prefix);
    if (!base)
      throw new RdfXmlError(RdfXmlErrorCode.UNDEFINED_NAMESPACE, `undefined schema name: ${prefix}`);
    return base.withFragment(name);
  }

  function findRdfAttribute(tag: Tag, localName: string): number {
    const target = rdfNs.withFragment(localName).text;
    for (let i = 0; i < tag.attrs.length; i++) {
      const attr = tag.attrs[i];
      const base = namespaces.get(attr.schemaName);
      if (!base) return -1;
      if (base.withFragment(attr.name).text === target) return i;
    }
    return -1;
  }

  return { namespaces, resolve, findRdfAttribute };
}
