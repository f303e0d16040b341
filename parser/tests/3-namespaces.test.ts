import { describe, expect, test } from 'vitest';
import type { Block, Tag } from '../reader/block-types.js';
import { createBlankNodeGetter } from '../rdf/blank-node-getter.js';
import {
  createNamespaceResolver,
  parseNamespaces,
  RDF_NS
} from '../rdf/namespace-resolver.js';
import { createNodeResolver } from '../rdf/node-resolver.js';
import { blank, iri } from '../rdf/node.js';
import { createUriRef, EMPTY_URI } from '../rdf/uri.js';
import { RdfXmlError } from '../errors.js';
import { RdfXmlErrorCode } from '../parser-interfaces.js';

function rootWith(attrs: Tag['attrs']): Block {
  return { openingTag: { schemaName: 'rdf', name: 'RDF', attrs }, value: '', children: [] };
}

function tag(...attrs: [schemaName: string, name: string, value: string][]): Tag {
  return {
    schemaName: 'ex',
    name: 'Thing',
    attrs: attrs.map(([schemaName, name, value]) => ({ schemaName, name, value }))
  };
}

const root = rootWith([
  { schemaName: 'xmlns', name: 'rdf', value: RDF_NS },
  { schemaName: 'xmlns', name: 'ex', value: 'http://ex.org/' }
]);

describe('UriRef', () => {
  test('fragments join after # or /, else after a new #', () => {
    expect(createUriRef('http://ex.org/').withFragment('a').text).toBe('http://ex.org/a');
    expect(createUriRef('http://ex.org/ns#').withFragment('a').text).toBe('http://ex.org/ns#a');
    expect(createUriRef('http://ex.org/ns').withFragment('a').text).toBe('http://ex.org/ns#a');
    expect(EMPTY_URI.withFragment('a').toString()).toBe('a');
  });

  test('malformed text is rejected', () => {
    expect(() => createUriRef('not-a-uri')).toThrow(RdfXmlError);
  });
});

describe('parseNamespaces', () => {
  test('collects xmlns declarations and seeds the empty prefix', () => {
    const namespaces = parseNamespaces(root);
    expect([...namespaces.keys()]).toEqual(['', 'rdf', 'ex']);
    expect(namespaces.get('')).toBe(EMPTY_URI);
    expect(namespaces.get('ex')?.text).toBe('http://ex.org/');
  });

  test('a bare xmlns binds the default namespace', () => {
    const namespaces = parseNamespaces(rootWith([{ schemaName: '', name: 'xmlns', value: 'http://default.org/' }]));
    expect(namespaces.get('')?.text).toBe('http://default.org/');
  });

  test('other attributes are ignored', () => {
    const namespaces = parseNamespaces(rootWith([{ schemaName: '', name: 'lang', value: 'en' }]));
    expect(namespaces.size).toBe(1);
  });

  test('an invalid namespace URI fails', () => {
    let caught: unknown;
    try {
      parseNamespaces(rootWith([{ schemaName: 'xmlns', name: 'bad', value: 'not-a-uri' }]));
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({ code: RdfXmlErrorCode.INVALID_URI });
  });
});

describe('NamespaceResolver', () => {
  const resolver = createNamespaceResolver(parseNamespaces(root));

  test('resolves declared prefixes', () => {
    expect(resolver.resolve('ex', 'Thing').text).toBe('http://ex.org/Thing');
    expect(resolver.resolve('rdf', 'type').text).toBe(`${RDF_NS}type`);
    expect(resolver.resolve('', 'plain').text).toBe('plain');
  });

  test('an undeclared prefix fails', () => {
    expect(() => resolver.resolve('zz', 'x')).toThrow('undefined schema name: zz');
  });

  test('finds RDF attributes by resolved name', () => {
    expect(resolver.findRdfAttribute(tag(['ex', 'about', 'a'], ['rdf', 'about', 'b']), 'about')).toBe(1);
    expect(resolver.findRdfAttribute(tag(['rdf', 'about', 'a'], ['zz', 'about', 'b']), 'about')).toBe(0);
    expect(resolver.findRdfAttribute(tag(['', 'about', 'a']), 'about')).toBe(-1);
    expect(resolver.findRdfAttribute(tag(['rdf', 'nodeID', 'a']), 'about')).toBe(-1);
  });

  test('an undeclared attribute prefix ends the search', () => {
    expect(resolver.findRdfAttribute(tag(['zz', 'about', 'a'], ['rdf', 'about', 'b']), 'about')).toBe(-1);
    expect(resolver.findRdfAttribute(tag(['xml', 'lang', 'en'], ['rdf', 'resource', 'r']), 'resource')).toBe(-1);
  });
});

describe('nodeFromTag', () => {
  function nodeResolver() {
    return createNodeResolver(createNamespaceResolver(parseNamespaces(root)), createBlankNodeGetter());
  }

  test('rdf:about names an IRI node', () => {
    expect(nodeResolver().nodeFromTag(tag(['rdf', 'about', 'http://ex.org/1']))).toEqual(iri('http://ex.org/1'));
  });

  test('rdf:about wins over rdf:nodeID', () => {
    const node = nodeResolver().nodeFromTag(tag(['rdf', 'nodeID', 'n1'], ['rdf', 'about', 'http://ex.org/1']));
    expect(node).toEqual(iri('http://ex.org/1'));
  });

  test('equal rdf:nodeID values share one blank node', () => {
    const nodes = nodeResolver();
    const first = nodes.nodeFromTag(tag(['rdf', 'nodeID', 'n1']));
    const anonymous = nodes.nodeFromTag(tag());
    const second = nodes.nodeFromTag(tag(['rdf', 'nodeID', 'n1']));
    expect(first).toEqual(blank('N0'));
    expect(second).toBe(first);
    expect(anonymous).toEqual(blank('N1'));
  });

  test('elements without identity get distinct blank nodes', () => {
    const nodes = nodeResolver();
    expect(nodes.nodeFromTag(tag())).not.toEqual(nodes.nodeFromTag(tag()));
  });

  test('blank node prefix is configurable', () => {
    expect(createBlankNodeGetter('b').get()).toEqual(blank('b0'));
  });
});
