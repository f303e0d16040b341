/**
 * RDF terms and triples.
 */

export interface IriNode {
  kind: 'iri';
  id: string;
}

export interface BlankNode {
  kind: 'blank';
  id: string;
}

export interface LiteralNode {
  kind: 'literal';
  value: string;
}

export type Node = IriNode | BlankNode | LiteralNode;

export interface Triple {
  subject: Node;
  predicate: Node;
  object: Node;
}

export function iri(id: string): IriNode {
  return { kind: 'iri', id };
}

export function blank(id: string): BlankNode {
  return { kind: 'blank', id };
}

export function literal(value: string): LiteralNode {
  return { kind: 'literal', value };
}

/**
 * Canonical text of a node: `<iri>`, `_:id` or a JSON-quoted literal.
 */
export function nodeKey(node: Node): string {
  switch (node.kind) {
    case 'iri': return `<${node.id}>`;
    case 'blank': return `_:${node.id}`;
    case 'literal': return JSON.stringify(node.value);
  }
}

export function nodesEqual(a: Node, b: Node): boolean {
  return nodeKey(a) === nodeKey(b);
}

/**
 * Deduplication key of a triple: `{S; P; O}`.
 */
export function tripleKey(triple: Triple): string {
  return `{${nodeKey(triple.subject)}; ${nodeKey(triple.predicate)}; ${nodeKey(triple.object)}}`;
}

/**
 * Serializes triples one per line, `S P O .`, sorted by key so the output is stable.
 */
export function toNTriples(triples: Iterable<Triple>): string {
  const lines: string[] = [];
  for (const triple of triples)
    lines.push(`${nodeKey(triple.subject)} ${nodeKey(triple.predicate)} ${nodeKey(triple.object)} .`);
  lines.sort();
  return lines.length ? lines.join('\n') + '\n' : '';
}
