/**
 * Walks the Block tree emitting triples.
 *
 * A subject block holds predicate blocks. For each predicate child the subject gets
 * an rdf:type triple naming the subject's own tag. A predicate without children
 * yields one literal object (its rdf:resource value, else its text). A predicate
 * with children yields one triple per child object, and every object is then
 * processed as a subject in its own unit of work.
 *
 * The predicate slot is the node the predicate element itself names (rdf:about,
 * rdf:nodeID or a fresh blank node), not the URI of its tag.
 */

import type { Block } from '../reader/block-types.js';
import { RDF_NS, type NamespaceResolver } from './namespace-resolver.js';
import type { NodeResolver } from './node-resolver.js';
import { iri, literal, type Node } from './node.js';
import type { TaskGroup } from './task-group.js';
import type { TripleStore } from './triple-store.js';

const RDF_TYPE = iri(`${RDF_NS}type`);

export interface TripleExtractorContext {
  resolver: NamespaceResolver;
  nodes: NodeResolver;
  store: TripleStore;
  group: TaskGroup;
}

export interface TripleExtractor {
  /** Schedules `block`, already identified as `node`, as a unit in the group. */
  schedule(block: Block, node: Node): void;

  /** Emits the triples of `block` as subject `node`, scheduling its objects. */
  processBlock(block: Block, node: Node): void;
}

export function createTripleExtractor(context: TripleExtractorContext): TripleExtractor {
  const { resolver, nodes, store, group } = context;

  function schedule(block: Block, node: Node): void {
    group.spawn(() => processBlock(block, node));
  }

  function processBlock(block: Block, node: Node): void {
    if (!block.children.length) return;

    const { schemaName, name } = block.openingTag;
    const typeNode = iri(resolver.resolve(schemaName, name).text);

    for (const predicateBlock of block.children) {
      if (group.signal.aborted) return;

      store.add({ subject: node, predicate: RDF_TYPE, object: typeNode });
      const predicateNode = nodes.nodeFromTag(predicateBlock.openingTag);

      if (!predicateBlock.children.length) {
        const tag = predicateBlock.openingTag;
        const resource = resolver.findRdfAttribute(tag, 'resource');
        const objectValue = resource >= 0 ? tag.attrs[resource].value : predicateBlock.value;
        store.add({ subject: node, predicate: predicateNode, object: literal(objectValue) });
        continue;
      }

      for (const objectBlock of predicateBlock.children) {
        const objectNode = nodes.nodeFromTag(objectBlock.openingTag);
        store.add({ subject: node, predicate: predicateNode, object: objectNode });
        schedule(objectBlock, objectNode);
      }
    }
  }

  return { schedule, processBlock };
}
