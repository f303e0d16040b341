import type { Tag } from '../reader/block-types.js';
import type { BlankNodeGetter } from './blank-node-getter.js';
import type { NamespaceResolver } from './namespace-resolver.js';
import { iri, type Node } from './node.js';

export interface NodeResolver {
  /**
   * Node named by an element: rdf:about gives an IRI, rdf:nodeID the blank node
   * shared by every element with that id, anything else a fresh blank node.
   */
  nodeFromTag(tag: Tag): Node;
}

export function createNodeResolver(resolver: NamespaceResolver, blankNodes: BlankNodeGetter): NodeResolver {

  function nodeFromTag(tag: Tag): Node {
    const about = resolver.findRdfAttribute(tag, 'about');
    if (about >= 0)
      return iri(tag.attrs[about].value);

    const nodeId = resolver.findRdfAttribute(tag, 'nodeID');
    if (nodeId >= 0)
      return blankNodes.getFromId(tag.attrs[nodeId].value);

    return blankNodes.get();
  }

  return { nodeFromTag };
}
