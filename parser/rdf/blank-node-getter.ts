import { blank, type BlankNode } from './node.js';

/**
 * Mints blank nodes. Ids given through rdf:nodeID map to one node for the whole document.
 */
export interface BlankNodeGetter {
  /** A fresh, uniquely numbered blank node. */
  get(): BlankNode;

  /** The node minted for `nodeId`, minting it on first use. */
  getFromId(nodeId: string): BlankNode;
}

export function createBlankNodeGetter(prefix: string = 'N'): BlankNodeGetter {
  let lastId = -1;
  const byNodeId = new Map<string, BlankNode>();

  function get(): BlankNode {
    lastId++;
    return blank(`${prefix}${lastId}`);
  }

  function getFromId(nodeId: string): BlankNode {
    let node = byNodeId.get(nodeId);
    if (!node) {
      node = get();
      byNodeId.set(nodeId, node);
    }
    return node;
  }

  return { get, getFromId };
}
