import { type Triple, tripleKey } from './node.js';

/**
 * Set of triples keyed by their canonical form; re-adding an equal triple is a no-op.
 *
 * Extraction units share one store. Each add() runs to completion on the event loop
 * with no await inside, so one insertion never interleaves with another.
 */
export interface TripleStore {
  /** Returns true when the triple was not yet present. */
  add(triple: Triple): boolean;
  has(triple: Triple): boolean;
  get(key: string): Triple | undefined;
  readonly size: number;
  values(): IterableIterator<Triple>;
  entries(): IterableIterator<[string, Triple]>;
  /** Snapshot of the current contents. */
  toMap(): ReadonlyMap<string, Triple>;
}

export function createTripleStore(): TripleStore {
  const triples = new Map<string, Triple>();

  function add(triple: Triple): boolean {
    const key = tripleKey(triple);
    if (triples.has(key)) return false;
    triples.set(key, triple);
    return true;
  }

  return {
    add,
    has: triple => triples.has(tripleKey(triple)),
    get: key => triples.get(key),
    get size() {
      return triples.size;
    },
    values: () => triples.values(),
    entries: () => triples.entries(),
    toMap: () => new Map(triples)
  };
}
