export { createScanner } from './scanner/scanner.js';
export type { Scanner } from './scanner/scanner.js';
export * from './scanner/char-source.js';
export * from './scanner/delimiter-set.js';

export * from './parser-interfaces.js';
export * from './errors.js';

export * from './reader/block-types.js';
export * from './reader/tokenizer.js';
export * from './reader/tree-builder.js';

export * from './rdf/uri.js';
export * from './rdf/node.js';
export * from './rdf/namespace-resolver.js';
export * from './rdf/node-resolver.js';
export * from './rdf/blank-node-getter.js';
export * from './rdf/triple-store.js';
export * from './rdf/task-group.js';
export * from './rdf/triple-extractor.js';
export * from './rdf-parser.js';
export * from './run-cli.js';
