/**
 * RDF/XML document to triple set.
 *
 * Reads the whole tag tree first, takes the namespace table from the root element,
 * then extracts triples from every top-level subject in a task group and waits for
 * all of them, including the units they schedule, before returning.
 */

import type { ParseLogger, ParseResult, ParserOptions } from './parser-interfaces.js';
import { createBlankNodeGetter } from './rdf/blank-node-getter.js';
import { createNamespaceResolver, parseNamespaces } from './rdf/namespace-resolver.js';
import { createNodeResolver } from './rdf/node-resolver.js';
import { createTaskGroup } from './rdf/task-group.js';
import { createTripleExtractor } from './rdf/triple-extractor.js';
import { createTripleStore } from './rdf/triple-store.js';
import { type CharSource, createStringSource, DEFAULT_CHUNK_SIZE } from './scanner/char-source.js';
import {
  createXmlReaderFromPath,
  createXmlReaderFromSource,
  type XmlReader
} from './reader/tree-builder.js';

export interface RdfParser {
  /** Parses the file at `filePath`; the file is closed when reading ends. */
  parse(filePath: string): Promise<ParseResult>;

  /** Parses from a caller-held source, which is left open. */
  parseSource(source: CharSource): Promise<ParseResult>;

  parseString(text: string): Promise<ParseResult>;
}

const silentLogger: ParseLogger = {
  debug() { },
  info() { },
  warn() { }
};

const defaultOptions: Required<ParserOptions> = {
  maxConcurrency: 8,
  blankNodePrefix: 'N',
  logger: silentLogger,
  chunkSize: DEFAULT_CHUNK_SIZE
};

export function createRdfParser(options?: ParserOptions): RdfParser {
  const settings: Required<ParserOptions> = {
    maxConcurrency: options?.maxConcurrency ?? defaultOptions.maxConcurrency,
    blankNodePrefix: options?.blankNodePrefix ?? defaultOptions.blankNodePrefix,
    logger: options?.logger ?? defaultOptions.logger,
    chunkSize: options?.chunkSize ?? defaultOptions.chunkSize
  };
  const { logger } = settings;
  if (settings.maxConcurrency < 1) {
    logger.warn(`maxConcurrency ${settings.maxConcurrency} raised to 1`);
    settings.maxConcurrency = 1;
  }

  async function run(reader: XmlReader): Promise<ParseResult> {
    const startTime = performance.now();

    // state is per document so one parser can serve many
    const root = reader.read();
    const namespaces = parseNamespaces(root);
    logger.debug(`namespaces: ${namespaces.size} declared on <${root.openingTag.name}>`);

    const resolver = createNamespaceResolver(namespaces);
    const nodes = createNodeResolver(resolver, createBlankNodeGetter(settings.blankNodePrefix));
    const store = createTripleStore();
    const group = createTaskGroup(settings.maxConcurrency);
    const extractor = createTripleExtractor({ resolver, nodes, store, group });

    try {
      for (const child of root.children)
        extractor.schedule(child, nodes.nodeFromTag(child.openingTag));
    } catch (error) {
      group.abort(error);
    }
    logger.debug(`scheduled ${root.children.length} top-level subjects`);

    await group.wait();
    logger.info(`extracted ${store.size} triples in ${group.started} units`);

    return {
      triples: store.toMap(),
      namespaces: new Map([...namespaces].map(([prefix, uri]) => [prefix, uri.text])),
      parseTime: performance.now() - startTime
    };
  }

  return {
    parse: async filePath => run(createXmlReaderFromPath(filePath, settings.chunkSize)),
    parseSource: async source => run(createXmlReaderFromSource(source)),
    parseString: async text => run(createXmlReaderFromSource(createStringSource(text)))
  };
}
