import { createRdfParser } from './rdf-parser.js';
import { toNTriples } from './rdf/node.js';

export const USAGE = 'usage: rdfxml-triples <file.rdf> [--verbose] [--concurrency=N]';

/**
 * Parses the file named in `argv` and prints its triples as N-Triples.
 * Resolves to the process exit code: 0 on success, 1 on a parse failure, 2 on bad arguments.
 */
export async function runCli(argv: string[]): Promise<number> {
  const verbose = argv.includes('--verbose');
  const concurrencyArg = argv.find(a => a.startsWith('--concurrency='));
  const filePath = argv.find(a => !a.startsWith('--'));

  if (!filePath) {
    console.error(USAGE);
    return 2;
  }

  const maxConcurrency = concurrencyArg ? Number(concurrencyArg.split('=')[1]) : undefined;
  if (maxConcurrency !== undefined && !Number.isInteger(maxConcurrency)) {
    console.error(`error: --concurrency expects an integer`);
    return 2;
  }

  const parser = createRdfParser({ maxConcurrency, logger: verbose ? console : undefined });
  try {
    const result = await parser.parse(filePath);
    process.stdout.write(toNTriples(result.triples.values()));
    return 0;
  } catch (err) {
    console.error(`error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
