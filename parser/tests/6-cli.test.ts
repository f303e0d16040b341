import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { fileURLToPath } from 'node:url';
import { runCli, USAGE } from '../run-cli.js';

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe('runCli', () => {
  let errors: string[];
  let written: string[];

  beforeEach(() => {
    errors = [];
    written = [];
    vi.spyOn(console, 'error').mockImplementation((message: unknown) => { errors.push(String(message)); });
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      written.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('no file argument prints usage and exits with 2', async () => {
    expect(await runCli(['--verbose'])).toBe(2);
    expect(errors).toEqual([USAGE]);
    expect(written).toEqual([]);
  });

  test('a non-integer concurrency exits with 2', async () => {
    expect(await runCli([fixture('people.rdf'), '--concurrency=many'])).toBe(2);
    expect(errors).toEqual(['error: --concurrency expects an integer']);
  });

  test('a malformed document prints the error and exits with 1', async () => {
    expect(await runCli([fixture('mismatch.rdf')])).toBe(1);
    expect(errors).toEqual([
      "error: opening and closing tags don't match: opening tag a, closing tag b (line 2, column 10)"
    ]);
    expect(written).toEqual([]);
  });

  test('prints the triples of a document as N-Triples', async () => {
    expect(await runCli([fixture('people.rdf'), '--concurrency=2'])).toBe(0);
    expect(errors).toEqual([]);
    expect(written).toHaveLength(1);
    const lines = written[0].split('\n');
    expect(lines).toHaveLength(7);
    expect(lines[6]).toBe('');
    expect(lines).toContain('<http://example.org/people/zoe> <http://www.w3.org/1999/02/22-rdf-syntax-ns#type> <http://xmlns.com/foaf/0.1/Person> .');
  });
});
