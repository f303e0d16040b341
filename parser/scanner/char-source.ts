import { closeSync, openSync, readSync } from 'node:fs';
import { StringDecoder } from 'node:string_decoder';

/**
 * Sequential supplier of decoded text for the scanner.
 */
export interface CharSource {
  /** Next chunk of text, or undefined once the input is exhausted. */
  read(): string | undefined;

  /** Releases the underlying handle. Safe to call more than once. */
  close(): void;
}

export const DEFAULT_CHUNK_SIZE = 64 * 1024;

export function createStringSource(text: string): CharSource {
  let done = false;

  function read(): string | undefined {
    if (done) return undefined;
    done = true;
    return text;
  }

  function close(): void {
    done = true;
  }

  return { read, close };
}

/**
 * Opens a UTF-8 file for synchronous chunked reads.
 * A character split across two chunks is held back by the decoder until it is complete.
 */
export function openFileSource(filePath: string, chunkSize: number = DEFAULT_CHUNK_SIZE): CharSource {
  let fd: number | undefined = openSync(filePath, 'r');
  let exhausted = false;
  const buffer = Buffer.alloc(Math.max(4, chunkSize));
  const decoder = new StringDecoder('utf8');

  function read(): string | undefined {
    while (fd !== undefined && !exhausted) {
      const bytesRead = readSync(fd, buffer, 0, buffer.length, null);
      if (bytesRead === 0) {
        exhausted = true;
        const tail = decoder.end();
        return tail.length ? tail : undefined;
      }
      const text = decoder.write(buffer.subarray(0, bytesRead));
      if (text.length) return text;
    }
    return undefined;
  }

  function close(): void {
    if (fd === undefined) return;
    const handle = fd;
    fd = undefined;
    closeSync(handle);
  }

  return { read, close };
}
