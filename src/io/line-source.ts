/**
 * Line sources: numbered lines from a file or standard input.
 *
 * The file is opened eagerly so a missing or unreadable path is reported
 * as a startup error, before any line is processed. Lines are then read
 * lazily with readline, one at a time.
 *
 * @module io/line-source
 */

import { open, type FileHandle } from 'node:fs/promises';
import type { Readable } from 'node:stream';
import { createInterface } from 'node:readline';
import type { RawLine } from '../types/gap.js';
import { ConfigError } from '../gap/errors.js';

/** Path that selects standard input. */
export const STDIN_PATH = '-';

/**
 * Number the lines of a readable stream, starting at 1.
 *
 * Both LF and CRLF terminators are stripped. The input is destroyed once
 * iteration ends, including when the consumer stops early.
 */
export async function* readLines(input: Readable): AsyncGenerator<RawLine> {
  const rl = createInterface({ input, crlfDelay: Infinity });
  let lineNumber = 0;
  try {
    for await (const text of rl) {
      lineNumber++;
      yield { lineNumber, text };
    }
  } finally {
    rl.close();
    input.destroy();
  }
}

/**
 * Numbered lines of one input stream, closable without being iterated.
 */
export class StreamLineSource implements AsyncIterable<RawLine> {
  constructor(readonly input: Readable) {}

  [Symbol.asyncIterator](): AsyncGenerator<RawLine> {
    return readLines(this.input);
  }

  /** Release the input, whether or not reading started. */
  close(): void {
    if (!this.input.destroyed) this.input.destroy();
  }
}

/**
 * Open the input named on the command line.
 *
 * @param path - File path, or "-" for standard input
 * @param stdin - Stream used for "-"
 * @throws {ConfigError} When the file cannot be opened or is a directory
 */
export async function openLineSource(
  path: string,
  stdin: Readable = process.stdin,
): Promise<StreamLineSource> {
  if (path === STDIN_PATH) {
    return new StreamLineSource(stdin);
  }

  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code ?? 'unknown error';
    throw new ConfigError(`cannot open input file '${path}': ${code}`, 'FILE');
  }

  const stats = await handle.stat().catch(async (err: unknown) => {
    await handle.close();
    throw err;
  });
  if (stats.isDirectory()) {
    await handle.close();
    throw new ConfigError(`input path '${path}' is a directory`, 'FILE');
  }

  // The stream owns the handle from here and closes it on destroy
  return new StreamLineSource(handle.createReadStream({ encoding: 'utf8' }));
}
