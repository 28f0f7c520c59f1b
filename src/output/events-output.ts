/**
 * Events output file
 *
 * Separate destination for classified log events. The file is opened before
 * sampling starts so a bad path is reported as configuration, not as a
 * crash mid-run.
 */

import { createWriteStream, type WriteStream } from 'node:fs';
import { once } from 'node:events';
import { ConfigurationError } from '../api/errors.js';

/**
 * Open (append) the events file and wait until it is ready.
 *
 * @throws {ConfigurationError} if the file cannot be opened
 */
export async function openEventsOutput(path: string): Promise<WriteStream> {
  const stream = createWriteStream(path, { flags: 'a' });
  try {
    await once(stream, 'open');
  } catch (err) {
    throw new ConfigurationError(
      `Cannot open events output ${path}: ${err instanceof Error ? err.message : String(err)}`,
      { path },
      { cause: err }
    );
  }
  return stream;
}

/**
 * Flush and close. A stream already closed by a write failure is left alone.
 */
export async function closeEventsOutput(stream: WriteStream): Promise<void> {
  if (stream.closed) {
    return;
  }
  const closed = once(stream, 'close');
  stream.end();
  await closed;
}
