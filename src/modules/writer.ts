/**
 * Writer Module
 * Streams translated lines to the output sink in order
 */

import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Writable } from "node:stream";

async function* terminate(
  lines: AsyncIterable<string> | Iterable<string>,
): AsyncGenerator<string> {
  for await (const line of lines) {
    yield `${line}\n`;
  }
}

/**
 * Write every line followed by a newline and end the sink.
 * Resolves once the sink has flushed; a failure on either side rejects.
 */
export async function writeLines(
  lines: AsyncIterable<string> | Iterable<string>,
  sink: Writable,
): Promise<void> {
  await pipeline(Readable.from(terminate(lines)), sink);
}
