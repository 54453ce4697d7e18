/**
 * Reader Module
 * Produces normalized, classified lines from a text source one at a time
 */

import { isDirectiveLine } from "./directive-parser";
import type { InputLine, LineKind } from "../types";

const FORM_FEED = "\f";
const FILE_HEADER = "+-";

function lineKind(text: string, lineNumber: number): LineKind {
  if (lineNumber === 1 && text.startsWith(FILE_HEADER)) return "header";
  return isDirectiveLine(text) ? "directive" : "text";
}

/**
 * Classify one logical line (terminator already removed)
 */
export function classifyLine(raw: string, lineNumber: number): InputLine {
  let text = raw.endsWith("\r") ? raw.slice(0, -1) : raw;
  const pageBreak = text.startsWith(FORM_FEED);
  if (pageBreak) {
    text = text.slice(FORM_FEED.length);
  }

  return {
    kind: lineKind(text, lineNumber),
    text,
    lineNumber,
    pageBreak,
  };
}

/**
 * Split in-memory text into classified lines.
 * A final terminator does not produce an extra empty line.
 */
export function* splitLines(text: string): Generator<InputLine> {
  let start = 0;
  let lineNumber = 0;

  while (start < text.length) {
    const end = text.indexOf("\n", start);
    if (end === -1) {
      yield classifyLine(text.slice(start), ++lineNumber);
      return;
    }
    yield classifyLine(text.slice(start, end), ++lineNumber);
    start = end + 1;
  }
}

/**
 * Read classified lines from a stream of chunks (a Readable or any async iterable).
 * Holds at most one partial line; stream errors propagate to the caller.
 */
export async function* readLines(
  source: AsyncIterable<string | Buffer>,
  encoding: BufferEncoding = "utf-8",
): AsyncGenerator<InputLine> {
  const decoder = new TextDecoder(encoding === "utf8" ? "utf-8" : encoding);
  let pending = "";
  let lineNumber = 0;

  for await (const chunk of source) {
    pending +=
      typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true });

    let end = pending.indexOf("\n");
    while (end !== -1) {
      yield classifyLine(pending.slice(0, end), ++lineNumber);
      pending = pending.slice(end + 1);
      end = pending.indexOf("\n");
    }
  }

  pending += decoder.decode();
  if (pending.length > 0) {
    yield classifyLine(pending, ++lineNumber);
  }
}
