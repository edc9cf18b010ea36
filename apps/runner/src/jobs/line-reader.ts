import type { Readable } from "node:stream";
import { StringDecoder } from "node:string_decoder";

export const MAX_LINE_CHARS = 1024 * 1024;

export interface LineReaderOptions {
  maxLineChars?: number;
  /** Called with the length of each line dropped for being too long. */
  onOversized?: (length: number) => void;
}

function stripCr(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

/**
 * Splits a stream into lines (LF or CRLF). A line longer than
 * `maxLineChars` is dropped whole, and at most that many characters of a
 * partial line are ever held.
 */
export async function* readLines(stream: Readable, options: LineReaderOptions = {}): AsyncGenerator<string> {
  const max = options.maxLineChars ?? MAX_LINE_CHARS;
  const decoder = new StringDecoder("utf8");
  let pending = "";
  // Length of the over-long line being skipped, or -1.
  let skipped = -1;

  function* consume(text: string): Generator<string> {
    let rest = text;
    let newline = rest.indexOf("\n");
    while (newline !== -1) {
      const piece = rest.slice(0, newline);
      rest = rest.slice(newline + 1);
      if (skipped >= 0) {
        options.onOversized?.(skipped + piece.length);
        skipped = -1;
      } else {
        const line = pending + piece;
        pending = "";
        if (line.length > max) options.onOversized?.(line.length);
        else yield stripCr(line);
      }
      newline = rest.indexOf("\n");
    }

    if (skipped >= 0) {
      skipped += rest.length;
      return;
    }
    pending += rest;
    if (pending.length > max) {
      skipped = pending.length;
      pending = "";
    }
  }

  for await (const chunk of stream) {
    const data: unknown = chunk;
    const text = typeof data === "string" ? data : Buffer.isBuffer(data) ? decoder.write(data) : String(data);
    yield* consume(text);
  }
  yield* consume(decoder.end());

  if (skipped >= 0) {
    options.onOversized?.(skipped);
  } else if (pending) {
    yield stripCr(pending);
  }
}
