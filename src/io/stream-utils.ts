/**
 * Line-oriented stream processing
 */

import { ParseError } from "../errors";

const MAX_LINE_LENGTH = 10_000_000;

export interface LineProcessingResult {
  readonly lines: string[];
  readonly remainder: string;
}

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * Chunks rarely align with line boundaries, so partial lines are carried
 * over until their terminator arrives. A trailing line without a newline
 * is yielded unless it is blank.
 *
 * @throws {ParseError} If a single line exceeds the maximum length
 * @example
 * ```typescript
 * const stream = await createStream("target_dna_sequences.fa");
 * for await (const line of readLines(stream)) {
 *   if (line.startsWith(">")) headers++;
 * }
 * ```
 */
export async function* readLines(stream: ReadableStream<Uint8Array>): AsyncIterable<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      const result = processBuffer(buffer);
      buffer = result.remainder;

      for (const line of result.lines) {
        yield line;
      }
    }

    buffer += decoder.decode();
    const result = processBuffer(buffer);
    for (const line of result.lines) {
      yield line;
    }
    if (result.remainder.trim() !== "") {
      yield stripCarriageReturn(result.remainder);
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Split a text buffer into complete lines and the unterminated remainder
 *
 * Handles `\n` and `\r\n` endings.
 */
export function processBuffer(buffer: string): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;
  let newline = buffer.indexOf("\n", lineStart);

  while (newline !== -1) {
    const line = stripCarriageReturn(buffer.slice(lineStart, newline));
    if (line.length > MAX_LINE_LENGTH) {
      throw new ParseError(
        `Line too long: ${line.length} characters exceeds maximum ${MAX_LINE_LENGTH}`,
        "text",
        undefined,
        `Line starts with: ${line.slice(0, 100)}...`
      );
    }
    lines.push(line);
    lineStart = newline + 1;
    newline = buffer.indexOf("\n", lineStart);
  }

  return { lines, remainder: buffer.slice(lineStart) };
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}
