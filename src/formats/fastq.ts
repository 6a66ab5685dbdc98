/**
 * FASTQ format parser
 *
 * Reads the four-line record layout emitted by modern sequencers:
 * `@id description`, sequence, `+`, quality. Blank lines between records
 * are tolerated. Wrapped multi-line FASTQ is not supported.
 *
 * @example
 * ```typescript
 * const parser = new FastqParser();
 * for await (const read of parser.parseFile("reads/S1.fastq.gz")) {
 *   console.log(read.id, read.length);
 * }
 * ```
 */

import { ConfigurationError, FileError, ParseError } from "../errors";
import { createStream } from "../io/file-reader";
import { readLines } from "../io/stream-utils";
import type { FastqSequence, ParserOptions } from "../types";
import { AbstractParser, stringLines } from "./abstract-parser";
import { parseFastaHeader } from "./fasta";

export interface FastqParserOptions extends ParserOptions {
  /** Require sequence and quality to have equal length (default true) */
  validateQualityLength?: boolean;
}

export class FastqParser extends AbstractParser<FastqSequence, FastqParserOptions> {
  constructor(options: FastqParserOptions = {}) {
    if (options.maxLineLength !== undefined && options.maxLineLength <= 0) {
      throw new ConfigurationError(
        `Invalid FASTQ parser options: maxLineLength must be positive, got ${options.maxLineLength}`
      );
    }
    super(options);
  }

  protected getDefaultOptions(): Partial<FastqParserOptions> {
    return { validateQualityLength: true };
  }

  protected getFormatName(): string {
    return "FASTQ";
  }

  async *parseString(data: string): AsyncIterable<FastqSequence> {
    yield* this.parseLines(stringLines(data));
  }

  /**
   * Parse reads from a file, decompressing `.gz` inputs
   *
   * @throws {FileError} When the file cannot be read
   * @throws {ParseError} When a record is truncated or malformed
   */
  async *parseFile(filePath: string): AsyncIterable<FastqSequence> {
    const stream = await createStream(filePath);
    try {
      yield* this.parseLines(readLines(stream));
    } catch (error) {
      if (error instanceof ParseError || error instanceof FileError) {
        throw error;
      }
      throw new ParseError(
        `Failed to parse FASTQ file '${filePath}': ${error instanceof Error ? error.message : String(error)}`,
        "FASTQ"
      );
    }
  }

  async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<FastqSequence> {
    yield* this.parseLines(readLines(stream));
  }

  private async *parseLines(lines: AsyncIterable<string>): AsyncIterable<FastqSequence> {
    // header, sequence, separator, quality
    const record: string[] = [];
    let recordStart = 0;
    let lineNumber = 0;

    for await (const rawLine of lines) {
      lineNumber++;
      if (lineNumber % 40_000 === 0) {
        this.throwIfAborted("parsing");
      }

      const line = rawLine.trimEnd();
      if (record.length === 0) {
        if (line === "") continue;
        recordStart = lineNumber;
      }
      record.push(line);

      if (record.length === 4) {
        const parsed = this.buildRecord(record, recordStart);
        record.length = 0;
        if (parsed) yield parsed;
      }
    }

    if (record.length > 0) {
      this.options.onError(
        `Truncated record: expected 4 lines, found ${record.length}`,
        recordStart
      );
    }
  }

  private buildRecord(lines: string[], lineNumber: number): FastqSequence | undefined {
    const [header = "", sequence = "", separator = "", quality = ""] = lines;

    if (!header.startsWith("@")) {
      this.options.onError(`Expected '@' header, found '${header.slice(0, 40)}'`, lineNumber);
      return undefined;
    }
    if (!separator.startsWith("+")) {
      this.options.onError(`Expected '+' separator, found '${separator.slice(0, 40)}'`, lineNumber + 2);
      return undefined;
    }
    if (this.options.validateQualityLength === true && quality.length !== sequence.length) {
      this.options.onError(
        `Quality length ${quality.length} does not match sequence length ${sequence.length}`,
        lineNumber + 3
      );
      return undefined;
    }

    const { id, description } = parseFastaHeader(header.slice(1));
    return {
      format: "fastq",
      id,
      ...(description !== undefined && { description }),
      sequence,
      quality,
      length: sequence.length,
      ...(this.options.trackLineNumbers && { lineNumber }),
    };
  }
}
