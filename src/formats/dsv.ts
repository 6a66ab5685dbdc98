/**
 * Delimiter-separated value parsing and writing
 *
 * Tools in this pipeline exchange headerless tab-separated tables (read
 * alignments, protein search hits), so there is no quoting: a field never
 * contains the delimiter.
 */

import { ConfigurationError, FileError, ParseError } from "../errors";
import { createStream } from "../io/file-reader";
import { readLines } from "../io/stream-utils";
import type { ParserOptions } from "../types";
import { AbstractParser, stringLines } from "./abstract-parser";

export interface DSVRecord {
  readonly fields: readonly string[];
  readonly lineNumber: number;
}

export interface DSVParserOptions extends ParserOptions {
  delimiter?: string;
  /** Skip lines starting with `#` (default true) */
  skipComments?: boolean;
  /** Rows with fewer fields are reported through `onError` */
  minFields?: number;
}

export class DSVParser extends AbstractParser<DSVRecord, DSVParserOptions> {
  constructor(options: DSVParserOptions = {}) {
    if (options.delimiter !== undefined && options.delimiter.length === 0) {
      throw new ConfigurationError("Invalid DSV parser options: delimiter must not be empty");
    }
    if (options.minFields !== undefined && (!Number.isInteger(options.minFields) || options.minFields < 0)) {
      throw new ConfigurationError(
        `Invalid DSV parser options: minFields must be a non-negative integer, got ${options.minFields}`
      );
    }
    super(options);
  }

  protected getDefaultOptions(): Partial<DSVParserOptions> {
    return { delimiter: ",", skipComments: true, minFields: 0 };
  }

  protected getFormatName(): string {
    return "DSV";
  }

  async *parseString(data: string): AsyncIterable<DSVRecord> {
    yield* this.parseLines(stringLines(data));
  }

  /**
   * @throws {FileError} When the file cannot be read
   * @throws {ParseError} When a row has too few fields
   */
  async *parseFile(filePath: string): AsyncIterable<DSVRecord> {
    const stream = await createStream(filePath);
    try {
      yield* this.parseLines(readLines(stream));
    } catch (error) {
      if (error instanceof ParseError || error instanceof FileError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ParseError(
        `Failed to parse ${this.getFormatName()} file '${filePath}': ${reason}`,
        this.getFormatName()
      );
    }
  }

  async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<DSVRecord> {
    yield* this.parseLines(readLines(stream));
  }

  private async *parseLines(lines: AsyncIterable<string>): AsyncIterable<DSVRecord> {
    const delimiter = this.options.delimiter ?? ",";
    const minFields = this.options.minFields ?? 0;
    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;
      if (lineNumber % 50_000 === 0) {
        this.throwIfAborted("parsing");
      }

      if (line.trim() === "") continue;
      if (this.options.skipComments === true && line.startsWith("#")) continue;

      const fields = line.split(delimiter);
      if (fields.length < minFields) {
        this.options.onError(`Expected at least ${minFields} fields, found ${fields.length}`, lineNumber);
        continue;
      }
      yield { fields, lineNumber };
    }
  }
}

export class TSVParser extends DSVParser {
  constructor(options: Omit<DSVParserOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: "\t" });
  }

  protected override getFormatName(): string {
    return "TSV";
  }
}

/**
 * Format rows as delimiter-separated lines, each newline-terminated
 */
export function formatRows(rows: Iterable<readonly string[]>, delimiter = "\t"): string {
  let out = "";
  for (const row of rows) {
    out += `${row.join(delimiter)}\n`;
  }
  return out;
}
