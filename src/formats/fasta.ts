/**
 * FASTA format parsing and writing
 *
 * Headers start with `>`; the identifier runs to the first whitespace and
 * the remainder is the description. Sequence lines are concatenated until
 * the next header, so wrapped and single-line files parse the same way.
 *
 * @example
 * ```typescript
 * const parser = new FastaParser();
 * for await (const record of parser.parseFile("translated_proteins.faa")) {
 *   console.log(record.id, record.length);
 * }
 * ```
 */

import { type } from "arktype";
import { ConfigurationError, FileError, ParseError } from "../errors";
import { createStream, exists } from "../io/file-reader";
import { readLines } from "../io/stream-utils";
import type { FastaSequence, ParserOptions } from "../types";
import { AbstractParser, stringLines } from "./abstract-parser";

export interface FastaParserOptions extends ParserOptions {
  /** Keep records whose sequence is empty (default true) */
  allowEmptySequences?: boolean;
}

const FastaParserOptionsSchema = type({
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
  "allowEmptySequences?": "boolean",
});

interface PendingRecord {
  id: string;
  description?: string;
  lineNumber: number;
  chunks: string[];
}

class FastaParser extends AbstractParser<FastaSequence, FastaParserOptions> {
  constructor(options: FastaParserOptions = {}) {
    const validationResult = FastaParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ConfigurationError(`Invalid FASTA parser options: ${validationResult.summary}`);
    }
    super(options);
  }

  protected getDefaultOptions(): Partial<FastaParserOptions> {
    return { allowEmptySequences: true };
  }

  protected getFormatName(): string {
    return "FASTA";
  }

  /**
   * Parse FASTA records from a string
   *
   * @example
   * ```typescript
   * for await (const record of parser.parseString(">r1\nATG\n>r2\nCCC\n")) { ... }
   * ```
   */
  async *parseString(data: string): AsyncIterable<FastaSequence> {
    yield* this.parseLines(stringLines(data));
  }

  /**
   * Parse FASTA records from a file, decompressing `.gz` inputs
   *
   * @throws {FileError} When the file cannot be read
   * @throws {ParseError} When the content is not FASTA
   */
  async *parseFile(filePath: string): AsyncIterable<FastaSequence> {
    const stream = await createStream(filePath);
    try {
      yield* this.parseLines(readLines(stream));
    } catch (error) {
      if (error instanceof ParseError || error instanceof FileError) {
        throw error;
      }
      throw new ParseError(
        `Failed to parse FASTA file '${filePath}': ${error instanceof Error ? error.message : String(error)}`,
        "FASTA"
      );
    }
  }

  async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<FastaSequence> {
    yield* this.parseLines(readLines(stream));
  }

  private async *parseLines(lines: AsyncIterable<string>): AsyncIterable<FastaSequence> {
    let pending: PendingRecord | undefined;
    let lineNumber = 0;

    for await (const rawLine of lines) {
      lineNumber++;
      if (lineNumber % 10_000 === 0) {
        this.throwIfAborted("parsing");
      }

      if (rawLine.length > this.options.maxLineLength) {
        this.options.onError(
          `Line length ${rawLine.length} exceeds maximum ${this.options.maxLineLength}`,
          lineNumber
        );
        continue;
      }

      const line = rawLine.trim();
      if (line === "" || line.startsWith(";")) continue;

      if (line.startsWith(">")) {
        if (pending) {
          const record = this.finalize(pending);
          if (record) yield record;
        }
        const header = parseFastaHeader(line);
        if (header.id === "") {
          this.options.onWarning("Header without identifier", lineNumber);
        }
        pending = { ...header, lineNumber, chunks: [] };
        continue;
      }

      if (!pending) {
        this.options.onError("Sequence data found before first header", lineNumber);
        continue;
      }
      pending.chunks.push(line.replace(/\s+/g, ""));
    }

    if (pending) {
      const record = this.finalize(pending);
      if (record) yield record;
    }
  }

  private finalize(pending: PendingRecord): FastaSequence | undefined {
    const sequence = pending.chunks.join("");
    if (sequence === "" && !this.options.allowEmptySequences) {
      this.options.onWarning(`Skipping empty sequence '${pending.id}'`, pending.lineNumber);
      return undefined;
    }
    return {
      format: "fasta",
      id: pending.id,
      ...(pending.description !== undefined && { description: pending.description }),
      sequence,
      length: sequence.length,
      ...(this.options.trackLineNumbers && { lineNumber: pending.lineNumber }),
    };
  }
}

/**
 * FASTA writer
 *
 * `lineWidth: 0` writes each sequence on a single line.
 */
class FastaWriter {
  private readonly lineWidth: number;
  private readonly includeDescription: boolean;

  constructor(options: { lineWidth?: number; includeDescription?: boolean } = {}) {
    this.lineWidth = options.lineWidth ?? 80;
    this.includeDescription = options.includeDescription ?? true;
  }

  /**
   * Format a single record, newline-terminated
   */
  formatSequence(record: Pick<FastaSequence, "id" | "sequence" | "description">): string {
    let header = `>${record.id}`;
    if (this.includeDescription && record.description !== undefined && record.description !== "") {
      header += ` ${record.description}`;
    }
    return `${header}\n${this.wrapText(record.sequence)}\n`;
  }

  formatSequences(records: Iterable<Pick<FastaSequence, "id" | "sequence" | "description">>): string {
    let out = "";
    for (const record of records) {
      out += this.formatSequence(record);
    }
    return out;
  }

  private wrapText(text: string): string {
    if (this.lineWidth <= 0 || text.length <= this.lineWidth) return text;

    const lines: string[] = [];
    for (let i = 0; i < text.length; i += this.lineWidth) {
      lines.push(text.slice(i, i + this.lineWidth));
    }
    return lines.join("\n");
  }
}

/**
 * Split a header line into identifier and description
 */
function parseFastaHeader(headerLine: string): { id: string; description?: string } {
  const content = headerLine.startsWith(">") ? headerLine.slice(1).trim() : headerLine.trim();
  const match = /^(\S*)\s*(.*)$/.exec(content);
  const id = match?.[1] ?? "";
  const description = match?.[2] ?? "";
  return description === "" ? { id } : { id, description };
}

/**
 * Count records in a FASTA file by its header lines
 *
 * Missing files count as zero.
 */
async function countFastaRecords(filePath: string): Promise<number> {
  if (!(await exists(filePath))) return 0;

  let count = 0;
  for await (const line of readLines(await createStream(filePath))) {
    if (line.startsWith(">")) count++;
  }
  return count;
}

export { FastaParser, FastaWriter, parseFastaHeader, countFastaRecords };
