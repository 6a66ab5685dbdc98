/**
 * Abstract base parser with shared option merging and interrupt handling
 *
 * Each format keeps its own parsing logic; the base class only supplies
 * defaults for the error and warning hooks and AbortSignal checks.
 */

import { ParseError } from "../errors";
import { createLogger } from "../logger";
import type { ParserOptions } from "../types";

const log = createLogger("parser");

export type ResolvedParserOptions<TOptions extends ParserOptions> = TOptions &
  Required<Omit<ParserOptions, "signal">>;

/**
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: ResolvedParserOptions<TOptions>;

  constructor(options: TOptions) {
    const baseDefaults: Required<Omit<ParserOptions, "signal">> = {
      maxLineLength: 10_000_000,
      trackLineNumbers: true,
      onError: (error: string, lineNumber?: number): void => {
        throw new ParseError(error, this.getFormatName(), lineNumber);
      },
      onWarning: (warning: string, lineNumber?: number): void => {
        log.warn(`${this.getFormatName()} warning`, { warning, lineNumber });
      },
    };

    this.options = { ...baseDefaults, ...this.getDefaultOptions(), ...stripUndefined(options) };
  }

  /**
   * Format-specific defaults, merged between the base defaults and user options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  /**
   * Throw when the caller's AbortSignal has fired
   */
  protected throwIfAborted(context: string): void {
    if (this.options.signal?.aborted === true) {
      throw new ParseError(`Operation aborted during ${this.getFormatName()} ${context}`, "ABORTED");
    }
  }

  abstract parseString(data: string): AsyncIterable<T>;

  abstract parseFile(filePath: string): AsyncIterable<T>;

  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;

  /**
   * Format identifier for error messages (e.g. "FASTA")
   */
  protected abstract getFormatName(): string;
}

function stripUndefined<TOptions extends ParserOptions>(options: TOptions): TOptions {
  const result = { ...options };
  for (const key of Object.keys(result)) {
    if (Reflect.get(result, key) === undefined) {
      Reflect.deleteProperty(result, key);
    }
  }
  return result;
}

/**
 * Yield the lines of an in-memory string with `\n` or `\r\n` endings
 */
export async function* stringLines(data: string): AsyncIterable<string> {
  const lines = data.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  yield* lines;
}
