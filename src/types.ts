/**
 * Core type definitions for sequence records and file I/O
 */

import { type } from "arktype";

/**
 * Minimal sequence record shared by every format
 */
export interface AbstractSequence {
  /** Sequence identifier: the header text up to the first whitespace */
  readonly id: string;
  /** Optional description following the identifier */
  readonly description?: string;
  /** The residue string */
  readonly sequence: string;
  readonly length: number;
  /** Line number where this record started (for error reporting) */
  readonly lineNumber?: number;
}

/**
 * FASTA record
 * Format: >id description\nsequence
 */
export interface FastaSequence extends AbstractSequence {
  readonly format: "fasta";
}

/**
 * FASTQ record
 * Format: @id description\nsequence\n+\nquality
 */
export interface FastqSequence extends AbstractSequence {
  readonly format: "fastq";
  readonly quality: string;
}

/**
 * Base options accepted by every parser
 */
export interface ParserOptions {
  /** Maximum line length before throwing error */
  maxLineLength?: number;
  /** Whether to record line numbers on parsed records */
  trackLineNumbers?: boolean;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom error handler */
  onError?: (error: string, lineNumber?: number) => void;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

export type CompressionFormat = "gzip" | "none";

/**
 * Branded path that passed {@link FilePathSchema}
 */
export type FilePath = string & { readonly __brand: "FilePath" };

export interface FileReaderOptions {
  /** Read buffer size in bytes */
  bufferSize?: number;
  /** Decompress `.gz` inputs transparently (default true) */
  autoDecompress?: boolean;
  /** Force a compression format instead of detecting it from the extension */
  compressionFormat?: CompressionFormat;
}

/**
 * File path validation: non-empty, no NUL bytes
 */
export const FilePathSchema = type("string>0").pipe((path: string): FilePath => {
  if (path.includes("\0")) {
    throw new Error("File paths cannot contain null characters");
  }
  return path as FilePath;
});

export const FileReaderOptionsSchema = type({
  "bufferSize?": "1024<=number<=1048576",
  "autoDecompress?": "boolean",
  "compressionFormat?": "'gzip'|'none'",
});

