/**
 * peptide-harvest
 *
 * Staged, checkpointed extraction of target protein sequences from
 * per-sample metagenomic read alignments: per-sample read extraction,
 * aggregation, six-frame translation, similarity validation, filtering
 * and canonical renaming.
 */

// Compression
export { CompressionDetector, createDecompressionStream, wrapStream } from "./compression";
// Errors
export {
  BarrierTimeoutError,
  CompressionError,
  ConfigurationError,
  DownstreamToolFailure,
  FileError,
  InputMissingError,
  isPipelineError,
  NoDataError,
  ParseError,
  PipelineError,
} from "./errors";
// Formats
export {
  AbstractParser,
  countFastaRecords,
  DSVParser,
  FastaParser,
  FastaWriter,
  FastqParser,
  formatRows,
  parseFastaHeader,
  TSVParser,
  type DSVParserOptions,
  type DSVRecord,
  type FastaParserOptions,
  type FastqParserOptions,
} from "./formats";
// File I/O
export { FileReader } from "./io/file-reader";
export { ensureDirectory, openForWriting, writeStringAtomic } from "./io/file-writer";
export { runPromise, runWithPlatform } from "./io/runtime";
export { readLines } from "./io/stream-utils";
// Logging
export { createLogger, type Logger, type LogLevel } from "./logger";
// Sequence operations
export { SeqOps, seqops } from "./operations";
// Pipeline
export * from "./pipeline";
// Core types
export type {
  AbstractSequence,
  CompressionFormat,
  FastaSequence,
  FastqSequence,
  FilePath,
  FileReaderOptions,
  ParserOptions,
} from "./types";
