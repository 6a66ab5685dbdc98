/**
 * Central format module exports
 *
 * @example
 * ```typescript
 * import { FastaParser, FastaWriter, FastqParser, TSVParser } from "../formats";
 * ```
 */

export { AbstractParser } from "./abstract-parser";
export type { DSVParserOptions, DSVRecord } from "./dsv";
export { DSVParser, formatRows, TSVParser } from "./dsv";
export type { FastaParserOptions } from "./fasta";
export { countFastaRecords, FastaParser, FastaWriter, parseFastaHeader } from "./fasta";
export type { FastqParserOptions } from "./fastq";
export { FastqParser } from "./fastq";
