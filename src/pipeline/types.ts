/**
 * Shared data model for the extraction and validation stages
 */

/**
 * Canonical target identifiers (text before the first `|`)
 */
export type TargetSet = ReadonlySet<string>;

/**
 * One independently processed input unit
 */
export interface Sample {
  /** Derived from the alignment directory name `<name>_humann_temp` */
  readonly name: string;
  /** Per-sample read-to-reference alignment table */
  readonly alignmentTable: string;
  /** Raw reads (FASTQ, optionally gzipped) */
  readonly rawSource: string;
}

export interface SampleManifest {
  readonly version: 1;
  readonly createdAt: string;
  readonly humannRoot: string;
  readonly fastqDir: string;
  readonly samples: readonly Sample[];
}

export type ExtractionStatus = "SUCCESS" | "NO_TARGET_READS" | "NO_INPUT" | "INPUT_MISSING";

/**
 * Lifecycle of one extraction task. The last four are terminal.
 */
export type ExtractionState =
  | "PENDING"
  | "SCANNED"
  | "READS_SELECTED"
  | "SEQUENCES_RETRIEVED"
  | "COMPLETED"
  | "NO_INPUT"
  | "NO_TARGET_READS"
  | "INPUT_MISSING";

export type RunMode = "FULL" | "RERUN";

/**
 * One row of validation engine output
 */
export interface ValidationHit {
  readonly queryId: string;
  /** Raw subject id; may carry a `|`-delimited suffix */
  readonly subjectId: string;
  /** Percent identity, 0-100 */
  readonly identity: number;
  readonly length: number;
  readonly evalue: number;
  readonly bitscore: number;
  /** The tab-separated line the hit was parsed from */
  readonly raw?: string;
}

declare const filteredBrand: unique symbol;

/**
 * A hit that passed target membership, identity and length thresholds
 */
export type FilteredHit = ValidationHit & { readonly [filteredBrand]: true };
