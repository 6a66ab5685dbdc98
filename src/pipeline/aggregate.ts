/**
 * Aggregation and deduplication of per-sample extraction outputs
 */

import { join } from "node:path";
import { NoDataError } from "../errors";
import { FastaParser } from "../formats/fasta";
import { exists } from "../io/file-reader";
import { createLogger } from "../logger";
import { SeqOps, seqops } from "../operations";
import type { FastaSequence } from "../types";
import { type CompletionRecord, isSuccessful, numberField } from "./completion";
import { EXTRACTED_SEQUENCES_FILE, sampleOutputDir } from "./extract";

const log = createLogger("aggregate");

export const COMBINED_FILE = "combined_dna_sequences.fa";
export const DEDUPLICATED_FILE = "deduplicated_dna_sequences.fa";

export interface AggregationResult {
  readonly combinedPath: string;
  readonly dedupPath: string;
  /** Samples whose output contributed to the combined file */
  readonly samples: readonly string[];
  readonly combinedCount: number;
  readonly dedupCount: number;
}

/**
 * Extraction outputs eligible for aggregation: successful records with a
 * nonzero sequence count whose FASTA file exists, in record order
 */
export async function aggregationInputs(
  records: readonly CompletionRecord[],
  inputDir: string
): Promise<Array<{ sample: string; path: string }>> {
  const inputs: Array<{ sample: string; path: string }> = [];
  for (const record of records) {
    const sample = record.fields.get("SAMPLE") ?? record.unit;
    if (!isSuccessful(record) || (numberField(record, "SEQUENCES_EXTRACTED") ?? 0) === 0) {
      log.debug("Sample contributes no sequences", { sample, status: record.fields.get("STATUS") });
      continue;
    }

    const path = join(sampleOutputDir(inputDir, sample), EXTRACTED_SEQUENCES_FILE);
    if (!(await exists(path))) {
      log.warn("Extraction output missing for completed sample", { sample, path });
      continue;
    }
    inputs.push({ sample, path });
  }
  return inputs;
}

async function* concatenate(paths: readonly string[]): AsyncIterable<FastaSequence> {
  const parser = new FastaParser();
  for (const path of paths) {
    yield* parser.parseFile(path);
  }
}

/**
 * Concatenate every eligible extraction output, then collapse identical
 * sequences keeping the first header
 *
 * @throws {NoDataError} When the combined file holds no sequences
 */
export async function aggregateSequences(
  records: readonly CompletionRecord[],
  inputDir: string,
  outputDir: string
): Promise<AggregationResult> {
  const inputs = await aggregationInputs(records, inputDir);
  const combinedPath = join(outputDir, COMBINED_FILE);
  const dedupPath = join(outputDir, DEDUPLICATED_FILE);

  const combinedCount = await seqops(concatenate(inputs.map((input) => input.path))).writeFasta(combinedPath, {
    wrapWidth: 0,
  });
  log.info("Combined DNA sequences", { samples: inputs.length, sequences: combinedCount });

  if (combinedCount === 0) {
    throw new NoDataError("No DNA sequences found to process", "aggregate", `Input directory: ${inputDir}`);
  }

  const dedupCount = await SeqOps.fromFasta(combinedPath)
    .rmdup("sequence")
    .writeFasta(dedupPath, { wrapWidth: 0 });
  log.info("Deduplicated DNA sequences", { before: combinedCount, after: dedupCount });

  return {
    combinedPath,
    dedupPath,
    samples: inputs.map((input) => input.sample),
    combinedCount,
    dedupCount,
  };
}
