/**
 * Per-sample extraction task
 *
 * ```
 * PENDING ──(no alignment table)──────────────▶ NO_INPUT
 *    │
 *    ▼ scan table
 * SCANNED ──(no reads assigned to a target)───▶ NO_TARGET_READS
 *    │
 *    ▼ collect read ids
 * READS_SELECTED ──(no raw read file)─────────▶ INPUT_MISSING
 *    │
 *    ▼ pull reads from FASTQ, write FASTA
 * SEQUENCES_RETRIEVED ──▶ COMPLETED
 * ```
 *
 * Every terminal state writes a completion record, so the barrier in front
 * of aggregation completes even when some samples fail. The two failure
 * states then raise {@link InputMissingError}.
 */

import { join } from "node:path";
import { InputMissingError } from "../errors";
import { TSVParser } from "../formats/dsv";
import { exists } from "../io/file-reader";
import { ensureDirectory, removeDirectory } from "../io/file-writer";
import { createLogger } from "../logger";
import { SeqOps } from "../operations";
import {
  type CompletionRecord,
  CompletionStore,
  EXTRACT_STAGE,
  formatDuration,
  isSuccessful,
  numberField,
  type RecordFields,
} from "./completion";
import { canonicalId } from "./targets";
import type { ExtractionState, ExtractionStatus, Sample, TargetSet } from "./types";

const log = createLogger("extract");

export const EXTRACTED_SEQUENCES_FILE = "target_dna_sequences.fa";

export interface ExtractionResult {
  readonly sample: string;
  readonly state: ExtractionState;
  readonly status: ExtractionStatus;
  readonly readsAssigned: number;
  readonly sequencesExtracted: number;
  /** Absolute path of the extracted FASTA; SUCCESS only */
  readonly outputFile?: string;
  readonly record: CompletionRecord;
  /** True when an earlier successful record was returned as is */
  readonly reused: boolean;
}

/**
 * `<outputDir>/<sample>_dna_seqs`
 */
export function sampleOutputDir(outputDir: string, sample: string): string {
  return join(outputDir, `${sample}_dna_seqs`);
}

/**
 * Drop an instrument suffix such as `|151` from a read id
 */
export function stripReadSuffix(readId: string): string {
  const bar = readId.indexOf("|");
  return bar === -1 ? readId : readId.slice(0, bar);
}

/**
 * Distinct read ids (column 1) whose assigned reference (column 2)
 * canonicalizes into `targets`, in first-seen order
 */
export async function selectTargetReads(alignmentTable: string, targets: TargetSet): Promise<Set<string>> {
  const parser = new TSVParser({
    minFields: 2,
    onError: (error, lineNumber) => log.warn("Skipping alignment row", { alignmentTable, lineNumber, error }),
  });

  const reads = new Set<string>();
  for await (const row of parser.parseFile(alignmentTable)) {
    const [readId, referenceId] = row.fields;
    if (readId === undefined || referenceId === undefined || readId === "") continue;
    if (targets.has(canonicalId(referenceId))) {
      reads.add(readId);
    }
  }
  return reads;
}

const TERMINAL_STATE: Record<ExtractionStatus, ExtractionState> = {
  SUCCESS: "COMPLETED",
  NO_TARGET_READS: "NO_TARGET_READS",
  NO_INPUT: "NO_INPUT",
  INPUT_MISSING: "INPUT_MISSING",
};

function isExtractionStatus(value: string | undefined): value is ExtractionStatus {
  return value !== undefined && value in TERMINAL_STATE;
}

/**
 * Run the extraction state machine for one sample
 *
 * @example
 * ```typescript
 * const targets = await loadTargetSet("targets.txt");
 * const result = await runExtraction(manifest.samples[0], targets, "out/extract");
 * result.status; // "SUCCESS"
 * ```
 *
 * @throws {InputMissingError} After recording NO_INPUT or INPUT_MISSING
 */
export async function runExtraction(
  sample: Sample,
  targets: TargetSet,
  outputDir: string,
  store: CompletionStore = new CompletionStore(outputDir)
): Promise<ExtractionResult> {
  const existing = await store.read(EXTRACT_STAGE, sample.name);
  if (existing && isSuccessful(existing)) {
    log.info("Sample already extracted, reusing record", { sample: sample.name, record: existing.path });
    return fromRecord(sample.name, outputDir, existing);
  }

  const started = Date.now();
  let state: ExtractionState = "PENDING";
  const transition = (next: ExtractionState): void => {
    log.debug("Extraction state", { sample: sample.name, from: state, to: next });
    state = next;
  };

  const finish = async (
    status: ExtractionStatus,
    counts: { readsAssigned: number; sequencesExtracted: number },
    extra: RecordFields
  ): Promise<ExtractionResult> => {
    transition(TERMINAL_STATE[status]);
    const seconds = Math.round((Date.now() - started) / 1000);
    const record = await store.write(EXTRACT_STAGE, sample.name, [
      ["SAMPLE", sample.name],
      ["STATUS", status],
      ["TARGET_IDS_PROCESSED", targets.size],
      ["READS_ASSIGNED", counts.readsAssigned],
      ["SEQUENCES_EXTRACTED", counts.sequencesExtracted],
      ["DURATION_SECONDS", seconds],
      ["DURATION_HUMAN", formatDuration(seconds)],
      ...extra,
    ]);
    return {
      sample: sample.name,
      state,
      status,
      ...counts,
      ...(status === "SUCCESS" && {
        outputFile: join(sampleOutputDir(outputDir, sample.name), EXTRACTED_SEQUENCES_FILE),
      }),
      record,
      reused: false,
    };
  };

  log.info("Processing sample", { sample: sample.name, targetIds: targets.size });

  if (!(await exists(sample.alignmentTable))) {
    log.error("No alignment table found", { sample: sample.name, path: sample.alignmentTable });
    await finish("NO_INPUT", { readsAssigned: 0, sequencesExtracted: 0 }, [
      ["ERROR", `alignment table not found: ${sample.alignmentTable}`],
    ]);
    throw new InputMissingError(`Alignment table not found for ${sample.name}`, sample.name, sample.alignmentTable);
  }

  const reads = await selectTargetReads(sample.alignmentTable, targets);
  transition("SCANNED");
  log.info("Found reads assigned to target IDs", { sample: sample.name, reads: reads.size });

  const sampleDir = sampleOutputDir(outputDir, sample.name);
  if (reads.size === 0) {
    await removeDirectory(sampleDir);
    return finish("NO_TARGET_READS", { readsAssigned: 0, sequencesExtracted: 0 }, []);
  }

  const lookupIds = new Set<string>();
  for (const read of reads) {
    lookupIds.add(stripReadSuffix(read));
  }
  transition("READS_SELECTED");

  if (!(await exists(sample.rawSource))) {
    log.error("Raw read file not found", { sample: sample.name, path: sample.rawSource });
    await finish("INPUT_MISSING", { readsAssigned: reads.size, sequencesExtracted: 0 }, [
      ["ERROR", `raw read file not found: ${sample.rawSource}`],
    ]);
    throw new InputMissingError(`Raw read file not found for ${sample.name}`, sample.name, sample.rawSource);
  }

  await ensureDirectory(sampleDir);
  const extracted = await SeqOps.fromFastq(sample.rawSource)
    .grep({ ids: lookupIds })
    .toFastaSequence()
    .writeFasta(join(sampleDir, EXTRACTED_SEQUENCES_FILE), { wrapWidth: 0 });
  transition("SEQUENCES_RETRIEVED");

  if (extracted < lookupIds.size) {
    log.warn("Some assigned reads were not found in the raw read file", {
      sample: sample.name,
      requested: lookupIds.size,
      extracted,
    });
  }
  log.info("Extracted DNA sequences", { sample: sample.name, sequences: extracted });

  return finish("SUCCESS", { readsAssigned: reads.size, sequencesExtracted: extracted }, [
    ["OUTPUT_FILE", join(`${sample.name}_dna_seqs`, EXTRACTED_SEQUENCES_FILE)],
  ]);
}

function fromRecord(sample: string, outputDir: string, record: CompletionRecord): ExtractionResult {
  const raw = record.fields.get("STATUS");
  const status: ExtractionStatus = isExtractionStatus(raw) ? raw : "SUCCESS";
  const outputFile = record.fields.get("OUTPUT_FILE");
  return {
    sample,
    state: TERMINAL_STATE[status],
    status,
    readsAssigned: numberField(record, "READS_ASSIGNED") ?? 0,
    sequencesExtracted: numberField(record, "SEQUENCES_EXTRACTED") ?? 0,
    ...(outputFile !== undefined && { outputFile: join(outputDir, outputFile) }),
    record,
    reused: true,
  };
}
