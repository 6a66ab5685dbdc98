/**
 * Pipeline controller
 *
 * Sequences the stages, decides between FULL and RERUN, and holds the
 * barrier between the per-sample extraction fan-out and the single
 * validation stage.
 *
 * ```
 * extract (one task per sample) ──▶ completion records ──▶ barrier
 *   ──▶ aggregate + dedup ──▶ translate ──▶ validate ──▶ filter
 *   ──▶ statistics + canonicalize ──▶ validation record
 * ```
 *
 * RERUN starts at the filter step from an existing hit table.
 */

import { join } from "node:path";
import { NodeContext } from "@effect/platform-node";
import { Effect, Either, Layer } from "effect";
import { ConfigurationError, InputMissingError, NoDataError } from "../errors";
import { countFastaRecords } from "../formats/fasta";
import { directoryExists, exists, isNonEmpty } from "../io/file-reader";
import { ensureDirectory, writeStringAtomic } from "../io/file-writer";
import { runPromise } from "../io/runtime";
import { createLogger } from "../logger";
import { aggregateSequences, COMBINED_FILE, DEDUPLICATED_FILE } from "./aggregate";
import { canonicalizeSequences, extractAcceptedSequences } from "./canonicalize";
import {
  type CompletionRecord,
  CompletionStore,
  EXTRACT_STAGE,
  formatDuration,
  numberField,
  VALIDATE_STAGE,
} from "./completion";
import { waitForBarrier } from "./barrier";
import {
  type ExtractConfig,
  formatParameters,
  parseExtractConfig,
  parsePipelineConfig,
  type PipelineConfigInput,
  type ValidateConfig,
} from "./config";
import { DiamondValidationLive } from "./diamond";
import { SixFrameTranslationLive, TranslationEngine, ValidationEngine } from "./engines";
import { type ExtractionResult, runExtraction } from "./extract";
import { filterHits, formatHits, readValidationHits } from "./filter";
import { validationFingerprint } from "./fingerprint";
import { loadOrCreateManifest, readManifest, sampleAt } from "./manifest";
import { computeStatistics, type HitStatistics } from "./statistics";
import { loadTargetSet } from "./targets";
import type { RunMode } from "./types";

const log = createLogger("controller");

export const VALIDATE_FILES = {
  combined: COMBINED_FILE,
  dedup: DEDUPLICATED_FILE,
  translated: "six_frame_translated.fa",
  hits: "diamond_blast_results.tsv",
  filtered: "filtered_blast_hits.tsv",
  matchedTargets: "matched_targets.txt",
  accepted: "high_quality_aa_sequences.fa",
  final: "final_format_aa_sequences.faa",
} as const;

export const EXTRACT_SUMMARY_FILE = "extract_samples_summary.tsv";
export const VALIDATE_SUMMARY_FILE = "validate_runs_summary.tsv";

/**
 * Six-frame translation plus DIAMOND blastp on the local platform
 */
export const EnginesLive: Layer.Layer<TranslationEngine | ValidationEngine> = Layer.mergeAll(
  SixFrameTranslationLive,
  DiamondValidationLive
).pipe(Layer.provide(NodeContext.layer));

/**
 * Run id from a start time: compact ISO-8601, sortable as text
 *
 * @example
 * ```typescript
 * runIdFor(new Date("2026-10-19T08:14:03.512Z")); // "20261019T081403512Z"
 * ```
 */
export function runIdFor(date: Date): string {
  return date.toISOString().replace(/[-:.]/g, "");
}

/**
 * RERUN only when asked for and a non-empty hit table exists
 */
export async function decideRunMode(outputDir: string, rerunRequested: boolean): Promise<RunMode> {
  if (!rerunRequested) return "FULL";

  const hitsPath = join(outputDir, VALIDATE_FILES.hits);
  if (await isNonEmpty(hitsPath)) {
    log.info("Rerun mode: using existing validation output for filtering", { path: hitsPath });
    return "RERUN";
  }
  log.info("Rerun requested but validation output is missing or empty; running full pipeline", {
    path: hitsPath,
  });
  return "FULL";
}

/**
 * One extraction task: resolve the sample by 1-based index and extract it
 *
 * @throws {ConfigurationError} On invalid configuration or an index out of range
 * @throws {InputMissingError} When the sample's inputs are absent
 */
export async function runExtractionTask(input: unknown): Promise<ExtractionResult> {
  const config: ExtractConfig = parseExtractConfig(input);
  const targets = await loadTargetSet(config.targets);
  const manifest = await loadOrCreateManifest(config.outputDir, {
    humannRoot: config.humannRoot,
    fastqDir: config.fastqDir,
  });
  const sample = sampleAt(manifest, config.sampleIndex);
  log.info("Extraction task", { index: config.sampleIndex, of: manifest.samples.length, sample: sample.name });
  return runExtraction(sample, targets, config.outputDir);
}

/**
 * Units the validation stage expects: the manifest's samples when a
 * manifest exists, otherwise every unit with an extraction record
 */
async function expectedSamples(inputDir: string, store: CompletionStore): Promise<string[]> {
  const manifest = await readManifest(inputDir);
  if (manifest) return manifest.samples.map((sample) => sample.name);
  return (await store.list(EXTRACT_STAGE)).map((record) => record.unit);
}

/**
 * Extraction records behind the barrier, in sample order
 *
 * @throws {ConfigurationError} When no records exist, or some are missing and `wait` is off
 * @throws {NoDataError} When every sample extracted zero sequences
 */
export async function collectExtractionRecords(config: ValidateConfig): Promise<readonly CompletionRecord[]> {
  const store = new CompletionStore(config.inputDir);
  const units = await expectedSamples(config.inputDir, store);
  if (units.length === 0) {
    throw new ConfigurationError(`No extraction completion records found in ${config.inputDir}`, "extract");
  }

  let records: readonly CompletionRecord[];
  if (config.wait) {
    records = await waitForBarrier(store, EXTRACT_STAGE, units, {
      pollIntervalMs: config.pollIntervalMs,
      ...(config.timeoutMs !== undefined && { timeoutMs: config.timeoutMs }),
    });
  } else {
    const status = await store.checkBarrier(EXTRACT_STAGE, units);
    if (!status.complete) {
      throw new ConfigurationError(
        `Extraction has not finished for ${status.missing.length} of ${units.length} samples`,
        "extract",
        `Missing: ${status.missing.join(", ")}`
      );
    }
    records = status.records;
  }
  log.info("Found extraction completion records", { records: records.length });

  for (const record of records) {
    const status = record.fields.get("STATUS");
    if (status === "NO_INPUT" || status === "INPUT_MISSING") {
      log.warn("Sample failed extraction", { sample: record.unit, status, error: record.fields.get("ERROR") });
    }
  }

  if (records.every((record) => (numberField(record, "SEQUENCES_EXTRACTED") ?? 0) === 0)) {
    throw new NoDataError("No samples have DNA sequences available for processing", "extract");
  }
  return records;
}

interface StageCounts {
  combined: number;
  dedup: number;
  translated: number;
}

async function runFullValidation(
  config: ValidateConfig,
  engines: Layer.Layer<TranslationEngine | ValidationEngine>,
  paths: Record<keyof typeof VALIDATE_FILES, string>
): Promise<StageCounts> {
  if (!(await directoryExists(config.inputDir))) {
    throw new ConfigurationError(`Input directory does not exist: ${config.inputDir}`, "inputDir");
  }
  if (!(await exists(config.database))) {
    throw new ConfigurationError(`Database file does not exist: ${config.database}`, "database");
  }

  const records = await collectExtractionRecords(config);
  const aggregation = await aggregateSequences(records, config.inputDir, config.outputDir);

  const translated = await runPromise(
    Effect.flatMap(TranslationEngine, (engine) =>
      engine.translate({ input: paths.dedup, output: paths.translated, geneticCode: config.geneticCode })
    ).pipe(Effect.provide(engines))
  );
  log.info("Translated to amino acid sequences", { sequences: translated });

  await runPromise(
    Effect.flatMap(ValidationEngine, (engine) =>
      engine.search({
        query: paths.translated,
        database: config.database,
        output: paths.hits,
        maxTargets: config.maxTargets,
        evalue: config.evalue,
        threads: config.threads,
        sensitive: config.sensitive,
      })
    ).pipe(Effect.provide(engines))
  );

  return { combined: aggregation.combinedCount, dedup: aggregation.dedupCount, translated };
}

async function recoverCounts(paths: Record<keyof typeof VALIDATE_FILES, string>): Promise<StageCounts> {
  const counts = {
    combined: await countFastaRecords(paths.combined),
    dedup: await countFastaRecords(paths.dedup),
    translated: await countFastaRecords(paths.translated),
  };
  log.info("Rerun mode: using existing data", counts);
  return counts;
}

async function latestFingerprint(store: CompletionStore): Promise<string | undefined> {
  const records = await store.list(VALIDATE_STAGE);
  for (let i = records.length - 1; i >= 0; i--) {
    const fingerprint = records[i]?.fields.get("VALIDATION_FINGERPRINT");
    if (fingerprint !== undefined && fingerprint !== "") return fingerprint;
  }
  return undefined;
}

export interface ValidationResult {
  readonly runId: string;
  readonly mode: RunMode;
  readonly counts: Readonly<StageCounts>;
  readonly blastHits: number;
  readonly statistics: HitStatistics;
  readonly finalSequences: number;
  readonly fingerprint: string;
  readonly record: CompletionRecord;
}

/**
 * The validation stage, FULL or RERUN
 *
 * @example
 * ```typescript
 * const result = await runValidationStage(
 *   parseValidateConfig({ targets, inputDir: "out/extract", outputDir: "out/validate", database }),
 * );
 * result.statistics.matchedTargets; // ["UniRef50_P12345", ...]
 * ```
 *
 * @throws {ConfigurationError} On missing inputs, or accepted hits that map to no sequence
 * @throws {NoDataError} When no sample produced sequences
 * @throws {DownstreamToolFailure} When an engine fails
 */
export async function runValidationStage(
  config: ValidateConfig,
  engines: Layer.Layer<TranslationEngine | ValidationEngine> = EnginesLive
): Promise<ValidationResult> {
  const started = new Date();
  const runId = runIdFor(started);
  const parameters = formatParameters(config);
  log.info("Validation stage", { runId, parameters, rerun: config.rerun });

  const targets = await loadTargetSet(config.targets);
  await ensureDirectory(config.outputDir);

  const paths = {
    combined: join(config.outputDir, VALIDATE_FILES.combined),
    dedup: join(config.outputDir, VALIDATE_FILES.dedup),
    translated: join(config.outputDir, VALIDATE_FILES.translated),
    hits: join(config.outputDir, VALIDATE_FILES.hits),
    filtered: join(config.outputDir, VALIDATE_FILES.filtered),
    matchedTargets: join(config.outputDir, VALIDATE_FILES.matchedTargets),
    accepted: join(config.outputDir, VALIDATE_FILES.accepted),
    final: join(config.outputDir, VALIDATE_FILES.final),
  };
  const store = new CompletionStore(config.outputDir);

  const mode = await decideRunMode(config.outputDir, config.rerun);
  const counts = mode === "FULL" ? await runFullValidation(config, engines, paths) : await recoverCounts(paths);

  const fingerprint = await validationFingerprint({
    database: config.database,
    evalue: config.evalue,
    maxTargets: config.maxTargets,
    sensitive: config.sensitive,
    translatedPath: paths.translated,
  });
  if (mode === "RERUN") {
    const previous = await latestFingerprint(store);
    if (previous !== undefined && previous !== fingerprint) {
      log.warn("Existing validation output was produced with different inputs or parameters", {
        previous,
        current: fingerprint,
      });
    }
  }

  const hits = await readValidationHits(paths.hits);
  log.info("Validation hits", { hits: hits.length });

  const filtered = filterHits(hits, {
    targets,
    identityCutoff: config.identityCutoff,
    minLength: config.minLength,
  });
  await writeStringAtomic(paths.filtered, formatHits(filtered));
  log.info("Filtered to high-quality hits", {
    hits: filtered.length,
    identityCutoff: config.identityCutoff,
    minLength: config.minLength,
  });

  const statistics = computeStatistics(filtered, targets, config.minLength, counts.dedup);
  await writeStringAtomic(paths.matchedTargets, statistics.matchedTargets.map((id) => `${id}\n`).join(""));

  const accepted = await extractAcceptedSequences(paths.translated, filtered, paths.accepted);
  log.info("Extracted high-quality amino acid sequences", { sequences: accepted });

  const finalSequences = await canonicalizeSequences(paths.accepted, filtered, paths.final);
  if (filtered.length > 0 && finalSequences === 0) {
    throw new ConfigurationError(
      "Accepted hits could not be mapped to any translated sequence",
      "canonicalize",
      `Hits: ${paths.filtered}; sequences: ${paths.translated}`
    );
  }

  const seconds = Math.round((Date.now() - started.getTime()) / 1000);
  const record = await store.write(VALIDATE_STAGE, runId, [
    ["RUN_ID", runId],
    ["MODE", mode],
    ["PARAMETERS", parameters],
    ["STATUS", "SUCCESS"],
    ["TARGET_IDS_PROCESSED", targets.size],
    ["ORIGINAL_TARGETS_MATCHED", statistics.originalTargetsMatched],
    ["NEW_TARGETS_DISCOVERED", statistics.newTargetsDiscovered],
    ["TOTAL_TARGETS_WITH_HITS", statistics.matchedTargets.length],
    ["DNA_SEQUENCES_COMBINED", counts.combined],
    ["DNA_SEQUENCES_DEDUP", counts.dedup],
    ["FRAMES_SEARCHED", statistics.framesSearched],
    ["FRAMES_WITH_HITS", statistics.framesWithHits],
    ["SEQUENCES_WITH_HITS", statistics.sequencesWithHits],
    ["AA_SEQUENCES_TRANSLATED", counts.translated],
    ["BLAST_HITS", hits.length],
    ["HIGH_QUALITY_HITS", statistics.highQualityHits],
    ["PERFECT_HITS_100PCT", statistics.perfectHits],
    ["HIGH_QUALITY_HITS_95PCT", statistics.hitsAtLeast95],
    ["FINAL_AA_SEQUENCES", finalSequences],
    ["DURATION_SECONDS", seconds],
    ["DURATION_HUMAN", formatDuration(seconds)],
    ["VALIDATION_FINGERPRINT", fingerprint],
    ["MATCHED_TARGETS_FILE", VALIDATE_FILES.matchedTargets],
    ["FILTERED_HITS_FILE", VALIDATE_FILES.filtered],
    ["HIGH_QUALITY_AA_FILE", VALIDATE_FILES.accepted],
    ["OUTPUT_FILE", VALIDATE_FILES.final],
  ]);

  await writeSummaries(config.inputDir, config.outputDir);
  log.info("Validation stage complete", {
    runId,
    mode,
    finalSequences,
    duration: formatDuration(seconds),
  });

  return {
    runId,
    mode,
    counts,
    blastHits: hits.length,
    statistics,
    finalSequences,
    fingerprint,
    record,
  };
}

/**
 * Write the per-sample and per-run summary tables into `outputDir`
 *
 * @returns Row counts of both tables
 */
export async function writeSummaries(
  inputDir: string,
  outputDir: string
): Promise<{ samples: number; runs: number }> {
  await ensureDirectory(outputDir);
  const samples = await new CompletionStore(inputDir).writeSummary(
    EXTRACT_STAGE,
    join(outputDir, EXTRACT_SUMMARY_FILE)
  );
  const runs = await new CompletionStore(outputDir).writeSummary(
    VALIDATE_STAGE,
    join(outputDir, VALIDATE_SUMMARY_FILE)
  );
  log.info("Wrote summary tables", { samples, runs });
  return { samples, runs };
}

export interface PipelineResult {
  readonly mode: RunMode;
  /** Per-sample outcomes; empty when extraction was skipped */
  readonly extraction: readonly ExtractionResult[];
  /** Samples whose task raised instead of returning */
  readonly failedSamples: readonly string[];
  readonly validation: ValidationResult;
}

/**
 * Run both stages in-process
 *
 * Extraction tasks run with bounded concurrency and tolerate per-sample
 * failures; validation then runs behind the barrier. With `rerun` and a
 * usable hit table, extraction is skipped.
 */
export async function runPipeline(
  input: PipelineConfigInput,
  engines: Layer.Layer<TranslationEngine | ValidationEngine> = EnginesLive
): Promise<PipelineResult> {
  const config = parsePipelineConfig(input);
  const mode = await decideRunMode(config.outputDir, config.rerun);

  const extraction: ExtractionResult[] = [];
  const failedSamples: string[] = [];

  if (mode === "FULL") {
    const targets = await loadTargetSet(config.targets);
    const manifest = await loadOrCreateManifest(config.inputDir, {
      humannRoot: config.humannRoot,
      fastqDir: config.fastqDir,
    });
    const store = new CompletionStore(config.inputDir);
    log.info("Extracting samples", { samples: manifest.samples.length, concurrency: config.concurrency });

    const outcomes = await runPromise(
      Effect.forEach(
        manifest.samples,
        (sample) =>
          Effect.either(
            Effect.tryPromise({
              try: () => runExtraction(sample, targets, config.inputDir, store),
              catch: (error) => error,
            })
          ),
        { concurrency: config.concurrency }
      )
    );

    outcomes.forEach((outcome, i) => {
      const sample = manifest.samples[i]?.name ?? String(i + 1);
      if (Either.isRight(outcome)) {
        extraction.push(outcome.right);
        return;
      }
      failedSamples.push(sample);
      const error = outcome.left;
      if (error instanceof InputMissingError) {
        log.warn("Sample skipped: input missing", { sample, path: error.path });
      } else {
        log.error("Sample extraction failed", {
          sample,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    });
  } else {
    log.info("Rerun mode: skipping extraction");
  }

  const validation = await runValidationStage({ ...config, wait: false }, engines);
  return { mode, extraction, failedSamples, validation };
}
