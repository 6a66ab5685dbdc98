/**
 * Extraction and validation pipeline
 */

export { aggregateSequences, aggregationInputs, type AggregationResult } from "./aggregate";
export { waitForBarrier, type BarrierOptions } from "./barrier";
export {
  buildCanonicalMap,
  canonicalizeSequences,
  extractAcceptedSequences,
  mapToCanonical,
  renumber,
  type CanonicalSequence,
} from "./canonicalize";
export {
  CompletionStore,
  EXTRACT_STAGE,
  formatDuration,
  formatRecord,
  formatSummaryTable,
  isSuccessful,
  isTerminal,
  NOT_AVAILABLE,
  numberField,
  parseRecord,
  VALIDATE_STAGE,
  type BarrierStatus,
  type CompletionRecord,
  type RecordFields,
} from "./completion";
export {
  DEFAULTS,
  formatParameters,
  parseExtractConfig,
  parsePipelineConfig,
  parseValidateConfig,
  type ExtractConfig,
  type PipelineConfig,
  type PipelineConfigInput,
  type ValidateConfig,
  type ValidateConfigInput,
} from "./config";
export {
  collectExtractionRecords,
  decideRunMode,
  EnginesLive,
  EXTRACT_SUMMARY_FILE,
  runExtractionTask,
  runIdFor,
  runPipeline,
  runValidationStage,
  VALIDATE_FILES,
  VALIDATE_SUMMARY_FILE,
  writeSummaries,
  type PipelineResult,
  type ValidationResult,
} from "./controller";
export { DiamondValidationLive, diamondArgs } from "./diamond";
export {
  SixFrameTranslationLive,
  TranslationEngine,
  ValidationEngine,
  type TranslationEngineShape,
  type TranslationRequest,
  type ValidationEngineShape,
  type ValidationRequest,
} from "./engines";
export { runExtraction, sampleOutputDir, selectTargetReads, stripReadSuffix, type ExtractionResult } from "./extract";
export { filterHits, formatHits, parseValidationHits, readValidationHits, type FilterCriteria } from "./filter";
export { validationFingerprint, type FingerprintInput } from "./fingerprint";
export { buildManifest, loadOrCreateManifest, MANIFEST_FILE, readManifest, sampleAt } from "./manifest";
export { computeStatistics, type HitStatistics } from "./statistics";
export { canonicalId, loadTargetSet, parseTargetSet } from "./targets";
export type {
  ExtractionState,
  ExtractionStatus,
  FilteredHit,
  RunMode,
  Sample,
  SampleManifest,
  TargetSet,
  ValidationHit,
} from "./types";
