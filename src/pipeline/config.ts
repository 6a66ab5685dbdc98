/**
 * Stage configuration: defaults, ranges and validation
 *
 * Every entry point (CLI, local driver, tests) passes a plain object through
 * one of the `parse*Config` functions, which fill in defaults and reject
 * out-of-range values with a {@link ConfigurationError} naming the field.
 */

import { ArkErrors, type } from "arktype";
import { ConfigurationError } from "../errors";

export const DEFAULTS = {
  maxTargets: 5,
  evalue: 1e-3,
  identityCutoff: 90,
  minLength: 7,
  threads: 8,
  sensitive: false,
  rerun: false,
  geneticCode: 11,
  wait: false,
  pollIntervalMs: 60_000,
  concurrency: 4,
} as const;

/** Above this many samples a run is still allowed but logged as unusually large */
export const SAMPLE_COUNT_WARNING = 50;
/** Above this many target ids a run is still allowed but logged as unusually large */
export const TARGET_COUNT_WARNING = 5000;

const path = "string>0";

const ExtractConfigSchema = type({
  humannRoot: path,
  targets: path,
  fastqDir: path,
  outputDir: path,
  sampleIndex: "number.integer>=1",
});

const ValidateConfigSchema = type({
  targets: path,
  inputDir: path,
  outputDir: path,
  database: path,
  maxTargets: "number.integer>=1",
  evalue: "number>0",
  identityCutoff: "0<=number<=100",
  minLength: "number.integer>=1",
  threads: "number.integer>=1",
  sensitive: "boolean",
  rerun: "boolean",
  geneticCode: "number.integer>=1",
  wait: "boolean",
  pollIntervalMs: "number>0",
  "timeoutMs?": "number>0",
});

const PipelineConfigSchema = type({
  humannRoot: path,
  fastqDir: path,
  concurrency: "number.integer>=1",
});

export type ExtractConfig = typeof ExtractConfigSchema.infer;
export type ValidateConfig = typeof ValidateConfigSchema.infer;
export type PipelineConfig = ValidateConfig & typeof PipelineConfigSchema.infer;

/**
 * Input accepted by {@link parseValidateConfig}: required paths plus any
 * subset of the tunables
 */
export type ValidateConfigInput = Pick<ValidateConfig, "targets" | "inputDir" | "outputDir" | "database"> &
  Partial<Omit<ValidateConfig, "targets" | "inputDir" | "outputDir" | "database">>;

export type PipelineConfigInput = ValidateConfigInput & {
  humannRoot: string;
  fastqDir: string;
  concurrency?: number;
};

function check<T>(result: T | ArkErrors, what: string): T {
  if (result instanceof ArkErrors) {
    throw new ConfigurationError(`Invalid ${what} configuration: ${result.summary}`, what);
  }
  return result;
}

/**
 * @throws {ConfigurationError} When a field is missing or out of range
 */
export function parseExtractConfig(input: unknown): ExtractConfig {
  return check(ExtractConfigSchema(input), "extract");
}

/**
 * Fill in defaults and validate
 *
 * @example
 * ```typescript
 * const config = parseValidateConfig({
 *   targets: "targets.txt",
 *   inputDir: "out/extract",
 *   outputDir: "out/validate",
 *   database: "uniref50.dmnd",
 *   identityCutoff: 95,
 * });
 * config.minLength; // 7
 * ```
 *
 * @throws {ConfigurationError} When a field is missing or out of range
 */
export function parseValidateConfig(input: ValidateConfigInput): ValidateConfig {
  const { concurrency: _concurrency, ...defaults } = DEFAULTS;
  return check(ValidateConfigSchema({ ...defaults, ...withoutUndefined(input) }), "validate");
}

export function parsePipelineConfig(input: PipelineConfigInput): PipelineConfig {
  const validate = parseValidateConfig(input);
  const pipeline = check(
    PipelineConfigSchema({
      humannRoot: input.humannRoot,
      fastqDir: input.fastqDir,
      concurrency: input.concurrency ?? DEFAULTS.concurrency,
    }),
    "pipeline"
  );
  return { ...validate, ...pipeline };
}

/**
 * Human-readable parameter line stored in the validation record
 */
export function formatParameters(config: ValidateConfig): string {
  return [
    `max-targets=${config.maxTargets}`,
    `evalue=${config.evalue}`,
    `pident=${config.identityCutoff}`,
    `min-length=${config.minLength}`,
    `sensitive=${config.sensitive}`,
  ].join(", ");
}

function withoutUndefined(input: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}
