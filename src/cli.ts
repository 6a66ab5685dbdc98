#!/usr/bin/env tsx
/**
 * CLI entrypoint for peptide-harvest.
 *
 * Usage:
 *   peptide-harvest manifest --humann-root <dir> --fastq-dir <dir> --output-dir <dir>
 *   peptide-harvest extract  --humann-root <dir> --targets <file> --fastq-dir <dir> --output-dir <dir>
 *                            [--sample-index N]
 *   peptide-harvest validate --targets <file> --input-dir <dir> --output-dir <dir> --database <file.dmnd> [...]
 *   peptide-harvest summary  --input-dir <dir> --output-dir <dir>
 *   peptide-harvest run      --humann-root <dir> --targets <file> --fastq-dir <dir> --output-dir <dir>
 *                            --database <file.dmnd> [...]
 */
import { join } from "node:path";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import { ConfigurationError, isPipelineError } from "./errors";
import { createLogger } from "./logger";
import { parseValidateConfig, type ValidateConfigInput } from "./pipeline/config";
import { runExtractionTask, runPipeline, runValidationStage, writeSummaries } from "./pipeline/controller";
import { loadOrCreateManifest } from "./pipeline/manifest";

const log = createLogger("cli");

const USAGE = `
peptide-harvest - target protein sequences from per-sample metagenomic alignments

Usage:
  peptide-harvest <command> [options]

Commands:
  manifest   Enumerate samples and write sample_manifest.json
  extract    Extract target reads for one sample (array task)
  validate   Aggregate, translate, validate, filter and canonicalize
  summary    Write the per-sample and per-run summary tables
  run        Run every extraction task, then validation, in-process

Inputs:
  --humann-root <dir>      Directory of <sample>_humann_temp alignment folders
  --targets <file>         Line-separated target IDs
  --fastq-dir <dir>        Directory of <sample>.fastq.gz raw reads
  --output-dir <dir>       Stage output directory (run: root of extract/ and validate/)
  --input-dir <dir>        Extraction output directory (validate, summary)
  --database <file>        DIAMOND database

Extraction:
  --sample-index <n>       1-based sample index (default: $SLURM_ARRAY_TASK_ID)

Validation:
  --max-targets <n>        Max target sequences per query   (default: 5)
  --evalue <x>             E-value threshold                (default: 1e-3)
  --pident <n>             Percent identity cutoff          (default: 90)
  --min-length <n>         Minimum alignment length         (default: 7)
  --threads <n>            DIAMOND threads                  (default: 8)
  --genetic-code <n>       NCBI translation table           (default: 11)
  --sensitive              DIAMOND --sensitive instead of --fast
  --rerun                  Re-filter an existing hit table
  --wait                   Wait for every sample to finish extraction
  --poll-interval <sec>    Seconds between barrier polls    (default: 60)
  --timeout <sec>          Give up waiting after this long  (default: none)

Local run:
  --concurrency <n>        Extraction tasks in parallel     (default: 4)

  --help                   Show this help
`.trim();

const OPTIONS = {
  "humann-root": { type: "string" },
  targets: { type: "string" },
  "fastq-dir": { type: "string" },
  "output-dir": { type: "string" },
  "input-dir": { type: "string" },
  database: { type: "string" },
  "sample-index": { type: "string" },
  "max-targets": { type: "string" },
  evalue: { type: "string" },
  pident: { type: "string" },
  "min-length": { type: "string" },
  threads: { type: "string" },
  "genetic-code": { type: "string" },
  sensitive: { type: "boolean", default: false },
  rerun: { type: "boolean", default: false },
  wait: { type: "boolean", default: false },
  "poll-interval": { type: "string" },
  timeout: { type: "string" },
  concurrency: { type: "string" },
  help: { type: "boolean", short: "h", default: false },
} as const;

type Values = ReturnType<typeof parseArgs<{ options: typeof OPTIONS; allowPositionals: true }>>["values"];

function numberOption(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function secondsOption(value: string | undefined): number | undefined {
  const seconds = numberOption(value);
  return seconds === undefined ? undefined : seconds * 1000;
}

type PathOption = "humann-root" | "targets" | "fastq-dir" | "output-dir" | "input-dir" | "database";

function required(values: Values, name: PathOption): string {
  const value = values[name];
  if (value === undefined || value === "") {
    throw new ConfigurationError(`Missing required option --${name}`, name);
  }
  return value;
}

function validateInput(values: Values, inputDir: string, outputDir: string): ValidateConfigInput {
  return {
    targets: required(values, "targets"),
    inputDir,
    outputDir,
    database: required(values, "database"),
    maxTargets: numberOption(values["max-targets"]),
    evalue: numberOption(values.evalue),
    identityCutoff: numberOption(values.pident),
    minLength: numberOption(values["min-length"]),
    threads: numberOption(values.threads),
    geneticCode: numberOption(values["genetic-code"]),
    sensitive: values.sensitive,
    rerun: values.rerun,
    wait: values.wait,
    pollIntervalMs: secondsOption(values["poll-interval"]),
    timeoutMs: secondsOption(values.timeout),
  };
}

async function dispatch(command: string, values: Values): Promise<void> {
  switch (command) {
    case "manifest": {
      const outputDir = required(values, "output-dir");
      const manifest = await loadOrCreateManifest(outputDir, {
        humannRoot: required(values, "humann-root"),
        fastqDir: required(values, "fastq-dir"),
      });
      manifest.samples.forEach((sample, i) => console.log(`${i + 1}\t${sample.name}`));
      return;
    }

    case "extract": {
      const index = values["sample-index"] ?? process.env.SLURM_ARRAY_TASK_ID;
      if (index === undefined) {
        throw new ConfigurationError("Missing --sample-index and SLURM_ARRAY_TASK_ID is not set", "sampleIndex");
      }
      const result = await runExtractionTask({
        humannRoot: required(values, "humann-root"),
        targets: required(values, "targets"),
        fastqDir: required(values, "fastq-dir"),
        outputDir: required(values, "output-dir"),
        sampleIndex: Number(index),
      });
      console.log(`${result.sample}\t${result.status}\t${result.readsAssigned}\t${result.sequencesExtracted}`);
      return;
    }

    case "validate": {
      const config = parseValidateConfig(
        validateInput(values, required(values, "input-dir"), required(values, "output-dir"))
      );
      const result = await runValidationStage(config);
      console.log(`${result.runId}\t${result.mode}\t${result.finalSequences}`);
      return;
    }

    case "summary": {
      const counts = await writeSummaries(required(values, "input-dir"), required(values, "output-dir"));
      console.log(`samples\t${counts.samples}\nruns\t${counts.runs}`);
      return;
    }

    case "run": {
      const root = required(values, "output-dir");
      const result = await runPipeline({
        ...validateInput(values, join(root, "extract"), join(root, "validate")),
        humannRoot: required(values, "humann-root"),
        fastqDir: required(values, "fastq-dir"),
        concurrency: numberOption(values.concurrency),
      });
      if (result.failedSamples.length > 0) {
        log.warn("Some samples failed extraction", { samples: result.failedSamples });
      }
      console.log(`${result.validation.runId}\t${result.mode}\t${result.validation.finalSequences}`);
      return;
    }

    default:
      throw new ConfigurationError(`Unknown command: ${command}`, "command");
  }
}

/**
 * @returns Process exit code
 */
export async function main(argv: readonly string[]): Promise<number> {
  let parsed: { values: Values; positionals: string[] };
  try {
    parsed = parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return 2;
  }

  const [command] = parsed.positionals;
  if (parsed.values.help || command === undefined) {
    console.log(USAGE);
    return command === undefined && !parsed.values.help ? 2 : 0;
  }

  try {
    await dispatch(command, parsed.values);
    return 0;
  } catch (error) {
    if (isPipelineError(error)) {
      log.error(error.toString(), { code: error.code });
      return 1;
    }
    log.error("Unexpected failure", { error: error instanceof Error ? (error.stack ?? error.message) : String(error) });
    return 1;
  }
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
