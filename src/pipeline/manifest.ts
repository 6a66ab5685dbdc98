/**
 * Sample manifest
 *
 * The list of samples is enumerated once from the alignment root, sorted by
 * name and persisted as `sample_manifest.json`. Extraction tasks address
 * samples by 1-based index into this file, so the mapping does not change
 * if directories appear or disappear while tasks are running.
 */

import { join } from "node:path";
import { type } from "arktype";
import { ConfigurationError } from "../errors";
import { directoryExists, exists, listDirectory, readToString } from "../io/file-reader";
import { ensureDirectory, writeStringAtomic } from "../io/file-writer";
import { createLogger } from "../logger";
import { SAMPLE_COUNT_WARNING } from "./config";
import type { Sample, SampleManifest } from "./types";

const log = createLogger("manifest");

export const MANIFEST_FILE = "sample_manifest.json";

const SAMPLE_DIR_SUFFIX = "_humann_temp";
const RAW_SOURCE_EXTENSIONS = [".fastq.gz", ".fq.gz", ".fastq", ".fq"] as const;

const SampleManifestSchema = type({
  version: "1",
  createdAt: "string",
  humannRoot: "string",
  fastqDir: "string",
  samples: type({
    name: "string>0",
    alignmentTable: "string>0",
    rawSource: "string>0",
  }).array(),
});

export interface ManifestSources {
  /** Directory holding one `<sample>_humann_temp` directory per sample */
  humannRoot: string;
  /** Directory holding `<sample>.fastq.gz` (or .fq.gz, .fastq, .fq) */
  fastqDir: string;
}

/**
 * Enumerate samples from the alignment root
 *
 * @throws {ConfigurationError} When a directory is missing or holds no samples
 */
export async function buildManifest(sources: ManifestSources): Promise<SampleManifest> {
  if (!(await directoryExists(sources.humannRoot))) {
    throw new ConfigurationError(`Alignment root not found: ${sources.humannRoot}`, "humannRoot");
  }
  if (!(await directoryExists(sources.fastqDir))) {
    throw new ConfigurationError(`FASTQ directory not found: ${sources.fastqDir}`, "fastqDir");
  }

  const samples: Sample[] = [];
  for (const entry of await listDirectory(sources.humannRoot)) {
    if (!entry.endsWith(SAMPLE_DIR_SUFFIX) || entry.length === SAMPLE_DIR_SUFFIX.length) continue;

    const directory = join(sources.humannRoot, entry);
    if (!(await directoryExists(directory))) continue;

    const name = entry.slice(0, -SAMPLE_DIR_SUFFIX.length);
    samples.push({
      name,
      alignmentTable: join(directory, `${name}_diamond_aligned.tsv`),
      rawSource: await resolveRawSource(sources.fastqDir, name),
    });
  }

  if (samples.length === 0) {
    throw new ConfigurationError(
      `No *${SAMPLE_DIR_SUFFIX} directories found in ${sources.humannRoot}`,
      "humannRoot"
    );
  }
  if (samples.length > SAMPLE_COUNT_WARNING) {
    log.warn("Large number of samples", { samples: samples.length });
  }

  return {
    version: 1,
    createdAt: new Date().toISOString(),
    humannRoot: sources.humannRoot,
    fastqDir: sources.fastqDir,
    samples,
  };
}

/**
 * First existing `<fastqDir>/<sample><ext>`; `.fastq.gz` when none exists
 * yet, so the extraction task reports the conventional path as missing
 */
async function resolveRawSource(fastqDir: string, sample: string): Promise<string> {
  for (const extension of RAW_SOURCE_EXTENSIONS) {
    const candidate = join(fastqDir, `${sample}${extension}`);
    if (await exists(candidate)) return candidate;
  }
  return join(fastqDir, `${sample}${RAW_SOURCE_EXTENSIONS[0]}`);
}

/**
 * Read a persisted manifest
 *
 * @returns undefined when the file does not exist
 * @throws {ConfigurationError} When the file exists but is not a manifest
 */
export async function readManifest(outputDir: string): Promise<SampleManifest | undefined> {
  const path = join(outputDir, MANIFEST_FILE);
  if (!(await exists(path))) return undefined;

  let data: unknown;
  try {
    data = JSON.parse(await readToString(path));
  } catch (error) {
    throw new ConfigurationError(
      `Sample manifest is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      "manifest",
      path
    );
  }

  const manifest = SampleManifestSchema(data);
  if (manifest instanceof type.errors) {
    throw new ConfigurationError(`Invalid sample manifest: ${manifest.summary}`, "manifest", path);
  }
  return manifest;
}

/**
 * Reuse the manifest in `outputDir`, or build and persist one
 */
export async function loadOrCreateManifest(
  outputDir: string,
  sources: ManifestSources
): Promise<SampleManifest> {
  const existing = await readManifest(outputDir);
  if (existing) {
    log.debug("Reusing sample manifest", { outputDir, samples: existing.samples.length });
    return existing;
  }

  const manifest = await buildManifest(sources);
  await ensureDirectory(outputDir);
  await writeStringAtomic(join(outputDir, MANIFEST_FILE), `${JSON.stringify(manifest, null, 2)}\n`);
  log.info("Wrote sample manifest", { outputDir, samples: manifest.samples.length });
  return manifest;
}

/**
 * Sample by 1-based index
 *
 * @throws {ConfigurationError} When the index is out of range
 */
export function sampleAt(manifest: SampleManifest, index: number): Sample {
  const sample = Number.isInteger(index) ? manifest.samples[index - 1] : undefined;
  if (index < 1 || sample === undefined) {
    throw new ConfigurationError(
      `Sample index ${index} out of range (1-${manifest.samples.length})`,
      "sampleIndex"
    );
  }
  return sample;
}
