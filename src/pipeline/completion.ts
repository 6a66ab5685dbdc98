/**
 * Completion record store
 *
 * One plain-text record per unit of work and stage, named
 * `<unit>_<stage>_completed.flag`:
 *
 * ```
 * COMPLETED_AT: 2026-10-19T08:14:03.512Z
 * STAGE: extract
 * SAMPLE: S1
 * STATUS: SUCCESS
 * READS_ASSIGNED: 3
 * ```
 *
 * Records are published with write-then-rename, so a reader polling the
 * directory sees either no record or a complete one. A record that does
 * not parse, or lacks a known terminal status, counts as not terminal.
 */

import { join } from "node:path";
import { PipelineError } from "../errors";
import { directoryExists, exists, listDirectory, readToString } from "../io/file-reader";
import { ensureDirectory, writeStringAtomic } from "../io/file-writer";
import { createLogger } from "../logger";

const log = createLogger("completion");

export const EXTRACT_STAGE = "extract";
export const VALIDATE_STAGE = "validate";

export const NOT_AVAILABLE = "NA";

const RECORD_SUFFIX = "_completed.flag";
const KEY_PATTERN = /^[A-Z][A-Z0-9_]*$/;
const REQUIRED_FIELDS = ["COMPLETED_AT", "STAGE", "STATUS"] as const;

const SUCCESS_STATUSES: ReadonlySet<string> = new Set(["SUCCESS", "NO_TARGET_READS"]);
const FAILURE_STATUSES: ReadonlySet<string> = new Set(["NO_INPUT", "INPUT_MISSING"]);

export type RecordFields = ReadonlyArray<readonly [string, string | number]>;

export interface CompletionRecord {
  readonly stage: string;
  readonly unit: string;
  readonly path: string;
  /** Fields in file order */
  readonly fields: ReadonlyMap<string, string>;
}

/**
 * Serialize fields as `KEY: value` lines
 *
 * @throws {PipelineError} On a key that is not upper snake case or a value
 * containing a newline
 */
export function formatRecord(fields: RecordFields): string {
  let out = "";
  for (const [key, value] of fields) {
    const text = String(value);
    if (!KEY_PATTERN.test(key) || /[\r\n]/.test(text)) {
      throw new PipelineError(`Cannot serialize record field ${key}`, "RECORD_FORMAT", key);
    }
    out += `${key}: ${text}\n`;
  }
  return out;
}

/**
 * Parse `KEY: value` lines
 *
 * @returns undefined when any line is malformed or the text is empty
 */
export function parseRecord(text: string): Map<string, string> | undefined {
  const fields = new Map<string, string>();
  for (const line of text.split(/\r?\n/)) {
    if (line.trim() === "") continue;

    const colon = line.indexOf(":");
    if (colon <= 0) return undefined;

    const key = line.slice(0, colon).trim();
    if (!KEY_PATTERN.test(key)) return undefined;
    fields.set(key, line.slice(colon + 1).trim());
  }
  return fields.size > 0 ? fields : undefined;
}

/**
 * Whether the record is complete and reports a known terminal status
 */
export function isTerminal(record: CompletionRecord): boolean {
  if (REQUIRED_FIELDS.some((key) => !record.fields.has(key))) return false;
  if (record.fields.get("STAGE") !== record.stage) return false;

  const status = record.fields.get("STATUS") ?? "";
  return SUCCESS_STATUSES.has(status) || FAILURE_STATUSES.has(status);
}

export function isSuccessful(record: CompletionRecord): boolean {
  return isTerminal(record) && SUCCESS_STATUSES.has(record.fields.get("STATUS") ?? "");
}

/**
 * Read a numeric field; missing or non-numeric values read as undefined
 */
export function numberField(record: CompletionRecord, key: string): number | undefined {
  const value = record.fields.get(key);
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Whole seconds as `HH:MM:SS`; hours grow past 24 rather than wrapping
 */
export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  return [hours, minutes, secs].map((part) => String(part).padStart(2, "0")).join(":");
}

export interface BarrierStatus {
  readonly complete: boolean;
  readonly missing: readonly string[];
  readonly records: readonly CompletionRecord[];
}

/**
 * Directory-backed completion record store
 *
 * @example
 * ```typescript
 * const store = new CompletionStore("out/extract");
 * await store.write("extract", "S1", [["STATUS", "SUCCESS"], ...]);
 * const status = await store.checkBarrier("extract", ["S1", "S2"]);
 * ```
 */
export class CompletionStore {
  constructor(readonly directory: string) {}

  recordPath(stage: string, unit: string): string {
    return join(this.directory, `${unit}_${stage}${RECORD_SUFFIX}`);
  }

  /**
   * Publish a record atomically
   *
   * `COMPLETED_AT` and `STAGE` are prepended. A unit whose existing record
   * reports success is never overwritten; a failure record is replaced
   * when the unit is retried.
   *
   * @throws {PipelineError} When a successful record already exists
   */
  async write(stage: string, unit: string, fields: RecordFields): Promise<CompletionRecord> {
    const existing = await this.read(stage, unit);
    if (existing && isSuccessful(existing)) {
      throw new PipelineError(
        `Completion record already exists for ${unit}`,
        "RECORD_EXISTS",
        unit,
        existing.path
      );
    }

    const all: Array<readonly [string, string | number]> = [
      ["COMPLETED_AT", new Date().toISOString()],
      ["STAGE", stage],
      ...fields.filter(([key]) => key !== "COMPLETED_AT" && key !== "STAGE"),
    ];
    const path = this.recordPath(stage, unit);

    await ensureDirectory(this.directory);
    await writeStringAtomic(path, formatRecord(all));
    log.debug("Wrote completion record", { stage, unit, path });

    return {
      stage,
      unit,
      path,
      fields: new Map(all.map(([key, value]) => [key, String(value)])),
    };
  }

  /**
   * @returns undefined when the record is missing or malformed
   */
  async read(stage: string, unit: string): Promise<CompletionRecord | undefined> {
    const path = this.recordPath(stage, unit);
    if (!(await exists(path))) return undefined;

    const fields = parseRecord(await readToString(path));
    if (!fields) {
      log.warn("Ignoring malformed completion record", { path });
      return undefined;
    }
    return { stage, unit, path, fields };
  }

  /**
   * All parseable records for a stage, ordered by unit name
   */
  async list(stage: string): Promise<CompletionRecord[]> {
    if (!(await directoryExists(this.directory))) return [];

    const suffix = `_${stage}${RECORD_SUFFIX}`;
    const units = (await listDirectory(this.directory))
      .filter((name) => name.endsWith(suffix) && name.length > suffix.length)
      .map((name) => name.slice(0, -suffix.length));

    const records: CompletionRecord[] = [];
    for (const unit of units) {
      const record = await this.read(stage, unit);
      if (record) records.push(record);
    }
    return records;
  }

  /**
   * Has every expected unit produced a terminal record?
   *
   * Records are returned in the order of `units`.
   */
  async checkBarrier(stage: string, units: readonly string[]): Promise<BarrierStatus> {
    const missing: string[] = [];
    const records: CompletionRecord[] = [];

    for (const unit of units) {
      const record = await this.read(stage, unit);
      if (record && isTerminal(record)) {
        records.push(record);
      } else {
        missing.push(unit);
      }
    }
    return { complete: missing.length === 0, missing, records };
  }

  /**
   * Tab-separated summary of a stage: one row per record, columns are the
   * union of all fields in first-seen order, absent values are `NA`
   */
  async summaryTable(stage: string): Promise<string> {
    return formatSummaryTable(await this.list(stage));
  }

  /**
   * @returns Number of rows written
   */
  async writeSummary(stage: string, path: string): Promise<number> {
    const records = await this.list(stage);
    await writeStringAtomic(path, formatSummaryTable(records));
    return records.length;
  }
}

export function formatSummaryTable(records: readonly CompletionRecord[]): string {
  if (records.length === 0) return "";

  const columns: string[] = [];
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of record.fields.keys()) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }

  const lines = [columns.join("\t")];
  for (const record of records) {
    lines.push(columns.map((key) => record.fields.get(key) ?? NOT_AVAILABLE).join("\t"));
  }
  return `${lines.join("\n")}\n`;
}
