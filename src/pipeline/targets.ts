/**
 * Target set loading and identifier canonicalization
 */

import { ConfigurationError, FileError } from "../errors";
import { exists, readToString } from "../io/file-reader";
import { createLogger } from "../logger";
import { TARGET_COUNT_WARNING } from "./config";
import type { TargetSet } from "./types";

const log = createLogger("targets");

/**
 * The comparison key for an identifier: everything before the first `|`
 *
 * @example
 * ```typescript
 * canonicalId("UniRef50_Q8A1|len=151|x"); // "UniRef50_Q8A1"
 * canonicalId("UniRef50_Q8A1");           // "UniRef50_Q8A1"
 * ```
 */
export function canonicalId(id: string): string {
  const bar = id.indexOf("|");
  return bar === -1 ? id : id.slice(0, bar);
}

/**
 * Parse a line-oriented identifier list. Blank lines are ignored and
 * duplicate identifiers collapse.
 */
export function parseTargetSet(text: string): TargetSet {
  const targets = new Set<string>();
  for (const line of text.split(/\r?\n/)) {
    const id = canonicalId(line.trim());
    if (id !== "") {
      targets.add(id);
    }
  }
  return targets;
}

/**
 * Load the target set from disk
 *
 * @throws {ConfigurationError} When the file is missing or unreadable
 */
export async function loadTargetSet(path: string): Promise<TargetSet> {
  if (!(await exists(path))) {
    throw new ConfigurationError(`Targets file not found: ${path}`, "targets");
  }

  let text: string;
  try {
    text = await readToString(path);
  } catch (error) {
    if (error instanceof FileError) {
      throw new ConfigurationError(`Targets file is unreadable: ${error.message}`, "targets", path);
    }
    throw error;
  }

  const targets = parseTargetSet(text);
  if (targets.size > TARGET_COUNT_WARNING) {
    log.warn("Large target set; validation will be slow", { targets: targets.size });
  }
  log.info("Loaded target set", { path, targets: targets.size });
  return targets;
}
