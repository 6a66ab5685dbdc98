/**
 * Hit filtering
 *
 * A hit is accepted when its canonical subject id is a target, its percent
 * identity reaches the cutoff and its alignment length reaches the minimum.
 * Accepted hits keep the engine's order.
 */

import { ParseError } from "../errors";
import { type DSVRecord, formatRows, TSVParser } from "../formats/dsv";
import { canonicalId } from "./targets";
import type { FilteredHit, TargetSet, ValidationHit } from "./types";

export interface FilterCriteria {
  readonly targets: TargetSet;
  /** Minimum percent identity, 0-100 */
  readonly identityCutoff: number;
  /** Minimum alignment length in residues */
  readonly minLength: number;
}

function numeric(value: string | undefined, column: string, lineNumber: number): number {
  const parsed = Number(value);
  if (value === undefined || value.trim() === "" || Number.isNaN(parsed)) {
    throw new ParseError(`Invalid ${column} value '${value ?? ""}'`, "hits", lineNumber);
  }
  return parsed;
}

function toHit(row: DSVRecord): ValidationHit {
  const [queryId = "", subjectId = "", identity, length, evalue, bitscore] = row.fields;
  return {
    queryId: queryId.trim(),
    subjectId: subjectId.trim(),
    identity: numeric(identity, "pident", row.lineNumber),
    length: numeric(length, "length", row.lineNumber),
    evalue: numeric(evalue, "evalue", row.lineNumber),
    bitscore: numeric(bitscore, "bitscore", row.lineNumber),
    raw: row.fields.join("\t"),
  };
}

async function collectHits(rows: AsyncIterable<DSVRecord>): Promise<ValidationHit[]> {
  const hits: ValidationHit[] = [];
  for await (const row of rows) {
    hits.push(toHit(row));
  }
  return hits;
}

/**
 * Parse a tabular hit file (`qseqid sseqid pident length evalue bitscore`)
 *
 * @throws {ParseError} On a row with fewer than six columns or a non-numeric score
 */
export async function readValidationHits(path: string): Promise<ValidationHit[]> {
  return collectHits(new TSVParser({ minFields: 6, skipComments: false }).parseFile(path));
}

export async function parseValidationHits(text: string): Promise<ValidationHit[]> {
  return collectHits(new TSVParser({ minFields: 6, skipComments: false }).parseString(text));
}

/**
 * Keep the hits that meet every criterion, in input order
 *
 * @example
 * ```typescript
 * const accepted = filterHits(hits, { targets, identityCutoff: 90, minLength: 7 });
 * ```
 */
export function filterHits(hits: readonly ValidationHit[], criteria: FilterCriteria): FilteredHit[] {
  const accepts = (hit: ValidationHit): hit is FilteredHit =>
    criteria.targets.has(canonicalId(hit.subjectId)) &&
    hit.identity >= criteria.identityCutoff &&
    hit.length >= criteria.minLength;

  return hits.filter(accepts);
}

/**
 * Hits back in tabular form; the original line is reused when known
 */
export function formatHits(hits: readonly ValidationHit[]): string {
  return formatRows(
    hits.map((hit) =>
      hit.raw !== undefined
        ? [hit.raw]
        : [
            hit.queryId,
            hit.subjectId,
            String(hit.identity),
            String(hit.length),
            String(hit.evalue),
            String(hit.bitscore),
          ]
    )
  );
}
