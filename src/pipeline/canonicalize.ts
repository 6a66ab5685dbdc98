/**
 * Canonicalization and renumbering of accepted protein sequences
 *
 * Pass 1 renames each accepted translated sequence to the canonical
 * subject id of its first accepted hit. Pass 2 numbers sequences per
 * canonical id in encounter order and writes the final header:
 *
 * ```
 * >UniRef50_P12345_1 GN=UniRef50_P12345_1
 * >UniRef50_P12345_2 GN=UniRef50_P12345_2
 * >UniRef50_Q99999_1 GN=UniRef50_Q99999_1
 * ```
 */

import { createLogger } from "../logger";
import { SeqOps, seqops } from "../operations";
import type { AbstractSequence } from "../types";
import { canonicalId } from "./targets";
import type { FilteredHit } from "./types";

const log = createLogger("canonicalize");

export interface CanonicalSequence {
  readonly id: string;
  readonly description?: string;
  readonly sequence: string;
  readonly length: number;
}

/**
 * Query id → canonical subject id of its first accepted hit
 */
export function buildCanonicalMap(hits: readonly FilteredHit[]): Map<string, string> {
  const map = new Map<string, string>();
  for (const hit of hits) {
    if (!map.has(hit.queryId)) {
      map.set(hit.queryId, canonicalId(hit.subjectId));
    }
  }
  return map;
}

/**
 * Pass 1: keep sequences with a mapping, renamed to their canonical id
 */
export async function* mapToCanonical(
  sequences: AsyncIterable<AbstractSequence>,
  map: ReadonlyMap<string, string>
): AsyncIterable<CanonicalSequence> {
  for await (const seq of sequences) {
    const canonical = map.get(seq.id);
    if (canonical === undefined) continue;
    yield { id: canonical, sequence: seq.sequence, length: seq.length };
  }
}

/**
 * Pass 2: suffix `_N` per canonical id, 1-based, restarting for each id
 */
export async function* renumber(sequences: AsyncIterable<CanonicalSequence>): AsyncIterable<CanonicalSequence> {
  const counts = new Map<string, number>();
  for await (const seq of sequences) {
    const n = (counts.get(seq.id) ?? 0) + 1;
    counts.set(seq.id, n);
    const id = `${seq.id}_${n}`;
    yield { id, description: `GN=${id}`, sequence: seq.sequence, length: seq.length };
  }
}

/**
 * Copy the translated records named by accepted hits, in file order
 *
 * @returns Number of records written
 */
export async function extractAcceptedSequences(
  translatedPath: string,
  hits: readonly FilteredHit[],
  outputPath: string
): Promise<number> {
  const ids = new Set(hits.map((hit) => hit.queryId));
  if (ids.size === 0) {
    return SeqOps.fromArray<AbstractSequence>([]).writeFasta(outputPath, { wrapWidth: 0 });
  }
  return SeqOps.fromFasta(translatedPath).grep({ ids }).writeFasta(outputPath, { wrapWidth: 0 });
}

/**
 * Run both passes from an accepted-sequence FASTA to the final file
 *
 * @returns Number of sequences written
 */
export async function canonicalizeSequences(
  acceptedPath: string,
  hits: readonly FilteredHit[],
  outputPath: string
): Promise<number> {
  const map = buildCanonicalMap(hits);
  if (map.size === 0) {
    return SeqOps.fromArray<AbstractSequence>([]).writeFasta(outputPath, { wrapWidth: 0 });
  }

  const written = await seqops(renumber(mapToCanonical(SeqOps.fromFasta(acceptedPath), map))).writeFasta(
    outputPath,
    { wrapWidth: 0 }
  );
  log.info("Reformatted headers", { canonicalIds: new Set(map.values()).size, sequences: written });
  return written;
}
