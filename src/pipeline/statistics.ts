/**
 * Counts reported by the validation stage
 */

import { stripFrameSuffix } from "../operations";
import { canonicalId } from "./targets";
import type { FilteredHit, TargetSet } from "./types";

const FRAMES_PER_SEQUENCE = 6;

export interface HitStatistics {
  /** Canonical subject ids among accepted hits, sorted */
  readonly matchedTargets: readonly string[];
  readonly originalTargetsMatched: number;
  readonly newTargetsDiscovered: number;
  /** Distinct translated records (one per frame) with an accepted hit */
  readonly framesWithHits: number;
  /** Distinct source sequences with an accepted hit in any frame */
  readonly sequencesWithHits: number;
  readonly framesSearched: number;
  readonly highQualityHits: number;
  readonly perfectHits: number;
  readonly hitsAtLeast95: number;
}

/**
 * @param dedupCount Number of unique nucleotide sequences that were translated
 */
export function computeStatistics(
  hits: readonly FilteredHit[],
  targets: TargetSet,
  minLength: number,
  dedupCount: number
): HitStatistics {
  const matched = new Set<string>();
  const frames = new Set<string>();
  const sequences = new Set<string>();
  let perfectHits = 0;
  let hitsAtLeast95 = 0;

  for (const hit of hits) {
    matched.add(canonicalId(hit.subjectId));
    frames.add(hit.queryId);
    sequences.add(stripFrameSuffix(hit.queryId));

    if (hit.length >= minLength) {
      if (hit.identity === 100) perfectHits++;
      if (hit.identity >= 95) hitsAtLeast95++;
    }
  }

  const matchedTargets = [...matched].sort();
  const originalTargetsMatched = matchedTargets.filter((id) => targets.has(id)).length;

  return {
    matchedTargets,
    originalTargetsMatched,
    newTargetsDiscovered: matchedTargets.length - originalTargetsMatched,
    framesWithHits: frames.size,
    sequencesWithHits: sequences.size,
    framesSearched: dedupCount * FRAMES_PER_SEQUENCE,
    highQualityHits: hits.length,
    perfectHits,
    hitsAtLeast95,
  };
}
