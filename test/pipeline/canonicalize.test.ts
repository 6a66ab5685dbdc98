/**
 * Tests for canonicalization and renumbering
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  buildCanonicalMap,
  type CanonicalSequence,
  canonicalizeSequences,
  extractAcceptedSequences,
  renumber,
} from "../../src/pipeline/canonicalize";
import { filterHits } from "../../src/pipeline/filter";
import type { FilteredHit } from "../../src/pipeline/types";

function accepted(pairs: Array<[string, string]>): FilteredHit[] {
  return filterHits(
    pairs.map(([queryId, subjectId]) => ({ queryId, subjectId, identity: 100, length: 20, evalue: 0, bitscore: 1 })),
    { targets: new Set(["X1", "X2"]), identityCutoff: 0, minLength: 1 }
  );
}

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of source) out.push(item);
  return out;
}

async function* from<T>(items: T[]): AsyncIterable<T> {
  yield* items;
}

describe("buildCanonicalMap", () => {
  test("maps each query to its first accepted subject", () => {
    const map = buildCanonicalMap(
      accepted([
        ["q1", "X1|a"],
        ["q1", "X2"],
        ["q2", "X1|b"],
      ])
    );
    expect([...map]).toEqual([
      ["q1", "X1"],
      ["q2", "X1"],
    ]);
  });
});

describe("renumber", () => {
  test("numbers per canonical id in encounter order", async () => {
    const seqs: CanonicalSequence[] = ["X1", "X2", "X1", "X1"].map((id) => ({ id, sequence: "M", length: 1 }));
    const out = await collect(renumber(from(seqs)));
    expect(out.map((s) => `${s.id} ${s.description ?? ""}`)).toEqual([
      "X1_1 GN=X1_1",
      "X2_1 GN=X2_1",
      "X1_2 GN=X1_2",
      "X1_3 GN=X1_3",
    ]);
  });
});

describe("file passes", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "canonicalize-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("accepted sequences keep translated file order", async () => {
    const translated = join(dir, "translated.fa");
    writeFileSync(translated, ">a_frame=1 one\nMKV\n>b_frame=2\nMAA\n>c_frame=-1\nMCC\n");

    const written = await extractAcceptedSequences(
      translated,
      accepted([
        ["c_frame=-1", "X2"],
        ["a_frame=1", "X1"],
      ]),
      join(dir, "accepted.fa")
    );

    expect(written).toBe(2);
    expect(readFileSync(join(dir, "accepted.fa"), "utf8")).toBe(">a_frame=1 one\nMKV\n>c_frame=-1\nMCC\n");
  });

  test("two hits to one target become X1_1 and X1_2", async () => {
    const acceptedPath = join(dir, "accepted.fa");
    writeFileSync(acceptedPath, ">q1_frame=1 desc\nMKV\nLL\n>q2_frame=2\nMAA\n>q9_frame=1\nMZZ\n");

    const written = await canonicalizeSequences(
      acceptedPath,
      accepted([
        ["q1_frame=1", "X1|foo"],
        ["q2_frame=2", "X1|bar"],
      ]),
      join(dir, "final.faa")
    );

    expect(written).toBe(2);
    expect(readFileSync(join(dir, "final.faa"), "utf8")).toBe(">X1_1 GN=X1_1\nMKVLL\n>X1_2 GN=X1_2\nMAA\n");
  });

  test("no hits writes empty files", async () => {
    const acceptedPath = join(dir, "accepted.fa");
    expect(await extractAcceptedSequences(join(dir, "absent.fa"), [], acceptedPath)).toBe(0);
    expect(await canonicalizeSequences(acceptedPath, [], join(dir, "final.faa"))).toBe(0);
    expect(readFileSync(acceptedPath, "utf8")).toBe("");
    expect(readFileSync(join(dir, "final.faa"), "utf8")).toBe("");
  });
});
