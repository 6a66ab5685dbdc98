/**
 * Tests for hit parsing and filtering
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ParseError } from "../../src/errors";
import { filterHits, formatHits, parseValidationHits, readValidationHits } from "../../src/pipeline/filter";
import { canonicalId } from "../../src/pipeline/targets";
import type { ValidationHit } from "../../src/pipeline/types";

function hit(queryId: string, subjectId: string, identity: number, length: number): ValidationHit {
  return { queryId, subjectId, identity, length, evalue: 1e-5, bitscore: 50 };
}

describe("parseValidationHits", () => {
  test("reads the six tabular columns and keeps the line", async () => {
    const hits = await parseValidationHits("q1\tX1|foo\t100\t50\t1e-20\t99.5\n");
    expect(hits).toEqual([
      {
        queryId: "q1",
        subjectId: "X1|foo",
        identity: 100,
        length: 50,
        evalue: 1e-20,
        bitscore: 99.5,
        raw: "q1\tX1|foo\t100\t50\t1e-20\t99.5",
      },
    ]);
  });

  test("a short row is a parse error", async () => {
    await expect(parseValidationHits("q1\tX1\t100\t50\t1e-20\n")).rejects.toBeInstanceOf(ParseError);
  });

  test("a non-numeric score is a parse error", async () => {
    await expect(parseValidationHits("q1\tX1\thigh\t50\t1e-20\t99\n")).rejects.toMatchObject({
      lineNumber: 1,
    });
  });

  test("empty input has no hits", async () => {
    expect(await parseValidationHits("")).toEqual([]);
  });
});

describe("readValidationHits", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "hits-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("reads a hit table from disk", async () => {
    const path = join(dir, "hits.tsv");
    writeFileSync(path, "q1\tX1\t95.5\t30\t0.001\t40\nq2\tX2\t90\t12\t0.01\t20\n");
    const hits = await readValidationHits(path);
    expect(hits.map((h) => [h.queryId, h.identity, h.length])).toEqual([
      ["q1", 95.5, 30],
      ["q2", 90, 12],
    ]);
  });
});

describe("filterHits", () => {
  const criteria = { targets: new Set(["X1", "X2"]), identityCutoff: 90, minLength: 7 };

  test("accepts on target membership, identity and length", async () => {
    const hits = await parseValidationHits(
      "q1\tX1|foo\t100\t50\t1e-20\t99.5\nq2\tX1|foo\t80\t50\t1e-10\t60.1\n"
    );
    const accepted = filterHits(hits, { targets: new Set(["X1"]), identityCutoff: 90, minLength: 7 });
    expect(accepted.map((h) => h.queryId)).toEqual(["q1"]);
  });

  test("thresholds are inclusive", () => {
    const accepted = filterHits([hit("a", "X1", 90, 7), hit("b", "X1", 89.99, 7), hit("c", "X1", 90, 6)], criteria);
    expect(accepted.map((h) => h.queryId)).toEqual(["a"]);
  });

  test("non-target subjects are rejected", () => {
    const accepted = filterHits([hit("a", "Y1|X1", 100, 50), hit("b", "X2|Y1", 100, 50)], criteria);
    expect(accepted.map((h) => h.queryId)).toEqual(["b"]);
  });

  test("keeps engine order and multiple hits per query", () => {
    const hits = [hit("q2", "X2", 95, 10), hit("q1", "X1", 99, 10), hit("q2", "X1", 91, 10)];
    expect(filterHits(hits, criteria).map((h) => `${h.queryId}:${h.subjectId}`)).toEqual([
      "q2:X2",
      "q1:X1",
      "q2:X1",
    ]);
  });

  test("every accepted hit satisfies every criterion", () => {
    const hits: ValidationHit[] = [];
    for (const subject of ["X1", "X2|a", "Y3", "X1|b|c"]) {
      for (const identity of [50, 89.9, 90, 95, 100]) {
        for (const length of [1, 6, 7, 100]) {
          hits.push(hit(`q${hits.length}`, subject, identity, length));
        }
      }
    }

    const accepted = filterHits(hits, criteria);
    expect(accepted).toHaveLength(3 * 3 * 2);
    for (const h of accepted) {
      expect(criteria.targets.has(canonicalId(h.subjectId))).toBe(true);
      expect(h.identity).toBeGreaterThanOrEqual(90);
      expect(h.length).toBeGreaterThanOrEqual(7);
    }
  });

  test("filtering is idempotent", () => {
    const hits = [hit("a", "X1", 95, 10), hit("b", "X1", 80, 10), hit("c", "X9", 99, 10)];
    const once = filterHits(hits, criteria);
    expect(filterHits(once, criteria)).toEqual(once);
  });
});

describe("formatHits", () => {
  test("writes the original lines back", async () => {
    const text = "q1\tX1|foo\t100\t50\t1e-20\t99.5\nq2\tX2\t91\t20\t0.001\t30\n";
    expect(formatHits(await parseValidationHits(text))).toBe(text);
  });

  test("rebuilds lines for hits without one", () => {
    expect(formatHits([hit("q1", "X1", 95, 10)])).toBe("q1\tX1\t95\t10\t0.00001\t50\n");
  });

  test("no hits formats as empty", () => {
    expect(formatHits([])).toBe("");
  });
});
