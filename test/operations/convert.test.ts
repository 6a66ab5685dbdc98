/**
 * Tests for FASTQ to FASTA conversion and FASTA output through SeqOps
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fastqToFasta, SeqOps } from "../../src/operations";

describe("fastqToFasta", () => {
  test("drops the quality and keeps the header", () => {
    expect(
      fastqToFasta({
        format: "fastq",
        id: "r1",
        description: "lane=1",
        sequence: "ACGT",
        quality: "IIII",
        length: 4,
        lineNumber: 9,
      })
    ).toEqual({ format: "fasta", id: "r1", description: "lane=1", sequence: "ACGT", length: 4, lineNumber: 9 });
  });
});

describe("SeqOps FASTQ to FASTA", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "convert-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("selects reads by id and writes single-line FASTA", async () => {
    writeFileSync(join(dir, "S1.fastq"), "@r1 x\nACGT\n+\nIIII\n@r2\nGGCC\n+\nIIII\n@r3\nTTAA\n+\nIIII\n");

    const written = await SeqOps.fromFastq(join(dir, "S1.fastq"))
      .grep({ ids: new Set(["r1", "r3"]) })
      .toFastaSequence()
      .writeFasta(join(dir, "out.fa"), { wrapWidth: 0 });

    expect(written).toBe(2);
    expect(readFileSync(join(dir, "out.fa"), "utf8")).toBe(">r1 x\nACGT\n>r3\nTTAA\n");
  });

  test("default width wraps at 80", async () => {
    const long = "A".repeat(100);
    await SeqOps.fromArray([{ id: "a", sequence: long, length: 100 }]).writeFasta(join(dir, "out.fa"));
    expect(readFileSync(join(dir, "out.fa"), "utf8")).toBe(`>a\n${"A".repeat(80)}\n${"A".repeat(20)}\n`);
  });
});
