/**
 * Tests for FASTA format parsing and writing
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync, strToU8 } from "fflate";
import { ParseError } from "../../src/errors";
import { countFastaRecords, FastaParser, FastaWriter, parseFastaHeader } from "../../src/formats";
import type { FastaSequence } from "../../src/types";

async function collect(source: AsyncIterable<FastaSequence>): Promise<FastaSequence[]> {
  const out: FastaSequence[] = [];
  for await (const record of source) out.push(record);
  return out;
}

describe("FastaParser", () => {
  const parser = new FastaParser();

  test("parses a single record", async () => {
    const records = await collect(parser.parseString(">seq1\nATCG"));
    expect(records).toEqual([{ format: "fasta", id: "seq1", sequence: "ATCG", length: 4, lineNumber: 1 }]);
  });

  test("splits identifier and description at the first whitespace", async () => {
    const [record] = await collect(parser.parseString(">UniRef50_P1|x  kinase domain\nMKV\n"));
    expect(record?.id).toBe("UniRef50_P1|x");
    expect(record?.description).toBe("kinase domain");
  });

  test("joins wrapped sequence lines", async () => {
    const records = await collect(parser.parseString(">a\nATCG\nAT CG\r\nAT\n>b\nGG\n"));
    expect(records.map((r) => [r.id, r.sequence, r.lineNumber])).toEqual([
      ["a", "ATCGATCGAT", 1],
      ["b", "GG", 5],
    ]);
  });

  test("skips blank and comment lines", async () => {
    const records = await collect(parser.parseString("\n;comment\n>a\n\nAC\n"));
    expect(records.map((r) => r.sequence)).toEqual(["AC"]);
  });

  test("keeps empty records unless told otherwise", async () => {
    const text = ">empty\n>full\nAC\n";
    expect((await collect(parser.parseString(text))).map((r) => r.id)).toEqual(["empty", "full"]);

    const warnings: string[] = [];
    const strict = new FastaParser({ allowEmptySequences: false, onWarning: (w) => warnings.push(w) });
    expect((await collect(strict.parseString(text))).map((r) => r.id)).toEqual(["full"]);
    expect(warnings).toEqual(["Skipping empty sequence 'empty'"]);
  });

  test("sequence before the first header is an error", async () => {
    await expect(collect(parser.parseString("ACGT\n>a\nAC\n"))).rejects.toBeInstanceOf(ParseError);
  });

  test("line numbers can be switched off", async () => {
    const [record] = await collect(new FastaParser({ trackLineNumbers: false }).parseString(">a\nAC\n"));
    expect(record).toEqual({ format: "fasta", id: "a", sequence: "AC", length: 2 });
  });

  test("aborts on a fired signal", async () => {
    const controller = new AbortController();
    controller.abort();
    const lines = Array.from({ length: 10_000 }, (_, i) => (i % 2 === 0 ? `>r${i}` : "AC")).join("\n");
    await expect(collect(new FastaParser({ signal: controller.signal }).parseString(lines))).rejects.toThrow(
      "Operation aborted during FASTA parsing"
    );
  });
});

describe("parseFastaHeader", () => {
  test("with and without description", () => {
    expect(parseFastaHeader(">r1")).toEqual({ id: "r1" });
    expect(parseFastaHeader(">r1 sample=S1 lane=2")).toEqual({ id: "r1", description: "sample=S1 lane=2" });
  });
});

describe("FastaWriter", () => {
  test("wraps at the line width", () => {
    const writer = new FastaWriter({ lineWidth: 4 });
    expect(writer.formatSequence({ id: "a", description: "d", sequence: "ACGTACGTAC" })).toBe(
      ">a d\nACGT\nACGT\nAC\n"
    );
  });

  test("width 0 writes one line", () => {
    const writer = new FastaWriter({ lineWidth: 0 });
    expect(writer.formatSequence({ id: "a", sequence: "A".repeat(200) })).toBe(`>a\n${"A".repeat(200)}\n`);
  });

  test("descriptions can be dropped", () => {
    const writer = new FastaWriter({ includeDescription: false });
    expect(
      writer.formatSequences([
        { id: "a", description: "x", sequence: "AC" },
        { id: "b", sequence: "GT" },
      ])
    ).toBe(">a\nAC\n>b\nGT\n");
  });
});

describe("files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "fasta-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("parses gzipped files", async () => {
    const path = join(dir, "seqs.fa.gz");
    writeFileSync(path, gzipSync(strToU8(">a\nAC\n>b\nGT\n")));
    const records = await collect(new FastaParser().parseFile(path));
    expect(records.map((r) => r.id)).toEqual(["a", "b"]);
  });

  test("countFastaRecords counts headers", async () => {
    const path = join(dir, "seqs.fa");
    writeFileSync(path, ">a\nAC\nGT\n>b\n>c\nT\n");
    expect(await countFastaRecords(path)).toBe(3);
    expect(await countFastaRecords(join(dir, "absent.fa"))).toBe(0);
  });
});
