import { afterEach, describe, expect, test, vi } from "vitest";
import { Effect, Stream } from "effect";
import { diamondArgs, forwardToStderr } from "../../src/pipeline/diamond";

describe("diamondArgs", () => {
  const request = {
    query: "q.fa",
    database: "ref.dmnd",
    output: "hits.tsv",
    maxTargets: 5,
    evalue: 1e-3,
    threads: 8,
    sensitive: false,
  };

  test("fast mode", () => {
    expect(diamondArgs(request)).toEqual([
      "blastp",
      "--db",
      "ref.dmnd",
      "--query",
      "q.fa",
      "--out",
      "hits.tsv",
      "--outfmt",
      "6",
      "qseqid",
      "sseqid",
      "pident",
      "length",
      "evalue",
      "bitscore",
      "--max-target-seqs",
      "5",
      "--evalue",
      "0.001",
      "--threads",
      "8",
      "--fast",
    ]);
  });

  test("sensitive mode", () => {
    const args = diamondArgs({ ...request, sensitive: true });
    expect(args.at(-1)).toBe("--sensitive");
    expect(args).not.toContain("--fast");
  });
});

describe("forwardToStderr", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("tool output lands on stderr and leaves stdout to the CLI", async () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const stdout = vi.spyOn(process.stdout, "write");
    const first = new TextEncoder().encode("diamond v2.1.9\n");
    const second = new TextEncoder().encode("Total time = 3s\n");

    await Effect.runPromise(forwardToStderr(Stream.make(first, second)));

    expect(stderr.mock.calls.map(([chunk]) => chunk)).toEqual([first, second]);
    expect(stdout).not.toHaveBeenCalledWith(first);
    expect(stdout).not.toHaveBeenCalledWith(second);
  });
});
