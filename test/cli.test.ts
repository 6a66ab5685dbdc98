import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { join } from "node:path";
import { main } from "../src/cli";
import { createWorkspace, type Workspace, writeSample } from "./utils/pipeline-fixtures";

describe("cli", () => {
  let ws: Workspace;
  let output: string[];

  beforeEach(() => {
    ws = createWorkspace();
    output = [];
    vi.spyOn(console, "log").mockImplementation((line: unknown) => {
      output.push(String(line));
    });
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    ws.cleanup();
  });

  test("no command is a usage error", async () => {
    expect(await main([])).toBe(2);
  });

  test("--help", async () => {
    expect(await main(["--help"])).toBe(0);
    expect(output[0]?.startsWith("peptide-harvest")).toBe(true);
  });

  test("unknown option is a usage error", async () => {
    expect(await main(["extract", "--bogus"])).toBe(2);
  });

  test("unknown command fails", async () => {
    expect(await main(["frobnicate"])).toBe(1);
  });

  test("missing required option fails", async () => {
    expect(await main(["summary", "--input-dir", ws.extractDir])).toBe(1);
  });

  test("manifest lists samples by index", async () => {
    writeSample(ws, "S2", [["r1", "X1"]], [{ id: "r1", sequence: "ACGT" }]);
    writeSample(ws, "S1", [["r1", "X1"]], [{ id: "r1", sequence: "ACGT" }]);

    const code = await main([
      "manifest",
      "--humann-root",
      ws.humannRoot,
      "--fastq-dir",
      ws.fastqDir,
      "--output-dir",
      ws.extractDir,
    ]);

    expect(code).toBe(0);
    expect(output).toEqual(["1\tS1", "2\tS2"]);
  });

  test("extract then summary", async () => {
    writeSample(
      ws,
      "S1",
      [
        ["r1", "X1"],
        ["r2", "Y1"],
      ],
      [
        { id: "r1", sequence: "ACGT" },
        { id: "r2", sequence: "TTTT" },
      ]
    );
    const common = ["--humann-root", ws.humannRoot, "--targets", ws.targets, "--fastq-dir", ws.fastqDir];

    expect(await main(["extract", ...common, "--output-dir", ws.extractDir, "--sample-index", "1"])).toBe(0);
    expect(output).toEqual(["S1\tSUCCESS\t1\t1"]);

    output.length = 0;
    const summaryDir = join(ws.root, "summary");
    expect(await main(["summary", "--input-dir", ws.extractDir, "--output-dir", summaryDir])).toBe(0);
    expect(output).toEqual(["samples\t1\nruns\t0"]);
  });

  test("extract with an index out of range fails", async () => {
    writeSample(ws, "S1", [["r1", "X1"]], [{ id: "r1", sequence: "ACGT" }]);
    const code = await main([
      "extract",
      "--humann-root",
      ws.humannRoot,
      "--targets",
      ws.targets,
      "--fastq-dir",
      ws.fastqDir,
      "--output-dir",
      ws.extractDir,
      "--sample-index",
      "4",
    ]);
    expect(code).toBe(1);
  });
});
