/**
 * Tests for the fan-in barrier
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { BarrierTimeoutError } from "../../src/errors";
import { waitForBarrier } from "../../src/pipeline/barrier";
import { CompletionStore } from "../../src/pipeline/completion";

describe("waitForBarrier", () => {
  let dir: string;
  let store: CompletionStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "barrier-"));
    store = new CompletionStore(dir);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("returns at once when every unit is terminal", async () => {
    await store.write("extract", "S2", [["STATUS", "NO_TARGET_READS"]]);
    await store.write("extract", "S1", [["STATUS", "SUCCESS"]]);

    const records = await waitForBarrier(store, "extract", ["S1", "S2"], { pollIntervalMs: 10 });
    expect(records.map((r) => r.unit)).toEqual(["S1", "S2"]);
  });

  test("waits for a late unit", async () => {
    await store.write("extract", "S1", [["STATUS", "SUCCESS"]]);

    const waiting = waitForBarrier(store, "extract", ["S1", "S2"], { pollIntervalMs: 10 });
    await new Promise((resolve) => setTimeout(resolve, 50));
    await store.write("extract", "S2", [["STATUS", "INPUT_MISSING"]]);

    const records = await waiting;
    expect(records.map((r) => r.fields.get("STATUS"))).toEqual(["SUCCESS", "INPUT_MISSING"]);
  });

  test("times out naming the units still missing", async () => {
    await store.write("extract", "S1", [["STATUS", "SUCCESS"]]);

    const error = await waitForBarrier(store, "extract", ["S1", "S2"], {
      pollIntervalMs: 10,
      timeoutMs: 60,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BarrierTimeoutError);
    expect(error).toMatchObject({ stage: "extract", missing: ["S2"] });
  });
});
