/**
 * Fan-in barrier over the completion record store
 *
 * The aggregation stage calls {@link waitForBarrier} to block until every
 * expected unit has a terminal record. There is no default timeout; pass
 * `timeoutMs` to bound the wait.
 */

import { Duration, Effect } from "effect";
import { BarrierTimeoutError } from "../errors";
import { runPromise } from "../io/runtime";
import { createLogger } from "../logger";
import type { BarrierStatus, CompletionRecord, CompletionStore } from "./completion";

const log = createLogger("barrier");

export interface BarrierOptions {
  /** Delay between polls (default 60 s) */
  pollIntervalMs?: number;
  /** Give up after this long; unbounded when omitted */
  timeoutMs?: number;
}

/**
 * Poll until every unit in `units` has a terminal record for `stage`
 *
 * @example
 * ```typescript
 * const records = await waitForBarrier(store, "extract", manifest.samples.map((s) => s.name), {
 *   pollIntervalMs: 30_000,
 *   timeoutMs: 6 * 3600_000,
 * });
 * ```
 *
 * @returns The terminal records, in the order of `units`
 * @throws {BarrierTimeoutError} When `timeoutMs` elapses first
 */
export async function waitForBarrier(
  store: CompletionStore,
  stage: string,
  units: readonly string[],
  options: BarrierOptions = {}
): Promise<readonly CompletionRecord[]> {
  const pollInterval = Duration.millis(options.pollIntervalMs ?? 60_000);
  let polls = 0;
  let lastStatus: BarrierStatus | undefined;

  const poll = Effect.tryPromise({
    try: () => store.checkBarrier(stage, units),
    catch: (error) => error,
  }).pipe(
    Effect.tap((status) => {
      lastStatus = status;
      polls++;
      if (status.complete) return Effect.void;
      if (polls === 1 || polls % 5 === 0) {
        log.info("Waiting for units to finish", {
          stage,
          finished: units.length - status.missing.length,
          expected: units.length,
        });
      }
      return Effect.sleep(pollInterval);
    }),
    Effect.repeat({ until: (status) => status.complete })
  );

  const bounded =
    options.timeoutMs === undefined
      ? poll
      : poll.pipe(
          Effect.timeoutFail({
            duration: Duration.millis(options.timeoutMs),
            onTimeout: () =>
              new BarrierTimeoutError(
                `Timed out after ${options.timeoutMs} ms waiting for ${stage} to finish`,
                stage,
                lastStatus?.missing ?? units
              ),
          })
        );

  const status = await runPromise(bounded);
  log.info("Barrier reached", { stage, units: units.length, polls });
  return status.records;
}
