/**
 * DIAMOND blastp as the validation engine
 */

import { Command, CommandExecutor } from "@effect/platform";
import { Effect, Layer, Stream } from "effect";
import { DownstreamToolFailure } from "../errors";
import { createLogger } from "../logger";
import { ValidationEngine, type ValidationRequest } from "./engines";

const log = createLogger("diamond");

export const DIAMOND_BINARY = "diamond";

/**
 * Hit table columns, in the order {@link parseValidationHits} reads them
 */
export const HIT_COLUMNS = ["qseqid", "sseqid", "pident", "length", "evalue", "bitscore"] as const;

/**
 * Argument vector for `diamond blastp`
 */
export function diamondArgs(request: ValidationRequest): string[] {
  return [
    "blastp",
    "--db",
    request.database,
    "--query",
    request.query,
    "--out",
    request.output,
    "--outfmt",
    "6",
    ...HIT_COLUMNS,
    "--max-target-seqs",
    String(request.maxTargets),
    "--evalue",
    String(request.evalue),
    "--threads",
    String(request.threads),
    request.sensitive ? "--sensitive" : "--fast",
  ];
}

/**
 * Copy a child process's stdout to this process's stderr
 */
export function forwardToStderr<E>(output: Stream.Stream<Uint8Array, E>): Effect.Effect<void, E> {
  return Stream.runForEach(output, (chunk) =>
    Effect.sync(() => {
      process.stderr.write(chunk);
    })
  );
}

export const DiamondValidationLive: Layer.Layer<ValidationEngine, never, CommandExecutor.CommandExecutor> =
  Layer.effect(
    ValidationEngine,
    Effect.map(CommandExecutor.CommandExecutor, (executor) => ({
      search: (request: ValidationRequest) => {
        const args = diamondArgs(request);
        log.info("Running DIAMOND blastp", { args: args.join(" ") });

        const command = Command.make(DIAMOND_BINARY, ...args).pipe(Command.stderr("inherit"));

        const run = Effect.scoped(
          Effect.gen(function* () {
            const child = yield* Command.start(command);
            const [exitCode] = yield* Effect.all([child.exitCode, forwardToStderr(child.stdout)], {
              concurrency: "unbounded",
            });
            return exitCode;
          })
        );

        return run.pipe(
          Effect.provideService(CommandExecutor.CommandExecutor, executor),
          Effect.mapError(
            (error) =>
              new DownstreamToolFailure(
                `Failed to run ${DIAMOND_BINARY}: ${error.message}`,
                DIAMOND_BINARY,
                undefined,
                args.join(" ")
              )
          ),
          Effect.flatMap((exitCode) =>
            exitCode === 0
              ? Effect.void
              : Effect.fail(
                  new DownstreamToolFailure(
                    `${DIAMOND_BINARY} blastp exited with code ${exitCode}`,
                    DIAMOND_BINARY,
                    exitCode,
                    args.join(" ")
                  )
                )
          )
        );
      },
    }))
  );
