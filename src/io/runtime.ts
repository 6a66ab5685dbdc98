/**
 * Effect platform layer and the Promise boundary around it
 *
 * Every file and process operation in this package is an Effect program
 * that needs the Node platform services (FileSystem, Path,
 * CommandExecutor). Public functions stay Promise-based and run their
 * programs through {@link runWithPlatform}.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit } from "effect";

/**
 * Platform layer providing FileSystem, Path and CommandExecutor
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run an Effect program to a Promise
 *
 * Failures reject with the program's own error value rather than a fiber
 * wrapper, so callers can match on `instanceof ConfigurationError` and
 * friends.
 *
 * @example
 * ```typescript
 * const text = await runPromise(
 *   Effect.gen(function* () {
 *     const fs = yield* FileSystem.FileSystem;
 *     return yield* fs.readFileString(path);
 *   })
 * );
 * ```
 */
export async function runPromise<A, E>(program: Effect.Effect<A, E, never>): Promise<A> {
  const exit = await Effect.runPromiseExit(program);
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}

/**
 * Provide the Node platform to a program and run it
 */
export function runWithPlatform<A, E>(
  program: Effect.Effect<A, E, NodeContext.NodeContext>
): Promise<A> {
  return runPromise(program.pipe(Effect.provide(getPlatform())));
}
