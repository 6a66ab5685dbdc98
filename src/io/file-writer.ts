/**
 * File writing operations using Effect Platform
 *
 * Promise-based APIs over the platform FileSystem. Outputs that other
 * processes may read concurrently (completion records, the sample
 * manifest) go through {@link writeStringAtomic} so a reader sees either
 * the previous content or the complete new content, never a prefix.
 *
 * @module file-writer
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import { runPromise, runWithPlatform } from "./runtime";

let tempCounter = 0;

/**
 * Handle for writing to a file multiple times within a scope
 *
 * The file is closed when the callback completes or throws.
 */
export interface FileWriteHandle {
  writeString(content: string): Promise<void>;
}

/**
 * Write string to file by writing a sibling temp file and renaming it
 * over the destination
 *
 * Rename within one directory is atomic on POSIX filesystems, including
 * the shared filesystems cluster jobs write to.
 *
 * @throws {FileError} When the write or rename fails; the temp file is removed
 */
export async function writeStringAtomic(path: string, content: string): Promise<void> {
  const data = new TextEncoder().encode(content);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;

    tempCounter += 1;
    const tempPath = pathService.join(
      pathService.dirname(path),
      `.${pathService.basename(path)}.${process.pid}.${Date.now()}.${tempCounter}.tmp`
    );

    yield* fs.writeFile(tempPath, data).pipe(
      Effect.mapError((error) => FileError.fromSystemError("write", tempPath, error))
    );
    yield* fs.rename(tempPath, path).pipe(
      Effect.mapError((error) => FileError.fromSystemError("rename", path, error)),
      Effect.tapError(() => fs.remove(tempPath).pipe(Effect.ignore))
    );
  });

  await runWithPlatform(program);
}

/**
 * Open file for writing and execute callback with write handle
 *
 * @example
 * ```typescript
 * await openForWriting("target_dna_sequences.fa", async (handle) => {
 *   for (const read of reads) {
 *     await handle.writeString(`>${read.id}\n${read.sequence}\n`);
 *   }
 * });
 * ```
 *
 * @returns The callback's return value
 * @throws {FileError} When file operations fail
 */
export async function openForWriting<T>(
  path: string,
  callback: (handle: FileWriteHandle) => Promise<T>
): Promise<T> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const file = yield* fs
      .open(path, { flag: "w", mode: 0o644 })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("write", path, error)));

    const handle: FileWriteHandle = {
      writeString: (content) =>
        runPromise(
          file
            .writeAll(new TextEncoder().encode(content))
            .pipe(Effect.mapError((error) => FileError.fromSystemError("write", path, error)))
        ),
    };

    return yield* Effect.promise(() => callback(handle));
  });

  return runWithPlatform(program.pipe(Effect.scoped));
}

/**
 * Recursively delete a directory. Missing directories are not an error.
 */
export async function removeDirectory(path: string): Promise<void> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (yield* fs.exists(path)) {
      yield* fs.remove(path, { recursive: true });
    }
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("remove", path, error)));

  await runWithPlatform(program);
}

/**
 * Create a directory and any missing parents
 */
export async function ensureDirectory(path: string): Promise<void> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.makeDirectory(path, { recursive: true });
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("write", path, error)));

  await runWithPlatform(program);
}
