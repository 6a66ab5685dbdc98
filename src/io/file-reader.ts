/**
 * File reading utilities
 *
 * Promise-based wrappers over the Effect platform FileSystem. Gzip inputs
 * are decompressed transparently based on their extension.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Stream } from "effect";
import { CompressionDetector, wrapStream } from "../compression";
import { FileError } from "../errors";
import type { FilePath, FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { runWithPlatform } from "./runtime";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  bufferSize: 65536,
  autoDecompress: true,
  compressionFormat: "none",
};

/**
 * Check if a regular file exists
 *
 * @throws {FileError} If path validation fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("stat", validatedPath, error)));

  return runWithPlatform(program);
}

/**
 * Check if a directory exists
 */
export async function directoryExists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "Directory";
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("stat", validatedPath, error)));

  return runWithPlatform(program);
}

/**
 * Get file size in bytes
 *
 * @throws {FileError} If file cannot be accessed or doesn't exist
 */
export async function getSize(path: string): Promise<number> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);
    return Number(info.size);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("stat", validatedPath, error)));

  return runWithPlatform(program);
}

/**
 * True when the path is a regular file with at least one byte
 */
export async function isNonEmpty(path: string): Promise<boolean> {
  if (!(await exists(path))) return false;
  return (await getSize(path)) > 0;
}

/**
 * Create a streaming reader for a file
 *
 * @example
 * ```typescript
 * const stream = await createStream("reads/S1.fastq.gz");
 * for await (const line of readLines(stream)) { ... }
 * ```
 *
 * @throws {FileError} If file cannot be opened or read
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  if (!(await exists(validatedPath))) {
    throw new FileError("File does not exist or is not accessible", validatedPath, "read");
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const effectStream = fs.stream(validatedPath, {
      chunkSize: FileSystem.Size(mergedOptions.bufferSize),
    });
    return Stream.toReadableStream(effectStream);
  });

  const stream = await runWithPlatform(program);

  if (!mergedOptions.autoDecompress) {
    return stream;
  }

  const format =
    mergedOptions.compressionFormat === "none"
      ? CompressionDetector.fromExtension(validatedPath)
      : mergedOptions.compressionFormat;

  return format === "gzip" ? wrapStream(stream) : stream;
}

/**
 * Read entire file to string
 *
 * Gzip files are decompressed first, so this works for both `S1.fa` and
 * `S1.fa.gz`.
 *
 * @throws {FileError} If file cannot be read
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  const compressed =
    mergedOptions.autoDecompress &&
    (mergedOptions.compressionFormat === "gzip" ||
      CompressionDetector.fromExtension(validatedPath) === "gzip");

  if (compressed) {
    const stream = await createStream(validatedPath, mergedOptions);
    return decodeStream(stream);
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFileString(validatedPath);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("read", validatedPath, error)));

  return runWithPlatform(program);
}

/**
 * List the entry names of a directory, sorted by name
 *
 * @throws {FileError} If the directory cannot be read
 */
export async function listDirectory(path: string): Promise<string[]> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const entries = yield* fs.readDirectory(validatedPath);
    return [...entries].sort();
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("list", validatedPath, error)));

  return runWithPlatform(program);
}

export const FileReader = {
  exists,
  directoryExists,
  getSize,
  isNonEmpty,
  createStream,
  readToString,
  listDirectory,
} as const;

/**
 * Validate file path using ArkType and return branded type
 */
function validatePath(path: string): FilePath {
  let validationResult: ReturnType<typeof FilePathSchema>;
  try {
    validationResult = FilePathSchema(path);
  } catch (error) {
    throw new FileError(
      `Invalid file path: ${error instanceof Error ? error.message : String(error)}`,
      path,
      "stat"
    );
  }
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

async function decodeStream(stream: ReadableStream<Uint8Array>): Promise<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let text = "";
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      text += decoder.decode(value, { stream: true });
    }
    return text + decoder.decode();
  } finally {
    reader.releaseLock();
  }
}

function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const merged = { ...DEFAULT_OPTIONS, ...options };

  const validationResult = FileReaderOptionsSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return merged;
}
