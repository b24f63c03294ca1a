/**
 * File Writer
 *
 * Writes rendered SQL files below an output directory, creating
 * directories as needed.
 */
import { FileSystem, Path } from "@effect/platform";
import { Effect } from "effect";
import { WriteFailed } from "../errors.js";

export interface OutputFile {
  /** Path relative to the output directory */
  readonly path: string;
  readonly content: string;
}

export interface WriteResult {
  readonly path: string;
  readonly written: boolean;
  readonly reason?: "dry-run";
}

export interface WriteOptions {
  readonly outputDir: string;
  readonly dryRun?: boolean;
}

export interface FileWriter {
  readonly writeAll: (
    files: readonly OutputFile[],
    options: WriteOptions,
  ) => Effect.Effect<readonly WriteResult[], WriteFailed, FileSystem.FileSystem | Path.Path>;
}

/**
 * Write `content` to `file`, creating its directory.
 */
export const writeFile = (
  file: string,
  content: string,
): Effect.Effect<void, WriteFailed, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathSvc = yield* Path.Path;
    yield* fs.makeDirectory(pathSvc.dirname(file), { recursive: true }).pipe(
      Effect.zipRight(fs.writeFileString(file, content)),
      Effect.mapError(cause => new WriteFailed({ message: `Failed to write ${file}`, path: file, cause })),
    );
  });

export function createFileWriter(): FileWriter {
  return {
    writeAll: (files, options) =>
      Effect.gen(function* () {
        const pathSvc = yield* Path.Path;
        const results: WriteResult[] = [];
        for (const file of files) {
          const target = pathSvc.join(options.outputDir, file.path);
          if (options.dryRun === true) {
            results.push({ path: target, written: false, reason: "dry-run" });
            continue;
          }
          yield* writeFile(target, file.content);
          results.push({ path: target, written: true });
        }
        return results;
      }),
  };
}
