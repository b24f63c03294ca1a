/**
 * File Writer Tests
 *
 * Writes to a real temp directory.
 */
import { it, describe, expect } from "@effect/vitest"
import { Effect, Layer } from "effect"
import { FileSystem, Path } from "@effect/platform"
import { NodeFileSystem, NodePath } from "@effect/platform-node"
import { createFileWriter, type OutputFile } from "../services/file-writer.js"

const TestLayer = Layer.merge(NodeFileSystem.layer, NodePath.layer)

describe("FileWriter", () => {
  it.effect("writes files below the output directory", () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem
      const pathSvc = yield* Path.Path
      const tmpDir = yield* fs.makeTempDirectory({ prefix: "pgfold-writer-" })
      const files: OutputFile[] = [
        { path: "schema.sql", content: "\\i tables/users.sql\n" },
        { path: "tables/users.sql", content: "CREATE TABLE IF NOT EXISTS users (\n    id integer\n);\n" },
      ]

      try {
        const results = yield* createFileWriter().writeAll(files, { outputDir: tmpDir })

        expect(results).toEqual([
          { path: pathSvc.join(tmpDir, "schema.sql"), written: true },
          { path: pathSvc.join(tmpDir, "tables/users.sql"), written: true },
        ])
        const content = yield* fs.readFileString(pathSvc.join(tmpDir, "tables", "users.sql"))
        expect(content).toBe("CREATE TABLE IF NOT EXISTS users (\n    id integer\n);\n")
      } finally {
        yield* fs.remove(tmpDir, { recursive: true })
      }
    }).pipe(Effect.provide(TestLayer))
  )

  it.effect("writes nothing on a dry run", () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem
      const pathSvc = yield* Path.Path
      const tmpDir = yield* fs.makeTempDirectory({ prefix: "pgfold-writer-" })

      try {
        const results = yield* createFileWriter().writeAll([{ path: "a/b.sql", content: "-- b\n" }], {
          outputDir: tmpDir,
          dryRun: true,
        })

        expect(results).toEqual([{ path: pathSvc.join(tmpDir, "a/b.sql"), written: false, reason: "dry-run" }])
        expect(yield* fs.exists(pathSvc.join(tmpDir, "a"))).toBe(false)
      } finally {
        yield* fs.remove(tmpDir, { recursive: true })
      }
    }).pipe(Effect.provide(TestLayer))
  )
})
