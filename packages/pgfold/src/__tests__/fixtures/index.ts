/**
 * Test fixtures for pgfold
 *
 * Schema trees on disk for the pipeline tests, and helpers that take SQL
 * text straight to commands or IR.
 */
import { fileURLToPath } from "node:url"
import { join } from "node:path"
import { FileSystem, Path } from "@effect/platform"
import { Effect } from "effect"
import { buildSchemaIR, type BuildOptions, type BuildResult } from "../../ir/builder.js"
import type { Command, Located } from "../../sql/ast.js"
import { parseStatement, parseStatements } from "../../sql/parser.js"
import { splitStatements } from "../../sql/statements.js"

const fixturesDir = fileURLToPath(new URL(".", import.meta.url))

/** Absolute path of a file below the fixtures directory */
export const fixturePath = (...parts: string[]): string => join(fixturesDir, ...parts)

/** Parse the first statement of `sql` */
export const parseOne = (sql: string, targetSchema = "public"): Command => {
  const statement = splitStatements(sql, "test.sql").statements[0]
  if (statement === undefined) throw new Error("no statement in test SQL")
  return parseStatement(statement, { targetSchema })
}

export const parseAll = (sql: string, targetSchema = "public"): Located[] =>
  parseStatements(splitStatements(sql, "test.sql").statements, { targetSchema })

/** Parse and build in one go, strict and targeting public unless told otherwise */
export const build = (sql: string, options: Partial<BuildOptions> = {}): BuildResult => {
  const targetSchema = options.targetSchema ?? "public"
  return buildSchemaIR(parseAll(sql, targetSchema), { strict: true, ...options, targetSchema })
}

/**
 * Write `files` (relative path to content) into a fresh temp directory, run
 * `use` on it and remove it afterwards.
 */
export const withSchemaTree = <A, E, R>(
  files: Readonly<Record<string, string>>,
  use: (dir: string) => Effect.Effect<A, E, R>,
) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const pathSvc = yield* Path.Path
    return yield* Effect.acquireUseRelease(
      fs.makeTempDirectory({ prefix: "pgfold-test-" }),
      dir =>
        Effect.gen(function* () {
          for (const [name, content] of Object.entries(files)) {
            const file = pathSvc.join(dir, name)
            yield* fs.makeDirectory(pathSvc.dirname(file), { recursive: true })
            yield* fs.writeFileString(file, content)
          }
          return yield* use(dir)
        }),
      dir => fs.remove(dir, { recursive: true }).pipe(Effect.orDie),
    )
  })
