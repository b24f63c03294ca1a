/**
 * Include Resolver Tests
 *
 * Expands schema trees written to a temp directory.
 */
import { describe, it, expect } from "@effect/vitest"
import { Effect, Layer } from "effect"
import { Path } from "@effect/platform"
import { NodeFileSystem, NodePath } from "@effect/platform-node"
import { expandFile, expandText } from "../services/include-resolver.js"
import { withSchemaTree } from "./fixtures/index.js"

const TestLayer = Layer.merge(NodeFileSystem.layer, NodePath.layer)

describe("expandFile", () => {
  it.effect("replaces a file include with the file's text", () =>
    withSchemaTree(
      {
        "schema.sql": "-- top\n\\i tables/users.sql\nCREATE VIEW v AS SELECT 1;\n",
        "tables/users.sql": "CREATE TABLE users (id int);",
      },
      dir =>
        Effect.gen(function* () {
          const pathSvc = yield* Path.Path
          const expanded = yield* expandFile(pathSvc.join(dir, "schema.sql"))
          expect(expanded.text).toBe("-- top\nCREATE TABLE users (id int);\nCREATE VIEW v AS SELECT 1;\n")
          expect(expanded.files).toEqual([pathSvc.join(dir, "schema.sql"), pathSvc.join(dir, "tables", "users.sql")])
          expect(expanded.root.segments.map(s => [s.kind, s.line])).toEqual([
            ["text", 1],
            ["include", 2],
            ["text", 3],
          ])
        }),
    ).pipe(Effect.provide(TestLayer))
  )

  it.effect("includes every .sql file below a folder in sorted order", () =>
    withSchemaTree(
      {
        "schema.sql": "\\i tables/\n",
        "tables/b.sql": "-- b",
        "tables/a.sql": "-- a\n",
        "tables/notes.txt": "not sql\n",
        "tables/sub/c.sql": "-- c\n",
      },
      dir =>
        Effect.gen(function* () {
          const pathSvc = yield* Path.Path
          const expanded = yield* expandFile(pathSvc.join(dir, "schema.sql"))
          expect(expanded.text).toBe("-- a\n-- b\n-- c\n")
          expect(expanded.files.map(f => pathSvc.relative(dir, f))).toEqual([
            "schema.sql",
            pathSvc.join("tables", "a.sql"),
            pathSvc.join("tables", "b.sql"),
            pathSvc.join("tables", "sub", "c.sql"),
          ])
        }),
    ).pipe(Effect.provide(TestLayer))
  )

  it.effect("resolves nested includes relative to the including file", () =>
    withSchemaTree(
      {
        "schema.sql": "\\i app/all.sql\n",
        "app/all.sql": "\\i users.sql\n",
        "app/users.sql": "CREATE TABLE users (id int);\n",
      },
      dir =>
        Effect.gen(function* () {
          const pathSvc = yield* Path.Path
          const expanded = yield* expandFile(pathSvc.join(dir, "schema.sql"))
          expect(expanded.text).toBe("CREATE TABLE users (id int);\n")
        }),
    ).pipe(Effect.provide(TestLayer))
  )

  it.effect("includes a file reached from two branches each time", () =>
    withSchemaTree(
      {
        "schema.sql": "\\i a.sql\n\\i b.sql\n",
        "a.sql": "\\i common.sql\n-- a\n",
        "b.sql": "\\i common.sql\n-- b\n",
        "common.sql": "-- common\n",
      },
      dir =>
        Effect.gen(function* () {
          const pathSvc = yield* Path.Path
          const expanded = yield* expandFile(pathSvc.join(dir, "schema.sql"))
          expect(expanded.text).toBe("-- common\n-- a\n-- common\n-- b\n")
          expect(expanded.files.map(f => pathSvc.relative(dir, f))).toEqual([
            "schema.sql",
            "a.sql",
            "common.sql",
            "b.sql",
            "common.sql",
          ])
        }),
    ).pipe(Effect.provide(TestLayer))
  )

  it.effect("drops the directive line of an include that yields nothing", () =>
    withSchemaTree(
      {
        "schema.sql": "A\n\\i empty.sql\n\\i none/\nB\n",
        "empty.sql": "",
        "none/notes.txt": "not sql\n",
      },
      dir =>
        Effect.gen(function* () {
          const pathSvc = yield* Path.Path
          const expanded = yield* expandFile(pathSvc.join(dir, "schema.sql"))
          expect(expanded.text).toBe("A\nB\n")
        }),
    ).pipe(Effect.provide(TestLayer))
  )

  it.effect("fails on an include cycle", () =>
    withSchemaTree({ "a.sql": "\\i b.sql\n", "b.sql": "\\i a.sql\n" }, dir =>
      Effect.gen(function* () {
        const pathSvc = yield* Path.Path
        const a = pathSvc.join(dir, "a.sql")
        const b = pathSvc.join(dir, "b.sql")
        const error = yield* expandFile(a).pipe(Effect.flip)
        expect(error._tag).toBe("IncludeCycle")
        if (error._tag !== "IncludeCycle") return
        expect(error.chain).toEqual([a, b, a])
        expect(error.message).toBe(`Include cycle: ${a} -> ${b} -> ${a}`)
      }),
    ).pipe(Effect.provide(TestLayer))
  )

  it.effect("fails on a missing file with where it was included", () =>
    withSchemaTree({ "schema.sql": "-- x\n\\i missing.sql\n" }, dir =>
      Effect.gen(function* () {
        const pathSvc = yield* Path.Path
        const schema = pathSvc.join(dir, "schema.sql")
        const error = yield* expandFile(schema).pipe(Effect.flip)
        expect(error._tag).toBe("IncludeNotFound")
        expect(error.message).toBe(`Included file missing.sql not found (included from ${schema}:2)`)
      }),
    ).pipe(Effect.provide(TestLayer))
  )

  it.effect("refuses paths that leave the schema directory", () =>
    withSchemaTree({ "schema.sql": "\\i ../outside.sql\n" }, dir =>
      Effect.gen(function* () {
        const pathSvc = yield* Path.Path
        const schema = pathSvc.join(dir, "schema.sql")
        const error = yield* expandFile(schema).pipe(Effect.flip)
        expect(error._tag).toBe("IncludeOutsideBase")
        expect(error.message).toBe(`Include path ../outside.sql in ${schema} may not contain '..'`)
      }),
    ).pipe(Effect.provide(TestLayer))
  )

  it.effect("tells files and folders apart by the trailing slash", () =>
    withSchemaTree(
      {
        "folder.sql": "\\i tables\n",
        "file.sql": "\\i users.sql/\n",
        "users.sql": "CREATE TABLE users (id int);\n",
        "tables/a.sql": "-- a\n",
      },
      dir =>
        Effect.gen(function* () {
          const pathSvc = yield* Path.Path
          const folder = yield* expandFile(pathSvc.join(dir, "folder.sql")).pipe(Effect.flip)
          expect(folder._tag === "IncludeKindMismatch" && folder.expected).toBe("file")
          const file = yield* expandFile(pathSvc.join(dir, "file.sql")).pipe(Effect.flip)
          expect(file._tag === "IncludeKindMismatch" && file.expected).toBe("directory")
        }),
    ).pipe(Effect.provide(TestLayer))
  )
})

describe("expandText", () => {
  it.effect("resolves includes against the given directory", () =>
    withSchemaTree({ "types.sql": "CREATE TYPE mood AS ENUM ('ok');\n" }, dir =>
      Effect.gen(function* () {
        const expanded = yield* expandText("\\i types.sql\n-- after\n", dir)
        expect(expanded.text).toBe("CREATE TYPE mood AS ENUM ('ok');\n-- after\n")
        expect(expanded.files).toHaveLength(2)
      }),
    ).pipe(Effect.provide(TestLayer))
  )
})
