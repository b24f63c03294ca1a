/**
 * Schema IR Builder Tests
 */
import { describe, it, expect } from "@effect/vitest"
import { Effect, Logger, LogLevel } from "effect"
import { DuplicateObject, ObjectNotFound, UnsupportedStatement } from "../errors.js"
import { buildSchema, chooseName, defaultConstraintName, defaultIndexName } from "../ir/builder.js"
import { build, parseAll } from "./fixtures/index.js"

const QuietLogger = Logger.minimumLogLevel(LogLevel.None)

const publicSchema = (sql: string, options: Parameters<typeof build>[1] = {}) => {
  const schema = build(sql, options).ir.schemas.get("public")
  if (schema === undefined) throw new Error("public schema missing")
  return schema
}

describe("naming", () => {
  it("picks the first free numbered name", () => {
    const taken = new Set(["t_check", "t_check1"])
    expect(chooseName("t_check", n => taken.has(n))).toBe("t_check2")
    expect(chooseName("free", n => taken.has(n))).toBe("free")
  })

  it("names constraints the way PostgreSQL does", () => {
    expect(defaultConstraintName("t", "PRIMARY KEY", ["id"])).toBe("t_pkey")
    expect(defaultConstraintName("t", "UNIQUE", ["a", "b"])).toBe("t_a_b_key")
    expect(defaultConstraintName("t", "FOREIGN KEY", ["owner_id"])).toBe("t_owner_id_fkey")
    expect(defaultConstraintName("t", "CHECK", ["qty"])).toBe("t_qty_check")
    expect(defaultConstraintName("t", "CHECK", ["a", "b"])).toBe("t_check")
  })

  it("names indexes after their columns or called function", () => {
    expect(defaultIndexName("t", [{ expression: "a" }, { expression: '"B"' }])).toBe("t_a_B_idx")
    expect(defaultIndexName("t", [{ expression: "lower(email)" }])).toBe("t_lower_idx")
    expect(defaultIndexName("t", [{ expression: "(a + b)" }])).toBe("t_expr_idx")
  })
})

describe("buildSchemaIR", () => {
  it("names unnamed constraints and resolves bare references to the primary key", () => {
    const table = publicSchema(
      "CREATE TABLE t (id int PRIMARY KEY, code text UNIQUE, parent int REFERENCES t, qty int CHECK (qty > 0));",
    ).tables.get("t")
    expect([...(table?.constraints.keys() ?? [])]).toEqual(["t_pkey", "t_code_key", "t_parent_fkey", "t_qty_check"])
    expect(table?.constraints.get("t_parent_fkey")?.references?.columns).toEqual(["id"])
    expect(table?.constraints.get("t_qty_check")?.columns).toEqual(["qty"])
  })

  it("gives serial columns an implicit owned sequence", () => {
    const schema = publicSchema("CREATE TABLE t (id serial);")
    expect(schema.sequences.get("t_id_seq")).toMatchObject({
      implicit: true,
      ownedBy: { schema: "public", table: "t", column: "id" },
    })
    expect(schema.tables.get("t")?.columns[0]).toMatchObject({ dataType: "integer", serial: true })
  })

  it("applies attachments once their target exists", () => {
    const result = build("CREATE INDEX i ON t (id);\nCREATE TABLE t (id int);")
    expect([...(result.ir.schemas.get("public")?.tables.get("t")?.indexes.keys() ?? [])]).toEqual(["i"])
    expect(result.timeline).toEqual([{ kind: "object", index: 1, ref: { kind: "table", schema: "public", key: "t" } }])
  })

  it("numbers unnamed indexes that collide", () => {
    const table = publicSchema("CREATE TABLE t (a int);\nCREATE INDEX ON t (a);\nCREATE INDEX ON t (a);").tables.get("t")
    expect([...(table?.indexes.keys() ?? [])]).toEqual(["t_a_idx", "t_a_idx1"])
  })

  it("fails on a duplicate relation", () => {
    expect(() => build("CREATE TABLE t (id int);\nCREATE TABLE t (id int);")).toThrow(DuplicateObject)
    expect(() => build("CREATE TABLE t (id int);\nCREATE TABLE t (id int);")).toThrow("relation public.t already exists")
  })

  it("lets IF NOT EXISTS pass over an existing table", () => {
    const schema = publicSchema("CREATE TABLE t (id int);\nCREATE TABLE IF NOT EXISTS t (other text);")
    expect(schema.tables.get("t")?.columns.map(c => c.name)).toEqual(["id"])
  })

  it("fails when an attachment's target never appears", () => {
    expect(() => build("CREATE INDEX ON missing (id);")).toThrow(ObjectNotFound)
    expect(() => build("CREATE INDEX ON missing (id);")).toThrow(
      "table public.missing not found (referenced at test.sql:1)",
    )
  })

  it("returns missing-target attachments when asked to detach them", () => {
    const result = build("CREATE INDEX ON missing (id);", { detachMissing: true })
    expect(result.timeline).toHaveLength(1)
    expect(result.timeline[0]?.kind).toBe("detached")
  })

  it("ignores ALTER TABLE IF EXISTS on an absent table", () => {
    expect(build("ALTER TABLE IF EXISTS gone ADD COLUMN x int;").timeline).toEqual([])
  })

  it("fails on unsupported statements in strict mode and passes them through otherwise", () => {
    expect(() => build("INSERT INTO t VALUES (1);")).toThrow(UnsupportedStatement)
    expect(() => build("INSERT INTO t VALUES (1);")).toThrow("Unsupported statement INSERT INTO T at test.sql:1")

    const result = build("INSERT INTO t VALUES (1);", { strict: false })
    expect(result.ir.passthrough).toEqual([{ sql: "INSERT INTO t VALUES (1)", file: "test.sql", line: 1 }])
    expect(result.timeline).toEqual([{ kind: "passthrough", index: 0, sql: "INSERT INTO t VALUES (1)" }])
  })

  it("inserts enum values relative to a neighbour", () => {
    const type = publicSchema(
      "CREATE TYPE mood AS ENUM ('sad', 'happy');\nALTER TYPE mood ADD VALUE 'ok' BEFORE 'happy';",
    ).types.get("mood")
    expect(type?.kind === "enum" && type.values).toEqual(["sad", "ok", "happy"])
  })

  it("numbers unnamed domain checks", () => {
    const type = publicSchema("CREATE DOMAIN qty AS int CHECK (VALUE > 0) CHECK (VALUE < 100);").types.get("qty")
    expect(type?.kind === "domain" && type.constraints.map(c => c.name)).toEqual(["qty_check", "qty_check1"])
  })

  it("keys overloaded functions by their argument types", () => {
    const schema = publicSchema(
      [
        "CREATE FUNCTION add(a int) RETURNS int LANGUAGE sql AS 'SELECT a';",
        "CREATE FUNCTION add(a int, b int) RETURNS int LANGUAGE sql AS 'SELECT a + b';",
      ].join("\n"),
    )
    expect([...schema.functions.keys()]).toEqual(["add(integer)", "add(integer, integer)"])
  })

  it("attaches comments to columns", () => {
    const schema = publicSchema("CREATE TABLE t (id int);\nCOMMENT ON COLUMN t.id IS 'Key';")
    expect(schema.tables.get("t")?.columns[0]?.comment).toBe("Key")
  })

  it("drops constraints and indexes with their column", () => {
    const table = publicSchema(
      "CREATE TABLE t (id int, code text UNIQUE);\nCREATE INDEX ON t (code);\nALTER TABLE t DROP COLUMN code;",
    ).tables.get("t")
    expect([...(table?.constraints.keys() ?? [])]).toEqual([])
    expect([...(table?.indexes.keys() ?? [])]).toEqual([])
  })
})

describe("buildSchema", () => {
  it.effect("fails with the tagged error", () =>
    Effect.gen(function* () {
      const error = yield* buildSchema(parseAll("CREATE TABLE t (id int);\nCREATE TABLE t (id int);"), {
        targetSchema: "public",
        strict: true,
      }).pipe(Effect.flip)
      expect(error).toBeInstanceOf(DuplicateObject)
      expect(error._tag).toBe("DuplicateObject")
    }).pipe(Effect.provide(QuietLogger))
  )

  it.effect("succeeds with the skipped statements", () =>
    Effect.gen(function* () {
      const result = yield* buildSchema(parseAll("SET x = 1;\nCREATE TABLE t (id int);"), {
        targetSchema: "public",
        strict: true,
      })
      expect(result.skipped.map(c => c.kind)).toEqual(["skip"])
      expect(result.ir.schemas.get("public")?.tables.has("t")).toBe(true)
    }).pipe(Effect.provide(QuietLogger))
  )
})
