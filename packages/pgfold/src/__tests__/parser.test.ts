/**
 * DDL Parser Tests
 */
import { describe, it, expect } from "@effect/vitest"
import { SqlSyntaxError } from "../errors.js"
import { parseAll, parseOne } from "./fixtures/index.js"

describe("DdlParser", () => {
  describe("tables", () => {
    it("parses columns, inline constraints and table constraints", () => {
      const command = parseOne(
        "CREATE TABLE IF NOT EXISTS app.users (id serial PRIMARY KEY, email varchar(255) NOT NULL UNIQUE, CONSTRAINT users_email_check CHECK (email <> ''))",
      )
      expect(command.kind).toBe("create_table")
      if (command.kind !== "create_table") return
      expect(command.name).toEqual({ schema: "app", name: "users" })
      expect(command.ifNotExists).toBe(true)
      expect(command.columns.map(c => [c.name, c.dataType, c.serial, c.notNull])).toEqual([
        ["id", "integer", true, false],
        ["email", "varchar(255)", false, true],
      ])
      expect(command.columns[0]?.constraints.map(c => c.kind)).toEqual(["PRIMARY KEY"])
      expect(command.columns[1]?.constraints.map(c => c.kind)).toEqual(["UNIQUE"])
      expect(command.constraints).toHaveLength(1)
      expect(command.constraints[0]?.name).toBe("users_email_check")
      expect(command.constraints[0]?.check?.text).toBe("email <> ''")
    })

    it("stops a default at the next column constraint", () => {
      const command = parseOne("CREATE TABLE t (created_at timestamptz DEFAULT now() NOT NULL)")
      if (command.kind !== "create_table") throw new Error(command.kind)
      expect(command.columns[0]?.default?.text).toBe("now()")
      expect(command.columns[0]?.dataType).toBe("timestamptz")
      expect(command.columns[0]?.notNull).toBe(true)
    })

    it("ends a default at the comma before the next column", () => {
      const command = parseOne("CREATE TABLE t (a text DEFAULT 'x', b int NOT NULL, c int DEFAULT round(1.5, 1))")
      if (command.kind !== "create_table") throw new Error(command.kind)
      expect(command.columns.map(c => [c.name, c.default?.text, c.notNull])).toEqual([
        ["a", "'x'", false],
        ["b", undefined, true],
        ["c", "round(1.5, 1)", false],
      ])
    })

    it("reads identity and generated columns", () => {
      const command = parseOne(
        "CREATE TABLE t (id bigint GENERATED BY DEFAULT AS IDENTITY, total numeric GENERATED ALWAYS AS (price * qty) STORED)",
      )
      if (command.kind !== "create_table") throw new Error(command.kind)
      expect(command.columns[0]?.identity).toBe("BY DEFAULT")
      expect(command.columns[1]?.generated?.text).toBe("price * qty")
    })

    it("reads foreign key actions", () => {
      const command = parseOne(
        "CREATE TABLE t (a int, CONSTRAINT t_a_fk FOREIGN KEY (a) REFERENCES other (id) ON DELETE CASCADE DEFERRABLE INITIALLY DEFERRED)",
      )
      if (command.kind !== "create_table") throw new Error(command.kind)
      const fk = command.constraints[0]
      expect(fk?.references?.table).toEqual({ schema: "public", name: "other" })
      expect(fk?.references?.columns).toEqual(["id"])
      expect(fk?.references?.onDelete).toBe("CASCADE")
      expect(fk?.deferrable).toBe(true)
      expect(fk?.initiallyDeferred).toBe(true)
    })

    it("reports where an unfinished statement ends", () => {
      expect(() => parseOne("CREATE TABLE t (id int")).toThrow(SqlSyntaxError)
      expect(() => parseOne("CREATE TABLE t (id int")).toThrow(
        "Expected ')' but found 'end of statement' at test.sql:1:23",
      )
    })

    it("rejects table options it does not know", () => {
      expect(() => parseOne("CREATE TABLE t (id int) PARTITION BY RANGE (id)")).toThrow(
        "Unsupported table option 'PARTITION' at test.sql:1:25",
      )
    })
  })

  describe("ALTER TABLE", () => {
    it("parses several actions", () => {
      const command = parseOne(
        "ALTER TABLE ONLY users ADD COLUMN bio text, ALTER COLUMN email SET NOT NULL, ENABLE ROW LEVEL SECURITY",
      )
      if (command.kind !== "alter_table") throw new Error(command.kind)
      expect(command.actions.map(a => a.kind)).toEqual(["add_column", "set_not_null", "rls"])
    })

    it("ends an added column's default at the next action", () => {
      const command = parseOne("ALTER TABLE users ADD COLUMN bio text DEFAULT '', ADD COLUMN age int")
      if (command.kind !== "alter_table") throw new Error(command.kind)
      expect(command.actions.map(a => (a.kind === "add_column" ? [a.column.name, a.column.default?.text] : [a.kind]))).toEqual([
        ["bio", "''"],
        ["age", undefined],
      ])
    })

    it("reads ownership changes as a no-op action", () => {
      const command = parseOne("ALTER TABLE t OWNER TO admin")
      if (command.kind !== "alter_table") throw new Error(command.kind)
      expect(command.actions).toEqual([{ kind: "owner" }])
    })
  })

  describe("indexes", () => {
    it("parses an unnamed expression index", () => {
      const command = parseOne("CREATE UNIQUE INDEX ON users (lower(email))")
      if (command.kind !== "create_index") throw new Error(command.kind)
      expect(command.name).toBeUndefined()
      expect(command.unique).toBe(true)
      expect(command.method).toBe("btree")
      expect(command.elements).toEqual([{ expression: "lower(email)", opclass: undefined, descending: false, nulls: undefined }])
    })

    it("reads operator classes and ordering", () => {
      const command = parseOne("CREATE INDEX idx ON t USING gin (doc jsonb_path_ops, created_at DESC NULLS LAST)")
      if (command.kind !== "create_index") throw new Error(command.kind)
      expect(command.method).toBe("gin")
      expect(command.elements).toEqual([
        { expression: "doc", opclass: "jsonb_path_ops", descending: false, nulls: undefined },
        { expression: "created_at", opclass: undefined, descending: true, nulls: "LAST" },
      ])
    })
  })

  describe("routines", () => {
    it("parses a function with named parameters and defaults", () => {
      const command = parseOne(
        "CREATE OR REPLACE FUNCTION app.add(a integer, b int DEFAULT 1) RETURNS int LANGUAGE sql IMMUTABLE AS $$ SELECT a + b $$",
      )
      if (command.kind !== "create_function") throw new Error(command.kind)
      expect(command.orReplace).toBe(true)
      expect(command.def.name).toEqual({ schema: "app", name: "add" })
      expect(command.def.parameters).toEqual([
        { mode: "IN", name: "a", dataType: "integer", default: undefined },
        { mode: "IN", name: "b", dataType: "integer", default: "1" },
      ])
      expect(command.def.returns).toBe("integer")
      expect(command.def.language).toBe("sql")
      expect(command.def.volatility).toBe("IMMUTABLE")
      expect(command.def.body).toBe(" SELECT a + b ")
    })

    it("reads unnamed parameters and RETURNS TABLE", () => {
      const command = parseOne(
        "CREATE FUNCTION f(int, OUT total bigint) RETURNS TABLE (id int, name text) LANGUAGE plpgsql AS 'begin end'",
      )
      if (command.kind !== "create_function") throw new Error(command.kind)
      expect(command.def.parameters.map(p => [p.mode, p.name, p.dataType])).toEqual([
        ["IN", undefined, "integer"],
        ["OUT", "total", "bigint"],
      ])
      expect(command.def.returns).toBe("TABLE(id integer, name text)")
      expect(command.def.body).toBe("begin end")
    })

    it("requires a language", () => {
      expect(() => parseOne("CREATE FUNCTION f() RETURNS int AS $$ SELECT 1 $$")).toThrow("Missing LANGUAGE clause")
    })
  })

  describe("triggers and policies", () => {
    it("parses a row trigger", () => {
      const command = parseOne(
        "CREATE TRIGGER trg BEFORE UPDATE OF name ON users FOR EACH ROW EXECUTE FUNCTION touch()",
      )
      if (command.kind !== "create_trigger") throw new Error(command.kind)
      expect(command.timing).toBe("BEFORE")
      expect(command.events).toEqual(["UPDATE"])
      expect(command.updateColumns).toEqual(["name"])
      expect(command.level).toBe("ROW")
      expect(command.functionName).toBe("touch")
      expect(command.args).toEqual([])
    })

    it("stores trigger arguments as strings", () => {
      const command = parseOne("CREATE TRIGGER trg AFTER INSERT ON t EXECUTE PROCEDURE audit.log(orders, 'x')")
      if (command.kind !== "create_trigger") throw new Error(command.kind)
      expect(command.functionName).toBe("audit.log")
      expect(command.args).toEqual(["'orders'", "'x'"])
      expect(command.level).toBe("STATEMENT")
    })

    it("parses a policy with roles", () => {
      const command = parseOne(
        "CREATE POLICY p ON t FOR SELECT TO authenticated, public USING (owner = current_user)",
      )
      if (command.kind !== "create_policy") throw new Error(command.kind)
      expect(command.command).toBe("SELECT")
      expect(command.roles).toEqual(["authenticated", "PUBLIC"])
      expect(command.using?.text).toBe("owner = CURRENT_USER")
    })
  })

  describe("other statements", () => {
    it("parses enums, domains and sequences", () => {
      const [mood, positive, seq] = parseAll(
        "CREATE TYPE mood AS ENUM ('sad', 'happy');\nCREATE DOMAIN positive AS int CHECK (VALUE > 0);\nCREATE SEQUENCE s INCREMENT BY 2 NO MAXVALUE;",
      )
      expect(mood?.kind === "create_enum" && mood.values).toEqual(["sad", "happy"])
      expect(positive?.kind === "create_domain" && positive.constraints[0]?.check.text).toBe("VALUE > 0")
      expect(seq?.kind === "create_sequence" && seq.options).toEqual({ increment: "2", maxValue: null })
    })

    it("parses comments on columns", () => {
      const command = parseOne("COMMENT ON COLUMN users.email IS 'Login'")
      if (command.kind !== "comment") throw new Error(command.kind)
      expect(command.target).toEqual({ kind: "COLUMN", name: { schema: "public", name: "users" }, member: "email" })
      expect(command.text).toBe("Login")
    })

    it("skips session statements and extensions", () => {
      expect(parseOne("SET search_path = public")).toEqual({ kind: "skip", reason: "SET statement" })
      expect(parseOne("CREATE EXTENSION pgcrypto")).toEqual({ kind: "skip", reason: "CREATE EXTENSION" })
    })

    it("marks statements it does not model as unsupported", () => {
      expect(parseOne("INSERT INTO t VALUES (1)")).toEqual({ kind: "unsupported", reason: "INSERT INTO T" })
    })

    it("keeps where each statement came from", () => {
      const located = parseAll("SET x = 1;\n\nCREATE TABLE t (id int);")
      expect(located.map(c => c.location)).toEqual([
        { file: "test.sql", line: 1 },
        { file: "test.sql", line: 3 },
      ])
      expect(located[1]?.sql).toBe("CREATE TABLE t (id int)")
    })
  })
})
