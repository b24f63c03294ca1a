/**
 * Lexer and Statement Splitter Tests
 */
import { describe, it, expect } from "@effect/vitest"
import { SqlSyntaxError } from "../errors.js"
import { tokenize } from "../sql/lexer.js"
import { splitStatements } from "../sql/statements.js"

describe("Lexer", () => {
  it("folds unquoted words and keeps quoted identifiers as written", () => {
    const tokens = tokenize('SELECT "Name" FROM Users')
    expect(tokens.map(t => t.kind)).toEqual(["word", "quoted", "word", "word"])
    expect(tokens.map(t => t.value)).toEqual(["select", "Name", "from", "users"])
    expect(tokens[3]?.text).toBe("Users")
  })

  it("unescapes doubled quotes in strings", () => {
    const [token] = tokenize("'it''s'")
    expect(token?.kind).toBe("string")
    expect(token?.value).toBe("it's")
  })

  it("keeps the body of a dollar-quoted string", () => {
    const [token] = tokenize("$fn$ SELECT 'x'; $fn$")
    expect(token?.kind).toBe("dollar")
    expect(token?.value).toBe(" SELECT 'x'; ")
  })

  it("does not let an operator swallow a trailing minus", () => {
    expect(tokenize("a<=-1").map(t => t.value)).toEqual(["a", "<=", "-", "1"])
  })

  it("reads a psql meta-command up to the end of the line", () => {
    const [meta, next] = tokenize("\\i tables/users.sql  \nCREATE")
    expect(meta?.kind).toBe("meta")
    expect(meta?.value).toBe("\\i tables/users.sql")
    expect(next?.line).toBe(2)
  })

  it("reports the position of an unterminated string", () => {
    expect(() => tokenize("SELECT 'abc", "x.sql")).toThrow(SqlSyntaxError)
    expect(() => tokenize("SELECT 'abc", "x.sql")).toThrow("Unterminated string literal at x.sql:1:8")
  })

  it("rejects an unterminated block comment", () => {
    expect(() => tokenize("/* open /* nested */")).toThrow("Unterminated block comment at <input>:1:1")
  })
})

describe("splitStatements", () => {
  it("cuts at semicolons and keeps the text in front of each statement", () => {
    const { statements, trailing } = splitStatements(
      "CREATE TABLE a (id int);\n-- note\nCREATE TABLE b (x text);\n-- tail\n",
      "schema.sql",
    )
    expect(statements.map(s => s.text)).toEqual(["CREATE TABLE a (id int)", "CREATE TABLE b (x text)"])
    expect(statements.map(s => s.line)).toEqual([1, 3])
    expect(statements.map(s => s.leading)).toEqual(["", "\n-- note\n"])
    expect(statements[1]?.file).toBe("schema.sql")
    expect(trailing).toBe("\n-- tail\n")
  })

  it("ignores semicolons inside strings and dollar quotes", () => {
    const { statements } = splitStatements(
      "INSERT INTO t VALUES ('a;b');\nCREATE FUNCTION f() RETURNS int AS $$ SELECT 1; $$ LANGUAGE sql;",
    )
    expect(statements.map(s => s.text)).toEqual([
      "INSERT INTO t VALUES ('a;b')",
      "CREATE FUNCTION f() RETURNS int AS $$ SELECT 1; $$ LANGUAGE sql",
    ])
  })

  it("takes a statement without a final semicolon", () => {
    const { statements, trailing } = splitStatements("SELECT 1")
    expect(statements.map(s => s.text)).toEqual(["SELECT 1"])
    expect(trailing).toBe("")
  })

  it("makes a meta-command a statement of its own", () => {
    const { statements } = splitStatements("\\set ON_ERROR_STOP on\nCREATE TABLE t (id int);")
    expect(statements).toHaveLength(2)
    expect(statements[0]?.tokens[0]?.kind).toBe("meta")
    expect(statements[1]?.text).toBe("CREATE TABLE t (id int)")
    expect(statements[1]?.line).toBe(2)
  })

  it("drops comments from statement tokens", () => {
    const { statements } = splitStatements("CREATE TABLE t ( -- the key\n  id int\n);")
    expect(statements[0]?.tokens.some(t => t.kind === "comment")).toBe(false)
    expect(statements[0]?.text).toBe("CREATE TABLE t ( -- the key\n  id int\n)")
  })
})
