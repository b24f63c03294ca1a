/**
 * Fold Tests
 */
import { describe, it, expect } from "@effect/vitest"
import { DuplicateObject } from "../errors.js"
import { foldText } from "../dump/fold.js"
import type { FileSegment } from "../services/include-resolver.js"

const file = (path: string, text: string): FileSegment => ({
  kind: "file",
  path,
  segments: [{ kind: "text", file: path, line: 1, text }],
})

const fold = (root: FileSegment) => foldText(root, { targetSchema: "public", strict: true, comments: false })

describe("foldText", () => {
  it("keeps comment blocks above the canonical form of what follows them", () => {
    const text = [
      "-- Types",
      "CREATE TYPE mood AS ENUM ('sad', 'happy');",
      "",
      "-- Users",
      "create table users (id serial primary key, mood mood);",
      "create index on users (mood);",
      "",
    ].join("\n")
    expect(fold(file("schema.sql", text))).toBe(
      [
        "-- Types",
        "CREATE TYPE mood AS ENUM (",
        "    'sad',",
        "    'happy'",
        ");",
        "",
        "-- Users",
        "CREATE TABLE IF NOT EXISTS users (",
        "    id integer PRIMARY KEY,",
        "    mood mood",
        ");",
        "",
        "CREATE INDEX IF NOT EXISTS users_mood_idx ON users (mood);",
        "",
      ].join("\n"),
    )
  })

  it("writes an object header under the comment block when asked", () => {
    const text = "-- Include sequences (may be used by tables)\nCREATE SEQUENCE global_id_seq START WITH 1000;\n"
    expect(foldText(file("schema.sql", text), { targetSchema: "public", strict: true, comments: true })).toBe(
      [
        "-- Include sequences (may be used by tables)",
        "--",
        "-- Name: global_id_seq; Type: SEQUENCE; Schema: -; Owner: -",
        "--",
        "",
        "CREATE SEQUENCE IF NOT EXISTS global_id_seq;",
        "",
      ].join("\n"),
    )
  })

  it("writes attachments to objects from other runs on their own", () => {
    const text = "-- Lookups\ncreate index on users (lower(email));\n"
    expect(fold(file("indexes.sql", text))).toBe(
      "-- Lookups\nCREATE INDEX IF NOT EXISTS users_lower_idx ON users (lower(email));\n",
    )
  })

  it("keeps a comment after the last statement", () => {
    expect(fold(file("schema.sql", "create table t (id int);\n-- end\n"))).toBe(
      "CREATE TABLE IF NOT EXISTS t (\n    id integer\n);\n\n-- end\n",
    )
  })

  it("folds included files in place of their directive", () => {
    const root: FileSegment = {
      kind: "file",
      path: "/schema/main.sql",
      segments: [
        { kind: "text", file: "/schema/main.sql", line: 1, text: "-- Main\ncreate table a (id int);\n" },
        {
          kind: "include",
          file: "/schema/main.sql",
          line: 3,
          directive: "\\i b.sql",
          target: "b.sql",
          lineBreak: true,
          files: [file("/schema/b.sql", "-- B\ncreate table b (id int);\n")],
        },
      ],
    }
    expect(fold(root)).toBe(
      [
        "-- Main",
        "CREATE TABLE IF NOT EXISTS a (",
        "    id integer",
        ");",
        "",
        "-- B",
        "CREATE TABLE IF NOT EXISTS b (",
        "    id integer",
        ");",
        "",
      ].join("\n"),
    )
  })

  it("returns nothing for a file without statements or comments", () => {
    expect(fold(file("empty.sql", "\n\n"))).toBe("")
  })

  it("fails on a duplicate inside one run", () => {
    expect(() => fold(file("schema.sql", "create table t (id int);\ncreate table t (id int);\n"))).toThrow(DuplicateObject)
  })
})
