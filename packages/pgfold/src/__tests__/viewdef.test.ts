/**
 * View Definition Formatter Tests
 */
import { describe, it, expect } from "@effect/vitest"
import { tokenize } from "../sql/lexer.js"
import { formatViewDefinition } from "../sql/viewdef.js"

const view = (sql: string) => formatViewDefinition(tokenize(sql), { targetSchema: "public" })

describe("formatViewDefinition", () => {
  it("lays out a select the way stored view definitions print", () => {
    const result = view(
      "SELECT u.id, u.name AS n FROM public.users AS u INNER JOIN orders o ON (u.id = o.user_id) WHERE u.active GROUP BY u.id, u.name",
    )
    expect(result.text).toBe(
      [
        " SELECT u.id,",
        "    u.name AS n",
        "   FROM users u",
        "     JOIN orders o ON u.id = o.user_id",
        "  WHERE u.active",
        "  GROUP BY u.id, u.name",
      ].join("\n"),
    )
    expect(result.relations).toEqual(["users", "orders"])
  })

  it("writes LEFT OUTER JOIN as LEFT JOIN", () => {
    const result = view("select a.x from a left outer join b using (x)")
    expect(result.text).toBe(" SELECT a.x\n   FROM a\n     LEFT JOIN b USING (x)")
  })

  it("puts set operators on their own line", () => {
    const result = view("SELECT a FROM t UNION ALL SELECT a FROM s")
    expect(result.text).toBe(" SELECT a\n   FROM t\nUNION ALL\n SELECT a\n   FROM s")
    expect(result.relations).toEqual(["t", "s"])
  })

  it("keeps queries it cannot lay out on one line", () => {
    const result = view("WITH x AS (SELECT 1) SELECT * FROM x")
    expect(result.text).toBe(" WITH x AS (SELECT 1) SELECT * FROM x")
    expect(result.relations).toEqual(["x"])
  })

  it("strips parentheses around the whole query", () => {
    expect(view("(SELECT 1)").text).toBe(" SELECT 1")
  })

  it("collects the functions the query calls", () => {
    expect(view("SELECT count(*) AS total, max(created_at) FROM events").calls).toEqual(["count", "max"])
  })
})
