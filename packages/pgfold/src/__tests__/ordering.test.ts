/**
 * Dependency Ordering and Ignore Rule Tests
 */
import { describe, it, expect } from "@effect/vitest"
import { emptyIgnoreRules, globToRegExp, isIgnored, matchesAny } from "../ir/ignore.js"
import { topologicalSort } from "../ir/topological.js"

describe("topologicalSort", () => {
  it("puts dependencies first and breaks ties by name", () => {
    expect(topologicalSort(["c", "b", "a"], n => (n === "a" ? ["c"] : []))).toEqual(["b", "c", "a"])
  })

  it("breaks a cycle at the smallest name", () => {
    const deps: Record<string, string[]> = { a: ["b"], b: ["a"], c: [] }
    expect(topologicalSort(["a", "b", "c"], n => deps[n] ?? [])).toEqual(["c", "a", "b"])
  })

  it("ignores self references and unknown nodes", () => {
    expect(topologicalSort(["x"], () => ["x", "y"])).toEqual(["x"])
  })
})

describe("ignore rules", () => {
  it("turns globs into anchored expressions", () => {
    expect(globToRegExp("tmp_*").test("tmp_a")).toBe(true)
    expect(globToRegExp("user?").test("users")).toBe(true)
    expect(globToRegExp("a.b").test("axb")).toBe(false)
    expect(globToRegExp("log").test("audit_log")).toBe(false)
  })

  it("lets negated patterns win whatever their order", () => {
    expect(matchesAny(["!audit_log", "*_log"], "audit_log")).toBe(false)
    expect(matchesAny(["*_log", "!audit_log"], "app_log")).toBe(true)
    expect(matchesAny(["!audit_log"], "other")).toBe(false)
    expect(matchesAny([], "anything")).toBe(false)
  })

  it("checks the patterns of one kind only", () => {
    const rules = { ...emptyIgnoreRules, functions: ["_*"] }
    expect(isIgnored(rules, "functions", "_private")).toBe(true)
    expect(isIgnored(rules, "tables", "_private")).toBe(false)
  })
})
