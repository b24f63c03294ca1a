/**
 * Schema comparison
 *
 * Text-level comparison of canonical output, and object-level comparison
 * of two schemas through each object's canonical rendering.
 */
import { createHash } from "node:crypto";
import { diffLines } from "diff";
import { formatSteps } from "./dump/formatter.js";
import { dumpSteps, objectRenderings, type PlanOptions } from "./dump/steps.js";
import type { SchemaIR } from "./ir/schema-ir.js";

/**
 * Strip trailing whitespace from every line, drop blank lines and the
 * final line break.
 */
export const normalizeWhitespace = (text: string): string =>
  text
    .split(/\r?\n/)
    .map(line => line.trimEnd())
    .filter(line => line !== "")
    .join("\n");

export interface TextComparison {
  readonly equal: boolean;
  /** `-` lines are only in the expected text, `+` lines only in the actual one */
  readonly diff: string;
}

export function compareText(actual: string, expected: string): TextComparison {
  const a = normalizeWhitespace(actual);
  const e = normalizeWhitespace(expected);
  if (a === e) return { equal: true, diff: "" };

  const lines: string[] = [];
  for (const change of diffLines(`${e}\n`, `${a}\n`)) {
    const prefix = change.added ? "+" : change.removed ? "-" : " ";
    for (const line of change.value.replace(/\n$/, "").split("\n")) lines.push(`${prefix}${line}`);
  }
  return { equal: false, diff: lines.join("\n") };
}

export interface SchemaComparison {
  /** Objects only in the expected schema, keyed `kind:schema.name` */
  readonly missing: readonly string[];
  /** Objects only in the actual schema */
  readonly extra: readonly string[];
  /** Objects in both whose canonical text differs */
  readonly changed: readonly string[];
}

export const isSameSchema = (comparison: SchemaComparison): boolean =>
  comparison.missing.length === 0 && comparison.extra.length === 0 && comparison.changed.length === 0;

export function compareSchemas(actual: SchemaIR, expected: SchemaIR, options: PlanOptions = {}): SchemaComparison {
  const a = objectRenderings(actual, options);
  const e = objectRenderings(expected, options);
  const sorted = (keys: Iterable<string>) => [...keys].sort();
  return {
    missing: sorted([...e.keys()].filter(key => !a.has(key))),
    extra: sorted([...a.keys()].filter(key => !e.has(key))),
    changed: sorted([...a.keys()].filter(key => e.has(key) && e.get(key) !== a.get(key))),
  };
}

/**
 * SHA-256 of the canonical dump, headers included, banner left out.
 */
export function fingerprint(ir: SchemaIR, options: PlanOptions = {}): string {
  return createHash("sha256").update(formatSteps(dumpSteps(ir, options), true)).digest("hex");
}
