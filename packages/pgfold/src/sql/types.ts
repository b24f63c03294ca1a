/**
 * Data type names
 *
 * Reads a type name out of a token stream and rewrites it to the spelling
 * PostgreSQL prints back (`int4` → `integer`, `timestamp with time zone` →
 * `timestamptz`, ...).
 */
import type { Token } from "./lexer.js";
import { quoteIdent } from "./ident.js";

const TYPE_ALIASES: Readonly<Record<string, string>> = {
  int: "integer",
  int4: "integer",
  int8: "bigint",
  int2: "smallint",
  decimal: "numeric",
  bool: "boolean",
  float8: "double precision",
  float4: "real",
  float: "double precision",
  "character varying": "varchar",
  "char varying": "varchar",
  char: "character",
  bpchar: "character",
  "timestamp with time zone": "timestamptz",
  "timestamp without time zone": "timestamp",
  "time with time zone": "timetz",
  "time without time zone": "time",
  "bit varying": "varbit",
};

const SERIAL_TYPES: Readonly<Record<string, string>> = {
  serial: "integer",
  serial4: "integer",
  bigserial: "bigint",
  serial8: "bigint",
  smallserial: "smallint",
  serial2: "smallint",
};

export interface TypeName {
  /** Canonical type text, modifiers and array bounds included */
  readonly text: string;
  /** Set for serial pseudo-types: the column gets an owned sequence */
  readonly serial: boolean;
  /** Index of the first token after the type */
  readonly next: number;
}

const isName = (t: Token | undefined): t is Token => t !== undefined && (t.kind === "word" || t.kind === "quoted");

const isWord = (t: Token | undefined, value: string): boolean => t !== undefined && t.kind === "word" && t.value === value;

/** Canonical spelling of a bare type name (no modifiers) */
export function canonicalTypeName(name: string): string {
  return TYPE_ALIASES[name] ?? name;
}

/** Render modifier tokens as `(10,2)` */
const renderModifiers = (tokens: readonly Token[]): string =>
  `(${tokens
    .filter(t => !(t.kind === "punct" && (t.value === "(" || t.value === ")")))
    .map(t => (t.kind === "punct" && t.value === "," ? "," : t.text))
    .join("")})`;

/**
 * Read a type starting at `start`.
 * @param targetSchema - qualifier dropped from the rendered name
 */
export function readTypeName(tokens: readonly Token[], start: number, targetSchema = "public"): TypeName | undefined {
  let i = start;
  const first = tokens[i];
  if (!isName(first)) return undefined;

  const parts: Token[] = [first];
  i++;
  while (tokens[i]?.kind === "punct" && tokens[i]?.value === "." && isName(tokens[i + 1])) {
    const part = tokens[i + 1];
    if (part !== undefined) parts.push(part);
    i += 2;
  }

  let base: string;
  if (parts.length > 1) {
    const schemaPart = parts[0];
    const names = parts.map(p => quoteIdent(p.value));
    const schema = schemaPart?.value;
    base =
      schema === targetSchema || schema === "pg_catalog"
        ? names.slice(1).join(".")
        : names.join(".");
    if (schema === "pg_catalog") base = canonicalTypeName(base);
  } else if (first.kind === "quoted") {
    base = quoteIdent(first.value);
  } else {
    base = first.value;
    // multi-word names
    if (base === "double" && isWord(tokens[i], "precision")) {
      base = "double precision";
      i++;
    } else if ((base === "character" || base === "char" || base === "bit") && isWord(tokens[i], "varying")) {
      base = `${base} varying`;
      i++;
    } else if (base === "national" && isWord(tokens[i], "character")) {
      base = "character";
      i++;
      if (isWord(tokens[i], "varying")) {
        base = "character varying";
        i++;
      }
    }
  }

  let modifiers = "";
  if (tokens[i]?.kind === "punct" && tokens[i]?.value === "(") {
    const close = findClose(tokens, i);
    modifiers = renderModifiers(tokens.slice(i, close + 1));
    i = close + 1;
  }

  if ((base === "timestamp" || base === "time") && (isWord(tokens[i], "with") || isWord(tokens[i], "without"))) {
    if (isWord(tokens[i + 1], "time") && isWord(tokens[i + 2], "zone")) {
      base = `${base} ${tokens[i]?.value ?? ""} time zone`;
      i += 3;
    }
  }

  let arrays = "";
  for (;;) {
    if (tokens[i]?.kind === "punct" && tokens[i]?.value === "[") {
      let j = i + 1;
      while (j < tokens.length && !(tokens[j]?.kind === "punct" && tokens[j]?.value === "]")) j++;
      arrays += "[]";
      i = j + 1;
    } else if (isWord(tokens[i], "array")) {
      arrays += "[]";
      i++;
    } else {
      break;
    }
  }

  const serialBase = SERIAL_TYPES[base];
  if (serialBase !== undefined && modifiers === "" && arrays === "") {
    return { text: serialBase, serial: true, next: i };
  }

  const canonical = canonicalTypeName(base);
  // timestamptz(3) reads back as timestamp(3) with time zone
  const text =
    modifiers !== "" && (canonical === "timestamptz" || canonical === "timetz")
      ? `${canonical.slice(0, -2)}${modifiers} with time zone`
      : `${canonical}${modifiers}`;
  return { text: `${text}${arrays}`, serial: false, next: i };
}

/** Index of the `)` matching the `(` at `open` */
export function findClose(tokens: readonly Token[], open: number): number {
  let depth = 0;
  for (let i = open; i < tokens.length; i++) {
    const t = tokens[i];
    if (t?.kind !== "punct") continue;
    if (t.value === "(" || t.value === "[") depth++;
    else if (t.value === ")" || t.value === "]") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return tokens.length - 1;
}
