/**
 * Identifier quoting, keyword tables
 */
import keywords from "./keywords.json" with { type: "json" };

export const RESERVED_KEYWORDS: ReadonlySet<string> = new Set(keywords.reserved);

/** Keywords written in upper case when they appear in an expression */
export const EXPRESSION_KEYWORDS: ReadonlySet<string> = new Set(keywords.expression);

/** Keywords that take a parenthesized argument list without a space before it */
export const TIGHT_CALL_KEYWORDS: ReadonlySet<string> = new Set(keywords.tightCall);

export function quoteIdent(name: string): string {
  if (/^[a-z_][a-z0-9_$]*$/.test(name) && !RESERVED_KEYWORDS.has(name)) {
    return name;
  }
  return `"${name.replace(/"/g, '""')}"`;
}

/** Quote `schema.name`, leaving out the schema when it is the target schema */
export function qualifiedName(schema: string, name: string, targetSchema: string): string {
  return schema === targetSchema ? quoteIdent(name) : `${quoteIdent(schema)}.${quoteIdent(name)}`;
}

export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}
