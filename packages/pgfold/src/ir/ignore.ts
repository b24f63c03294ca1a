/**
 * Ignore rules
 *
 * Glob patterns per object kind. `*` matches any run of characters, `?` a
 * single one. A pattern starting with `!` re-includes names that an earlier
 * pattern would drop, whatever their order.
 */

export interface IgnoreRules {
  readonly tables: readonly string[];
  readonly views: readonly string[];
  readonly functions: readonly string[];
  readonly procedures: readonly string[];
  readonly types: readonly string[];
  readonly sequences: readonly string[];
}

export type IgnoreKind = keyof IgnoreRules;

export const emptyIgnoreRules: IgnoreRules = {
  tables: [],
  views: [],
  functions: [],
  procedures: [],
  types: [],
  sequences: [],
};

const cache = new Map<string, RegExp>();

export function globToRegExp(pattern: string): RegExp {
  const cached = cache.get(pattern);
  if (cached) return cached;
  const source = [...pattern]
    .map(ch => (ch === "*" ? ".*" : ch === "?" ? "." : ch.replace(/[.+^${}()|[\]\\]/g, "\\$&")))
    .join("");
  const regexp = new RegExp(`^${source}$`);
  cache.set(pattern, regexp);
  return regexp;
}

export function matchesAny(patterns: readonly string[], name: string): boolean {
  if (patterns.length === 0) return false;
  const matched = patterns.some(p => !p.startsWith("!") && globToRegExp(p).test(name));
  if (!matched) return false;
  return !patterns.some(p => p.startsWith("!") && globToRegExp(p.slice(1)).test(name));
}

export const isIgnored = (rules: IgnoreRules, kind: IgnoreKind, name: string): boolean =>
  matchesAny(rules[kind], name);
