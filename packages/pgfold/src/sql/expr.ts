/**
 * Expression normalizer
 *
 * Rewrites an expression token list into one canonical spelling: keywords
 * upper case, identifiers and function names lower case, literals
 * re-quoted, cast targets normalized and single spaces between tokens
 * except around punctuation.
 */
import type { Token } from "./lexer.js";
import { EXPRESSION_KEYWORDS, RESERVED_KEYWORDS, TIGHT_CALL_KEYWORDS, quoteIdent, quoteLiteral } from "./ident.js";
import { readTypeName } from "./types.js";

export interface SqlExpr {
  /** Canonical text */
  readonly text: string;
  /** Column-like names the expression reads */
  readonly refs: readonly string[];
  /** Functions the expression calls */
  readonly calls: readonly string[];
}

export interface ExprOptions {
  readonly targetSchema?: string;
  /** Inside a domain constraint `value` is the VALUE keyword */
  readonly domain?: boolean;
}

interface Piece {
  readonly text: string;
  readonly token: Token;
  readonly keyword: boolean;
  readonly unary: boolean;
}

const isPunct = (t: Token | undefined, value: string): boolean => t?.kind === "punct" && t.value === value;

const isKeyword = (t: Token, options: ExprOptions): boolean =>
  t.kind === "word" &&
  (EXPRESSION_KEYWORDS.has(t.value) ||
    RESERVED_KEYWORDS.has(t.value) ||
    (options.domain === true && t.value === "value"));

function renderToken(t: Token, options: ExprOptions): string {
  switch (t.kind) {
    case "word":
      if (t.value === "true" || t.value === "false") return t.value;
      return isKeyword(t, options) ? t.value.toUpperCase() : t.value;
    case "quoted":
      return quoteIdent(t.value);
    case "string":
      // E'', B'', X'' literals keep their prefix and escapes
      return t.text.startsWith("'") ? quoteLiteral(t.value) : t.text;
    default:
      return t.text;
  }
}

function needsSpace(prev: Piece, cur: Piece): boolean {
  const p = prev.token;
  const c = cur.token;
  if (c.kind === "punct" && [")", "]", ",", ".", "::", ";"].includes(c.value)) return false;
  if (p.kind === "punct" && ["(", "[", ".", "::"].includes(p.value)) return false;
  if (prev.unary) return false;
  if (isPunct(c, "(")) {
    if (p.kind === "quoted") return false;
    if (p.kind === "word") return prev.keyword && !TIGHT_CALL_KEYWORDS.has(p.value);
    return true;
  }
  if (isPunct(c, "[")) {
    return !(p.kind === "word" || p.kind === "quoted" || isPunct(p, ")") || isPunct(p, "]"));
  }
  return true;
}

const startsOperand = (prev: Piece | undefined): boolean =>
  prev === undefined ||
  prev.token.kind === "operator" ||
  prev.keyword ||
  isPunct(prev.token, "(") ||
  isPunct(prev.token, ",") ||
  isPunct(prev.token, "[");

/** Normalize an expression given as tokens (no comments) */
export function formatExpr(tokens: readonly Token[], options: ExprOptions = {}): SqlExpr {
  const pieces: Piece[] = [];
  const refs: string[] = [];
  const calls: string[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const t = tokens[i];
    if (t === undefined) continue;
    const prev = pieces[pieces.length - 1];

    if (isPunct(t, "::")) {
      pieces.push({ text: "::", token: t, keyword: false, unary: false });
      const type = readTypeName(tokens, i + 1, options.targetSchema);
      if (type !== undefined) {
        const last = tokens[type.next - 1] ?? t;
        pieces.push({ text: type.text, token: { ...last, kind: "word", value: type.text }, keyword: false, unary: false });
        i = type.next - 1;
      }
      continue;
    }

    // domain checks spell pattern matches as operators: LIKE ~~, ILIKE ~~*, NOT LIKE !~~
    if (options.domain === true && t.kind === "word" && (t.value === "like" || t.value === "ilike")) {
      const negated = prev !== undefined && prev.token.kind === "word" && prev.token.value === "not";
      if (negated) pieces.pop();
      const op = `${negated ? "!" : ""}~~${t.value === "ilike" ? "*" : ""}`;
      pieces.push({ text: op, token: { ...t, kind: "operator", value: op }, keyword: false, unary: false });
      continue;
    }

    const keyword = isKeyword(t, options);
    const unary = t.kind === "operator" && (t.value === "-" || t.value === "+") && startsOperand(prev);
    pieces.push({ text: renderToken(t, options), token: t, keyword, unary });

    if ((t.kind === "word" && !keyword) || t.kind === "quoted") {
      const next = tokens[i + 1];
      if (isPunct(next, "(")) {
        calls.push(t.value);
      } else if (!isPunct(next, ".") && !refs.includes(t.value)) {
        refs.push(t.value);
      }
    }
  }

  let text = "";
  pieces.forEach((piece, index) => {
    const prev = pieces[index - 1];
    if (prev !== undefined && needsSpace(prev, piece)) text += " ";
    text += piece.text;
  });

  return { text, refs, calls };
}

/** Strip one pair of parentheses wrapping the whole expression */
export function unwrapParens(tokens: readonly Token[]): readonly Token[] {
  if (!isPunct(tokens[0], "(") || !isPunct(tokens[tokens.length - 1], ")")) return tokens;
  let depth = 0;
  for (let i = 0; i < tokens.length; i++) {
    const t = tokens[i];
    if (isPunct(t, "(")) depth++;
    else if (isPunct(t, ")")) {
      depth--;
      if (depth === 0 && i < tokens.length - 1) return tokens;
    }
  }
  return tokens.slice(1, -1);
}
