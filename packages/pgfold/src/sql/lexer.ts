/**
 * SQL Lexer
 *
 * Tokenizes PostgreSQL DDL text. Keeps enough of the source (offsets, raw
 * text, comments, psql meta-commands) for the statement splitter to cut the
 * original text back out, and enough normalized detail (folded identifiers,
 * unescaped literals) for the parser to work on values.
 */
import { SqlSyntaxError } from "../errors.js";

export type TokenKind =
  | "word"
  | "quoted"
  | "number"
  | "string"
  | "dollar"
  | "operator"
  | "punct"
  | "param"
  | "meta"
  | "comment";

export interface Token {
  readonly kind: TokenKind;
  /**
   * Normalized value: unquoted words are folded to lower case, quoted
   * identifiers and strings are unescaped, dollar strings hold their body.
   */
  readonly value: string;
  /** Raw source text of the token */
  readonly text: string;
  readonly start: number;
  readonly end: number;
  readonly line: number;
  readonly column: number;
}

const OPERATOR_CHARS = new Set("+-*/<>=~!@#%^&|`?");
// A multi-char operator may only end in + or - when it contains one of these
const OPERATOR_SPECIAL = new Set("~!@#%^&|`?");

const isDigit = (c: string | undefined): boolean => c !== undefined && c >= "0" && c <= "9";

const isIdentStart = (c: string | undefined): boolean =>
  c !== undefined && (/[A-Za-z_]/.test(c) || c.charCodeAt(0) > 127);

const isIdentPart = (c: string | undefined): boolean =>
  c !== undefined && (isIdentStart(c) || isDigit(c) || c === "$");

/**
 * Tokenize SQL source text.
 * @param file - used for error positions only
 */
export class Lexer {
  private pos = 0;
  private readonly lineStarts: number[] = [0];
  private readonly tokens: Token[] = [];

  constructor(
    private readonly source: string,
    private readonly file: string = "<input>",
  ) {
    for (let i = 0; i < source.length; i++) {
      if (source[i] === "\n") this.lineStarts.push(i + 1);
    }
  }

  tokenize(): Token[] {
    while (this.pos < this.source.length) {
      const c = this.source[this.pos];
      if (c === " " || c === "\t" || c === "\n" || c === "\r" || c === "\f") {
        this.pos++;
        continue;
      }
      this.scanToken();
    }
    return this.tokens;
  }

  /** Line and column (both 1-based) of an offset */
  position(offset: number): { line: number; column: number } {
    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if ((this.lineStarts[mid] ?? 0) <= offset) lo = mid;
      else hi = mid - 1;
    }
    return { line: lo + 1, column: offset - (this.lineStarts[lo] ?? 0) + 1 };
  }

  private scanToken(): void {
    const start = this.pos;
    const c = this.source[start];
    const next = this.source[start + 1];

    if (c === "-" && next === "-") {
      const eol = this.source.indexOf("\n", start);
      this.pos = eol === -1 ? this.source.length : eol;
      return this.push("comment", this.source.slice(start, this.pos), start);
    }
    if (c === "/" && next === "*") {
      this.scanBlockComment(start);
      return this.push("comment", this.source.slice(start, this.pos), start);
    }
    if (c === "\\") {
      const eol = this.source.indexOf("\n", start);
      this.pos = eol === -1 ? this.source.length : eol;
      return this.push("meta", this.source.slice(start, this.pos).trimEnd(), start);
    }
    if (c === "'") {
      return this.push("string", this.scanQuoted(start, "'", "string literal"), start);
    }
    if ((c === "E" || c === "e") && next === "'") {
      this.pos++;
      return this.push("string", this.scanEscapeString(start), start);
    }
    if ((c === "B" || c === "b" || c === "X" || c === "x" || c === "N" || c === "n") && next === "'") {
      this.pos++;
      return this.push("string", this.scanQuoted(start + 1, "'", "string literal"), start);
    }
    if (c === '"') {
      return this.push("quoted", this.scanQuoted(start, '"', "quoted identifier"), start);
    }
    if (c === "$") {
      if (isDigit(next)) {
        this.pos++;
        while (isDigit(this.source[this.pos])) this.pos++;
        return this.push("param", this.source.slice(start, this.pos), start);
      }
      const tag = this.matchDollarTag(start);
      if (tag !== undefined) {
        return this.push("dollar", this.scanDollarBody(start, tag), start);
      }
    }
    if (isDigit(c) || (c === "." && isDigit(next))) {
      this.scanNumber();
      return this.push("number", this.source.slice(start, this.pos), start);
    }
    if (isIdentStart(c)) {
      while (isIdentPart(this.source[this.pos])) this.pos++;
      return this.push("word", this.source.slice(start, this.pos).toLowerCase(), start);
    }
    if (c === ":" && next === ":") {
      this.pos += 2;
      return this.push("punct", "::", start);
    }
    if (c !== undefined && "(),;.[]:".includes(c)) {
      this.pos++;
      return this.push("punct", c, start);
    }
    if (c !== undefined && OPERATOR_CHARS.has(c)) {
      return this.push("operator", this.scanOperator(start), start);
    }

    throw this.error(start, `Unexpected character '${c ?? ""}'`);
  }

  private push(kind: TokenKind, value: string, start: number): void {
    const { line, column } = this.position(start);
    this.tokens.push({
      kind,
      value,
      text: this.source.slice(start, this.pos),
      start,
      end: this.pos,
      line,
      column,
    });
  }

  private scanBlockComment(start: number): void {
    let depth = 0;
    let i = start;
    while (i < this.source.length) {
      if (this.source.startsWith("/*", i)) {
        depth++;
        i += 2;
      } else if (this.source.startsWith("*/", i)) {
        depth--;
        i += 2;
        if (depth === 0) {
          this.pos = i;
          return;
        }
      } else {
        i++;
      }
    }
    throw this.error(start, "Unterminated block comment");
  }

  /** Scan a quote-delimited token where the quote is escaped by doubling */
  private scanQuoted(start: number, quote: string, what: string): string {
    let i = start + 1;
    let value = "";
    while (i < this.source.length) {
      const ch = this.source[i];
      if (ch === quote) {
        if (this.source[i + 1] === quote) {
          value += quote;
          i += 2;
          continue;
        }
        this.pos = i + 1;
        return value;
      }
      value += ch;
      i++;
    }
    throw this.error(start, `Unterminated ${what}`);
  }

  private scanEscapeString(start: number): string {
    let i = start + 2;
    let value = "";
    while (i < this.source.length) {
      const ch = this.source[i];
      if (ch === "\\") {
        value += this.source.slice(i, i + 2);
        i += 2;
        continue;
      }
      if (ch === "'") {
        if (this.source[i + 1] === "'") {
          value += "''";
          i += 2;
          continue;
        }
        this.pos = i + 1;
        return value;
      }
      value += ch;
      i++;
    }
    throw this.error(start, "Unterminated string literal");
  }

  private matchDollarTag(start: number): string | undefined {
    let i = start + 1;
    if (this.source[i] === "$") return "";
    if (!isIdentStart(this.source[i])) return undefined;
    while (i < this.source.length && this.source[i] !== "$") {
      const ch = this.source[i];
      if (!(isIdentStart(ch) || isDigit(ch))) return undefined;
      i++;
    }
    return i < this.source.length ? this.source.slice(start + 1, i) : undefined;
  }

  private scanDollarBody(start: number, tag: string): string {
    const delimiter = `$${tag}$`;
    const bodyStart = start + delimiter.length;
    const close = this.source.indexOf(delimiter, bodyStart);
    if (close === -1) {
      throw this.error(start, `Unterminated dollar-quoted string ${delimiter}`);
    }
    this.pos = close + delimiter.length;
    return this.source.slice(bodyStart, close);
  }

  private scanNumber(): void {
    while (isDigit(this.source[this.pos])) this.pos++;
    if (this.source[this.pos] === "." && this.source[this.pos + 1] !== ".") {
      this.pos++;
      while (isDigit(this.source[this.pos])) this.pos++;
    }
    const e = this.source[this.pos];
    if (e === "e" || e === "E") {
      const sign = this.source[this.pos + 1];
      const digitAt = sign === "+" || sign === "-" ? this.pos + 2 : this.pos + 1;
      if (isDigit(this.source[digitAt])) {
        this.pos = digitAt;
        while (isDigit(this.source[this.pos])) this.pos++;
      }
    }
  }

  private scanOperator(start: number): string {
    let i = start;
    while (i < this.source.length) {
      const ch = this.source[i];
      if (ch === undefined || !OPERATOR_CHARS.has(ch)) break;
      if (i > start && (this.source.startsWith("--", i) || this.source.startsWith("/*", i))) break;
      i++;
    }
    let op = this.source.slice(start, i);
    if (op.length > 1 && ![...op].some(ch => OPERATOR_SPECIAL.has(ch))) {
      while (op.length > 1 && (op.endsWith("+") || op.endsWith("-"))) {
        op = op.slice(0, -1);
      }
    }
    this.pos = start + op.length;
    return op;
  }

  private error(offset: number, message: string): SqlSyntaxError {
    const { line, column } = this.position(offset);
    return new SqlSyntaxError({
      message: `${message} at ${this.file}:${line}:${column}`,
      file: this.file,
      line,
      column,
    });
  }
}

/** Tokenize and drop comments */
export const tokenize = (source: string, file?: string): Token[] =>
  new Lexer(source, file).tokenize().filter(t => t.kind !== "comment");
