/**
 * Statement splitter
 *
 * Cuts SQL text into top-level statements at `;`, honouring strings,
 * dollar quotes, comments and parentheses (all handled by the lexer).
 * Each statement keeps the raw text in front of it so that callers can
 * carry authored comments through to their output.
 */
import { Lexer, type Token } from "./lexer.js";

export interface SourceStatement {
  /** Raw statement text, without the terminating semicolon */
  readonly text: string;
  /** Tokens of the statement, comments dropped */
  readonly tokens: readonly Token[];
  readonly file: string;
  readonly line: number;
  /** Raw text between the previous statement's terminator and this statement */
  readonly leading: string;
}

export interface SplitResult {
  readonly statements: readonly SourceStatement[];
  /** Raw text after the last statement */
  readonly trailing: string;
}

export const splitStatements = (source: string, file = "<input>"): SplitResult => {
  const tokens = new Lexer(source, file).tokenize();
  const statements: SourceStatement[] = [];

  let current: Token[] = [];
  let depth = 0;
  let prevEnd = 0;

  const flush = (end: number) => {
    const first = current[0];
    const last = current[current.length - 1];
    if (first !== undefined && last !== undefined) {
      statements.push({
        text: source.slice(first.start, last.end),
        tokens: current,
        file,
        line: first.line,
        leading: source.slice(prevEnd, first.start),
      });
    }
    current = [];
    depth = 0;
    prevEnd = end;
  };

  for (const token of tokens) {
    if (token.kind === "comment") continue;

    // psql meta-commands end at the line break and stand alone
    if (token.kind === "meta" && current.length === 0) {
      current.push(token);
      flush(token.end);
      continue;
    }

    if (token.kind === "punct") {
      if (token.value === "(") depth++;
      else if (token.value === ")") depth = Math.max(0, depth - 1);
      else if (token.value === ";" && depth === 0) {
        flush(token.end);
        continue;
      }
    }
    current.push(token);
  }

  if (current.length > 0) {
    const last = current[current.length - 1];
    flush(last === undefined ? source.length : last.end);
  }

  return { statements, trailing: source.slice(prevEnd) };
};
