/**
 * Fold
 *
 * Canonical form that keeps the authored layout: include directives are
 * replaced by their folded files, comment blocks stay where they were, and
 * each run of statements under a comment block is replaced by the canonical
 * rendering of what it defines.
 */
import { buildSchemaIR } from "../ir/builder.js";
import type { IgnoreRules } from "../ir/ignore.js";
import { parseStatements } from "../sql/parser.js";
import { splitStatements, type SourceStatement } from "../sql/statements.js";
import type { FileSegment } from "../services/include-resolver.js";
import { formatSteps } from "./formatter.js";
import { foldSteps } from "./steps.js";

export interface FoldOptions {
  readonly targetSchema: string;
  readonly strict: boolean;
  /** Write `-- Name: ...` headers above each object */
  readonly comments: boolean;
  readonly ignore?: IgnoreRules;
}

/** Statements that follow one comment block */
interface Run {
  readonly leading: string;
  readonly statements: SourceStatement[];
}

const hasComment = (text: string): boolean => /^\s*(--|\/\*)/m.test(text);

/** Comment lines of a block, without surrounding blank lines or trailing spaces */
const trimBlock = (text: string): string =>
  text
    .split("\n")
    .map(line => line.trimEnd())
    .join("\n")
    .replace(/^\n+/, "")
    .replace(/\n+$/, "");

function splitRuns(statements: readonly SourceStatement[]): Run[] {
  const runs: Run[] = [];
  for (const statement of statements) {
    const last = runs[runs.length - 1];
    if (last === undefined || hasComment(statement.leading)) {
      runs.push({ leading: hasComment(statement.leading) ? trimBlock(statement.leading) : "", statements: [statement] });
    } else {
      last.statements.push(statement);
    }
  }
  return runs;
}

function foldRun(run: Run, options: FoldOptions): string {
  const result = buildSchemaIR(parseStatements(run.statements, { targetSchema: options.targetSchema }), {
    targetSchema: options.targetSchema,
    strict: options.strict,
    detachMissing: true,
  });
  const body = formatSteps(foldSteps(result, { ignore: options.ignore }), options.comments).replace(/\n+$/, "");
  return [run.leading, body].filter(part => part !== "").join("\n");
}

function foldPieces(file: FileSegment, options: FoldOptions): string[] {
  const pieces: string[] = [];
  for (const segment of file.segments) {
    if (segment.kind === "include") {
      for (const included of segment.files) pieces.push(...foldPieces(included, options));
      continue;
    }
    const { statements, trailing } = splitStatements(segment.text, segment.file);
    const located = statements.map(s => ({ ...s, line: s.line + segment.line - 1 }));
    for (const run of splitRuns(located)) {
      const piece = foldRun(run, options);
      if (piece !== "") pieces.push(piece);
    }
    if (hasComment(trailing)) pieces.push(trimBlock(trailing));
  }
  return pieces;
}

/**
 * Fold an expanded schema. Throws the tagged schema errors.
 */
export function foldText(root: FileSegment, options: FoldOptions): string {
  const pieces = foldPieces(root, options);
  return pieces.length === 0 ? "" : `${pieces.join("\n\n")}\n`;
}
