/**
 * The pgfold pipeline
 *
 * expand -> parse -> build IR -> render, with the configuration read from
 * ConfigService. Each entry point is one CLI command.
 */
import { FileSystem, Path } from "@effect/platform";
import { Effect } from "effect";
import { compareText, fingerprint } from "./compare.js";
import { formatMultiFile, formatSingleFile } from "./dump/formatter.js";
import { foldText } from "./dump/fold.js";
import { dumpSteps } from "./dump/steps.js";
import {
  FileReadFailed,
  SchemaMismatch,
  isSchemaBuildError,
  type IncludeError,
  type SchemaBuildError,
} from "./errors.js";
import { buildSchema, type BuildResult } from "./ir/builder.js";
import { ConfigService } from "./services/config.js";
import type { OutputFile } from "./services/file-writer.js";
import { expandFile, type ExpandedSchema, type FileSegment } from "./services/include-resolver.js";
import type { Located } from "./sql/ast.js";
import { parseStatements } from "./sql/parser.js";
import { splitStatements, type SourceStatement } from "./sql/statements.js";

type Env = FileSystem.FileSystem | Path.Path | ConfigService;

export type CompareMode = "fold" | "dump";

/** Run a pure step that throws the tagged schema errors */
const trySchema = <A>(f: () => A): Effect.Effect<A, SchemaBuildError> =>
  Effect.try({ try: f, catch: error => error }).pipe(
    Effect.catchAll(error => (isSchemaBuildError(error) ? Effect.fail(error) : Effect.die(error))),
  );

/** Statements of every file, in include order, with their real line numbers */
function collectStatements(file: FileSegment): SourceStatement[] {
  return file.segments.flatMap(segment =>
    segment.kind === "include"
      ? segment.files.flatMap(collectStatements)
      : splitStatements(segment.text, segment.file).statements.map(s => ({ ...s, line: s.line + segment.line - 1 })),
  );
}

/**
 * Parse an expanded schema and build its IR.
 */
export const parseSchema = (
  expanded: ExpandedSchema,
  options: { readonly targetSchema: string; readonly strict: boolean },
): Effect.Effect<BuildResult, SchemaBuildError> =>
  Effect.gen(function* () {
    const statements = collectStatements(expanded.root);
    yield* Effect.logDebug(`Parsing ${statements.length} statements from ${expanded.files.length} files`);
    const commands: Located[] = yield* trySchema(() =>
      parseStatements(statements, { targetSchema: options.targetSchema }),
    );
    return yield* buildSchema(commands, options);
  });

const loadSchema = (file: string) =>
  Effect.gen(function* () {
    const config = yield* ConfigService;
    yield* Effect.log(`Reading ${file}...`);
    const expanded = yield* expandFile(file);
    yield* Effect.logDebug(`Files: ${expanded.files.join(", ")}`);
    const result = yield* parseSchema(expanded, { targetSchema: config.schema, strict: config.strict });

    const counts = [...result.ir.schemas.values()].reduce(
      (acc, s) => ({
        tables: acc.tables + s.tables.size,
        views: acc.views + s.views.size,
        routines: acc.routines + s.functions.size + s.procedures.size,
      }),
      { tables: 0, views: 0, routines: 0 },
    );
    yield* Effect.log(`Built ${counts.tables} tables, ${counts.views} views, ${counts.routines} routines`);
    return { config, expanded, result };
  });

/**
 * The schema with every include expanded.
 */
export const expandSchema = (file: string): Effect.Effect<string, IncludeError, Env> =>
  expandFile(file).pipe(Effect.map(expanded => expanded.text));

/**
 * Whole-schema canonical dump as one file.
 */
export const dumpSchema = (file: string): Effect.Effect<string, IncludeError | SchemaBuildError, Env> =>
  Effect.gen(function* () {
    const { config, result } = yield* loadSchema(file);
    const steps = dumpSteps(result.ir, { ignore: config.ignore });
    yield* Effect.logDebug(`Dumping ${steps.length} steps`);
    return formatSingleFile(steps, { schema: config.schema, header: config.header, comments: config.comments });
  });

/**
 * Whole-schema canonical dump, one file per object.
 */
export const dumpSchemaFiles = (
  file: string,
  mainFile: string,
): Effect.Effect<readonly OutputFile[], IncludeError | SchemaBuildError, Env> =>
  Effect.gen(function* () {
    const { config, result } = yield* loadSchema(file);
    const steps = dumpSteps(result.ir, { ignore: config.ignore });
    return formatMultiFile(steps, mainFile, { schema: config.schema, header: config.header, comments: config.comments });
  });

/**
 * In-place canonical form, include layout kept.
 */
export const foldSchema = (file: string): Effect.Effect<string, IncludeError | SchemaBuildError, Env> =>
  Effect.gen(function* () {
    // the whole schema has to build before any run is folded on its own
    const { config, expanded } = yield* loadSchema(file);
    return yield* trySchema(() =>
      foldText(expanded.root, { targetSchema: config.schema, strict: config.strict, comments: config.comments, ignore: config.ignore }),
    );
  });

/**
 * SHA-256 of the schema's canonical dump.
 */
export const fingerprintSchema = (file: string): Effect.Effect<string, IncludeError | SchemaBuildError, Env> =>
  Effect.gen(function* () {
    const { config, result } = yield* loadSchema(file);
    return fingerprint(result.ir, { ignore: config.ignore });
  });

/**
 * Fold (or dump) `inputPath` and compare the result with the file at
 * `expectedPath`.
 */
export const verifyFixture = (
  inputPath: string,
  expectedPath: string,
  mode: CompareMode = "fold",
): Effect.Effect<void, IncludeError | SchemaBuildError | SchemaMismatch, Env> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const actual = mode === "fold" ? yield* foldSchema(inputPath) : yield* dumpSchema(inputPath);
    const expected = yield* fs.readFileString(expectedPath).pipe(
      Effect.mapError(cause => new FileReadFailed({ message: `Failed to read ${expectedPath}`, path: expectedPath, cause })),
    );
    const comparison = compareText(actual, expected);
    if (!comparison.equal) {
      return yield* Effect.fail(
        new SchemaMismatch({
          message: `${mode} output of ${inputPath} differs from ${expectedPath}`,
          expectedPath,
          diff: comparison.diff,
        }),
      );
    }
    yield* Effect.log(`${inputPath} matches ${expectedPath}`);
  });
