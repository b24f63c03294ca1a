/**
 * Core error types for pgfold
 * Using Effect's Data.TaggedError for typed error handling
 */
import { Data } from "effect";

// Base error type with common fields
interface ErrorBase {
  readonly message: string;
}

// Configuration errors
export class ConfigNotFound extends Data.TaggedError("ConfigNotFound")<
  ErrorBase & { readonly searchPaths: readonly string[] }
> {}

export class ConfigInvalid extends Data.TaggedError("ConfigInvalid")<
  ErrorBase & { readonly path: string; readonly errors: readonly string[] }
> {}

// File system errors
export class FileReadFailed extends Data.TaggedError("FileReadFailed")<
  ErrorBase & { readonly path: string; readonly cause: unknown }
> {}

export class WriteFailed extends Data.TaggedError("WriteFailed")<
  ErrorBase & { readonly path: string; readonly cause: unknown }
> {}

// Include resolution errors
export class IncludeNotFound extends Data.TaggedError("IncludeNotFound")<
  ErrorBase & { readonly path: string; readonly includedFrom: string }
> {}

export class IncludeCycle extends Data.TaggedError("IncludeCycle")<
  ErrorBase & { readonly chain: readonly string[] }
> {}

export class IncludeOutsideBase extends Data.TaggedError("IncludeOutsideBase")<
  ErrorBase & { readonly path: string; readonly baseDir: string }
> {}

export class IncludeKindMismatch extends Data.TaggedError("IncludeKindMismatch")<
  ErrorBase & { readonly path: string; readonly expected: "file" | "directory" }
> {}

// SQL errors
export class SqlSyntaxError extends Data.TaggedError("SqlSyntaxError")<
  ErrorBase & {
    readonly file: string;
    readonly line: number;
    readonly column: number;
  }
> {}

export class UnsupportedStatement extends Data.TaggedError("UnsupportedStatement")<
  ErrorBase & { readonly file: string; readonly line: number; readonly statement: string }
> {}

// Schema model errors
export class ObjectNotFound extends Data.TaggedError("ObjectNotFound")<
  ErrorBase & { readonly kind: string; readonly name: string; readonly referencedBy: string }
> {}

export class DuplicateObject extends Data.TaggedError("DuplicateObject")<
  ErrorBase & { readonly kind: string; readonly name: string }
> {}

// Comparison errors
export class SchemaMismatch extends Data.TaggedError("SchemaMismatch")<
  ErrorBase & { readonly expectedPath: string; readonly diff: string }
> {}

// Command line errors
export class UsageError extends Data.TaggedError("UsageError")<ErrorBase> {}

export type IncludeError =
  | IncludeNotFound
  | IncludeCycle
  | IncludeOutsideBase
  | IncludeKindMismatch
  | FileReadFailed;

export type SchemaBuildError = SqlSyntaxError | UnsupportedStatement | ObjectNotFound | DuplicateObject;

// Union of all errors for convenience
export type PgfoldError =
  | ConfigNotFound
  | ConfigInvalid
  | FileReadFailed
  | WriteFailed
  | IncludeNotFound
  | IncludeCycle
  | IncludeOutsideBase
  | IncludeKindMismatch
  | SqlSyntaxError
  | UnsupportedStatement
  | ObjectNotFound
  | DuplicateObject
  | SchemaMismatch
  | UsageError;

export const isSchemaBuildError = (error: unknown): error is SchemaBuildError =>
  error instanceof SqlSyntaxError ||
  error instanceof UnsupportedStatement ||
  error instanceof ObjectNotFound ||
  error instanceof DuplicateObject;
