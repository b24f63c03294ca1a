/**
 * Configuration schema for pgfold
 */
import { Schema as S } from "effect";
import { emptyIgnoreRules, type IgnoreRules } from "./ir/ignore.js";

const Globs = S.optionalWith(S.Array(S.String), { default: () => [], exact: true });

/**
 * Name patterns of objects left out of canonical output.
 * `*` and `?` are wildcards; a leading `!` takes a name back in.
 */
export const IgnoreConfig = S.Struct({
  tables: Globs,
  views: Globs,
  functions: Globs,
  procedures: Globs,
  types: Globs,
  sequences: Globs,
});
export type IgnoreConfig = S.Schema.Type<typeof IgnoreConfig>;

/**
 * Main configuration schema
 */
export const Config = S.Struct({
  /** Schema whose objects are written unqualified */
  schema: S.optionalWith(
    S.String.pipe(S.nonEmptyString({ message: () => "must be a non-empty schema name" })),
    { default: () => "public", exact: true },
  ),

  /** Fail on statements pgfold does not understand instead of passing them through */
  strict: S.optionalWith(S.Boolean, { default: () => true, exact: true }),

  /** Write `-- Name: ...` headers above each object */
  comments: S.optionalWith(S.Boolean, { default: () => true, exact: true }),

  /** Write the banner at the top of a dump */
  header: S.optionalWith(S.Boolean, { default: () => true, exact: true }),

  ignore: S.optionalWith(IgnoreConfig, { default: () => emptyIgnoreRules, exact: true }),
});

export type Config = S.Schema.Type<typeof Config>;

/**
 * User-facing configuration input type.
 */
export interface ConfigInput {
  /** Target schema (default: "public") */
  readonly schema?: string;

  /** Fail on unsupported statements (default: true) */
  readonly strict?: boolean;

  /** Object headers in dumps (default: true) */
  readonly comments?: boolean;

  /** Dump banner (default: true) */
  readonly header?: boolean;

  /**
   * Objects to leave out, by name pattern.
   *
   * @example
   * ```typescript
   * ignore: {
   *   tables: ["audit_*", "!audit_log"],
   *   functions: ["pg_*"],
   * }
   * ```
   */
  readonly ignore?: Partial<IgnoreRules>;
}

/**
 * Resolved configuration with all defaults applied
 */
export interface ResolvedConfig {
  readonly schema: string;
  readonly strict: boolean;
  readonly comments: boolean;
  readonly header: boolean;
  readonly ignore: IgnoreRules;
  /** Config file the values came from, when there was one */
  readonly configPath?: string;
}

export const defaultConfig: ResolvedConfig = {
  schema: "public",
  strict: true,
  comments: true,
  header: true,
  ignore: emptyIgnoreRules,
};
