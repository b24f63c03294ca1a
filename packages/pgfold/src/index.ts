/**
 * pgfold
 *
 * Expand `\i` includes in PostgreSQL schema files, rewrite the schema in a
 * canonical dump-like form, and compare schemas.
 */

// Errors
export * from "./errors.js";

// Configuration
export { Config, IgnoreConfig, defaultConfig, type ConfigInput, type ResolvedConfig } from "./config.js";
export { ConfigLoaderLive, ConfigLoaderService, defineConfig, type ConfigLoader } from "./services/config-loader.js";
export { ConfigFromFile, ConfigService, ConfigTest, type ConfigOverrides } from "./services/config.js";

// Schema reader
export {
  expandFile,
  expandText,
  segmentText,
  type ExpandedSchema,
  type FileSegment,
  type IncludeSegment,
  type Segment,
  type TextSegment,
} from "./services/include-resolver.js";

// SQL
export { splitStatements, type SourceStatement } from "./sql/statements.js";
export { DdlParser, parseStatement, parseStatements } from "./sql/parser.js";
export type { Command, Located } from "./sql/ast.js";

// IR
export * from "./ir/schema-ir.js";
export { buildSchema, buildSchemaIR, type BuildOptions, type BuildResult } from "./ir/builder.js";
export { isIgnored, type IgnoreRules } from "./ir/ignore.js";

// Canonical output
export type { Step, StepType, StepGroup } from "./dump/ddl.js";
export { dumpSteps, foldSteps, objectRenderings } from "./dump/steps.js";
export { formatMultiFile, formatSingleFile, sanitizeFileName } from "./dump/formatter.js";
export { foldText } from "./dump/fold.js";

// Comparison
export { compareSchemas, compareText, fingerprint, normalizeWhitespace, type SchemaComparison } from "./compare.js";

// Pipeline
export {
  dumpSchema,
  dumpSchemaFiles,
  expandSchema,
  fingerprintSchema,
  foldSchema,
  parseSchema,
  verifyFixture,
  type CompareMode,
} from "./pipeline.js";
