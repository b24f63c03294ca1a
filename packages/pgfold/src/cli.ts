#!/usr/bin/env node
/**
 * pgfold CLI
 *
 * Expand, canonicalize and compare PostgreSQL schema files.
 *
 * Log verbosity is controlled via the built-in --log-level flag:
 *   --log-level debug   Show detailed output (files, statement counts)
 *   --log-level info    Default - show progress messages
 *   --log-level none    Suppress all output except errors
 */
import { Args, Command, Options } from "@effect/cli";
import { Path } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Console, Effect, Option } from "effect";
import { UsageError, type PgfoldError } from "./errors.js";
import {
  dumpSchema,
  dumpSchemaFiles,
  expandSchema,
  fingerprintSchema,
  foldSchema,
  verifyFixture,
} from "./pipeline.js";
import { ConfigFromFile } from "./services/config.js";
import { createFileWriter, writeFile } from "./services/file-writer.js";
import packageJson from "../package.json" with { type: "json" };

// ============================================================================
// Options
// ============================================================================

const configPath = Options.file("config").pipe(
  Options.withAlias("c"),
  Options.withDescription("Path to config file"),
  Options.optional,
);

const schema = Options.text("schema").pipe(
  Options.withDescription("Target schema, overrides the config file"),
  Options.optional,
);

const output = Options.file("output").pipe(
  Options.withAlias("o"),
  Options.withDescription("Write to this file instead of stdout"),
  Options.optional,
);

const multiFile = Options.boolean("multi-file").pipe(
  Options.withDescription("Write one file per object next to the output file"),
  Options.withDefault(false),
);

const mode = Options.choice("mode", ["fold", "dump"]).pipe(
  Options.withDescription("Canonical form to compare"),
  Options.withDefault("fold" as const),
);

const file = Args.file({ name: "file" }).pipe(Args.withDescription("Root schema file"));

// ============================================================================
// Error reporting
// ============================================================================

const details = (error: PgfoldError): readonly string[] => {
  switch (error._tag) {
    case "ConfigInvalid":
      return error.errors;
    case "ConfigNotFound":
      return error.searchPaths.map(p => `searched ${p}`);
    case "IncludeCycle":
      return [`Cycle: ${error.chain.join(" → ")}`];
    case "SchemaMismatch":
      return error.diff.split("\n");
    default:
      return [];
  }
};

/** Print the error with its details, then fail with it */
const reportError = (error: PgfoldError) =>
  Console.error(`\n✗ Error: ${error._tag}`).pipe(
    Effect.andThen(Console.error(`  ${error.message}`)),
    Effect.andThen(
      Effect.forEach(details(error), line => Console.error(error._tag === "SchemaMismatch" ? line : `    - ${line}`)),
    ),
    Effect.andThen(Effect.fail(error)),
  );

/** Write text to `-o` or stdout */
const emit = (text: string, target: Option.Option<string>) =>
  Option.match(target, {
    onNone: () => Console.log(text.replace(/\n$/, "")),
    onSome: path =>
      writeFile(path, text).pipe(Effect.andThen(Console.log(`✓ Wrote ${path}`))),
  });

// ============================================================================
// Commands
// ============================================================================

const pgfold = Command.make("pgfold", { configPath, schema });

/** Run a command body with the configuration from the root options */
const withConfig = <A, E extends PgfoldError, R>(effect: Effect.Effect<A, E, R>) =>
  Effect.gen(function* () {
    const root = yield* pgfold;
    const layer = ConfigFromFile(
      { configPath: Option.getOrUndefined(root.configPath) },
      { schema: Option.getOrUndefined(root.schema) },
    );
    return yield* effect.pipe(Effect.provide(layer));
  }).pipe(Effect.catchAll(reportError));

const expandCommand = Command.make("expand", { file, output }, args =>
  withConfig(expandSchema(args.file).pipe(Effect.flatMap(text => emit(text, args.output)))),
).pipe(Command.withDescription("Print the schema with every \\i include expanded"));

const foldCommand = Command.make("fold", { file, output }, args =>
  withConfig(foldSchema(args.file).pipe(Effect.flatMap(text => emit(text, args.output)))),
).pipe(Command.withDescription("Rewrite the schema in canonical form, keeping its layout"));

const dumpCommand = Command.make("dump", { file, output, multiFile }, args =>
  withConfig(
    Effect.gen(function* () {
      if (!args.multiFile) {
        const text = yield* dumpSchema(args.file);
        return yield* emit(text, args.output);
      }
      if (Option.isNone(args.output)) {
        return yield* Effect.fail(new UsageError({ message: "--multi-file needs -o <main file>" }));
      }
      const path = yield* Path.Path;
      const main = args.output.value;
      const files = yield* dumpSchemaFiles(args.file, path.basename(main));
      const results = yield* createFileWriter().writeAll(files, { outputDir: path.dirname(main) });
      yield* Effect.forEach(results, result => Effect.logDebug(`✓ ${result.path}`));
      yield* Console.log(`✓ Wrote ${results.length} files`);
    }),
  ),
).pipe(Command.withDescription("Write the whole schema as a canonical dump"));

const compareCommand = Command.make(
  "compare",
  {
    input: Args.file({ name: "input" }).pipe(Args.withDescription("Root schema file")),
    expected: Args.file({ name: "expected" }).pipe(Args.withDescription("Expected canonical output")),
    mode,
  },
  args =>
    withConfig(
      verifyFixture(args.input, args.expected, args.mode).pipe(Effect.andThen(Console.log("✓ Schemas match"))),
    ),
).pipe(Command.withDescription("Compare a schema's canonical form with an expected file"));

const fingerprintCommand = Command.make("fingerprint", { file }, args =>
  withConfig(fingerprintSchema(args.file).pipe(Effect.flatMap(hash => Console.log(hash)))),
).pipe(Command.withDescription("Print the SHA-256 of the schema's canonical dump"));

const rootCommand = pgfold.pipe(
  Command.withSubcommands([expandCommand, foldCommand, dumpCommand, compareCommand, fingerprintCommand]),
);

// ============================================================================
// CLI App
// ============================================================================

const cli = Command.run(rootCommand, {
  name: "pgfold",
  version: packageJson.version,
});

// Run with Node.js platform
cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain);
