/**
 * Config Loader Service
 *
 * Loads and validates pgfold.config.{ts,js,mjs,cjs,json} using lilconfig.
 * Wraps the async config loading in Effect for proper error handling.
 */
import { Context, Effect, Layer, Schema as S, ParseResult, pipe } from "effect";
import { lilconfig } from "lilconfig";
import { Config, defaultConfig, type ConfigInput, type ResolvedConfig } from "../config.js";
import { ConfigNotFound, ConfigInvalid } from "../errors.js";

/**
 * Config Loader service interface
 */
export interface ConfigLoader {
  /**
   * Load configuration from file.
   * Without a config file in `searchFrom` the defaults apply; an explicit
   * `configPath` that does not exist fails with ConfigNotFound.
   * @param configPath - Optional explicit path to config file
   * @param searchFrom - Directory to search from (default: cwd)
   */
  readonly load: (options?: {
    readonly configPath?: string;
    readonly searchFrom?: string;
  }) => Effect.Effect<ResolvedConfig, ConfigNotFound | ConfigInvalid>;
}

/**
 * ConfigLoader service tag
 */
export class ConfigLoaderService extends Context.Tag("ConfigLoader")<ConfigLoaderService, ConfigLoader>() {}

/**
 * Default config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  "pgfold.config.ts",
  "pgfold.config.js",
  "pgfold.config.mjs",
  "pgfold.config.cjs",
  "pgfold.config.json",
];

const hasDefault = (mod: unknown): mod is { readonly default: unknown } =>
  typeof mod === "object" && mod !== null && "default" in mod;

/**
 * Dynamic import loader for TypeScript files
 */
const dynamicImport = async (filepath: string): Promise<unknown> => {
  const mod: unknown = await import(filepath);
  return hasDefault(mod) ? mod.default : mod;
};

/**
 * Create the lilconfig instance with TypeScript support
 */
function createLilconfig() {
  return lilconfig("pgfold", {
    searchPlaces: CONFIG_FILE_NAMES,
    loaders: { ".ts": dynamicImport },
  });
}

/**
 * Format Schema decode errors into readable strings
 */
function formatSchemaErrors(error: ParseResult.ParseError): readonly string[] {
  return ParseResult.ArrayFormatter.formatErrorSync(error).map(
    issue => `${issue.path.length > 0 ? `${issue.path.map(String).join(".")}: ` : ""}${issue.message}`,
  );
}

const isMissingFile = (error: unknown): boolean =>
  typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";

/**
 * Create a ConfigLoader implementation
 */
export function createConfigLoader(): ConfigLoader {
  const lc = createLilconfig();

  return {
    load: options =>
      Effect.gen(function* () {
        const searchFrom = options?.searchFrom ?? process.cwd();
        const configPath = options?.configPath;

        // Search for or load specific config file
        const result = yield* Effect.tryPromise({
          try: async () => {
            if (configPath) {
              return await lc.load(configPath);
            }
            return await lc.search(searchFrom);
          },
          catch: error =>
            configPath && isMissingFile(error)
              ? new ConfigNotFound({
                  message: `Config file ${configPath} not found`,
                  searchPaths: [configPath],
                })
              : new ConfigInvalid({
                  message: `Failed to load config: ${error instanceof Error ? error.message : String(error)}`,
                  path: configPath ?? searchFrom,
                  errors: [String(error)],
                }),
        });

        if (!result) {
          yield* Effect.logDebug(`No config file found from ${searchFrom}, using defaults`);
          return defaultConfig;
        }

        const filepath = result.filepath;
        yield* Effect.logDebug(`Loading config from ${filepath}`);

        // An empty file means defaults
        const parsed = yield* pipe(
          S.decodeUnknown(Config, { errors: "all" })(result.isEmpty === true ? {} : result.config),
          Effect.mapError(
            parseError =>
              new ConfigInvalid({
                message: `Invalid configuration in ${filepath}`,
                path: filepath,
                errors: formatSchemaErrors(parseError),
              }),
          ),
        );

        const resolved: ResolvedConfig = {
          schema: parsed.schema,
          strict: parsed.strict,
          comments: parsed.comments,
          header: parsed.header,
          ignore: parsed.ignore,
          configPath: filepath,
        };

        return resolved;
      }),
  };
}

/**
 * Live layer for ConfigLoader
 */
export const ConfigLoaderLive = Layer.succeed(ConfigLoaderService, createConfigLoader());

/**
 * Helper to define a config (provides type safety for users)
 */
export function defineConfig(config: ConfigInput): ConfigInput {
  return config;
}
