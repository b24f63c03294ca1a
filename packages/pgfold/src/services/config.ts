/**
 * Config Service
 *
 * Provides loaded configuration via Effect DI.
 *
 * config-loader.ts holds the loading logic; this module holds the service
 * tag and its layers:
 * - ConfigFromFile: Load from file, defaults when there is none
 * - ConfigTest: Provide config directly for testing
 */
import { Context, Effect, Layer } from "effect";
import { defaultConfig, type ResolvedConfig } from "../config.js";
import type { ConfigInvalid, ConfigNotFound } from "../errors.js";
import { createConfigLoader } from "./config-loader.js";

/**
 * Service that provides the loaded configuration.
 * The service value IS the ResolvedConfig directly.
 */
export class ConfigService extends Context.Tag("ConfigService")<ConfigService, ResolvedConfig>() {}

/** Settings given on the command line, applied over the file */
export interface ConfigOverrides {
  readonly schema?: string;
}

/**
 * Load config from file, then apply overrides.
 */
export const ConfigFromFile = (
  opts?: {
    readonly configPath?: string;
    readonly searchFrom?: string;
  },
  overrides: ConfigOverrides = {},
): Layer.Layer<ConfigService, ConfigNotFound | ConfigInvalid> =>
  Layer.effect(
    ConfigService,
    Effect.gen(function* () {
      const loader = createConfigLoader();
      const config = yield* loader.load(opts);
      return overrides.schema === undefined ? config : { ...config, schema: overrides.schema };
    }),
  );

/**
 * Provide config directly for testing.
 */
export const ConfigTest = (config: Partial<ResolvedConfig> = {}): Layer.Layer<ConfigService> =>
  Layer.succeed(ConfigService, { ...defaultConfig, ...config });
