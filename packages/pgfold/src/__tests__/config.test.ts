/**
 * Config Loader and Config Service Tests
 */
import { describe, it, expect } from "@effect/vitest"
import { Effect, Layer } from "effect"
import { Path } from "@effect/platform"
import { NodeFileSystem, NodePath } from "@effect/platform-node"
import { defaultConfig } from "../config.js"
import { emptyIgnoreRules } from "../ir/ignore.js"
import { createConfigLoader } from "../services/config-loader.js"
import { ConfigFromFile, ConfigService, ConfigTest } from "../services/config.js"
import { withSchemaTree } from "./fixtures/index.js"

const TestLayer = Layer.merge(NodeFileSystem.layer, NodePath.layer)

describe("ConfigLoader", () => {
  it.effect("reads and fills in a JSON config", () =>
    withSchemaTree(
      { "pgfold.config.json": JSON.stringify({ schema: "app", strict: false, ignore: { tables: ["tmp_*"] } }) },
      dir =>
        Effect.gen(function* () {
          const pathSvc = yield* Path.Path
          const config = yield* createConfigLoader().load({ searchFrom: dir })
          expect(config).toEqual({
            schema: "app",
            strict: false,
            comments: true,
            header: true,
            ignore: { ...emptyIgnoreRules, tables: ["tmp_*"] },
            configPath: pathSvc.join(dir, "pgfold.config.json"),
          })
        }),
    ).pipe(Effect.provide(TestLayer))
  )

  it.effect("uses the defaults when there is no config file", () =>
    withSchemaTree({ "schema.sql": "" }, dir =>
      Effect.gen(function* () {
        const config = yield* createConfigLoader().load({ searchFrom: dir })
        expect(config).toEqual(defaultConfig)
      }),
    ).pipe(Effect.provide(TestLayer))
  )

  it.effect("reports each invalid setting", () =>
    withSchemaTree({ "pgfold.config.json": JSON.stringify({ schema: "", strict: "yes" }) }, dir =>
      Effect.gen(function* () {
        const error = yield* createConfigLoader().load({ searchFrom: dir }).pipe(Effect.flip)
        expect(error._tag).toBe("ConfigInvalid")
        if (error._tag !== "ConfigInvalid") return
        expect(error.errors).toEqual(["schema: must be a non-empty schema name", 'strict: Expected boolean, actual "yes"'])
      }),
    ).pipe(Effect.provide(TestLayer))
  )

  it.effect("fails when an explicit config file is missing", () =>
    withSchemaTree({}, dir =>
      Effect.gen(function* () {
        const pathSvc = yield* Path.Path
        const configPath = pathSvc.join(dir, "missing.config.json")
        const error = yield* createConfigLoader().load({ configPath }).pipe(Effect.flip)
        expect(error._tag).toBe("ConfigNotFound")
        if (error._tag !== "ConfigNotFound") return
        expect(error.searchPaths).toEqual([configPath])
      }),
    ).pipe(Effect.provide(TestLayer))
  )
})

describe("ConfigService", () => {
  it.effect("applies command line overrides over the file", () =>
    withSchemaTree({ "pgfold.config.json": JSON.stringify({ schema: "app", comments: false }) }, dir =>
      Effect.gen(function* () {
        const config = yield* ConfigService
        expect(config.schema).toBe("other")
        expect(config.comments).toBe(false)
      }).pipe(Effect.provide(ConfigFromFile({ searchFrom: dir }, { schema: "other" }))),
    ).pipe(Effect.provide(TestLayer))
  )

  it.effect("provides test settings over the defaults", () =>
    Effect.gen(function* () {
      const config = yield* ConfigService
      expect(config).toEqual({ ...defaultConfig, header: false })
    }).pipe(Effect.provide(ConfigTest({ header: false })))
  )
})
