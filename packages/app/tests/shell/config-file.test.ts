import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { decodeConfig, loadConfigFile } from "../../src/shell/config-file.js"
import { provideNodeContext, withTempDir } from "../app/test-helpers.js"

describe("decodeConfig", () => {
  it.effect("keeps only the keys present in the file", () =>
    Effect.gen(function*(_) {
      const config = yield* _(decodeConfig("{\"tier\":\"basic\",\"indent\":2,\"eol\":\"lf\"}"))
      expect(config).toStrictEqual({ tier: "basic", indent: 2, eol: "lf" })
    }))

  it.effect("rejects values outside the schema", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(decodeConfig("{\"tier\":\"expert\"}")))
      expect(error._tag).toBe("ConfigError")
      const depth = yield* _(Effect.flip(decodeConfig("{\"maxDepth\":0}")))
      expect(depth._tag).toBe("ConfigError")
    }))

  it.effect("rejects text that is not JSON", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(decodeConfig("tier: basic")))
      expect(error._tag).toBe("ConfigError")
    }))
})

describe("loadConfigFile", () => {
  it.effect("ignores a missing default file and fails on a missing explicit one", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const missing = path.join(tempDir, ".tiered-json.json")
        expect(yield* _(loadConfigFile(missing, false))).toBeUndefined()
        const error = yield* _(Effect.flip(loadConfigFile(missing, true)))
        expect(error).toEqual({ _tag: "FileError", message: `Config file not found: ${missing}` })
      })
    ).pipe(provideNodeContext))

  it.effect("decodes an existing file", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const configPath = path.join(tempDir, "config.json")
        yield* _(fs.writeFileString(configPath, "{\"maxDepth\": 32, \"encoding\": \"latin1\"}"))
        expect(yield* _(loadConfigFile(configPath, true))).toStrictEqual({ encoding: "latin1", maxDepth: 32 })
      })
    ).pipe(provideNodeContext))
})
