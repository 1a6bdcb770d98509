import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import type { CliArgs } from "../../src/core/cli.js"
import { parseCliArgs } from "../../src/core/cli.js"
import { defaultConfig, formatterOptionsFor, resolveConfig } from "../../src/core/config.js"

const cli = (...flags: ReadonlyArray<string>): CliArgs =>
  Either.getOrThrow(parseCliArgs(["node", "tiered-json", "format", "--input", "a.json", ...flags]))

describe("resolveConfig", () => {
  it.effect("falls back to defaults", () =>
    Effect.sync(() => {
      expect(resolveConfig(cli(), undefined)).toEqual(defaultConfig)
      expect(defaultConfig.tier).toBe("custom")
      expect(defaultConfig.eol).toBe("crlf")
    }))

  it.effect("prefers flags over the file and the file over defaults", () =>
    Effect.sync(() => {
      const resolved = resolveConfig(cli("--tier", "basic"), { tier: "advanced", indent: 2, eol: "lf" })
      expect(resolved).toEqual({
        tier: "basic",
        indent: 2,
        align: 0,
        eol: "lf",
        encoding: "utf-8",
        maxDepth: 512
      })
    }))
})

describe("formatterOptionsFor", () => {
  it.effect("derives separators from the line ending", () =>
    Effect.sync(() => {
      const options = formatterOptionsFor(resolveConfig(cli("--eol", "lf", "--align", "3"), { maxDepth: 9 }))
      expect(options).toEqual({
        alignBase: 3,
        indentWidth: 4,
        itemSeparator: ",\n",
        keySeparator: ": ",
        lineEnding: "\n",
        maxDepth: 9
      })
    }))

  it.effect("uses the configured indent width", () =>
    Effect.sync(() => {
      const options = formatterOptionsFor(resolveConfig(cli("--indent", "0"), undefined))
      expect(options.indentWidth).toBe(0)
      expect(options.itemSeparator).toBe(",\r\n")
    }))
})
