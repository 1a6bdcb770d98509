import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { parseCliArgs } from "../../src/core/cli.js"

const argv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "tiered-json", ...args]

const rejection = (...args: ReadonlyArray<string>): string =>
  Either.getOrThrow(Either.flip(parseCliArgs(argv(...args)))).message

describe("parseCliArgs", () => {
  it.effect("parses a command with defaults", () =>
    Effect.sync(() => {
      expect(Either.getOrThrow(parseCliArgs(argv("check", "--input", "data.json")))).toEqual({
        command: "check",
        inputPath: "data.json",
        outputPath: undefined,
        configPath: "./.tiered-json.json",
        configPathExplicit: false,
        tier: undefined,
        indent: undefined,
        align: undefined,
        eol: undefined,
        encoding: undefined,
        maxDepth: undefined,
        verbose: false
      })
    }))

  it.effect("accepts separate and inline flag values", () =>
    Effect.sync(() => {
      const parsed = Either.getOrThrow(
        parseCliArgs(
          argv(
            "normalize",
            "--input=in.json",
            "--output",
            "out.json",
            "--tier",
            "advanced",
            "--indent=2",
            "--align",
            "1",
            "--eol=lf",
            "--encoding",
            "utf-16le",
            "--max-depth",
            "64",
            "--config",
            "custom.json",
            "--verbose"
          )
        )
      )
      expect(parsed.command).toBe("normalize")
      expect(parsed.inputPath).toBe("in.json")
      expect(parsed.outputPath).toBe("out.json")
      expect(parsed.tier).toBe("advanced")
      expect(parsed.indent).toBe(2)
      expect(parsed.align).toBe(1)
      expect(parsed.eol).toBe("lf")
      expect(parsed.encoding).toBe("utf-16le")
      expect(parsed.maxDepth).toBe(64)
      expect(parsed.configPath).toBe("custom.json")
      expect(parsed.configPathExplicit).toBe(true)
      expect(parsed.verbose).toBe(true)
    }))

  it.effect("rejects missing or unknown commands", () =>
    Effect.sync(() => {
      expect(rejection()).toBe("Missing command: expected format, normalize or check")
      expect(rejection("--input", "a.json")).toBe("Missing command: expected format, normalize or check")
      expect(rejection("lint", "--input", "a.json")).toBe("Unknown command: lint")
    }))

  it.effect("rejects bad flags and values", () =>
    Effect.sync(() => {
      expect(rejection("format")).toBe("Missing --input")
      expect(rejection("format", "--input", "--verbose")).toBe("Missing value for --input")
      expect(rejection("format", "--input", "a.json", "--color")).toBe("Unknown flag: --color")
      expect(rejection("format", "-i", "a.json")).toBe("Unknown flag: -i")
      expect(rejection("format", "--input", "a.json", "extra")).toBe("Unexpected positional argument: extra")
      expect(rejection("format", "--input", "a.json", "--tier", "expert")).toBe("Unknown tier: expert")
      expect(rejection("format", "--input", "a.json", "--eol", "cr")).toBe("Unknown line ending: cr")
      expect(rejection("format", "--input", "a.json", "--indent=-1")).toBe("Invalid value for --indent: -1")
      expect(rejection("format", "--input", "a.json", "--max-depth=0")).toBe("Invalid value for --max-depth: 0")
      expect(rejection("format", "--input", "a.json", "--indent=")).toBe("Invalid value for --indent: ")
      expect(rejection("format", "--input", "a.json", "--indent", "0x10")).toBe("Invalid value for --indent: 0x10")
      expect(rejection("format", "--input", "a.json", "--align=1e1")).toBe("Invalid value for --align: 1e1")
    }))
})
