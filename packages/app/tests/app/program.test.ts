import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { runCli } from "../../src/app/program.js"
import { provideNodeContext, withTempDir } from "./test-helpers.js"

const argv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "tiered-json", ...args]

describe("runCli", () => {
  it.effect("formats a file into the default CRLF layout", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const input = path.join(tempDir, "in.json")
        const output = path.join(tempDir, "out.json")
        yield* _(fs.writeFileString(input, "{\"a\":1,\"b\":[true,false]}"))

        const result = yield* _(runCli(argv("format", "--input", input, "--output", output)))
        const expected = "{\r\n    \"a\": 1,\r\n    \"b\": [\r\n        true,\r\n        false\r\n    ]\r\n}"

        expect(result).toEqual({ output: expected, exitCode: 0 })
        expect(yield* _(fs.readFileString(output))).toBe(expected)
        expect(yield* _(fs.readFileString(input))).toBe("{\"a\":1,\"b\":[true,false]}")
      })
    ).pipe(provideNodeContext))

  it.effect("normalizes extended values and lays them out", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const input = path.join(tempDir, "in.json")
        const output = path.join(tempDir, "out.json")
        yield* _(
          fs.writeFileString(input, "{\"id\":\"6F1C2B3A-4D5E-4F60-8A7B-9C0D1E2F3A4B\",\"z\":{\"real\":1,\"imag\":0}}")
        )

        yield* _(
          runCli(
            argv("normalize", "--input", input, "--output", output, "--tier", "advanced", "--indent", "2", "--eol", "lf")
          )
        )

        expect(yield* _(fs.readFileString(output))).toBe(
          "{\n  \"id\": \"6f1c2b3a-4d5e-4f60-8a7b-9c0d1e2f3a4b\",\n  \"z\": {\n    \"real\": 1.0,\n    \"imag\": 0.0\n  }\n}"
        )
      })
    ).pipe(provideNodeContext))

  it.effect("normalizes to compact text without an indent", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const input = path.join(tempDir, "in.json")
        const output = path.join(tempDir, "out.json")
        yield* _(fs.writeFileString(input, "[ 1.0 ,\"2024-03-01\" ]"))

        const basic = yield* _(runCli(argv("normalize", "--input", input, "--output", output, "--tier", "basic")))
        expect(basic.output).toBe("[1.0, \"2024-03-01\"]")
      })
    ).pipe(provideNodeContext))

  it.effect("takes layout settings from an explicit config file", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const input = path.join(tempDir, "in.json")
        const output = path.join(tempDir, "out.json")
        const config = path.join(tempDir, "layout.json")
        yield* _(fs.writeFileString(input, "[1,2]"))
        yield* _(fs.writeFileString(config, "{\"indent\": 1, \"eol\": \"lf\"}"))

        const result = yield* _(runCli(argv("format", "--input", input, "--output", output, "--config", config)))
        expect(result.output).toBe("[\n 1,\n 2\n]")
      })
    ).pipe(provideNodeContext))

  it.effect("checks a file and reports ok", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const input = path.join(tempDir, "in.json")
        const output = path.join(tempDir, "status.txt")
        yield* _(fs.writeFileString(input, "{\"a\": [null]}"))

        const result = yield* _(runCli(argv("check", "--input", input, "--output", output)))
        expect(result).toEqual({ output: "ok", exitCode: 0 })
        expect(yield* _(fs.readFileString(output))).toBe("ok")
      })
    ).pipe(provideNodeContext))

  it.effect("fails with a typed error on malformed input", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const input = path.join(tempDir, "in.json")
        yield* _(fs.writeFileString(input, "nullx"))

        const error = yield* _(Effect.flip(runCli(argv("check", "--input", input))))
        expect(error).toEqual({ _tag: "MalformedInput", message: "Incorrect end of json string" })
      })
    ).pipe(provideNodeContext))

  it.effect("fails on a missing explicit config file and on bad arguments", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const missing = path.join(tempDir, "none.json")
        const configError = yield* _(
          Effect.flip(runCli(argv("format", "--input", path.join(tempDir, "in.json"), "--config", missing)))
        )
        expect(configError).toEqual({ _tag: "FileError", message: `Config file not found: ${missing}` })

        const cliError = yield* _(Effect.flip(runCli(argv("format"))))
        expect(cliError).toEqual({ _tag: "CliError", message: "Missing --input" })
      })
    ).pipe(provideNodeContext))
})
