import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, LogLevel, Logger, Match } from "effect"
import * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import { dumps, format } from "../core/codec.js"
import type { ResolvedConfig } from "../core/config.js"
import { formatterOptionsFor, resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { loadConfigFile } from "../shell/config-file.js"
import { fromEither, load, readText, writeText } from "../shell/io.js"

// CHANGE: orchestrate format/normalize/check with functional core + imperative shell
// WHY: each command is one pipeline from parsed arguments to written output
// FORMAT THEOREM: ∀cmd: run(cmd) = Right(r) → r.exitCode = 0 ∧ r.output is emitted exactly once
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: the input file is never modified unless it is also the --output target
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly output: string
  readonly exitCode: number
}

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const emit = (cli: CliArgs, output: string): Effect.Effect<void, AppError, FileSystemService> =>
  cli.outputPath === undefined
    ? writeStdout(output)
    : writeText(cli.outputPath, output).pipe(Effect.zipRight(Effect.logInfo(`${cli.command}: wrote ${cli.outputPath}`)))

const handleFormat = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<string, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const text = yield* _(readText(cli.inputPath, config.encoding))
    return yield* _(fromEither(format(text, formatterOptionsFor(config))))
  })

// Re-encoding at the configured tier canonicalizes extended values; indent re-lays the compact text.
const handleNormalize = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<string, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const value = yield* _(
      load(cli.inputPath, { tier: config.tier, encoding: config.encoding, maxDepth: config.maxDepth })
    )
    const compact = yield* _(fromEither(dumps(value, { tier: config.tier, maxDepth: config.maxDepth })))
    if (config.indent === undefined) {
      return compact
    }
    return yield* _(fromEither(format(compact, formatterOptionsFor(config))))
  })

const handleCheck = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<string, AppError, FileSystemService> =>
  load(cli.inputPath, { tier: config.tier, encoding: config.encoding, maxDepth: config.maxDepth }).pipe(
    Effect.as("ok")
  )

const executeCommand = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<string, AppError, FileSystemService> =>
  Match.value(cli.command).pipe(
    Match.when("format", () => handleFormat(cli, config)),
    Match.when("normalize", () => handleNormalize(cli, config)),
    Match.when("check", () => handleCheck(cli, config)),
    Match.exhaustive
  )

const runCommand = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fileConfig = yield* _(loadConfigFile(cli.configPath, cli.configPathExplicit))
    const config = resolveConfig(cli, fileConfig)
    yield* _(Effect.logDebug(`${cli.command} ${cli.inputPath} at tier ${config.tier}`))
    const output = yield* _(executeCommand(cli, config))
    yield* _(emit(cli, output))
    return { output, exitCode: 0 }
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the emitted text and exit code.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant debug logs appear only under --verbose
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const parsed = parseCliArgs(argv)
    if (Either.isLeft(parsed)) {
      return yield* _(Effect.fail(parsed.left))
    }
    const cli = parsed.right
    return yield* _(
      runCommand(cli).pipe(Logger.withMinimumLogLevel(cli.verbose ? LogLevel.Debug : LogLevel.Info))
    )
  })
