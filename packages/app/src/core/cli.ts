import { Match } from "effect"
import * as Either from "effect/Either"

import type { Tier } from "./json.js"
import { isTier } from "./json.js"

// CHANGE: deterministic CLI parsing for the tiered-json program
// WHY: argument errors are reported before any file is touched
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands ∧ args.inputPath ≠ ""
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and positional arguments are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "format" | "normalize" | "check"

export type LineEnding = "crlf" | "lf"

export interface CliArgs {
  readonly command: CliCommand
  readonly inputPath: string
  readonly outputPath: string | undefined
  readonly configPath: string | undefined
  readonly configPathExplicit: boolean
  readonly tier: Tier | undefined
  readonly indent: number | undefined
  readonly align: number | undefined
  readonly eol: LineEnding | undefined
  readonly encoding: string | undefined
  readonly maxDepth: number | undefined
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-")

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("format", () => Either.right<CliCommand>("format")),
    Match.when("normalize", () => Either.right<CliCommand>("normalize")),
    Match.when("check", () => Either.right<CliCommand>("check")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const DIGITS = /^\d+$/

const parseCount = (flagName: string, value: string, minimum: number): Either.Either<number, CliError> => {
  const parsed = DIGITS.test(value) ? Number(value) : Number.NaN
  return Number.isSafeInteger(parsed) && parsed >= minimum
    ? Either.right(parsed)
    : Either.left(cliError(`Invalid value for --${flagName}: ${value}`))
}

const parseTier = (value: string): Either.Either<Tier, CliError> =>
  isTier(value) ? Either.right(value) : Either.left(cliError(`Unknown tier: ${value}`))

const parseLineEnding = (value: string): Either.Either<LineEnding, CliError> =>
  value === "crlf" || value === "lf" ? Either.right(value) : Either.left(cliError(`Unknown line ending: ${value}`))

interface PartialArgs extends Omit<CliArgs, "inputPath"> {
  readonly inputPath: string | undefined
}

const defaultArgs = (command: CliCommand): PartialArgs => ({
  command,
  inputPath: undefined,
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

interface ParsedFlag {
  readonly next: PartialArgs
  readonly consumed: number
}

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const parseValueFlag = (
  flagName: string,
  current: PartialArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: PartialArgs, value: string) => Either.Either<PartialArgs, CliError>
): Either.Either<ParsedFlag, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

type FlagParser = (
  current: PartialArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const flagParsers: Readonly<Record<string, FlagParser>> = {
  verbose: (current) => Either.right({ next: { ...current, verbose: true }, consumed: 1 }),
  input: (current, inlineValue, nextValue) =>
    parseValueFlag("input", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, inputPath: value })),
  output: (current, inlineValue, nextValue) =>
    parseValueFlag("output", current, inlineValue, nextValue, (args, value) =>
      Either.right({ ...args, outputPath: value })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) =>
      Either.right({ ...args, configPath: value, configPathExplicit: true })),
  tier: (current, inlineValue, nextValue) =>
    parseValueFlag("tier", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseTier(value), (tier) => ({ ...args, tier }))),
  indent: (current, inlineValue, nextValue) =>
    parseValueFlag("indent", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseCount("indent", value, 0), (indent) => ({ ...args, indent }))),
  align: (current, inlineValue, nextValue) =>
    parseValueFlag("align", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseCount("align", value, 0), (align) => ({ ...args, align }))),
  eol: (current, inlineValue, nextValue) =>
    parseValueFlag("eol", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseLineEnding(value), (eol) => ({ ...args, eol }))),
  encoding: (current, inlineValue, nextValue) =>
    parseValueFlag("encoding", current, inlineValue, nextValue, (args, value) =>
      Either.right({ ...args, encoding: value })),
  "max-depth": (current, inlineValue, nextValue) =>
    parseValueFlag("max-depth", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseCount("max-depth", value, 1), (maxDepth) => ({ ...args, maxDepth })))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: PartialArgs
): Either.Either<ParsedFlag, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const [name = "", inlineValue] = raw.slice(2).split("=", 2)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

const parseFlags = (
  rawArgs: ReadonlyArray<string>,
  initial: PartialArgs
): Either.Either<PartialArgs, CliError> => {
  let args = initial
  let index = 1
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      return Either.left(cliError(`Unexpected positional argument: ${current}`))
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

const requireInput = (args: PartialArgs): Either.Either<CliArgs, CliError> => {
  const { inputPath } = args
  return inputPath === undefined || inputPath.length === 0
    ? Either.left(cliError("Missing --input"))
    : Either.right({ ...args, inputPath })
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant the first argument after the script is the command
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.left(cliError("Missing command: expected format, normalize or check"))
  }
  return Either.flatMap(parseCommand(first), (command) =>
    Either.flatMap(parseFlags(rawArgs, defaultArgs(command)), requireInput))
}
