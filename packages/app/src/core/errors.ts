import type { CliError } from "./cli.js"

// CHANGE: unify the error algebra for the codec, the shell and the CLI
// WHY: every failure is a tagged value that callers can match on
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique; codec errors carry no cursor position
// COMPLEXITY: O(1)/O(1)

export type MalformedInput = { readonly _tag: "MalformedInput"; readonly message: string }
export type UnsupportedType = { readonly _tag: "UnsupportedType"; readonly message: string }
export type CastingError = { readonly _tag: "CastingError"; readonly message: string }

export type CodecError = MalformedInput | UnsupportedType | CastingError

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }

export type AppError =
  | CliError
  | CodecError
  | ConfigError
  | FileError

export const malformedInput = (message: string): MalformedInput => ({
  _tag: "MalformedInput",
  message
})

export const unsupportedType = (message: string): UnsupportedType => ({
  _tag: "UnsupportedType",
  message
})

export const castingError = (message: string): CastingError => ({
  _tag: "CastingError",
  message
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const renderError = (error: AppError): string => `${error._tag}: ${error.message}`
