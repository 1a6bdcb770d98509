import * as Either from "effect/Either"

import type { Decoder } from "./decoder.js"
import { decoderTiers, defaultDecoderOptions, makeDecoder } from "./decoder.js"
import type { Encoder } from "./encoder.js"
import { defaultEncoderOptions, encoderTiers, makeEncoder } from "./encoder.js"
import type { CastingError, CodecError, MalformedInput } from "./errors.js"
import { malformedInput } from "./errors.js"
import type { FormatterOptions } from "./formatter.js"
import { makeFormatter } from "./formatter.js"
import type { Tier, Value } from "./json.js"
import type { TargetType } from "./target.js"
import { makeCustomDecoder } from "./target.js"

// CHANGE: public dumps/loads/format entry points that pick a tier and forward text
// WHY: callers choose a tier by name instead of assembling encoders and decoders
// FORMAT THEOREM: ∀v,tier: loads(dumps(v, tier), tier) ≅ v
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: default instances are built once and reused
// COMPLEXITY: O(n)

export const JSON_ENCODING = "utf-8"

export interface DumpsOptions {
  readonly tier?: Tier
  readonly encoding?: string
  readonly indent?: number
  readonly maxDepth?: number
}

export interface LoadsOptions {
  readonly tier?: Tier
  readonly encoding?: string
  readonly maxDepth?: number
}

export type FormatOptions = Partial<FormatterOptions>

export type Input = string | Uint8Array

const defaultEncoders: Readonly<Record<Tier, Encoder>> = {
  basic: makeEncoder(encoderTiers.basic),
  advanced: makeEncoder(encoderTiers.advanced),
  custom: makeEncoder(encoderTiers.custom)
}

const defaultDecoders: Readonly<Record<Tier, Decoder>> = {
  basic: makeDecoder(decoderTiers.basic),
  advanced: makeDecoder(decoderTiers.advanced),
  custom: makeDecoder(decoderTiers.custom)
}

const defaultCustomDecoder = makeCustomDecoder()

const defaultFormatter = makeFormatter()

const encoderFor = (tier: Tier, maxDepth: number | undefined): Encoder =>
  maxDepth === undefined ? defaultEncoders[tier] : makeEncoder(encoderTiers[tier], { ...defaultEncoderOptions, maxDepth })

const decoderFor = (tier: Tier, maxDepth: number | undefined): Decoder =>
  maxDepth === undefined ? defaultDecoders[tier] : makeDecoder(decoderTiers[tier], { maxDepth })

/**
 * Turn raw bytes into text with the named encoding; text input passes through.
 *
 * @param input - JSON text or its encoded bytes.
 * @param encoding - WHATWG encoding label, used only for bytes.
 * @returns Text, or MalformedInput for an unknown label or undecodable bytes.
 *
 * @pure true
 * @complexity O(n)
 */
export const decodeInput = (input: Input, encoding: string = JSON_ENCODING): Either.Either<string, MalformedInput> =>
  typeof input === "string"
    ? Either.right(input)
    : Either.try({
      try: () => new TextDecoder(encoding, { fatal: true }).decode(input),
      catch: (error) => malformedInput(`Cannot decode ${encoding} input: ${String(error)}`)
    })

export const format = (text: string, options?: FormatOptions): Either.Either<string, MalformedInput> =>
  options === undefined ? defaultFormatter.format(text) : makeFormatter(options).format(text)

/**
 * Encode a value at a tier, optionally pretty-printed.
 *
 * @param value - Value to encode; top-level bytes are read as text in `options.encoding`.
 * @param options - Tier (default "custom"), indent width for pretty output, nesting limit.
 * @returns JSON text or the first codec error.
 *
 * @pure true
 * @complexity O(n)
 */
export const dumps = (value: unknown, options: DumpsOptions = {}): Either.Either<string, CodecError> => {
  const encoder = encoderFor(options.tier ?? "custom", options.maxDepth)
  const encoded: Either.Either<string, CodecError> = value instanceof Uint8Array
    ? Either.flatMap(decodeInput(value, options.encoding), encoder.encode)
    : encoder.encode(value)
  const { indent } = options
  if (indent === undefined) {
    return encoded
  }
  const layout: FormatOptions = options.maxDepth === undefined
    ? { indentWidth: indent }
    : { indentWidth: indent, maxDepth: options.maxDepth }
  return Either.flatMap(encoded, (text) => format(text, layout))
}

export const loads = (input: Input, options: LoadsOptions = {}): Either.Either<Value, CodecError> =>
  Either.flatMap(
    decodeInput(input, options.encoding),
    (text) => decoderFor(options.tier ?? "custom", options.maxDepth).decode(text)
  )

/**
 * Decode at the custom tier and rebuild an instance of the target type.
 *
 * @pure true
 * @complexity O(n)
 */
export const loadsAs = <A>(
  input: Input,
  target: TargetType<A>,
  options: Omit<LoadsOptions, "tier"> = {}
): Either.Either<A, MalformedInput | CastingError> => {
  const decoder = options.maxDepth === undefined
    ? defaultCustomDecoder
    : makeCustomDecoder({ ...defaultDecoderOptions, maxDepth: options.maxDepth })
  return Either.flatMap(decodeInput(input, options.encoding), (text) => decoder.decodeAs(text, target))
}
