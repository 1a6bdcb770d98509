import { Match } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { MalformedInput } from "./errors.js"
import { malformedInput } from "./errors.js"
import type { Lexeme, Scan } from "./grammar.js"
import {
  isAtEnd,
  peekLexeme,
  readBoolean,
  readNull,
  readNumber,
  readString,
  skipBom,
  skipWhitespace
} from "./grammar.js"
import type { Tier, Value, ValueObject } from "./json.js"
import type { ObjectRecognizer, StringRecognizer } from "./recognizers.js"
import { advancedObjectRecognizers, advancedStringRecognizers } from "./recognizers.js"

// CHANGE: recursive-descent decoder whose tiers are ordered recognizer lists
// WHY: every tier shares one JSON grammar and differs only in how strings and objects are read back
// FORMAT THEOREM: ∀t: decode(t) = Right(v) → t = ws · lexeme(v) · ws
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the decoder holds only immutable configuration; depth ≤ maxDepth
// COMPLEXITY: O(n) time, O(d) stack where d = nesting depth

export interface DecoderTier {
  readonly tier: Tier
  readonly strings: ReadonlyArray<StringRecognizer>
  readonly objects: ReadonlyArray<ObjectRecognizer>
}

export interface DecoderOptions {
  readonly maxDepth: number
}

export interface Decoder {
  readonly tier: Tier
  readonly options: DecoderOptions
  readonly decode: (text: string) => Either.Either<Value, MalformedInput>
}

export const defaultDecoderOptions: DecoderOptions = { maxDepth: 512 }

export const basicDecoderTier: DecoderTier = { tier: "basic", strings: [], objects: [] }

export const advancedDecoderTier: DecoderTier = {
  tier: "advanced",
  strings: advancedStringRecognizers,
  objects: advancedObjectRecognizers
}

export const customDecoderTier: DecoderTier = { ...advancedDecoderTier, tier: "custom" }

export const decoderTiers: Readonly<Record<Tier, DecoderTier>> = {
  basic: basicDecoderTier,
  advanced: advancedDecoderTier,
  custom: customDecoderTier
}

interface Context {
  readonly text: string
  readonly chain: DecoderTier
  readonly maxDepth: number
}

const recognize = <A>(
  recognizers: ReadonlyArray<(input: A) => Option.Option<Value>>,
  input: A,
  fallback: Value
): Value => {
  for (const recognizer of recognizers) {
    const recognized = recognizer(input)
    if (Option.isSome(recognized)) {
      return recognized.value
    }
  }
  return fallback
}

const tooDeep = (): MalformedInput => malformedInput("Nesting too deep")

const decodeNumber = (ctx: Context, pos: number): Scan<Value> =>
  Either.map(readNumber(ctx.text, pos), ({ end, value }) => ({
    value: value.integral ? BigInt(value.raw) : Number(value.raw),
    end
  }))

const decodeString = (ctx: Context, pos: number): Scan<Value> =>
  Either.map(readString(ctx.text, pos), ({ end, value }) => ({
    value: recognize(ctx.chain.strings, value, value),
    end
  }))

const decodeArray = (ctx: Context, pos: number, depth: number): Scan<Value> => {
  if (depth >= ctx.maxDepth) {
    return Either.left(tooDeep())
  }
  const { text } = ctx
  const items: Array<Value> = []
  let end = skipWhitespace(text, pos + 1)
  if (text.charAt(end) === "]") {
    return Either.right({ value: items, end: end + 1 })
  }
  while (end < text.length) {
    const item = decodeValue(ctx, end, depth + 1)
    if (Either.isLeft(item)) {
      return item
    }
    items.push(item.right.value)
    end = skipWhitespace(text, item.right.end)
    const char = text.charAt(end)
    if (char === "]") {
      return Either.right({ value: items, end: end + 1 })
    }
    if (char !== ",") {
      break
    }
    end += 1
  }
  return Either.left(malformedInput("Error in parsing json \"array\" string"))
}

const decodeObject = (ctx: Context, pos: number, depth: number): Scan<Value> => {
  if (depth >= ctx.maxDepth) {
    return Either.left(tooDeep())
  }
  const { text } = ctx
  const members = new Map<string, Value>()
  const finish = (end: number): Scan<Value> => {
    const object: ValueObject = members
    return Either.right({ value: recognize(ctx.chain.objects, object, object), end })
  }
  let end = skipWhitespace(text, pos + 1)
  if (text.charAt(end) === "}") {
    return finish(end + 1)
  }
  while (end < text.length) {
    const key = readString(text, skipWhitespace(text, end))
    if (Either.isLeft(key)) {
      return Either.left(key.left)
    }
    end = skipWhitespace(text, key.right.end)
    if (text.charAt(end) !== ":") {
      break
    }
    const member = decodeValue(ctx, end + 1, depth + 1)
    if (Either.isLeft(member)) {
      return member
    }
    members.set(key.right.value, member.right.value)
    end = skipWhitespace(text, member.right.end)
    const char = text.charAt(end)
    if (char === "}") {
      return finish(end + 1)
    }
    if (char !== ",") {
      break
    }
    end += 1
  }
  return Either.left(malformedInput("Error in parsing json \"object\" string"))
}

const decodeLexeme = (ctx: Context, lexeme: Lexeme, pos: number, depth: number): Scan<Value> =>
  Match.value(lexeme).pipe(
    Match.when("null", (): Scan<Value> => readNull(ctx.text, pos)),
    Match.when("boolean", (): Scan<Value> => readBoolean(ctx.text, pos)),
    Match.when("number", () => decodeNumber(ctx, pos)),
    Match.when("string", () => decodeString(ctx, pos)),
    Match.when("array", () => decodeArray(ctx, pos, depth)),
    Match.when("object", () => decodeObject(ctx, pos, depth)),
    Match.exhaustive
  )

const decodeValue = (ctx: Context, pos: number, depth: number): Scan<Value> => {
  const start = skipWhitespace(ctx.text, pos)
  const lexeme = peekLexeme(ctx.text, start)
  if (Option.isNone(lexeme)) {
    return Either.left(malformedInput("Wrong JSON string"))
  }
  return decodeLexeme(ctx, lexeme.value, start, depth)
}

/**
 * Build a decoder for one tier.
 *
 * @param chain - Recognizers consulted after each plain string and object.
 * @param options - Nesting limit.
 * @returns Decoder whose decode is pure and reentrant.
 *
 * @pure true
 * @invariant decode fails on empty text and on any trailing non-whitespace
 * @complexity O(n)
 */
export const makeDecoder = (
  chain: DecoderTier,
  options: DecoderOptions = defaultDecoderOptions
): Decoder => ({
  tier: chain.tier,
  options,
  decode: (text) => {
    if (text.length === 0) {
      return Either.left(malformedInput("Empty JSON text"))
    }
    const ctx: Context = { text, chain, maxDepth: options.maxDepth }
    const scanned = decodeValue(ctx, skipBom(text), 0)
    if (Either.isLeft(scanned)) {
      return Either.left(scanned.left)
    }
    if (!isAtEnd(text, scanned.right.end)) {
      return Either.left(malformedInput("Incorrect end of json string"))
    }
    return Either.right(scanned.right.value)
  }
})
