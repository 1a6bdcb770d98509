import { Chunk, DateTime, HashMap, HashSet, List } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { UnsupportedType } from "./errors.js"
import { unsupportedType } from "./errors.js"
import { Complex, PlainDate, PlainTime, Slice, Uuid } from "./extended.js"
import type { Tier } from "./json.js"
import { formatFloat } from "./number.js"
import { hasJsonState, hasJsonText, isReflectable, JsonState, JsonText, reflectFields } from "./reflect.js"

// CHANGE: type-dispatching encoder whose tiers are ordered probe lists
// WHY: every tier shares one JSON writer and differs only in which value kinds it accepts
// FORMAT THEOREM: ∀v: encode(v) = Right(t) → decode_tier(t) ≅ v
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: probes never fail for kinds they do not own; only encode reports UnsupportedType
// COMPLEXITY: O(n) where n = encoded size

export type Encoded = Either.Either<string, UnsupportedType>

export interface EncodeContext {
  /** Number of containers enclosing the value being encoded. */
  readonly depth: number
  readonly maxDepth: number
  /** Encode a member one nesting level down. */
  readonly encode: (value: unknown) => Encoded
  readonly itemSeparator: string
  readonly keySeparator: string
}

/** A probe answers None for values outside its kind so the next probe gets a turn. */
export type Probe = (value: unknown, ctx: EncodeContext) => Option.Option<Encoded>

export interface EncoderTier {
  readonly tier: Tier
  readonly probes: ReadonlyArray<Probe>
}

export interface EncoderOptions {
  readonly itemSeparator: string
  readonly keySeparator: string
  readonly maxDepth: number
}

export interface Encoder {
  readonly tier: Tier
  readonly options: EncoderOptions
  readonly encode: (value: unknown) => Encoded
}

export const defaultEncoderOptions: EncoderOptions = {
  itemSeparator: ", ",
  keySeparator: ": ",
  maxDepth: 512
}

const SHORT_ESCAPES: Readonly<Record<string, string>> = {
  "\"": "\\\"",
  "\\": "\\\\",
  "\b": "\\b",
  "\f": "\\f",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t"
}

const ESCAPABLE = /[\u0000-\u001f"\\]/gu

const escapeChar = (char: string): string =>
  SHORT_ESCAPES[char] ?? `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`

export const quote = (text: string): string => `"${text.replace(ESCAPABLE, escapeChar)}"`

const tooDeep = (): UnsupportedType => unsupportedType("Nesting too deep")

const recognized = (encoded: Encoded): Option.Option<Encoded> => Option.some(encoded)

const failed = (message: string): Option.Option<Encoded> => Option.some(Either.left(unsupportedType(message)))

/**
 * Encode items as a JSON array with the configured item separator.
 *
 * @pure true
 * @invariant an empty iterable renders as "[]"; a container opened at depth ≥ maxDepth fails
 * @complexity O(n)
 */
export const encodeItems = (items: Iterable<unknown>, ctx: EncodeContext): Encoded => {
  if (ctx.depth >= ctx.maxDepth) {
    return Either.left(tooDeep())
  }
  const parts: Array<string> = []
  for (const item of items) {
    const encoded = ctx.encode(item)
    if (Either.isLeft(encoded)) {
      return encoded
    }
    parts.push(encoded.right)
  }
  return Either.right(`[${parts.join(ctx.itemSeparator)}]`)
}

/**
 * Encode key/value pairs as a JSON object in iteration order.
 *
 * @pure true
 * @invariant an empty iterable renders as "{}"; every key is a string
 * @complexity O(n)
 */
export const encodeEntries = (entries: Iterable<readonly [unknown, unknown]>, ctx: EncodeContext): Encoded => {
  if (ctx.depth >= ctx.maxDepth) {
    return Either.left(tooDeep())
  }
  const parts: Array<string> = []
  for (const [key, member] of entries) {
    if (typeof key !== "string") {
      return Either.left(unsupportedType(`Object keys must be strings, got ${typeof key}`))
    }
    const encoded = ctx.encode(member)
    if (Either.isLeft(encoded)) {
      return encoded
    }
    parts.push(`${quote(key)}${ctx.keySeparator}${encoded.right}`)
  }
  return Either.right(`{${parts.join(ctx.itemSeparator)}}`)
}

const isPlainRecord = (value: object): boolean => {
  const prototype: unknown = Object.getPrototypeOf(value)
  return prototype === Object.prototype || prototype === null
}

// Basic tier ---------------------------------------------------------------

const probeNull: Probe = (value) => value === null ? recognized(Either.right("null")) : Option.none()

const probeBoolean: Probe = (value) =>
  typeof value === "boolean" ? recognized(Either.right(value ? "true" : "false")) : Option.none()

const probeNumber: Probe = (value) => {
  if (typeof value === "bigint") {
    return recognized(Either.right(value.toString()))
  }
  if (typeof value !== "number") {
    return Option.none()
  }
  return Option.match(formatFloat(value), {
    onNone: () => failed(`Non-finite number ${value} has no JSON form`),
    onSome: (text) => recognized(Either.right(text))
  })
}

const probeString: Probe = (value) => typeof value === "string" ? recognized(Either.right(quote(value))) : Option.none()

const probeArray: Probe = (value, ctx) =>
  Array.isArray(value) ? recognized(encodeItems(value, ctx)) : Option.none()

const probeObject: Probe = (value, ctx) => {
  if (value instanceof Map) {
    return recognized(encodeEntries(value, ctx))
  }
  if (typeof value === "object" && value !== null && isPlainRecord(value)) {
    return recognized(encodeEntries(Object.entries(value), ctx))
  }
  return Option.none()
}

// Advanced tier ------------------------------------------------------------

const pad2 = (value: number): string => String(value).padStart(2, "0")

const formatDate = (year: number, month: number, day: number): string =>
  `${String(year).padStart(4, "0")}-${pad2(month)}-${pad2(day)}`

const formatTime = (hour: number, minute: number, second: number): string =>
  `${pad2(hour)}:${pad2(minute)}:${pad2(second)}`

const formatOffset = (offsetMs: number): string => {
  const totalMinutes = Math.trunc(offsetMs / 60_000)
  if (totalMinutes === 0) {
    return "Z"
  }
  const sign = totalMinutes < 0 ? "-" : "+"
  const magnitude = Math.abs(totalMinutes)
  return `${sign}${pad2(Math.floor(magnitude / 60))}:${pad2(magnitude % 60)}`
}

const formatInstant = (epochMillis: number, offsetMs: number): string => {
  const wall = new Date(epochMillis + offsetMs)
  const date = formatDate(wall.getUTCFullYear(), wall.getUTCMonth() + 1, wall.getUTCDate())
  const time = formatTime(wall.getUTCHours(), wall.getUTCMinutes(), wall.getUTCSeconds())
  return `${date}T${time}${formatOffset(offsetMs)}`
}

/**
 * ISO-8601 text of a temporal value at whole-second precision.
 *
 * @pure true
 * @invariant a zero UTC offset is written as "Z"
 * @complexity O(1)
 */
export const formatTemporal = (value: PlainDate | PlainTime | DateTime.DateTime): string => {
  if (value instanceof PlainDate) {
    return formatDate(value.year, value.month, value.day)
  }
  if (value instanceof PlainTime) {
    return formatTime(value.hour, value.minute, value.second)
  }
  const offsetMs = DateTime.isZoned(value) ? DateTime.zonedOffset(value) : 0
  return formatInstant(DateTime.toEpochMillis(value), offsetMs)
}

const probeUuid: Probe = (value) =>
  value instanceof Uuid ? recognized(Either.right(quote(value.value))) : Option.none()

const probeComplex: Probe = (value, ctx) =>
  value instanceof Complex
    ? recognized(encodeEntries([["real", value.real], ["imag", value.imag]], ctx))
    : Option.none()

const probeSlice: Probe = (value, ctx) =>
  value instanceof Slice
    ? recognized(encodeEntries([["start", value.start], ["stop", value.stop], ["step", value.step]], ctx))
    : Option.none()

const probeTemporal: Probe = (value) => {
  if (value instanceof PlainDate || value instanceof PlainTime || DateTime.isDateTime(value)) {
    return recognized(Either.right(quote(formatTemporal(value))))
  }
  if (value instanceof Date) {
    const epochMillis = value.getTime()
    return Number.isNaN(epochMillis)
      ? failed("Invalid Date has no JSON form")
      : recognized(Either.right(quote(formatInstant(epochMillis, 0))))
  }
  return Option.none()
}

const isTypedArray = (value: unknown): value is Iterable<number | bigint> =>
  ArrayBuffer.isView(value) && !(value instanceof DataView)

// Integer typed arrays carry Int elements; float arrays keep their floats.
const typedItems = (value: Iterable<number | bigint>): Iterable<number | bigint> =>
  value instanceof Float32Array || value instanceof Float64Array
    ? value
    : Array.from(value, (item) => typeof item === "number" ? BigInt(item) : item)

const probeSequence: Probe = (value, ctx) => {
  if (value instanceof Set) {
    return recognized(encodeItems(value, ctx))
  }
  if (isTypedArray(value)) {
    return recognized(encodeItems(typedItems(value), ctx))
  }
  if (Chunk.isChunk(value) || List.isList(value) || HashSet.isHashSet(value)) {
    return recognized(encodeItems(value, ctx))
  }
  return Option.none()
}

const probeMapping: Probe = (value, ctx) =>
  HashMap.isHashMap(value) ? recognized(encodeEntries(value, ctx)) : Option.none()

// Custom tier --------------------------------------------------------------

const runHook = <A>(hook: string, call: () => A): Either.Either<A, UnsupportedType> =>
  Either.try({
    try: call,
    catch: (error) => unsupportedType(`${hook} hook failed: ${String(error)}`)
  })

// A JsonState replacement is encoded one level down, which bounds objects that return themselves.
const probeGenericObject: Probe = (value, ctx) => {
  if (!isReflectable(value)) {
    return Option.none()
  }
  if (hasJsonState(value)) {
    const stateful = value
    const state = runHook("JsonState", () => stateful[JsonState]())
    if (Either.isLeft(state)) {
      return recognized(Either.left(state.left))
    }
    if (Option.isSome(state.right)) {
      return recognized(ctx.encode(state.right.value))
    }
  }
  if (hasJsonText(value)) {
    const textual = value
    return recognized(runHook("JsonText", () => textual[JsonText]()))
  }
  return recognized(Either.flatMap(reflectFields(value), (fields) => encodeEntries(fields, ctx)))
}

const basicProbes: ReadonlyArray<Probe> = [
  probeNull,
  probeBoolean,
  probeNumber,
  probeString,
  probeArray,
  probeObject
]

const advancedProbes: ReadonlyArray<Probe> = [
  ...basicProbes,
  probeUuid,
  probeComplex,
  probeSlice,
  probeTemporal,
  probeSequence,
  probeMapping
]

export const basicEncoderTier: EncoderTier = { tier: "basic", probes: basicProbes }

export const advancedEncoderTier: EncoderTier = { tier: "advanced", probes: advancedProbes }

export const customEncoderTier: EncoderTier = { tier: "custom", probes: [...advancedProbes, probeGenericObject] }

export const encoderTiers: Readonly<Record<Tier, EncoderTier>> = {
  basic: basicEncoderTier,
  advanced: advancedEncoderTier,
  custom: customEncoderTier
}

const describe = (value: unknown): string => {
  if (typeof value !== "object" || value === null) {
    return typeof value
  }
  const constructor: unknown = Reflect.get(value, "constructor")
  return typeof constructor === "function" && constructor.name.length > 0 ? constructor.name : "object"
}

/**
 * Build an encoder for one tier.
 *
 * @param chain - Probes tried in order for every value.
 * @param options - Separators and nesting limit.
 * @returns Encoder whose encode is pure and reentrant.
 *
 * @pure true
 * @invariant UnsupportedType is produced only after every probe answered None
 * @complexity O(n)
 */
export const makeEncoder = (
  chain: EncoderTier,
  options: EncoderOptions = defaultEncoderOptions
): Encoder => {
  const scan = (value: unknown, depth: number): Encoded => {
    if (depth > options.maxDepth) {
      return Either.left(tooDeep())
    }
    const ctx: EncodeContext = {
      depth,
      maxDepth: options.maxDepth,
      encode: (child) => scan(child, depth + 1),
      itemSeparator: options.itemSeparator,
      keySeparator: options.keySeparator
    }
    for (const probe of chain.probes) {
      const result = probe(value, ctx)
      if (Option.isSome(result)) {
        return result.value
      }
    }
    return Either.left(unsupportedType(`Wrong ${chain.tier} value: ${describe(value)}`))
  }
  return {
    tier: chain.tier,
    options,
    encode: (value) => scan(value, 0)
  }
}
