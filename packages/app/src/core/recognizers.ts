import * as Option from "effect/Option"

import type { WallClock } from "./extended.js"
import {
  Complex,
  isCalendarDate,
  makeOffsetDateTime,
  makeUtcDateTime,
  makeUuid,
  PlainDate,
  PlainTime,
  Slice
} from "./extended.js"
import type { Value, ValueObject } from "./json.js"
import { toFloat } from "./number.js"

// CHANGE: recognize extended values inside plain decoded strings and objects
// WHY: extended values travel inside plain JSON strings and objects
// FORMAT THEOREM: ∀s: recognize(s) = Some(v) → pattern(v) fully matches s
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: recognizers never fail; "not recognized" is None
// COMPLEXITY: O(n) where n = string length or key count

export type StringRecognizer = (text: string) => Option.Option<Value>
export type ObjectRecognizer = (object: ValueObject) => Option.Option<Value>

const DATE = String.raw`(?<year>[12]\d{3})-(?<month>0[1-9]|1[0-2])-(?<day>0[1-9]|[12]\d|3[01])`
const TIME = String.raw`(?<hour>2[0-3]|[01]\d):(?<minute>[0-5]\d)` +
  String.raw`(?::(?<second>[0-5]\d)(?:\.(?<fraction>\d{1,6})\d{0,6})?)?`
const OFFSET = String.raw`(?<offset>[Zz]|[+-]\d{2}(?::?\d{2})?)?`

const UUID_PATTERN = /^[a-f0-9]{8}-[a-f0-9]{4}-[1-5][a-f0-9]{3}-[89ab][a-f0-9]{3}-[a-f0-9]{12}$/iu
const DATETIME_PATTERN = new RegExp(`^${DATE}[T ]${TIME}${OFFSET}$`, "u")
const DATE_PATTERN = new RegExp(`^${DATE}$`, "u")
const TIME_PATTERN = new RegExp(`^${TIME}$`, "u")

type Groups = Readonly<Record<string, string | undefined>>

const groupsOf = (pattern: RegExp, text: string): Option.Option<Groups> => {
  const match = pattern.exec(text)
  return match === null ? Option.none() : Option.some(match.groups ?? {})
}

const intGroup = (groups: Groups, name: string): number => Number(groups[name] ?? "0")

const microsecondsOf = (groups: Groups): number => Number((groups["fraction"] ?? "").padEnd(6, "0"))

const timeOf = (groups: Groups): PlainTime =>
  new PlainTime({
    hour: intGroup(groups, "hour"),
    minute: intGroup(groups, "minute"),
    second: intGroup(groups, "second"),
    microsecond: microsecondsOf(groups)
  })

const dateOf = (groups: Groups): Option.Option<PlainDate> => {
  const year = intGroup(groups, "year")
  const month = intGroup(groups, "month")
  const day = intGroup(groups, "day")
  return isCalendarDate(year, month, day) ? Option.some(new PlainDate({ year, month, day })) : Option.none()
}

/**
 * Parse an ISO-8601 offset designator into signed minutes east of UTC.
 *
 * @param designator - "Z", "z", "+HH", "+HHMM" or "+HH:MM" (or the "-" forms).
 * @returns Some(minutes), or None when the offset is 24h or beyond.
 *
 * @pure true
 * @complexity O(1)
 */
export const parseOffset = (designator: string): Option.Option<number> => {
  if (designator === "Z" || designator === "z") {
    return Option.some(0)
  }
  const hours = Number(designator.slice(1, 3))
  const minutes = designator.length > 3 ? Number(designator.slice(-2)) : 0
  if (hours > 23 || minutes > 59) {
    return Option.none()
  }
  const total = hours * 60 + minutes
  return Option.some(designator.startsWith("-") ? -total : total)
}

export const recognizeUuid: StringRecognizer = (text) =>
  UUID_PATTERN.test(text) ? Option.some(makeUuid(text)) : Option.none()

export const recognizeDateTime: StringRecognizer = (text) =>
  Option.flatMap(groupsOf(DATETIME_PATTERN, text), (groups) =>
    Option.flatMap(dateOf(groups), (date) => {
      const time = timeOf(groups)
      const clock: WallClock = {
        year: date.year,
        month: date.month,
        day: date.day,
        hour: time.hour,
        minute: time.minute,
        second: time.second,
        millisecond: Math.floor(time.microsecond / 1000)
      }
      const designator = groups["offset"]
      if (designator === undefined) {
        return Option.some<Value>(makeUtcDateTime(clock))
      }
      return Option.map(parseOffset(designator), (minutes): Value => makeOffsetDateTime(clock, minutes))
    }))

export const recognizeDate: StringRecognizer = (text) =>
  Option.flatMap(groupsOf(DATE_PATTERN, text), (groups) => Option.map(dateOf(groups), (date): Value => date))

export const recognizeTime: StringRecognizer = (text) =>
  Option.map(groupsOf(TIME_PATTERN, text), (groups): Value => timeOf(groups))

const hasExactKeys = (object: ValueObject, keys: ReadonlyArray<string>): boolean =>
  object.size === keys.length && keys.every((key) => object.has(key))

const complexPart = (value: Value | undefined): Option.Option<number> => {
  if (value === null || value === undefined) {
    return Option.some(0)
  }
  return typeof value === "bigint" || typeof value === "number" ? Option.some(toFloat(value)) : Option.none()
}

/** `{real, imag}` in any order; both parts numeric or null. */
export const recognizeComplex: ObjectRecognizer = (object) => {
  if (!hasExactKeys(object, ["real", "imag"])) {
    return Option.none()
  }
  return Option.zipWith(
    complexPart(object.get("real")),
    complexPart(object.get("imag")),
    (real, imag): Value => new Complex({ real, imag })
  )
}

export const recognizeSlice: ObjectRecognizer = (object) =>
  hasExactKeys(object, ["start", "stop", "step"])
    ? Option.some(
      new Slice({
        start: object.get("start") ?? null,
        stop: object.get("stop") ?? null,
        step: object.get("step") ?? null
      })
    )
    : Option.none()

export const advancedStringRecognizers: ReadonlyArray<StringRecognizer> = [
  recognizeUuid,
  recognizeDateTime,
  recognizeDate,
  recognizeTime
]

export const advancedObjectRecognizers: ReadonlyArray<ObjectRecognizer> = [
  recognizeComplex,
  recognizeSlice
]
