import { Data, DateTime } from "effect"

import type { Value } from "./json.js"

// CHANGE: model the extended value kinds produced by the advanced tier
// WHY: values without a JSON form need a type of their own to round-trip
// FORMAT THEOREM: ∀a,b ∈ Extended: Equal.equals(a, b) ↔ same tag ∧ same fields
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Uuid.value is lowercase canonical text; Slice bounds use null for "open"
// COMPLEXITY: O(1)/O(1)

export class Uuid extends Data.TaggedClass("Uuid")<{ readonly value: string }> {}

export class Complex extends Data.TaggedClass("Complex")<{
  readonly real: number
  readonly imag: number
}> {}

export class Slice extends Data.TaggedClass("Slice")<{
  readonly start: Value
  readonly stop: Value
  readonly step: Value
}> {}

export class PlainDate extends Data.TaggedClass("PlainDate")<{
  readonly year: number
  readonly month: number
  readonly day: number
}> {}

export class PlainTime extends Data.TaggedClass("PlainTime")<{
  readonly hour: number
  readonly minute: number
  readonly second: number
  readonly microsecond: number
}> {}

export const makeUuid = (text: string): Uuid => new Uuid({ value: text.toLowerCase() })

export interface WallClock {
  readonly year: number
  readonly month: number
  readonly day: number
  readonly hour: number
  readonly minute: number
  readonly second: number
  readonly millisecond: number
}

const MINUTE_MS = 60_000

const wallClockMillis = (clock: WallClock): number =>
  Date.UTC(clock.year, clock.month - 1, clock.day, clock.hour, clock.minute, clock.second, clock.millisecond)

/**
 * Build a DateTime pinned to a fixed UTC offset.
 *
 * @param clock - Local wall-clock reading at that offset.
 * @param offsetMinutes - Signed offset east of UTC.
 * @returns DateTime.Zoned whose zone is the fixed offset.
 *
 * @pure true
 * @invariant zonedOffset(result) = offsetMinutes * 60000
 * @complexity O(1)
 */
export const makeOffsetDateTime = (clock: WallClock, offsetMinutes: number): DateTime.Zoned =>
  DateTime.unsafeMakeZoned(wallClockMillis(clock) - offsetMinutes * MINUTE_MS, {
    timeZone: DateTime.zoneMakeOffset(offsetMinutes * MINUTE_MS)
  })

/** Datetime without an offset: the wall clock is read as UTC. */
export const makeUtcDateTime = (clock: WallClock): DateTime.Utc => DateTime.unsafeMake(wallClockMillis(clock))

export const isCalendarDate = (year: number, month: number, day: number): boolean => {
  const probe = new Date(Date.UTC(year, month - 1, day))
  return probe.getUTCFullYear() === year && probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day
}
