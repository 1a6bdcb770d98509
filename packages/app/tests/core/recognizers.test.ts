import { describe, expect, it } from "@effect/vitest"
import { DateTime, Effect } from "effect"
import * as Option from "effect/Option"

import { Complex, PlainDate, PlainTime, Slice, Uuid } from "../../src/core/extended.js"
import { valueObject } from "../../src/core/json.js"
import type { Value } from "../../src/core/json.js"
import {
  parseOffset,
  recognizeComplex,
  recognizeDate,
  recognizeDateTime,
  recognizeSlice,
  recognizeTime,
  recognizeUuid
} from "../../src/core/recognizers.js"

const object = (entries: ReadonlyArray<readonly [string, Value]>) => valueObject(entries)

describe("parseOffset", () => {
  it.effect("reads every designator form as signed minutes", () =>
    Effect.sync(() => {
      expect(parseOffset("Z")).toEqual(Option.some(0))
      expect(parseOffset("+05:30")).toEqual(Option.some(330))
      expect(parseOffset("-0800")).toEqual(Option.some(-480))
      expect(parseOffset("+05")).toEqual(Option.some(300))
    }))

  it.effect("refuses offsets of a day or more", () =>
    Effect.sync(() => {
      expect(Option.isNone(parseOffset("+24:00"))).toBe(true)
      expect(Option.isNone(parseOffset("-10:60"))).toBe(true)
    }))
})

describe("string recognizers", () => {
  it.effect("canonicalizes uuids to lowercase", () =>
    Effect.sync(() => {
      expect(recognizeUuid("6F1C2B3A-4D5E-4F60-8A7B-9C0D1E2F3A4B")).toEqual(
        Option.some(new Uuid({ value: "6f1c2b3a-4d5e-4f60-8a7b-9c0d1e2f3a4b" }))
      )
      expect(Option.isNone(recognizeUuid("6f1c2b3a-4d5e-6f60-8a7b-9c0d1e2f3a4b"))).toBe(true)
      expect(Option.isNone(recognizeUuid("6f1c2b3a-4d5e-4f60-7a7b-9c0d1e2f3a4b"))).toBe(true)
    }))

  it.effect("recognizes calendar dates only", () =>
    Effect.sync(() => {
      expect(recognizeDate("2024-02-29")).toEqual(Option.some(new PlainDate({ year: 2024, month: 2, day: 29 })))
      expect(Option.isNone(recognizeDate("2023-02-29"))).toBe(true)
      expect(Option.isNone(recognizeDate("2024-13-01"))).toBe(true)
    }))

  it.effect("recognizes times with optional seconds and fraction", () =>
    Effect.sync(() => {
      expect(recognizeTime("10:20")).toEqual(
        Option.some(new PlainTime({ hour: 10, minute: 20, second: 0, microsecond: 0 }))
      )
      expect(recognizeTime("10:20:30.5")).toEqual(
        Option.some(new PlainTime({ hour: 10, minute: 20, second: 30, microsecond: 500000 }))
      )
      expect(Option.isNone(recognizeTime("24:00"))).toBe(true)
    }))

  it.effect("keeps the offset of an offset datetime", () =>
    Effect.sync(() => {
      const recognized = Option.getOrNull(recognizeDateTime("2024-01-01 00:00:00+0530"))
      expect(DateTime.isDateTime(recognized)).toBe(true)
      if (DateTime.isDateTime(recognized) && DateTime.isZoned(recognized)) {
        expect(DateTime.zonedOffset(recognized)).toBe(330 * 60_000)
        expect(DateTime.toEpochMillis(recognized)).toBe(Date.UTC(2023, 11, 31, 18, 30))
      }
    }))

  it.effect("reads a datetime without offset as UTC", () =>
    Effect.sync(() => {
      const recognized = Option.getOrNull(recognizeDateTime("2024-03-01T10:30:15.250"))
      expect(DateTime.isDateTime(recognized)).toBe(true)
      if (DateTime.isDateTime(recognized)) {
        expect(DateTime.isZoned(recognized)).toBe(false)
        expect(DateTime.toEpochMillis(recognized)).toBe(Date.UTC(2024, 2, 1, 10, 30, 15, 250))
      }
    }))

  it.effect("does not take plain dates for datetimes", () =>
    Effect.sync(() => {
      expect(Option.isNone(recognizeDateTime("2024-03-01"))).toBe(true)
    }))
})

describe("object recognizers", () => {
  it.effect("builds complex numbers from numeric or null parts", () =>
    Effect.sync(() => {
      expect(recognizeComplex(object([["imag", 2.5], ["real", 1n]]))).toEqual(
        Option.some(new Complex({ real: 1, imag: 2.5 }))
      )
      expect(recognizeComplex(object([["real", null], ["imag", 2n]]))).toEqual(
        Option.some(new Complex({ real: 0, imag: 2 }))
      )
    }))

  it.effect("requires the exact complex key set and numeric parts", () =>
    Effect.sync(() => {
      expect(Option.isNone(recognizeComplex(object([["real", 1n], ["imag", 2n], ["unit", "m"]])))).toBe(true)
      expect(Option.isNone(recognizeComplex(object([["real", "x"], ["imag", 2n]])))).toBe(true)
    }))

  it.effect("matches slice components by name", () =>
    Effect.sync(() => {
      expect(recognizeSlice(object([["step", 3n], ["start", 1n], ["stop", null]]))).toEqual(
        Option.some(new Slice({ start: 1n, stop: null, step: 3n }))
      )
      expect(Option.isNone(recognizeSlice(object([["start", 1n], ["stop", 2n]])))).toBe(true)
    }))
})
