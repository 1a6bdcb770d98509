import type { DateTime } from "effect"

import type { Complex, PlainDate, PlainTime, Slice, Uuid } from "./extended.js"

// CHANGE: introduce the value domain shared by decoder, encoder and target reconstruction
// WHY: 64-bit integers and key order must survive a decode
// FORMAT THEOREM: ∀x ∈ Value: x is a scalar, an extended value, or a container of Values
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Int tokens are bigint, Float tokens are number; objects keep insertion order
// COMPLEXITY: O(1)/O(1)

export type Scalar = null | boolean | bigint | number | string

export type Extended = Uuid | Complex | Slice | PlainDate | PlainTime | DateTime.DateTime

export type Value =
  | Scalar
  | Extended
  | ReadonlyArray<Value>
  | ValueObject

export interface ValueObject extends ReadonlyMap<string, Value> {}

export type Tier = "basic" | "advanced" | "custom"

export const tiers: ReadonlyArray<Tier> = ["basic", "advanced", "custom"]

export const isTier = (value: string): value is Tier => value === "basic" || value === "advanced" || value === "custom"

export const isSequence = (value: Value): value is ReadonlyArray<Value> => Array.isArray(value)

export const isValueObject = (value: Value): value is ValueObject => value instanceof Map

/**
 * Build an ordered object value from key/value pairs.
 *
 * @param entries - Pairs in insertion order; a repeated key keeps its first position.
 * @returns ValueObject backed by a Map.
 *
 * @pure true
 * @complexity O(n)
 */
export const valueObject = (entries: Iterable<readonly [string, Value]>): ValueObject => new Map(entries)
