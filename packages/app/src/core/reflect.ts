import * as Either from "effect/Either"
import type * as Option from "effect/Option"

import type { UnsupportedType } from "./errors.js"
import { unsupportedType } from "./errors.js"

// CHANGE: expose generic-object serialization hooks and structural field reflection
// WHY: user classes opt into custom encoding without subclassing
// FORMAT THEOREM: ∀o: reflectFields(o) lists own fields first, then inherited ones nearest-first
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: no callable and no Object.prototype member appears in the reflected fields
// COMPLEXITY: O(k) where k = own + inherited property count

/** Hook returning the value to encode in place of the object; None opts out. */
export const JsonState: unique symbol = Symbol.for("tiered-json/JsonState")
/** Hook returning ready-made JSON text that is written verbatim. */
export const JsonText: unique symbol = Symbol.for("tiered-json/JsonText")
/** Hook listing the fields to encode, in order. */
export const JsonFields: unique symbol = Symbol.for("tiered-json/JsonFields")

export interface HasJsonState {
  readonly [JsonState]: () => Option.Option<unknown>
}

export interface HasJsonText {
  readonly [JsonText]: () => string
}

export interface HasJsonFields {
  readonly [JsonFields]: () => Iterable<readonly [string, unknown]>
}

export type Field = readonly [string, unknown]

const hasMethod = (value: object, key: PropertyKey): boolean => typeof Reflect.get(value, key) === "function"

export const hasJsonState = (value: object): value is HasJsonState => hasMethod(value, JsonState)

export const hasJsonText = (value: object): value is HasJsonText => hasMethod(value, JsonText)

export const hasJsonFields = (value: object): value is HasJsonFields => hasMethod(value, JsonFields)

const baseSurface: ReadonlySet<string> = new Set(Object.getOwnPropertyNames(Object.prototype))

const METADATA_TAGS: ReadonlySet<string> = new Set([
  "AsyncGenerator",
  "Generator",
  "Module",
  "Promise",
  "WeakMap",
  "WeakRef",
  "WeakSet"
])

const { toString } = Object.prototype

const tagOf = (value: object): string => toString.call(value).slice(8, -1)

/**
 * Tell plain data-carrying objects apart from code and runtime machinery.
 *
 * @param value - Candidate for generic serialization.
 * @returns true for non-null objects that are not promises, generators, module namespaces
 * or weak collections; functions and classes are never objects here.
 *
 * @pure true
 * @complexity O(1)
 */
export const isReflectable = (value: unknown): value is object =>
  typeof value === "object" && value !== null && !METADATA_TAGS.has(tagOf(value))

const inheritedField = (owner: object, instance: object, key: string): Field | undefined => {
  const descriptor = Object.getOwnPropertyDescriptor(owner, key)
  if (descriptor === undefined) {
    return undefined
  }
  const field: unknown = descriptor.get === undefined ? descriptor.value : Reflect.get(instance, key)
  return typeof field === "function" ? undefined : [key, field]
}

const prototypeChain = (value: object): ReadonlyArray<object> => {
  const chain: Array<object> = []
  let current: object | null = Object.getPrototypeOf(value)
  while (current !== null && current !== Object.prototype) {
    chain.push(current)
    current = Object.getPrototypeOf(current)
  }
  return chain
}

const collectFields = (value: object): ReadonlyArray<Field> => {
  if (hasJsonFields(value)) {
    return [...value[JsonFields]()]
  }
  const fields = new Map<string, unknown>()
  for (const key of Object.keys(value)) {
    const field: unknown = Reflect.get(value, key)
    if (typeof field !== "function" && !baseSurface.has(key)) {
      fields.set(key, field)
    }
  }
  for (const owner of prototypeChain(value)) {
    for (const key of Object.getOwnPropertyNames(owner)) {
      if (!fields.has(key) && !baseSurface.has(key)) {
        const field = inheritedField(owner, value, key)
        if (field !== undefined) {
          fields.set(field[0], field[1])
        }
      }
    }
  }
  return [...fields]
}

/**
 * Collect the field name → value pairs of an object.
 *
 * An object implementing `JsonFields` supplies its own list. Otherwise own enumerable
 * fields come first, followed by getters and data fields found on the prototype chain
 * (nearest prototype first) whose names are not taken yet.
 *
 * @returns The fields, or UnsupportedType when a getter or the JsonFields hook throws.
 *
 * @pure false (getters run)
 * @invariant keys are unique
 * @complexity O(k)
 */
export const reflectFields = (value: object): Either.Either<ReadonlyArray<Field>, UnsupportedType> =>
  Either.try({
    try: () => collectFields(value),
    catch: (error) => unsupportedType(`Cannot read fields: ${String(error)}`)
  })
