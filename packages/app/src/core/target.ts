import * as Either from "effect/Either"

import type { CastingError, MalformedInput } from "./errors.js"
import { castingError } from "./errors.js"
import type { Decoder } from "./decoder.js"
import { customDecoderTier, defaultDecoderOptions, makeDecoder } from "./decoder.js"
import type { DecoderOptions } from "./decoder.js"
import type { Value } from "./json.js"
import { isSequence, isValueObject } from "./json.js"

// CHANGE: rebuild typed instances from decoded values through an explicit field descriptor
// WHY: decoded data carries no class, so the caller names the shape to rebuild
// FORMAT THEOREM: ∀v,T: reconstruct(v, T) = Right(a) → a = T.construct(args) ∧ |args| = |T.fields|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: no defaults are invented; every declared field receives exactly one argument
// COMPLEXITY: O(f) where f = number of declared fields

export interface TargetType<A> {
  readonly name: string
  readonly fields: ReadonlyArray<string>
  readonly construct: (args: ReadonlyArray<Value>) => A
}

export interface CustomDecoder extends Decoder {
  readonly decodeAs: <A>(text: string, target: TargetType<A>) => Either.Either<A, MalformedInput | CastingError>
}

export const targetType = <A>(
  name: string,
  fields: ReadonlyArray<string>,
  construct: (args: ReadonlyArray<Value>) => A
): TargetType<A> => ({ name, fields, construct })

const castFailure = (target: TargetType<unknown>, reason: string): CastingError =>
  castingError(`Error in casting to ${target.name}: ${reason}`)

const argumentsFromObject = <A>(
  object: ReadonlyMap<string, Value>,
  target: TargetType<A>
): Either.Either<ReadonlyArray<Value>, CastingError> => {
  const args: Array<Value> = []
  for (const field of target.fields) {
    const member = object.get(field)
    if (member === undefined) {
      return Either.left(castFailure(target, `missing field "${field}"`))
    }
    args.push(member)
  }
  return Either.right(args)
}

const argumentsFor = <A>(
  value: Value,
  target: TargetType<A>
): Either.Either<ReadonlyArray<Value>, CastingError> => {
  const arity = target.fields.length
  if (arity === 0) {
    return Either.right([])
  }
  if (isSequence(value)) {
    return value.length === arity
      ? Either.right(value)
      : Either.left(castFailure(target, `expected ${arity} items, got ${value.length}`))
  }
  if (isValueObject(value)) {
    return argumentsFromObject(value, target)
  }
  return arity === 1
    ? Either.right([value])
    : Either.left(castFailure(target, `a single value cannot fill ${arity} fields`))
}

/**
 * Reconstruct a target instance from a generic decoded value.
 *
 * Scalars (including extended scalars) fill a single field, arrays fill fields by position,
 * objects fill fields by name.
 *
 * @pure true
 * @complexity O(f)
 */
export const reconstruct = <A>(value: Value, target: TargetType<A>): Either.Either<A, CastingError> =>
  Either.map(argumentsFor(value, target), (args) => target.construct(args))

export const makeCustomDecoder = (options: DecoderOptions = defaultDecoderOptions): CustomDecoder => {
  const decoder = makeDecoder(customDecoderTier, options)
  return {
    ...decoder,
    decodeAs: <A>(text: string, target: TargetType<A>) =>
      Either.flatMap(decoder.decode(text), (value) => reconstruct(value, target))
  }
}
