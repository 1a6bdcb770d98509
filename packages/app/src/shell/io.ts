import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"

import type { DumpsOptions, LoadsOptions } from "../core/codec.js"
import { decodeInput, dumps, loads, loadsAs } from "../core/codec.js"
import type { AppError, CastingError, CodecError, MalformedInput } from "../core/errors.js"
import { fileError } from "../core/errors.js"
import type { Value } from "../core/json.js"
import type { TargetType } from "../core/target.js"

// CHANGE: file-level load/dump wrappers over the pure codec
// WHY: file access stays out of the pure codec
// FORMAT THEOREM: ∀p,v: dump(v, p) >> load(p) ≅ v
// PURITY: SHELL
// EFFECT: Effect<A, AppError, FileSystem>
// INVARIANT: bytes are decoded with the requested encoding before parsing
// COMPLEXITY: O(n)

export const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  Either.isLeft(either) ? Effect.fail(either.left) : Effect.succeed(either.right)

const readBytes = (path: string): Effect.Effect<Uint8Array, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const bytes = yield* _(
      fs.readFile(path).pipe(Effect.mapError((error) => fileError(`Cannot read ${path}: ${String(error)}`)))
    )
    yield* _(Effect.logDebug(`read ${bytes.length} bytes from ${path}`))
    return bytes
  })

export const readText = (
  path: string,
  encoding?: string
): Effect.Effect<string, AppError, FileSystemService> =>
  Effect.flatMap(readBytes(path), (bytes) => fromEither<string, MalformedInput>(decodeInput(bytes, encoding)))

export const writeText = (path: string, text: string): Effect.Effect<void, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    yield* _(
      fs.writeFileString(path, text).pipe(
        Effect.mapError((error) => fileError(`Cannot write ${path}: ${String(error)}`))
      )
    )
    yield* _(Effect.logDebug(`wrote ${text.length} characters to ${path}`))
  })

export const load = (
  path: string,
  options: LoadsOptions = {}
): Effect.Effect<Value, AppError, FileSystemService> =>
  Effect.flatMap(readBytes(path), (bytes) => fromEither<Value, CodecError>(loads(bytes, options)))

export const loadAs = <A>(
  path: string,
  target: TargetType<A>,
  options: Omit<LoadsOptions, "tier"> = {}
): Effect.Effect<A, AppError, FileSystemService> =>
  Effect.flatMap(
    readBytes(path),
    (bytes) => fromEither<A, MalformedInput | CastingError>(loadsAs(bytes, target, options))
  )

/**
 * Encode a value and write it as UTF-8 text.
 *
 * @param value - Value to encode.
 * @param path - Destination file.
 * @param options - Forwarded to dumps.
 *
 * @pure false
 * @effect FileSystem
 */
export const dump = (
  value: unknown,
  path: string,
  options: DumpsOptions = {}
): Effect.Effect<void, AppError, FileSystemService> =>
  Effect.flatMap(fromEither<string, CodecError>(dumps(value, options)), (text) => writeText(path, text))
