import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"
import * as ParseResult from "effect/ParseResult"
import * as S from "effect/Schema"

import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"

// CHANGE: decode .tiered-json.json with schema validation
// WHY: a malformed config file is reported with the path of the bad field
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: a missing default config yields undefined
// COMPLEXITY: O(n)

const Count = S.Int.pipe(S.nonNegative())

const RawConfigSchema = S.partial(
  S.Struct({
    tier: S.Literal("basic", "advanced", "custom"),
    indent: Count,
    align: Count,
    eol: S.Literal("crlf", "lf"),
    encoding: S.String,
    maxDepth: S.Int.pipe(S.positive())
  })
)

const ConfigSchema = S.parseJson(RawConfigSchema)

export const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> =>
  pipe(
    S.decodeUnknown(ConfigSchema)(raw),
    Effect.map((config) => ({
      ...(config.tier === undefined ? {} : { tier: config.tier }),
      ...(config.indent === undefined ? {} : { indent: config.indent }),
      ...(config.align === undefined ? {} : { align: config.align }),
      ...(config.eol === undefined ? {} : { eol: config.eol }),
      ...(config.encoding === undefined ? {} : { encoding: config.encoding }),
      ...(config.maxDepth === undefined ? {} : { maxDepth: config.maxDepth })
    })),
    Effect.mapError((error) => configError(ParseResult.TreeFormatter.formatErrorSync(error)))
  )

export const loadConfigFile = (
  path: string | undefined,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    if (path === undefined) {
      return
    }
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError(`Config file not found: ${path}`)))
      }
      return
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    yield* _(Effect.logDebug(`loaded config from ${path}`))
    return yield* _(decodeConfig(contents))
  })
