import { NodeContext } from "@effect/platform-node"
import type { PlatformError } from "@effect/platform/Error"
import { FileSystem, type FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path, type Path as PathService } from "@effect/platform/Path"
import { Effect } from "effect"
import type { Scope } from "effect/Scope"

export interface Workspace {
  readonly fs: FileSystemService
  readonly path: PathService
  readonly tempDir: string
}

// The directory is removed when the test effect completes.
export const withTempDir = <A, E, R>(
  use: (workspace: Workspace) => Effect.Effect<A, E, R>
): Effect.Effect<A, E | PlatformError, Exclude<R, Scope> | FileSystemService | PathService> =>
  Effect.scoped(
    Effect.gen(function*(_) {
      const fs = yield* _(FileSystem)
      const path = yield* _(Path)
      const tempDir = yield* _(fs.makeTempDirectoryScoped({ prefix: "tiered-json-" }))
      return yield* _(use({ fs, path, tempDir }))
    })
  )

export const provideNodeContext = <A, E, R>(
  effect: Effect.Effect<A, E, R>
): Effect.Effect<A, E, Exclude<R, NodeContext.NodeContext>> => effect.pipe(Effect.provide(NodeContext.layer))
