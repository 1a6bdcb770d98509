#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { renderError } from "../core/errors.js"
import { runCli } from "./program.js"

// CHANGE: wire CLI program into Node runtime with proper teardown
// WHY: the process must exit with the program's status after every layer is released
// FORMAT THEOREM: runMain(program) terminates with exitCode 0 on success and 1 on any AppError
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: errors are rendered to stderr as "<tag>: <message>"
// COMPLEXITY: O(1)

const main = runCli(process.argv).pipe(
  Effect.catchAll((error) =>
    Effect.sync(() => {
      process.stderr.write(`${renderError(error)}\n`)
      process.exitCode = 1
    })
  )
)

NodeRuntime.runMain(Effect.provide(main, NodeContext.layer))
