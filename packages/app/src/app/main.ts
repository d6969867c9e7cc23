#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { runCli } from "./program.js"

// CHANGE: wire CLI program into Node runtime with proper teardown
// PURITY: SHELL
// EFFECT: Effect<void, AppError, NodeContext>
// INVARIANT: non-zero exit codes terminate the process

const main = Effect.gen(function*(_) {
  const result = yield* _(runCli(process.argv))
  if (result.exitCode !== 0) {
    yield* _(
      Effect.sync(() => {
        process.exitCode = result.exitCode
      })
    )
  }
})

NodeRuntime.runMain(Effect.provide(main, NodeContext.layer))
