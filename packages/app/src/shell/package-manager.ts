import { CommandExecutor } from "@effect/platform/CommandExecutor"
import type { CommandExecutor as CommandExecutorService } from "@effect/platform/CommandExecutor"
import { FileSystem } from "@effect/platform/FileSystem"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import * as Effect from "effect/Effect"

import type { ConfigDeps } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { commandFailed, fileError } from "../core/errors.js"
import { commandOutput, runCommandWithin } from "./command.js"

// CHANGE: model the package manager as a narrow injected collaborator
// WHY: listing and installing are external processes the resolver must not depend on directly
// PURITY: SHELL
// EFFECT: Effect<PackageManager, never, CommandExecutor | FileSystem | Path>
// INVARIANT: listPkgPaths never includes the project root itself
// COMPLEXITY: O(n)

export interface PackageManager {
  /** One absolute installed-package directory per line, in enumeration order. */
  readonly listPkgPaths: (projectRoot: string) => Effect.Effect<string, AppError>
  readonly install: (projectRoot: string) => Effect.Effect<void, AppError>
  readonly needSkipInstall: (projectRoot: string) => Effect.Effect<boolean>
}

export const npmListCommand = "npm ls --all --parseable"

const trimTrailingSeparator = (value: string): string => value.replace(/[\\/]+$/u, "")

/**
 * Drop the project root line `npm ls --parseable` prints first.
 *
 * @pure true
 */
export const dropProjectRoot = (output: string, projectRoot: string): string => {
  const root = trimTrailingSeparator(projectRoot)
  return output
    .split("\n")
    .filter((line) => trimTrailingSeparator(line.trim()) !== root)
    .join("\n")
}

/**
 * Build the npm-backed package manager.
 *
 * Install is skipped when configured, or when `node_modules` already exists,
 * and is bounded by `installTimeoutMs`.
 *
 * @pure false
 * @effect CommandExecutor, FileSystem, Path
 */
export const makeNpmPackageManager = (
  config: ConfigDeps
): Effect.Effect<PackageManager, never, CommandExecutorService | FileSystemService | PathService> =>
  Effect.gen(function*(_) {
    const executor = yield* _(CommandExecutor)
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)
    const withExecutor = Effect.provideService(CommandExecutor, executor)

    // npm prints the project root as its realpath
    const listPkgPaths = (projectRoot: string): Effect.Effect<string, AppError> =>
      Effect.gen(function*(_) {
        const realRoot = yield* _(
          fs.realPath(path.resolve(projectRoot)).pipe(Effect.mapError((error) => fileError(String(error))))
        )
        const output = yield* _(commandOutput(npmListCommand, projectRoot).pipe(withExecutor))
        return dropProjectRoot(output, realRoot)
      })

    const install = (projectRoot: string): Effect.Effect<void, AppError> =>
      Effect.gen(function*(_) {
        const exitCode = yield* _(
          runCommandWithin(config.installCommand, projectRoot, config.installTimeoutMs).pipe(withExecutor)
        )
        if (exitCode !== 0) {
          return yield* _(Effect.fail(commandFailed(config.installCommand, exitCode)))
        }
      })

    const needSkipInstall = (projectRoot: string): Effect.Effect<boolean> => {
      if (config.skipInstall) {
        return Effect.succeed(true)
      }
      return fs.exists(path.join(projectRoot, "node_modules")).pipe(
        Effect.mapError((error) => fileError(String(error))),
        Effect.tapError((error) => Effect.logDebug(`cannot check node_modules: ${error.message}`)),
        Effect.orElseSucceed(() => false)
      )
    }

    return { listPkgPaths, install, needSkipInstall }
  })
