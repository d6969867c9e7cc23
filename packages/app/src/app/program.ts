import type { CommandExecutor } from "@effect/platform/CommandExecutor"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import type { Path as PathService } from "@effect/platform/Path"
import { Effect, Logger, LogLevel, Match } from "effect"
import type * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ConfigDeps } from "../core/config.js"
import { resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { resolveManifestLicense } from "../core/license-field.js"
import type { Manifest } from "../core/manifest.js"
import type { Report } from "../core/report.js"
import { emptyReport, hasUnknown, renderHumanReport, renderJsonReport } from "../core/report.js"
import { loadConfigFile } from "../shell/config-file.js"
import { currentHostPlatform, withHostOverrides } from "../shell/host.js"
import { parsePkgFile } from "../shell/manifest.js"
import type { PackageManager } from "../shell/package-manager.js"
import { makeNpmPackageManager } from "../shell/package-manager.js"
import { resolve } from "../shell/resolver.js"

// CHANGE: orchestrate CLI commands over the functional core
// WHY: single entrypoint with typed errors and deterministic output
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, Services>
// INVARIANT: report emitted at most once
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly report: Report
  readonly exitCode: number
}

export type ProgramEnv = FileSystemService | PathService | CommandExecutor

export type PackageManagerFactory = (
  config: ConfigDeps
) => Effect.Effect<PackageManager, never, ProgramEnv>

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const emitReport = (report: Report, json: boolean, silent: boolean): Effect.Effect<void> => {
  if (silent) {
    return Effect.void
  }
  return writeStdout(json ? renderJsonReport(report) : renderHumanReport(report))
}

export const renderManifest = (manifest: Manifest, json: boolean): string => {
  const license = Option.getOrElse(resolveManifestLicense(manifest), () => "")
  if (json) {
    return JSON.stringify({ name: manifest.name ?? "", version: manifest.version ?? "", license }, null, 2)
  }
  return [
    `name: ${manifest.name ?? "(none)"}`,
    `version: ${manifest.version ?? "(none)"}`,
    `license: ${license.length > 0 ? license : "Unknown"}`
  ].join("\n")
}

const handleManifest = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const manifest = yield* _(parsePkgFile(cli.packagePath))
    if (!cli.silent) {
      yield* _(writeStdout(renderManifest(manifest, cli.json)))
    }
    return { report: emptyReport, exitCode: 0 }
  })

const handleResolve = (
  cli: CliArgs,
  makeManager: PackageManagerFactory
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const fileConfig = yield* _(loadConfigFile(cli.configPath, cli.configPathExplicit))
    const config = resolveConfig(cli, fileConfig)
    const host = withHostOverrides(yield* _(currentHostPlatform), cli)
    const manager = yield* _(makeManager(config))
    const report = yield* _(resolve(cli.packagePath, config, host, manager))
    yield* _(emitReport(report, cli.json, cli.silent))
    const exitCode = cli.failOnUnknown && hasUnknown(report) ? 2 : 0
    return { report, exitCode }
  })

/**
 * Run the CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @param makeManager - Package manager used by `resolve`; npm by default.
 * @returns ProgramResult with report and exit code.
 *
 * @pure false
 * @effect FileSystem, Path, CommandExecutor
 */
export const runCli = (
  argv: ReadonlyArray<string>,
  makeManager: PackageManagerFactory = makeNpmPackageManager
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const program = Match.value(cli.command).pipe(
      Match.when("manifest", () => handleManifest(cli)),
      Match.when("resolve", () => handleResolve(cli, makeManager)),
      Match.exhaustive
    )
    return yield* _(Logger.withMinimumLogLevel(program, cli.verbose ? LogLevel.Debug : LogLevel.Info))
  })
