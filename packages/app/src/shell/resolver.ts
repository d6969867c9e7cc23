import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import * as Effect from "effect/Effect"
import * as Option from "effect/Option"

import type { ConfigDeps } from "../core/config.js"
import { getUserConfiguredLicense, isExcluded } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { describeError, unsupportedManifest } from "../core/errors.js"
import { resolveManifestLicense } from "../core/license-field.js"
import { canResolve, emptyManifest, manifestFileName } from "../core/manifest.js"
import type { Manifest } from "../core/manifest.js"
import { crossPlatformResult, parsePackagePaths, pendingResult } from "../core/package.js"
import type { LicenseResult, Package } from "../core/package.js"
import type { HostPlatform } from "../core/platform.js"
import { isForCurrentPlatform } from "../core/platform.js"
import type { Report } from "../core/report.js"
import { addResult, emptyReport } from "../core/report.js"
import { resolveLcsFile } from "./license-file.js"
import { parsePkgFile } from "./manifest.js"
import type { PackageManager } from "./package-manager.js"

// CHANGE: orchestrate classification, manifest reading and license-file lookup per package
// WHY: one linear decision per package; foreign-platform packages never touch the filesystem
// PURITY: SHELL
// EFFECT: Effect<Report, AppError, FileSystem | Path>
// INVARIANT: resolvePackageLicense never fails; its errors land in result.errors
// COMPLEXITY: O(n) where n = installed packages

type ResolveEnv = FileSystemService | PathService

/**
 * List installed packages through the package manager, preserving its order.
 *
 * A failing lister is logged and treated as empty output.
 *
 * @pure false
 * @invariant blank lines are skipped
 */
export const getInstalledPkgs = (
  manager: PackageManager,
  rootDir: string
): Effect.Effect<ReadonlyArray<Package>> =>
  manager.listPkgPaths(rootDir).pipe(
    Effect.tapError((error) => Effect.logWarning(`cannot list installed packages: ${describeError(error)}`)),
    Effect.orElseSucceed(() => ""),
    Effect.map(parsePackagePaths)
  )

const readManifest = (
  manifestPath: string
): Effect.Effect<{ readonly manifest: Manifest; readonly errors: ReadonlyArray<AppError> }, never, FileSystemService> =>
  parsePkgFile(manifestPath).pipe(
    Effect.map((manifest) => ({ manifest, errors: [] })),
    Effect.catchAll((error) =>
      Effect.logDebug(`manifest ignored: ${describeError(error)}`).pipe(
        Effect.as({ manifest: emptyManifest, errors: [error] })
      )
    )
  )

const resolveSpdxId = (config: ConfigDeps, pkgName: string, manifest: Manifest): string =>
  getUserConfiguredLicense(config, manifest.name ?? pkgName, manifest.version).pipe(
    Option.orElse(() => resolveManifestLicense(manifest)),
    Option.getOrElse(() => "")
  )

/**
 * Resolve the license of one installed package.
 *
 * Packages built for another host are returned as cross-platform without
 * reading `pkgPath`. Otherwise manifest and license-file failures degrade the
 * result instead of failing it.
 *
 * @param pkgName - Package name, used for platform classification.
 * @param pkgPath - Installed package directory.
 * @param config - User license overrides.
 * @param host - Host the report is produced for.
 *
 * @pure false
 * @effect FileSystem, Path (host-applicable packages only)
 * @invariant result.isCrossPlatform → result.licenseSpdxId = ""
 * @complexity O(n) where n = files in pkgPath
 */
export const resolvePackageLicense = (
  pkgName: string,
  pkgPath: string,
  config: ConfigDeps,
  host: HostPlatform
): Effect.Effect<LicenseResult, never, ResolveEnv> => {
  if (!isForCurrentPlatform(pkgName, host)) {
    return Effect.logDebug(`${pkgName} targets another platform, skipped`).pipe(
      Effect.as(crossPlatformResult(pkgName, pkgPath))
    )
  }
  return Effect.gen(function*(_) {
    const path = yield* _(Path)
    const { errors, manifest } = yield* _(readManifest(path.join(pkgPath, manifestFileName)))
    const resolved: LicenseResult = {
      ...pendingResult(pkgName, pkgPath),
      version: manifest.version ?? "",
      licenseSpdxId: resolveSpdxId(config, pkgName, manifest),
      errors
    }
    return yield* _(
      resolveLcsFile(resolved, pkgPath).pipe(
        Effect.catchAll((error) =>
          Effect.logDebug(`license file ignored: ${describeError(error)}`).pipe(
            Effect.as({ ...resolved, errors: [...resolved.errors, error] })
          )
        )
      )
    )
  })
}

const installIfNeeded = (manager: PackageManager, root: string): Effect.Effect<void> =>
  Effect.gen(function*(_) {
    const skip = yield* _(manager.needSkipInstall(root))
    if (skip) {
      return
    }
    yield* _(
      manager.install(root).pipe(
        Effect.catchAll((error) => Effect.logWarning(`install failed, using installed tree: ${describeError(error)}`))
      )
    )
  })

/**
 * Resolve every installed dependency of the project owning `pkgFile`.
 *
 * @param pkgFile - Path to the project's package.json.
 * @returns Report in enumeration order; excluded packages are left out.
 *
 * @pure false
 * @effect FileSystem, Path, package manager
 * @invariant fails only when the project manifest itself is unusable
 * @complexity O(n)
 */
export const resolve = (
  pkgFile: string,
  config: ConfigDeps,
  host: HostPlatform,
  manager: PackageManager
): Effect.Effect<Report, AppError, ResolveEnv> =>
  Effect.gen(function*(_) {
    const path = yield* _(Path)
    if (!canResolve(path.basename(pkgFile))) {
      return yield* _(Effect.fail(unsupportedManifest(pkgFile)))
    }
    yield* _(parsePkgFile(pkgFile))
    const root = path.dirname(path.resolve(pkgFile))
    yield* _(installIfNeeded(manager, root))
    const pkgs = yield* _(getInstalledPkgs(manager, root))
    let report = emptyReport
    for (const pkg of pkgs) {
      if (isExcluded(config, pkg.name, undefined)) {
        continue
      }
      const result = yield* _(resolvePackageLicense(pkg.name, pkg.path, config, host))
      if (result.version.length > 0 && isExcluded(config, pkg.name, result.version)) {
        continue
      }
      report = addResult(report, result)
    }
    return report
  })
