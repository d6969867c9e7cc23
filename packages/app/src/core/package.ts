import type { AppError } from "./errors.js"

// CHANGE: define installed-package records and per-package license results
// WHY: the enumerator, resolver, and report share one immutable data model
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: isCrossPlatform = true → licenseSpdxId = ""
// COMPLEXITY: O(n) where n = lister output length

export interface Package {
  readonly name: string
  readonly path: string
}

export interface LicenseResult {
  readonly packageName: string
  readonly path: string
  readonly version: string
  readonly licenseSpdxId: string
  readonly licenseContent: string
  readonly licenseFilePath: string
  readonly isCrossPlatform: boolean
  readonly errors: ReadonlyArray<AppError>
}

export const crossPlatformResult = (packageName: string, path: string): LicenseResult => ({
  packageName,
  path,
  version: "",
  licenseSpdxId: "",
  licenseContent: "",
  licenseFilePath: "",
  isCrossPlatform: true,
  errors: []
})

export const pendingResult = (packageName: string, path: string): LicenseResult => ({
  ...crossPlatformResult(packageName, path),
  isCrossPlatform: false
})

const pathSegments = (path: string): ReadonlyArray<string> =>
  path.split(/[\\/]/u).filter((segment) => segment.length > 0)

/**
 * Derive a package name from its installed directory.
 *
 * The final segment is the name; a parent segment starting with `@` is kept as
 * the npm scope.
 *
 * @pure true
 * @complexity O(n)
 */
export const packageNameFromPath = (path: string): string => {
  const segments = pathSegments(path)
  const base = segments[segments.length - 1] ?? ""
  const parent = segments[segments.length - 2]
  return parent !== undefined && parent.startsWith("@") ? `${parent}/${base}` : base
}

/**
 * Turn path-lister output (one absolute directory per line) into packages.
 *
 * @pure true
 * @invariant output order = line order; blank lines are skipped
 * @complexity O(n)
 */
export const parsePackagePaths = (output: string): ReadonlyArray<Package> =>
  output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((path) => ({ name: packageNameFromPath(path), path }))
