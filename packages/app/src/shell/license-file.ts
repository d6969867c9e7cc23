import type { PlatformError } from "@effect/platform/Error"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import * as Effect from "effect/Effect"

import type { LicenseFileError } from "../core/errors.js"
import { licenseFileError } from "../core/errors.js"
import type { LicenseResult } from "../core/package.js"

// CHANGE: attach raw license text found next to a package manifest
// WHY: keep audit evidence even when the manifest has no machine-readable license
// PURITY: SHELL
// EFFECT: Effect<LicenseResult, LicenseFileError, FileSystem | Path>
// INVARIANT: no matching file → result unchanged
// COMPLEXITY: O(n) where n = directory entries

export const licenseFileNames: ReadonlySet<string> = new Set<string>([
  "license",
  "license.md",
  "license.txt",
  "licence",
  "licence.md",
  "licence.txt",
  "copying",
  "copying.md",
  "copying.txt"
])

export const isLicenseFileName = (name: string): boolean => licenseFileNames.has(name.toLowerCase())

const compareOrdinal = (left: string, right: string): number => left < right ? -1 : left > right ? 1 : 0

type LicenseFileEffect<A> = Effect.Effect<A, LicenseFileError, FileSystemService | PathService>

const mapError = (path: string) => (error: PlatformError): LicenseFileError => licenseFileError(path, String(error))

const readLicenseCandidate = (
  fs: FileSystemService,
  filePath: string
): Effect.Effect<string | undefined, LicenseFileError> =>
  Effect.gen(function*(_) {
    const info = yield* _(fs.stat(filePath).pipe(Effect.mapError(mapError(filePath))))
    if (info.type !== "File") {
      return undefined
    }
    return yield* _(fs.readFileString(filePath).pipe(Effect.mapError(mapError(filePath))))
  })

/**
 * Find a conventionally named license file in `pkgDir` and record it.
 *
 * Matching is case-insensitive; among several matches the first in ordinal
 * name order wins.
 *
 * @param result - Result to enrich.
 * @param pkgDir - Installed package directory.
 * @returns `result` with licenseContent/licenseFilePath set, or unchanged.
 *
 * @pure false
 * @effect FileSystem, Path
 * @complexity O(n log n)
 */
export const resolveLcsFile = (
  result: LicenseResult,
  pkgDir: string
): LicenseFileEffect<LicenseResult> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)
    const entries = yield* _(fs.readDirectory(pkgDir).pipe(Effect.mapError(mapError(pkgDir))))
    const candidates = entries.filter((entry) => isLicenseFileName(entry)).sort(compareOrdinal)
    for (const candidate of candidates) {
      const filePath = path.resolve(pkgDir, candidate)
      const content = yield* _(readLicenseCandidate(fs, filePath))
      if (content !== undefined) {
        return { ...result, licenseContent: content, licenseFilePath: filePath }
      }
    }
    return result
  })
