import type { Json } from "./json.js"

// CHANGE: formalize the package.json fields the license resolver reads
// WHY: keep the manifest shape independent from the decoder that produces it
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: manifests are read-only after decoding
// COMPLEXITY: O(1)/O(1)

export const manifestFileName = "package.json"

export interface LicenseEntry {
  readonly type: string
  readonly url?: string | undefined
}

export interface Manifest {
  readonly name?: string | undefined
  readonly version?: string | undefined
  readonly license?: Json | undefined
  readonly licenses?: ReadonlyArray<LicenseEntry> | undefined
}

export const emptyManifest: Manifest = {}

/**
 * Exact, case-sensitive check that a file is the manifest this resolver reads.
 *
 * @pure true
 */
export const canResolve = (filename: string): boolean => filename === manifestFileName
