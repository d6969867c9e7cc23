import * as Option from "effect/Option"

import { isJsonObject } from "./json.js"
import type { Json } from "./json.js"
import type { LicenseEntry, Manifest } from "./manifest.js"

// CHANGE: normalize "license"/"licenses" manifest fields into one SPDX-style id
// WHY: manifests in the wild use a string, a {type,url} object, or a legacy array
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unsupported shapes yield Option.none, never an exception
// COMPLEXITY: O(n) where n = number of legacy entries

export const licensesSeparator = " OR "

/**
 * Resolve the single-license field.
 *
 * @param raw - Value of `license`, as decoded JSON.
 * @returns The SPDX id for a non-empty string or an object with a string `type`.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveLicenseField = (raw: Json | undefined): Option.Option<string> => {
  if (raw === undefined || raw === null) {
    return Option.none()
  }
  if (typeof raw === "string") {
    return raw.length > 0 ? Option.some(raw) : Option.none()
  }
  if (!isJsonObject(raw)) {
    return Option.none()
  }
  const type = raw["type"]
  return typeof type === "string" && type.length > 0 ? Option.some(type) : Option.none()
}

/**
 * Resolve the legacy multi-license array by joining every `type` with " OR ".
 *
 * @pure true
 * @invariant array order is preserved, entries are neither sorted nor deduplicated
 * @complexity O(n)
 */
export const resolveLicensesField = (
  entries: ReadonlyArray<LicenseEntry> | undefined
): Option.Option<string> => {
  if (entries === undefined || entries.length === 0) {
    return Option.none()
  }
  return Option.some(entries.map((entry) => entry.type).join(licensesSeparator))
}

/**
 * Prefer `license`, fall back to `licenses`.
 *
 * @pure true
 */
export const resolveManifestLicense = (manifest: Manifest): Option.Option<string> =>
  Option.orElse(resolveLicenseField(manifest.license), () => resolveLicensesField(manifest.licenses))
