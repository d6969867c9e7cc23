import { isCanonicalArch, isCanonicalOs, normalizeArch, normalizeOs } from "./arch.js"

// CHANGE: recognize platform-specific binary packages by their name suffix
// WHY: optional native packages for other hosts are never installed and must be skipped without IO
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: os = "" ⇔ arch = ""
// COMPLEXITY: O(n) where n = package name length

export interface HostPlatform {
  readonly os: string
  readonly arch: string
}

export interface PackagePlatform {
  readonly os: string
  readonly arch: string
}

// libc / ABI variants seen after the arch segment, e.g. watcher-linux-arm64-glibc, rollup-win32-x64-msvc
export const platformQualifiers: ReadonlySet<string> = new Set<string>([
  "gnu",
  "glibc",
  "musl",
  "msvc",
  "gnueabihf",
  "musleabihf",
  "eabi"
])

const noPlatform: PackagePlatform = { os: "", arch: "" }

const stripScope = (pkgName: string): string => {
  if (!pkgName.startsWith("@")) {
    return pkgName
  }
  const slash = pkgName.indexOf("/")
  return slash === -1 ? pkgName : pkgName.slice(slash + 1)
}

const matchOsArch = (
  osSegment: string | undefined,
  archSegment: string | undefined
): PackagePlatform | undefined => {
  if (osSegment === undefined || archSegment === undefined || !isCanonicalOs(osSegment)) {
    return undefined
  }
  const arch = normalizeArch(archSegment)
  return isCanonicalArch(arch) ? { os: osSegment, arch } : undefined
}

/**
 * Extract the (os, arch) pair encoded at the end of a package name.
 *
 * Accepted suffixes are exactly `<os>-<arch>` or `<os>-<arch>-<qualifier>`.
 * Anything else, including a partial suffix, yields empty strings.
 *
 * @param pkgName - Package name, optionally scoped.
 * @returns Canonical os and normalized arch, or `{ os: "", arch: "" }`.
 *
 * @pure true
 * @invariant a result is reported only when both tokens are recognized
 * @complexity O(n)
 */
export const analyzePackagePlatform = (pkgName: string): PackagePlatform => {
  const segments = stripScope(pkgName).split("-")
  const count = segments.length
  const direct = matchOsArch(segments[count - 2], segments[count - 1])
  if (direct !== undefined) {
    return direct
  }
  const qualifier = segments[count - 1]
  if (count < 3 || qualifier === undefined || !platformQualifiers.has(qualifier)) {
    return noPlatform
  }
  return matchOsArch(segments[count - 3], segments[count - 2]) ?? noPlatform
}

/**
 * Decide whether a package applies to the given host.
 *
 * Packages without platform information apply everywhere.
 *
 * @pure true
 * @invariant exact match on canonical tokens
 * @complexity O(n)
 */
export const isForCurrentPlatform = (pkgName: string, host: HostPlatform): boolean => {
  const { arch, os } = analyzePackagePlatform(pkgName)
  if (os === "") {
    return true
  }
  return os === normalizeOs(host.os) && arch === normalizeArch(host.arch)
}
