// CHANGE: map free-form architecture and OS strings onto canonical tokens
// WHY: package-name suffixes and the host report the same CPU under different names
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: normalizeArch(normalizeArch(x)) = normalizeArch(x)
// COMPLEXITY: O(1)/O(1)

export const archAMD64 = "amd64"
export const arch386 = "386"
export const archARM64 = "arm64"
export const archARM = "arm"

export type CanonicalArch = typeof archAMD64 | typeof arch386 | typeof archARM64 | typeof archARM

export const osLinux = "linux"
export const osDarwin = "darwin"
export const osWin32 = "win32"

export type CanonicalOs = typeof osLinux | typeof osDarwin | typeof osWin32

const archAliases: ReadonlyMap<string, CanonicalArch> = new Map<string, CanonicalArch>([
  ["amd64", archAMD64],
  ["x64", archAMD64],
  ["x86_64", archAMD64],
  ["ia32", arch386],
  ["x86", arch386],
  ["386", arch386],
  ["arm64", archARM64],
  ["aarch64", archARM64],
  ["arm", archARM],
  ["armv6", archARM],
  ["armv6l", archARM],
  ["armv7", archARM],
  ["armv7l", archARM],
  ["armhf", archARM],
  ["armel", archARM]
])

const osAliases: ReadonlyMap<string, CanonicalOs> = new Map<string, CanonicalOs>([
  ["linux", osLinux],
  ["darwin", osDarwin],
  ["win32", osWin32],
  ["windows", osWin32]
])

const canonicalArchs: ReadonlySet<string> = new Set<string>(archAliases.values())
const canonicalOses: ReadonlySet<string> = new Set<string>([osLinux, osDarwin, osWin32])

/**
 * Normalize an architecture string to its canonical token.
 *
 * Unknown values come back verbatim (not case-folded) so they still compare
 * equal to themselves.
 *
 * @pure true
 * @invariant idempotent
 * @complexity O(n) where n = raw length
 */
export const normalizeArch = (raw: string): string => archAliases.get(raw.toLowerCase()) ?? raw

/**
 * Normalize a host OS string (`process.platform`, `windows`, ...).
 *
 * @pure true
 * @invariant idempotent
 */
export const normalizeOs = (raw: string): string => osAliases.get(raw.toLowerCase()) ?? raw

export const isCanonicalArch = (value: string): value is CanonicalArch => canonicalArchs.has(value)

export const isCanonicalOs = (value: string): value is CanonicalOs => canonicalOses.has(value)
