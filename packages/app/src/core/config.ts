import * as Option from "effect/Option"

import type { CliArgs } from "./cli.js"

// CHANGE: define dependency-resolution config, merging rules and lookups
// WHY: users pin licenses and exclude packages the manifests get wrong
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: an entry without version matches every version
// COMPLEXITY: O(n)/O(1)

export interface ConfigDepLicense {
  readonly name: string
  readonly version?: string | undefined
  readonly license: string
}

export interface ConfigDepExclude {
  readonly name: string
  readonly version?: string | undefined
}

export interface FileConfig {
  readonly licenses?: ReadonlyArray<ConfigDepLicense> | undefined
  readonly excludes?: ReadonlyArray<ConfigDepExclude> | undefined
  readonly skipInstall?: boolean | undefined
  readonly installCommand?: string | undefined
  readonly installTimeoutMs?: number | undefined
}

export interface ConfigDeps {
  readonly licenses: ReadonlyArray<ConfigDepLicense>
  readonly excludes: ReadonlyArray<ConfigDepExclude>
  readonly skipInstall: boolean
  readonly installCommand: string
  readonly installTimeoutMs: number
}

export const defaultInstallCommand = "npm install"
export const defaultInstallTimeoutMs = 5 * 60 * 1000

export const defaultConfig: ConfigDeps = {
  licenses: [],
  excludes: [],
  skipInstall: false,
  installCommand: defaultInstallCommand,
  installTimeoutMs: defaultInstallTimeoutMs
}

/**
 * Resolve the effective config: CLI flags > config file > defaults.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: Pick<CliArgs, "skipInstall">,
  fileConfig: FileConfig | undefined
): ConfigDeps => ({
  licenses: fileConfig?.licenses ?? defaultConfig.licenses,
  excludes: fileConfig?.excludes ?? defaultConfig.excludes,
  skipInstall: cli.skipInstall || (fileConfig?.skipInstall ?? defaultConfig.skipInstall),
  installCommand: fileConfig?.installCommand ?? defaultConfig.installCommand,
  installTimeoutMs: fileConfig?.installTimeoutMs ?? defaultConfig.installTimeoutMs
})

const versionMatches = (pattern: string | undefined, version: string | undefined): boolean => {
  if (pattern === undefined || pattern.trim().length === 0) {
    return true
  }
  if (version === undefined) {
    return false
  }
  return pattern
    .split(",")
    .map((item) => item.trim())
    .includes(version)
}

/**
 * Look up a user-declared license for a package.
 *
 * @param version - Comma-separated entry versions are matched exactly.
 * @returns The first matching declaration.
 *
 * @pure true
 * @complexity O(n)
 */
export const getUserConfiguredLicense = (
  config: ConfigDeps,
  name: string,
  version: string | undefined
): Option.Option<string> => {
  const entry = config.licenses.find((item) => item.name === name && versionMatches(item.version, version))
  return entry === undefined ? Option.none() : Option.some(entry.license)
}

/**
 * Check whether a package is excluded from the report.
 *
 * A versioned exclude never matches when the version is still unknown.
 *
 * @pure true
 * @complexity O(n)
 */
export const isExcluded = (
  config: ConfigDeps,
  name: string,
  version: string | undefined
): boolean => config.excludes.some((item) => item.name === name && versionMatches(item.version, version))
