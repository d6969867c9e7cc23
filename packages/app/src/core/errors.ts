import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for license resolution
// WHY: direct callers get typed failures, the resolver absorbs them into results
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type MissingManifest = { readonly _tag: "MissingManifest"; readonly path: string; readonly message: string }
export type MalformedManifest = { readonly _tag: "MalformedManifest"; readonly path: string; readonly message: string }
export type UnsupportedManifest = { readonly _tag: "UnsupportedManifest"; readonly path: string }
export type LicenseFileError = { readonly _tag: "LicenseFileError"; readonly path: string; readonly message: string }
export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type CommandFailed = {
  readonly _tag: "CommandFailed"
  readonly command: string
  readonly exitCode: number
}
export type CommandTimeout = {
  readonly _tag: "CommandTimeout"
  readonly command: string
  readonly timeoutMs: number
}

export type ManifestError = MissingManifest | MalformedManifest

export type AppError =
  | CliError
  | ManifestError
  | UnsupportedManifest
  | LicenseFileError
  | ConfigError
  | FileError
  | CommandFailed
  | CommandTimeout

export const missingManifest = (path: string, message: string): MissingManifest => ({
  _tag: "MissingManifest",
  path,
  message
})

export const malformedManifest = (path: string, message: string): MalformedManifest => ({
  _tag: "MalformedManifest",
  path,
  message
})

export const unsupportedManifest = (path: string): UnsupportedManifest => ({
  _tag: "UnsupportedManifest",
  path
})

export const licenseFileError = (path: string, message: string): LicenseFileError => ({
  _tag: "LicenseFileError",
  path,
  message
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const commandFailed = (command: string, exitCode: number): CommandFailed => ({
  _tag: "CommandFailed",
  command,
  exitCode
})

export const commandTimeout = (command: string, timeoutMs: number): CommandTimeout => ({
  _tag: "CommandTimeout",
  command,
  timeoutMs
})

/**
 * Render an AppError as a single line.
 *
 * @pure true
 */
export const describeError = (error: AppError): string => {
  switch (error._tag) {
    case "CliError":
    case "ConfigError":
    case "FileError":
      return `${error._tag}: ${error.message}`
    case "MissingManifest":
    case "MalformedManifest":
    case "LicenseFileError":
      return `${error._tag}: ${error.path}: ${error.message}`
    case "UnsupportedManifest":
      return `UnsupportedManifest: ${error.path}`
    case "CommandFailed":
      return `CommandFailed: ${error.command} exited with ${error.exitCode}`
    case "CommandTimeout":
      return `CommandTimeout: ${error.command} exceeded ${error.timeoutMs}ms`
  }
}
