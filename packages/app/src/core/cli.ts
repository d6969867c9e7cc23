import { Match } from "effect"
import * as Either from "effect/Either"

// CHANGE: implement deterministic CLI parsing for license-scout
// WHY: keep CLI decoding pure and testable at the boundary
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "resolve" | "manifest"

export interface CliArgs {
  readonly command: CliCommand
  readonly packagePath: string
  readonly configPath: string
  readonly configPathExplicit: boolean
  readonly json: boolean
  readonly silent: boolean
  readonly verbose: boolean
  readonly skipInstall: boolean
  readonly failOnUnknown: boolean
  readonly platform: string | undefined
  readonly arch: string | undefined
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-")

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("resolve", () => Either.right<CliCommand>("resolve")),
    Match.when("manifest", () => Either.right<CliCommand>("manifest")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

export const defaultConfigPath = "./.license-scout.json"

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  packagePath: "./package.json",
  configPath: defaultConfigPath,
  configPathExplicit: false,
  json: false,
  silent: false,
  verbose: false,
  skipInstall: false,
  failOnUnknown: false,
  platform: undefined,
  arch: undefined
})

interface ParsedFlag {
  readonly next: CliArgs
  readonly consumed: number
}

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const setParsedFlag = (next: CliArgs): Either.Either<ParsedFlag, CliError> => Either.right({ next, consumed: 1 })

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => CliArgs
): Either.Either<ParsedFlag, CliError> =>
  Either.map(readFlagValue(flagName, inlineValue, nextValue), (value) => ({
    next: update(current, value),
    consumed: inlineValue === undefined ? 2 : 1
  }))

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const flagParsers: Record<string, FlagParser> = {
  json: (current) => setParsedFlag({ ...current, json: true }),
  silent: (current) => setParsedFlag({ ...current, silent: true }),
  verbose: (current) => setParsedFlag({ ...current, verbose: true }),
  "skip-install": (current) => setParsedFlag({ ...current, skipInstall: true }),
  "fail-on-unknown": (current) => setParsedFlag({ ...current, failOnUnknown: true }),
  package: (current, inlineValue, nextValue) =>
    parseValueFlag("package", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      packagePath: value
    })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      configPath: value,
      configPathExplicit: true
    })),
  platform: (current, inlineValue, nextValue) =>
    parseValueFlag("platform", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      platform: value
    })),
  arch: (current, inlineValue, nextValue) =>
    parseValueFlag("arch", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      arch: value
    }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<ParsedFlag, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const [name = "", inlineValue] = raw.slice(2).split("=", 2)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

interface ParsedCommand {
  readonly command: CliCommand
  readonly startIndex: number
}

const parseCommandFromArgs = (
  rawArgs: ReadonlyArray<string>
): Either.Either<ParsedCommand, CliError> => {
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.right({ command: "resolve", startIndex: 0 })
  }
  return Either.map(parseCommand(first), (command) => ({ command, startIndex: 1 }))
}

const parseFlags = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = startIndex
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      return Either.left(cliError(`Unexpected positional argument: ${current}`))
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to resolve when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const commandEither = parseCommandFromArgs(rawArgs)
  if (Either.isLeft(commandEither)) {
    return Either.left(commandEither.left)
  }
  const parsed = commandEither.right
  return parseFlags(rawArgs, parsed.startIndex, defaultArgs(parsed.command))
}
