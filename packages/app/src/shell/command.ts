import * as Command from "@effect/platform/Command"
import type { CommandExecutor } from "@effect/platform/CommandExecutor"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { pipe } from "effect/Function"
import * as Option from "effect/Option"

import type { AppError } from "../core/errors.js"
import { commandTimeout, configError, fileError } from "../core/errors.js"

// CHANGE: run package-manager commands with Effect CommandExecutor
// WHY: installer and path lister are external processes behind typed errors
// PURITY: SHELL
// EFFECT: Effect<number | string, AppError, CommandExecutor>
// INVARIANT: command lines are split without a shell; a timed-out child is killed before failing
// COMPLEXITY: O(n)

type Quote = "\"" | "'"

const isQuote = (char: string): char is Quote => char === "\"" || char === "'"

/**
 * Split a command line into argv tokens.
 *
 * Single quotes are literal. A backslash escapes the next character outside
 * quotes and inside double quotes. `""` yields an empty argument.
 *
 * @pure true
 * @complexity O(n)
 */
export const splitCommandLine = (input: string): Either.Either<ReadonlyArray<string>, AppError> => {
  const tokens: Array<string> = []
  let token: string | null = null
  let quote: Quote | null = null
  for (let index = 0; index < input.length; index += 1) {
    const char = input.charAt(index)
    if (char === "\\" && quote !== "'" && index + 1 < input.length) {
      index += 1
      token = (token ?? "") + input.charAt(index)
    } else if (quote !== null) {
      token = char === quote ? token : (token ?? "") + char
      quote = char === quote ? null : quote
    } else if (isQuote(char)) {
      quote = char
      token = token ?? ""
    } else if (char.trim().length === 0) {
      if (token !== null) {
        tokens.push(token)
      }
      token = null
    } else {
      token = (token ?? "") + char
    }
  }
  if (quote !== null) {
    return Either.left(configError(`Unterminated quote in command: ${input}`))
  }
  if (token !== null) {
    tokens.push(token)
  }
  return Either.right(tokens)
}

const makeCommand = (
  commandLine: string,
  cwd: string
): Effect.Effect<Command.Command, AppError> =>
  Effect.gen(function*(_) {
    const parts = splitCommandLine(commandLine)
    if (Either.isLeft(parts)) {
      return yield* _(Effect.fail(parts.left))
    }
    const [cmd, ...args] = parts.right
    if (cmd === undefined) {
      return yield* _(Effect.fail(configError("Empty command")))
    }
    return pipe(Command.make(cmd, ...args), Command.workingDirectory(cwd))
  })

/**
 * Run a command with inherited stdio and return its exit code.
 *
 * The wait on the child is disconnected, so the deadline fires whether or not
 * the child reacts to interruption. On timeout the child gets SIGKILL and the
 * run fails with CommandTimeout.
 *
 * @pure false
 * @effect CommandExecutor
 */
export const runCommandWithin = (
  commandLine: string,
  cwd: string,
  timeoutMs: number
): Effect.Effect<number, AppError, CommandExecutor> =>
  Effect.scoped(
    Effect.gen(function*(_) {
      const command = yield* _(makeCommand(commandLine, cwd))
      const child = yield* _(
        pipe(
          command,
          Command.stdin("inherit"),
          Command.stdout("inherit"),
          Command.stderr("inherit"),
          Command.start
        ).pipe(Effect.mapError((error) => fileError(String(error))))
      )
      const exitCode = yield* _(
        child.exitCode.pipe(
          Effect.mapError((error) => fileError(String(error))),
          Effect.disconnect,
          Effect.timeoutOption(timeoutMs)
        )
      )
      if (Option.isSome(exitCode)) {
        return Number(exitCode.value)
      }
      yield* _(
        child.kill("SIGKILL").pipe(
          Effect.catchAll((error) => Effect.logWarning(`cannot kill ${commandLine}: ${String(error)}`))
        )
      )
      return yield* _(Effect.fail(commandTimeout(commandLine, timeoutMs)))
    })
  )

/**
 * Run a command and collect its standard output. The exit code is not checked:
 * `npm ls` exits non-zero on peer problems while still printing the tree.
 *
 * @pure false
 * @effect CommandExecutor
 */
export const commandOutput = (
  commandLine: string,
  cwd: string
): Effect.Effect<string, AppError, CommandExecutor> =>
  Effect.gen(function*(_) {
    const command = yield* _(makeCommand(commandLine, cwd))
    return yield* _(Command.string(command).pipe(Effect.mapError((error) => fileError(String(error)))))
  })
