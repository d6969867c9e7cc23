import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { parseCliArgs } from "../../src/core/cli.js"

const argv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "license-scout", ...args]

describe("parseCliArgs", () => {
  it.effect("defaults to the resolve command", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(argv())
      expect(Either.isRight(parsed)).toBe(true)
      if (Either.isRight(parsed)) {
        expect(parsed.right.command).toBe("resolve")
        expect(parsed.right.packagePath).toBe("./package.json")
        expect(parsed.right.configPath).toBe("./.license-scout.json")
        expect(parsed.right.configPathExplicit).toBe(false)
      }
    }))

  it.effect("reads value flags in both spellings", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(
        argv("manifest", "--package=sub/package.json", "--config", "cfg.json", "--platform", "darwin", "--arch=arm64")
      )
      expect(Either.isRight(parsed)).toBe(true)
      if (Either.isRight(parsed)) {
        expect(parsed.right.command).toBe("manifest")
        expect(parsed.right.packagePath).toBe("sub/package.json")
        expect(parsed.right.configPath).toBe("cfg.json")
        expect(parsed.right.configPathExplicit).toBe(true)
        expect(parsed.right.platform).toBe("darwin")
        expect(parsed.right.arch).toBe("arm64")
      }
    }))

  it.effect("sets boolean flags", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(argv("--json", "--silent", "--verbose", "--skip-install", "--fail-on-unknown"))
      expect(Either.isRight(parsed)).toBe(true)
      if (Either.isRight(parsed)) {
        expect(parsed.right.json).toBe(true)
        expect(parsed.right.silent).toBe(true)
        expect(parsed.right.verbose).toBe(true)
        expect(parsed.right.skipInstall).toBe(true)
        expect(parsed.right.failOnUnknown).toBe(true)
      }
    }))

  it.effect("rejects unknown commands, flags and missing values", () =>
    Effect.sync(() => {
      const unknownCommand = parseCliArgs(argv("prune"))
      expect(Either.isLeft(unknownCommand)).toBe(true)
      if (Either.isLeft(unknownCommand)) {
        expect(unknownCommand.left).toEqual({ _tag: "CliError", message: "Unknown command: prune" })
      }
      const unknownFlag = parseCliArgs(argv("--nope"))
      expect(Either.isLeft(unknownFlag)).toBe(true)
      if (Either.isLeft(unknownFlag)) {
        expect(unknownFlag.left.message).toBe("Unknown flag: --nope")
      }
      const missing = parseCliArgs(argv("--package", "--json"))
      expect(Either.isLeft(missing)).toBe(true)
      if (Either.isLeft(missing)) {
        expect(missing.left.message).toBe("Missing value for --package")
      }
    }))
})
