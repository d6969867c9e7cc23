import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { parsePkgFile } from "../../src/shell/manifest.js"
import { provideNodeContext, withTempDir } from "../app/test-helpers.js"

const expectManifestError = (contents: string, tag: "MissingManifest" | "MalformedManifest") =>
  withTempDir(({ fs, path, tempDir }) =>
    Effect.gen(function*(_) {
      const file = path.join(tempDir, "package.json")
      yield* _(fs.writeFileString(file, contents))
      const result = yield* _(Effect.either(parsePkgFile(file)))
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left._tag).toBe(tag)
        expect(result.left.path).toBe(file)
      }
    })
  ).pipe(provideNodeContext)

describe("parsePkgFile", () => {
  it.effect("reads name, version and license fields", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const file = path.join(tempDir, "package.json")
        yield* _(
          fs.writeFileString(
            file,
            JSON.stringify({
              name: "normal-pkg",
              version: "1.2.3",
              license: { type: "Apache-2.0", url: "https://example.com/license" },
              licenses: [{ type: "MIT" }],
              dependencies: { dep: "^1.0.0" }
            })
          )
        )
        const manifest = yield* _(parsePkgFile(file))
        expect(manifest.name).toBe("normal-pkg")
        expect(manifest.version).toBe("1.2.3")
        expect(manifest.license).toEqual({ type: "Apache-2.0", url: "https://example.com/license" })
        expect(manifest.licenses).toEqual([{ type: "MIT" }])
      })
    ).pipe(provideNodeContext))

  it.effect("accepts a manifest without license fields", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const file = path.join(tempDir, "package.json")
        yield* _(fs.writeFileString(file, `{"name":"bare"}`))
        const manifest = yield* _(parsePkgFile(file))
        expect(manifest.name).toBe("bare")
        expect(manifest.license).toBeUndefined()
        expect(manifest.licenses).toBeUndefined()
      })
    ).pipe(provideNodeContext))

  it.effect("surfaces MissingManifest for a nonexistent file", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const file = path.join(tempDir, "nope", "package.json")
        const result = yield* _(Effect.either(parsePkgFile(file)))
        expect(Either.isLeft(result)).toBe(true)
        if (Either.isLeft(result)) {
          expect(result.left._tag).toBe("MissingManifest")
          expect(result.left.path).toBe(file)
        }
      })
    ).pipe(provideNodeContext))

  it.effect("surfaces MalformedManifest for an empty file", () => expectManifestError("", "MalformedManifest"))

  it.effect("surfaces MalformedManifest for invalid JSON", () => expectManifestError("{ name: ", "MalformedManifest"))

  it.effect("surfaces MalformedManifest for a non-object root", () => expectManifestError("[]", "MalformedManifest"))

  it.effect("surfaces MalformedManifest for a mistyped name", () =>
    expectManifestError(`{"name": 5}`, "MalformedManifest"))

  it.effect("surfaces MalformedManifest for a non-array licenses field", () =>
    expectManifestError(`{"name":"x","licenses":"MIT"}`, "MalformedManifest"))
})
