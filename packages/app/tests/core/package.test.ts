import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { canResolve } from "../../src/core/manifest.js"
import { crossPlatformResult, packageNameFromPath, parsePackagePaths } from "../../src/core/package.js"

describe("parsePackagePaths", () => {
  it.effect("maps each line to a package named after its final segment", () =>
    Effect.sync(() => {
      const pkgs = parsePackagePaths("/work/node_modules/lodash\n/work/node_modules/express\n")
      expect(pkgs).toEqual([
        { name: "lodash", path: "/work/node_modules/lodash" },
        { name: "express", path: "/work/node_modules/express" }
      ])
    }))

  it.effect("skips blank lines and trims carriage returns", () =>
    Effect.sync(() => {
      const pkgs = parsePackagePaths("\n/a/node_modules/b\r\n\n   \n/a/node_modules/c")
      expect(pkgs).toEqual([
        { name: "b", path: "/a/node_modules/b" },
        { name: "c", path: "/a/node_modules/c" }
      ])
    }))

  it.effect("returns an empty list for empty output", () =>
    Effect.sync(() => {
      expect(parsePackagePaths("")).toEqual([])
    }))
})

describe("packageNameFromPath", () => {
  it.effect("keeps the npm scope of scoped packages", () =>
    Effect.sync(() => {
      expect(packageNameFromPath("/w/node_modules/@parcel/watcher-linux-x64-glibc")).toBe(
        "@parcel/watcher-linux-x64-glibc"
      )
    }))

  it.effect("handles Windows separators and trailing slashes", () =>
    Effect.sync(() => {
      expect(packageNameFromPath("C:\\w\\node_modules\\left-pad")).toBe("left-pad")
      expect(packageNameFromPath("/w/node_modules/ms/")).toBe("ms")
    }))
})

describe("canResolve", () => {
  it.effect("accepts only the exact manifest file name", () =>
    Effect.sync(() => {
      expect(canResolve("package.json")).toBe(true)
      expect(canResolve("Package.json")).toBe(false)
      expect(canResolve("PACKAGE.JSON")).toBe(false)
      expect(canResolve("package-lock.json")).toBe(false)
      expect(canResolve("")).toBe(false)
    }))
})

describe("crossPlatformResult", () => {
  it.effect("carries no license id", () =>
    Effect.sync(() => {
      const result = crossPlatformResult("pkg-darwin-arm64", "/fake/path")
      expect(result.isCrossPlatform).toBe(true)
      expect(result.licenseSpdxId).toBe("")
      expect(result.path).toBe("/fake/path")
    }))
})
