import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { analyzePackagePlatform, isForCurrentPlatform } from "../../src/core/platform.js"
import type { HostPlatform } from "../../src/core/platform.js"

describe("analyzePackagePlatform", () => {
  const cases: ReadonlyArray<{ readonly pkg: string; readonly os: string; readonly arch: string }> = [
    { pkg: "@parcel/watcher-linux-arm64-glibc", os: "linux", arch: "arm64" },
    { pkg: "pkg-darwin-arm64", os: "darwin", arch: "arm64" },
    { pkg: "@esbuild/linux-x64", os: "linux", arch: "amd64" },
    { pkg: "@rollup/rollup-win32-ia32-msvc", os: "win32", arch: "386" },
    { pkg: "@rollup/rollup-linux-arm-gnueabihf", os: "linux", arch: "arm" },
    { pkg: "lightningcss-linux-x64-musl", os: "linux", arch: "amd64" },
    { pkg: "foo-linux", os: "", arch: "" },
    { pkg: "foo-linux-unknown-extra", os: "", arch: "" },
    { pkg: "pkg-linux-x64-gnu-extra", os: "", arch: "" },
    { pkg: "pkg-x64-linux", os: "", arch: "" },
    { pkg: "pkg-freebsd-x64", os: "", arch: "" },
    { pkg: "@scope/linux", os: "", arch: "" },
    { pkg: "lodash", os: "", arch: "" },
    { pkg: "", os: "", arch: "" }
  ]

  for (const { arch, os, pkg } of cases) {
    it.effect(`reads (${os || "-"}, ${arch || "-"}) from "${pkg}"`, () =>
      Effect.sync(() => {
        expect(analyzePackagePlatform(pkg)).toEqual({ os, arch })
      }))
  }
})

describe("isForCurrentPlatform", () => {
  const linuxX64: HostPlatform = { os: "linux", arch: "x64" }

  it.effect("accepts packages built for the host", () =>
    Effect.sync(() => {
      expect(isForCurrentPlatform("pkg-linux-x64", linuxX64)).toBe(true)
      expect(isForCurrentPlatform("@esbuild/linux-x64", linuxX64)).toBe(true)
      expect(isForCurrentPlatform("@rollup/rollup-linux-x64-gnu", linuxX64)).toBe(true)
    }))

  it.effect("rejects a mismatched OS or arch", () =>
    Effect.sync(() => {
      expect(isForCurrentPlatform("pkg-darwin-arm64", linuxX64)).toBe(false)
      expect(isForCurrentPlatform("pkg-darwin-x64", linuxX64)).toBe(false)
      expect(isForCurrentPlatform("pkg-linux-arm64", linuxX64)).toBe(false)
      expect(isForCurrentPlatform("pkg-win32-x64", linuxX64)).toBe(false)
    }))

  it.effect("treats packages without platform info as applicable everywhere", () =>
    Effect.sync(() => {
      expect(isForCurrentPlatform("lodash", linuxX64)).toBe(true)
      expect(isForCurrentPlatform("foo-linux", linuxX64)).toBe(true)
      expect(isForCurrentPlatform("foo-linux-unknown-extra", { os: "darwin", arch: "arm64" })).toBe(true)
    }))

  it.effect("normalizes the host before comparing", () =>
    Effect.sync(() => {
      expect(isForCurrentPlatform("pkg-win32-x64", { os: "windows", arch: "AMD64" })).toBe(true)
      expect(isForCurrentPlatform("pkg-darwin-aarch64", { os: "darwin", arch: "arm64" })).toBe(true)
      expect(isForCurrentPlatform("pkg-linux-armv7l", { os: "linux", arch: "arm" })).toBe(true)
    }))
})
