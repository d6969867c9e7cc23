import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { arch386, archAMD64, archARM, archARM64, normalizeArch, normalizeOs } from "../../src/core/arch.js"

describe("normalizeArch", () => {
  const cases: ReadonlyArray<readonly [string, string]> = [
    ["amd64", archAMD64],
    ["x64", archAMD64],
    ["x86_64", archAMD64],
    ["X64", archAMD64],
    ["ia32", arch386],
    ["x86", arch386],
    ["386", arch386],
    ["arm64", archARM64],
    ["aarch64", archARM64],
    ["arm", archARM],
    ["ARMV7", archARM],
    ["armv7l", archARM],
    ["unknown", "unknown"]
  ]

  for (const [input, expected] of cases) {
    it.effect(`maps ${input} to ${expected}`, () =>
      Effect.sync(() => {
        expect(normalizeArch(input)).toBe(expected)
      }))
  }

  it.effect("returns unknown values verbatim without case folding", () =>
    Effect.sync(() => {
      expect(normalizeArch("MIPS64el")).toBe("MIPS64el")
      expect(normalizeArch("")).toBe("")
    }))

  it.effect("is idempotent", () =>
    Effect.sync(() => {
      for (const input of ["x64", "IA32", "aarch64", "armv6l", "ppc64", "S390X", ""]) {
        expect(normalizeArch(normalizeArch(input))).toBe(normalizeArch(input))
      }
    }))
})

describe("normalizeOs", () => {
  it.effect("maps host spellings onto canonical OS tokens", () =>
    Effect.sync(() => {
      expect(normalizeOs("windows")).toBe("win32")
      expect(normalizeOs("Win32")).toBe("win32")
      expect(normalizeOs("linux")).toBe("linux")
      expect(normalizeOs("Darwin")).toBe("darwin")
      expect(normalizeOs("freebsd")).toBe("freebsd")
    }))
})
