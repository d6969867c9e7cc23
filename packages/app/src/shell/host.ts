import * as Effect from "effect/Effect"

import type { HostPlatform } from "../core/platform.js"

// The only place the running process is asked which host it is on.
export const currentHostPlatform: Effect.Effect<HostPlatform> = Effect.sync(() => ({
  os: process.platform,
  arch: process.arch
}))

export const withHostOverrides = (
  host: HostPlatform,
  overrides: { readonly platform: string | undefined; readonly arch: string | undefined }
): HostPlatform => ({
  os: overrides.platform ?? host.os,
  arch: overrides.arch ?? host.arch
})
