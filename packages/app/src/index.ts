export * from "./core/arch.js"
export * from "./core/config.js"
export * from "./core/errors.js"
export * from "./core/license-field.js"
export * from "./core/manifest.js"
export * from "./core/package.js"
export * from "./core/platform.js"
export * from "./core/report.js"
export { resolveLcsFile } from "./shell/license-file.js"
export { parsePkgFile } from "./shell/manifest.js"
export { makeNpmPackageManager } from "./shell/package-manager.js"
export type { PackageManager } from "./shell/package-manager.js"
export { getInstalledPkgs, resolve, resolvePackageLicense } from "./shell/resolver.js"
