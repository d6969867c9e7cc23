import { Match } from "effect"

import { describeError } from "./errors.js"
import type { LicenseResult } from "./package.js"

// CHANGE: accumulate license results into a report and render output formats
// WHY: keep reporting pure and deterministic for the CLI
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every result lands in exactly one section, in enumeration order
// COMPLEXITY: O(n)

export interface Report {
  readonly resolved: ReadonlyArray<LicenseResult>
  readonly unknown: ReadonlyArray<LicenseResult>
  readonly crossPlatform: ReadonlyArray<LicenseResult>
}

export const emptyReport: Report = {
  resolved: [],
  unknown: [],
  crossPlatform: []
}

type Section = "resolved" | "unknown" | "crossPlatform"

const sectionOf = (result: LicenseResult): Section => {
  if (result.isCrossPlatform) {
    return "crossPlatform"
  }
  return result.licenseSpdxId.length > 0 ? "resolved" : "unknown"
}

/**
 * Append a result to the section it belongs to.
 *
 * @pure true
 * @complexity O(n) copy of the target section
 */
export const addResult = (report: Report, result: LicenseResult): Report =>
  Match.value(sectionOf(result)).pipe(
    Match.when("resolved", () => ({ ...report, resolved: [...report.resolved, result] })),
    Match.when("unknown", () => ({ ...report, unknown: [...report.unknown, result] })),
    Match.when("crossPlatform", () => ({ ...report, crossPlatform: [...report.crossPlatform, result] })),
    Match.exhaustive
  )

/**
 * Build a report from results in enumeration order.
 *
 * @pure true
 */
export const buildReport = (results: ReadonlyArray<LicenseResult>): Report => {
  let report = emptyReport
  for (const result of results) {
    report = addResult(report, result)
  }
  return report
}

export const hasUnknown = (report: Report): boolean => report.unknown.length > 0

const label = (result: LicenseResult): string =>
  result.version.length > 0 ? `${result.packageName}@${result.version}` : result.packageName

const formatResult = (result: LicenseResult): string =>
  Match.value(sectionOf(result)).pipe(
    Match.when("resolved", () => `${label(result)}: ${result.licenseSpdxId}`),
    Match.when("unknown", () =>
      result.errors.length === 0
        ? `${label(result)}: Unknown`
        : `${label(result)}: Unknown (${result.errors.map(describeError).join("; ")})`),
    Match.when("crossPlatform", () => `${label(result)} (${result.path})`),
    Match.exhaustive
  )

const formatList = (title: string, values: ReadonlyArray<LicenseResult>): ReadonlyArray<string> => {
  if (values.length === 0) {
    return [`${title}: (none)`]
  }
  return [title + ":", ...values.map((value) => `  - ${formatResult(value)}`)]
}

/**
 * Render a human-readable report.
 *
 * @pure true
 * @invariant output lists all sections and ends with a stats line
 */
export const renderHumanReport = (report: Report): string =>
  [
    ...formatList("Resolved", report.resolved),
    ...formatList("Unknown license", report.unknown),
    ...formatList("Other platforms (skipped)", report.crossPlatform),
    `Stats: resolved=${report.resolved.length}, unknown=${report.unknown.length}, ` +
    `crossPlatform=${report.crossPlatform.length}`
  ].join("\n")

const toJsonEntry = (result: LicenseResult) => ({
  name: result.packageName,
  version: result.version,
  path: result.path,
  license: result.licenseSpdxId,
  licenseFile: result.licenseFilePath,
  errors: result.errors.map(describeError)
})

/**
 * Render the report as JSON text. License file contents are left out.
 *
 * @pure true
 */
export const renderJsonReport = (report: Report): string =>
  JSON.stringify(
    {
      resolved: report.resolved.map(toJsonEntry),
      unknown: report.unknown.map(toJsonEntry),
      crossPlatform: report.crossPlatform.map((result) => ({
        name: result.packageName,
        path: result.path
      }))
    },
    null,
    2
  )
