import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Schema from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import type { ManifestError } from "../core/errors.js"
import { malformedManifest, missingManifest } from "../core/errors.js"
import type { Json } from "../core/json.js"
import type { Manifest } from "../core/manifest.js"

// CHANGE: read and validate a package manifest
// WHY: the one place where manifest failures surface to the caller instead of being absorbed
// PURITY: SHELL
// EFFECT: Effect<Manifest, ManifestError, FileSystem>
// INVARIANT: read failure → MissingManifest; decode failure → MalformedManifest
// COMPLEXITY: O(n)

export const JsonSchema: Schema.Schema<Json> = Schema.suspend(() =>
  Schema.Union(
    Schema.Null,
    Schema.Boolean,
    Schema.Number,
    Schema.String,
    Schema.Array(JsonSchema),
    Schema.Record({ key: Schema.String, value: JsonSchema })
  )
)

const LicenseEntrySchema = Schema.Struct({
  type: Schema.String,
  url: Schema.optional(Schema.String)
})

const ManifestSchema = Schema.Struct({
  name: Schema.optional(Schema.String),
  version: Schema.optional(Schema.String),
  license: Schema.optional(JsonSchema),
  licenses: Schema.optional(Schema.Array(LicenseEntrySchema))
})

const ManifestJsonSchema = Schema.parseJson(ManifestSchema)

/**
 * Decode manifest text.
 *
 * @param path - Used only to label the error.
 *
 * @pure true
 */
export const decodeManifest = (
  path: string,
  raw: string
): Effect.Effect<Manifest, ManifestError> =>
  pipe(
    Schema.decodeUnknown(ManifestJsonSchema)(raw),
    Effect.mapError((error) => malformedManifest(path, TreeFormatter.formatErrorSync(error)))
  )

/**
 * Read and decode the manifest at `path`.
 *
 * @pure false
 * @effect FileSystem
 * @complexity O(n) where n = file size
 */
export const parsePkgFile = (
  path: string
): Effect.Effect<Manifest, ManifestError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const raw = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => missingManifest(path, String(error))))
    )
    return yield* _(decodeManifest(path, raw))
  })
