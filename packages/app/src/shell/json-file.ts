import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Schema from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import type { AppError } from "../core/errors.js"
import { fileError, parseFileError } from "../core/errors.js"
import type { Json } from "../core/json.js"

// CHANGE: read and decode the input JSON document
// WHY: isolate filesystem IO and text parsing from the pure inference engine
// REF: req-input-io-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: read(p) = Right(v) → v ∈ Json
// PURITY: SHELL
// EFFECT: Effect<Json, AppError, FileSystem>
// INVARIANT: JSON is validated before use
// COMPLEXITY: O(n)

const JsonSchema: Schema.Schema<Json> = Schema.suspend(() =>
  Schema.Union(
    Schema.Null,
    Schema.Boolean,
    Schema.Number,
    Schema.String,
    Schema.Array(JsonSchema),
    Schema.Record({ key: Schema.String, value: JsonSchema })
  )
)

const JsonTextSchema = Schema.parseJson()

const isJsonValue = Schema.is(JsonSchema)

// Validated in place: a "__proto__" key stays an own field of the parsed object.
const isJson = (value: unknown): value is Json => isJsonValue(value)

export const parseJsonText = (file: string, raw: string): Effect.Effect<Json, AppError> =>
  pipe(
    Schema.decodeUnknown(JsonTextSchema)(raw),
    Effect.mapError((error) => parseFileError(file, TreeFormatter.formatErrorSync(error))),
    Effect.filterOrFail(isJson, () => parseFileError(file, "Expected a JSON value"))
  )

export const readInputText = (
  path: string
): Effect.Effect<string, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    return yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(path, error.message)))
    )
  })

export const readJsonFile = (
  path: string
): Effect.Effect<Json, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const raw = yield* _(readInputText(path))
    yield* _(Effect.logDebug("input read").pipe(Effect.annotateLogs({ path, length: raw.length })))
    return yield* _(parseJsonText(path, raw))
  })
