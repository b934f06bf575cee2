import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { writeError } from "../core/errors.js"

// CHANGE: deliver generated declarations to a file or stdout
// WHY: stdout is the default sink; --output redirects to a file
// REF: req-output-io-1
// SOURCE: n/a
// PURITY: SHELL
// EFFECT: Effect<void, AppError, FileSystem>
// INVARIANT: payload is written unchanged
// COMPLEXITY: O(n)

export const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload)
  })

export const writeOutput = (
  path: string | undefined,
  payload: string
): Effect.Effect<void, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    if (path === undefined) {
      yield* _(Effect.logDebug("writing output to stdout"))
      return yield* _(writeStdout(payload))
    }
    const fs = yield* _(FileSystem)
    yield* _(Effect.logDebug("writing output to file").pipe(Effect.annotateLogs({ path })))
    yield* _(fs.writeFileString(path, payload).pipe(Effect.mapError((error) => writeError(path, error.message))))
  })
