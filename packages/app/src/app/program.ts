import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger } from "effect"
import type * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import { resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import type { InferStats } from "../core/infer.js"
import { inferDeclarations } from "../core/infer.js"
import { renderDeclarations } from "../core/print.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readJsonFile } from "../shell/json-file.js"
import { minimumLogLevel, StderrLoggerLive } from "../shell/logger.js"
import { writeOutput } from "../shell/output.js"

// CHANGE: orchestrate the CLI with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: run(argv) = Right(r) → r.output = render(infer(read(input)))
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: output emitted at most once
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly output: string
  readonly stats: InferStats
  readonly exitCode: number
}

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const generate = (
  cli: CliArgs
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fileConfig = yield* _(loadConfigFile(cli.configPath, cli.configPathExplicit))
    const config = yield* _(fromEither(resolveConfig(cli, fileConfig)))
    const json = yield* _(readJsonFile(config.inputPath))
    const { declarations, stats } = inferDeclarations(json, config.infer)
    yield* _(
      Effect.logDebug("types inferred").pipe(
        Effect.annotateLogs({ ...stats, squash: config.infer.squash })
      )
    )
    const output = renderDeclarations(declarations, config.print)
    yield* _(writeOutput(config.outputPath, output))
    return { output, stats, exitCode: 0 }
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the rendered declarations and exit code.
 *
 * @pure false
 * @effect FileSystem, stderr logging, stdout when --output is absent
 * @invariant output is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    return yield* _(generate(cli).pipe(Logger.withMinimumLogLevel(minimumLogLevel(cli.verbose))))
  }).pipe(Effect.provide(StderrLoggerLive))
