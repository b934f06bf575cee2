import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for the CLI tool
// WHY: provide typed failures for program flow and exit codes
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly path: string; readonly message: string }
export type ParseFileError = { readonly _tag: "ParseError"; readonly file: string; readonly error: string }
export type WriteError = { readonly _tag: "WriteError"; readonly path: string; readonly message: string }

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | ParseFileError
  | WriteError

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (path: string, message: string): FileError => ({
  _tag: "FileError",
  path,
  message
})

export const parseFileError = (file: string, error: string): ParseFileError => ({
  _tag: "ParseError",
  file,
  error
})

export const writeError = (path: string, message: string): WriteError => ({
  _tag: "WriteError",
  path,
  message
})

/**
 * Render an error as a single diagnostic for stderr.
 *
 * @pure true
 * @complexity O(1)
 */
export const formatAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tagsExhaustive({
      CliError: (value) => `Invalid arguments: ${value.message}`,
      ConfigError: (value) => `Invalid configuration: ${value.message}`,
      FileError: (value) => `Could not read ${value.path}: ${value.message}`,
      ParseError: (value) => `Could not parse ${value.file}:\n${value.error}`,
      WriteError: (value) => `Could not write ${value.path}: ${value.message}`
    })
  )
