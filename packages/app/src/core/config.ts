import * as Either from "effect/Either"

import type { CliArgs } from "./cli.js"
import type { ConfigError } from "./errors.js"
import { configError } from "./errors.js"
import { DEFAULT_ROOT_NAME } from "./infer.js"
import type { InferOptions } from "./infer.js"
import type { PrintOptions } from "./print.js"
import { defaultPrintOptions, isIdentifier } from "./print.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: rootName is a non-reserved identifier and indent ∈ [0, MAX_INDENT]
// COMPLEXITY: O(1)/O(1)

export const MAX_INDENT = 8

export interface FileConfig {
  readonly squash?: boolean
  readonly rootName?: string
  readonly exportTypes?: boolean
  readonly indent?: number
}

export interface ResolvedConfig {
  readonly inputPath: string
  readonly outputPath: string | undefined
  readonly infer: InferOptions
  readonly print: PrintOptions
}

// Reserved words and predefined types cannot name a type alias.
const reservedTypeNames: ReadonlySet<string> = new Set([
  "any",
  "bigint",
  "boolean",
  "break",
  "case",
  "catch",
  "class",
  "const",
  "continue",
  "debugger",
  "default",
  "delete",
  "do",
  "else",
  "enum",
  "export",
  "extends",
  "false",
  "finally",
  "for",
  "function",
  "if",
  "implements",
  "import",
  "in",
  "instanceof",
  "interface",
  "let",
  "never",
  "new",
  "null",
  "number",
  "object",
  "package",
  "private",
  "protected",
  "public",
  "return",
  "static",
  "string",
  "super",
  "switch",
  "symbol",
  "this",
  "throw",
  "true",
  "try",
  "typeof",
  "undefined",
  "unknown",
  "var",
  "void",
  "while",
  "with",
  "yield"
])

const resolveRootName = (cli: CliArgs, fileConfig: FileConfig | undefined): Either.Either<string, ConfigError> => {
  const rootName = cli.rootName ?? fileConfig?.rootName ?? DEFAULT_ROOT_NAME
  if (!isIdentifier(rootName)) {
    return Either.left(configError(`rootName must be a valid identifier: ${rootName}`))
  }
  return reservedTypeNames.has(rootName)
    ? Either.left(configError(`rootName is reserved in TypeScript: ${rootName}`))
    : Either.right(rootName)
}

const resolveIndent = (cli: CliArgs, fileConfig: FileConfig | undefined): Either.Either<number, ConfigError> => {
  const indent = cli.indent ?? fileConfig?.indent ?? defaultPrintOptions.indent
  return Number.isInteger(indent) && indent >= 0 && indent <= MAX_INDENT
    ? Either.right(indent)
    : Either.left(configError(`indent must be an integer between 0 and ${MAX_INDENT}: ${indent}`))
}

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .squashtype.json.
 * @returns Resolved configuration or the first invalid setting.
 *
 * @pure true
 * @invariant squash defaults to true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): Either.Either<ResolvedConfig, ConfigError> =>
  Either.flatMap(resolveRootName(cli, fileConfig), (rootName) =>
    Either.map(resolveIndent(cli, fileConfig), (indent) => ({
      inputPath: cli.inputPath,
      outputPath: cli.outputPath,
      infer: {
        squash: cli.squash ?? fileConfig?.squash ?? true,
        rootName
      },
      print: {
        exportTypes: cli.exportTypes ?? fileConfig?.exportTypes ?? defaultPrintOptions.exportTypes,
        indent
      }
    })))
