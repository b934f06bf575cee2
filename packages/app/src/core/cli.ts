import * as Either from "effect/Either"

// CHANGE: implement deterministic CLI parsing for squashtype
// WHY: keep CLI decoding pure and testable at the boundary
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.inputPath ≠ ""
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and positional arguments are rejected
// COMPLEXITY: O(n) where n = argv length

export interface CliArgs {
  readonly inputPath: string
  readonly outputPath: string | undefined
  readonly squash: boolean | undefined
  readonly rootName: string | undefined
  readonly exportTypes: boolean | undefined
  readonly indent: number | undefined
  readonly configPath: string
  readonly configPathExplicit: boolean
  readonly verbose: boolean
}

type PartialCliArgs = Omit<CliArgs, "inputPath"> & { readonly inputPath: string | undefined }

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const DEFAULT_CONFIG_PATH = "./.squashtype.json"

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-")

const parseBoolean = (value: string): Either.Either<boolean, CliError> => {
  if (value === "true" || value === "1") {
    return Either.right(true)
  }
  if (value === "false" || value === "0") {
    return Either.right(false)
  }
  return Either.left(cliError(`Invalid boolean value: ${value}`))
}

const parseInteger = (flagName: string, value: string): Either.Either<number, CliError> =>
  /^\d+$/u.test(value)
    ? Either.right(Number.parseInt(value, 10))
    : Either.left(cliError(`Invalid integer value for --${flagName}: ${value}`))

const defaultArgs: PartialCliArgs = {
  inputPath: undefined,
  outputPath: undefined,
  squash: undefined,
  rootName: undefined,
  exportTypes: undefined,
  indent: undefined,
  configPath: DEFAULT_CONFIG_PATH,
  configPathExplicit: false,
  verbose: false
}

interface ParsedFlag {
  readonly next: PartialCliArgs
  readonly consumed: number
}

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const parseValueFlag = (
  flagName: string,
  current: PartialCliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: PartialCliArgs, value: string) => Either.Either<PartialCliArgs, CliError>
): Either.Either<ParsedFlag, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

const parseOptionalBooleanFlag = (
  current: PartialCliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: PartialCliArgs, value: boolean) => PartialCliArgs
): Either.Either<ParsedFlag, CliError> => {
  const useNext = inlineValue === undefined && nextValue !== undefined && !isFlag(nextValue)
  const nextValueResolved = inlineValue ?? (useNext ? nextValue : "true")
  return Either.map(parseBoolean(nextValueResolved), (value) => ({
    next: update(current, value),
    consumed: useNext ? 2 : 1
  }))
}

type FlagParser = (
  current: PartialCliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const flagParsers: Record<string, FlagParser> = {
  verbose: (current) => Either.right({ next: { ...current, verbose: true }, consumed: 1 }),
  input: (current, inlineValue, nextValue) =>
    parseValueFlag("input", current, inlineValue, nextValue, (args, value) =>
      Either.right({
        ...args,
        inputPath: value
      })),
  output: (current, inlineValue, nextValue) =>
    parseValueFlag("output", current, inlineValue, nextValue, (args, value) =>
      Either.right({
        ...args,
        outputPath: value
      })),
  name: (current, inlineValue, nextValue) =>
    parseValueFlag("name", current, inlineValue, nextValue, (args, value) =>
      Either.right({
        ...args,
        rootName: value
      })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) =>
      Either.right({
        ...args,
        configPath: value,
        configPathExplicit: true
      })),
  indent: (current, inlineValue, nextValue) =>
    parseValueFlag("indent", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseInteger("indent", value), (indent) => ({
        ...args,
        indent
      }))),
  squash: (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      squash: value
    })),
  export: (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      exportTypes: value
    }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: PartialCliArgs
): Either.Either<ParsedFlag, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const separator = raw.indexOf("=")
  const name = separator === -1 ? raw.slice(2) : raw.slice(2, separator)
  const inlineValue = separator === -1 ? undefined : raw.slice(separator + 1)
  const parser = Object.hasOwn(flagParsers, name) ? flagParsers[name] : undefined
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

const parseFlags = (
  rawArgs: ReadonlyArray<string>,
  initial: PartialCliArgs
): Either.Either<PartialCliArgs, CliError> => {
  let args = initial
  let index = 0
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      return Either.left(cliError(`Unexpected positional argument: ${current}`))
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant --input is required
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> =>
  Either.flatMap(parseFlags(argv.slice(2), defaultArgs), (args): Either.Either<CliArgs, CliError> => {
    const { inputPath } = args
    return inputPath === undefined || inputPath.length === 0
      ? Either.left(cliError("Missing required flag --input"))
      : Either.right({ ...args, inputPath })
  })
