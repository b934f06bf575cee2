import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { DEFAULT_CONFIG_PATH, parseCliArgs } from "../../src/core/cli.js"

const argv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "squashtype", ...args]

const errorMessage = (args: ReadonlyArray<string>): string | undefined => {
  const parsed = parseCliArgs(argv(...args))
  return Either.isLeft(parsed) ? parsed.left.message : undefined
}

describe("parseCliArgs", () => {
  it.effect("applies defaults around the required input", () =>
    Effect.sync(() => {
      expect(parseCliArgs(argv("--input", "payload.json"))).toEqual(
        Either.right({
          inputPath: "payload.json",
          outputPath: undefined,
          squash: undefined,
          rootName: undefined,
          exportTypes: undefined,
          indent: undefined,
          configPath: DEFAULT_CONFIG_PATH,
          configPathExplicit: false,
          verbose: false
        })
      )
    }))

  it.effect("accepts inline and separate flag values", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(
        argv("--input=in.json", "--output", "out.ts", "--squash=false", "--name", "Payload", "--indent=4")
      )
      expect(Either.isRight(parsed)).toBe(true)
      if (Either.isRight(parsed)) {
        expect(parsed.right.inputPath).toBe("in.json")
        expect(parsed.right.outputPath).toBe("out.ts")
        expect(parsed.right.squash).toBe(false)
        expect(parsed.right.rootName).toBe("Payload")
        expect(parsed.right.indent).toBe(4)
      }
    }))

  it.effect("treats bare boolean flags as true", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(argv("--squash", "--export", "--verbose", "--input", "in.json"))
      expect(Either.isRight(parsed)).toBe(true)
      if (Either.isRight(parsed)) {
        expect(parsed.right.squash).toBe(true)
        expect(parsed.right.exportTypes).toBe(true)
        expect(parsed.right.verbose).toBe(true)
      }
    }))

  it.effect("reads a following boolean value", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(argv("--input", "in.json", "--squash", "false"))
      expect(Either.isRight(parsed) ? parsed.right.squash : undefined).toBe(false)
    }))

  it.effect("marks an explicit config path", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(argv("--config", "custom.json", "--input", "in.json"))
      expect(Either.isRight(parsed) ? [parsed.right.configPath, parsed.right.configPathExplicit] : []).toEqual([
        "custom.json",
        true
      ])
    }))

  it.effect("rejects invalid command lines", () =>
    Effect.sync(() => {
      expect(errorMessage([])).toBe("Missing required flag --input")
      expect(errorMessage(["--input"])).toBe("Missing value for --input")
      expect(errorMessage(["--input", "--squash"])).toBe("Missing value for --input")
      expect(errorMessage(["--input", "a.json", "--bogus"])).toBe("Unknown flag: --bogus")
      expect(errorMessage(["--input", "a.json", "--constructor"])).toBe("Unknown flag: --constructor")
      expect(errorMessage(["-i", "a.json"])).toBe("Unknown flag: -i")
      expect(errorMessage(["--input", "a.json", "extra"])).toBe("Unexpected positional argument: extra")
      expect(errorMessage(["--input", "a.json", "--squash=maybe"])).toBe("Invalid boolean value: maybe")
      expect(errorMessage(["--input", "a.json", "--indent", "two"])).toBe("Invalid integer value for --indent: two")
    }))
})
