import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { configError, fileError, formatAppError, parseFileError, writeError } from "../../src/core/errors.js"

describe("formatAppError", () => {
  it.effect("renders one diagnostic per error kind", () =>
    Effect.sync(() => {
      expect(formatAppError({ _tag: "CliError", message: "Missing required flag --input" })).toBe(
        "Invalid arguments: Missing required flag --input"
      )
      expect(formatAppError(configError("indent too large"))).toBe("Invalid configuration: indent too large")
      expect(formatAppError(fileError("in.json", "not found"))).toBe("Could not read in.json: not found")
      expect(formatAppError(parseFileError("in.json", "Unexpected token"))).toBe(
        "Could not parse in.json:\nUnexpected token"
      )
      expect(formatAppError(writeError("out.ts", "denied"))).toBe("Could not write out.ts: denied")
    }))
})
