import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { buildTypeTree } from "../../src/core/build.js"
import type { Json } from "../../src/core/json.js"
import { hashTypeTree } from "../../src/core/fingerprint.js"
import type { HashedNode } from "../../src/core/type-node.js"

const hash = (value: Json): HashedNode => hashTypeTree(buildTypeTree(value))

const field = (node: HashedNode, name: string): HashedNode | undefined =>
  node._tag === "Object" ? node.fields.find((entry) => entry.name === name) : undefined

describe("hashTypeTree", () => {
  it.effect("produces a 256-bit hex digest on every node", () =>
    Effect.sync(() => {
      const root = hash({ a: [1], b: { c: null } })
      expect(root.fingerprint).toMatch(/^[0-9a-f]{64}$/)
      expect(field(root, "a")?.fingerprint).toMatch(/^[0-9a-f]{64}$/)
      expect(field(root, "b")?.fingerprint).toMatch(/^[0-9a-f]{64}$/)
    }))

  it.effect("ignores source key order", () =>
    Effect.sync(() => {
      expect(hash({ a: 1, b: "x" }).fingerprint).toBe(hash({ b: "y", a: 2 }).fingerprint)
    }))

  it.effect("ignores the name a shape appears under", () =>
    Effect.sync(() => {
      const left = hash({ first: { amount: 1 } })
      const right = hash({ second: { amount: 2 } })
      expect(field(left, "first")?.fingerprint).toBe(field(right, "second")?.fingerprint)
      expect(left.fingerprint).not.toBe(right.fingerprint)
    }))

  it.effect("distinguishes primitive kinds", () =>
    Effect.sync(() => {
      const kinds = [hash("x"), hash(1), hash(true), hash(null)].map((node) => node.fingerprint)
      expect(new Set(kinds).size).toBe(4)
      expect(hash({ a: 1 }).fingerprint).not.toBe(hash({ a: "1" }).fingerprint)
    }))

  it.effect("includes field optionality", () =>
    Effect.sync(() => {
      const required = hash([{ a: 1 }, { a: 2 }])
      const optional = hash([{ a: 1 }, {}])
      expect(required.fingerprint).not.toBe(optional.fingerprint)
    }))

  it.effect("distinguishes arrays from their elements and empty arrays from filled ones", () =>
    Effect.sync(() => {
      expect(hash([1]).fingerprint).not.toBe(hash(1).fingerprint)
      expect(hash([]).fingerprint).not.toBe(hash([1]).fingerprint)
      expect(hash([[]]).fingerprint).toBe(hash([[], []]).fingerprint)
    }))

  it.effect("hashes unions independently of element order", () =>
    Effect.sync(() => {
      expect(hash([1, "a"]).fingerprint).toBe(hash(["b", 2]).fingerprint)
    }))
})
