import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { referencedNames } from "../../src/core/expression.js"
import { inferDeclarations, inferTypeScript } from "../../src/core/infer.js"

const paymentsList = {
  payments: [
    { amount: 1337, currency: "USD" },
    { amount: 420, currency: "GBP" }
  ]
}

const paymentPair = {
  paymentOne: { amount: 1337, status: "paid" },
  paymentTwo: { amount: 420, status: "unpaid" }
}

const catalog = {
  store: { name: "north", location: { lat: 1.5, lng: 2.5 } },
  items: [
    { sku: "a", price: { amount: 1, currency: "EUR" }, tags: ["x"] },
    { sku: "b", price: { amount: 2, currency: "EUR" }, tags: [] },
    { sku: "c", price: { amount: 3, currency: "EUR" }, discount: { amount: 1, currency: "EUR" } }
  ],
  warehouse: { lat: 3, lng: 4 }
}

describe("inferTypeScript", () => {
  it.effect("factors array elements into a generated element type", () =>
    Effect.sync(() => {
      expect(inferTypeScript(paymentsList)).toBe(
        [
          "type DefaultType_0 = {",
          "  amount: number;",
          "  currency: string;",
          "};",
          "",
          "type DefaultType = {",
          "  payments: DefaultType_0[];",
          "};",
          ""
        ].join("\n")
      )
    }))

  it.effect("shares one declaration between two identical fields", () =>
    Effect.sync(() => {
      expect(inferTypeScript(paymentPair)).toBe(
        [
          "type DefaultType_0 = {",
          "  amount: number;",
          "  status: string;",
          "};",
          "",
          "type DefaultType = {",
          "  paymentOne: DefaultType_0;",
          "  paymentTwo: DefaultType_0;",
          "};",
          ""
        ].join("\n")
      )
    }))

  it.effect("inlines everything when squashing is disabled", () =>
    Effect.sync(() => {
      expect(inferTypeScript(paymentPair, { squash: false, rootName: "DefaultType" })).toBe(
        [
          "type DefaultType = {",
          "  paymentOne: {",
          "    amount: number;",
          "    status: string;",
          "  };",
          "  paymentTwo: {",
          "    amount: number;",
          "    status: string;",
          "  };",
          "};",
          ""
        ].join("\n")
      )
    }))

  it.effect("is deterministic across runs", () =>
    Effect.sync(() => {
      expect(inferTypeScript(catalog)).toBe(inferTypeScript(catalog))
      expect(inferTypeScript(catalog, { squash: false, rootName: "DefaultType" })).toBe(
        inferTypeScript(catalog, { squash: false, rootName: "DefaultType" })
      )
    }))

  it.effect("collapses objects whose keys differ only in order", () =>
    Effect.sync(() => {
      const result = inferDeclarations({ p: { a: 1, b: "x" }, q: { b: "y", a: 2 } })
      expect(result.stats.sharedTypes).toBe(1)
      expect(result.declarations.map((declaration) => declaration.name)).toEqual(["DefaultType_0", "DefaultType"])
    }))

  it.effect("orders declarations by dependency and never repeats a body", () =>
    Effect.sync(() => {
      const { declarations } = inferDeclarations(catalog)
      const names = declarations.map((declaration) => declaration.name)
      declarations.forEach((declaration, index) => {
        for (const name of referencedNames(declaration.body)) {
          expect(names.indexOf(name)).toBeGreaterThanOrEqual(0)
          expect(names.indexOf(name)).toBeLessThan(index)
        }
      })
      const bodies = declarations.map((declaration) => JSON.stringify(declaration.body))
      expect(new Set(bodies).size).toBe(bodies.length)
      expect(new Set(names).size).toBe(names.length)
    }))

  it.effect("renders the merged catalog items", () =>
    Effect.sync(() => {
      expect(inferTypeScript(catalog)).toBe(
        [
          "type DefaultType_0 = {",
          "  lat: number;",
          "  lng: number;",
          "};",
          "",
          "type DefaultType_2 = {",
          "  amount: number;",
          "  currency: string;",
          "};",
          "",
          "type DefaultType_1 = {",
          "  sku: string;",
          "  price: DefaultType_2;",
          "  tags?: string[];",
          "  discount?: DefaultType_2;",
          "};",
          "",
          "type DefaultType = {",
          "  store: {",
          "    name: string;",
          "    location: DefaultType_0;",
          "  };",
          "  items: DefaultType_1[];",
          "  warehouse: DefaultType_0;",
          "};",
          ""
        ].join("\n")
      )
    }))

  it.effect("reports run statistics", () =>
    Effect.sync(() => {
      expect(inferDeclarations(paymentsList).stats).toEqual({ nodes: 5, fingerprints: 4, sharedTypes: 1 })
      expect(inferDeclarations(paymentsList, { squash: false, rootName: "DefaultType" }).stats.sharedTypes).toBe(0)
    }))

  it.effect("uses the configured root name for every declaration", () =>
    Effect.sync(() => {
      const { declarations } = inferDeclarations(paymentPair, { squash: true, rootName: "Payload" })
      expect(declarations.map((declaration) => declaration.name)).toEqual(["Payload_0", "Payload"])
    }))
})
