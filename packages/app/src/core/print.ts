import { Match } from "effect"

import type { Declaration } from "./emit.js"
import type { TypeExpr } from "./expression.js"

// CHANGE: render declarations as TypeScript source text
// WHY: the CLI writes a file a developer can paste into a project
// REF: req-print-1
// SOURCE: n/a
// FORMAT THEOREM: ∀ds: lines(render(ds)) preserve the order of ds
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: output ends with exactly one newline
// COMPLEXITY: O(n)

export interface PrintOptions {
  readonly exportTypes: boolean
  readonly indent: number
}

export const defaultPrintOptions: PrintOptions = { exportTypes: false, indent: 2 }

const identifierPattern = /^[A-Za-z_$][A-Za-z0-9_$]*$/u

export const isIdentifier = (value: string): boolean => identifierPattern.test(value)

const propertyKey = (name: string): string => isIdentifier(name) ? name : JSON.stringify(name)

const renderExpr = (expr: TypeExpr, depth: number, indent: number): string =>
  Match.value(expr).pipe(
    Match.tagsExhaustive({
      Keyword: (value) => value.keyword,
      Reference: (value) => value.name,
      Array: (value) =>
        value.element._tag === "Union"
          ? `(${renderExpr(value.element, depth, indent)})[]`
          : `${renderExpr(value.element, depth, indent)}[]`,
      Union: (value) => value.members.map((member) => renderExpr(member, depth, indent)).join(" | "),
      Object: (value) => {
        if (value.fields.length === 0) {
          return "{}"
        }
        const inner = " ".repeat((depth + 1) * indent)
        const lines = value.fields.map((field) =>
          `${inner}${propertyKey(field.name)}${field.optional ? "?" : ""}: ${renderExpr(field.type, depth + 1, indent)};`
        )
        return ["{", ...lines, `${" ".repeat(depth * indent)}}`].join("\n")
      }
    })
  )

/**
 * Render one declaration as a type alias.
 *
 * @pure true
 * @complexity O(n)
 */
export const renderDeclaration = (declaration: Declaration, options: PrintOptions = defaultPrintOptions): string =>
  `${options.exportTypes ? "export " : ""}type ${declaration.name} = ${renderExpr(declaration.body, 0, options.indent)};`

/**
 * Render a declaration list, separated by blank lines.
 *
 * @param declarations - Declarations in emission order.
 * @param options - export prefix and indentation width.
 * @returns TypeScript source.
 *
 * @pure true
 * @invariant declaration order is preserved
 * @complexity O(n)
 */
export const renderDeclarations = (
  declarations: ReadonlyArray<Declaration>,
  options: PrintOptions = defaultPrintOptions
): string => `${declarations.map((declaration) => renderDeclaration(declaration, options)).join("\n\n")}\n`
