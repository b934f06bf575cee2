import type { Fingerprint, HashedNode, PrimitiveKind } from "./type-node.js"

// CHANGE: describe declaration bodies as structural type expressions
// WHY: keep emission independent of the final text layout
// REF: req-expression-1
// SOURCE: n/a
// FORMAT THEOREM: ∀n,r: refs(expr(n, r)) ⊆ range(r)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a node resolved to a name is never descended into
// COMPLEXITY: O(n)

export type KeywordType = PrimitiveKind | "unknown"

export interface FieldExpr {
  readonly name: string
  readonly optional: boolean
  readonly type: TypeExpr
}

export type TypeExpr =
  | { readonly _tag: "Keyword"; readonly keyword: KeywordType }
  | { readonly _tag: "Reference"; readonly name: string }
  | { readonly _tag: "Array"; readonly element: TypeExpr }
  | { readonly _tag: "Union"; readonly members: ReadonlyArray<TypeExpr> }
  | { readonly _tag: "Object"; readonly fields: ReadonlyArray<FieldExpr> }

/** Name of the shared declaration for a fingerprint, if one was minted. */
export type ResolveName = (fingerprint: Fingerprint) => string | undefined

const inline = (node: HashedNode, resolve: ResolveName): TypeExpr => {
  switch (node._tag) {
    case "Primitive":
      return { _tag: "Keyword", keyword: node.kind }
    case "Unknown":
      return { _tag: "Keyword", keyword: "unknown" }
    case "Array":
      return { _tag: "Array", element: referenceOrInline(node.element, resolve) }
    case "Union":
      return { _tag: "Union", members: node.members.map((member) => referenceOrInline(member, resolve)) }
    case "Object":
      return {
        _tag: "Object",
        fields: node.fields.map((field) => ({
          name: field.name,
          optional: field.optional,
          type: referenceOrInline(field, resolve)
        }))
      }
  }
}

const referenceOrInline = (node: HashedNode, resolve: ResolveName): TypeExpr => {
  const name = resolve(node.fingerprint)
  return name === undefined ? inline(node, resolve) : { _tag: "Reference", name }
}

/**
 * Expression for a declaration whose body is the node itself.
 *
 * The node's own fingerprint is not resolved, only its descendants'.
 *
 * @pure true
 * @complexity O(n)
 */
export const declarationBody = (node: HashedNode, resolve: ResolveName): TypeExpr => inline(node, resolve)

/**
 * Names referenced directly by an expression, in first-reference order.
 *
 * @pure true
 * @invariant result is unique
 * @complexity O(n)
 */
export const referencedNames = (expr: TypeExpr): ReadonlyArray<string> => {
  const names: Array<string> = []
  const seen = new Set<string>()
  const visit = (current: TypeExpr): void => {
    switch (current._tag) {
      case "Reference":
        if (!seen.has(current.name)) {
          seen.add(current.name)
          names.push(current.name)
        }
        return
      case "Array":
        visit(current.element)
        return
      case "Union":
        current.members.forEach(visit)
        return
      case "Object":
        current.fields.forEach((field) => visit(field.type))
        return
      case "Keyword":
        return
    }
  }
  visit(expr)
  return names
}
