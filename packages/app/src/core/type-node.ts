import { Brand } from "effect"

// CHANGE: model the structural type tree before and after hashing
// WHY: a node without a fingerprint must not be usable where one is required
// REF: req-type-node-1
// SOURCE: n/a
// FORMAT THEOREM: ∀n ∈ HashedNode: n.fingerprint = H(shape(n))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: name never participates in structural equality
// COMPLEXITY: O(1)/O(1)

export type PrimitiveKind = "string" | "number" | "boolean" | "null"

export type Fingerprint = string & Brand.Brand<"Fingerprint">

export const Fingerprint = Brand.nominal<Fingerprint>()

export const ROOT_NAME = "$"
export const ELEMENT_NAME = "[]"
export const MEMBER_NAME = "|"

interface NodeBase {
  readonly name: string
  readonly optional: boolean
  readonly occurrences: number
}

export interface PrimitiveNode extends NodeBase {
  readonly _tag: "Primitive"
  readonly kind: PrimitiveKind
}

export interface UnknownNode extends NodeBase {
  readonly _tag: "Unknown"
}

export interface ObjectNode extends NodeBase {
  readonly _tag: "Object"
  readonly fields: ReadonlyArray<TypeNode>
}

export interface ArrayNode extends NodeBase {
  readonly _tag: "Array"
  readonly element: TypeNode
}

export interface UnionNode extends NodeBase {
  readonly _tag: "Union"
  readonly members: ReadonlyArray<TypeNode>
}

export type TypeNode = PrimitiveNode | UnknownNode | ObjectNode | ArrayNode | UnionNode

interface HashedBase extends NodeBase {
  readonly fingerprint: Fingerprint
}

export interface HashedPrimitive extends HashedBase {
  readonly _tag: "Primitive"
  readonly kind: PrimitiveKind
}

export interface HashedUnknown extends HashedBase {
  readonly _tag: "Unknown"
}

export interface HashedObject extends HashedBase {
  readonly _tag: "Object"
  readonly fields: ReadonlyArray<HashedNode>
}

export interface HashedArray extends HashedBase {
  readonly _tag: "Array"
  readonly element: HashedNode
}

export interface HashedUnion extends HashedBase {
  readonly _tag: "Union"
  readonly members: ReadonlyArray<HashedNode>
}

export type HashedNode = HashedPrimitive | HashedUnknown | HashedObject | HashedArray | HashedUnion

/**
 * Children of a hashed node in source order.
 *
 * @pure true
 * @complexity O(1)
 */
export const childrenOf = (node: HashedNode): ReadonlyArray<HashedNode> => {
  switch (node._tag) {
    case "Object":
      return node.fields
    case "Array":
      return [node.element]
    case "Union":
      return node.members
    default:
      return []
  }
}

export const withName = <N extends TypeNode>(node: N, name: string): N => ({ ...node, name })

export const withOptional = <N extends TypeNode>(node: N, optional: boolean): N => ({ ...node, optional })
