import { createHash } from "node:crypto"

import type { HashedNode, TypeNode } from "./type-node.js"
import { Fingerprint } from "./type-node.js"

// CHANGE: compute structural fingerprints bottom-up in one batch pass
// WHY: equal shapes must collapse to one digest regardless of field names or key order
// REF: req-hash-1
// SOURCE: n/a
// FORMAT THEOREM: ∀a,b: shape(a) = shape(b) → fp(a) = fp(b)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a node's own name and optional flag never enter its own fingerprint
// COMPLEXITY: O(n) where n = number of nodes

type Payload = ReadonlyArray<string | boolean | ReadonlyArray<string | boolean>>

const digest = (tag: string, payload: Payload): Fingerprint =>
  Fingerprint(createHash("sha256").update(JSON.stringify([tag, payload]), "utf8").digest("hex"))

const compareCodeUnits = (left: string, right: string): number => left < right ? -1 : left > right ? 1 : 0

/**
 * Hash a complete type tree, post-order.
 *
 * @param node - Root of a fully built tree.
 * @returns The same tree with a fingerprint on every node.
 *
 * @pure true
 * @invariant object fingerprints ignore source key order
 * @invariant field signatures are sorted by UTF-16 code unit, never by locale
 * @complexity O(n)
 */
export const hashTypeTree = (node: TypeNode): HashedNode => {
  switch (node._tag) {
    case "Primitive":
      return { ...node, fingerprint: digest("primitive", [node.kind]) }
    case "Unknown":
      return { ...node, fingerprint: digest("unknown", []) }
    case "Array": {
      const element = hashTypeTree(node.element)
      return { ...node, element, fingerprint: digest("array", [element.fingerprint]) }
    }
    case "Union": {
      const members = node.members.map(hashTypeTree)
      return { ...node, members, fingerprint: digest("union", members.map((member) => member.fingerprint)) }
    }
    case "Object": {
      const fields = node.fields.map(hashTypeTree)
      const signature = fields
        .map((field) => [field.name, field.fingerprint, field.optional] as const)
        .toSorted(([left], [right]) => compareCodeUnits(left, right))
      return { ...node, fields, fingerprint: digest("object", signature) }
    }
  }
}
