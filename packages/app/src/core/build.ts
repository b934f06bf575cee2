import type { Json } from "./json.js"
import { isJsonArray } from "./json.js"
import { mergeAll, unknownElement } from "./merge.js"
import type { TypeNode } from "./type-node.js"
import { ELEMENT_NAME, ROOT_NAME, withName } from "./type-node.js"

// CHANGE: convert a parsed JSON value into a structural type tree
// WHY: every later pass works on shapes, never on values
// REF: req-build-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: build(v) terminates and depth(build(v)) = depth(v)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: object fields keep first-observed key order
// COMPLEXITY: O(n) where n = number of JSON values

const buildNode = (value: Json, name: string): TypeNode => {
  if (value === null) {
    return { _tag: "Primitive", kind: "null", name, optional: false, occurrences: 1 }
  }
  if (isJsonArray(value)) {
    const elements = value.map((entry) => buildNode(entry, ELEMENT_NAME))
    const element = elements.length === 0 ? unknownElement() : withName(mergeAll(elements), ELEMENT_NAME)
    return { _tag: "Array", element, name, optional: false, occurrences: 1 }
  }
  switch (typeof value) {
    case "string":
      return { _tag: "Primitive", kind: "string", name, optional: false, occurrences: 1 }
    case "number":
      return { _tag: "Primitive", kind: "number", name, optional: false, occurrences: 1 }
    case "boolean":
      return { _tag: "Primitive", kind: "boolean", name, optional: false, occurrences: 1 }
    default: {
      const fields = Object.entries(value).map(([key, entry]) => buildNode(entry, key))
      return { _tag: "Object", fields, name, optional: false, occurrences: 1 }
    }
  }
}

/**
 * Build the type tree for a whole JSON document.
 *
 * @param value - Root JSON value.
 * @returns Root TypeNode named with the root sentinel.
 *
 * @pure true
 * @invariant never fails on a valid Json value
 * @complexity O(n)
 */
export const buildTypeTree = (value: Json): TypeNode => buildNode(value, ROOT_NAME)
