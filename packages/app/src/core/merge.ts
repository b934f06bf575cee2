import type { ArrayNode, ObjectNode, TypeNode, UnionNode, UnknownNode } from "./type-node.js"
import { ELEMENT_NAME, MEMBER_NAME, withName, withOptional } from "./type-node.js"

// CHANGE: merge independently built array elements into one representative node
// WHY: an array position must describe every sample it was observed with
// REF: req-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀a,b: fields(merge(a,b)) = fields(a) ∪ fields(b) ∧ (f ∉ a ∩ b → optional(f))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a union holds at most one member per class, in canonical class order
// COMPLEXITY: O(n) where n = combined size of both nodes

type MemberClass = "object" | "array" | "string" | "number" | "boolean" | "null"

const classRank: Readonly<Record<MemberClass, number>> = {
  object: 0,
  array: 1,
  string: 2,
  number: 3,
  boolean: 4,
  null: 5
}

type Member = Exclude<TypeNode, UnionNode | UnknownNode>

const classOf = (node: Member): MemberClass => {
  switch (node._tag) {
    case "Object":
      return "object"
    case "Array":
      return "array"
    case "Primitive":
      return node.kind
  }
}

export const unknownElement = (): UnknownNode => ({
  _tag: "Unknown",
  name: ELEMENT_NAME,
  optional: false,
  occurrences: 0
})

const isMember = (node: TypeNode): node is Member => node._tag !== "Union" && node._tag !== "Unknown"

const membersOf = (node: Member | UnionNode): ReadonlyArray<Member> =>
  node._tag === "Union" ? node.members.filter(isMember) : [node]

const mergeObjects = (left: ObjectNode, right: ObjectNode): ObjectNode => {
  const rightByName = new Map(right.fields.map((field) => [field.name, field] as const))
  const leftNames = new Set(left.fields.map((field) => field.name))
  const merged = left.fields.map((field) => {
    const other = rightByName.get(field.name)
    return other === undefined
      ? withOptional(field, true)
      : withOptional(mergeNodes(field, other), field.optional || other.optional)
  })
  const added = right.fields
    .filter((field) => !leftNames.has(field.name))
    .map((field) => withOptional(field, true))
  return {
    ...left,
    fields: [...merged, ...added],
    occurrences: left.occurrences + right.occurrences
  }
}

const mergeArrays = (left: ArrayNode, right: ArrayNode): ArrayNode => ({
  ...left,
  element: withName(mergeNodes(left.element, right.element), ELEMENT_NAME),
  occurrences: left.occurrences + right.occurrences
})

const mergeSameClass = (left: Member, right: Member): Member => {
  if (left._tag === "Object" && right._tag === "Object") {
    return mergeObjects(left, right)
  }
  if (left._tag === "Array" && right._tag === "Array") {
    return mergeArrays(left, right)
  }
  return { ...left, occurrences: left.occurrences + right.occurrences }
}

const widen = (left: Member | UnionNode, right: Member | UnionNode): TypeNode => {
  const groups = new Map<MemberClass, Member>()
  for (const member of [...membersOf(left), ...membersOf(right)]) {
    const key = classOf(member)
    const existing = groups.get(key)
    groups.set(key, existing === undefined ? member : mergeSameClass(existing, member))
  }
  const members = [...groups.entries()]
    .toSorted(([a], [b]) => classRank[a] - classRank[b])
    .map(([, member]) => withOptional(withName(member, MEMBER_NAME), false))
  const optional = left.optional || right.optional
  const occurrences = left.occurrences + right.occurrences
  const [single] = members
  if (members.length === 1 && single !== undefined) {
    return { ...single, name: left.name, optional, occurrences }
  }
  return { _tag: "Union", name: left.name, optional, occurrences, members }
}

/**
 * Merge two nodes observed at the same structural position.
 *
 * @param left - Node from the earlier sample; its name is kept.
 * @param right - Node from the later sample.
 * @returns A node describing both samples.
 *
 * @pure true
 * @invariant Unknown is the identity of merging
 * @complexity O(n)
 */
export const mergeNodes = (left: TypeNode, right: TypeNode): TypeNode => {
  if (left._tag === "Unknown") {
    return { ...right, name: left.name, occurrences: right.occurrences + left.occurrences }
  }
  if (right._tag === "Unknown") {
    return { ...left, occurrences: left.occurrences + right.occurrences }
  }
  if (left._tag !== "Union" && right._tag !== "Union" && classOf(left) === classOf(right)) {
    return mergeSameClass(left, right)
  }
  return widen(left, right)
}

/**
 * Fold a non-empty list of sibling samples into one node.
 *
 * @pure true
 * @invariant mergeAll([]) is the Unknown placeholder
 * @complexity O(n)
 */
export const mergeAll = (nodes: ReadonlyArray<TypeNode>): TypeNode => {
  const [first, ...rest] = nodes
  if (first === undefined) {
    return unknownElement()
  }
  return rest.reduce(mergeNodes, first)
}
