// CHANGE: introduce a JSON domain type for the parsed input document
// WHY: the engine consumes an already validated value tree, never raw text
// REF: req-io-json-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ Json: isFiniteJson(x) → isFiniteJson(x)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export const isJsonArray = (value: Json): value is ReadonlyArray<Json> => Array.isArray(value)
