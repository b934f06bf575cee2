import type { Fingerprint, HashedNode } from "./type-node.js"
import { childrenOf } from "./type-node.js"

// CHANGE: index every non-root node by fingerprint in one pass
// WHY: repetition is detected from counts, and generated names follow first-seen order
// REF: req-registry-1
// SOURCE: n/a
// FORMAT THEOREM: ∀fp: count(fp) = Σ occurrences(n) for n ∈ nodes(fp)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: entry order = first pre-order appearance of each fingerprint
// COMPLEXITY: O(n)

export interface RegistryEntry {
  readonly fingerprint: Fingerprint
  readonly nodes: ReadonlyArray<HashedNode>
  readonly count: number
}

export type SignatureRegistry = ReadonlyMap<Fingerprint, RegistryEntry>

/**
 * Build the signature registry for a hashed tree.
 *
 * @param root - Hashed root; the root itself is not registered.
 * @returns Registry in first-seen order.
 *
 * @pure true
 * @invariant registry is never mutated after construction
 * @complexity O(n)
 */
export const buildSignatureRegistry = (root: HashedNode): SignatureRegistry => {
  const nodes = new Map<Fingerprint, Array<HashedNode>>()
  const counts = new Map<Fingerprint, number>()
  const pending: Array<HashedNode> = [...childrenOf(root)].reverse()
  // explicit stack, pre-order
  let current = pending.pop()
  while (current !== undefined) {
    const seen = nodes.get(current.fingerprint)
    if (seen === undefined) {
      nodes.set(current.fingerprint, [current])
    } else {
      seen.push(current)
    }
    counts.set(current.fingerprint, (counts.get(current.fingerprint) ?? 0) + current.occurrences)
    const children = childrenOf(current)
    for (let index = children.length - 1; index >= 0; index -= 1) {
      const child = children[index]
      if (child !== undefined) {
        pending.push(child)
      }
    }
    current = pending.pop()
  }
  const registry = new Map<Fingerprint, RegistryEntry>()
  for (const [fingerprint, group] of nodes) {
    registry.set(fingerprint, { fingerprint, nodes: group, count: counts.get(fingerprint) ?? 0 })
  }
  return registry
}
